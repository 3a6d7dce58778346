import { parseKeypair, parsePubkey } from '@marinade.finance/web3js-1x'
import { executeStakeOperation, formatToSol } from '@scilla/sdk'
import { Keypair } from '@solana/web3.js'

import { reportOutcome } from '../execution'
import { parseSolAmount } from '../../parsers'

import type { ContextResolver, ScillaCliContext } from '../../context'
import type { PublicKey } from '@solana/web3.js'
import type BN from 'bn.js'
import type { Command } from 'commander'

export function configureSplit(program: Command): Command {
  return program
    .command('split')
    .description('Split part of a stake account into a new stake account')
    .argument('<stake-account>', 'Stake account to split', parsePubkey)
    .argument('<amount>', 'Amount of SOL moved to the new stake account', parseSolAmount)
    .option(
      '--new-stake-account <keypair>',
      'Keypair of the new stake account, a file path or a byte array (default: generated)',
      parseKeypair,
    )
}

export function installSplit(program: Command, resolveContext: ContextResolver) {
  configureSplit(program).action(
    async (
      stakeAccount: Promise<PublicKey>,
      amount: BN,
      { newStakeAccount }: { newStakeAccount?: Promise<Keypair> },
      command: Command,
    ) => {
      await manageSplit(await resolveContext(command), {
        stakeAccount: await stakeAccount,
        amount,
        newStakeAccount: await newStakeAccount,
      })
    },
  )
}

export async function manageSplit(
  context: ScillaCliContext,
  {
    stakeAccount,
    amount,
    newStakeAccount = Keypair.generate(),
  }: {
    stakeAccount: PublicKey
    amount: BN
    newStakeAccount?: Keypair
  },
): Promise<{ newStakeAccount: PublicKey; signature?: string }> {
  context.logger.info(
    `Splitting ${formatToSol(amount)} SOL from stake account ${stakeAccount.toBase58()} ` +
      `into new stake account ${newStakeAccount.publicKey.toBase58()}`,
  )
  const outcome = await executeStakeOperation(await context.operationContext(), {
    kind: 'Split',
    stakeAccount,
    newStakeAccount,
    amount,
  })
  const signature = reportOutcome(
    context,
    outcome,
    `Stake account ${newStakeAccount.publicKey.toBase58()} split ` +
      `from ${stakeAccount.toBase58()}`,
  )
  return { newStakeAccount: newStakeAccount.publicKey, signature }
}

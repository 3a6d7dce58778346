import { parseKeypair, parsePubkey } from '@marinade.finance/web3js-1x'
import { executeStakeOperation, formatToSol } from '@scilla/sdk'
import { Keypair } from '@solana/web3.js'

import { reportOutcome } from '../execution'
import { parseSolAmount } from '../../parsers'

import type { ContextResolver, ScillaCliContext } from '../../context'
import type { PublicKey } from '@solana/web3.js'
import type BN from 'bn.js'
import type { Command } from 'commander'

export function configureCreate(program: Command): Command {
  return program
    .command('create')
    .description(
      'Create a new stake account funded from the wallet, ' +
        'optionally delegating it right away',
    )
    .argument('<amount>', 'Amount of SOL to stake', parseSolAmount)
    .option(
      '--vote-account <pubkey>',
      'Validator vote account to delegate the new stake account to',
      parsePubkey,
    )
    .option('--staker <pubkey>', 'Stake authority (default: wallet pubkey)', parsePubkey)
    .option(
      '--withdrawer <pubkey>',
      'Withdraw authority (default: wallet pubkey)',
      parsePubkey,
    )
    .option(
      '--stake-account <keypair>',
      'Keypair of the new stake account, a file path or a byte array (default: generated)',
      parseKeypair,
    )
}

type CreateOptions = {
  voteAccount?: Promise<PublicKey>
  staker?: Promise<PublicKey>
  withdrawer?: Promise<PublicKey>
  stakeAccount?: Promise<Keypair>
}

export function installCreate(program: Command, resolveContext: ContextResolver) {
  configureCreate(program).action(
    async (amount: BN, options: CreateOptions, command: Command) => {
      await manageCreate(await resolveContext(command), {
        amount,
        voteAccount: await options.voteAccount,
        staker: await options.staker,
        withdrawer: await options.withdrawer,
        newStakeAccount: await options.stakeAccount,
      })
    },
  )
}

export async function manageCreate(
  context: ScillaCliContext,
  {
    amount,
    voteAccount,
    staker,
    withdrawer,
    newStakeAccount = Keypair.generate(),
  }: {
    amount: BN
    voteAccount?: PublicKey
    staker?: PublicKey
    withdrawer?: PublicKey
    newStakeAccount?: Keypair
  },
): Promise<{ stakeAccount: PublicKey; signature?: string }> {
  const stakeAccount = newStakeAccount.publicKey
  context.logger.info(
    `Creating stake account ${stakeAccount.toBase58()} with ${formatToSol(amount)} SOL` +
      (voteAccount !== undefined ? ` delegated to ${voteAccount.toBase58()}` : ''),
  )
  const outcome = await executeStakeOperation(await context.operationContext(), {
    kind: 'Create',
    newStakeAccount,
    amount,
    staker,
    withdrawer,
    voteAccount,
  })
  const signature = reportOutcome(
    context,
    outcome,
    `Stake account ${stakeAccount.toBase58()} successfully created`,
  )
  return { stakeAccount, signature }
}

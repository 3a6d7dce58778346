import { parsePubkey } from '@marinade.finance/web3js-1x'
import { executeStakeOperation, fetchStakeAccount, formatToSol } from '@scilla/sdk'

import { reportOutcome } from '../execution'
import { parseOptionalSolAmount } from '../../parsers'

import type { ContextResolver, ScillaCliContext } from '../../context'
import type { PublicKey } from '@solana/web3.js'
import type BN from 'bn.js'
import type { Command } from 'commander'

export function configureWithdraw(program: Command): Command {
  return program
    .command('withdraw')
    .description(
      'Withdraw SOL from an initialized or fully deactivated stake account',
    )
    .argument('<stake-account>', 'Stake account to withdraw from', parsePubkey)
    .argument(
      '[amount]',
      'Amount of SOL to withdraw (default: the whole stake account balance)',
      parseOptionalSolAmount,
    )
    .option(
      '--recipient <pubkey>',
      'Account receiving the withdrawn SOL (default: wallet pubkey)',
      parsePubkey,
    )
}

export function installWithdraw(program: Command, resolveContext: ContextResolver) {
  configureWithdraw(program).action(
    async (
      stakeAccount: Promise<PublicKey>,
      amount: BN | undefined,
      { recipient }: { recipient?: Promise<PublicKey> },
      command: Command,
    ) => {
      await manageWithdraw(await resolveContext(command), {
        stakeAccount: await stakeAccount,
        amount,
        recipient: await recipient,
      })
    },
  )
}

export async function manageWithdraw(
  context: ScillaCliContext,
  {
    stakeAccount,
    amount,
    recipient,
  }: {
    stakeAccount: PublicKey
    amount?: BN
    recipient?: PublicKey
  },
): Promise<string | undefined> {
  const operationContext = await context.operationContext()
  const to = recipient ?? operationContext.wallet.publicKey
  let lamports = amount
  if (lamports === undefined) {
    const account = await fetchStakeAccount({
      connection: context.connection,
      address: stakeAccount,
      commitment: context.commitment,
    })
    lamports = account.lamports
  }
  context.logger.info(
    `Withdrawing ${formatToSol(lamports)} SOL from stake account ` +
      `${stakeAccount.toBase58()} to ${to.toBase58()}`,
  )
  const outcome = await executeStakeOperation(operationContext, {
    kind: 'Withdraw',
    stakeAccount,
    recipient: to,
    amount: lamports,
  })
  return reportOutcome(
    context,
    outcome,
    `Withdrawn ${formatToSol(lamports)} SOL from stake account ${stakeAccount.toBase58()}`,
  )
}

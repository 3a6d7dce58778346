import { parsePubkey } from '@marinade.finance/web3js-1x'
import { executeStakeOperation } from '@scilla/sdk'

import { reportOutcome } from '../execution'

import type { ContextResolver, ScillaCliContext } from '../../context'
import type { PublicKey } from '@solana/web3.js'
import type { Command } from 'commander'

export function configureDelegate(program: Command): Command {
  return program
    .command('delegate')
    .description(
      'Delegate an initialized or deactivated stake account to a validator vote account',
    )
    .argument('<stake-account>', 'Stake account to delegate', parsePubkey)
    .argument('<vote-account>', 'Validator vote account to delegate to', parsePubkey)
}

export function installDelegate(program: Command, resolveContext: ContextResolver) {
  configureDelegate(program).action(
    async (
      stakeAccount: Promise<PublicKey>,
      voteAccount: Promise<PublicKey>,
      _options: unknown,
      command: Command,
    ) => {
      await manageDelegate(await resolveContext(command), {
        stakeAccount: await stakeAccount,
        voteAccount: await voteAccount,
      })
    },
  )
}

export async function manageDelegate(
  context: ScillaCliContext,
  {
    stakeAccount,
    voteAccount,
  }: {
    stakeAccount: PublicKey
    voteAccount: PublicKey
  },
): Promise<string | undefined> {
  context.logger.info(
    `Delegating stake account ${stakeAccount.toBase58()} to vote account ${voteAccount.toBase58()}`,
  )
  const outcome = await executeStakeOperation(await context.operationContext(), {
    kind: 'Delegate',
    stakeAccount,
    voteAccount,
  })
  return reportOutcome(
    context,
    outcome,
    `Stake account ${stakeAccount.toBase58()} successfully delegated ` +
      `to ${voteAccount.toBase58()}`,
  )
}

import { parsePubkey } from '@marinade.finance/web3js-1x'
import { executeStakeOperation } from '@scilla/sdk'

import { reportOutcome } from '../execution'

import type { ContextResolver, ScillaCliContext } from '../../context'
import type { PublicKey } from '@solana/web3.js'
import type { Command } from 'commander'

export function configureDeactivate(program: Command): Command {
  return program
    .command('deactivate')
    .description(
      'Deactivate a delegated stake account. The stake cools down until the end ' +
        'of the current epoch, then it can be withdrawn.',
    )
    .argument('<stake-account>', 'Stake account to deactivate', parsePubkey)
}

export function installDeactivate(program: Command, resolveContext: ContextResolver) {
  configureDeactivate(program).action(
    async (stakeAccount: Promise<PublicKey>, _options: unknown, command: Command) => {
      await manageDeactivate(await resolveContext(command), {
        stakeAccount: await stakeAccount,
      })
    },
  )
}

export async function manageDeactivate(
  context: ScillaCliContext,
  { stakeAccount }: { stakeAccount: PublicKey },
): Promise<string | undefined> {
  context.logger.info(`Deactivating stake account ${stakeAccount.toBase58()}`)
  const outcome = await executeStakeOperation(await context.operationContext(), {
    kind: 'Deactivate',
    stakeAccount,
  })
  return reportOutcome(
    context,
    outcome,
    `Stake account ${stakeAccount.toBase58()} successfully deactivated`,
  )
}

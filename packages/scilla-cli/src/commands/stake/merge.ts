import { parsePubkey } from '@marinade.finance/web3js-1x'
import { executeStakeOperation } from '@scilla/sdk'

import { reportOutcome } from '../execution'

import type { ContextResolver, ScillaCliContext } from '../../context'
import type { PublicKey } from '@solana/web3.js'
import type { Command } from 'commander'

export function configureMerge(program: Command): Command {
  return program
    .command('merge')
    .description(
      'Merge the source stake account into the destination one. ' +
        'The source account is closed.',
    )
    .argument('<destination>', 'Stake account to merge into', parsePubkey)
    .argument('<source>', 'Stake account to be merged and closed', parsePubkey)
}

export function installMerge(program: Command, resolveContext: ContextResolver) {
  configureMerge(program).action(
    async (
      destination: Promise<PublicKey>,
      source: Promise<PublicKey>,
      _options: unknown,
      command: Command,
    ) => {
      await manageMerge(await resolveContext(command), {
        destination: await destination,
        source: await source,
      })
    },
  )
}

export async function manageMerge(
  context: ScillaCliContext,
  {
    destination,
    source,
  }: {
    destination: PublicKey
    source: PublicKey
  },
): Promise<string | undefined> {
  context.logger.info(
    `Merging stake account ${source.toBase58()} into ${destination.toBase58()}`,
  )
  const outcome = await executeStakeOperation(await context.operationContext(), {
    kind: 'Merge',
    stakeAccount: destination,
    sourceStakeAccount: source,
  })
  return reportOutcome(
    context,
    outcome,
    `Stake account ${source.toBase58()} merged into ${destination.toBase58()}`,
  )
}

import { fetchClusterInfo } from '@scilla/sdk'

import { printData } from '../format'

import type { ContextResolver, ScillaCliContext } from '../context'
import type { ClusterInfo } from '@scilla/sdk'
import type { Command } from 'commander'

export function installClusterCommands(
  program: Command,
  resolveContext: ContextResolver,
) {
  program
    .command('cluster')
    .description('Cluster information')
    .command('info')
    .description('Show the current epoch, slot, block height and node version')
    .action(async (_options: unknown, command: Command) => {
      await showClusterInfo(await resolveContext(command))
    })
}

export async function showClusterInfo(context: ScillaCliContext): Promise<ClusterInfo> {
  const info = await fetchClusterInfo({
    connection: context.connection,
    commitment: context.commitment,
  })
  printData(
    {
      ...info,
      epochProgress: `${((info.slotIndex / info.slotsInEpoch) * 100).toFixed(2)}%`,
    },
    context.format,
  )
  return info
}

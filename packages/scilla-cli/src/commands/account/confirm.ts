import { fetchSignatureStatus } from '@scilla/sdk'

import { printData } from '../../format'

import type { ContextResolver, ScillaCliContext } from '../../context'
import type { SignatureStatusReport } from '@scilla/sdk'
import type { Command } from 'commander'

export function configureConfirm(program: Command): Command {
  return program
    .command('confirm')
    .description('Show the confirmation status of a sent transaction')
    .argument('<signature>', 'Transaction signature')
}

export function installConfirm(program: Command, resolveContext: ContextResolver) {
  configureConfirm(program).action(
    async (signature: string, _options: unknown, command: Command) => {
      await showConfirmation(await resolveContext(command), { signature })
    },
  )
}

export async function showConfirmation(
  context: ScillaCliContext,
  { signature }: { signature: string },
): Promise<SignatureStatusReport> {
  const status = await fetchSignatureStatus({
    connection: context.connection,
    signature: signature.trim(),
  })
  if (!status.found) {
    context.logger.info(`Transaction ${status.signature} not found`)
    return status
  }
  printData(
    {
      signature: status.signature,
      slot: status.slot,
      status: status.succeeded ? 'Success' : `Failed: ${status.err ?? ''}`,
      confirmationStatus: status.confirmationStatus,
      confirmations: status.confirmations ?? 'max',
    },
    context.format,
  )
  return status
}

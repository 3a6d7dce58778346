import { assertNever } from '@scilla/sdk'

import type { ScillaCliContext } from '../context'
import type { OperationOutcome } from '@scilla/sdk'

/**
 * Logs what happened to the transaction, returns the signature
 * when it was sent and confirmed.
 */
export function reportOutcome(
  context: ScillaCliContext,
  { result }: OperationOutcome,
  successMessage: string,
): string | undefined {
  switch (result.kind) {
    case 'Confirmed':
      context.logger.info(`${successMessage}, signature: ${result.signature}`)
      return result.signature
    case 'Simulated':
      context.logger.info('Transaction simulated, nothing was sent')
      return undefined
    case 'PrintOnly':
      context.logger.info('Transaction printed, nothing was sent')
      return undefined
    default:
      return assertNever(result, 'transaction result')
  }
}

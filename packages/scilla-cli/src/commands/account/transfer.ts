import { parsePubkey } from '@marinade.finance/web3js-1x'
import { executeStakeOperation, formatToSol } from '@scilla/sdk'

import { reportOutcome } from '../execution'
import { parseSolAmount } from '../../parsers'

import type { ContextResolver, ScillaCliContext } from '../../context'
import type { PublicKey } from '@solana/web3.js'
import type BN from 'bn.js'
import type { Command } from 'commander'

export function configureTransfer(program: Command): Command {
  return program
    .command('transfer')
    .description('Transfer SOL from the wallet to another address')
    .argument('<recipient>', 'Recipient address', parsePubkey)
    .argument('<amount>', 'Amount of SOL to transfer', parseSolAmount)
}

export function installTransfer(program: Command, resolveContext: ContextResolver) {
  configureTransfer(program).action(
    async (
      recipient: Promise<PublicKey>,
      amount: BN,
      _options: unknown,
      command: Command,
    ) => {
      await manageTransfer(await resolveContext(command), {
        recipient: await recipient,
        amount,
      })
    },
  )
}

export async function manageTransfer(
  context: ScillaCliContext,
  { recipient, amount }: { recipient: PublicKey; amount: BN },
): Promise<string | undefined> {
  context.logger.info(
    `Transferring ${formatToSol(amount)} SOL to ${recipient.toBase58()}`,
  )
  const outcome = await executeStakeOperation(await context.operationContext(), {
    kind: 'Transfer',
    recipient,
    amount,
  })
  return reportOutcome(
    context,
    outcome,
    `Transferred ${formatToSol(amount)} SOL to ${recipient.toBase58()}`,
  )
}

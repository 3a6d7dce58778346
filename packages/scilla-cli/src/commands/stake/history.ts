import { parsePubkey } from '@marinade.finance/web3js-1x'
import { DEFAULT_HISTORY_LIMIT, fetchStakeAccountHistory } from '@scilla/sdk'

import {
  formatBlockTime,
  printData,
  shortSignature,
} from '../../format'
import { parseNonNegativeInteger } from '../../parsers'

import type { ContextResolver, ScillaCliContext } from '../../context'
import type { SignatureHistoryEntry } from '@scilla/sdk'
import type { PublicKey } from '@solana/web3.js'
import type { Command } from 'commander'

export function configureStakeHistory(program: Command): Command {
  return program
    .command('history')
    .description('Show the latest transactions of a stake account')
    .argument('<stake-account>', 'Stake account address', parsePubkey)
    .option(
      '--limit <number>',
      `Number of transactions to show (default: ${DEFAULT_HISTORY_LIMIT})`,
      parseNonNegativeInteger('--limit'),
    )
}

export function installStakeHistory(
  program: Command,
  resolveContext: ContextResolver,
) {
  configureStakeHistory(program).action(
    async (
      address: Promise<PublicKey>,
      { limit }: { limit?: number },
      command: Command,
    ) => {
      await showStakeHistory(await resolveContext(command), {
        address: await address,
        limit,
      })
    },
  )
}

const COLUMNS = ['Slot', 'Signature', 'Status', 'Block Time'] as const

export function formatHistoryTable(entries: SignatureHistoryEntry[]): string[] {
  const rows = entries.map(entry => [
    entry.slot.toString(),
    shortSignature(entry.signature),
    entry.succeeded ? 'Success' : 'Failed',
    formatBlockTime(entry.blockTime),
  ])
  const widths = COLUMNS.map((header, i) =>
    Math.max(header.length, ...rows.map(row => (row[i] ?? '').length)),
  )
  const line = (cells: readonly string[]) =>
    cells
      .map((cell, i) => cell.padEnd(widths[i] ?? 0))
      .join('  ')
      .trimEnd()
  return [line(COLUMNS), ...rows.map(line)]
}

export async function showStakeHistory(
  context: ScillaCliContext,
  { address, limit }: { address: PublicKey; limit?: number },
): Promise<SignatureHistoryEntry[]> {
  const entries = await fetchStakeAccountHistory({
    connection: context.connection,
    address,
    limit,
  })
  if (context.format !== 'text') {
    printData(entries, context.format)
    return entries
  }
  if (entries.length === 0) {
    context.logger.info(
      `No transaction history found for stake account ${address.toBase58()}`,
    )
    return entries
  }
  console.log(`Stake account ${address.toBase58()} transaction history`)
  for (const row of formatHistoryTable(entries)) {
    console.log(row)
  }
  console.log(`Showing last ${entries.length} transactions`)
  return entries
}

import {
  CliCommandError,
  printData as printFormattedData,
} from '@marinade.finance/cli-common'
import { formatToSol } from '@scilla/sdk'
import { PublicKey } from '@solana/web3.js'
import BN from 'bn.js'

import type { FormatType } from '@marinade.finance/cli-common'

export type { FormatType }

export const FORMAT_TYPES: FormatType[] = ['text', 'yaml', 'json']

export function parseFormat(value: string): FormatType {
  const format = FORMAT_TYPES.find(f => f === value.trim().toLowerCase())
  if (format === undefined) {
    throw new CliCommandError({
      valueName: '--format',
      value,
      msg: `Unknown output format, use one of: ${FORMAT_TYPES.join(', ')}`,
    })
  }
  return format
}

/**
 * Public keys become base58, BN and bigint their decimal digits, dates ISO.
 */
export function reformat(value: unknown): unknown {
  if (value instanceof PublicKey) {
    return value.toBase58()
  }
  if (BN.isBN(value)) {
    return value.toString()
  }
  if (typeof value === 'bigint') {
    return value.toString()
  }
  if (value instanceof Date) {
    return value.toISOString()
  }
  if (Array.isArray(value)) {
    return value.map(reformat)
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .map(([k, v]) => [k, reformat(v)]),
    )
  }
  return value
}

/**
 * Prints the data with the public keys, big numbers and dates made plain first.
 */
export function printData(data: unknown, format: FormatType) {
  printFormattedData(reformat(data), format)
}

export function formatSol(lamports: BN | number): string {
  return `${formatToSol(lamports)} SOL`
}

export function shortSignature(signature: string): string {
  if (signature.length <= 16) {
    return signature
  }
  return `${signature.slice(0, 8)}...${signature.slice(-8)}`
}

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC, `~` when the node does not know the time.
 */
export function formatBlockTime(blockTime: Date | null): string {
  if (blockTime === null) {
    return '~'
  }
  return blockTime.toISOString().slice(0, 19).replace('T', ' ')
}

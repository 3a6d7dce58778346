import { homedir } from 'os'
import path from 'path'

import { CliCommandError } from '@marinade.finance/cli-common'
import {
  InvalidAmountError,
  optionalSolToLamports,
  solToLamports,
} from '@scilla/sdk'

import type BN from 'bn.js'

// plain decimal notation only, no sign, exponent nor hex/binary/octal prefix
const DECIMAL_SOL = /^(\d+(\.\d*)?|\.\d+)$/

export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return homedir()
  }
  if (filePath.startsWith('~/')) {
    return path.join(homedir(), filePath.slice(2))
  }
  return filePath
}

function parseSolNumber(value: string): number {
  const trimmed = value.trim()
  if (!DECIMAL_SOL.test(trimmed)) {
    throw new CliCommandError({
      valueName: 'amount',
      value,
      msg: 'Invalid amount, must be a decimal number of SOL',
    })
  }
  return Number(trimmed)
}

/**
 * SOL amount from the command line into lamports.
 */
export function parseSolAmount(value: string): BN {
  if (value.trim() === '') {
    throw new CliCommandError({
      valueName: 'amount',
      value,
      msg: 'Amount cannot be empty, please provide a SOL amount',
    })
  }
  const sol = parseSolNumber(value)
  try {
    return solToLamports(sol)
  } catch (err) {
    if (!(err instanceof InvalidAmountError)) {
      throw err
    }
    throw new CliCommandError({
      valueName: 'amount',
      value,
      msg: `Invalid amount: ${err.message}`,
      cause: err,
    })
  }
}

/**
 * Empty input means no amount, anything else has to be a valid amount.
 */
export function parseOptionalSolAmount(value: string): BN | undefined {
  if (value.trim() === '') {
    return undefined
  }
  const sol = parseSolNumber(value)
  try {
    return optionalSolToLamports(sol)
  } catch (err) {
    if (!(err instanceof InvalidAmountError)) {
      throw err
    }
    throw new CliCommandError({
      valueName: 'amount',
      value,
      msg: `Invalid amount: ${err.message}`,
      cause: err,
    })
  }
}

export function parseNonNegativeInteger(valueName: string) {
  return (value: string): number => {
    const trimmed = value.trim()
    const parsed = Number(trimmed)
    if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed)) {
      throw new CliCommandError({
        valueName,
        value,
        msg: 'Expected a non-negative integer',
      })
    }
    return parsed
  }
}

import { U64_MAX } from '@marinade.finance/web3js-1x'
import { LAMPORTS_PER_SOL } from '@solana/web3.js'
import BN from 'bn.js'

import { InvalidAmountError } from './errors'

const LAMPORTS_PER_SOL_BN = new BN(LAMPORTS_PER_SOL)
const SOL_DECIMALS = 9

/**
 * Converts SOL to lamports. The scaled value is truncated toward zero,
 * never rounded, as the on-chain programs do. An amount below one lamport
 * truncates to zero and is rejected.
 */
export function solToLamports(sol: number): BN {
  if (!Number.isFinite(sol)) {
    throw new InvalidAmountError(`Amount must be a finite number, got ${sol}`, sol)
  }
  if (sol <= 0) {
    throw new InvalidAmountError(`Amount must be greater than 0, got ${sol}`, sol)
  }
  const lamports = Math.trunc(sol * LAMPORTS_PER_SOL)
  if (lamports === 0) {
    throw new InvalidAmountError(
      `Amount ${sol} SOL is less than one lamport (0.000000001 SOL)`,
      sol,
    )
  }
  const lamportsBN = new BN(BigInt(lamports).toString())
  if (lamportsBN.gt(U64_MAX)) {
    throw new InvalidAmountError(
      `Amount too large: ${sol} SOL would overflow the lamports range`,
      sol,
    )
  }
  return lamportsBN
}

/**
 * `undefined` stands for an amount that was not provided at all,
 * an explicit zero is still rejected.
 */
export function optionalSolToLamports(sol: number | undefined): BN | undefined {
  return sol === undefined ? undefined : solToLamports(sol)
}

/**
 * Integer lamports (as returned by RPC) into BN, not limited to 53 bits.
 */
export function toBN(value: number | bigint | string | BN): BN {
  if (BN.isBN(value)) {
    return value
  }
  return new BN(typeof value === 'number' ? BigInt(value).toString() : value.toString())
}

export function lamportsToSol(lamports: BN | number | bigint): number {
  return Number(lamports.toString()) / LAMPORTS_PER_SOL
}

/**
 * Exact decimal rendering of lamports in SOL, trailing zeros dropped.
 */
export function formatToSol(lamports: BN | number | bigint): string {
  const value = BN.isBN(lamports) ? lamports : new BN(lamports.toString())
  const sign = value.isNeg() ? '-' : ''
  const { div, mod } = value.abs().divmod(LAMPORTS_PER_SOL_BN)
  const fraction = mod
    .toString()
    .padStart(SOL_DECIMALS, '0')
    .replace(/0+$/, '')
  return fraction.length > 0
    ? `${sign}${div.toString()}.${fraction}`
    : `${sign}${div.toString()}`
}

export function formatToSolWithUnit(lamports: BN | number | bigint): string {
  return `${formatToSol(lamports)} SOL`
}

/**
 * web3.js builders take lamports as a number.
 */
export function toSafeNumber(lamports: BN, what = 'Amount'): number {
  if (lamports.gt(new BN(Number.MAX_SAFE_INTEGER))) {
    throw new InvalidAmountError(
      `${what} ${formatToSol(lamports)} SOL cannot be safely converted ` +
        'to number of lamports. Please, use a lower number.',
    )
  }
  return lamports.toNumber()
}

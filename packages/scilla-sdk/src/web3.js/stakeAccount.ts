import { U64_MAX } from '@marinade.finance/web3js-1x'
import { StakeProgram } from '@solana/web3.js'

import { AccountDataReader } from './accountDataReader'
import { toBN } from '../amount'
import {
  AccountNotFoundError,
  DecodeError,
  NetworkError,
  OwnershipError,
} from '../errors'

import type { RpcConnection } from '../rpc'
import type BN from 'bn.js'
import type { AccountInfo, Commitment, PublicKey } from '@solana/web3.js'

/**
 * Deactivation epoch of a delegation that has not been deactivated.
 */
export const ACTIVE_STAKE_EPOCH_BOUND: BN = U64_MAX

export const STAKE_ACCOUNT_SIZE = StakeProgram.space

export type StakeAuthorized = {
  staker: PublicKey
  withdrawer: PublicKey
}

export type StakeLockup = {
  unixTimestamp: BN
  epoch: BN
  custodian: PublicKey
}

export type StakeMeta = {
  rentExemptReserve: BN
  authorized: StakeAuthorized
  lockup: StakeLockup
}

export type StakeDelegation = {
  voter: PublicKey
  stake: BN
  activationEpoch: BN
  deactivationEpoch: BN
  creditsObserved: BN
  flags: number
}

export type StakeState =
  | { kind: 'Uninitialized' }
  | { kind: 'Initialized'; meta: StakeMeta }
  | { kind: 'Delegated'; meta: StakeMeta; stake: StakeDelegation }
  | { kind: 'RewardsPool' }

export type StakeStateKind = StakeState['kind']

export type StakeAccount = {
  address: PublicKey
  lamports: BN
  state: StakeState
}

export type StakeActivationStatus =
  | 'activating'
  | 'active'
  | 'deactivating'
  | 'inactive'

// StakeStateV2 enum tags, bincode u32 little endian
const UNINITIALIZED_TAG = 0
const INITIALIZED_TAG = 1
const STAKE_TAG = 2
const REWARDS_POOL_TAG = 3

function readMeta(reader: AccountDataReader): StakeMeta {
  const rentExemptReserve = reader.u64()
  const staker = reader.pubkey()
  const withdrawer = reader.pubkey()
  const unixTimestamp = reader.i64()
  const epoch = reader.u64()
  const custodian = reader.pubkey()
  return {
    rentExemptReserve,
    authorized: { staker, withdrawer },
    lockup: { unixTimestamp, epoch, custodian },
  }
}

function readDelegation(reader: AccountDataReader): StakeDelegation {
  const voter = reader.pubkey()
  const stake = reader.u64()
  const activationEpoch = reader.u64()
  const deactivationEpoch = reader.u64()
  // deprecated warmup_cooldown_rate (f64)
  reader.skip(8, 'warmup cooldown rate')
  const creditsObserved = reader.u64()
  // stake flags were appended later, older accounts end before them
  const flags = reader.remaining > 0 ? reader.u8() : 0
  return {
    voter,
    stake,
    activationEpoch,
    deactivationEpoch,
    creditsObserved,
    flags,
  }
}

/**
 * Decoding the bincode serialized `StakeStateV2` of the native Stake program.
 */
export function decodeStakeState(
  data: Buffer,
  address?: PublicKey,
): StakeState {
  const reader = new AccountDataReader(data, 'stake', address)
  const tag = reader.u32()
  switch (tag) {
    case UNINITIALIZED_TAG:
      return { kind: 'Uninitialized' }
    case INITIALIZED_TAG:
      return { kind: 'Initialized', meta: readMeta(reader) }
    case STAKE_TAG: {
      const meta = readMeta(reader)
      const stake = readDelegation(reader)
      return { kind: 'Delegated', meta, stake }
    }
    case REWARDS_POOL_TAG:
      return { kind: 'RewardsPool' }
    default:
      throw new DecodeError(`unknown stake state discriminant ${tag}`, address)
  }
}

export function decodeStakeAccount(
  address: PublicKey,
  accountInfo: AccountInfo<Buffer>,
): StakeAccount {
  if (!accountInfo.owner.equals(StakeProgram.programId)) {
    throw new OwnershipError(
      address,
      accountInfo.owner,
      StakeProgram.programId,
    )
  }
  return {
    address,
    lamports: toBN(accountInfo.lamports),
    state: decodeStakeState(accountInfo.data, address),
  }
}

/**
 * Loads the stake account as the node sees it now. Nothing is cached,
 * the result is stale after the next network round-trip.
 */
export async function fetchStakeAccount({
  connection,
  address,
  commitment,
}: {
  connection: RpcConnection
  address: PublicKey
  commitment?: Commitment
}): Promise<StakeAccount> {
  const accountInfo = await fetchAccountInfo({
    connection,
    address,
    commitment,
  })
  if (accountInfo === null) {
    throw new AccountNotFoundError(address)
  }
  return decodeStakeAccount(address, accountInfo)
}

export async function fetchAccountInfo({
  connection,
  address,
  commitment,
}: {
  connection: RpcConnection
  address: PublicKey
  commitment?: Commitment
}): Promise<AccountInfo<Buffer> | null> {
  try {
    return await connection.getAccountInfo(address, commitment)
  } catch (err) {
    throw new NetworkError(
      `Failed to fetch account ${address.toBase58()} from ${connection.rpcEndpoint}`,
      err,
    )
  }
}

export function isActiveStake(stake: StakeDelegation): boolean {
  return stake.deactivationEpoch.eq(ACTIVE_STAKE_EPOCH_BOUND)
}

/**
 * A deactivated delegation keeps cooling down until the epoch after
 * its deactivation epoch.
 */
export function isCoolingDown(stake: StakeDelegation, currentEpoch: BN): boolean {
  return !isActiveStake(stake) && currentEpoch.lte(stake.deactivationEpoch)
}

export function stakeActivationStatus(
  stake: StakeDelegation,
  currentEpoch: BN,
): StakeActivationStatus {
  if (!isActiveStake(stake)) {
    return isCoolingDown(stake, currentEpoch) ? 'deactivating' : 'inactive'
  }
  return stake.activationEpoch.gte(currentEpoch) ? 'activating' : 'active'
}

export function getStakeMeta(state: StakeState): StakeMeta | undefined {
  switch (state.kind) {
    case 'Initialized':
    case 'Delegated':
      return state.meta
    case 'Uninitialized':
    case 'RewardsPool':
      return undefined
  }
}

export async function getRentExemptStake(
  connection: RpcConnection,
  rentExempt?: number,
): Promise<number> {
  if (rentExempt !== undefined) {
    return rentExempt
  }
  try {
    return await connection.getMinimumBalanceForRentExemption(
      STAKE_ACCOUNT_SIZE,
    )
  } catch (err) {
    throw new NetworkError(
      `Failed to fetch rent exemption for stake account size ${STAKE_ACCOUNT_SIZE}`,
      err,
    )
  }
}

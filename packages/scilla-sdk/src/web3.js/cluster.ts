import { SYSVAR_CLOCK_PUBKEY } from '@solana/web3.js'

import { AccountDataReader } from './accountDataReader'
import { AccountNotFoundError, NetworkError } from '../errors'

import type { RpcConnection } from '../rpc'
import type { Commitment } from '@solana/web3.js'
import type BN from 'bn.js'

export type ClusterInfo = {
  rpcEndpoint: string
  epoch: number
  slotIndex: number
  slotsInEpoch: number
  absoluteSlot: number
  blockHeight: number
  transactionCount?: number
  solanaCore: string
}

export async function fetchCurrentEpoch(
  connection: RpcConnection,
  commitment?: Commitment,
): Promise<number> {
  try {
    const { epoch } = await connection.getEpochInfo(commitment)
    return epoch
  } catch (err) {
    throw new NetworkError(
      `Failed to fetch epoch info from ${connection.rpcEndpoint}`,
      err,
    )
  }
}

/**
 * Epoch and unix timestamp the Stake program checks lockups against.
 */
export type ClusterClock = {
  slot: BN
  epoch: BN
  unixTimestamp: BN
}

export function decodeClock(data: Buffer): ClusterClock {
  const reader = new AccountDataReader(data, 'clock', SYSVAR_CLOCK_PUBKEY)
  const slot = reader.u64()
  // epoch start timestamp
  reader.i64()
  const epoch = reader.u64()
  // leader schedule epoch
  reader.u64()
  const unixTimestamp = reader.i64()
  return { slot, epoch, unixTimestamp }
}

export async function fetchClusterClock(
  connection: RpcConnection,
  commitment?: Commitment,
): Promise<ClusterClock> {
  let data: Buffer | undefined
  try {
    const accountInfo = await connection.getAccountInfo(
      SYSVAR_CLOCK_PUBKEY,
      commitment,
    )
    data = accountInfo?.data
  } catch (err) {
    throw new NetworkError(
      `Failed to fetch clock sysvar from ${connection.rpcEndpoint}`,
      err,
    )
  }
  if (data === undefined) {
    throw new AccountNotFoundError(SYSVAR_CLOCK_PUBKEY)
  }
  return decodeClock(data)
}

export async function fetchClusterInfo({
  connection,
  commitment,
}: {
  connection: RpcConnection
  commitment?: Commitment
}): Promise<ClusterInfo> {
  try {
    const epochInfo = await connection.getEpochInfo(commitment)
    const blockHeight = await connection.getBlockHeight(commitment)
    const version = await connection.getVersion()
    return {
      rpcEndpoint: connection.rpcEndpoint,
      epoch: epochInfo.epoch,
      slotIndex: epochInfo.slotIndex,
      slotsInEpoch: epochInfo.slotsInEpoch,
      absoluteSlot: epochInfo.absoluteSlot,
      blockHeight,
      transactionCount: epochInfo.transactionCount,
      solanaCore: version['solana-core'],
    }
  } catch (err) {
    throw new NetworkError(
      `Failed to fetch cluster info from ${connection.rpcEndpoint}`,
      err,
    )
  }
}

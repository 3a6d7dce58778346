import { StakeProgram } from '@solana/web3.js'

import { fetchAccountInfo } from './stakeAccount'
import {
  AccountNotFoundError,
  InvalidArgumentError,
  NetworkError,
  OwnershipError,
} from '../errors'

import type { RpcConnection } from '../rpc'
import type {
  ConfirmedSignatureInfo,
  PublicKey,
  TransactionConfirmationStatus,
} from '@solana/web3.js'

export const DEFAULT_HISTORY_LIMIT = 20
// getSignaturesForAddress refuses more per call
export const MAX_HISTORY_LIMIT = 1000

export type SignatureHistoryEntry = {
  slot: number
  signature: string
  succeeded: boolean
  blockTime: Date | null
  memo: string | null
  confirmationStatus?: TransactionConfirmationStatus
}

function toHistoryEntry(info: ConfirmedSignatureInfo): SignatureHistoryEntry {
  return {
    slot: info.slot,
    signature: info.signature,
    succeeded: info.err === null,
    blockTime:
      info.blockTime === null || info.blockTime === undefined
        ? null
        : new Date(info.blockTime * 1000),
    memo: info.memo,
    confirmationStatus: info.confirmationStatus,
  }
}

/**
 * Transactions that touched the address, newest first as the node returns them.
 * An address without any transaction gives an empty list.
 */
export async function fetchSignatureHistory({
  connection,
  address,
  limit = DEFAULT_HISTORY_LIMIT,
  before,
}: {
  connection: RpcConnection
  address: PublicKey
  limit?: number
  before?: string
}): Promise<SignatureHistoryEntry[]> {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_HISTORY_LIMIT) {
    throw new InvalidArgumentError(
      `History limit must be an integer between 1 and ${MAX_HISTORY_LIMIT}, got ${limit}`,
      'limit',
    )
  }
  let signatures: ConfirmedSignatureInfo[]
  try {
    signatures = await connection.getSignaturesForAddress(address, {
      limit,
      before,
    })
  } catch (err) {
    throw new NetworkError(
      `Failed to fetch transaction history of ${address.toBase58()} from ${connection.rpcEndpoint}`,
      err,
    )
  }
  return signatures.map(toHistoryEntry)
}

/**
 * History of a stake account. The address has to be an existing account
 * of the Stake program, otherwise the history is not fetched at all.
 */
export async function fetchStakeAccountHistory({
  connection,
  address,
  limit,
  before,
}: {
  connection: RpcConnection
  address: PublicKey
  limit?: number
  before?: string
}): Promise<SignatureHistoryEntry[]> {
  const accountInfo = await fetchAccountInfo({ connection, address })
  if (accountInfo === null) {
    throw new AccountNotFoundError(address)
  }
  if (!accountInfo.owner.equals(StakeProgram.programId)) {
    throw new OwnershipError(address, accountInfo.owner, StakeProgram.programId)
  }
  return fetchSignatureHistory({ connection, address, limit, before })
}

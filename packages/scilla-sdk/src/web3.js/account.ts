import { logInfo } from '@marinade.finance/ts-common'

import { toBN, toSafeNumber } from '../amount'
import { ConfirmationError, NetworkError, SubmissionRejectedError } from '../errors'

import type { RpcConnection } from '../rpc'
import type { LoggerPlaceholder } from '@marinade.finance/ts-common'
import type BN from 'bn.js'
import type {
  Commitment,
  Finality,
  PublicKey,
  TransactionConfirmationStatus,
} from '@solana/web3.js'

export async function fetchBalance({
  connection,
  address,
  commitment,
}: {
  connection: RpcConnection
  address: PublicKey
  commitment?: Commitment
}): Promise<BN> {
  try {
    return toBN(await connection.getBalance(address, commitment))
  } catch (err) {
    throw new NetworkError(
      `Failed to fetch balance of ${address.toBase58()} from ${connection.rpcEndpoint}`,
      err,
    )
  }
}

export type SignatureStatusReport =
  | { found: false; signature: string }
  | {
      found: true
      signature: string
      slot: number
      confirmations: number | null
      confirmationStatus?: TransactionConfirmationStatus
      succeeded: boolean
      err: string | null
    }

/**
 * Looks up the outcome of a sent transaction, including the ones outside
 * of the node's recent status cache.
 */
export async function fetchSignatureStatus({
  connection,
  signature,
}: {
  connection: RpcConnection
  signature: string
}): Promise<SignatureStatusReport> {
  let status: Awaited<ReturnType<RpcConnection['getSignatureStatus']>>
  try {
    status = await connection.getSignatureStatus(signature, {
      searchTransactionHistory: true,
    })
  } catch (err) {
    throw new NetworkError(
      `Failed to fetch status of transaction ${signature} from ${connection.rpcEndpoint}`,
      err,
    )
  }
  if (status.value === null) {
    return { found: false, signature }
  }
  const { slot, confirmations, confirmationStatus, err } = status.value
  return {
    found: true,
    signature,
    slot,
    confirmations,
    confirmationStatus,
    succeeded: err === null,
    err: err === null ? null : JSON.stringify(err),
  }
}

/**
 * Airdrops are served by test clusters only, mainnet refuses them.
 */
export async function requestAirdrop({
  connection,
  address,
  lamports,
  finality = 'confirmed',
  logger,
}: {
  connection: RpcConnection
  address: PublicKey
  lamports: BN
  finality?: Finality
  logger?: LoggerPlaceholder
}): Promise<string> {
  const amount = toSafeNumber(lamports, 'Airdrop amount')
  let signature: string
  let latestBlockhash: Awaited<ReturnType<RpcConnection['getLatestBlockhash']>>
  try {
    latestBlockhash = await connection.getLatestBlockhash(finality)
    signature = await connection.requestAirdrop(address, amount)
  } catch (err) {
    throw new NetworkError(
      `Failed to request airdrop to ${address.toBase58()} from ${connection.rpcEndpoint}`,
      err,
    )
  }
  logInfo(logger, `Airdrop requested, transaction ${signature}`)

  let confirmation: Awaited<ReturnType<RpcConnection['confirmTransaction']>>
  try {
    confirmation = await connection.confirmTransaction(
      { signature, ...latestBlockhash },
      finality,
    )
  } catch (err) {
    throw new ConfirmationError(
      `Airdrop transaction ${signature} confirmation could not be observed`,
      signature,
      err,
    )
  }
  if (confirmation.value.err !== null) {
    throw new SubmissionRejectedError(
      `Airdrop transaction ${signature} failed`,
      JSON.stringify(confirmation.value.err),
    )
  }
  return signature
}

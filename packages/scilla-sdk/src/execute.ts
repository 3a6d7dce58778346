import { logDebug } from '@marinade.finance/ts-common'
import {
  ExecutionError,
  executeTx as executeTransaction,
} from '@marinade.finance/web3js-1x'
import {
  SendTransactionError,
  SolanaJSONRPCError,
  Transaction,
  TransactionExpiredBlockheightExceededError,
  TransactionExpiredTimeoutError,
} from '@solana/web3.js'
import bs58 from 'bs58'

import {
  ConfirmationError,
  NetworkError,
  SigningError,
  SubmissionRejectedError,
} from './errors'

import type { LoggerPlaceholder } from '@marinade.finance/ts-common'
import type { Wallet } from '@marinade.finance/web3js-1x'
import type {
  BlockhashWithExpiryBlockHeight,
  Commitment,
  Connection,
  Finality,
  Signer,
  TransactionInstruction,
} from '@solana/web3.js'

export type TransactionSigner = Signer | Wallet

export type ExecuteTxParams = {
  connection: Connection
  instructions: TransactionInstruction[]
  feePayer: Wallet
  signers?: TransactionSigner[]
  errMessage: string
  logger?: LoggerPlaceholder
  computeUnitLimit?: number
  computeUnitPrice?: number
  simulate?: boolean
  printOnly?: boolean
  confirmOpts?: Finality
  // milliseconds to wait before the confirmation is queried
  confirmWaitTime?: number
  skipPreflight?: boolean
}

export type ExecuteTxResult =
  | { kind: 'Confirmed'; signature: string }
  | { kind: 'Simulated' }
  | { kind: 'PrintOnly' }

const DEFAULT_FINALITY: Finality = 'confirmed'

const SIGNING_FAILURE =
  /unknown signer|signature verification failed|missing signature/i
const TRANSPORT_FAILURE =
  /fetch failed|ECONNREFUSED|ECONNRESET|ENOTFOUND|ETIMEDOUT|EAI_AGAIN|socket hang up/i

/**
 * Assembles the transaction paid by the fee payer and hands it over to the
 * executor of `@marinade.finance/web3js-1x`, which signs, prints, simulates
 * or sends it and waits for the confirmation. Nothing is retried.
 * Failures come back as the typed errors of this package.
 */
export async function executeTx({
  connection,
  instructions,
  feePayer,
  signers = [],
  errMessage,
  logger,
  computeUnitLimit,
  computeUnitPrice,
  simulate = false,
  printOnly = false,
  confirmOpts = DEFAULT_FINALITY,
  confirmWaitTime = 0,
  skipPreflight = false,
}: ExecuteTxParams): Promise<ExecuteTxResult> {
  const latestBlockhash = await fetchLatestBlockhash(connection, confirmOpts)
  const transaction = new Transaction({
    feePayer: feePayer.publicKey,
    blockhash: latestBlockhash.blockhash,
    lastValidBlockHeight: latestBlockhash.lastValidBlockHeight,
  })
  transaction.add(...instructions)

  try {
    await executeTransaction({
      connection,
      transaction,
      errMessage,
      signers: [feePayer, ...signers],
      logger,
      computeUnitLimit,
      computeUnitPrice,
      simulate,
      printOnly,
      confirmOpts,
      confirmWaitTime,
      sendOpts: { skipPreflight },
    })
  } catch (err) {
    if (err instanceof ExecutionError) {
      logDebug(logger, err.messageWithTransactionError())
    }
    throw toTypedError(errMessage, connection, err)
  }

  if (printOnly) {
    return { kind: 'PrintOnly' }
  }
  if (simulate) {
    return { kind: 'Simulated' }
  }
  const feePayerSignature = transaction.signature
  if (feePayerSignature === null) {
    throw new SigningError(
      `${errMessage}: transaction is missing the fee payer signature`,
      feePayer.publicKey,
    )
  }
  return { kind: 'Confirmed', signature: bs58.encode(feePayerSignature) }
}

async function fetchLatestBlockhash(
  connection: Connection,
  commitment: Commitment,
): Promise<BlockhashWithExpiryBlockHeight> {
  try {
    return await connection.getLatestBlockhash(commitment)
  } catch (err) {
    throw new NetworkError(
      `Failed to fetch latest blockhash from ${connection.rpcEndpoint}`,
      err,
    )
  }
}

/**
 * The error itself followed by its causes, outermost first.
 */
function causeChain(err: unknown): unknown[] {
  const chain: unknown[] = []
  let current: unknown = err
  while (current !== undefined && !chain.includes(current)) {
    chain.push(current)
    current = current instanceof Error ? current.cause : undefined
  }
  return chain
}

/**
 * A refusal of the node keeps its reason and logs verbatim. Expiry of the
 * blockhash means the outcome is unknown. A failure no node ever answered
 * is a network error.
 */
export function toTypedError(
  errMessage: string,
  connection: Pick<Connection, 'rpcEndpoint'>,
  err: unknown,
): SubmissionRejectedError | ConfirmationError | NetworkError | SigningError {
  const chain = causeChain(err)
  for (const cause of chain) {
    if (cause instanceof SendTransactionError) {
      return new SubmissionRejectedError(errMessage, cause.message, cause.logs ?? [], err)
    }
    if (cause instanceof SolanaJSONRPCError) {
      return new SubmissionRejectedError(errMessage, cause.message, [], err)
    }
    if (
      cause instanceof TransactionExpiredBlockheightExceededError ||
      cause instanceof TransactionExpiredTimeoutError
    ) {
      return new ConfirmationError(
        `${errMessage}: transaction ${cause.signature} was sent but its confirmation ` +
          'could not be observed, check its status before sending it again',
        cause.signature,
        cause,
      )
    }
  }
  const messages = chain.map(cause =>
    cause instanceof Error ? cause.message : String(cause),
  )
  if (messages.some(message => SIGNING_FAILURE.test(message))) {
    return new SigningError(errMessage, undefined, chain.at(-1))
  }
  if (messages.some(message => TRANSPORT_FAILURE.test(message))) {
    return new NetworkError(
      `${errMessage}: failed to reach ${connection.rpcEndpoint}`,
      chain.at(-1),
    )
  }
  return new SubmissionRejectedError(errMessage, messages.at(-1) ?? errMessage, [], err)
}

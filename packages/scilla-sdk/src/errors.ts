import type { PublicKey } from '@solana/web3.js'

/**
 * Base of every failure the SDK reports. The `code` is stable and can be
 * matched on by callers, the message carries the concrete values involved.
 */
export abstract class ScillaError extends Error {
  readonly code: string

  constructor(message: string, code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = this.constructor.name
    this.code = code
  }
}

export class InvalidAmountError extends ScillaError {
  constructor(
    message: string,
    readonly amount?: number,
  ) {
    super(message, 'INVALID_AMOUNT')
  }
}

export class InvalidArgumentError extends ScillaError {
  constructor(
    message: string,
    readonly argument: string,
  ) {
    super(message, 'INVALID_ARGUMENT')
  }
}

/**
 * Transport level failure talking to the RPC node.
 * The whole operation may be run again by the caller.
 */
export class NetworkError extends ScillaError {
  constructor(message: string, cause?: unknown, code = 'NETWORK_ERROR') {
    super(withCause(message, cause), code, cause)
  }
}

/**
 * The transaction was sent but its confirmation could not be observed,
 * its outcome is unknown and has to be checked by the signature.
 */
export class ConfirmationError extends NetworkError {
  constructor(
    message: string,
    readonly signature: string,
    cause?: unknown,
  ) {
    super(message, cause, 'CONFIRMATION_FAILED')
  }
}

export class AccountNotFoundError extends ScillaError {
  constructor(readonly address: PublicKey) {
    super(`Account ${address.toBase58()} does not exist on chain`, 'NOT_FOUND')
  }
}

export class OwnershipError extends ScillaError {
  constructor(
    readonly address: PublicKey,
    readonly owner: PublicKey,
    readonly expectedOwner: PublicKey,
  ) {
    super(
      `Account ${address.toBase58()} is owned by ${owner.toBase58()}, ` +
        `expected owner program ${expectedOwner.toBase58()}`,
      'OWNERSHIP_ERROR',
    )
  }
}

export class DecodeError extends ScillaError {
  constructor(
    message: string,
    readonly address?: PublicKey,
  ) {
    super(
      address === undefined
        ? message
        : `Failed to decode account ${address.toBase58()}: ${message}`,
      'DECODE_ERROR',
    )
  }
}

/**
 * The node refused the transaction (preflight, RPC error or failed execution).
 * `nodeReason` is the node's own message, not reinterpreted.
 */
export class SubmissionRejectedError extends ScillaError {
  constructor(
    message: string,
    readonly nodeReason: string,
    readonly logs: string[] = [],
    cause?: unknown,
  ) {
    super(`${message}: ${nodeReason}`, 'SUBMISSION_REJECTED', cause)
  }

  messageWithLogs(): string {
    if (this.logs.length === 0) {
      return this.message
    }
    return `${this.message}\n  ${this.logs.join('\n  ')}`
  }
}

export class SigningError extends ScillaError {
  constructor(
    message: string,
    readonly signer?: PublicKey,
    cause?: unknown,
  ) {
    super(withCause(message, cause), 'SIGNING_ERROR', cause)
  }
}

function withCause(message: string, cause: unknown): string {
  if (cause instanceof Error) {
    return `${message}: ${cause.message}`
  }
  return message
}

import { logDebug } from '@marinade.finance/ts-common'
import BN from 'bn.js'

import { ValidationDeniedError } from '../denyReason'
import { executeTx } from '../execute'
import { buildActionInstructions } from '../instructions'
import { assertNever } from '../utils'
import {
  validateCreate,
  validateDeactivate,
  validateDelegate,
  validateMerge,
  validateSplit,
  validateTransfer,
  validateWithdraw,
} from '../validation'
import { fetchBalance } from '../web3.js/account'
import { fetchClusterClock, fetchCurrentEpoch } from '../web3.js/cluster'
import { fetchStakeAccount, getRentExemptStake } from '../web3.js/stakeAccount'

import type { ExecuteTxResult } from '../execute'
import type { ApprovedAction, Validation } from '../validation'
import type { LoggerPlaceholder } from '@marinade.finance/ts-common'
import type { Wallet } from '@marinade.finance/web3js-1x'
import type {
  Commitment,
  Connection,
  Finality,
  Keypair,
  PublicKey,
} from '@solana/web3.js'

export type StakeOperation =
  | {
      kind: 'Create'
      newStakeAccount: Keypair
      amount: BN
      staker?: PublicKey
      withdrawer?: PublicKey
      voteAccount?: PublicKey
    }
  | { kind: 'Delegate'; stakeAccount: PublicKey; voteAccount: PublicKey }
  | { kind: 'Deactivate'; stakeAccount: PublicKey }
  | {
      kind: 'Withdraw'
      stakeAccount: PublicKey
      recipient: PublicKey
      amount: BN
    }
  | { kind: 'Merge'; stakeAccount: PublicKey; sourceStakeAccount: PublicKey }
  | {
      kind: 'Split'
      stakeAccount: PublicKey
      newStakeAccount: Keypair
      amount: BN
    }
  | { kind: 'Transfer'; recipient: PublicKey; amount: BN }

export type ExecutionOptions = {
  computeUnitPrice?: number
  computeUnitLimit?: number
  simulate?: boolean
  printOnly?: boolean
  confirmationFinality?: Finality
  // milliseconds to wait before the confirmation is queried
  confirmWaitTime?: number
  skipPreflight?: boolean
}

export type OperationContext = {
  connection: Connection
  wallet: Wallet
  logger?: LoggerPlaceholder
  commitment?: Commitment
} & ExecutionOptions

export type ApprovedOperation = {
  action: ApprovedAction
  // keypairs of accounts created by the transaction
  signers: Keypair[]
}

export type OperationOutcome = ApprovedOperation & { result: ExecuteTxResult }

function unwrap<T extends ApprovedAction>(validation: Validation<T>): T {
  if (!validation.approved) {
    throw new ValidationDeniedError(validation.reason)
  }
  return validation.action
}

/**
 * Reads the current on-chain state the operation depends on and checks
 * the operation is permitted. Throws {@link ValidationDeniedError} when not.
 */
export async function approveStakeOperation(
  context: OperationContext,
  operation: StakeOperation,
): Promise<ApprovedOperation> {
  const { connection, wallet, commitment } = context
  const caller = wallet.publicKey
  switch (operation.kind) {
    case 'Create': {
      const rentExemptReserve = new BN(await getRentExemptStake(connection))
      const walletLamports = await fetchBalance({
        connection,
        address: caller,
        commitment,
      })
      const action = unwrap(
        validateCreate({
          caller,
          walletLamports,
          rentExemptReserve,
          newStakeAccount: operation.newStakeAccount.publicKey,
          amount: operation.amount,
          staker: operation.staker,
          withdrawer: operation.withdrawer,
          voteAccount: operation.voteAccount,
        }),
      )
      return { action, signers: [operation.newStakeAccount] }
    }
    case 'Delegate': {
      const account = await fetchStakeAccount({
        connection,
        address: operation.stakeAccount,
        commitment,
      })
      const currentEpoch = new BN(await fetchCurrentEpoch(connection, commitment))
      const action = unwrap(
        validateDelegate({
          account,
          caller,
          currentEpoch,
          voteAccount: operation.voteAccount,
        }),
      )
      return { action, signers: [] }
    }
    case 'Deactivate': {
      const account = await fetchStakeAccount({
        connection,
        address: operation.stakeAccount,
        commitment,
      })
      const action = unwrap(validateDeactivate({ account, caller }))
      return { action, signers: [] }
    }
    case 'Withdraw': {
      const account = await fetchStakeAccount({
        connection,
        address: operation.stakeAccount,
        commitment,
      })
      const clock = await fetchClusterClock(connection, commitment)
      const action = unwrap(
        validateWithdraw({
          account,
          caller,
          currentEpoch: clock.epoch,
          currentUnixTimestamp: clock.unixTimestamp,
          recipient: operation.recipient,
          amount: operation.amount,
        }),
      )
      return { action, signers: [] }
    }
    case 'Merge': {
      const destination = await fetchStakeAccount({
        connection,
        address: operation.stakeAccount,
        commitment,
      })
      const source = await fetchStakeAccount({
        connection,
        address: operation.sourceStakeAccount,
        commitment,
      })
      const clock = await fetchClusterClock(connection, commitment)
      const action = unwrap(
        validateMerge({
          destination,
          source,
          caller,
          currentEpoch: clock.epoch,
          currentUnixTimestamp: clock.unixTimestamp,
        }),
      )
      return { action, signers: [] }
    }
    case 'Split': {
      const account = await fetchStakeAccount({
        connection,
        address: operation.stakeAccount,
        commitment,
      })
      const rentExemptReserve = new BN(await getRentExemptStake(connection))
      const action = unwrap(
        validateSplit({
          account,
          caller,
          newStakeAccount: operation.newStakeAccount.publicKey,
          amount: operation.amount,
          rentExemptReserve,
        }),
      )
      return { action, signers: [operation.newStakeAccount] }
    }
    case 'Transfer': {
      const walletLamports = await fetchBalance({
        connection,
        address: caller,
        commitment,
      })
      const action = unwrap(
        validateTransfer({
          caller,
          walletLamports,
          recipient: operation.recipient,
          amount: operation.amount,
        }),
      )
      return { action, signers: [] }
    }
    default:
      return assertNever(operation, 'stake operation')
  }
}

function failureMessage(action: ApprovedAction): string {
  switch (action.kind) {
    case 'Create':
      return `Failed to create stake account ${action.newStakeAccount.toBase58()}`
    case 'Delegate':
      return (
        `Failed to delegate stake account ${action.stakeAccount.toBase58()} ` +
        `to vote account ${action.voteAccount.toBase58()}`
      )
    case 'Deactivate':
      return `Failed to deactivate stake account ${action.stakeAccount.toBase58()}`
    case 'Withdraw':
      return `Failed to withdraw from stake account ${action.stakeAccount.toBase58()}`
    case 'Merge':
      return (
        `Failed to merge stake account ${action.source.toBase58()} ` +
        `into ${action.destination.toBase58()}`
      )
    case 'Split':
      return `Failed to split stake account ${action.stakeAccount.toBase58()}`
    case 'Transfer':
      return `Failed to transfer to ${action.recipient.toBase58()}`
    default:
      return assertNever(action, 'approved action')
  }
}

/**
 * The single path every state changing command takes:
 * read the accounts, validate, build the instructions, submit.
 * A denied operation never reaches the builder nor the network submit.
 */
export async function executeStakeOperation(
  context: OperationContext,
  operation: StakeOperation,
): Promise<OperationOutcome> {
  const approved = await approveStakeOperation(context, operation)
  logDebug(context.logger, `Operation ${operation.kind} approved`)

  const { instructions } = buildActionInstructions(approved.action)
  const result = await executeTx({
    connection: context.connection,
    instructions,
    feePayer: context.wallet,
    signers: approved.signers,
    errMessage: failureMessage(approved.action),
    logger: context.logger,
    computeUnitLimit: context.computeUnitLimit,
    computeUnitPrice: context.computeUnitPrice,
    simulate: context.simulate,
    printOnly: context.printOnly,
    confirmOpts: context.confirmationFinality,
    confirmWaitTime: context.confirmWaitTime,
    skipPreflight: context.skipPreflight,
  })
  return { ...approved, result }
}

import { formatToSol } from './amount'
import { ScillaError } from './errors'
import { assertNever } from './utils'

import type { StakeStateKind } from './web3.js/stakeAccount'
import type { PublicKey } from '@solana/web3.js'
import type BN from 'bn.js'

export type OperationKind =
  | 'Create'
  | 'Delegate'
  | 'Deactivate'
  | 'Withdraw'
  | 'Merge'
  | 'Split'
  | 'Transfer'

export type AuthorityRole = 'staker' | 'withdrawer'

/**
 * How the Stake program treats an account in a merge:
 * never delegated or fully cooled down, delegated in this very epoch,
 * delegated and warmed up, or anything in between (not mergeable).
 */
export type MergeKind = 'Inactive' | 'ActivationEpoch' | 'FullyActive' | 'Transient'

export type DenyReason =
  | {
      kind: 'WrongState'
      operation: OperationKind
      account: PublicKey
      state: StakeStateKind
    }
  | { kind: 'AlreadyDeactivating'; account: PublicKey; deactivationEpoch: BN }
  | {
      kind: 'NotAuthorized'
      account: PublicKey
      role: AuthorityRole
      authorized: PublicKey
      caller: PublicKey
    }
  | { kind: 'StillActive'; account: PublicKey }
  | {
      kind: 'CoolingDown'
      account: PublicKey
      currentEpoch: BN
      deactivationEpoch: BN
      epochsRemaining: BN
    }
  | { kind: 'Uninitialized'; account: PublicKey }
  | { kind: 'RewardsPool'; account: PublicKey }
  | {
      kind: 'LockupInForce'
      account: PublicKey
      lockupEpoch: BN
      lockupUnixTimestamp: BN
      currentEpoch: BN
      currentUnixTimestamp: BN
      custodian: PublicKey
    }
  | {
      kind: 'InsufficientBalance'
      account: PublicKey
      available: BN
      requested: BN
    }
  | { kind: 'AlreadyDelegated'; account: PublicKey; voter: PublicKey }
  | { kind: 'SameAccount'; account: PublicKey }
  | {
      kind: 'AuthorityMismatch'
      role: AuthorityRole
      destination: PublicKey
      destinationAuthority: PublicKey
      source: PublicKey
      sourceAuthority: PublicKey
    }
  | { kind: 'LockupMismatch'; destination: PublicKey; source: PublicKey }
  | {
      kind: 'VoterMismatch'
      destination: PublicKey
      destinationVoter: PublicKey
      source: PublicKey
      sourceVoter: PublicKey
    }
  | {
      kind: 'MergeIncompatible'
      destination: PublicKey
      destinationKind: MergeKind
      source: PublicKey
      sourceKind: MergeKind
    }
  | {
      kind: 'RemainderBelowRentExempt'
      account: PublicKey
      remainder: BN
      rentExemptReserve: BN
    }
  | { kind: 'BelowRentExempt'; required: BN; requested: BN }
  | { kind: 'SelfTransfer'; account: PublicKey }

export function formatDenyReason(reason: DenyReason): string {
  switch (reason.kind) {
    case 'WrongState':
      return (
        `Stake account ${reason.account.toBase58()} is in state ${reason.state}, ` +
        `operation ${reason.operation} is not permitted in this state`
      )
    case 'AlreadyDeactivating':
      return (
        `Stake account ${reason.account.toBase58()} is already deactivating ` +
        `at epoch ${reason.deactivationEpoch.toString()}`
      )
    case 'NotAuthorized':
      return (
        `Wallet ${reason.caller.toBase58()} is not the authorized ${reason.role} ` +
        `of stake account ${reason.account.toBase58()}. ` +
        `Authorized ${reason.role}: ${reason.authorized.toBase58()}`
      )
    case 'StillActive':
      return (
        `Stake account ${reason.account.toBase58()} is still active. ` +
        'Deactivate it first and wait for the cooldown period.'
      )
    case 'CoolingDown':
      return (
        `Stake account ${reason.account.toBase58()} is still cooling down. ` +
        `Current epoch: ${reason.currentEpoch.toString()}, ` +
        `deactivation epoch: ${reason.deactivationEpoch.toString()}, ` +
        `epochs remaining: ${reason.epochsRemaining.toString()}`
      )
    case 'Uninitialized':
      return `Stake account ${reason.account.toBase58()} is uninitialized`
    case 'RewardsPool':
      return `Cannot withdraw from rewards pool account ${reason.account.toBase58()}`
    case 'LockupInForce':
      return (
        `Stake account ${reason.account.toBase58()} is locked up until epoch ` +
        `${reason.lockupEpoch.toString()} and unix timestamp ${reason.lockupUnixTimestamp.toString()} ` +
        `(current epoch: ${reason.currentEpoch.toString()}, ` +
        `unix timestamp: ${reason.currentUnixTimestamp.toString()}), ` +
        `only custodian ${reason.custodian.toBase58()} may withdraw`
      )
    case 'InsufficientBalance':
      return (
        `Insufficient balance of ${reason.account.toBase58()}. ` +
        `Have ${formatToSol(reason.available)} SOL, ` +
        `requested ${formatToSol(reason.requested)} SOL`
      )
    case 'AlreadyDelegated':
      return (
        `Stake account ${reason.account.toBase58()} is already delegated ` +
        `to vote account ${reason.voter.toBase58()}, deactivate it first`
      )
    case 'SameAccount':
      return `Source and destination are the same account ${reason.account.toBase58()}`
    case 'AuthorityMismatch':
      return (
        `Stake accounts have different ${reason.role} authorities: ` +
        `${reason.destination.toBase58()} has ${reason.destinationAuthority.toBase58()}, ` +
        `${reason.source.toBase58()} has ${reason.sourceAuthority.toBase58()}`
      )
    case 'LockupMismatch':
      return (
        `Stake accounts ${reason.destination.toBase58()} and ` +
        `${reason.source.toBase58()} have different lockups in force`
      )
    case 'VoterMismatch':
      return (
        'Stake accounts are delegated to different vote accounts: ' +
        `${reason.destination.toBase58()} to ${reason.destinationVoter.toBase58()}, ` +
        `${reason.source.toBase58()} to ${reason.sourceVoter.toBase58()}`
      )
    case 'MergeIncompatible':
      return (
        `Stake account ${reason.source.toBase58()} (${reason.sourceKind}) cannot be ` +
        `merged into ${reason.destination.toBase58()} (${reason.destinationKind})`
      )
    case 'RemainderBelowRentExempt':
      return (
        `Splitting would leave ${formatToSol(reason.remainder)} SOL ` +
        `in stake account ${reason.account.toBase58()}, below its rent exempt reserve ` +
        `${formatToSol(reason.rentExemptReserve)} SOL`
      )
    case 'BelowRentExempt':
      return (
        `Amount ${formatToSol(reason.requested)} SOL is lower than the rent exempt ` +
        `minimum of a stake account ${formatToSol(reason.required)} SOL`
      )
    case 'SelfTransfer':
      return `Recipient ${reason.account.toBase58()} is the sending wallet itself`
    default:
      return assertNever(reason, 'deny reason')
  }
}

/**
 * The local pre-check refused the operation. Nothing was built or sent.
 */
export class ValidationDeniedError extends ScillaError {
  constructor(readonly reason: DenyReason) {
    super(formatDenyReason(reason), 'VALIDATION_DENIED')
  }
}

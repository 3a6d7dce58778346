import {
  getStakeMeta,
  isActiveStake,
  isCoolingDown,
} from './web3.js/stakeAccount'
import { assertNever } from './utils'

import type { AuthorityRole, DenyReason, MergeKind } from './denyReason'
import type {
  StakeAccount,
  StakeLockup,
  StakeMeta,
  StakeState,
} from './web3.js/stakeAccount'
import type { PublicKey } from '@solana/web3.js'
import type BN from 'bn.js'

export type DeactivateAction = {
  kind: 'Deactivate'
  stakeAccount: PublicKey
  authority: PublicKey
}

export type WithdrawAction = {
  kind: 'Withdraw'
  stakeAccount: PublicKey
  authority: PublicKey
  recipient: PublicKey
  lamports: BN
  custodian?: PublicKey
}

export type DelegateAction = {
  kind: 'Delegate'
  stakeAccount: PublicKey
  authority: PublicKey
  voteAccount: PublicKey
}

export type MergeAction = {
  kind: 'Merge'
  destination: PublicKey
  source: PublicKey
  authority: PublicKey
}

export type SplitAction = {
  kind: 'Split'
  stakeAccount: PublicKey
  newStakeAccount: PublicKey
  authority: PublicKey
  lamports: BN
  rentExemptReserve: BN
}

export type CreateAction = {
  kind: 'Create'
  newStakeAccount: PublicKey
  funder: PublicKey
  staker: PublicKey
  withdrawer: PublicKey
  lamports: BN
  voteAccount?: PublicKey
}

export type TransferAction = {
  kind: 'Transfer'
  from: PublicKey
  recipient: PublicKey
  lamports: BN
}

export type ApprovedAction =
  | CreateAction
  | DelegateAction
  | DeactivateAction
  | WithdrawAction
  | MergeAction
  | SplitAction
  | TransferAction

export type Approved<T extends ApprovedAction> = { approved: true; action: T }
export type Denied = { approved: false; reason: DenyReason }
export type Validation<T extends ApprovedAction> = Approved<T> | Denied

function approve<T extends ApprovedAction>(action: T): Approved<T> {
  return { approved: true, action }
}

function deny(reason: DenyReason): Denied {
  return { approved: false, reason }
}

function checkAuthority(
  account: PublicKey,
  meta: StakeMeta,
  role: AuthorityRole,
  caller: PublicKey,
): DenyReason | undefined {
  const authorized =
    role === 'staker' ? meta.authorized.staker : meta.authorized.withdrawer
  if (authorized.equals(caller)) {
    return undefined
  }
  return { kind: 'NotAuthorized', account, role, authorized, caller }
}

/**
 * The lockup holds until both its unix timestamp and its epoch have passed.
 */
function isLockupInForce(
  lockup: StakeLockup,
  currentEpoch: BN,
  currentUnixTimestamp: BN,
): boolean {
  return (
    lockup.unixTimestamp.gt(currentUnixTimestamp) ||
    lockup.epoch.gt(currentEpoch)
  )
}

export function validateDeactivate({
  account,
  caller,
}: {
  account: StakeAccount
  caller: PublicKey
}): Validation<DeactivateAction> {
  const { address, state } = account
  switch (state.kind) {
    case 'Delegated': {
      if (!isActiveStake(state.stake)) {
        return deny({
          kind: 'AlreadyDeactivating',
          account: address,
          deactivationEpoch: state.stake.deactivationEpoch,
        })
      }
      const notAuthorized = checkAuthority(address, state.meta, 'staker', caller)
      if (notAuthorized) {
        return deny(notAuthorized)
      }
      return approve({
        kind: 'Deactivate',
        stakeAccount: address,
        authority: caller,
      })
    }
    case 'Initialized':
    case 'Uninitialized':
    case 'RewardsPool':
      return deny({
        kind: 'WrongState',
        operation: 'Deactivate',
        account: address,
        state: state.kind,
      })
  }
}

export function validateWithdraw({
  account,
  caller,
  currentEpoch,
  currentUnixTimestamp,
  recipient,
  amount,
}: {
  account: StakeAccount
  caller: PublicKey
  currentEpoch: BN
  currentUnixTimestamp: BN
  recipient: PublicKey
  amount: BN
}): Validation<WithdrawAction> {
  const { address, state } = account
  let meta: StakeMeta
  switch (state.kind) {
    case 'Uninitialized':
      return deny({ kind: 'Uninitialized', account: address })
    case 'RewardsPool':
      return deny({ kind: 'RewardsPool', account: address })
    case 'Initialized': {
      const notAuthorized = checkAuthority(
        address,
        state.meta,
        'withdrawer',
        caller,
      )
      if (notAuthorized) {
        return deny(notAuthorized)
      }
      meta = state.meta
      break
    }
    case 'Delegated': {
      const notAuthorized = checkAuthority(
        address,
        state.meta,
        'withdrawer',
        caller,
      )
      if (notAuthorized) {
        return deny(notAuthorized)
      }
      if (isActiveStake(state.stake)) {
        return deny({ kind: 'StillActive', account: address })
      }
      if (isCoolingDown(state.stake, currentEpoch)) {
        return deny({
          kind: 'CoolingDown',
          account: address,
          currentEpoch,
          deactivationEpoch: state.stake.deactivationEpoch,
          epochsRemaining: state.stake.deactivationEpoch.sub(currentEpoch),
        })
      }
      meta = state.meta
      break
    }
    default:
      return assertNever(state, 'stake state')
  }

  let custodian: PublicKey | undefined
  if (isLockupInForce(meta.lockup, currentEpoch, currentUnixTimestamp)) {
    if (!meta.lockup.custodian.equals(caller)) {
      return deny({
        kind: 'LockupInForce',
        account: address,
        lockupEpoch: meta.lockup.epoch,
        lockupUnixTimestamp: meta.lockup.unixTimestamp,
        currentEpoch,
        currentUnixTimestamp,
        custodian: meta.lockup.custodian,
      })
    }
    custodian = caller
  }

  if (amount.gt(account.lamports)) {
    return deny({
      kind: 'InsufficientBalance',
      account: address,
      available: account.lamports,
      requested: amount,
    })
  }

  return approve({
    kind: 'Withdraw',
    stakeAccount: address,
    authority: caller,
    recipient,
    lamports: amount,
    custodian,
  })
}

/**
 * Delegating an initialized or fully deactivated account is allowed,
 * as is re-delegating a cooling down account to the same vote account
 * (the Stake program then rescinds the deactivation).
 */
export function validateDelegate({
  account,
  caller,
  currentEpoch,
  voteAccount,
}: {
  account: StakeAccount
  caller: PublicKey
  currentEpoch: BN
  voteAccount: PublicKey
}): Validation<DelegateAction> {
  const { address, state } = account
  if (state.kind === 'Uninitialized' || state.kind === 'RewardsPool') {
    return deny({
      kind: 'WrongState',
      operation: 'Delegate',
      account: address,
      state: state.kind,
    })
  }
  const notAuthorized = checkAuthority(address, state.meta, 'staker', caller)
  if (notAuthorized) {
    return deny(notAuthorized)
  }
  if (state.kind === 'Delegated') {
    const { stake } = state
    if (isActiveStake(stake)) {
      return deny({
        kind: 'AlreadyDelegated',
        account: address,
        voter: stake.voter,
      })
    }
    if (isCoolingDown(stake, currentEpoch) && !stake.voter.equals(voteAccount)) {
      return deny({
        kind: 'CoolingDown',
        account: address,
        currentEpoch,
        deactivationEpoch: stake.deactivationEpoch,
        epochsRemaining: stake.deactivationEpoch.sub(currentEpoch),
      })
    }
  }
  return approve({
    kind: 'Delegate',
    stakeAccount: address,
    authority: caller,
    voteAccount,
  })
}

export function mergeKind(
  state: StakeState,
  currentEpoch: BN,
): MergeKind | undefined {
  switch (state.kind) {
    case 'Initialized':
      return 'Inactive'
    case 'Delegated': {
      const { stake } = state
      if (stake.activationEpoch.eq(stake.deactivationEpoch)) {
        // deactivated in its activation epoch, never took effect
        return 'Inactive'
      }
      if (!isActiveStake(stake)) {
        return isCoolingDown(stake, currentEpoch) ? 'Transient' : 'Inactive'
      }
      if (stake.activationEpoch.eq(currentEpoch)) {
        return 'ActivationEpoch'
      }
      return stake.activationEpoch.lt(currentEpoch) ? 'FullyActive' : 'Transient'
    }
    case 'Uninitialized':
    case 'RewardsPool':
      return undefined
  }
}

// [destination, source] pairs the Stake program accepts
const MERGEABLE_KINDS: ReadonlyArray<readonly [MergeKind, MergeKind]> = [
  ['Inactive', 'Inactive'],
  ['Inactive', 'ActivationEpoch'],
  ['ActivationEpoch', 'Inactive'],
  ['ActivationEpoch', 'ActivationEpoch'],
  ['FullyActive', 'FullyActive'],
]

function lockupsCanMerge(
  destination: StakeLockup,
  source: StakeLockup,
  currentEpoch: BN,
  currentUnixTimestamp: BN,
): boolean {
  if (
    !isLockupInForce(destination, currentEpoch, currentUnixTimestamp) &&
    !isLockupInForce(source, currentEpoch, currentUnixTimestamp)
  ) {
    return true
  }
  return (
    destination.epoch.eq(source.epoch) &&
    destination.unixTimestamp.eq(source.unixTimestamp) &&
    destination.custodian.equals(source.custodian)
  )
}

/**
 * Merging `source` into `destination`, the source account is drained and closed.
 */
export function validateMerge({
  destination,
  source,
  caller,
  currentEpoch,
  currentUnixTimestamp,
}: {
  destination: StakeAccount
  source: StakeAccount
  caller: PublicKey
  currentEpoch: BN
  currentUnixTimestamp: BN
}): Validation<MergeAction> {
  if (destination.address.equals(source.address)) {
    return deny({ kind: 'SameAccount', account: destination.address })
  }

  const destinationMeta = getStakeMeta(destination.state)
  const destinationKind = mergeKind(destination.state, currentEpoch)
  if (destinationMeta === undefined || destinationKind === undefined) {
    return deny({
      kind: 'WrongState',
      operation: 'Merge',
      account: destination.address,
      state: destination.state.kind,
    })
  }
  const sourceMeta = getStakeMeta(source.state)
  const sourceKind = mergeKind(source.state, currentEpoch)
  if (sourceMeta === undefined || sourceKind === undefined) {
    return deny({
      kind: 'WrongState',
      operation: 'Merge',
      account: source.address,
      state: source.state.kind,
    })
  }

  const notAuthorized =
    checkAuthority(destination.address, destinationMeta, 'staker', caller) ??
    checkAuthority(source.address, sourceMeta, 'staker', caller)
  if (notAuthorized) {
    return deny(notAuthorized)
  }

  const { authorized: destinationAuthorized } = destinationMeta
  const { authorized: sourceAuthorized } = sourceMeta
  if (!destinationAuthorized.withdrawer.equals(sourceAuthorized.withdrawer)) {
    return deny({
      kind: 'AuthorityMismatch',
      role: 'withdrawer',
      destination: destination.address,
      destinationAuthority: destinationAuthorized.withdrawer,
      source: source.address,
      sourceAuthority: sourceAuthorized.withdrawer,
    })
  }

  if (
    !lockupsCanMerge(
      destinationMeta.lockup,
      sourceMeta.lockup,
      currentEpoch,
      currentUnixTimestamp,
    )
  ) {
    return deny({
      kind: 'LockupMismatch',
      destination: destination.address,
      source: source.address,
    })
  }

  const compatible = MERGEABLE_KINDS.some(
    ([d, s]) => d === destinationKind && s === sourceKind,
  )
  if (!compatible) {
    return deny({
      kind: 'MergeIncompatible',
      destination: destination.address,
      destinationKind,
      source: source.address,
      sourceKind,
    })
  }

  if (
    destination.state.kind === 'Delegated' &&
    source.state.kind === 'Delegated' &&
    destinationKind !== 'Inactive' &&
    sourceKind !== 'Inactive' &&
    !destination.state.stake.voter.equals(source.state.stake.voter)
  ) {
    return deny({
      kind: 'VoterMismatch',
      destination: destination.address,
      destinationVoter: destination.state.stake.voter,
      source: source.address,
      sourceVoter: source.state.stake.voter,
    })
  }

  return approve({
    kind: 'Merge',
    destination: destination.address,
    source: source.address,
    authority: caller,
  })
}

export function validateSplit({
  account,
  caller,
  newStakeAccount,
  amount,
  rentExemptReserve,
}: {
  account: StakeAccount
  caller: PublicKey
  newStakeAccount: PublicKey
  amount: BN
  rentExemptReserve: BN
}): Validation<SplitAction> {
  const { address, state } = account
  if (state.kind === 'Uninitialized' || state.kind === 'RewardsPool') {
    return deny({
      kind: 'WrongState',
      operation: 'Split',
      account: address,
      state: state.kind,
    })
  }
  if (newStakeAccount.equals(address)) {
    return deny({ kind: 'SameAccount', account: address })
  }
  const notAuthorized = checkAuthority(address, state.meta, 'staker', caller)
  if (notAuthorized) {
    return deny(notAuthorized)
  }
  if (amount.gt(account.lamports)) {
    return deny({
      kind: 'InsufficientBalance',
      account: address,
      available: account.lamports,
      requested: amount,
    })
  }
  const remainder = account.lamports.sub(amount)
  if (!remainder.isZero() && remainder.lt(state.meta.rentExemptReserve)) {
    return deny({
      kind: 'RemainderBelowRentExempt',
      account: address,
      remainder,
      rentExemptReserve: state.meta.rentExemptReserve,
    })
  }
  return approve({
    kind: 'Split',
    stakeAccount: address,
    newStakeAccount,
    authority: caller,
    lamports: amount,
    rentExemptReserve,
  })
}

export function validateCreate({
  caller,
  walletLamports,
  rentExemptReserve,
  newStakeAccount,
  amount,
  staker = caller,
  withdrawer = caller,
  voteAccount,
}: {
  caller: PublicKey
  walletLamports: BN
  rentExemptReserve: BN
  newStakeAccount: PublicKey
  amount: BN
  staker?: PublicKey
  withdrawer?: PublicKey
  voteAccount?: PublicKey
}): Validation<CreateAction> {
  if (amount.lt(rentExemptReserve)) {
    return deny({
      kind: 'BelowRentExempt',
      required: rentExemptReserve,
      requested: amount,
    })
  }
  if (amount.gt(walletLamports)) {
    return deny({
      kind: 'InsufficientBalance',
      account: caller,
      available: walletLamports,
      requested: amount,
    })
  }
  if (voteAccount !== undefined && !staker.equals(caller)) {
    // the delegate instruction in the same transaction is signed by the staker
    return deny({
      kind: 'NotAuthorized',
      account: newStakeAccount,
      role: 'staker',
      authorized: staker,
      caller,
    })
  }
  return approve({
    kind: 'Create',
    newStakeAccount,
    funder: caller,
    staker,
    withdrawer,
    lamports: amount,
    voteAccount,
  })
}

export function validateTransfer({
  caller,
  walletLamports,
  recipient,
  amount,
}: {
  caller: PublicKey
  walletLamports: BN
  recipient: PublicKey
  amount: BN
}): Validation<TransferAction> {
  if (recipient.equals(caller)) {
    return deny({ kind: 'SelfTransfer', account: caller })
  }
  if (amount.gt(walletLamports)) {
    return deny({
      kind: 'InsufficientBalance',
      account: caller,
      available: walletLamports,
      requested: amount,
    })
  }
  return approve({
    kind: 'Transfer',
    from: caller,
    recipient,
    lamports: amount,
  })
}

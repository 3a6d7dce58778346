import { Keypair, PublicKey } from '@solana/web3.js'
import BN from 'bn.js'

import {
  ValidationDeniedError,
  formatDenyReason,
  mergeKind,
  validateCreate,
  validateDeactivate,
  validateDelegate,
  validateMerge,
  validateSplit,
  validateTransfer,
  validateWithdraw,
} from '../src'
import {
  RENT_EXEMPT_STAKE,
  createDelegation,
  createMeta,
  createStakeAccount,
} from './utils/staking'

import type { DenyReason, Validation, ApprovedAction } from '../src'

function denied<T extends ApprovedAction>(validation: Validation<T>): DenyReason {
  if (validation.approved) {
    throw new Error(`expected denial, got approved ${validation.action.kind}`)
  }
  return validation.reason
}

function approved<T extends ApprovedAction>(validation: Validation<T>): T {
  if (!validation.approved) {
    throw new Error(`expected approval, got ${formatDenyReason(validation.reason)}`)
  }
  return validation.action
}

describe('Stake transition validator', () => {
  const staker = Keypair.generate().publicKey
  const withdrawer = Keypair.generate().publicKey
  const stranger = Keypair.generate().publicKey
  const currentEpoch = new BN(100)
  const currentUnixTimestamp = new BN(1_700_000_000)

  describe('deactivate', () => {
    it('approves the staker of an active delegation', () => {
      const account = createStakeAccount({
        state: {
          kind: 'Delegated',
          meta: createMeta({ staker, withdrawer }),
          stake: createDelegation({}),
        },
      })
      const action = approved(validateDeactivate({ account, caller: staker }))
      expect(action).toEqual({
        kind: 'Deactivate',
        stakeAccount: account.address,
        authority: staker,
      })
    })

    it('reports already deactivating for any caller', () => {
      const account = createStakeAccount({
        state: {
          kind: 'Delegated',
          meta: createMeta({ staker }),
          stake: createDelegation({ deactivationEpoch: 95 }),
        },
      })
      for (const caller of [staker, stranger]) {
        const reason = denied(validateDeactivate({ account, caller }))
        expect(reason.kind).toEqual('AlreadyDeactivating')
        expect(formatDenyReason(reason)).toEqual(
          `Stake account ${account.address.toBase58()} is already deactivating at epoch 95`,
        )
      }
    })

    it('refuses a caller that is not the staker', () => {
      const account = createStakeAccount({
        state: {
          kind: 'Delegated',
          meta: createMeta({ staker, withdrawer }),
          stake: createDelegation({}),
        },
      })
      const reason = denied(validateDeactivate({ account, caller: withdrawer }))
      expect(reason).toEqual({
        kind: 'NotAuthorized',
        account: account.address,
        role: 'staker',
        authorized: staker,
        caller: withdrawer,
      })
    })

    it('refuses accounts that are not delegated', () => {
      const account = createStakeAccount({
        state: { kind: 'Initialized', meta: createMeta({ staker }) },
      })
      expect(denied(validateDeactivate({ account, caller: staker }))).toEqual({
        kind: 'WrongState',
        operation: 'Deactivate',
        account: account.address,
        state: 'Initialized',
      })
    })
  })

  describe('withdraw', () => {
    const recipient = Keypair.generate().publicKey

    it('approves withdrawal from a fully deactivated account', () => {
      const account = createStakeAccount({
        lamports: 6_000_000_000,
        state: {
          kind: 'Delegated',
          meta: createMeta({ staker, withdrawer }),
          stake: createDelegation({ deactivationEpoch: 99 }),
        },
      })
      const action = approved(
        validateWithdraw({
          account,
          caller: withdrawer,
          currentEpoch,
          currentUnixTimestamp,
          recipient,
          amount: new BN(6_000_000_000),
        }),
      )
      expect(action.kind).toEqual('Withdraw')
      expect(action.recipient).toEqual(recipient)
      expect(action.lamports.toString()).toEqual('6000000000')
      expect(action.custodian).toBeUndefined()
    })

    it('reports uninitialized and rewards pool accounts', () => {
      const uninitialized = createStakeAccount({ state: { kind: 'Uninitialized' } })
      expect(
        denied(
          validateWithdraw({
            account: uninitialized,
            caller: withdrawer,
            currentEpoch,
            currentUnixTimestamp,
            recipient,
            amount: new BN(1),
          }),
        ),
      ).toEqual({ kind: 'Uninitialized', account: uninitialized.address })

      const rewardsPool = createStakeAccount({ state: { kind: 'RewardsPool' } })
      expect(
        denied(
          validateWithdraw({
            account: rewardsPool,
            caller: withdrawer,
            currentEpoch,
            currentUnixTimestamp,
            recipient,
            amount: new BN(1),
          }),
        ).kind,
      ).toEqual('RewardsPool')
    })

    it('refuses the staker when it is not the withdrawer', () => {
      const account = createStakeAccount({
        state: { kind: 'Initialized', meta: createMeta({ staker, withdrawer }) },
      })
      const reason = denied(
        validateWithdraw({
          account,
          caller: staker,
          currentEpoch,
          currentUnixTimestamp,
          recipient,
          amount: new BN(1),
        }),
      )
      expect(reason.kind).toEqual('NotAuthorized')
      expect(formatDenyReason(reason)).toEqual(
        `Wallet ${staker.toBase58()} is not the authorized withdrawer ` +
          `of stake account ${account.address.toBase58()}. ` +
          `Authorized withdrawer: ${withdrawer.toBase58()}`,
      )
    })

    it('refuses an active delegation', () => {
      const account = createStakeAccount({
        state: {
          kind: 'Delegated',
          meta: createMeta({ staker, withdrawer }),
          stake: createDelegation({}),
        },
      })
      expect(
        denied(
          validateWithdraw({
            account,
            caller: withdrawer,
            currentEpoch,
            currentUnixTimestamp,
            recipient,
            amount: new BN(1),
          }),
        ),
      ).toEqual({ kind: 'StillActive', account: account.address })
    })

    it('reports the epochs remaining in the cooldown', () => {
      const account = createStakeAccount({
        state: {
          kind: 'Delegated',
          meta: createMeta({ staker, withdrawer }),
          stake: createDelegation({ deactivationEpoch: 103 }),
        },
      })
      const reason = denied(
        validateWithdraw({
          account,
          caller: withdrawer,
          currentEpoch,
          currentUnixTimestamp,
          recipient,
          amount: new BN(1),
        }),
      )
      if (reason.kind !== 'CoolingDown') {
        throw new Error(`unexpected reason ${reason.kind}`)
      }
      expect(reason.currentEpoch.toString()).toEqual('100')
      expect(reason.deactivationEpoch.toString()).toEqual('103')
      expect(reason.epochsRemaining.toString()).toEqual('3')
      expect(formatDenyReason(reason)).toEqual(
        `Stake account ${account.address.toBase58()} is still cooling down. ` +
          'Current epoch: 100, deactivation epoch: 103, epochs remaining: 3',
      )
    })

    it('treats the deactivation epoch itself as cooling down', () => {
      const account = createStakeAccount({
        state: {
          kind: 'Delegated',
          meta: createMeta({ staker, withdrawer }),
          stake: createDelegation({ deactivationEpoch: 100 }),
        },
      })
      const reason = denied(
        validateWithdraw({
          account,
          caller: withdrawer,
          currentEpoch,
          currentUnixTimestamp,
          recipient,
          amount: new BN(1),
        }),
      )
      expect(reason.kind).toEqual('CoolingDown')
    })

    it('respects the lockup custodian', () => {
      const custodian = Keypair.generate().publicKey
      const account = createStakeAccount({
        state: {
          kind: 'Initialized',
          meta: createMeta({
            staker,
            withdrawer: custodian,
            lockupEpoch: 120,
            custodian,
          }),
        },
      })
      const action = approved(
        validateWithdraw({
          account,
          caller: custodian,
          currentEpoch,
          currentUnixTimestamp,
          recipient,
          amount: new BN(1),
        }),
      )
      expect(action.custodian).toEqual(custodian)

      const locked = createStakeAccount({
        state: {
          kind: 'Initialized',
          meta: createMeta({ staker, withdrawer, lockupEpoch: 120, custodian }),
        },
      })
      const reason = denied(
        validateWithdraw({
          account: locked,
          caller: withdrawer,
          currentEpoch,
          currentUnixTimestamp,
          recipient,
          amount: new BN(1),
        }),
      )
      expect(reason.kind).toEqual('LockupInForce')
    })

    it('keeps the lockup in force until its unix timestamp passes', () => {
      const custodian = Keypair.generate().publicKey
      const account = createStakeAccount({
        state: {
          kind: 'Initialized',
          meta: createMeta({
            staker,
            withdrawer,
            lockupUnixTimestamp: 1_700_000_500,
            custodian,
          }),
        },
      })
      const reason = denied(
        validateWithdraw({
          account,
          caller: withdrawer,
          currentEpoch,
          currentUnixTimestamp,
          recipient,
          amount: new BN(1),
        }),
      )
      expect(formatDenyReason(reason)).toEqual(
        `Stake account ${account.address.toBase58()} is locked up until epoch 0 ` +
          'and unix timestamp 1700000500 (current epoch: 100, unix timestamp: 1700000000), ' +
          `only custodian ${custodian.toBase58()} may withdraw`,
      )

      const action = approved(
        validateWithdraw({
          account,
          caller: withdrawer,
          currentEpoch,
          currentUnixTimestamp: new BN(1_700_000_500),
          recipient,
          amount: new BN(1),
        }),
      )
      expect(action.custodian).toBeUndefined()
    })

    it('reports an amount above the balance with both values', () => {
      const account = createStakeAccount({
        lamports: 2_000_000_000,
        state: { kind: 'Initialized', meta: createMeta({ staker, withdrawer }) },
      })
      const reason = denied(
        validateWithdraw({
          account,
          caller: withdrawer,
          currentEpoch,
          currentUnixTimestamp,
          recipient,
          amount: new BN(2_500_000_000),
        }),
      )
      if (reason.kind !== 'InsufficientBalance') {
        throw new Error(`unexpected reason ${reason.kind}`)
      }
      expect(reason.available.toString()).toEqual('2000000000')
      expect(reason.requested.toString()).toEqual('2500000000')
      expect(formatDenyReason(reason)).toEqual(
        `Insufficient balance of ${account.address.toBase58()}. ` +
          'Have 2 SOL, requested 2.5 SOL',
      )
    })
  })

  describe('delegate', () => {
    const voteAccount = Keypair.generate().publicKey

    it('approves an initialized account', () => {
      const account = createStakeAccount({
        state: { kind: 'Initialized', meta: createMeta({ staker, withdrawer }) },
      })
      expect(
        approved(
          validateDelegate({ account, caller: staker, currentEpoch, voteAccount }),
        ),
      ).toEqual({
        kind: 'Delegate',
        stakeAccount: account.address,
        authority: staker,
        voteAccount,
      })
    })

    it('refuses an active delegation', () => {
      const voter = Keypair.generate().publicKey
      const account = createStakeAccount({
        state: {
          kind: 'Delegated',
          meta: createMeta({ staker }),
          stake: createDelegation({ voter }),
        },
      })
      expect(
        denied(
          validateDelegate({ account, caller: staker, currentEpoch, voteAccount }),
        ),
      ).toEqual({ kind: 'AlreadyDelegated', account: account.address, voter })
    })

    it('allows re-delegating a cooling down account to the same voter only', () => {
      const account = createStakeAccount({
        state: {
          kind: 'Delegated',
          meta: createMeta({ staker }),
          stake: createDelegation({ voter: voteAccount, deactivationEpoch: 100 }),
        },
      })
      expect(
        validateDelegate({ account, caller: staker, currentEpoch, voteAccount })
          .approved,
      ).toBe(true)
      const reason = denied(
        validateDelegate({
          account,
          caller: staker,
          currentEpoch,
          voteAccount: Keypair.generate().publicKey,
        }),
      )
      expect(reason.kind).toEqual('CoolingDown')
    })

    it('refuses a caller that is not the staker', () => {
      const account = createStakeAccount({
        state: { kind: 'Initialized', meta: createMeta({ staker, withdrawer }) },
      })
      expect(
        denied(
          validateDelegate({
            account,
            caller: stranger,
            currentEpoch,
            voteAccount,
          }),
        ).kind,
      ).toEqual('NotAuthorized')
    })
  })

  describe('merge', () => {
    const voter = Keypair.generate().publicKey

    function delegated(activationEpoch: number, deactivationEpoch?: number) {
      return createStakeAccount({
        state: {
          kind: 'Delegated',
          meta: createMeta({ staker, withdrawer }),
          stake: createDelegation({ voter, activationEpoch, deactivationEpoch }),
        },
      })
    }

    it('classifies merge kinds', () => {
      expect(
        mergeKind({ kind: 'Initialized', meta: createMeta({ staker }) }, currentEpoch),
      ).toEqual('Inactive')
      expect(mergeKind(delegated(50).state, currentEpoch)).toEqual('FullyActive')
      expect(mergeKind(delegated(100).state, currentEpoch)).toEqual('ActivationEpoch')
      expect(mergeKind(delegated(50, 100).state, currentEpoch)).toEqual('Transient')
      expect(mergeKind(delegated(50, 99).state, currentEpoch)).toEqual('Inactive')
      expect(mergeKind({ kind: 'RewardsPool' }, currentEpoch)).toBeUndefined()
    })

    it('classifies a delegation deactivated in its activation epoch as inactive', () => {
      expect(mergeKind(delegated(100, 100).state, currentEpoch)).toEqual('Inactive')
      expect(mergeKind(delegated(95, 95).state, currentEpoch)).toEqual('Inactive')

      const reason = denied(
        validateMerge({
          destination: delegated(50),
          source: delegated(100, 100),
          caller: staker,
          currentEpoch,
          currentUnixTimestamp,
        }),
      )
      if (reason.kind !== 'MergeIncompatible') {
        throw new Error(`unexpected reason ${reason.kind}`)
      }
      expect(reason.sourceKind).toEqual('Inactive')
      expect(
        approved(
          validateMerge({
            destination: delegated(100),
            source: delegated(100, 100),
            caller: staker,
            currentEpoch,
            currentUnixTimestamp,
          }),
        ).kind,
      ).toEqual('Merge')
    })

    it('approves two fully active delegations to the same voter', () => {
      const destination = delegated(50)
      const source = delegated(60)
      expect(
        approved(
          validateMerge({
            destination,
            source,
            caller: staker,
            currentEpoch,
            currentUnixTimestamp,
          }),
        ),
      ).toEqual({
        kind: 'Merge',
        destination: destination.address,
        source: source.address,
        authority: staker,
      })
    })

    it('refuses merging an account into itself', () => {
      const destination = delegated(50)
      expect(
        denied(
          validateMerge({
            destination,
            source: destination,
            caller: staker,
            currentEpoch,
            currentUnixTimestamp,
          }),
        ),
      ).toEqual({ kind: 'SameAccount', account: destination.address })
    })

    it('refuses a transient account', () => {
      const reason = denied(
        validateMerge({
          destination: delegated(50),
          source: delegated(50, 100),
          caller: staker,
          currentEpoch,
          currentUnixTimestamp,
        }),
      )
      expect(reason.kind).toEqual('MergeIncompatible')
    })

    it('refuses different withdraw authorities', () => {
      const source = createStakeAccount({
        state: {
          kind: 'Initialized',
          meta: createMeta({ staker, withdrawer: stranger }),
        },
      })
      const reason = denied(
        validateMerge({
          destination: delegated(100),
          source,
          caller: staker,
          currentEpoch,
          currentUnixTimestamp,
        }),
      )
      expect(reason.kind).toEqual('AuthorityMismatch')
    })

    it('refuses delegations to different voters', () => {
      const source = createStakeAccount({
        state: {
          kind: 'Delegated',
          meta: createMeta({ staker, withdrawer }),
          stake: createDelegation({ activationEpoch: 40 }),
        },
      })
      const reason = denied(
        validateMerge({
          destination: delegated(50),
          source,
          caller: staker,
          currentEpoch,
          currentUnixTimestamp,
        }),
      )
      expect(reason.kind).toEqual('VoterMismatch')
    })

    it('refuses different lockups in force', () => {
      const source = createStakeAccount({
        state: {
          kind: 'Initialized',
          meta: createMeta({ staker, withdrawer, lockupEpoch: 200 }),
        },
      })
      const destination = createStakeAccount({
        state: { kind: 'Initialized', meta: createMeta({ staker, withdrawer }) },
      })
      expect(
        denied(
          validateMerge({
            destination,
            source,
            caller: staker,
            currentEpoch,
            currentUnixTimestamp,
          }),
        ).kind,
      ).toEqual('LockupMismatch')
    })

    it('refuses a lockup in force by its unix timestamp', () => {
      const source = createStakeAccount({
        state: {
          kind: 'Initialized',
          meta: createMeta({
            staker,
            withdrawer,
            lockupUnixTimestamp: 1_800_000_000,
          }),
        },
      })
      const destination = createStakeAccount({
        state: { kind: 'Initialized', meta: createMeta({ staker, withdrawer }) },
      })
      const merge = (now: number) =>
        validateMerge({
          destination,
          source,
          caller: staker,
          currentEpoch,
          currentUnixTimestamp: new BN(now),
        })
      expect(denied(merge(1_700_000_000)).kind).toEqual('LockupMismatch')
      expect(approved(merge(1_800_000_000)).kind).toEqual('Merge')
    })
  })

  describe('split', () => {
    const newStakeAccount = Keypair.generate().publicKey
    const rentExemptReserve = new BN(RENT_EXEMPT_STAKE)

    function initialized(lamports: number) {
      return createStakeAccount({
        lamports,
        state: { kind: 'Initialized', meta: createMeta({ staker, withdrawer }) },
      })
    }

    it('approves a split leaving enough in the source', () => {
      const account = initialized(10_000_000_000)
      const action = approved(
        validateSplit({
          account,
          caller: staker,
          newStakeAccount,
          amount: new BN(4_000_000_000),
          rentExemptReserve,
        }),
      )
      expect(action.lamports.toString()).toEqual('4000000000')
      expect(action.newStakeAccount).toEqual(newStakeAccount)
    })

    it('approves splitting the whole balance', () => {
      const account = initialized(10_000_000_000)
      expect(
        validateSplit({
          account,
          caller: staker,
          newStakeAccount,
          amount: new BN(10_000_000_000),
          rentExemptReserve,
        }).approved,
      ).toBe(true)
    })

    it('refuses a remainder below the rent exempt reserve', () => {
      const account = initialized(10_000_000_000)
      const reason = denied(
        validateSplit({
          account,
          caller: staker,
          newStakeAccount,
          amount: new BN(9_999_000_000),
          rentExemptReserve,
        }),
      )
      if (reason.kind !== 'RemainderBelowRentExempt') {
        throw new Error(`unexpected reason ${reason.kind}`)
      }
      expect(reason.remainder.toString()).toEqual('1000000')
    })

    it('refuses an amount above the balance', () => {
      expect(
        denied(
          validateSplit({
            account: initialized(1_000_000_000),
            caller: staker,
            newStakeAccount,
            amount: new BN(2_000_000_000),
            rentExemptReserve,
          }),
        ).kind,
      ).toEqual('InsufficientBalance')
    })
  })

  describe('create', () => {
    const caller = Keypair.generate().publicKey
    const newStakeAccount = Keypair.generate().publicKey
    const rentExemptReserve = new BN(RENT_EXEMPT_STAKE)

    it('defaults both authorities to the caller', () => {
      const action = approved(
        validateCreate({
          caller,
          walletLamports: new BN(10_000_000_000),
          rentExemptReserve,
          newStakeAccount,
          amount: new BN(1_000_000_000),
        }),
      )
      expect(action.staker).toEqual(caller)
      expect(action.withdrawer).toEqual(caller)
      expect(action.funder).toEqual(caller)
    })

    it('refuses an amount below the rent exempt minimum', () => {
      const reason = denied(
        validateCreate({
          caller,
          walletLamports: new BN(10_000_000_000),
          rentExemptReserve,
          newStakeAccount,
          amount: new BN(1_000_000),
        }),
      )
      expect(formatDenyReason(reason)).toEqual(
        'Amount 0.001 SOL is lower than the rent exempt minimum of a stake account 0.00228288 SOL',
      )
    })

    it('refuses an amount above the wallet balance', () => {
      expect(
        denied(
          validateCreate({
            caller,
            walletLamports: new BN(500_000_000),
            rentExemptReserve,
            newStakeAccount,
            amount: new BN(1_000_000_000),
          }),
        ).kind,
      ).toEqual('InsufficientBalance')
    })

    it('refuses delegating on creation for another staker', () => {
      expect(
        denied(
          validateCreate({
            caller,
            walletLamports: new BN(10_000_000_000),
            rentExemptReserve,
            newStakeAccount,
            amount: new BN(1_000_000_000),
            staker: stranger,
            voteAccount: Keypair.generate().publicKey,
          }),
        ).kind,
      ).toEqual('NotAuthorized')
    })
  })

  describe('transfer', () => {
    const caller = Keypair.generate().publicKey

    it('refuses a transfer to the wallet itself', () => {
      expect(
        denied(
          validateTransfer({
            caller,
            walletLamports: new BN(10),
            recipient: caller,
            amount: new BN(1),
          }),
        ),
      ).toEqual({ kind: 'SelfTransfer', account: caller })
    })

    it('checks the wallet balance', () => {
      const recipient = PublicKey.default
      expect(
        denied(
          validateTransfer({
            caller,
            walletLamports: new BN(10),
            recipient,
            amount: new BN(11),
          }),
        ).kind,
      ).toEqual('InsufficientBalance')
      expect(
        validateTransfer({
          caller,
          walletLamports: new BN(10),
          recipient,
          amount: new BN(10),
        }).approved,
      ).toBe(true)
    })
  })

  it('carries the reason in the denial error', () => {
    const reason: DenyReason = { kind: 'SameAccount', account: PublicKey.default }
    const err = new ValidationDeniedError(reason)
    expect(err.code).toEqual('VALIDATION_DENIED')
    expect(err.reason).toBe(reason)
    expect(err.message).toEqual(
      `Source and destination are the same account ${PublicKey.default.toBase58()}`,
    )
  })
})

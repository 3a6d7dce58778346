import { createStakeAccountInstructions } from './createStakeAccount'
import { deactivateStakeInstruction } from './deactivateStake'
import { delegateStakeInstruction } from './delegateStake'
import { mergeStakeInstruction } from './mergeStake'
import { splitStakeInstruction } from './splitStake'
import { transferInstruction } from './transfer'
import { withdrawStakeInstruction } from './withdrawStake'
import { assertNever } from '../utils'

import type { ApprovedAction } from '../validation'
import type { TransactionInstruction } from '@solana/web3.js'

export * from './createStakeAccount'
export * from './deactivateStake'
export * from './delegateStake'
export * from './mergeStake'
export * from './splitStake'
export * from './transfer'
export * from './withdrawStake'

export function buildActionInstructions(action: ApprovedAction): {
  instructions: TransactionInstruction[]
} {
  switch (action.kind) {
    case 'Create':
      return createStakeAccountInstructions(action)
    case 'Delegate':
      return delegateStakeInstruction(action)
    case 'Deactivate':
      return deactivateStakeInstruction(action)
    case 'Withdraw':
      return withdrawStakeInstruction(action)
    case 'Merge':
      return mergeStakeInstruction(action)
    case 'Split':
      return splitStakeInstruction(action)
    case 'Transfer':
      return transferInstruction(action)
    default:
      return assertNever(action, 'approved action')
  }
}

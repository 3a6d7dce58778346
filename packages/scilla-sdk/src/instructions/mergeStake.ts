import { StakeProgram } from '@solana/web3.js'

import type { MergeAction } from '../validation'
import type { TransactionInstruction } from '@solana/web3.js'

/**
 * Generate instruction to merge two stake accounts.
 * The source account is drained into the destination and closed.
 */
export function mergeStakeInstruction({
  destination,
  source,
  authority,
}: Omit<MergeAction, 'kind'>): {
  instructions: TransactionInstruction[]
} {
  const { instructions } = StakeProgram.merge({
    stakePubkey: destination,
    sourceStakePubKey: source,
    authorizedPubkey: authority,
  })
  return { instructions }
}

import { StakeProgram } from '@solana/web3.js'

import type { DeactivateAction } from '../validation'
import type { TransactionInstruction } from '@solana/web3.js'

/**
 * Generate instruction to deactivate a delegated stake account.
 * The cooldown starts at the current epoch, the staker authority signs.
 */
export function deactivateStakeInstruction({
  stakeAccount,
  authority,
}: Omit<DeactivateAction, 'kind'>): {
  instructions: TransactionInstruction[]
} {
  const { instructions } = StakeProgram.deactivate({
    stakePubkey: stakeAccount,
    authorizedPubkey: authority,
  })
  return { instructions }
}

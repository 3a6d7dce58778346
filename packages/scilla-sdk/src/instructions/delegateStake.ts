import { StakeProgram } from '@solana/web3.js'

import type { DelegateAction } from '../validation'
import type { TransactionInstruction } from '@solana/web3.js'

export function delegateStakeInstruction({
  stakeAccount,
  authority,
  voteAccount,
}: Omit<DelegateAction, 'kind'>): {
  instructions: TransactionInstruction[]
} {
  const { instructions } = StakeProgram.delegate({
    stakePubkey: stakeAccount,
    authorizedPubkey: authority,
    votePubkey: voteAccount,
  })
  return { instructions }
}

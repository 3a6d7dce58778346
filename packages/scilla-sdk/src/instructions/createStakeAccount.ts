import { Authorized, StakeProgram } from '@solana/web3.js'

import { toSafeNumber } from '../amount'

import type { CreateAction } from '../validation'
import type { TransactionInstruction } from '@solana/web3.js'

/**
 * Generate instructions to create and initialize a new stake account funded
 * from the wallet, optionally delegating it to a vote account right away.
 * The new stake account keypair has to sign the transaction.
 */
export function createStakeAccountInstructions({
  newStakeAccount,
  funder,
  staker,
  withdrawer,
  lamports,
  voteAccount,
}: Omit<CreateAction, 'kind'>): {
  instructions: TransactionInstruction[]
} {
  const instructions = [
    ...StakeProgram.createAccount({
      fromPubkey: funder,
      stakePubkey: newStakeAccount,
      authorized: new Authorized(staker, withdrawer),
      lamports: toSafeNumber(lamports, 'Stake amount'),
    }).instructions,
  ]
  if (voteAccount !== undefined) {
    instructions.push(
      ...StakeProgram.delegate({
        stakePubkey: newStakeAccount,
        authorizedPubkey: staker,
        votePubkey: voteAccount,
      }).instructions,
    )
  }
  return { instructions }
}

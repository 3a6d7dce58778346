import { StakeProgram } from '@solana/web3.js'

import { toSafeNumber } from '../amount'

import type { SplitAction } from '../validation'
import type { TransactionInstruction } from '@solana/web3.js'

/**
 * Generate instructions to split lamports of a stake account into a new one.
 * The new account is allocated first (rent paid by the staker authority),
 * its keypair has to sign the transaction.
 */
export function splitStakeInstruction({
  stakeAccount,
  newStakeAccount,
  authority,
  lamports,
  rentExemptReserve,
}: Omit<SplitAction, 'kind'>): {
  instructions: TransactionInstruction[]
} {
  const { instructions } = StakeProgram.split(
    {
      stakePubkey: stakeAccount,
      authorizedPubkey: authority,
      splitStakePubkey: newStakeAccount,
      lamports: toSafeNumber(lamports, 'Split amount'),
    },
    toSafeNumber(rentExemptReserve, 'Rent exempt reserve'),
  )
  return { instructions }
}

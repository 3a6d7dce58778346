import { StakeProgram } from '@solana/web3.js'

import { toSafeNumber } from '../amount'

import type { WithdrawAction } from '../validation'
import type { TransactionInstruction } from '@solana/web3.js'

/**
 * Generate instruction to withdraw lamports from an initialized or fully
 * deactivated stake account, signed by the withdraw authority
 * (and by the lockup custodian when the lockup is still in force).
 */
export function withdrawStakeInstruction({
  stakeAccount,
  authority,
  recipient,
  lamports,
  custodian,
}: Omit<WithdrawAction, 'kind'>): {
  instructions: TransactionInstruction[]
} {
  const { instructions } = StakeProgram.withdraw({
    stakePubkey: stakeAccount,
    authorizedPubkey: authority,
    toPubkey: recipient,
    lamports: toSafeNumber(lamports, 'Withdraw amount'),
    custodianPubkey: custodian,
  })
  return { instructions }
}

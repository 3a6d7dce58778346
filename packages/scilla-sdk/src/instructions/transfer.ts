import { SystemProgram } from '@solana/web3.js'

import { toSafeNumber } from '../amount'

import type { TransferAction } from '../validation'
import type { TransactionInstruction } from '@solana/web3.js'

export function transferInstruction({
  from,
  recipient,
  lamports,
}: Omit<TransferAction, 'kind'>): {
  instructions: TransactionInstruction[]
} {
  return {
    instructions: [
      SystemProgram.transfer({
        fromPubkey: from,
        toPubkey: recipient,
        lamports: toSafeNumber(lamports, 'Transfer amount'),
      }),
    ],
  }
}

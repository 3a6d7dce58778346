import { NULL_LOG } from '@marinade.finance/ts-common'
import {
  createTempFileKeypair,
  parseWalletFromOpts,
} from '@marinade.finance/web3js-1x'

import type { Wallet } from '@marinade.finance/web3js-1x'
import type { Keypair } from '@solana/web3.js'

export type TestWallet = {
  wallet: Wallet
  keypair: Keypair
  path: string
  cleanup: () => Promise<void>
}

/**
 * Wallet loaded from a temporary keypair file, the way the CLI loads `--keypair`.
 */
export async function createTestWallet(): Promise<TestWallet> {
  const { path, keypair, cleanup } = await createTempFileKeypair()
  const wallet = await parseWalletFromOpts(path, false, [], NULL_LOG)
  return { wallet, keypair, path, cleanup }
}

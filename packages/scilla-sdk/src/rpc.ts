import type { Connection } from '@solana/web3.js'

/**
 * The part of the node JSON-RPC API the reads consume.
 * Transactions are sent through a whole `Connection`. Every call may fail or time out.
 */
export type RpcConnection = Pick<
  Connection,
  | 'rpcEndpoint'
  | 'getAccountInfo'
  | 'getBalance'
  | 'getEpochInfo'
  | 'getSlot'
  | 'getBlockHeight'
  | 'getVersion'
  | 'getLatestBlockhash'
  | 'getMinimumBalanceForRentExemption'
  | 'confirmTransaction'
  | 'getSignaturesForAddress'
  | 'getSignatureStatus'
  | 'requestAirdrop'
>

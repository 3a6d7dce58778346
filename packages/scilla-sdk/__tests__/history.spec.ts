import { Keypair, SystemProgram } from '@solana/web3.js'

import {
  AccountNotFoundError,
  InvalidArgumentError,
  OwnershipError,
  fetchSignatureHistory,
  fetchStakeAccountHistory,
} from '../src'
import { FakeRpc } from './utils/fakeRpc'
import { createMeta, stakeAccountInfo } from './utils/staking'

describe('Transaction history', () => {
  const address = Keypair.generate().publicKey
  let rpc: FakeRpc

  beforeEach(() => {
    rpc = new FakeRpc()
    rpc.signatures = [
      {
        signature: 'sig-newer',
        slot: 2000,
        err: null,
        memo: null,
        blockTime: 1_700_000_000,
        confirmationStatus: 'finalized',
      },
      {
        signature: 'sig-older',
        slot: 1000,
        err: { InstructionError: [0, 'Custom'] },
        memo: '[5] hello',
        blockTime: null,
      },
    ]
  })

  it('lists the signatures newest first', async () => {
    const history = await fetchSignatureHistory({ connection: rpc, address })
    expect(history).toEqual([
      {
        slot: 2000,
        signature: 'sig-newer',
        succeeded: true,
        blockTime: new Date('2023-11-14T22:13:20.000Z'),
        memo: null,
        confirmationStatus: 'finalized',
      },
      {
        slot: 1000,
        signature: 'sig-older',
        succeeded: false,
        blockTime: null,
        memo: '[5] hello',
        confirmationStatus: undefined,
      },
    ])
  })

  it('returns an empty history', async () => {
    rpc.signatures = []
    expect(await fetchSignatureHistory({ connection: rpc, address })).toEqual([])
  })

  it('refuses a limit out of range', async () => {
    await expect(
      fetchSignatureHistory({ connection: rpc, address, limit: 0 }),
    ).rejects.toThrow(InvalidArgumentError)
    await expect(
      fetchSignatureHistory({ connection: rpc, address, limit: 1001 }),
    ).rejects.toThrow('History limit must be an integer between 1 and 1000, got 1001')
    expect(rpc.calls).toEqual([])
  })

  it('checks the stake account before reading its history', async () => {
    await expect(
      fetchStakeAccountHistory({ connection: rpc, address }),
    ).rejects.toThrow(AccountNotFoundError)

    rpc.accounts.set(address.toBase58(), {
      executable: false,
      owner: SystemProgram.programId,
      lamports: 1,
      data: Buffer.alloc(0),
    })
    await expect(
      fetchStakeAccountHistory({ connection: rpc, address }),
    ).rejects.toThrow(OwnershipError)
    expect(rpc.calls).not.toContain('getSignaturesForAddress')

    rpc.accounts.set(
      address.toBase58(),
      stakeAccountInfo({ kind: 'Initialized', meta: createMeta({ staker: address }) }),
    )
    const history = await fetchStakeAccountHistory({ connection: rpc, address })
    expect(history.map(entry => entry.signature)).toEqual(['sig-newer', 'sig-older'])
  })
})

import { CliCommandError } from '@marinade.finance/cli-common'
import { PublicKey } from '@solana/web3.js'
import BN from 'bn.js'

import {
  formatBlockTime,
  formatSol,
  parseFormat,
  reformat,
  shortSignature,
} from '../src/format'

describe('Output formatting', () => {
  const data = {
    amount: new BN(5),
    skipped: undefined,
    nested: { key: PublicKey.default },
  }

  it('makes keys, big numbers and dates plain, dropping undefined values', () => {
    expect(reformat(data)).toEqual({
      amount: '5',
      nested: { key: '11111111111111111111111111111111' },
    })
    expect(
      reformat([{ at: new Date(Date.UTC(2024, 0, 2)), slot: 12n, state: 'Initialized' }]),
    ).toEqual([{ at: '2024-01-02T00:00:00.000Z', slot: '12', state: 'Initialized' }])
  })

  it('parses the format option', () => {
    expect(parseFormat('JSON')).toEqual('json')
    expect(() => parseFormat('xml')).toThrow(CliCommandError)
    expect(() => parseFormat('xml')).toThrow(
      /Unknown output format, use one of: text, yaml, json/,
    )
  })

  it('shortens signatures', () => {
    expect(shortSignature('abcdefghijklmnopqrstuvwxyz')).toEqual('abcdefgh...stuvwxyz')
    expect(shortSignature('short')).toEqual('short')
  })

  it('formats block times in UTC', () => {
    expect(formatBlockTime(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toEqual(
      '2024-01-02 03:04:05',
    )
    expect(formatBlockTime(null)).toEqual('~')
  })

  it('formats lamports as SOL', () => {
    expect(formatSol(1_500_000_000)).toEqual('1.5 SOL')
    expect(formatSol(new BN(1))).toEqual('0.000000001 SOL')
  })
})

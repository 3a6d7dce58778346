import { PublicKey } from '@solana/web3.js'
import BN from 'bn.js'

import { DecodeError } from '../errors'

/**
 * Sequential reader of bincode serialized account data, little endian.
 * Reading past the end is a {@link DecodeError} naming the account.
 */
export class AccountDataReader {
  private offset = 0

  constructor(
    private readonly data: Buffer,
    private readonly what: string,
    private readonly address?: PublicKey,
  ) {}

  get remaining(): number {
    return this.data.length - this.offset
  }

  u8(): number {
    this.ensure(1, 'u8')
    const value = this.data.readUInt8(this.offset)
    this.offset += 1
    return value
  }

  u32(): number {
    this.ensure(4, 'u32')
    const value = this.data.readUInt32LE(this.offset)
    this.offset += 4
    return value
  }

  u64(): BN {
    this.ensure(8, 'u64')
    const value = this.data.readBigUInt64LE(this.offset)
    this.offset += 8
    return new BN(value.toString())
  }

  // slots and credits, precise up to 2^53
  u64AsNumber(): number {
    this.ensure(8, 'u64')
    const value = this.data.readBigUInt64LE(this.offset)
    this.offset += 8
    return Number(value)
  }

  i64(): BN {
    this.ensure(8, 'i64')
    const value = this.data.readBigInt64LE(this.offset)
    this.offset += 8
    return new BN(value.toString())
  }

  pubkey(): PublicKey {
    this.ensure(32, 'pubkey')
    const value = new PublicKey(
      this.data.subarray(this.offset, this.offset + 32),
    )
    this.offset += 32
    return value
  }

  /**
   * Length prefix of a collection whose items take `itemSize` bytes each.
   */
  length(itemSize: number, what: string): number {
    const length = this.u64AsNumber()
    this.ensure(length * itemSize, what)
    return length
  }

  skip(bytes: number, what: string) {
    this.ensure(bytes, what)
    this.offset += bytes
  }

  private ensure(bytes: number, what: string) {
    if (this.offset + bytes > this.data.length) {
      throw new DecodeError(
        `unexpected end of ${this.what} data reading ${what} at offset ${this.offset} ` +
          `(data length ${this.data.length})`,
        this.address,
      )
    }
  }
}

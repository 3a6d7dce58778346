import { logDebug } from '@marinade.finance/ts-common'
import { VOTE_PROGRAM_ID } from '@solana/web3.js'

import { AccountDataReader } from './accountDataReader'
import { fetchAccountInfo } from './stakeAccount'
import { AccountNotFoundError, DecodeError, OwnershipError } from '../errors'

import type { RpcConnection } from '../rpc'
import type { LoggerPlaceholder } from '@marinade.finance/ts-common'
import type { Commitment, EpochCredits, PublicKey } from '@solana/web3.js'

export type VoteState = {
  nodePubkey: PublicKey
  authorizedWithdrawer: PublicKey
  commission: number
  rootSlot: number | null
  epochCredits: EpochCredits[]
}

export type VoteAccountData = VoteState & {
  address: PublicKey
  lamports: number
}

// credits of the last epochs only, the account keeps up to 64 of them
const EPOCH_CREDITS_SHOWN = 5

// VoteStateVersions discriminants
const V0_23_5_TAG = 0
const V1_14_11_TAG = 1
const CURRENT_TAG = 2

const MAX_PRIOR_VOTERS = 32
// (voter, start epoch, end epoch)
const PRIOR_VOTER_SIZE = 32 + 8 + 8
// (voter, start epoch, end epoch, slot)
const PRIOR_VOTER_V0_23_5_SIZE = 32 + 8 + 8 + 8
// (epoch, voter)
const AUTHORIZED_VOTER_SIZE = 8 + 32
// (slot, confirmation count)
const LOCKOUT_SIZE = 8 + 4
// latency, lockout
const LANDED_VOTE_SIZE = 1 + LOCKOUT_SIZE
const EPOCH_CREDITS_SIZE = 8 + 8 + 8

function readRootSlot(reader: AccountDataReader): number | null {
  return reader.u8() === 0 ? null : reader.u64AsNumber()
}

function readEpochCredits(reader: AccountDataReader): EpochCredits[] {
  const length = reader.length(EPOCH_CREDITS_SIZE, 'epoch credits')
  const epochCredits: EpochCredits[] = []
  for (let i = 0; i < length; i++) {
    const epoch = reader.u64AsNumber()
    const credits = reader.u64AsNumber()
    const prevCredits = reader.u64AsNumber()
    epochCredits.push({ epoch, credits, prevCredits })
  }
  return epochCredits
}

function skipVotes(reader: AccountDataReader, voteSize: number) {
  const length = reader.length(voteSize, 'votes')
  reader.skip(length * voteSize, 'votes')
}

function readVoteState(
  reader: AccountDataReader,
  voteSize: number,
): VoteState {
  const nodePubkey = reader.pubkey()
  const authorizedWithdrawer = reader.pubkey()
  const commission = reader.u8()
  skipVotes(reader, voteSize)
  const rootSlot = readRootSlot(reader)
  const authorizedVoters = reader.length(AUTHORIZED_VOTER_SIZE, 'authorized voters')
  reader.skip(authorizedVoters * AUTHORIZED_VOTER_SIZE, 'authorized voters')
  // circular buffer, its index and the is empty flag
  reader.skip(MAX_PRIOR_VOTERS * PRIOR_VOTER_SIZE + 8 + 1, 'prior voters')
  const epochCredits = readEpochCredits(reader)
  return {
    nodePubkey,
    authorizedWithdrawer,
    commission,
    rootSlot,
    epochCredits,
  }
}

function readVoteStateV0_23_5(reader: AccountDataReader): VoteState {
  const nodePubkey = reader.pubkey()
  // authorized voter and its epoch
  reader.skip(32 + 8, 'authorized voter')
  reader.skip(MAX_PRIOR_VOTERS * PRIOR_VOTER_V0_23_5_SIZE + 8, 'prior voters')
  const authorizedWithdrawer = reader.pubkey()
  const commission = reader.u8()
  skipVotes(reader, LOCKOUT_SIZE)
  const rootSlot = readRootSlot(reader)
  const epochCredits = readEpochCredits(reader)
  return {
    nodePubkey,
    authorizedWithdrawer,
    commission,
    rootSlot,
    epochCredits,
  }
}

/**
 * Decoding the bincode serialized `VoteStateVersions` of the Vote program.
 * Every version is read up to the epoch credits, the rest is not used.
 */
export function decodeVoteState(data: Buffer, address?: PublicKey): VoteState {
  const reader = new AccountDataReader(data, 'vote', address)
  const tag = reader.u32()
  switch (tag) {
    case V0_23_5_TAG:
      return readVoteStateV0_23_5(reader)
    case V1_14_11_TAG:
      return readVoteState(reader, LOCKOUT_SIZE)
    case CURRENT_TAG:
      return readVoteState(reader, LANDED_VOTE_SIZE)
    default:
      throw new DecodeError(`unknown vote state discriminant ${tag}`, address)
  }
}

export async function fetchVoteAccount({
  connection,
  address,
  commitment,
  logger,
}: {
  connection: RpcConnection
  address: PublicKey
  commitment?: Commitment
  logger?: LoggerPlaceholder
}): Promise<VoteAccountData> {
  const accountInfo = await fetchAccountInfo({ connection, address, commitment })
  if (accountInfo === null) {
    throw new AccountNotFoundError(address)
  }
  if (!accountInfo.owner.equals(VOTE_PROGRAM_ID)) {
    throw new OwnershipError(address, accountInfo.owner, VOTE_PROGRAM_ID)
  }
  logDebug(
    logger,
    `Decoding vote account ${address.toBase58()} of ${accountInfo.data.length} bytes`,
  )
  const voteState = decodeVoteState(accountInfo.data, address)
  return {
    address,
    lamports: accountInfo.lamports,
    ...voteState,
    epochCredits: voteState.epochCredits.slice(-EPOCH_CREDITS_SHOWN),
  }
}

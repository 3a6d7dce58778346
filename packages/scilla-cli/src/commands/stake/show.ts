import { parsePubkey } from '@marinade.finance/web3js-1x'
import {
  ACTIVE_STAKE_EPOCH_BOUND,
  fetchCurrentEpoch,
  fetchStakeAccount,
  formatToSol,
  stakeActivationStatus,
} from '@scilla/sdk'
import BN from 'bn.js'

import { printData } from '../../format'

import type { ContextResolver, ScillaCliContext } from '../../context'
import type { StakeAccount } from '@scilla/sdk'
import type { PublicKey } from '@solana/web3.js'
import type { Command } from 'commander'

export function configureShowStake(program: Command): Command {
  return program
    .command('show')
    .description('Show the state of a stake account')
    .argument('<stake-account>', 'Stake account address', parsePubkey)
}

export function installShowStake(program: Command, resolveContext: ContextResolver) {
  configureShowStake(program).action(
    async (address: Promise<PublicKey>, _options: unknown, command: Command) => {
      await showStake(await resolveContext(command), { address: await address })
    },
  )
}

export type StakeAccountView = {
  address: PublicKey
  balance: string
  state: string
  rentExemptReserve?: string
  staker?: PublicKey
  withdrawer?: PublicKey
  lockup?: { epoch: BN; unixTimestamp: BN; custodian: PublicKey }
  delegation?: {
    status: string
    voter: PublicKey
    stake: string
    activationEpoch: BN
    deactivationEpoch: BN | null
    creditsObserved: BN
  }
}

export function toStakeAccountView(
  account: StakeAccount,
  currentEpoch: BN,
): StakeAccountView {
  const view: StakeAccountView = {
    address: account.address,
    balance: `${formatToSol(account.lamports)} SOL`,
    state: account.state.kind,
  }
  if (account.state.kind === 'Initialized' || account.state.kind === 'Delegated') {
    const { meta } = account.state
    view.rentExemptReserve = `${formatToSol(meta.rentExemptReserve)} SOL`
    view.staker = meta.authorized.staker
    view.withdrawer = meta.authorized.withdrawer
    view.lockup = {
      epoch: meta.lockup.epoch,
      unixTimestamp: meta.lockup.unixTimestamp,
      custodian: meta.lockup.custodian,
    }
  }
  if (account.state.kind === 'Delegated') {
    const { stake } = account.state
    view.delegation = {
      status: stakeActivationStatus(stake, currentEpoch),
      voter: stake.voter,
      stake: `${formatToSol(stake.stake)} SOL`,
      activationEpoch: stake.activationEpoch,
      deactivationEpoch: stake.deactivationEpoch.eq(ACTIVE_STAKE_EPOCH_BOUND)
        ? null
        : stake.deactivationEpoch,
      creditsObserved: stake.creditsObserved,
    }
  }
  return view
}

export async function showStake(
  context: ScillaCliContext,
  { address }: { address: PublicKey },
): Promise<StakeAccountView> {
  const { connection, commitment } = context
  const account = await fetchStakeAccount({ connection, address, commitment })
  const currentEpoch = new BN(await fetchCurrentEpoch(connection, commitment))
  const view = toStakeAccountView(account, currentEpoch)
  printData(view, context.format)
  return view
}

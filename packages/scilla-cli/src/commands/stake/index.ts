import { installCreate } from './create'
import { installDeactivate } from './deactivate'
import { installDelegate } from './delegate'
import { installStakeHistory } from './history'
import { installMerge } from './merge'
import { installShowStake } from './show'
import { installSplit } from './split'
import { installWithdraw } from './withdraw'

import type { ContextResolver } from '../../context'
import type { Command } from 'commander'

export function installStakeCommands(
  program: Command,
  resolveContext: ContextResolver,
) {
  const stake = program
    .command('stake')
    .description('Stake account lifecycle: create, delegate, deactivate, withdraw...')
  installCreate(stake, resolveContext)
  installDelegate(stake, resolveContext)
  installDeactivate(stake, resolveContext)
  installWithdraw(stake, resolveContext)
  installMerge(stake, resolveContext)
  installSplit(stake, resolveContext)
  installShowStake(stake, resolveContext)
  installStakeHistory(stake, resolveContext)
}

import { installAirdrop } from './airdrop'
import { installBalance } from './balance'
import { installConfirm } from './confirm'
import { installTransfer } from './transfer'

import type { ContextResolver } from '../../context'
import type { Command } from 'commander'

export function installAccountCommands(
  program: Command,
  resolveContext: ContextResolver,
) {
  const account = program
    .command('account')
    .description('Wallet and account management')
  installBalance(account, resolveContext)
  installTransfer(account, resolveContext)
  installAirdrop(account, resolveContext)
  installConfirm(account, resolveContext)
}

import { installAccountCommands } from './account'
import { installClusterCommands } from './cluster'
import { installConfigCommands } from './config'
import { installStakeCommands } from './stake'
import { installVoteCommands } from './vote'

import type { ContextResolver } from '../context'
import type { Command } from 'commander'
import type { Logger } from 'pino'

export function installCommands(
  program: Command,
  resolveContext: ContextResolver,
  logger: Logger,
) {
  installStakeCommands(program, resolveContext)
  installAccountCommands(program, resolveContext)
  installClusterCommands(program, resolveContext)
  installVoteCommands(program, resolveContext)
  installConfigCommands(program, logger)
}

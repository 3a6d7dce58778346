import { pinoConfiguration } from '@marinade.finance/ts-common'
import { DEFAULT_KEYPAIR_PATH, ExecutionError } from '@marinade.finance/web3js-1x'
import { SubmissionRejectedError } from '@scilla/sdk'
import { Command, Option } from 'commander'
import pino from 'pino'

import { installCommands } from './commands'
import { defaultConfigPath, CONFIG_ENV } from './config'
import { createCliContext, readGlobalOptions } from './context'
import { FORMAT_TYPES } from './format'
import { parseNonNegativeInteger } from './parsers'

import type { ContextResolver } from './context'

export function launchCliProgram({
  version,
  argv = process.argv,
}: {
  version: string
  argv?: string[]
}) {
  const logger = pino(pinoConfiguration('info'), pino.destination())
  const program = new Command()

  program
    .name('scilla')
    .version(version)
    .allowExcessArguments(false)
    .configureHelp({ showGlobalOptions: true })
    .addOption(
      new Option(
        '-u, --url <rpc-url>',
        'solana RPC URL or a moniker ' +
          '(m/mainnet/mainnet-beta, d/devnet, t/testnet, l/localhost) ' +
          '(default: loaded from config file or mainnet)',
      ).env('RPC_URL'),
    )
    .option(
      '-k, --keypair <keypair-path>',
      'Wallet keypair file, pays the transaction fees and signs as the stake authority ' +
        `(default: loaded from config file or ${DEFAULT_KEYPAIR_PATH})`,
    )
    .option(
      '--config-file <path>',
      `Configuration file (default: env ${CONFIG_ENV} or ${defaultConfigPath()})`,
    )
    .option('--commitment <commitment>', 'Commitment of the account reads')
    .option(
      '--confirmation-finality <confirmed|finalized>',
      'Confirmation finality of sent transaction. ' +
        '"confirmed" means the majority of the cluster confirmed it, ' +
        '"finalized" stands for full cluster finality that takes ~8 seconds.',
    )
    .option(
      '--with-compute-unit-price <compute-unit-price>',
      'Set compute unit price for transaction, in increments of 0.000001 lamports per compute unit.',
      parseNonNegativeInteger('--with-compute-unit-price'),
    )
    .option('-s, --simulate', 'Simulate the transaction, nothing is sent', false)
    .option(
      '-p, --print-only',
      'Print only mode, no execution, the transaction message is printed in base64 to output',
      false,
    )
    .option('--skip-preflight', 'Transaction execution flag "skip-preflight"', false)
    .option(
      '-d, --debug',
      'Printing more detailed information of the CLI execution',
      false,
    )
    .option('-v, --verbose', 'alias for --debug', false)
    .addOption(
      new Option('-f, --format <format>', 'Format of the printed data')
        .choices(FORMAT_TYPES)
        .default('text'),
    )

  program.hook('preAction', (command: Command) => {
    const opts = command.opts()
    logger.level = opts.debug === true || opts.verbose === true ? 'debug' : 'info'
  })

  const resolveContext: ContextResolver = command =>
    createCliContext({
      options: readGlobalOptions(command.optsWithGlobals()),
      logger,
      args: command.args,
    })

  installCommands(program, resolveContext, logger)

  program.parseAsync(argv).then(
    () => {
      logger.debug({ resolution: 'Success', args: argv })
      logger.flush()
    },
    (err: unknown) => {
      logger.error(
        err instanceof SubmissionRejectedError
          ? err.messageWithLogs()
          : err instanceof ExecutionError
            ? err.messageWithTransactionError()
            : err instanceof Error
              ? err.message
              : String(err),
      )
      logger.debug({
        resolution: 'Failure',
        err,
        error_stack:
          err instanceof Error ? JSON.stringify(err.stack, null, 2) : undefined,
        args: argv,
      })
      logger.flush()
      process.exitCode = 200
    },
  )
}

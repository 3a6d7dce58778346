import {
  parseClusterUrl,
  parseCommitment,
  parseConfirmationFinality,
  parseWalletFromOpts,
} from '@marinade.finance/web3js-1x'
import { Connection } from '@solana/web3.js'

import { loadConfig } from './config'
import { parseFormat } from './format'
import { expandHome } from './parsers'

import type { ScillaConfig } from './config'
import type { FormatType } from './format'
import type { Wallet } from '@marinade.finance/web3js-1x'
import type { OperationContext } from '@scilla/sdk'
import type { Commitment, Finality } from '@solana/web3.js'
import type { Command, OptionValues } from 'commander'
import type { Logger } from 'pino'

export type GlobalOptions = {
  url?: string
  keypair?: string
  configFile?: string
  commitment?: string
  confirmationFinality?: string
  withComputeUnitPrice?: number
  simulate: boolean
  printOnly: boolean
  skipPreflight: boolean
  debug: boolean
  format: FormatType
}

export type ConnectionFactory = (
  rpcUrl: string,
  commitment: Commitment,
) => Connection

export type ContextResolver = (command: Command) => Promise<ScillaCliContext>

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

export function readGlobalOptions(opts: OptionValues): GlobalOptions {
  const format = optionalString(opts.format)
  const price: unknown = opts.withComputeUnitPrice
  return {
    url: optionalString(opts.url),
    keypair: optionalString(opts.keypair),
    configFile: optionalString(opts.configFile),
    commitment: optionalString(opts.commitment),
    confirmationFinality: optionalString(opts.confirmationFinality),
    withComputeUnitPrice: typeof price === 'number' ? price : undefined,
    simulate: opts.simulate === true,
    printOnly: opts.printOnly === true,
    skipPreflight: opts.skipPreflight === true,
    debug: opts.debug === true || opts.verbose === true,
    format: format === undefined ? 'text' : parseFormat(format),
  }
}

/**
 * Everything a command handler needs, built once per command invocation
 * from the configuration file and the global options. Never mutated.
 */
export class ScillaCliContext {
  readonly connection: Connection
  readonly logger: Logger
  readonly config: ScillaConfig
  readonly rpcUrl: string
  readonly keypairPath: string
  readonly commitment: Commitment
  readonly confirmationFinality: Finality
  readonly computeUnitPrice: number
  readonly simulate: boolean
  readonly printOnly: boolean
  readonly skipPreflight: boolean
  readonly format: FormatType
  readonly confirmWaitTime: number
  readonly args: string[]
  private wallet: Promise<Wallet> | undefined

  constructor({
    connection,
    logger,
    config,
    rpcUrl,
    keypairPath,
    commitment,
    confirmationFinality,
    computeUnitPrice,
    simulate,
    printOnly,
    skipPreflight,
    format,
    args = [],
    wallet,
  }: {
    connection: Connection
    logger: Logger
    config: ScillaConfig
    rpcUrl: string
    keypairPath: string
    commitment: Commitment
    confirmationFinality: Finality
    computeUnitPrice: number
    simulate: boolean
    printOnly: boolean
    skipPreflight: boolean
    format: FormatType
    args?: string[]
    wallet?: Wallet
  }) {
    this.connection = connection
    this.logger = logger
    this.config = config
    this.rpcUrl = rpcUrl
    this.keypairPath = keypairPath
    this.commitment = commitment
    this.confirmationFinality = confirmationFinality
    this.computeUnitPrice = computeUnitPrice
    this.simulate = simulate
    this.printOnly = printOnly
    this.skipPreflight = skipPreflight
    this.format = format
    this.args = args
    this.confirmWaitTime = rpcUrl.includes('api.mainnet') ? 4000 : 0
    this.wallet = wallet === undefined ? undefined : Promise.resolve(wallet)
  }

  /**
   * The keypair file is read only by the commands that sign.
   */
  async getWallet(): Promise<Wallet> {
    if (this.wallet === undefined) {
      this.wallet = parseWalletFromOpts(
        expandHome(this.keypairPath),
        this.printOnly,
        this.args,
        this.logger,
      )
    }
    return this.wallet
  }

  async operationContext(): Promise<OperationContext> {
    return {
      connection: this.connection,
      wallet: await this.getWallet(),
      logger: this.logger,
      commitment: this.commitment,
      computeUnitPrice: this.computeUnitPrice,
      simulate: this.simulate,
      printOnly: this.printOnly,
      confirmationFinality: this.confirmationFinality,
      confirmWaitTime: this.confirmWaitTime,
      skipPreflight: this.skipPreflight,
    }
  }
}

export const defaultConnectionFactory: ConnectionFactory = (rpcUrl, commitment) =>
  new Connection(rpcUrl, commitment)

/**
 * Command line options win over the configuration file values.
 */
export async function createCliContext({
  options,
  logger,
  connectionFactory = defaultConnectionFactory,
  config,
  args,
  wallet,
}: {
  options: GlobalOptions
  logger: Logger
  connectionFactory?: ConnectionFactory
  config?: ScillaConfig
  args?: string[]
  wallet?: Wallet
}): Promise<ScillaCliContext> {
  const resolvedConfig =
    config ?? (await loadConfig({ configFile: options.configFile }))
  const rpcUrl = parseClusterUrl(options.url ?? resolvedConfig.jsonRpcUrl)
  const commitment =
    options.commitment === undefined
      ? resolvedConfig.commitment
      : parseCommitment(options.commitment)
  const confirmationFinality =
    options.confirmationFinality === undefined
      ? resolvedConfig.confirmationFinality
      : parseConfirmationFinality(options.confirmationFinality)
  const keypairPath = options.keypair ?? resolvedConfig.keypairPath

  logger.debug(
    `RPC url: ${rpcUrl}, keypair: ${keypairPath}, commitment: ${commitment}, ` +
      `config: ${resolvedConfig.source ?? 'defaults'}`,
  )
  return new ScillaCliContext({
    connection: connectionFactory(rpcUrl, commitment),
    logger,
    config: resolvedConfig,
    rpcUrl,
    keypairPath,
    commitment,
    confirmationFinality,
    computeUnitPrice:
      options.withComputeUnitPrice ?? resolvedConfig.computeUnitPrice,
    simulate: options.simulate,
    printOnly: options.printOnly,
    skipPreflight: options.skipPreflight,
    format: options.format,
    args,
    wallet,
  })
}

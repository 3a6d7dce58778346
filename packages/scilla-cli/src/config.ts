import { existsSync } from 'fs'
import { mkdir, writeFile } from 'fs/promises'
import { homedir } from 'os'
import path from 'path'

import {
  CliCommandError,
  parseAndValidate,
} from '@marinade.finance/cli-common'
import { loadFile } from '@marinade.finance/ts-common'
import { DEFAULT_KEYPAIR_PATH } from '@marinade.finance/web3js-1x'
import { Expose } from 'class-transformer'
import { IsIn, IsInt, IsOptional, IsString, Min } from 'class-validator'
import YAML from 'yaml'

import { expandHome } from './parsers'

import type { Commitment, Finality } from '@solana/web3.js'

export const CONFIG_ENV = 'SCILLA_CONFIG'
export const DEFAULT_RPC_URL = 'mainnet'
export const DEFAULT_COMMITMENT: Commitment = 'confirmed'
export const DEFAULT_CONFIRMATION_FINALITY: Finality = 'confirmed'
export const DEFAULT_COMPUTE_UNIT_PRICE = 10

export function defaultConfigPath(home = homedir()): string {
  return path.join(home, '.config', 'scilla', 'config.yml')
}

export function solanaCliConfigPath(home = homedir()): string {
  return path.join(home, '.config', 'solana', 'cli', 'config.yml')
}

/**
 * Configuration file content, snake_case keys as in the Solana CLI config.
 */
export class ConfigFileDto {
  @Expose()
  @IsOptional()
  @IsString()
  json_rpc_url?: string

  @Expose()
  @IsOptional()
  @IsString()
  keypair_path?: string

  @Expose()
  @IsOptional()
  @IsIn(['processed', 'confirmed', 'finalized'])
  commitment?: Commitment

  @Expose()
  @IsOptional()
  @IsIn(['confirmed', 'finalized'])
  confirmation_finality?: Finality

  @Expose()
  @IsOptional()
  @IsInt()
  @Min(0)
  compute_unit_price?: number
}

export const CONFIG_KEYS = [
  'json_rpc_url',
  'keypair_path',
  'commitment',
  'confirmation_finality',
  'compute_unit_price',
] as const
export type ConfigKey = (typeof CONFIG_KEYS)[number]

export type ScillaConfig = {
  jsonRpcUrl: string
  keypairPath: string
  commitment: Commitment
  confirmationFinality: Finality
  computeUnitPrice: number
  // file the values were loaded from, undefined when only defaults apply
  source?: string
}

function pickConfigKeys(input: unknown): Record<string, unknown> {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw CliCommandError.instance(
      `Expected a mapping of configuration keys, got ${JSON.stringify(input)}`,
    )
  }
  // the Solana CLI config carries keys of its own, those are not validated
  return Object.fromEntries(
    Object.entries(input).filter(([key]) => isConfigKey(key)),
  )
}

/**
 * Validates the known keys of a parsed configuration file.
 */
export async function validateConfig(input: unknown): Promise<ConfigFileDto> {
  const { data } = await parseAndValidate<ConfigFileDto>(
    JSON.stringify(pickConfigKeys(input)),
    ConfigFileDto,
  )
  return data
}

async function readConfigFile(filePath: string): Promise<ConfigFileDto> {
  let content: string
  try {
    content = await loadFile(filePath)
  } catch (err) {
    throw new CliCommandError({
      valueName: '--config-file',
      value: filePath,
      msg: 'Failed to read configuration file',
      cause: toError(err),
    })
  }
  let parsed: unknown
  try {
    parsed = YAML.parse(content)
  } catch (err) {
    throw new CliCommandError({
      valueName: '--config-file',
      value: filePath,
      msg: 'Configuration file is not a valid YAML',
      cause: toError(err),
    })
  }
  try {
    // an empty file is an empty configuration
    return await validateConfig(parsed ?? {})
  } catch (err) {
    throw new CliCommandError({
      valueName: '--config-file',
      value: filePath,
      msg: `Invalid configuration: ${toError(err).message}`,
      cause: toError(err),
    })
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

function toScillaConfig(dto: ConfigFileDto, source?: string): ScillaConfig {
  return {
    jsonRpcUrl: dto.json_rpc_url ?? DEFAULT_RPC_URL,
    keypairPath: expandHome(dto.keypair_path ?? DEFAULT_KEYPAIR_PATH),
    commitment: dto.commitment ?? DEFAULT_COMMITMENT,
    confirmationFinality:
      dto.confirmation_finality ?? DEFAULT_CONFIRMATION_FINALITY,
    computeUnitPrice: dto.compute_unit_price ?? DEFAULT_COMPUTE_UNIT_PRICE,
    source,
  }
}

/**
 * Resolution order: explicit config file (option or environment variable),
 * default config file, Solana CLI config, built-in defaults.
 */
export async function loadConfig({
  configFile,
  env = process.env,
  home = homedir(),
}: {
  configFile?: string
  env?: NodeJS.ProcessEnv
  home?: string
} = {}): Promise<ScillaConfig> {
  const explicitPath = configFile ?? env[CONFIG_ENV]
  if (explicitPath !== undefined && explicitPath !== '') {
    const resolved = expandHome(explicitPath)
    return toScillaConfig(await readConfigFile(resolved), resolved)
  }

  const defaultPath = defaultConfigPath(home)
  if (existsSync(defaultPath)) {
    return toScillaConfig(await readConfigFile(defaultPath), defaultPath)
  }

  const solanaPath = solanaCliConfigPath(home)
  if (existsSync(solanaPath)) {
    const dto = await readConfigFile(solanaPath)
    // the Solana CLI config carries no settings of the transaction executor
    return toScillaConfig(
      {
        json_rpc_url: dto.json_rpc_url,
        keypair_path: dto.keypair_path,
        commitment: dto.commitment,
      },
      solanaPath,
    )
  }

  return toScillaConfig({})
}

export function configToFile(config: ScillaConfig): Record<ConfigKey, string | number> {
  return {
    json_rpc_url: config.jsonRpcUrl,
    keypair_path: config.keypairPath,
    commitment: config.commitment,
    confirmation_finality: config.confirmationFinality,
    compute_unit_price: config.computeUnitPrice,
  }
}

async function writeConfigFile(filePath: string, content: object) {
  await mkdir(path.dirname(filePath), { recursive: true })
  await writeFile(filePath, YAML.stringify(content), 'utf-8')
}

/**
 * Writes a configuration file with the built-in defaults.
 */
export async function generateConfig({
  filePath,
  force = false,
}: {
  filePath: string
  force?: boolean
}): Promise<ScillaConfig> {
  if (existsSync(filePath) && !force) {
    throw new CliCommandError({
      valueName: '--config-file',
      value: filePath,
      msg: 'Configuration file already exists, use --force to overwrite it',
    })
  }
  const config = toScillaConfig({}, filePath)
  await writeConfigFile(filePath, configToFile(config))
  return config
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(k => k === key)
}

/**
 * Sets one key of the configuration file, creating the file when missing.
 * The whole file is validated before it is written back.
 */
export async function setConfigValue({
  filePath,
  key,
  value,
}: {
  filePath: string
  key: string
  value: string
}): Promise<ConfigFileDto> {
  if (!isConfigKey(key)) {
    throw new CliCommandError({
      valueName: 'key',
      value: key,
      msg: `Unknown configuration key, use one of: ${CONFIG_KEYS.join(', ')}`,
    })
  }
  const current = existsSync(filePath) ? await readConfigFile(filePath) : new ConfigFileDto()
  const updated: Record<string, unknown> = { ...current }
  // a value that is not a plain integer is left to fail the validation
  updated[key] =
    key === 'compute_unit_price' && /^\d+$/.test(value) ? Number(value) : value
  let dto: ConfigFileDto
  try {
    dto = await validateConfig(updated)
  } catch (err) {
    throw new CliCommandError({
      valueName: key,
      value,
      msg: `Invalid configuration: ${toError(err).message}`,
      cause: toError(err),
    })
  }
  const content = Object.fromEntries(
    Object.entries(dto).filter(([, v]) => v !== undefined),
  )
  await writeConfigFile(filePath, content)
  return dto
}

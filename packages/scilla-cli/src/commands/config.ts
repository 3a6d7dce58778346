import {
  configToFile,
  defaultConfigPath,
  generateConfig,
  loadConfig,
  setConfigValue,
  CONFIG_ENV,
  CONFIG_KEYS,
} from '../config'
import { printData } from '../format'
import { expandHome } from '../parsers'

import type { ScillaConfig } from '../config'
import type { FormatType } from '../format'
import type { Command } from 'commander'
import type { Logger } from 'pino'

function configFilePath(command: Command): string {
  const configFile: unknown = command.optsWithGlobals().configFile
  if (typeof configFile === 'string') {
    return expandHome(configFile)
  }
  const fromEnv = process.env[CONFIG_ENV]
  return fromEnv !== undefined && fromEnv !== ''
    ? expandHome(fromEnv)
    : defaultConfigPath()
}

function formatOf(command: Command): FormatType {
  const format: unknown = command.optsWithGlobals().format
  return format === 'json' || format === 'yaml' ? format : 'text'
}

/**
 * Config commands work without a connection nor a wallet.
 */
export function installConfigCommands(program: Command, logger: Logger) {
  const config = program
    .command('config')
    .description(
      'Configuration file management ' +
        `(default: ${defaultConfigPath()}, env ${CONFIG_ENV})`,
    )

  config
    .command('show')
    .description('Show the effective configuration')
    .action(async (_options: unknown, command: Command) => {
      const configFile: unknown = command.optsWithGlobals().configFile
      await showConfig({
        configFile: typeof configFile === 'string' ? configFile : undefined,
        format: formatOf(command),
      })
    })

  config
    .command('generate')
    .description('Write a configuration file with the default values')
    .option('--force', 'Overwrite an existing configuration file', false)
    .action(async ({ force }: { force: boolean }, command: Command) => {
      const filePath = configFilePath(command)
      await generateConfig({ filePath, force })
      logger.info(`Configuration file ${filePath} generated`)
    })

  config
    .command('set')
    .description(`Set a configuration value, keys: ${CONFIG_KEYS.join(', ')}`)
    .argument('<key>', 'Configuration key')
    .argument('<value>', 'Configuration value')
    .action(async (key: string, value: string, _options: unknown, command: Command) => {
      const filePath = configFilePath(command)
      await setConfigValue({ filePath, key, value })
      logger.info(`Configuration ${key} set to ${value} in ${filePath}`)
    })
}

export async function showConfig({
  configFile,
  format,
}: {
  configFile?: string
  format: FormatType
}): Promise<ScillaConfig> {
  const config = await loadConfig({ configFile })
  printData(
    { ...configToFile(config), source: config.source ?? 'defaults' },
    format,
  )
  return config
}

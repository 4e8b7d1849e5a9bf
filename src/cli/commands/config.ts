/**
 * `logbake config` command group
 *
 * Subcommands:
 *   - `logbake config show`   — display the merged configuration and where it came from
 */

import type { Command } from 'commander'
import { Option } from 'commander'
import yaml from 'js-yaml'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { ConfigError, ConfigIncompatibleFormatError, errorMessage } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions {
  projectConfigDir?: string
  globalConfigDir?: string
  format?: 'yaml' | 'json'
  env?: NodeJS.ProcessEnv
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })

  try {
    await system.load()
  } catch (err) {
    if (err instanceof ConfigError || err instanceof ConfigIncompatibleFormatError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${errorMessage(err)}\n`)
    return CONFIG_EXIT_ERROR
  }

  const config = system.getConfig()

  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(config, null, 2) + '\n')
  } else {
    const sources = system.sources.length > 0 ? system.sources.join(', ') : 'built-in defaults only'
    process.stdout.write(`# logbake configuration\n# sources: ${sources}\n\n`)
    process.stdout.write(yaml.dump(config))
  }

  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// registerConfigCommand
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Inspect logbake configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration')
    .addOption(
      new Option('--output-format <format>', 'Output format').choices(['yaml', 'json']).default('yaml'),
    )
    .option('--project-config-dir <dir>', 'Path to project .logbake/ directory')
    .option('--global-config-dir <dir>', 'Path to global .logbake/ directory')
    .action(
      async (opts: {
        outputFormat: string
        projectConfigDir?: string
        globalConfigDir?: string
      }) => {
        const exitCode = await runConfigShow({
          format: opts.outputFormat === 'json' ? 'json' : 'yaml',
          ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
        process.exitCode = exitCode
      }
    )
}

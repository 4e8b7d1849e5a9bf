/**
 * `logbake render` command
 *
 * Turns one compressed log, or every matching log in a directory, into a
 * self-contained HTML viewer.
 *
 * Usage:
 *   logbake render game.json.gz                     Writes game.html beside the input
 *   logbake render logs/ -o out/ -l 10              First 10 matches, in name order
 *   logbake render logs/ --pattern '*.jsonl.gz'     Other file names
 *   logbake render logs/ --output-format json       Machine-readable summary
 *
 * Exit codes:
 *   0 - At least one file rendered, or nothing matched
 *   1 - Every file failed, or the run could not start (config, input, template)
 */

import { InvalidArgumentError, Option } from 'commander'
import type { Command } from 'commander'
import { resolve } from 'path'
import { ConfigError, LogbakeError, errorMessage } from '../../core/errors.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { PartialLogbakeConfigSchema, type LogbakeConfig, type PartialLogbakeConfig } from '../../modules/config/config-schema.js'
import { resolveInputs } from '../../modules/file-resolver/file-resolver.js'
import { loadTemplate, resolveBundledTemplatePath } from '../../modules/template-engine/template-engine.js'
import { resolveMarker } from '../../modules/template-engine/markers.js'
import { createBatchOrchestrator } from '../../modules/batch-orchestrator/batch-orchestrator-impl.js'
import type { BatchResult } from '../../modules/batch-orchestrator/types.js'
import { COMPRESSION_FORMATS } from '../../modules/decoder/types.js'
import { MarkerPresetNameSchema } from '../../modules/template-engine/schemas.js'
import { batchResultToJson, formatBatchSummary } from '../formatters/batch-formatter.js'
import { buildJsonOutput } from '../utils/formatting.js'

const logger = createLogger('render-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RENDER_EXIT_SUCCESS = 0
export const RENDER_EXIT_ERROR = 1

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Options for the render action. Flag values are raw; they are validated
 * together with the rest of the configuration.
 */
export interface RenderActionOptions {
  input: string
  template?: string
  output?: string
  pattern?: string
  limit?: number
  marker?: string
  compression?: string
  onCollision?: string
  maxInvalid?: number
  minRecords?: number
  concurrency?: number
  verify?: boolean
  outputFormat: 'table' | 'json'
  projectConfigDir?: string
  globalConfigDir?: string
  /** Environment for LOGBAKE_* overrides (default: process.env) */
  env?: NodeJS.ProcessEnv
  version?: string
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Map CLI flags onto the config layout; absent flags leave lower layers alone */
export function buildCliOverrides(options: RenderActionOptions): PartialLogbakeConfig {
  const raw = {
    input: {
      pattern: options.pattern,
      limit: options.limit,
      compression: options.compression,
    },
    render: {
      template_path: options.template,
      marker: options.marker,
      output_dir: options.output,
      verify_output: options.verify,
    },
    validation: {
      max_invalid_records: options.maxInvalid,
      min_records: options.minRecords,
    },
    output: {
      on_collision: options.onCollision,
      concurrency: options.concurrency,
    },
  }

  const parsed = PartialLogbakeConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`)
      .join('\n')
    throw new ConfigError(`Invalid command-line options:\n${issues}`, { issues: parsed.error.issues })
  }
  return parsed.data
}

/** 0 when something rendered or there was nothing to do, 1 when everything failed */
export function exitCodeFor(result: BatchResult): number {
  return result.total === 0 || result.succeeded > 0 ? RENDER_EXIT_SUCCESS : RENDER_EXIT_ERROR
}

/** Parser for integer flags */
function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parseInt(value, 10)
}

// ---------------------------------------------------------------------------
// runRenderAction
// ---------------------------------------------------------------------------

export async function runRenderAction(options: RenderActionOptions): Promise<number> {
  const { outputFormat, version = '0.0.0' } = options

  let config: LogbakeConfig
  try {
    const system = createConfigSystem({
      cliOverrides: buildCliOverrides(options),
      ...(options.projectConfigDir !== undefined && { projectConfigDir: options.projectConfigDir }),
      ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
      ...(options.env !== undefined && { env: options.env }),
    })
    await system.load()
    config = system.getConfig()
  } catch (err) {
    process.stderr.write(`Configuration error: ${errorMessage(err)}\n`)
    return RENDER_EXIT_ERROR
  }

  setLogLevel(config.global.log_level)

  try {
    const inputs = await resolveInputs({
      input: options.input,
      pattern: config.input.pattern,
      ...(config.input.limit !== undefined && { limit: config.input.limit }),
    })
    logger.info({ root: inputs.root, matched: inputs.matchedCount }, `Found ${String(inputs.paths.length)} files`)

    const templatePath =
      config.render.template_path !== undefined
        ? resolve(config.render.template_path)
        : resolveBundledTemplatePath()
    const template = await loadTemplate(templatePath, resolveMarker(config.render.marker))

    const orchestrator = createBatchOrchestrator()
    const result = await orchestrator.run(inputs, template, {
      compression: config.input.compression,
      requiredFields: config.validation.required_fields,
      minRecords: config.validation.min_records,
      onCollision: config.output.on_collision,
      concurrency: config.output.concurrency,
      verifyOutput: config.render.verify_output,
      ...(config.render.output_dir !== undefined && { outputDir: config.render.output_dir }),
      ...(config.validation.max_invalid_records !== undefined && {
        maxInvalidRecords: config.validation.max_invalid_records,
      }),
    })

    if (outputFormat === 'json') {
      const output = buildJsonOutput('logbake render', batchResultToJson(result, inputs), version)
      process.stdout.write(JSON.stringify(output, null, 2) + '\n')
    } else {
      process.stdout.write(formatBatchSummary(result, inputs) + '\n')
    }

    return exitCodeFor(result)
  } catch (err) {
    if (!(err instanceof LogbakeError)) {
      logger.error({ err }, 'runRenderAction failed')
    }
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return RENDER_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// registerRenderCommand
// ---------------------------------------------------------------------------

/**
 * Register the `logbake render` command with the CLI program.
 *
 * @param program - Commander program instance
 * @param version - Current logbake package version (for JSON output)
 */
export function registerRenderCommand(program: Command, version = '0.0.0'): void {
  program
    .command('render <input>')
    .description('Render compressed game logs into self-contained HTML viewers')
    .option('--template <path>', 'HTML template to fill (default: bundled viewer)')
    .option('-o, --output <dir>', 'Output directory (default: beside each input)')
    .option('--pattern <glob>', 'Files to pick up from a directory (default: *.json.gz)')
    .option('-l, --limit <n>', 'Process at most n files from a directory', parseCount)
    .addOption(new Option('--marker <preset>', 'Marker preset in the template').choices(MarkerPresetNameSchema.options))
    .addOption(new Option('--compression <format>', 'Compression of the inputs').choices(COMPRESSION_FORMATS))
    .addOption(new Option('--on-collision <policy>', 'When two inputs map to one output').choices(['fail', 'overwrite']))
    .option('--max-invalid <n>', 'Fail a file with more than n invalid lines', parseCount)
    .option('--min-records <n>', 'Fail a file with fewer than n valid records', parseCount)
    .option('--concurrency <n>', 'Files processed in parallel', parseCount)
    .option('--verify', 'Check that every output reproduces its records')
    .addOption(
      new Option('--output-format <format>', 'Summary format').choices(['table', 'json']).default('table'),
    )
    .action(
      async (
        input: string,
        opts: {
          template?: string
          output?: string
          pattern?: string
          limit?: number
          marker?: string
          compression?: string
          onCollision?: string
          maxInvalid?: number
          minRecords?: number
          concurrency?: number
          verify?: boolean
          outputFormat: string
        },
      ) => {
        const exitCode = await runRenderAction({
          ...opts,
          input,
          outputFormat: opts.outputFormat === 'json' ? 'json' : 'table',
          version,
        })
        process.exitCode = exitCode
      },
    )
}

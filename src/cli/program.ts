/**
 * logbake CLI program definition
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { registerRenderCommand } from './commands/render.js'
import { registerConfigCommand } from './commands/config.js'

interface PackageManifest {
  name?: unknown
  version?: unknown
}

function isManifest(value: unknown): value is PackageManifest {
  return typeof value === 'object' && value !== null
}

/** Read the version from package.json, from either src/cli or dist/cli */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  const candidates = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of candidates) {
    let pkg: unknown
    try {
      pkg = JSON.parse(await readFile(pkgPath, 'utf-8'))
    } catch {
      // Try next path
      continue
    }
    if (isManifest(pkg) && pkg.name === 'logbake' && typeof pkg.version === 'string') {
      return pkg.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('logbake')
    .description('Bake compressed game logs into self-contained HTML replay viewers')
    .version(version, '-v, --version', 'Output the current version')

  registerRenderCommand(program, version)
  registerConfigCommand(program)

  return program
}

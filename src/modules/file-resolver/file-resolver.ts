/**
 * File Resolver — turns an input path (+ glob pattern and limit) into the
 * ordered list of files a batch run processes.
 *
 * Directory mode order: ascending lexicographic by path relative to the
 * directory (UTF-16 code unit order), then truncated to `limit`. Symbolic
 * links to regular files are matched like the files themselves.
 */

import { readdir, stat } from 'fs/promises'
import type { Dirent, Stats } from 'fs'
import { join, relative, resolve, sep } from 'path'
import { minimatch } from 'minimatch'
import { ResolutionError, errorMessage } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { COMPRESSED_EXTENSIONS } from '../decoder/types.js'
import type { InputSpec, ResolvedInputs } from './types.js'

const logger = createLogger('file-resolver')

/** Default glob for directory mode */
export const DEFAULT_PATTERN = '*.json.gz'

function hasCompressedExtension(name: string): boolean {
  const lower = name.toLowerCase()
  return COMPRESSED_EXTENSIONS.some((ext) => lower.endsWith(ext))
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/')
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

function createResolvedInputs(
  mode: 'file' | 'directory',
  root: string,
  paths: string[],
  matchedCount: number,
): ResolvedInputs {
  const frozen = Object.freeze([...paths])
  return {
    mode,
    root,
    paths: frozen,
    matchedCount,
    [Symbol.iterator]: () => frozen[Symbol.iterator](),
  }
}

async function listDirectory(dir: string, recursive: boolean): Promise<string[]> {
  let entries: Dirent[]
  try {
    entries = await readdir(dir, { withFileTypes: true, recursive })
  } catch (err) {
    throw new ResolutionError(`Cannot list directory ${dir}: ${errorMessage(err)}`, { input: dir })
  }
  const files: string[] = []
  for (const entry of entries) {
    // Dirent.path is the containing directory for recursive listings (Node 20)
    const absolute = join(entry.path, entry.name)
    if (entry.isFile() || (entry.isSymbolicLink() && (await isFileTarget(absolute)))) {
      files.push(toPosix(relative(dir, absolute)))
    }
  }
  return files
}

/** Symlinks count when they resolve to a regular file; dangling ones are skipped */
async function isFileTarget(linkPath: string): Promise<boolean> {
  try {
    return (await stat(linkPath)).isFile()
  } catch (err) {
    logger.warn({ path: linkPath, reason: errorMessage(err) }, 'Skipping unreadable symbolic link')
    return false
  }
}

/**
 * Resolve the files to process.
 *
 * @throws {ResolutionError} when the input does not exist, cannot be listed,
 *   is neither a file nor a directory, or the limit is not a non-negative integer
 */
export async function resolveInputs(spec: InputSpec): Promise<ResolvedInputs> {
  const { limit } = spec
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new ResolutionError(`Invalid limit: ${String(limit)} (expected a non-negative integer)`, { limit })
  }

  const root = resolve(spec.input)
  let info: Stats
  try {
    info = await stat(root)
  } catch (err) {
    throw new ResolutionError(`Input path does not exist: ${spec.input} (${errorMessage(err)})`, {
      input: spec.input,
    })
  }

  if (info.isFile()) {
    if (!hasCompressedExtension(root)) {
      logger.warn({ input: root }, 'Input file does not have a compressed extension')
    }
    return createResolvedInputs('file', root, [root], 1)
  }

  if (!info.isDirectory()) {
    throw new ResolutionError(`Input path is neither a file nor a directory: ${spec.input}`, {
      input: spec.input,
    })
  }

  const pattern = spec.pattern ?? DEFAULT_PATTERN
  if (!hasCompressedExtension(pattern)) {
    logger.warn({ pattern }, 'Pattern does not end with a compressed extension')
  }

  const recursive = pattern.includes('/')
  const matches = (await listDirectory(root, recursive))
    .filter((rel) => minimatch(rel, pattern))
    .sort(compareCodeUnits)

  const selected = limit !== undefined ? matches.slice(0, limit) : matches
  logger.debug(
    { root, pattern, matched: matches.length, selected: selected.length },
    'Resolved directory inputs',
  )
  return createResolvedInputs(
    'directory',
    root,
    selected.map((rel) => join(root, rel)),
    matches.length,
  )
}

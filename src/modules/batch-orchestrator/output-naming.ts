/**
 * Output file naming.
 *
 * `<basename>` minus one compressed suffix, then minus one log suffix, plus
 * `.html`:  10000_8192_a.json.gz → 10000_8192_a.html
 */

import { basename, dirname, join, resolve } from 'path'
import { COMPRESSED_EXTENSIONS } from '../decoder/types.js'

/** Data suffixes stripped after the compressed one */
export const LOG_EXTENSIONS: readonly string[] = ['.json', '.jsonl', '.ndjson', '.log', '.txt']

function stripSuffix(name: string, suffixes: readonly string[]): string {
  const lower = name.toLowerCase()
  const match = suffixes.find((suffix) => lower.endsWith(suffix) && name.length > suffix.length)
  return match !== undefined ? name.slice(0, name.length - match.length) : name
}

/** HTML file name derived from an input path */
export function deriveOutputName(inputPath: string): string {
  const name = basename(inputPath)
  return `${stripSuffix(stripSuffix(name, COMPRESSED_EXTENSIONS), LOG_EXTENSIONS)}.html`
}

/** Absolute output path for `inputPath`; beside the input when no directory is given */
export function resolveOutputPath(inputPath: string, outputDir?: string): string {
  const dir = outputDir !== undefined ? resolve(outputDir) : dirname(resolve(inputPath))
  return join(dir, deriveOutputName(inputPath))
}

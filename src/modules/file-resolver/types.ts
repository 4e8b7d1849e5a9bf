/**
 * File Resolver Module — shared types
 */

/** What the caller asked to process */
export interface InputSpec {
  /** A single compressed log file, or a directory to search */
  input: string
  /** Glob matched against paths relative to `input` in directory mode */
  pattern?: string
  /** Maximum number of files to process in directory mode */
  limit?: number
}

/**
 * Ordered, finite set of files to process. Iterating always restarts from
 * the first path.
 */
export interface ResolvedInputs extends Iterable<string> {
  readonly mode: 'file' | 'directory'
  /** The resolved absolute input path (file or directory) */
  readonly root: string
  readonly paths: readonly string[]
  /** Number of matches before the limit was applied */
  readonly matchedCount: number
}

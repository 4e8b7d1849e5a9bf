/**
 * Barrel exports for the file-resolver module.
 */

export { resolveInputs, DEFAULT_PATTERN } from './file-resolver.js'
export type { InputSpec, ResolvedInputs } from './types.js'

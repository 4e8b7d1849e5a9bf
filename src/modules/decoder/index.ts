/**
 * Barrel exports for the decoder module.
 */

export { decodeLines, decodeFile } from './decoder.js'
export { COMPRESSION_FORMATS, COMPRESSED_EXTENSIONS } from './types.js'
export type { CompressionFormat } from './types.js'

/**
 * Decoder Module — shared types
 */

/** Compression formats the decoder understands */
export const COMPRESSION_FORMATS = ['gzip', 'deflate', 'brotli'] as const

export type CompressionFormat = (typeof COMPRESSION_FORMATS)[number]

/** File suffixes recognised as compressed input */
export const COMPRESSED_EXTENSIONS: readonly string[] = ['.gz', '.br', '.zz', '.deflate']

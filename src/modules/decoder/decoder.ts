/**
 * Decoder — turns a compressed byte stream into a lazy sequence of text lines.
 *
 * Lines are yielded in original order, one per `\n`. A trailing `\r` is
 * stripped and a final unterminated line is still yielded. Decompression
 * failures (bad header, checksum mismatch, truncation) and text that is not
 * valid UTF-8 surface as `DecodeError` from the iterator.
 */

import { createReadStream } from 'fs'
import { stat } from 'fs/promises'
import type { Readable, Transform } from 'stream'
import { TextDecoder } from 'util'
import { createBrotliDecompress, createGunzip, createInflate } from 'zlib'
import { DecodeError, errorMessage } from '../../core/errors.js'
import type { CompressionFormat } from './types.js'

function createDecompressor(format: CompressionFormat): Transform {
  switch (format) {
    case 'gzip':
      return createGunzip()
    case 'deflate':
      return createInflate()
    case 'brotli':
      return createBrotliDecompress()
  }
}

function toDecodeError(err: unknown, format: CompressionFormat, source?: string): DecodeError {
  if (err instanceof DecodeError) return err
  const code =
    typeof err === 'object' && err !== null && 'code' in err ? String(err.code) : undefined
  const where = source !== undefined ? ` in ${source}` : ''
  return new DecodeError(`Invalid ${format} data${where}: ${errorMessage(err)}`, {
    format,
    ...(source !== undefined && { source }),
    ...(code !== undefined && { zlibCode: code }),
  })
}

function decodeUtf8(decoder: TextDecoder, chunk: Uint8Array | undefined, source?: string): string {
  try {
    return chunk === undefined ? decoder.decode() : decoder.decode(chunk, { stream: true })
  } catch (err) {
    const where = source !== undefined ? ` in ${source}` : ''
    throw new DecodeError(`Invalid UTF-8 text${where}: ${errorMessage(err)}`, {
      encoding: 'utf-8',
      ...(source !== undefined && { source }),
    })
  }
}

/**
 * Lazily decompress `input` and yield its text lines.
 *
 * @param input  - readable stream of compressed bytes
 * @param format - compression format of the stream (default gzip)
 * @param source - optional label (usually the file path) used in error messages
 */
export async function* decodeLines(
  input: Readable,
  format: CompressionFormat = 'gzip',
  source?: string,
): AsyncGenerator<string, void, undefined> {
  const decompressor = createDecompressor(format)
  // Propagate read errors (ENOENT, EACCES...) into the decompressor so the
  // iterator below rejects instead of hanging.
  input.on('error', (err) => decompressor.destroy(err))
  input.pipe(decompressor)
  const utf8 = new TextDecoder('utf-8', { fatal: true })

  let pending = ''
  try {
    for await (const chunk of decompressor) {
      pending += decodeUtf8(utf8, chunk instanceof Uint8Array ? chunk : Buffer.from(String(chunk)), source)
      let newline = pending.indexOf('\n')
      while (newline !== -1) {
        yield stripCarriageReturn(pending.slice(0, newline))
        pending = pending.slice(newline + 1)
        newline = pending.indexOf('\n')
      }
    }
    // A sequence cut off by the end of the stream
    pending += decodeUtf8(utf8, undefined, source)
  } catch (err) {
    throw toDecodeError(err, format, source)
  } finally {
    input.unpipe(decompressor)
    input.destroy()
    decompressor.destroy()
  }

  if (pending.length > 0) {
    yield stripCarriageReturn(pending)
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line
}

/**
 * Decode the compressed file at `filePath` line by line.
 *
 * A zero-byte file is rejected up front: there is no compressed header to read.
 */
export async function* decodeFile(
  filePath: string,
  format: CompressionFormat = 'gzip',
): AsyncGenerator<string, void, undefined> {
  let size: number
  try {
    size = (await stat(filePath)).size
  } catch (err) {
    throw new DecodeError(`Cannot read ${filePath}: ${errorMessage(err)}`, { source: filePath })
  }
  if (size === 0) {
    throw new DecodeError(`Empty input file: ${filePath}`, { source: filePath, format })
  }

  yield* decodeLines(createReadStream(filePath), format, filePath)
}

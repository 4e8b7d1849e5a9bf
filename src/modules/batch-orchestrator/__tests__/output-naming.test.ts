import { describe, it, expect } from 'vitest'
import { join, resolve } from 'path'
import { deriveOutputName, resolveOutputPath } from '../output-naming.js'

describe('deriveOutputName()', () => {
  it.each([
    ['10000_8192_a.json.gz', '10000_8192_a.html'],
    ['game.jsonl.gz', 'game.html'],
    ['game.ndjson.br', 'game.html'],
    ['GAME.JSON.GZ', 'GAME.html'],
    ['game.gz', 'game.html'],
    ['game.json', 'game.html'],
    ['archive.tar.gz', 'archive.tar.html'],
    ['noext', 'noext.html'],
    ['.gz', '.gz.html'],
  ])('%s → %s', (input, expected) => {
    expect(deriveOutputName(input)).toBe(expected)
  })

  it('only looks at the base name', () => {
    expect(deriveOutputName('/logs/2024.06/a.json.gz')).toBe('a.html')
  })
})

describe('resolveOutputPath()', () => {
  it('places the output in the given directory', () => {
    expect(resolveOutputPath('/logs/a.json.gz', '/out')).toBe(join('/out', 'a.html'))
  })

  it('places the output beside the input by default', () => {
    expect(resolveOutputPath('/logs/a.json.gz')).toBe(join('/logs', 'a.html'))
  })

  it('resolves a relative output directory against the working directory', () => {
    expect(resolveOutputPath('a.json.gz', 'out')).toBe(join(resolve('out'), 'a.html'))
  })
})

/**
 * Unit tests for resolveInputs()
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { resolveInputs } from '../file-resolver.js'
import { ResolutionError } from '../../../core/errors.js'

let tempDir: string

function touch(...parts: string[]): string {
  const path = join(tempDir, ...parts)
  writeFileSync(path, 'x')
  return path
}

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'logbake-resolver-test-'))
})

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true })
})

describe('resolveInputs() — file mode', () => {
  it('yields exactly the one file', async () => {
    const path = touch('game.json.gz')
    const inputs = await resolveInputs({ input: path })
    expect(inputs.mode).toBe('file')
    expect([...inputs]).toEqual([path])
  })

  it('ignores the limit for a single file', async () => {
    const path = touch('game.json.gz')
    const inputs = await resolveInputs({ input: path, limit: 0 })
    expect(inputs.paths).toEqual([path])
  })

  it('accepts a file without a compressed extension', async () => {
    const path = touch('game.json')
    expect((await resolveInputs({ input: path })).paths).toEqual([path])
  })
})

describe('resolveInputs() — directory mode', () => {
  it('matches the default pattern in lexicographic order', async () => {
    touch('b.json.gz')
    touch('a.json.gz')
    touch('C.json.gz')
    touch('notes.txt')
    touch('a.json')
    const inputs = await resolveInputs({ input: tempDir })
    expect(inputs.mode).toBe('directory')
    expect(inputs.paths).toEqual([
      join(tempDir, 'C.json.gz'),
      join(tempDir, 'a.json.gz'),
      join(tempDir, 'b.json.gz'),
    ])
  })

  it('applies a custom pattern', async () => {
    touch('x.log.gz')
    touch('y.json.gz')
    const inputs = await resolveInputs({ input: tempDir, pattern: '*.log.gz' })
    expect(inputs.paths).toEqual([join(tempDir, 'x.log.gz')])
  })

  it('only lists the top level for patterns without a slash', async () => {
    mkdirSync(join(tempDir, 'nested'))
    touch('nested', 'deep.json.gz')
    touch('top.json.gz')
    expect((await resolveInputs({ input: tempDir })).paths).toEqual([join(tempDir, 'top.json.gz')])
  })

  it('searches subdirectories for patterns with a slash', async () => {
    mkdirSync(join(tempDir, 'day2'))
    mkdirSync(join(tempDir, 'day1'))
    touch('day2', 'g.json.gz')
    touch('day1', 'g.json.gz')
    touch('top.json.gz')
    const inputs = await resolveInputs({ input: tempDir, pattern: '**/*.json.gz' })
    expect(inputs.paths).toEqual([
      join(tempDir, 'day1', 'g.json.gz'),
      join(tempDir, 'day2', 'g.json.gz'),
      join(tempDir, 'top.json.gz'),
    ])
  })

  it('processes exactly L files in documented order when limit < matches', async () => {
    for (const name of ['05', '01', '04', '02', '03']) touch(`${name}.json.gz`)
    const inputs = await resolveInputs({ input: tempDir, limit: 2 })
    expect(inputs.paths).toEqual([join(tempDir, '01.json.gz'), join(tempDir, '02.json.gz')])
    expect(inputs.matchedCount).toBe(5)
  })

  it('keeps every match when the limit is larger', async () => {
    touch('a.json.gz')
    const inputs = await resolveInputs({ input: tempDir, limit: 10 })
    expect(inputs.paths).toHaveLength(1)
  })

  it('yields nothing for limit 0', async () => {
    touch('a.json.gz')
    expect((await resolveInputs({ input: tempDir, limit: 0 })).paths).toEqual([])
  })

  it('returns an empty set when nothing matches', async () => {
    touch('readme.md')
    const inputs = await resolveInputs({ input: tempDir })
    expect(inputs.paths).toEqual([])
    expect(inputs.matchedCount).toBe(0)
  })

  it('follows symbolic links to regular files', async () => {
    const logs = mkdtempSync(join(tmpdir(), 'logbake-resolver-target-'))
    try {
      const target = join(logs, 'real.json.gz')
      writeFileSync(target, 'x')
      symlinkSync(target, join(tempDir, 'link.json.gz'))
      expect((await resolveInputs({ input: tempDir })).paths).toEqual([join(tempDir, 'link.json.gz')])
    } finally {
      rmSync(logs, { recursive: true, force: true })
    }
  })

  it('skips dangling symbolic links and links to directories', async () => {
    mkdirSync(join(tempDir, 'sub.json.gz'))
    symlinkSync(join(tempDir, 'sub.json.gz'), join(tempDir, 'dir-link.json.gz'))
    symlinkSync(join(tempDir, 'gone.json.gz'), join(tempDir, 'dangling.json.gz'))
    touch('real.json.gz')
    expect((await resolveInputs({ input: tempDir })).paths).toEqual([join(tempDir, 'real.json.gz')])
  })

  it('restarts from the first path on every iteration', async () => {
    touch('a.json.gz')
    touch('b.json.gz')
    const inputs = await resolveInputs({ input: tempDir })
    expect([...inputs]).toEqual([...inputs])
    expect([...inputs]).toHaveLength(2)
  })
})

describe('resolveInputs() — errors', () => {
  it('throws ResolutionError when the path does not exist', async () => {
    await expect(resolveInputs({ input: join(tempDir, 'missing') })).rejects.toBeInstanceOf(ResolutionError)
  })

  it('throws ResolutionError for a negative or fractional limit', async () => {
    await expect(resolveInputs({ input: tempDir, limit: -1 })).rejects.toThrow(/Invalid limit/)
    await expect(resolveInputs({ input: tempDir, limit: 1.5 })).rejects.toThrow(/Invalid limit/)
  })
})

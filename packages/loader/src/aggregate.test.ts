/**
 * Tests for config-driven aggregation.
 *
 * WHY: An update replaces repository contents with whatever aggregation
 * returns, so a partial result must never escape a failed run.
 */

import type { FileSystem, Instructions } from '@projectkit/core'
import {
  MemoryFileSystem,
  NoInstructionsFoundError,
  SourceLoadError,
  UriSchemeNotFoundError,
  findError,
} from '@projectkit/core'
import { DriverRegistry, LocalDriver, Resolver } from '@projectkit/source'
import { beforeEach, describe, expect, test, vi } from 'vitest'

import { loadFromSources } from './aggregate.js'
import { FlatFileResourceLoader } from './flat-file.js'
import { instructionsDefinition } from './resources.js'

describe('loadFromSources', () => {
  let resolver: Resolver
  const loader = new FlatFileResourceLoader(instructionsDefinition)

  beforeEach(() => {
    const rootFs = new MemoryFileSystem({
      'project/rules/a.yaml': 'category: style\nrules:\n  - Use two spaces\n',
      'project/more/b.yaml': 'category: testing\nrules:\n  - Test behaviour\n',
      'project/empty/README.md': 'nothing here',
    })
    const registry = new DriverRegistry()
    registry.registerDriver(new LocalDriver({ rootFs, baseDir: '/project' }))
    resolver = new Resolver(registry)
  })

  test('returns an empty list for zero sources', async () => {
    const resolve = vi.spyOn(resolver, 'resolve')

    expect(await loadFromSources([], resolver, loader)).toEqual([])
    expect(resolve).not.toHaveBeenCalled()
  })

  test('concatenates sources in order', async () => {
    const result = await loadFromSources(
      [{ uri: 'local://more' }, { uri: 'local://rules' }],
      resolver,
      loader
    )

    expect(result.map((r: Instructions) => r.category)).toEqual(['testing', 'style'])
  })

  test('stops at the first source that fails to resolve', async () => {
    const resolve = vi.spyOn(resolver, 'resolve')

    const err = await loadFromSources(
      [{ uri: 'local://rules' }, { uri: 'no-scheme' }, { uri: 'local://more' }],
      resolver,
      loader
    ).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(SourceLoadError)
    if (err instanceof SourceLoadError) {
      expect(err.stage).toBe('resolve')
      expect(err.uri).toBe('no-scheme')
      expect(findError(err, UriSchemeNotFoundError)).toBeDefined()
    }
    expect(resolve.mock.calls.map(([uri]) => uri)).toEqual(['local://rules', 'no-scheme'])
  })

  test('a source without resources fails the load stage', async () => {
    const resolve = vi.spyOn(resolver, 'resolve')

    const err = await loadFromSources(
      [{ uri: 'local://rules' }, { uri: 'local://empty' }, { uri: 'local://more' }],
      resolver,
      loader
    ).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(SourceLoadError)
    if (err instanceof SourceLoadError) {
      expect(err.stage).toBe('load')
      expect(err.uri).toBe('local://empty')
      expect(err.code).toBe('NO_RESOURCES_FOUND')
      expect(findError(err, NoInstructionsFoundError)).toBeDefined()
    }
    expect(resolve.mock.calls.map(([uri]) => uri)).toEqual(['local://rules', 'local://empty'])
  })

  test('logs each loaded source at debug level', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }

    await loadFromSources([{ uri: 'local://rules' }], resolver, loader, { logger })

    expect(logger.debug).toHaveBeenCalledWith('Source loaded.', { uri: 'local://rules', count: 1 })
  })

  test('accepts any resolver', async () => {
    const fs: FileSystem = new MemoryFileSystem({ 'x.yaml': 'category: x\nrules:\n  - y\n' })

    const result = await loadFromSources([{ uri: 'custom://x' }], { resolve: async () => fs }, loader)

    expect(result).toEqual([{ category: 'x', rules: ['y'] }])
  })
})

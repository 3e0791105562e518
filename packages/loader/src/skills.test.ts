import {
  MemoryFileSystem,
  NoSkillsFoundError,
  ResourceReadError,
  ResourceValidationError,
} from '@projectkit/core'
import { describe, expect, test } from 'vitest'

import { resolveScriptContentType, SkillLoader } from './skills.js'

const loader = new SkillLoader()

const LINT_METADATA = 'name: lint\ndescription: Run the linters\n'

describe('resolveScriptContentType', () => {
  test('maps known extensions', () => {
    expect(resolveScriptContentType('run.sh')).toBe('application/x-sh')
    expect(resolveScriptContentType('run.zsh')).toBe('application/x-sh')
    expect(resolveScriptContentType('run.csh')).toBe('application/x-csh')
    expect(resolveScriptContentType('run.fish')).toBe('application/x-fish')
    expect(resolveScriptContentType('tool.py')).toBe('text/x-python')
    expect(resolveScriptContentType('tool.js')).toBe('text/javascript')
    expect(resolveScriptContentType('tool.tcl')).toBe('application/x-tcl')
  })

  test('falls back to octet-stream', () => {
    expect(resolveScriptContentType('data.bin')).toBe('application/octet-stream')
    expect(resolveScriptContentType('Makefile')).toBe('application/octet-stream')
  })

  test('matches extensions case-sensitively', () => {
    expect(resolveScriptContentType('RUN.SH')).toBe('application/octet-stream')
  })
})

describe('SkillLoader', () => {
  test('loads metadata, instructions and scripts', async () => {
    const fs = new MemoryFileSystem({
      'lint/metadata.yaml': LINT_METADATA,
      'lint/instructions.md': '# Lint\n\nRun `make lint`.\n',
      'lint/scripts/run.sh': '#!/bin/sh\nmake lint\n',
      'lint/scripts/blob.bin': Buffer.from([0xff, 0x00, 0xfe]),
      'lint/scripts/nested/ignored.sh': 'echo nested',
    })

    const skills = await loader.load(fs)

    expect(skills).toEqual([
      {
        metadata: { name: 'lint', description: 'Run the linters' },
        instructions: '# Lint\n\nRun `make lint`.\n',
        scripts: {
          'blob.bin': {
            contentType: 'application/octet-stream',
            content: Buffer.from([0xff, 0x00, 0xfe]),
          },
          'run.sh': {
            contentType: 'application/x-sh',
            content: Buffer.from('#!/bin/sh\nmake lint\n'),
          },
        },
      },
    ])
  })

  test('a skill without scripts has none', async () => {
    const fs = new MemoryFileSystem({
      'lint/metadata.yaml': LINT_METADATA,
      'lint/instructions.md': '',
    })

    const [skill] = await loader.load(fs)

    expect(skill?.instructions).toBe('')
    expect(skill?.scripts).toEqual({})
  })

  test('keeps a script named like an object prototype key', async () => {
    const fs = new MemoryFileSystem({
      'x/metadata.yaml': 'name: x\ndescription: odd script names\n',
      'x/instructions.md': '',
      'x/scripts/__proto__': 'echo proto\n',
    })

    const [skill] = await loader.load(fs)

    expect(Object.entries(skill?.scripts ?? {})).toEqual([
      [
        '__proto__',
        { contentType: 'application/octet-stream', content: Buffer.from('echo proto\n') },
      ],
    ])
  })

  test('drops undeclared metadata fields', async () => {
    const fs = new MemoryFileSystem({
      'lint/metadata.yaml': `${LINT_METADATA}version: 2\n`,
      'lint/instructions.md': '',
    })

    const [skill] = await loader.load(fs)

    expect(skill?.metadata).toEqual({ name: 'lint', description: 'Run the linters' })
  })

  test('top-level files are not skills', async () => {
    const fs = new MemoryFileSystem({ 'README.md': '# skills' })

    await expect(loader.load(fs)).rejects.toBeInstanceOf(NoSkillsFoundError)
  })

  test('missing instructions fail the whole load', async () => {
    const fs = new MemoryFileSystem({
      'a/metadata.yaml': 'name: a\ndescription: first\n',
      'a/instructions.md': 'ok',
      'b/metadata.yaml': 'name: b\ndescription: second\n',
    })

    const err = await loader.load(fs).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ResourceReadError)
    if (err instanceof ResourceReadError) {
      expect(err.path).toBe('b/instructions.md')
      expect(err.kind).toBe('skill')
    }
  })

  test('missing metadata is a read error', async () => {
    const fs = new MemoryFileSystem({ 'a/instructions.md': 'ok' })

    const err = await loader.load(fs).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ResourceReadError)
    expect(err instanceof ResourceReadError && err.path).toBe('a/metadata.yaml')
  })

  test('invalid metadata is a validation error', async () => {
    const fs = new MemoryFileSystem({
      'a/metadata.yaml': `name: a\ndescription: ${'d'.repeat(257)}\n`,
      'a/instructions.md': 'ok',
    })

    const err = await loader.load(fs).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ResourceValidationError)
    if (err instanceof ResourceValidationError) {
      expect(err.validationErrors.map((e) => e.path)).toEqual(['/description'])
    }
  })
})

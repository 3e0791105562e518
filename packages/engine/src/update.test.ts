/**
 * Tests for the update action.
 *
 * WHY: Update is the one operation that rewrites repositories, so these
 * tests pin down what ends up stored and what happens on failure.
 */

import type { ProjectConfig } from '@projectkit/core'
import {
  mergeProjectConfigs,
  MemoryFileSystem,
  ResourceAlreadyExistsError,
  SourceLoadError,
} from '@projectkit/core'
import { DriverRegistry, LocalDriver, Resolver } from '@projectkit/source'
import type { Repositories } from '@projectkit/store'
import { provideRepositories } from '@projectkit/store'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import { loadResources, runUpdate } from './update.js'

const STANDARD_YAML = `
metadata:
  id: commit-messages
  name: Commit Messages
  version: 1.0.0
  tags: [git]
  scope:
    languages: [en]
specification:
  purpose: Keep commit history readable.
  goals:
    - Every commit explains its change.
requirements:
  rules:
    - level: must
      statement: Subject line is written in the imperative.
      rationale: Reads like an instruction to the codebase.
examples:
  good:
    - title: Imperative subject
      language: text
      snippet: Add retry to fetch
      reason: Short and imperative.
`

const WORKFLOW_YAML = `
metadata:
  id: release
  name: Release
  description: Cut a release
  version: 2.0.0
steps:
  - id: tag
    name: Tag
    description: Tag the commit
    instructions:
      - git tag
`

const RULEBOOK_YAML = `
ai:
  instruction:
    sources:
      - uri: rulebook://instructions
  mcp:
    sources:
      - uri: rulebook://mcp
`

function hostFiles(): Record<string, string> {
  return {
    'work/standards/commits.yaml': STANDARD_YAML,
    'work/instructions/style.yaml': 'category: style\nrules:\n  - Use two spaces\n',
    'work/skills/lint/metadata.yaml': 'name: lint\ndescription: Run the linters\n',
    'work/skills/lint/instructions.md': 'Run make lint.',
    'work/skills/lint/scripts/run.sh': '#!/bin/sh\nmake lint\n',
    'work/workflows/release.yaml': WORKFLOW_YAML,
    'work/mcp/files.yaml': 'name: files\nstdio:\n  executablePath: /usr/bin/files-mcp\n',
    'shared/book/rulebook.yaml': RULEBOOK_YAML,
    'shared/book/instructions/style.yaml': 'category: style\nrules:\n  - No tabs\n',
    'shared/book/mcp/search.yaml': 'name: search\nstdio:\n  executablePath: /usr/bin/search\n',
  }
}

const FULL_CONFIG: ProjectConfig = {
  rulebook: { sources: [{ uri: 'local:///shared/book' }] },
  ai: {
    instruction: { sources: [{ uri: 'local://instructions' }] },
    skill: { sources: [{ uri: 'local://skills' }] },
    workflow: { sources: [{ uri: 'local://workflows' }] },
    mcp: { sources: [{ uri: 'local://mcp' }] },
  },
  doc: { standard: { sources: [{ uri: 'local://standards' }] } },
}

describe('runUpdate', () => {
  let host: MemoryFileSystem
  let resolver: Resolver
  let repositories: Repositories

  beforeEach(async () => {
    host = new MemoryFileSystem(hostFiles())
    const registry = new DriverRegistry()
    registry.registerDriver(new LocalDriver({ rootFs: host, baseDir: '/work' }))
    resolver = new Resolver(registry)
    repositories = await provideRepositories(host.scope('work'))
  })

  it('stores every kind and merges rulebook contents', async () => {
    const config = mergeProjectConfigs([{ path: '/work/.projectkit.yaml', config: FULL_CONFIG }])

    const result = await runUpdate({ config, resolver, repositories })

    expect(result).toEqual({
      standards: 1,
      instructions: 2,
      skills: 1,
      workflows: 1,
      mcpServers: 2,
    })
    expect(await repositories.instructions.getAll()).toEqual([
      { category: 'style', rules: ['Use two spaces', 'No tabs'] },
    ])
    expect((await repositories.mcpServers.getAll()).map((s) => s.name)).toEqual([
      'files',
      'search',
    ])
    const skill = await repositories.skills.getSkillByName('lint')
    expect(skill.scripts['run.sh']?.content.toString('utf-8')).toBe('#!/bin/sh\nmake lint\n')
    expect((await repositories.workflows.getWorkflowById('release')).metadata.version).toBe(
      '2.0.0'
    )
    expect((await repositories.standards.getAll()).map((s) => s.metadata.id)).toEqual([
      'commit-messages',
    ])
  })

  it('replaces what an earlier update stored', async () => {
    const first = mergeProjectConfigs([{ path: 'a', config: FULL_CONFIG }])
    await runUpdate({ config: first, resolver, repositories })

    const second = mergeProjectConfigs([
      { path: 'a', config: { ai: { mcp: { sources: [{ uri: 'local://mcp' }] } } } },
    ])
    const result = await runUpdate({ config: second, resolver, repositories })

    expect(result).toEqual({ standards: 0, instructions: 0, skills: 0, workflows: 0, mcpServers: 1 })
    expect(await repositories.skills.getAll()).toEqual([])
    expect((await repositories.mcpServers.getAll()).map((s) => s.name)).toEqual(['files'])
  })

  it('logs one count per repository in storing order', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    const config = mergeProjectConfigs([{ path: 'a', config: FULL_CONFIG }])

    await runUpdate({ config, resolver, repositories, logger })

    expect(logger.info.mock.calls).toEqual([
      ['Standards added to repository.', { count: 1 }],
      ['Instructions added to repository.', { count: 2 }],
      ['Skills added to repository.', { count: 1 }],
      ['Workflows added to repository.', { count: 1 }],
      ['MCP servers added to repository.', { count: 2 }],
    ])
  })

  it('touches no repository when loading fails', async () => {
    await repositories.mcpServers.addMcpServer({
      name: 'kept',
      stdio: { executablePath: '/usr/bin/kept' },
    })
    const config = mergeProjectConfigs([
      {
        path: 'a',
        config: {
          ai: {
            mcp: { sources: [{ uri: 'local://mcp' }] },
            skill: { sources: [{ uri: 'local://missing' }] },
          },
        },
      },
    ])

    const err = await runUpdate({ config, resolver, repositories }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(SourceLoadError)
    expect(err instanceof SourceLoadError && err.uri).toBe('local://missing')
    expect((await repositories.mcpServers.getAll()).map((s) => s.name)).toEqual(['kept'])
  })

  it('stores loaded resources without their undeclared fields', async () => {
    await host.writeFile(
      'work/skills/lint/metadata.yaml',
      'name: lint\ndescription: Run the linters\nversion: 2\n'
    )
    await host.writeFile(
      'work/mcp/files.yaml',
      'name: files\nsecretToken: placeholder\nstdio:\n  executablePath: /usr/bin/files-mcp\n'
    )
    const config = mergeProjectConfigs([
      {
        path: 'a',
        config: {
          ai: {
            skill: { sources: [{ uri: 'local://skills' }] },
            mcp: { sources: [{ uri: 'local://mcp' }] },
          },
        },
      },
    ])

    const loaded = await loadResources(config, resolver)
    await runUpdate({ config, resolver, repositories })

    expect(loaded.skills[0]?.metadata).toEqual({ name: 'lint', description: 'Run the linters' })
    expect(await repositories.skills.getSkillByName('lint')).toEqual(loaded.skills[0])

    const mcpDir = 'work/.projectkit/repository/ai/mcp'
    const files = await host.readDir(mcpDir)
    expect(files).toHaveLength(1)
    const stored: unknown = JSON.parse(
      (await host.readFile(`${mcpDir}/${files[0]?.name ?? ''}`)).toString('utf-8')
    )
    expect(stored).toEqual({ name: 'files', stdio: { executablePath: '/usr/bin/files-mcp' } })
  })

  it('aborts on a duplicate workflow id', async () => {
    const config = mergeProjectConfigs([
      {
        path: 'a',
        config: {
          ai: {
            workflow: { sources: [{ uri: 'local://workflows' }, { uri: 'local://workflows' }] },
          },
        },
      },
    ])

    await expect(runUpdate({ config, resolver, repositories })).rejects.toBeInstanceOf(
      ResourceAlreadyExistsError
    )
  })
})

describe('loadResources', () => {
  it('loads nothing for an empty config', async () => {
    const resolver = { resolve: vi.fn(async () => new MemoryFileSystem()) }

    const resources = await loadResources(mergeProjectConfigs([]), resolver)

    expect(resources).toEqual({
      standards: [],
      instructions: [],
      skills: [],
      workflows: [],
      mcpServers: [],
    })
    expect(resolver.resolve).not.toHaveBeenCalled()
  })
})

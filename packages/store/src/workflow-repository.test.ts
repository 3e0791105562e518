import type { Workflow } from '@projectkit/core'
import {
  InvalidResourceIdError,
  MemoryFileSystem,
  ResourceAlreadyExistsError,
  ResourceNotFoundError,
} from '@projectkit/core'
import { beforeEach, describe, expect, it } from 'vitest'

import { isValidWorkflowId, WorkflowRepository } from './workflow-repository.js'

function workflow(id: string): Workflow {
  return {
    metadata: { id, name: id, description: `The ${id} workflow`, version: '1.2.0' },
    state: { ticket: { type: 'string' } },
    steps: [{ id: 'start', name: 'Start', description: 'Begin', instructions: ['Open a branch'] }],
  }
}

describe('isValidWorkflowId', () => {
  it('accepts letters, digits and dashes', () => {
    expect(isValidWorkflowId('Release-2')).toBe(true)
  })

  it('rejects anything else', () => {
    expect(isValidWorkflowId('')).toBe(false)
    expect(isValidWorkflowId('a_b')).toBe(false)
    expect(isValidWorkflowId('../x')).toBe(false)
    expect(isValidWorkflowId('a b')).toBe(false)
  })
})

describe('WorkflowRepository', () => {
  let fs: MemoryFileSystem
  let repo: WorkflowRepository

  beforeEach(() => {
    fs = new MemoryFileSystem()
    repo = new WorkflowRepository(fs)
  })

  it('stores a workflow under its id', async () => {
    await repo.addWorkflow(workflow('release'))

    expect(await fs.readDir('')).toEqual([{ name: 'release.json', isDirectory: false }])
    expect(await repo.getAll()).toEqual([workflow('release')])
  })

  it('rejects an invalid id', async () => {
    const err = await repo.addWorkflow(workflow('../escape')).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(InvalidResourceIdError)
    expect(err instanceof InvalidResourceIdError && err.code).toBe('INVALID_RESOURCE_ID')
    expect(await fs.readDir('')).toEqual([])
  })

  it('rejects a duplicate id', async () => {
    await repo.addWorkflow(workflow('release'))

    await expect(repo.addWorkflow(workflow('release'))).rejects.toBeInstanceOf(
      ResourceAlreadyExistsError
    )
  })

  it('finds a workflow by id', async () => {
    await repo.addWorkflow(workflow('release'))
    await repo.addWorkflow(workflow('hotfix'))

    expect(await repo.getWorkflowById('release')).toEqual(workflow('release'))
    expect((await repo.getAll()).map((w) => w.metadata.id)).toEqual(['hotfix', 'release'])
  })

  it('reports a missing workflow', async () => {
    const err = await repo.getWorkflowById('release').catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ResourceNotFoundError)
    expect(err instanceof ResourceNotFoundError && err.message).toBe(
      'workflow not found: "release"'
    )
  })
})

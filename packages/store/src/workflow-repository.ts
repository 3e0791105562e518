/**
 * Workflow repository
 *
 * Unlike the other kinds, a workflow is stored under its own id
 * (`<id>.json`), so ids are restricted to characters safe in a file name.
 */

import type { FileSystem, Workflow } from '@projectkit/core'
import {
  InvalidResourceIdError,
  ResourceAlreadyExistsError,
  ResourceNotFoundError,
  validateWorkflow,
} from '@projectkit/core'

import type { RepositoryCodec } from './fs-repository.js'
import { FsRepository, STORED_FILE_EXTENSION } from './fs-repository.js'

const WORKFLOW_ID_PATTERN = /^[A-Za-z0-9-]+$/

export function isValidWorkflowId(id: string): boolean {
  return WORKFLOW_ID_PATTERN.test(id)
}

export const workflowCodec: RepositoryCodec<Workflow> = {
  kind: 'workflow',
  identify: (workflow) => workflow.metadata.id,
  encode: (workflow) => workflow,
  decode: validateWorkflow,
}

export class WorkflowRepository extends FsRepository<Workflow> {
  constructor(fs: FileSystem) {
    super(fs, workflowCodec)
  }

  /**
   * @throws InvalidResourceIdError if the id is not alphanumeric with dashes
   * @throws ResourceAlreadyExistsError if a workflow with this id is stored
   */
  async addWorkflow(workflow: Workflow): Promise<void> {
    const id = workflow.metadata.id
    if (!isValidWorkflowId(id)) {
      throw new InvalidResourceIdError('workflow', id)
    }

    await this.withWriteLock(async () => {
      const existing = await this.readEntries()
      if (existing.some((entry) => entry.identity === id)) {
        throw new ResourceAlreadyExistsError('workflow', id)
      }
      await this.writeStored(`${id}${STORED_FILE_EXTENSION}`, workflow)
    })
  }

  /**
   * @throws ResourceNotFoundError if no stored workflow has this id
   */
  async getWorkflowById(id: string): Promise<Workflow> {
    const workflows = await this.getAll()
    const workflow = workflows.find((w) => w.metadata.id === id)
    if (workflow === undefined) {
      throw new ResourceNotFoundError('workflow', id)
    }
    return workflow
  }
}

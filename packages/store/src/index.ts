/**
 * @projectkit/store
 *
 * Filesystem-backed repositories under <project-root>/.projectkit/repository.
 */

export {
  FsRepository,
  isStoredFile,
  STORED_FILE_EXTENSION,
} from './fs-repository.js'
export type { RepositoryCodec, StoredEntry } from './fs-repository.js'
export { InstructionRepository, instructionsCodec } from './instruction-repository.js'
export { McpServerRepository, mcpServerCodec } from './mcp-repository.js'
export {
  getRepositoryPath,
  getRepositoryRoot,
  REPOSITORY_DIR,
  REPOSITORY_KIND_DIRS,
  RepositoryPaths,
} from './paths.js'
export {
  provideInstructionRepository,
  provideMcpServerRepository,
  provideRepositories,
  provideSkillRepository,
  provideStandardRepository,
  provideWorkflowRepository,
} from './providers.js'
export type { Repositories } from './providers.js'
export {
  deserializeSkill,
  serializeSkill,
  skillCodec,
  SkillRepository,
} from './skill-repository.js'
export { StandardRepository, standardCodec } from './standard-repository.js'
export { isValidWorkflowId, WorkflowRepository, workflowCodec } from './workflow-repository.js'

export {
  emptyProjectConfig,
  loadProjectConfig,
  mergeProjectConfigs,
  parseProjectConfig,
  PROJECT_CONFIG_FILENAME,
  readProjectConfig,
  resolveProjectConfigPaths,
} from './project-config.js'
export type { ProjectConfigLocations } from './project-config.js'
export { findProjectRoot } from './project-root.js'

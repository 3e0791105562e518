/**
 * @projectkit/loader
 *
 * Resource loaders: read a resolved source, parse and validate what it holds,
 * and aggregate across configured sources.
 */

export { loadFromSources } from './aggregate.js'
export type { LoadFromSourcesOptions } from './aggregate.js'
export { FlatFileResourceLoader, isYamlFile, readRootEntries } from './flat-file.js'
export type { ResourceDefinition, ResourceLoader } from './resource-loader.js'
export {
  createResourceLoaders,
  instructionsDefinition,
  mcpServerDefinition,
  standardDefinition,
  workflowDefinition,
} from './resources.js'
export type { ResourceLoaders } from './resources.js'
export { RULEBOOK_SCHEME, RulebookDriver } from './rulebook-driver.js'
export { RULEBOOK_METADATA_FILE, RulebookLoader } from './rulebooks.js'
export type { RulebookLoaderOptions } from './rulebooks.js'
export {
  loadSkill,
  resolveScriptContentType,
  SKILL_INSTRUCTIONS_FILE,
  SKILL_METADATA_FILE,
  SKILL_SCRIPTS_DIR,
  SkillLoader,
} from './skills.js'
export { parseResourceYaml, validateResource } from './yaml.js'

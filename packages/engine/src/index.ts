/**
 * @projectkit/engine - High-level orchestration.
 *
 * WHY: The engine ties config, sources, loaders and repositories together
 * so the CLI only parses arguments and prints results.
 */

export { loadResources, runUpdate, storeResources } from './update.js'
export type { LoadedResources, UpdateOptions, UpdateResult } from './update.js'
export { validateStandardFile } from './validate-standard.js'
export type { ValidateStandardOptions } from './validate-standard.js'

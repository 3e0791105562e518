import type {
  FileSystem,
  NoResourcesFoundError,
  StoredResourceKind,
  Validator,
} from '@projectkit/core'

/** Loads every resource of one kind from a resolved source */
export interface ResourceLoader<T> {
  load(fs: FileSystem): Promise<T[]>
}

/**
 * What the generic loaders need to know about one resource kind.
 */
export interface ResourceDefinition<T> {
  kind: StoredResourceKind
  validate: Validator<T>
  /** Error thrown when a source holds no resource of this kind */
  noneFound: () => NoResourcesFoundError
}

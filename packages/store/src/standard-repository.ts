import type { FileSystem, Standard } from '@projectkit/core'
import { validateStandard } from '@projectkit/core'

import type { RepositoryCodec } from './fs-repository.js'
import { FsRepository } from './fs-repository.js'

export const standardCodec: RepositoryCodec<Standard> = {
  kind: 'standard',
  identify: (standard) => standard.metadata.id,
  encode: (standard) => standard,
  decode: validateStandard,
}

export class StandardRepository extends FsRepository<Standard> {
  constructor(fs: FileSystem) {
    super(fs, standardCodec)
  }

  async addStandard(standard: Standard): Promise<void> {
    await this.withWriteLock(() => this.insert(standard))
  }
}

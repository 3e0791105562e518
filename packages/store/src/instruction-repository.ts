import type { FileSystem, Instructions } from '@projectkit/core'
import { validateInstructions } from '@projectkit/core'

import type { RepositoryCodec } from './fs-repository.js'
import { FsRepository } from './fs-repository.js'

export const instructionsCodec: RepositoryCodec<Instructions> = {
  kind: 'instruction',
  identify: (instructions) => instructions.category,
  encode: (instructions) => instructions,
  decode: validateInstructions,
}

/**
 * Instruction sets, one file per category.
 */
export class InstructionRepository extends FsRepository<Instructions> {
  constructor(fs: FileSystem) {
    super(fs, instructionsCodec)
  }

  /**
   * Store an instruction set. Rules for a category that is already stored are
   * appended to it, in order, duplicates included.
   */
  async addInstructions(instructions: Instructions): Promise<void> {
    await this.withWriteLock(async () => {
      const existing = (await this.readEntries()).find(
        (entry) => entry.identity === instructions.category
      )
      if (existing === undefined) {
        await this.insert({ category: instructions.category, rules: [...instructions.rules] })
        return
      }
      await this.writeStored(existing.file, {
        category: instructions.category,
        rules: [...existing.resource.rules, ...instructions.rules],
      })
    })
  }
}

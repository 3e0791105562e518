/**
 * Skill repository
 *
 * Script bytes are stored base64-encoded so that binary scripts survive the
 * JSON round trip unchanged.
 */

import type {
  FileSystem,
  SerializedSkill,
  SerializedSkillScript,
  Skill,
  SkillScript,
  ValidationResult,
} from '@projectkit/core'
import {
  SkillAlreadyExistsError,
  SkillNotFoundError,
  validateSerializedSkill,
} from '@projectkit/core'

import type { RepositoryCodec } from './fs-repository.js'
import { FsRepository } from './fs-repository.js'

export function serializeSkill(skill: Skill): SerializedSkill {
  const scripts = Object.fromEntries(
    Object.entries(skill.scripts).map(([name, script]): [string, SerializedSkillScript] => [
      name,
      { contentType: script.contentType, content: script.content.toString('base64') },
    ])
  )
  return { metadata: skill.metadata, instructions: skill.instructions, scripts }
}

export function deserializeSkill(data: unknown): ValidationResult<Skill> {
  const result = validateSerializedSkill(data)
  if (!result.valid) {
    return result
  }

  const scripts = Object.fromEntries(
    Object.entries(result.data.scripts).map(([name, script]): [string, SkillScript] => [
      name,
      { contentType: script.contentType, content: Buffer.from(script.content, 'base64') },
    ])
  )
  return {
    valid: true,
    data: {
      metadata: result.data.metadata,
      instructions: result.data.instructions,
      scripts,
    },
  }
}

export const skillCodec: RepositoryCodec<Skill> = {
  kind: 'skill',
  identify: (skill) => skill.metadata.name,
  encode: serializeSkill,
  decode: deserializeSkill,
}

export class SkillRepository extends FsRepository<Skill> {
  constructor(fs: FileSystem) {
    super(fs, skillCodec)
  }

  /**
   * @throws SkillAlreadyExistsError if a skill with the same name is stored;
   *   nothing is written in that case
   */
  async addSkill(skill: Skill): Promise<void> {
    await this.withWriteLock(async () => {
      const name = skill.metadata.name
      const existing = await this.readEntries()
      if (existing.some((entry) => entry.identity === name)) {
        throw new SkillAlreadyExistsError(name)
      }
      await this.insert(skill)
    })
  }

  /**
   * @throws SkillNotFoundError if no stored skill has this name
   */
  async getSkillByName(name: string): Promise<Skill> {
    const skills = await this.getAll()
    const skill = skills.find((s) => s.metadata.name === name)
    if (skill === undefined) {
      throw new SkillNotFoundError(name)
    }
    return skill
  }
}

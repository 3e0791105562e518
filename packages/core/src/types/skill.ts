/**
 * Skill types.
 *
 * A skill lives on disk as a directory:
 *   <skill>/metadata.yaml
 *   <skill>/instructions.md
 *   <skill>/scripts/*        (optional)
 */

export interface SkillMetadata {
  name: string
  /** Up to 256 characters */
  description: string
}

export interface SkillScript {
  /** MIME type derived from the script's file extension */
  contentType: string
  content: Buffer
}

export interface Skill {
  metadata: SkillMetadata
  /** Raw contents of instructions.md */
  instructions: string
  /** Scripts keyed by file name */
  scripts: Record<string, SkillScript>
}

/** Stored form of a script: bytes as base64 */
export interface SerializedSkillScript {
  contentType: string
  content: string
}

/** Stored form of a skill */
export interface SerializedSkill {
  metadata: SkillMetadata
  instructions: string
  scripts: Record<string, SerializedSkillScript>
}

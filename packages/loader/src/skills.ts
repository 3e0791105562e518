/**
 * Skill loader
 *
 * Each top-level directory of a source is one skill:
 *
 *   <skill>/metadata.yaml      name and description
 *   <skill>/instructions.md    free-form instructions, required
 *   <skill>/scripts/*          optional helper scripts, kept byte for byte
 *
 * The first skill that fails to load fails the whole source.
 */

import * as path from 'node:path'
import type { FileEntry, FileSystem, Skill, SkillMetadata, SkillScript } from '@projectkit/core'
import { NoSkillsFoundError, ResourceReadError, validateSkillMetadata } from '@projectkit/core'

import { readRootEntries } from './flat-file.js'
import type { ResourceLoader } from './resource-loader.js'
import { parseResourceYaml, validateResource } from './yaml.js'

export const SKILL_METADATA_FILE = 'metadata.yaml'
export const SKILL_INSTRUCTIONS_FILE = 'instructions.md'
export const SKILL_SCRIPTS_DIR = 'scripts'

const DEFAULT_SCRIPT_CONTENT_TYPE = 'application/octet-stream'

// Extensions are matched case-sensitively
const SCRIPT_CONTENT_TYPES = new Map<string, string>([
  ['.sh', 'application/x-sh'],
  ['.bash', 'application/x-sh'],
  ['.zsh', 'application/x-sh'],
  ['.ksh', 'application/x-sh'],
  ['.csh', 'application/x-csh'],
  ['.fish', 'application/x-fish'],
  ['.py', 'text/x-python'],
  ['.rb', 'text/x-ruby'],
  ['.pl', 'text/x-perl'],
  ['.lua', 'text/x-lua'],
  ['.js', 'text/javascript'],
  ['.awk', 'text/x-awk'],
  ['.sed', 'text/x-sed'],
  ['.tcl', 'application/x-tcl'],
])

/**
 * MIME type of a script, from its file extension
 */
export function resolveScriptContentType(fileName: string): string {
  return SCRIPT_CONTENT_TYPES.get(path.posix.extname(fileName)) ?? DEFAULT_SCRIPT_CONTENT_TYPE
}

async function readSkillFile(skillFs: FileSystem, skillDir: string, file: string): Promise<Buffer> {
  try {
    return await skillFs.readFile(file)
  } catch (err) {
    throw new ResourceReadError('skill', `${skillDir}/${file}`, err)
  }
}

async function loadScripts(
  skillFs: FileSystem,
  skillDir: string
): Promise<Record<string, SkillScript>> {
  const scriptsPath = `${skillDir}/${SKILL_SCRIPTS_DIR}`

  let entries: FileEntry[]
  try {
    if (!(await skillFs.dirExists(SKILL_SCRIPTS_DIR))) {
      return {}
    }
    entries = await skillFs.readDir(SKILL_SCRIPTS_DIR)
  } catch (err) {
    throw new ResourceReadError('skill', scriptsPath, err)
  }

  // Entries, not assignment: a script may be named `__proto__`
  const scripts: [string, SkillScript][] = []
  for (const entry of entries) {
    if (entry.isDirectory) continue
    scripts.push([
      entry.name,
      {
        contentType: resolveScriptContentType(entry.name),
        content: await readSkillFile(skillFs, skillDir, `${SKILL_SCRIPTS_DIR}/${entry.name}`),
      },
    ])
  }
  return Object.fromEntries(scripts)
}

/**
 * Load one skill from its directory
 */
export async function loadSkill(fs: FileSystem, skillDir: string): Promise<Skill> {
  const skillFs = fs.scope(skillDir).readOnly()

  const metadataPath = `${skillDir}/${SKILL_METADATA_FILE}`
  const metadata: SkillMetadata = validateResource(
    'skill',
    metadataPath,
    parseResourceYaml(
      'skill',
      metadataPath,
      await readSkillFile(skillFs, skillDir, SKILL_METADATA_FILE)
    ),
    validateSkillMetadata
  )

  const instructions = (
    await readSkillFile(skillFs, skillDir, SKILL_INSTRUCTIONS_FILE)
  ).toString('utf-8')

  const scripts = await loadScripts(skillFs, skillDir)

  return { metadata, instructions, scripts }
}

export class SkillLoader implements ResourceLoader<Skill> {
  /**
   * @throws NoSkillsFoundError when the source has no skill directory
   */
  async load(fs: FileSystem): Promise<Skill[]> {
    const skillDirs = (await readRootEntries(fs))
      .filter((entry) => entry.isDirectory)
      .map((entry) => entry.name)

    if (skillDirs.length === 0) {
      throw new NoSkillsFoundError()
    }

    const skills: Skill[] = []
    for (const skillDir of skillDirs) {
      skills.push(await loadSkill(fs, skillDir))
    }
    return skills
  }
}

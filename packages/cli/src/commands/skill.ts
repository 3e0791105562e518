/**
 * Skill commands - Inspect the skills stored in the project repository.
 */

import type { Command } from 'commander'

import type { Skill } from '@projectkit/core'

import type { CliEnvironment } from '../context.js'
import { createCommandContext, openRepositories } from '../context.js'
import { getGlobalOptions } from '../helpers.js'
import { branches, colors, emptyRepository, field, heading, listEntry } from '../ui.js'

/** JSON shape of a listed skill; script bodies are left out */
export function skillSummary(skill: Skill): {
  name: string
  description: string
  scripts: string[]
} {
  return {
    name: skill.metadata.name,
    description: skill.metadata.description,
    scripts: Object.keys(skill.scripts).sort(),
  }
}

function printSkill(skill: Skill): void {
  heading(skill.metadata.name)
  field('Description', skill.metadata.description)

  const scripts = Object.entries(skill.scripts).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  if (scripts.length > 0) {
    field('Scripts', '')
    branches(scripts.map(([name, script]) => `${name} ${colors.muted(`(${script.contentType})`)}`))
  }

  console.log()
  console.log(skill.instructions)
}

/**
 * Register the skill command group.
 */
export function registerSkillCommands(program: Command, environment: CliEnvironment): void {
  const skill = program.command('skill').description('Inspect stored skills')

  skill
    .command('list')
    .description('List stored skills')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      const context = await createCommandContext(getGlobalOptions(command), environment)
      const skills = await (await openRepositories(context)).skills.getAll()

      if (options.json) {
        console.log(JSON.stringify(skills.map(skillSummary), null, 2))
        return
      }

      if (skills.length === 0) {
        emptyRepository('skills')
        return
      }
      for (const s of skills) {
        listEntry(s.metadata.name, colors.muted(s.metadata.description))
      }
    })

  skill
    .command('show')
    .description('Show one stored skill')
    .argument('<name>', 'Skill name')
    .action(async (name: string, _options: unknown, command: Command) => {
      const context = await createCommandContext(getGlobalOptions(command), environment)
      const found = await (await openRepositories(context)).skills.getSkillByName(name)
      printSkill(found)
    })
}

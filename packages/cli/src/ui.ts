/**
 * Console output for projectkit commands.
 *
 * Command results go to stdout through these helpers; log lines go to
 * stderr through the logger.
 */

import chalk from 'chalk'
import figures from 'figures'

export const colors = {
  /** Resource names */
  name: chalk.bold,
  muted: chalk.gray,
  /** Commands and file paths */
  code: chalk.cyan,
  ok: chalk.green,
}

/**
 * One entry of a list command: name, then a muted detail.
 */
export function listEntry(name: string, detail: string): void {
  console.log(`${colors.name(name)}  ${detail}`)
}

/**
 * What a list command prints for an empty repository.
 */
export function emptyRepository(kind: string): void {
  console.log(colors.muted(`No ${kind} stored. Run \`projectkit update\` first.`))
}

/**
 * Start a detail view with the resource name.
 */
export function heading(text: string): void {
  console.log(colors.name(text))
}

/**
 * Labelled value under a heading.
 */
export function field(label: string, value: string): void {
  console.log(`  ${colors.muted(`${label}:`)} ${value}`)
}

/**
 * Items drawn as the branches of a tree under the previous line.
 */
export function branches(items: string[]): void {
  items.forEach((item, i) => {
    const joint = i === items.length - 1 ? '└─' : '├─'
    console.log(`    ${colors.muted(joint)} ${item}`)
  })
}

export function done(text: string): void {
  console.log(`${colors.ok(figures.tick)} ${text}`)
}

/**
 * Labelled counts, labels padded to the longest one.
 */
export function table(rows: [label: string, value: string][]): void {
  const width = Math.max(0, ...rows.map(([label]) => label.length))
  for (const [label, value] of rows) {
    console.log(`  ${colors.muted(label.padEnd(width))}  ${value}`)
  }
}

/**
 * `1 skill`, `2 skills`
 */
export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}

/**
 * Show a path under the home directory as `~/...`.
 */
export function displayPath(filePath: string, homeDir: string): string {
  if (homeDir === '' || homeDir === '/') return filePath
  if (filePath === homeDir) return '~'
  return filePath.startsWith(`${homeDir}/`) ? `~${filePath.slice(homeDir.length)}` : filePath
}

import { afterEach, describe, expect, test, vi } from 'vitest'

import { displayPath, plural, table } from './ui.js'

describe('displayPath', () => {
  test('shortens paths under the home directory', () => {
    expect(displayPath('/home/dev/app/.projectkit', '/home/dev')).toBe('~/app/.projectkit')
    expect(displayPath('/home/dev', '/home/dev')).toBe('~')
  })

  test('leaves other paths alone', () => {
    expect(displayPath('/home/developer/app', '/home/dev')).toBe('/home/developer/app')
    expect(displayPath('/srv/app', '')).toBe('/srv/app')
    expect(displayPath('/srv/app', '/')).toBe('/srv/app')
  })
})

test('plural', () => {
  expect(plural(1, 'skill')).toBe('1 skill')
  expect(plural(0, 'skill')).toBe('0 skills')
  expect(plural(2, 'instruction set')).toBe('2 instruction sets')
})

describe('table', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  test('pads labels to the longest one', () => {
    const lines: string[] = []
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      lines.push(String(line))
    })

    table([
      ['Skills', '1 skill'],
      ['MCP servers', '2 servers'],
    ])

    expect(lines.map((line) => line.replace(/\u001b\[[0-9;]*m/g, ''))).toEqual([
      '  Skills       1 skill',
      '  MCP servers  2 servers',
    ])
  })
})

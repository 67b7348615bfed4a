import { describe, it, expect, afterEach, vi } from 'vitest'
import { run } from '../../src/main.js'
import { captureOutput, makeContext } from '../helpers/context.js'

describe('run', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should print help and return 0 when no arguments are given', async () => {
    const output = captureOutput()
    expect(await run([], makeContext())).toBe(0)
    expect(output.stdout()).toContain('Usage: lockbox <command>')
  })

  it('should print help for --help and -h', async () => {
    const output = captureOutput()
    expect(await run(['--help'], makeContext())).toBe(0)
    expect(await run(['-h'], makeContext())).toBe(0)
    expect(output.stdout().match(/Usage: lockbox <command>/g)).toHaveLength(2)
  })

  it('should list every command in the help output', async () => {
    const output = captureOutput()
    await run(['--help'], makeContext())
    for (const command of ['list', 'keys', 'doctor', 'config']) {
      expect(output.stdout()).toContain(`  ${command}`)
    }
  })

  it('should reject an unknown command with help on stdout', async () => {
    const output = captureOutput()
    expect(await run(['bogus'], makeContext())).toBe(1)
    expect(output.stderr()).toBe('Unknown command: bogus\n')
    expect(output.stdout()).toContain('Usage: lockbox <command>')
  })

  it('should pass the remaining arguments to the command', async () => {
    const output = captureOutput()
    const context = makeContext({
      projects: [{ id: 'p1', name: 'Web', creationDate: '2024-01-01' }],
    })
    expect(await run(['list', '--org-id', 'org-9'], context)).toBe(0)
    expect(output.stdout()).toContain('ID: p1')
  })
})

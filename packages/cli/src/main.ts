/**
 * Command dispatch for the lockbox CLI.
 *
 * Each subcommand is lazy-loaded via dynamic import(), so only the requested
 * command's module is loaded.
 *
 * @internal
 */

import { parseArgs } from 'node:util'
import { defaultContext } from './context.js'
import type { CommandContext } from './context.js'

export function printHelp(): void {
  process.stdout.write(
    'Usage: lockbox <command> [options]\n\n' +
      'Commands:\n' +
      '  list      List projects (--org-id, -o)\n' +
      '  keys      List secret names (--org-id, -o; --project-id, -p)\n' +
      '  doctor    Run preflight checks\n' +
      '  config    Manage bootstrap values in the OS credential store\n',
  )
}

/**
 * Run the CLI with `argv` (arguments after the script name).
 * @returns The process exit code.
 */
export async function run(argv: string[], context?: CommandContext): Promise<number> {
  const { positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: false,
  })

  const subcommand = positionals[0]
  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }
  // Everything after the subcommand.
  const commandArgs = argv.slice(argv.indexOf(subcommand) + 1)

  switch (subcommand) {
    case 'list': {
      const { listCommand } = await import('./commands/list.js')
      return listCommand(commandArgs, context ?? defaultContext())
    }
    case 'keys': {
      const { keysCommand } = await import('./commands/keys.js')
      return keysCommand(commandArgs, context ?? defaultContext())
    }
    case 'doctor': {
      const { doctorCommand } = await import('./commands/doctor.js')
      return doctorCommand(commandArgs, context ?? defaultContext())
    }
    case 'config': {
      const { configCommand } = await import('./commands/config.js')
      return configCommand(commandArgs, context ?? defaultContext())
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}

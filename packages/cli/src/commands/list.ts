import { parseArgs } from 'node:util'
import { withLockbox } from 'lockbox'
import { lockboxOptions } from '../context.js'
import type { CommandContext } from '../context.js'
import { formatError, formatProjects } from '../output.js'

const USAGE = 'Usage: lockbox list [--org-id <id>]\n'

export async function listCommand(args: string[], context: CommandContext): Promise<number> {
  let organizationId: string | undefined
  try {
    const { values } = parseArgs({
      args,
      options: { 'org-id': { type: 'string', short: 'o' } },
    })
    organizationId = values['org-id']
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n${USAGE}`)
    return 1
  }

  try {
    const projects = await withLockbox(lockboxOptions(context), (lockbox) =>
      lockbox.listProjects(organizationId),
    )
    if (projects.length === 0) {
      process.stdout.write('No projects found\n')
      return 0
    }
    process.stdout.write(formatProjects(projects))
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}

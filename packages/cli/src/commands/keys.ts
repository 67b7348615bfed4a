import { parseArgs } from 'node:util'
import { withLockbox } from 'lockbox'
import { lockboxOptions } from '../context.js'
import type { CommandContext } from '../context.js'
import { formatError } from '../output.js'

const USAGE = 'Usage: lockbox keys [--org-id <id>] [--project-id <id>]\n'

/** Print the names of the available secrets, never their values. */
export async function keysCommand(args: string[], context: CommandContext): Promise<number> {
  let organizationId: string | undefined
  let projectId: string | undefined
  try {
    const { values } = parseArgs({
      args,
      options: {
        'org-id': { type: 'string', short: 'o' },
        'project-id': { type: 'string', short: 'p' },
      },
    })
    organizationId = values['org-id']
    projectId = values['project-id']
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n${USAGE}`)
    return 1
  }

  try {
    const secrets = await withLockbox(lockboxOptions(context), (lockbox) =>
      lockbox.get({ organizationId, projectId }),
    )
    const names = Object.keys(secrets).sort()
    if (names.length === 0) {
      process.stdout.write('No secrets found\n')
      return 0
    }
    process.stdout.write(names.join('\n') + '\n')
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}

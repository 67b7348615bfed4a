import { parseArgs } from 'node:util'
import * as path from 'node:path'
import {
  BOOTSTRAP_SERVICE,
  ORGANIZATION_ID_KEY,
  STATE_FILE_KEY,
  organizationService,
  resolveOrganizationId,
} from 'lockbox'
import type { CommandContext } from '../context.js'
import { formatError } from '../output.js'

const USAGE =
  'Usage: lockbox config show\n' +
  '       lockbox config set organization-id <id>\n' +
  '       lockbox config set state-file <path> [--org-id <id>]\n' +
  '       lockbox config unset <organization-id|state-file> [--org-id <id>]\n'

type Setting = 'organization-id' | 'state-file'

function isSetting(value: string | undefined): value is Setting {
  return value === 'organization-id' || value === 'state-file'
}

/** Where a setting lives in the credential store. */
async function locate(
  setting: Setting,
  orgIdOption: string | undefined,
  context: CommandContext,
): Promise<{ service: string; key: string }> {
  if (setting === 'organization-id') {
    return { service: BOOTSTRAP_SERVICE, key: ORGANIZATION_ID_KEY }
  }
  const organizationId = await resolveOrganizationId(orgIdOption, context.env, context.credentialStore)
  return { service: organizationService(organizationId), key: STATE_FILE_KEY }
}

async function show(context: CommandContext): Promise<number> {
  const store = context.credentialStore
  const organizationId = await store.get(BOOTSTRAP_SERVICE, ORGANIZATION_ID_KEY)
  process.stdout.write(`organization-id: ${organizationId ?? '(not set)'}\n`)
  if (organizationId === undefined) {
    process.stdout.write('state-file: (no organization)\n')
    return 0
  }
  const stateFile = await store.get(organizationService(organizationId), STATE_FILE_KEY)
  process.stdout.write(`state-file: ${stateFile ?? '(not set)'}\n`)
  return 0
}

export async function configCommand(args: string[], context: CommandContext): Promise<number> {
  let positionals: string[]
  let orgIdOption: string | undefined
  try {
    const parsed = parseArgs({
      args,
      allowPositionals: true,
      options: { 'org-id': { type: 'string', short: 'o' } },
    })
    positionals = parsed.positionals
    orgIdOption = parsed.values['org-id']
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n${USAGE}`)
    return 1
  }

  const [action, setting, value] = positionals

  try {
    if (!(await context.credentialStore.isAvailable())) {
      process.stderr.write('No OS credential store is available on this system\n')
      return 1
    }

    switch (action) {
      case 'show':
        return await show(context)

      case 'set': {
        if (!isSetting(setting) || value === undefined || value.trim() === '') {
          break
        }
        const stored = setting === 'state-file' ? path.resolve(value) : value.trim()
        const { service, key } = await locate(setting, orgIdOption, context)
        await context.credentialStore.set(service, key, stored)
        process.stdout.write(`${setting} set to ${stored}\n`)
        return 0
      }

      case 'unset': {
        if (!isSetting(setting)) {
          break
        }
        const { service, key } = await locate(setting, orgIdOption, context)
        await context.credentialStore.delete(service, key)
        process.stdout.write(`${setting} removed\n`)
        return 0
      }
    }
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }

  process.stderr.write(USAGE)
  return 1
}

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { MachineIdentity } from 'lockbox'
import { doctorCommand } from '../../../src/commands/doctor.js'
import { captureOutput, makeContext } from '../../helpers/context.js'

describe('doctorCommand', () => {
  let tempDir: string
  let identity: MachineIdentity

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lockbox-doctor-test-'))
    const machineIdPath = path.join(tempDir, 'machine-id')
    await fs.writeFile(machineIdPath, 'test-machine\n')
    identity = new MachineIdentity({ machineIdPaths: [machineIdPath] })
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  it('should print every check and return 0 when ready', async () => {
    const output = captureOutput()
    const context = {
      ...makeContext({
        env: { ORGANIZATION_ID: 'org-1', BWS_TOKEN: 'test-token', STATE_FILE: '/tmp/state' },
      }),
      identity,
    }
    expect(await doctorCommand([], context)).toBe(0)
    expect(output.stdout()).toBe(
      '  ✓ machine identity (machine-id)\n' +
        '  ✓ credential store (In-Memory Credential Store)\n' +
        '  ✓ organization (org-1)\n' +
        '  ✓ provider configuration (https://api.bitwarden.com)\n' +
        '\nSystem ready.\n',
    )
  })

  it('should list next steps and return 1 when configuration is missing', async () => {
    const output = captureOutput()
    const context = { ...makeContext({ env: { ORGANIZATION_ID: 'org-1' } }), identity }
    expect(await doctorCommand([], context)).toBe(1)
    expect(output.stdout()).toContain(
      '  ✗ provider configuration: missing BWS_TOKEN, STATE_FILE\n',
    )
    expect(output.stdout()).toContain(
      '\nNext steps:\n  → Configure provider configuration: missing BWS_TOKEN, STATE_FILE\n',
    )
  })

  it('should warn about a missing credential store but stay ready', async () => {
    const output = captureOutput()
    const context = {
      ...makeContext({
        env: { ORGANIZATION_ID: 'org-1', BWS_TOKEN: 'test-token', STATE_FILE: '/tmp/state' },
        storeAvailable: false,
      }),
      identity,
    }
    expect(await doctorCommand([], context)).toBe(0)
    expect(output.stdout()).toContain('\nWarnings:\n  ⚠ Optional credential store not available')
  })
})

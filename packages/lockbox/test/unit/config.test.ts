import { describe, it, expect } from 'vitest'
import {
  DEFAULT_API_URL,
  DEFAULT_IDENTITY_URL,
  resolveCacheTtlMs,
  resolveGatewayConfig,
  resolveOrganizationId,
  validateGatewayConfig,
} from '../../src/config.js'
import { ConfigurationError } from '../../src/errors.js'
import { MemoryStore } from '../helpers/fakes.js'

describe('resolveOrganizationId', () => {
  it('should prefer the explicit value', async () => {
    const store = new MemoryStore()
    await store.set('lockbox', 'organization_id', 'from-store')
    expect(await resolveOrganizationId('explicit', { ORGANIZATION_ID: 'from-env' }, store)).toBe(
      'explicit',
    )
  })

  it('should fall back to ORGANIZATION_ID', async () => {
    expect(await resolveOrganizationId(undefined, { ORGANIZATION_ID: ' from-env ' }, new MemoryStore())).toBe(
      'from-env',
    )
  })

  it('should fall back to the credential store', async () => {
    const store = new MemoryStore()
    await store.set('lockbox', 'organization_id', 'from-store')
    expect(await resolveOrganizationId('', { ORGANIZATION_ID: '' }, store)).toBe('from-store')
  })

  it('should fail naming the variable when nothing provides one', async () => {
    const error = await resolveOrganizationId(undefined, {}, new MemoryStore()).catch(
      (e: unknown) => e,
    )
    expect(error).toBeInstanceOf(ConfigurationError)
    if (error instanceof ConfigurationError) {
      expect(error.message).toBe('ORGANIZATION_ID environment variable is required')
      expect(error.missing).toEqual(['ORGANIZATION_ID'])
    }
  })
})

describe('resolveGatewayConfig', () => {
  it('should read everything from the environment', async () => {
    const config = await resolveGatewayConfig(
      {
        API_URL: 'https://api.example.test',
        IDENTITY_URL: 'https://identity.example.test',
        BWS_TOKEN: 'test-token',
        STATE_FILE: '/tmp/state.json',
      },
      new MemoryStore(),
      'org-1',
    )
    expect(config).toEqual({
      apiUrl: 'https://api.example.test',
      identityUrl: 'https://identity.example.test',
      accessToken: 'test-token',
      stateFile: '/tmp/state.json',
    })
  })

  it('should default the endpoints and take the state file from the organization service', async () => {
    const store = new MemoryStore()
    await store.set('lockbox_org-1', 'state_file', '/var/lib/state.json')
    const config = await resolveGatewayConfig({ BWS_TOKEN: 'test-token' }, store, 'org-1')
    expect(config).toEqual({
      apiUrl: DEFAULT_API_URL,
      identityUrl: DEFAULT_IDENTITY_URL,
      accessToken: 'test-token',
      stateFile: '/var/lib/state.json',
    })
  })

  it('should report every missing value at once', async () => {
    const error = await resolveGatewayConfig({}, new MemoryStore(), 'org-1').catch((e: unknown) => e)
    expect(error).toBeInstanceOf(ConfigurationError)
    if (error instanceof ConfigurationError) {
      expect(error.message).toBe('Missing required configuration: BWS_TOKEN, STATE_FILE')
      expect(error.missing).toEqual(['BWS_TOKEN', 'STATE_FILE'])
    }
  })

  it('should treat blank values as missing', async () => {
    await expect(
      resolveGatewayConfig({ BWS_TOKEN: '  ', STATE_FILE: '/tmp/s' }, new MemoryStore(), 'org-1'),
    ).rejects.toThrow('Missing required configuration: BWS_TOKEN')
  })
})

describe('resolveCacheTtlMs', () => {
  it('should default to five minutes', () => {
    expect(resolveCacheTtlMs({})).toBe(300_000)
  })

  it('should read seconds from LOCKBOX_CACHE_TTL', () => {
    expect(resolveCacheTtlMs({ LOCKBOX_CACHE_TTL: '60' })).toBe(60_000)
    expect(resolveCacheTtlMs({ LOCKBOX_CACHE_TTL: '0.5' })).toBe(500)
  })

  it.each(['0', '-5', 'soon'])('should reject %s', (value) => {
    expect(() => resolveCacheTtlMs({ LOCKBOX_CACHE_TTL: value })).toThrow(ConfigurationError)
  })
})

describe('validateGatewayConfig', () => {
  it('should accept a complete config', () => {
    const config = {
      apiUrl: 'https://api.example.test',
      identityUrl: 'https://identity.example.test',
      accessToken: 'test-token',
      stateFile: '/tmp/state.json',
    }
    expect(validateGatewayConfig(config)).toEqual(config)
  })

  it('should reject a non-object', () => {
    expect(() => validateGatewayConfig(null)).toThrow('Gateway config must be an object')
    expect(() => validateGatewayConfig([])).toThrow('Gateway config must be an object')
  })

  it('should name every invalid field', () => {
    expect(() => validateGatewayConfig({ apiUrl: 'x', identityUrl: '', accessToken: 3 })).toThrow(
      'Gateway config fields must be non-empty strings: identityUrl, accessToken, stateFile',
    )
  })
})

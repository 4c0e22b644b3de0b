import { afterEach, describe, expect, it, vi } from 'vitest'
import { DEFAULT_MAX_QUEUED_DELTAS, getSyncConfig, requireSetting } from './sync-config'

describe('getSyncConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('falls back to defaults when nothing is set', () => {
    vi.stubEnv('SYNC_API_BASE_URL', '')
    vi.stubEnv('SYNC_API_TOKEN', '   ')
    vi.stubEnv('SYNC_DEBUG', '')
    vi.stubEnv('SYNC_DEVTOOLS', '')
    vi.stubEnv('SYNC_MAX_QUEUED_DELTAS', '')

    expect(getSyncConfig()).toEqual({
      apiBaseUrl: undefined,
      apiToken: undefined,
      debugLogging: false,
      devtools: false,
      maxQueuedDeltas: DEFAULT_MAX_QUEUED_DELTAS,
    })
  })

  it('reads the process environment', () => {
    vi.stubEnv('SYNC_API_BASE_URL', 'https://chat.example.test//')
    vi.stubEnv('SYNC_DEBUG', 'TRUE')
    vi.stubEnv('SYNC_MAX_QUEUED_DELTAS', '20')

    const config = getSyncConfig()
    expect(config.apiBaseUrl).toBe('https://chat.example.test')
    expect(config.debugLogging).toBe(true)
    expect(config.maxQueuedDeltas).toBe(20)
  })

  it('prefers explicit overrides and rejects bad numbers', () => {
    vi.stubEnv('SYNC_API_TOKEN', 'from-env')

    const config = getSyncConfig({ SYNC_API_TOKEN: 'test-secret', SYNC_MAX_QUEUED_DELTAS: '-3' })
    expect(config.apiToken).toBe('test-secret')
    expect(config.maxQueuedDeltas).toBe(DEFAULT_MAX_QUEUED_DELTAS)
  })
})

describe('requireSetting', () => {
  it('throws for missing values', () => {
    expect(requireSetting('x', 'SYNC_API_BASE_URL')).toBe('x')
    expect(() => requireSetting(undefined, 'SYNC_API_BASE_URL')).toThrow(
      'Missing sync setting: SYNC_API_BASE_URL',
    )
  })
})

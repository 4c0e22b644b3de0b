export type SyncConfig = {
  apiBaseUrl: string | undefined
  apiToken: string | undefined
  debugLogging: boolean
  devtools: boolean
  maxQueuedDeltas: number
}

export const DEFAULT_MAX_QUEUED_DELTAS = 500

type SyncEnv = Record<string, string | undefined>

const readStringFromProcess = (key: string): string | undefined => {
  if (typeof process === 'undefined' || !process.env) {
    return undefined
  }

  return readString(process.env[key])
}

const readString = (value: unknown): string | undefined => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

const readFlag = (value: string | undefined): boolean => {
  if (!value) {
    return false
  }
  const normalized = value.toLowerCase()
  return normalized === '1' || normalized === 'true' || normalized === 'yes'
}

const readPositiveInt = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback
  }
  const parsed = Number.parseInt(value, 10)
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback
}

export const getSyncConfig = (overrides: SyncEnv = {}): SyncConfig => {
  const read = (key: string) =>
    readString(overrides[key]) ?? readStringFromProcess(key)

  return {
    apiBaseUrl: read('SYNC_API_BASE_URL')?.replace(/\/+$/, ''),
    apiToken: read('SYNC_API_TOKEN'),
    debugLogging: readFlag(read('SYNC_DEBUG')),
    devtools: readFlag(read('SYNC_DEVTOOLS')),
    maxQueuedDeltas: readPositiveInt(
      read('SYNC_MAX_QUEUED_DELTAS'),
      DEFAULT_MAX_QUEUED_DELTAS,
    ),
  }
}

export const requireSetting = <T>(value: T | undefined, settingName: string): T => {
  if (value === undefined) {
    throw new Error(`Missing sync setting: ${settingName}`)
  }
  return value
}

export type SyncLogger = {
  log: (category: string, message: string, data?: unknown) => void
}

export type LogEntry = Record<string, unknown>

type LoggerOptions = {
  enabled?: boolean
  scope?: string
  emit?: (entry: LogEntry) => void
  now?: () => number
}

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export const toJsonSafe = (value: unknown): unknown => {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
      cause: value.cause,
    }
  }

  // errors nested one level down, as in `{ id, error }`
  if (isPlainRecord(value) && Object.values(value).some((item) => item instanceof Error)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, toJsonSafe(item)]),
    )
  }

  try {
    JSON.stringify(value)
    return value
  } catch {
    try {
      return String(value)
    } catch {
      return '[Unserializable]'
    }
  }
}

const emitLog = (entry: LogEntry) => {
  console.log(JSON.stringify(entry))
}

const createScopeId = () => Math.random().toString(16).slice(2, 10)

export const silentLogger: SyncLogger = {
  log: () => {},
}

export const createSyncLogger = (options: LoggerOptions = {}): SyncLogger => {
  const { enabled = true, emit = emitLog, now = Date.now } = options
  if (!enabled) {
    return silentLogger
  }

  const scope = options.scope ?? createScopeId()

  return {
    log: (category, message, data) => {
      const entry: LogEntry = {
        ts: now(),
        cat: category,
        rid: scope,
        msg: message,
      }
      if (data !== undefined) entry.data = toJsonSafe(data)
      emit(entry)
    },
  }
}

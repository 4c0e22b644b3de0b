import type {
  ConversationDelta,
  ConversationDeltaRequest,
  ConversationDeltaSource,
  DeltaAck,
} from '@/types/delta'
import type { ConversationStore } from '@/stores/conversationStore'
import { DEFAULT_MAX_QUEUED_DELTAS } from '@/config/sync-config'
import type { SyncLogger } from '@/lib/logger'
import { conversationIdOf, decodeDelta } from './delta-decoder'

export type SocketEventHandler = (raw: unknown, ack?: DeltaAck) => void

/** The slice of a socket.io-style client the listener needs. */
export type DeltaSocket = {
  on: (event: string, handler: SocketEventHandler) => void
  off: (event: string, handler: SocketEventHandler) => void
}

export type DeltaListener = {
  start: () => void
  stop: () => void
  dispose: () => void
  setFocused: (focused: boolean) => void
  isActive: () => boolean
  queuedCount: () => number
}

type ListenerDeps = {
  socket: DeltaSocket
  request: ConversationDeltaRequest
  onDelta: (delta: ConversationDelta) => void
  store: ConversationStore
  logger: SyncLogger
  maxQueuedDeltas?: number
  focused?: boolean
}

const EVENT_NAMES: Record<ConversationDeltaSource, string> = {
  chat: 'chat-events',
  channel: 'channel-events',
}

export const eventNameFor = (source: ConversationDeltaSource) => EVENT_NAMES[source]

const matchesRequest = (delta: ConversationDelta, request: ConversationDeltaRequest) => {
  if (request.sessionId && delta.sessionId && delta.sessionId !== request.sessionId) {
    return false
  }
  if (request.conversationId && delta.event) {
    const conversationId = conversationIdOf(delta.event)
    if (conversationId !== null && conversationId !== request.conversationId) {
      return false
    }
  }
  return true
}

export const createDeltaListener = ({
  socket,
  request,
  onDelta,
  store,
  logger,
  maxQueuedDeltas = DEFAULT_MAX_QUEUED_DELTAS,
  focused: initiallyFocused = true,
}: ListenerDeps): DeltaListener => {
  const eventName = eventNameFor(request.source)
  const queue: ConversationDelta[] = []
  let focused = initiallyFocused
  let active = false
  let disposed = false

  const deliver = (delta: ConversationDelta) => {
    try {
      onDelta(delta)
    } catch (error) {
      logger.log('LISTENER', 'Delta handler threw', { type: delta.type, error })
    }
  }

  const enqueue = (delta: ConversationDelta) => {
    queue.push(delta)
    if (queue.length > maxQueuedDeltas) {
      queue.shift()
      store.getState().recordDiagnostic('droppedQueuedDeltas')
      logger.log('LISTENER', 'Queue full, oldest delta dropped', { maxQueuedDeltas })
    }
  }

  const flush = () => {
    const pending = queue.splice(0, queue.length)
    for (const delta of pending) {
      deliver(delta)
    }
  }

  // filtered deltas still answer the server, which may wait on every ack
  const acknowledgeFiltered = (delta: ConversationDelta) => {
    if (!delta.ack) {
      return
    }
    try {
      delta.ack({ received: true })
    } catch (error) {
      logger.log('LISTENER', 'Delta acknowledgement failed', { type: delta.type, error })
    }
  }

  const handleEvent: SocketEventHandler = (raw, ack) => {
    const delta = decodeDelta(request.source, raw, ack)
    if (!matchesRequest(delta, request)) {
      acknowledgeFiltered(delta)
      return
    }
    if (request.requireFocus && !focused) {
      enqueue(delta)
      return
    }
    deliver(delta)
  }

  const stop = () => {
    if (!active) {
      return
    }
    socket.off(eventName, handleEvent)
    active = false
  }

  return {
    start: () => {
      if (disposed || active) {
        return
      }
      socket.on(eventName, handleEvent)
      active = true
    },

    stop,

    dispose: () => {
      if (disposed) {
        return
      }
      disposed = true
      stop()
      queue.length = 0
    },

    setFocused: (next) => {
      const regained = next && !focused
      focused = next
      if (regained) {
        flush()
      }
    },

    isActive: () => active,

    queuedCount: () => queue.length,
  }
}

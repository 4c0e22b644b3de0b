import type {
  ChatMessage,
  ConversationChanges,
  ConversationField,
} from '@/types/conversation'
import type { ConversationDelta, DeltaEvent } from '@/types/delta'
import type { ConversationStore } from '@/stores/conversationStore'
import { createChatMessage, mergeFiles } from '@/lib/conversation/records'
import type { SyncLogger } from '@/lib/logger'
import type { PendingMutations } from './pending-mutations'

export type DeltaReconciler = {
  apply: (delta: ConversationDelta) => void
}

type ReconcilerDeps = {
  store: ConversationStore
  pending: PendingMutations
  logger: SyncLogger
  now?: () => string
}

type MessageEvent = Extract<
  DeltaEvent,
  {
    kind:
      | 'message-chunk'
      | 'message-replace'
      | 'message-complete'
      | 'message-error'
      | 'message-status'
      | 'message-files'
  }
>

const findTargetIndex = (messages: ChatMessage[], messageId: string | null) => {
  if (messageId === null) {
    return messages.length - 1
  }
  return messages.findIndex((message) => message.id === messageId)
}

const updateAt = (
  messages: ChatMessage[],
  index: number,
  update: (message: ChatMessage) => ChatMessage,
) => messages.map((message, i) => (i === index ? update(message) : message))

const applyToMessage = (message: ChatMessage, event: MessageEvent): ChatMessage => {
  switch (event.kind) {
    case 'message-chunk':
      return { ...message, content: message.content + event.content, isStreaming: true }
    case 'message-replace':
      return { ...message, content: event.content }
    case 'message-complete':
      return {
        ...message,
        content: event.content ? message.content + event.content : message.content,
        isStreaming: false,
      }
    case 'message-error':
      return {
        ...message,
        isStreaming: false,
        metadata: { ...message.metadata, error: event.error },
      }
    case 'message-status':
      return { ...message, metadata: { ...message.metadata, status: event.status } }
    case 'message-files':
      return { ...message, files: mergeFiles(message.files, event.files) }
  }
}

export const createDeltaReconciler = ({
  store,
  pending,
  logger,
  now = () => new Date().toISOString(),
}: ReconcilerDeps): DeltaReconciler => {
  const hasConversation = (id: string) => {
    const state = store.getState()
    return (
      state.getConversation(id) !== undefined || state.activeConversation?.id === id
    )
  }

  const applyMessageAppend = (
    event: Extract<DeltaEvent, { kind: 'message-append' }>,
  ) => {
    const { message } = event
    const applied = store.getState().updateMessages(event.conversationId, (messages) => {
      if (messages.some((item) => item.id === message.id)) {
        return messages
      }
      return [
        ...messages,
        createChatMessage({
          id: message.id,
          role: message.role,
          content: message.content,
          model: message.model,
          createdAt: message.createdAt ?? now(),
          isStreaming: message.role === 'assistant',
        }),
      ]
    })
    if (!applied) {
      logger.log('DELTA', 'Message for unknown conversation ignored', {
        conversationId: event.conversationId,
      })
    }
  }

  const applyMessageEvent = (event: MessageEvent) => {
    const applied = store.getState().updateMessages(event.conversationId, (messages) => {
      const index = findTargetIndex(messages, event.messageId)
      if (index >= 0) {
        return updateAt(messages, index, (message) => applyToMessage(message, event))
      }

      // first chunk of a message the client has not seen yet
      if (event.kind === 'message-chunk' && event.messageId !== null) {
        return [
          ...messages,
          createChatMessage({
            id: event.messageId,
            role: 'assistant',
            content: event.content,
            createdAt: now(),
            isStreaming: true,
          }),
        ]
      }

      logger.log('DELTA', 'No message to apply event to', {
        kind: event.kind,
        conversationId: event.conversationId,
        messageId: event.messageId,
      })
      return messages
    })

    if (!applied) {
      logger.log('DELTA', 'Message event for unknown conversation ignored', {
        kind: event.kind,
        conversationId: event.conversationId,
      })
    }
  }

  const applyConversationUpdated = (
    event: Extract<DeltaEvent, { kind: 'conversation-updated' }>,
  ) => {
    const id = event.conversationId
    if (pending.conversation.has(id)) {
      // deletion wins over a concurrent update
      store.getState().recordDiagnostic('discardedDeltas')
      logger.log('DELTA', 'Update for conversation pending deletion discarded', { id })
      return
    }
    if (!hasConversation(id)) {
      logger.log('DELTA', 'Update for unknown conversation ignored', { id })
      return
    }

    const { changes } = event
    const immediate: ConversationChanges = {}
    const held: ConversationField[] = []
    // fields with a mutation in flight become that mutation's rollback target
    if (changes.title !== undefined) {
      if (pending.fields.title.hold(id, changes.title)) held.push('title')
      else immediate.title = changes.title
    }
    if (changes.pinned !== undefined) {
      if (pending.fields.pinned.hold(id, changes.pinned)) held.push('pinned')
      else immediate.pinned = changes.pinned
    }
    if (changes.archived !== undefined) {
      if (pending.fields.archived.hold(id, changes.archived)) held.push('archived')
      else immediate.archived = changes.archived
    }
    if (changes.folderId !== undefined) {
      if (pending.fields.folderId.hold(id, changes.folderId)) held.push('folderId')
      else immediate.folderId = changes.folderId
    }
    if (held.length > 0) {
      logger.log('DELTA', 'Held update behind pending mutation', { id, fields: held })
    }
    if (event.changes.tags !== undefined) immediate.tags = event.changes.tags
    if (event.changes.model !== undefined) immediate.model = event.changes.model
    if (event.changes.updatedAt !== undefined) immediate.updatedAt = event.changes.updatedAt

    if (Object.keys(immediate).length > 0) {
      store.getState().patchConversation(id, immediate)
    }
  }

  const applyConversationDeleted = (
    event: Extract<DeltaEvent, { kind: 'conversation-deleted' }>,
  ) => {
    const id = event.conversationId
    // a local delete in flight must not reinsert what the server removed
    pending.conversation.hold(id, null)

    const state = store.getState()
    const removed = state.removeConversation(id)
    if (!removed && store.getState().activeConversationId === id) {
      store.getState().clearActiveConversation()
    }
  }

  const dispatch = (event: DeltaEvent) => {
    switch (event.kind) {
      case 'message-append':
        applyMessageAppend(event)
        return
      case 'message-chunk':
      case 'message-replace':
      case 'message-complete':
      case 'message-error':
      case 'message-status':
      case 'message-files':
        applyMessageEvent(event)
        return
      case 'conversation-updated':
        applyConversationUpdated(event)
        return
      case 'conversation-deleted':
        applyConversationDeleted(event)
        return
      case 'unknown':
        return
    }
  }

  const acknowledge = (delta: ConversationDelta) => {
    if (!delta.ack) {
      return
    }
    try {
      delta.ack({ received: true })
    } catch (error) {
      logger.log('DELTA', 'Delta acknowledgement failed', error)
    }
  }

  return {
    apply: (delta) => {
      try {
        if (delta.event === null) {
          store.getState().recordDiagnostic('malformedDeltas')
          logger.log('DELTA', 'Malformed delta dropped', {
            source: delta.source,
            type: delta.type,
          })
        } else {
          dispatch(delta.event)
        }
      } catch (error) {
        store.getState().recordDiagnostic('malformedDeltas')
        logger.log('DELTA', 'Delta could not be applied', error)
      }
      acknowledge(delta)
    },
  }
}

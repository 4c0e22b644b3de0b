import { z } from 'zod'
import type { ConversationChanges, MessageFile } from '@/types/conversation'
import type {
  ConversationDelta,
  ConversationDeltaSource,
  DeltaAck,
  DeltaEvent,
} from '@/types/delta'
import { dedupeTags, normalizeTimestamp } from '@/lib/conversation/records'

const envelopeSchema = z
  .object({
    chat_id: z.string().min(1).optional(),
    message_id: z.string().min(1).optional(),
    session_id: z.string().min(1).optional(),
    data: z
      .object({
        type: z.string().min(1),
        data: z.unknown().optional(),
      })
      .passthrough(),
  })
  .passthrough()

const incomingMessageSchema = z.object({
  id: z.string().min(1),
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string().optional(),
  model: z.string().nullable().optional(),
  createdAt: z.union([z.string(), z.number()]).optional(),
  created_at: z.union([z.string(), z.number()]).optional(),
})

const messageAppendSchema = z.object({ message: incomingMessageSchema })

const contentSchema = z.object({ content: z.string() })

const completeSchema = z.object({ content: z.string().nullable().optional() })

const completionSchema = z
  .object({
    done: z.boolean().optional(),
    content: z.string().optional(),
    choices: z
      .array(
        z
          .object({
            delta: z.object({ content: z.string().nullable().optional() }).passthrough().optional(),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough()

const errorSchema = z
  .object({
    error: z
      .union([z.string(), z.object({ content: z.string() }).passthrough()])
      .optional(),
    message: z.string().optional(),
  })
  .passthrough()

const statusSchema = z.object({ status: z.string().min(1) }).passthrough()

const fileEntrySchema = z.union([
  z.string().min(1),
  z.object({ url: z.string().min(1) }).passthrough(),
])

const filesSchema = z.union([
  z.array(fileEntrySchema),
  z.object({ files: z.array(fileEntrySchema) }).passthrough(),
])

const timestampSchema = z.union([z.string(), z.number()])

const conversationUpdatedSchema = z
  .object({
    title: z.string().optional(),
    pinned: z.boolean().optional(),
    archived: z.boolean().optional(),
    folderId: z.string().nullable().optional(),
    folder_id: z.string().nullable().optional(),
    tags: z.array(z.string()).optional(),
    model: z.string().nullable().optional(),
    updatedAt: timestampSchema.optional(),
    updated_at: timestampSchema.optional(),
  })
  .passthrough()

const titleSchema = z.union([z.string(), z.object({ title: z.string() }).passthrough()])

const tagsSchema = z.union([
  z.array(z.string()),
  z.object({ tags: z.array(z.string()) }).passthrough(),
])

type Envelope = z.infer<typeof envelopeSchema>

type DecodeContext = {
  type: string
  data: unknown
  payload: Record<string, unknown> | null
  conversationId: string | null
  messageId: string | null
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const pickString = (...values: unknown[]): string | null => {
  for (const value of values) {
    if (typeof value === 'string' && value.length > 0) {
      return value
    }
  }
  return null
}

const toFiles = (entries: z.infer<typeof fileEntrySchema>[]): MessageFile[] =>
  entries.map((entry): MessageFile => ({
    type: 'image',
    url: typeof entry === 'string' ? entry : entry.url,
  }))

const readErrorText = (value: z.infer<typeof errorSchema>): string | null => {
  if (typeof value.error === 'string') {
    return value.error
  }
  return value.error?.content ?? value.message ?? null
}

const toChanges = (
  value: z.infer<typeof conversationUpdatedSchema>,
): ConversationChanges => {
  const changes: ConversationChanges = {}
  if (value.title !== undefined) changes.title = value.title
  if (value.pinned !== undefined) changes.pinned = value.pinned
  if (value.archived !== undefined) changes.archived = value.archived
  const folderId = value.folderId !== undefined ? value.folderId : value.folder_id
  if (folderId !== undefined) changes.folderId = folderId
  if (value.tags !== undefined) changes.tags = dedupeTags(value.tags)
  if (value.model !== undefined) changes.model = value.model
  const updatedAt = value.updatedAt ?? value.updated_at
  if (updatedAt !== undefined) {
    const normalized = normalizeTimestamp(updatedAt, '')
    if (normalized) changes.updatedAt = normalized
  }
  return changes
}

const decodeMessageEvent = (
  context: DecodeContext,
  conversationId: string,
): DeltaEvent | null | undefined => {
  const target = { conversationId, messageId: context.messageId }

  switch (context.type) {
    case 'message-append': {
      const parsed = messageAppendSchema.safeParse(context.payload)
      if (!parsed.success) return null
      const message = parsed.data.message
      const createdAt = message.createdAt ?? message.created_at
      return {
        kind: 'message-append',
        conversationId,
        message: {
          id: message.id,
          role: message.role,
          content: message.content ?? '',
          model: message.model ?? null,
          createdAt: createdAt === undefined ? null : normalizeTimestamp(createdAt),
        },
      }
    }
    case 'message-chunk':
    case 'chat:message:delta':
    case 'message': {
      const parsed = contentSchema.safeParse(context.payload)
      return parsed.success
        ? { kind: 'message-chunk', ...target, content: parsed.data.content }
        : null
    }
    case 'message-replace':
    case 'chat:message':
    case 'replace': {
      const parsed = contentSchema.safeParse(context.payload)
      if (!parsed.success) return null
      // an empty replace would blank the streamed text
      return parsed.data.content
        ? { kind: 'message-replace', ...target, content: parsed.data.content }
        : { kind: 'unknown', type: context.type }
    }
    case 'message-complete': {
      const parsed = completeSchema.safeParse(context.payload ?? {})
      return parsed.success
        ? { kind: 'message-complete', ...target, content: parsed.data.content ?? null }
        : null
    }
    case 'chat:completion': {
      const parsed = completionSchema.safeParse(context.payload)
      if (!parsed.success) return null
      const content =
        parsed.data.choices?.[0]?.delta?.content ?? parsed.data.content ?? ''
      if (parsed.data.done === true) {
        return { kind: 'message-complete', ...target, content: content || null }
      }
      if (content) {
        return { kind: 'message-chunk', ...target, content }
      }
      // tool-call progress and usage frames carry nothing to store
      return { kind: 'unknown', type: context.type }
    }
    case 'chat:message:error': {
      const parsed = errorSchema.safeParse(context.payload)
      const error = parsed.success ? readErrorText(parsed.data) : null
      return error === null ? null : { kind: 'message-error', ...target, error }
    }
    case 'event:status':
    case 'status': {
      const parsed = statusSchema.safeParse(context.payload)
      return parsed.success
        ? { kind: 'message-status', ...target, status: parsed.data.status }
        : null
    }
    case 'chat:message:files':
    case 'files': {
      const parsed = filesSchema.safeParse(context.data)
      if (!parsed.success) return null
      const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.files
      return { kind: 'message-files', ...target, files: toFiles(entries) }
    }
    default:
      return undefined
  }
}

const decodeConversationEvent = (
  context: DecodeContext,
  conversationId: string,
): DeltaEvent | null | undefined => {
  switch (context.type) {
    case 'conversation-updated': {
      const parsed = conversationUpdatedSchema.safeParse(context.payload)
      return parsed.success
        ? { kind: 'conversation-updated', conversationId, changes: toChanges(parsed.data) }
        : null
    }
    case 'chat:title': {
      const parsed = titleSchema.safeParse(context.data)
      if (!parsed.success) return null
      const title = typeof parsed.data === 'string' ? parsed.data : parsed.data.title
      return { kind: 'conversation-updated', conversationId, changes: { title } }
    }
    case 'chat:tags': {
      const parsed = tagsSchema.safeParse(context.data)
      if (!parsed.success) return null
      const tags = Array.isArray(parsed.data) ? parsed.data : parsed.data.tags
      return {
        kind: 'conversation-updated',
        conversationId,
        changes: { tags: dedupeTags(tags) },
      }
    }
    case 'conversation-deleted':
    case 'chat:deleted':
      return { kind: 'conversation-deleted', conversationId }
    default:
      return undefined
  }
}

const KNOWN_TYPES = new Set([
  'message-append',
  'message-chunk',
  'chat:message:delta',
  'message',
  'message-replace',
  'chat:message',
  'replace',
  'message-complete',
  'chat:completion',
  'chat:message:error',
  'event:status',
  'status',
  'chat:message:files',
  'files',
  'conversation-updated',
  'chat:title',
  'chat:tags',
  'conversation-deleted',
  'chat:deleted',
])

export const isKnownDeltaType = (type: string) => KNOWN_TYPES.has(type)

const decodeEvent = (context: DecodeContext): DeltaEvent | null => {
  if (!isKnownDeltaType(context.type)) {
    return { kind: 'unknown', type: context.type }
  }

  // every known type addresses a conversation
  if (!context.conversationId) {
    return null
  }

  const messageEvent = decodeMessageEvent(context, context.conversationId)
  if (messageEvent !== undefined) {
    return messageEvent
  }
  return decodeConversationEvent(context, context.conversationId) ?? null
}

const buildContext = (envelope: Envelope): DecodeContext => {
  const data = envelope.data.data
  const payload = isRecord(data) ? data : null

  return {
    type: envelope.data.type,
    data,
    payload,
    conversationId: pickString(
      payload?.conversationId,
      payload?.chat_id,
      envelope.chat_id,
    ),
    messageId: pickString(
      payload?.messageId,
      payload?.message_id,
      envelope.message_id,
    ),
  }
}

export function decodeDelta(
  source: ConversationDeltaSource,
  raw: unknown,
  ack?: DeltaAck,
): ConversationDelta {
  const envelope = envelopeSchema.safeParse(raw)
  if (!envelope.success) {
    return { source, raw, type: null, payload: null, sessionId: null, event: null, ack }
  }

  const context = buildContext(envelope.data)

  return {
    source,
    raw,
    type: context.type,
    payload: context.payload,
    sessionId: envelope.data.session_id ?? null,
    event: decodeEvent(context),
    ack,
  }
}

export const conversationIdOf = (event: DeltaEvent): string | null =>
  event.kind === 'unknown' ? null : event.conversationId

import type {
  ChatMessage,
  ChatMessageRole,
  Conversation,
  ConversationField,
  Folder,
  MessageFile,
} from '@/types/conversation'

export type ConversationInput = Partial<Omit<Conversation, 'id' | 'tags'>> & {
  id: string
  tags?: Iterable<string>
}

export type FolderInput = Partial<Omit<Folder, 'id'>> & { id: string }

export type ChatMessageInput = Partial<Omit<ChatMessage, 'id'>> & { id: string }

const EPOCH = new Date(0).toISOString()

// Values above this are already milliseconds.
const MILLISECOND_THRESHOLD = 1_000_000_000_000

export const normalizeTimestamp = (
  value: unknown,
  fallback: string = EPOCH,
): string => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    const ms = value > MILLISECOND_THRESHOLD ? value : value * 1000
    return new Date(ms).toISOString()
  }

  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (/^\d+$/.test(trimmed)) {
      return normalizeTimestamp(Number(trimmed), fallback)
    }
    const parsed = Date.parse(trimmed)
    if (!Number.isNaN(parsed)) {
      return new Date(parsed).toISOString()
    }
  }

  return fallback
}

export const dedupeTags = (tags: Iterable<string>): string[] => {
  const seen = new Set<string>()
  for (const tag of tags) {
    const trimmed = tag.trim()
    if (trimmed) seen.add(trimmed)
  }
  return Array.from(seen)
}

export const mergeFiles = (
  existing: MessageFile[],
  incoming: MessageFile[],
): MessageFile[] => {
  const seen = new Set(existing.map((file) => file.url))
  const merged = [...existing]
  for (const file of incoming) {
    if (file.url && !seen.has(file.url)) {
      merged.push(file)
      seen.add(file.url)
    }
  }
  return merged
}

export const createConversation = (input: ConversationInput): Conversation => {
  const createdAt = input.createdAt ?? EPOCH
  return {
    id: input.id,
    title: input.title ?? '',
    createdAt,
    updatedAt: input.updatedAt ?? createdAt,
    pinned: input.pinned ?? false,
    archived: input.archived ?? false,
    folderId: input.folderId ?? null,
    tags: dedupeTags(input.tags ?? []),
    model: input.model ?? null,
    messages: input.messages ? [...input.messages] : [],
    metadata: { ...(input.metadata ?? {}) },
  }
}

export const withField = <F extends ConversationField>(
  conversation: Conversation,
  field: F,
  value: Conversation[F],
): Conversation => {
  const next = { ...conversation }
  next[field] = value
  return next
}

export const createFolder = (input: FolderInput): Folder => {
  const createdAt = input.createdAt ?? EPOCH
  return {
    id: input.id,
    name: input.name ?? '',
    parentId: input.parentId ?? null,
    createdAt,
    updatedAt: input.updatedAt ?? createdAt,
  }
}

export const createChatMessage = (input: ChatMessageInput): ChatMessage => ({
  id: input.id,
  role: input.role ?? 'assistant',
  content: input.content ?? '',
  createdAt: input.createdAt ?? EPOCH,
  model: input.model ?? null,
  isStreaming: input.isStreaming ?? false,
  metadata: { ...(input.metadata ?? {}) },
  files: input.files ? mergeFiles([], input.files) : [],
})

export const isChatMessageRole = (value: unknown): value is ChatMessageRole =>
  value === 'user' || value === 'assistant' || value === 'system'

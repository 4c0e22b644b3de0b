import { z } from 'zod'
import type { ConversationsApi } from '@/types/api'
import type { ChatMessage, Conversation, Folder, MessageFile } from '@/types/conversation'
import {
  createChatMessage,
  createConversation,
  createFolder,
  isChatMessageRole,
  normalizeTimestamp,
} from '@/lib/conversation/records'
import type { SyncLogger } from '@/lib/logger'
import { silentLogger } from '@/lib/logger'

// listing stops here even if the server keeps returning pages
export const MAX_LIST_PAGES = 100

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

type HttpApiOptions = {
  baseUrl: string
  token?: string
  fetch?: FetchLike
  logger?: SyncLogger
}

const timestampSchema = z.union([z.string(), z.number()]).nullable().optional()

const fileSchema = z.union([
  z.string(),
  z.object({ url: z.string().optional(), type: z.string().optional() }).passthrough(),
])

const messageSchema = z
  .object({
    id: z.string(),
    role: z.string(),
    content: z.string().nullable().optional(),
    model: z.string().nullable().optional(),
    timestamp: timestampSchema,
    files: z.array(fileSchema).nullable().optional(),
  })
  .passthrough()

const chatSchema = z
  .object({
    id: z.string(),
    title: z.string().nullable().optional(),
    created_at: timestampSchema,
    updated_at: timestampSchema,
    pinned: z.boolean().nullable().optional(),
    archived: z.boolean().nullable().optional(),
    folder_id: z.string().nullable().optional(),
    chat: z
      .object({
        messages: z.array(messageSchema).optional(),
        tags: z.array(z.string()).optional(),
        models: z.array(z.string()).optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
    meta: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough()

const folderSchema = z
  .object({
    id: z.string(),
    name: z.string().nullable().optional(),
    parent_id: z.string().nullable().optional(),
    created_at: timestampSchema,
    updated_at: timestampSchema,
  })
  .passthrough()

type ChatPayload = z.infer<typeof chatSchema>
type MessagePayload = z.infer<typeof messageSchema>

const toFileUrls = (files: MessagePayload['files']) =>
  (files ?? [])
    .map((file) => (typeof file === 'string' ? file : file.url))
    .filter((url): url is string => typeof url === 'string' && url.length > 0)

const toChatMessage = (message: MessagePayload): ChatMessage =>
  createChatMessage({
    id: message.id,
    role: isChatMessageRole(message.role) ? message.role : 'assistant',
    content: message.content ?? '',
    model: message.model ?? null,
    createdAt: normalizeTimestamp(message.timestamp),
    files: toFileUrls(message.files).map((url): MessageFile => ({ type: 'image', url })),
  })

export const toConversation = (payload: ChatPayload): Conversation => {
  const createdAt = normalizeTimestamp(payload.created_at)
  const tags = payload.chat?.tags ?? []
  const metaTags = payload.meta?.tags

  return createConversation({
    id: payload.id,
    title: payload.title ?? '',
    createdAt,
    updatedAt: normalizeTimestamp(payload.updated_at, createdAt),
    pinned: payload.pinned ?? false,
    archived: payload.archived ?? false,
    folderId: payload.folder_id ?? null,
    tags: Array.isArray(metaTags)
      ? [...tags, ...metaTags.filter((tag): tag is string => typeof tag === 'string')]
      : tags,
    model: payload.chat?.models?.[0] ?? null,
    messages: (payload.chat?.messages ?? []).map(toChatMessage),
  })
}

export const toFolder = (payload: z.infer<typeof folderSchema>): Folder => {
  const createdAt = normalizeTimestamp(payload.created_at)
  return createFolder({
    id: payload.id,
    name: payload.name ?? '',
    parentId: payload.parent_id ?? null,
    createdAt,
    updatedAt: normalizeTimestamp(payload.updated_at, createdAt),
  })
}

export const createHttpConversationsApi = (options: HttpApiOptions): ConversationsApi => {
  const baseUrl = options.baseUrl.replace(/\/+$/, '')
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init))
  const logger = options.logger ?? silentLogger

  const request = async (method: string, path: string, body?: unknown): Promise<unknown> => {
    const headers: Record<string, string> = { Accept: 'application/json' }
    if (options.token) {
      headers.Authorization = `Bearer ${options.token}`
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json'
    }

    const res = await fetchImpl(`${baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    })
    if (!res.ok) {
      logger.log('HTTP', 'Request failed', { method, path, status: res.status })
      throw new Error(`${method} ${path} failed: ${res.status}`)
    }

    const text = await res.text()
    return text ? JSON.parse(text) : null
  }

  const parse = <T>(schema: z.ZodType<T>, data: unknown, path: string): T => {
    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      logger.log('HTTP', 'Unexpected response shape', {
        path,
        issues: parsed.error.issues.map((issue) => issue.message),
      })
      throw new Error(`Unexpected response from ${path}`)
    }
    return parsed.data
  }

  const chatPath = (id: string) => `/api/v1/chats/${encodeURIComponent(id)}`
  const folderPath = (id: string) => `/api/v1/folders/${encodeURIComponent(id)}`

  return {
    getConversation: async (id) => {
      const path = chatPath(id)
      return toConversation(parse(chatSchema, await request('GET', path), path))
    },

    updateConversation: async (id, update) => {
      await request('POST', chatPath(id), { chat: { ...update } })
    },

    deleteConversation: async (id) => {
      await request('DELETE', chatPath(id))
    },

    pinConversation: async (id, pinned) => {
      await request('POST', `${chatPath(id)}/pin`, { pinned })
    },

    archiveConversation: async (id, archived) => {
      await request('POST', `${chatPath(id)}/archive`, { archived })
    },

    moveConversationToFolder: async (id, folderId) => {
      await request('POST', `${chatPath(id)}/folder`, { folder_id: folderId })
    },

    createFolder: async (name, parentId = null) => {
      const path = '/api/v1/folders/'
      const body = parentId === null ? { name } : { name, parent_id: parentId }
      return toFolder(parse(folderSchema, await request('POST', path, body), path))
    },

    updateFolder: async (id, update) => {
      await request('PUT', folderPath(id), { ...update })
    },

    deleteFolder: async (id) => {
      await request('DELETE', folderPath(id))
    },

    listConversations: async () => {
      const conversations: Conversation[] = []
      for (let page = 0; page < MAX_LIST_PAGES; page += 1) {
        const path = `/api/v1/chats/?page=${page}`
        const items = parse(z.array(chatSchema), await request('GET', path), path)
        if (items.length === 0) {
          break
        }
        conversations.push(...items.map(toConversation))
      }
      return conversations
    },

    searchConversations: async (query) => {
      const path = `/api/v1/chats/search?q=${encodeURIComponent(query)}`
      return parse(z.array(chatSchema), await request('GET', path), path).map(toConversation)
    },

    listFolders: async () => {
      const path = '/api/v1/folders/'
      return parse(z.array(folderSchema), await request('GET', path), path).map(toFolder)
    },
  }
}

import { vi } from 'vitest'
import type { ConversationsApi } from '@/types/api'
import type { Conversation, Folder } from '@/types/conversation'
import {
  createConversation,
  createFolder,
  type ConversationInput,
} from '@/lib/conversation/records'

export type Deferred<T> = {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (error: unknown) => void
}

export const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => {}
  let reject: (error: unknown) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

export const conversation = (id: string, input: Partial<ConversationInput> = {}): Conversation =>
  createConversation({
    title: id,
    createdAt: '2024-01-01T00:00:00.000Z',
    ...input,
    id,
  })

export const folder = (id: string, name = id): Folder =>
  createFolder({ id, name, createdAt: '2024-01-01T00:00:00.000Z' })

export const createApiMock = () => ({
  getConversation: vi.fn<ConversationsApi['getConversation']>(),
  updateConversation: vi.fn<ConversationsApi['updateConversation']>(),
  deleteConversation: vi.fn<ConversationsApi['deleteConversation']>(),
  pinConversation: vi.fn<ConversationsApi['pinConversation']>(),
  archiveConversation: vi.fn<ConversationsApi['archiveConversation']>(),
  moveConversationToFolder: vi.fn<ConversationsApi['moveConversationToFolder']>(),
  createFolder: vi.fn<ConversationsApi['createFolder']>(),
  updateFolder: vi.fn<ConversationsApi['updateFolder']>(),
  deleteFolder: vi.fn<ConversationsApi['deleteFolder']>(),
  listConversations: vi.fn<ConversationsApi['listConversations']>(),
  searchConversations: vi.fn<ConversationsApi['searchConversations']>(),
  listFolders: vi.fn<ConversationsApi['listFolders']>(),
})

export type ApiMock = ReturnType<typeof createApiMock>

export const envelope = (type: string, data: unknown, extra: Record<string, unknown> = {}) => ({
  ...extra,
  data: { type, data },
})

import type { Conversation, Folder } from './conversation'

export type ConversationUpdate = {
  title?: string
}

export type FolderUpdate = {
  name?: string
}

export type ConversationsApi = {
  getConversation: (id: string) => Promise<Conversation>
  updateConversation: (id: string, update: ConversationUpdate) => Promise<void>
  deleteConversation: (id: string) => Promise<void>
  pinConversation: (id: string, pinned: boolean) => Promise<void>
  archiveConversation: (id: string, archived: boolean) => Promise<void>
  moveConversationToFolder: (id: string, folderId: string | null) => Promise<void>
  createFolder: (name: string, parentId?: string | null) => Promise<Folder>
  updateFolder: (id: string, update: FolderUpdate) => Promise<void>
  deleteFolder: (id: string) => Promise<void>
  listConversations: () => Promise<Conversation[]>
  searchConversations: (query: string) => Promise<Conversation[]>
  listFolders: () => Promise<Folder[]>
}

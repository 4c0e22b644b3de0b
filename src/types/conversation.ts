export type ChatMessageRole = 'user' | 'assistant' | 'system'

export type MessageFile = {
  type: 'image'
  url: string
}

export type ChatMessage = {
  id: string
  role: ChatMessageRole
  content: string
  createdAt: string
  model: string | null
  isStreaming: boolean
  metadata: Record<string, unknown>
  files: MessageFile[]
}

export type Conversation = {
  id: string
  title: string
  createdAt: string
  updatedAt: string
  pinned: boolean
  archived: boolean
  folderId: string | null
  tags: string[]
  model: string | null
  messages: ChatMessage[]
  metadata: Record<string, unknown>
}

export type Folder = {
  id: string
  name: string
  parentId: string | null
  createdAt: string
  updatedAt: string
}

// Fields the optimistic protocol and the reconciler arbitrate per conversation.
export type ConversationField = 'title' | 'pinned' | 'archived' | 'folderId'

export type ConversationFieldValues = Pick<Conversation, ConversationField>

export type ConversationChanges = Partial<
  ConversationFieldValues & Pick<Conversation, 'tags' | 'model' | 'updatedAt'>
>

export type ConversationPartitionName =
  | 'pinned'
  | 'archived'
  | 'foldered'
  | 'regular'

export type FolderGroup = {
  folder: Folder
  conversations: Conversation[]
}

export type ConversationPartitions = {
  pinned: Conversation[]
  archived: Conversation[]
  foldered: FolderGroup[]
  regular: Conversation[]
  // Conversations shown as regular because their folder is not loaded.
  danglingConversationIds: string[]
}

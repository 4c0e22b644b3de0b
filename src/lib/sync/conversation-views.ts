import type {
  Conversation,
  ConversationPartitionName,
  ConversationPartitions,
  Folder,
} from '@/types/conversation'
import type { ConversationStoreState } from '@/stores/conversationStore'

export const partitionOf = (
  conversation: Conversation,
  folderIds: ReadonlySet<string>,
): ConversationPartitionName => {
  if (conversation.pinned) return 'pinned'
  if (conversation.archived) return 'archived'
  if (conversation.folderId !== null && folderIds.has(conversation.folderId)) {
    return 'foldered'
  }
  return 'regular'
}

/**
 * Splits conversations into display buckets. A conversation whose folder is
 * not in `folders` lands in `regular` and its id is reported as dangling.
 */
export const partitionConversations = (
  conversations: readonly Conversation[],
  folders: readonly Folder[],
): ConversationPartitions => {
  const folderIds = new Set(folders.map((folder) => folder.id))
  const grouped = new Map<string, Conversation[]>(
    folders.map((folder) => [folder.id, []]),
  )
  const partitions: ConversationPartitions = {
    pinned: [],
    archived: [],
    foldered: [],
    regular: [],
    danglingConversationIds: [],
  }

  for (const conversation of conversations) {
    const partition = partitionOf(conversation, folderIds)
    if (partition === 'foldered' && conversation.folderId !== null) {
      grouped.get(conversation.folderId)?.push(conversation)
      continue
    }
    if (partition === 'regular' && conversation.folderId !== null) {
      partitions.danglingConversationIds.push(conversation.id)
    }
    if (partition !== 'foldered') {
      partitions[partition].push(conversation)
    }
  }

  partitions.foldered = folders.map((folder) => ({
    folder,
    conversations: grouped.get(folder.id) ?? [],
  }))
  return partitions
}

type PartitionSource = Pick<ConversationStoreState, 'conversations' | 'folders' | 'version'>

export const createPartitionSelector = () => {
  let cached: { version: number; partitions: ConversationPartitions } | null = null

  return (state: PartitionSource): ConversationPartitions => {
    if (cached && cached.version === state.version) {
      return cached.partitions
    }
    const partitions = partitionConversations(state.conversations, state.folders)
    cached = { version: state.version, partitions }
    return partitions
  }
}

import type { Conversation, ConversationField, Folder } from '@/types/conversation'
import type { PendingMutations } from './pending-mutations'

export const CONVERSATION_FIELDS: readonly ConversationField[] = [
  'title',
  'pinned',
  'archived',
  'folderId',
]

const keepLocalField = <F extends ConversationField>(
  field: F,
  target: Conversation,
  remote: Conversation,
  local: Conversation,
  pending: PendingMutations,
) => {
  // the server value becomes the rollback target; the screen keeps local intent
  if (pending.fields[field].hold(remote.id, remote[field])) {
    target[field] = local[field]
  }
}

/**
 * Folds a server snapshot of one conversation into what the store shows,
 * keeping every field that has an optimistic mutation in flight.
 */
export const mergeRemoteConversation = (
  remote: Conversation,
  local: Conversation | undefined,
  pending: PendingMutations,
): Conversation => {
  if (!local) {
    return remote
  }

  const merged: Conversation = {
    ...remote,
    messages: remote.messages.length > 0 ? remote.messages : local.messages,
  }
  for (const field of CONVERSATION_FIELDS) {
    keepLocalField(field, merged, remote, local, pending)
  }
  return merged
}

export const mergeRemoteConversationList = (
  remote: Conversation[],
  local: Conversation[],
  pending: PendingMutations,
): Conversation[] => {
  const localById = new Map(local.map((item) => [item.id, item]))

  return remote
    .filter((item) => !pending.conversation.has(item.id))
    .map((item) => mergeRemoteConversation(item, localById.get(item.id), pending))
}

export const mergeRemoteFolderList = (
  remote: Folder[],
  local: Folder[],
  pending: PendingMutations,
): Folder[] => {
  const localById = new Map(local.map((item) => [item.id, item]))
  const merged = remote
    .filter((item) => !pending.folder.has(item.id))
    .map((item) => {
      const current = localById.get(item.id)
      if (current && pending.folderName.hold(item.id, item.name)) {
        return { ...item, name: current.name }
      }
      return item
    })

  // placeholders for folders still being created stay visible
  const remoteIds = new Set(remote.map((item) => item.id))
  const placeholders = local.filter(
    (item) => !remoteIds.has(item.id) && pending.folder.get(item.id)?.kind === 'create-folder',
  )

  return [...merged, ...placeholders]
}

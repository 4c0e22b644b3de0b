import type { ConversationsApi } from '@/types/api'
import type { Conversation, ConversationField, Folder } from '@/types/conversation'
import type {
  MutationError,
  MutationKind,
  MutationOutcomes,
  MutationResult,
  MutationValues,
} from '@/types/sync'
import type { ConversationStore } from '@/stores/conversationStore'
import { createFolder as buildFolder, withField } from '@/lib/conversation/records'
import type { SyncLogger } from '@/lib/logger'
import type { PendingMutations } from './pending-mutations'

type MutationHandlers = {
  [K in MutationKind]: (
    entityId: string,
    value: MutationValues[K],
  ) => Promise<MutationResult<MutationOutcomes[K]>>
}

export type MutationCoordinator = {
  mutate: <K extends MutationKind>(
    entityId: string,
    kind: K,
    value: MutationValues[K],
  ) => Promise<MutationResult<MutationOutcomes[K]>>
  setPinned: (id: string, pinned: boolean) => Promise<MutationResult<void>>
  setArchived: (id: string, archived: boolean) => Promise<MutationResult<void>>
  rename: (id: string, title: string) => Promise<MutationResult<void>>
  moveToFolder: (id: string, folderId: string | null) => Promise<MutationResult<void>>
  deleteConversation: (id: string) => Promise<MutationResult<void>>
  createFolder: (name: string, parentId?: string | null) => Promise<MutationResult<Folder>>
  renameFolder: (id: string, name: string) => Promise<MutationResult<void>>
  deleteFolder: (id: string) => Promise<MutationResult<void>>
}

type CoordinatorDeps = {
  store: ConversationStore
  api: ConversationsApi
  pending: PendingMutations
  logger: SyncLogger
  now?: () => string
  createLocalId?: () => string
}

const succeeded = <T>(value: T, stale = false): MutationResult<T> => ({
  ok: true,
  value,
  stale,
})

const failed = <T>(error: MutationError): MutationResult<T> => ({ ok: false, error })

const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error)

const networkFailure = <T>(error: unknown): MutationResult<T> =>
  failed({ kind: 'transient-network', message: describeError(error), cause: error })

const notFound = <T>(message: string): MutationResult<T> =>
  failed({ kind: 'not-found', message })

const invalidInput = <T>(message: string): MutationResult<T> =>
  failed({ kind: 'invalid-input', message })

const staleFailure = <T>(): MutationResult<T> =>
  failed({ kind: 'stale-result', message: 'Superseded by a newer change' })

const createLocalIdFactory = () => {
  let counter = 0
  return () => {
    counter += 1
    return `local-folder-${counter}`
  }
}

export const createMutationCoordinator = ({
  store,
  api,
  pending,
  logger,
  now = () => new Date().toISOString(),
  createLocalId = createLocalIdFactory(),
}: CoordinatorDeps): MutationCoordinator => {
  const recordStale = (kind: MutationKind, entityId: string) => {
    store.getState().recordDiagnostic('staleResultsDiscarded')
    logger.log('MUTATION', 'Superseded settlement ignored', { kind, entityId })
  }

  const isFolderBeingCreated = (id: string) =>
    pending.folder.get(id)?.kind === 'create-folder'

  // A delete still in flight reinserts its snapshot on failure, so a field
  // rolled back meanwhile has to land in that snapshot.
  const rollBackRemovedField = <F extends ConversationField>(
    id: string,
    field: F,
    value: Conversation[F],
  ) => {
    const removal = pending.conversation.get(id)?.baseline
    if (!removal) {
      logger.log('MUTATION', 'Rollback target is gone', { id, field })
      return
    }

    removal.entry = withField(removal.entry, field, value)
    const { active } = removal
    if (active && active.conversation) {
      active.conversation = withField(active.conversation, field, value)
    }
  }

  const runFieldMutation = async <F extends ConversationField>(
    field: F,
    id: string,
    kind: MutationKind,
    value: Conversation[F],
    call: () => Promise<void>,
  ): Promise<MutationResult<void>> => {
    const conversation = store.getState().getConversation(id)
    if (!conversation) {
      return notFound(`Conversation ${id} is not loaded`)
    }

    const registry = pending.fields[field]
    const mutation = registry.begin(id, kind, conversation[field])
    store.getState().setConversationField(id, field, value)

    try {
      await call()
    } catch (error) {
      if (!registry.isLatest(id, mutation.seq)) {
        recordStale(kind, id)
        return staleFailure()
      }

      const settled = registry.settle(id) ?? mutation
      if (!store.getState().setConversationField(id, field, settled.baseline)) {
        rollBackRemovedField(id, field, settled.baseline)
      }
      logger.log('MUTATION', 'Rolled back after remote failure', { kind, id, error })
      return networkFailure(error)
    }

    if (!registry.isLatest(id, mutation.seq)) {
      // the server accepted this value; a failure later in the same chain rolls back to it
      registry.confirm(id, mutation.seq, value)
      recordStale(kind, id)
      return succeeded(undefined, true)
    }

    registry.settle(id)
    return succeeded(undefined)
  }

  const deleteConversation = async (id: string): Promise<MutationResult<void>> => {
    const removed = store.getState().removeConversation(id)
    if (!removed) {
      return notFound(`Conversation ${id} is not loaded`)
    }

    const mutation = pending.conversation.begin(id, 'delete', removed)

    try {
      await api.deleteConversation(id)
    } catch (error) {
      if (!pending.conversation.isLatest(id, mutation.seq)) {
        recordStale('delete', id)
        return staleFailure()
      }

      const settled = pending.conversation.settle(id) ?? mutation
      if (settled.baseline === null) {
        logger.log('MUTATION', 'Delete failed but server already removed it', { id })
        return succeeded(undefined, true)
      }

      const { entry, index, active } = settled.baseline
      store.getState().insertConversation(entry, index)
      if (active) {
        store.getState().restoreActiveConversation(active)
      }
      logger.log('MUTATION', 'Reinserted conversation after failed delete', { id, error })
      return networkFailure(error)
    }

    pending.conversation.settle(id)
    return succeeded(undefined)
  }

  const createFolder = async (
    localId: string,
    input: MutationValues['create-folder'],
  ): Promise<MutationResult<Folder>> => {
    const name = input.name.trim()
    if (!name) {
      return invalidInput('Folder name is empty')
    }

    const timestamp = now()
    store.getState().insertFolder(
      buildFolder({ id: localId, name, parentId: input.parentId, createdAt: timestamp }),
    )
    const mutation = pending.folder.begin(localId, 'create-folder', null)

    let created: Folder
    try {
      created = await api.createFolder(name, input.parentId)
    } catch (error) {
      if (pending.folder.isLatest(localId, mutation.seq)) {
        pending.folder.settle(localId)
      }
      store.getState().removeFolder(localId)
      logger.log('MUTATION', 'Removed placeholder after failed folder create', {
        localId,
        error,
      })
      return networkFailure(error)
    }

    pending.folder.settle(localId)
    if (!store.getState().replaceFolder(localId, created)) {
      store.getState().insertFolder(created)
    }
    return succeeded(created)
  }

  const renameFolder = async (id: string, name: string): Promise<MutationResult<void>> => {
    const folder = store.getState().getFolder(id)
    if (!folder || isFolderBeingCreated(id)) {
      return notFound(`Folder ${id} is not available`)
    }

    const mutation = pending.folderName.begin(id, 'rename-folder', folder.name)
    store.getState().patchFolder(id, { name })

    try {
      await api.updateFolder(id, { name })
    } catch (error) {
      if (!pending.folderName.isLatest(id, mutation.seq)) {
        recordStale('rename-folder', id)
        return staleFailure()
      }

      const settled = pending.folderName.settle(id) ?? mutation
      store.getState().patchFolder(id, { name: settled.baseline })
      logger.log('MUTATION', 'Rolled back folder rename', { id, error })
      return networkFailure(error)
    }

    if (!pending.folderName.isLatest(id, mutation.seq)) {
      pending.folderName.confirm(id, mutation.seq, name)
      recordStale('rename-folder', id)
      return succeeded(undefined, true)
    }

    pending.folderName.settle(id)
    return succeeded(undefined)
  }

  const deleteFolder = async (id: string): Promise<MutationResult<void>> => {
    if (isFolderBeingCreated(id)) {
      return notFound(`Folder ${id} is still being created`)
    }
    const removed = store.getState().removeFolder(id)
    if (!removed) {
      return notFound(`Folder ${id} is not loaded`)
    }

    const mutation = pending.folder.begin(id, 'delete-folder', removed)

    try {
      await api.deleteFolder(id)
    } catch (error) {
      if (!pending.folder.isLatest(id, mutation.seq)) {
        recordStale('delete-folder', id)
        return staleFailure()
      }

      const settled = pending.folder.settle(id) ?? mutation
      if (settled.baseline) {
        store.getState().insertFolder(settled.baseline.entry, settled.baseline.index)
      }
      logger.log('MUTATION', 'Reinserted folder after failed delete', { id, error })
      return networkFailure(error)
    }

    pending.folder.settle(id)
    // the server cascades the unfile; mirror it only once confirmed
    const unfiled = store.getState().clearFolderReferences(id)
    pending.fields.folderId.rebase((baseline) => baseline === id, null)
    logger.log('MUTATION', 'Folder deleted', { id, unfiled: unfiled.length })
    return succeeded(undefined)
  }

  const handlers: MutationHandlers = {
    'set-pinned': (id, pinned) =>
      runFieldMutation('pinned', id, 'set-pinned', pinned, () =>
        api.pinConversation(id, pinned),
      ),
    'set-archived': (id, archived) =>
      runFieldMutation('archived', id, 'set-archived', archived, () =>
        api.archiveConversation(id, archived),
      ),
    rename: async (id, title) => {
      const trimmed = title.trim()
      if (!trimmed) {
        return invalidInput('Title is empty')
      }
      return runFieldMutation('title', id, 'rename', trimmed, () =>
        api.updateConversation(id, { title: trimmed }),
      )
    },
    'move-to-folder': async (id, folderId) => {
      if (folderId !== null && isFolderBeingCreated(folderId)) {
        return notFound(`Folder ${folderId} is still being created`)
      }
      return runFieldMutation('folderId', id, 'move-to-folder', folderId, () =>
        api.moveConversationToFolder(id, folderId),
      )
    },
    delete: (id) => deleteConversation(id),
    'create-folder': (localId, input) => createFolder(localId, input),
    'rename-folder': async (id, name) => {
      const trimmed = name.trim()
      if (!trimmed) {
        return invalidInput('Folder name is empty')
      }
      return renameFolder(id, trimmed)
    },
    'delete-folder': (id) => deleteFolder(id),
  }

  const mutate = <K extends MutationKind>(
    entityId: string,
    kind: K,
    value: MutationValues[K],
  ): Promise<MutationResult<MutationOutcomes[K]>> => handlers[kind](entityId, value)

  return {
    mutate,
    setPinned: (id, pinned) => mutate(id, 'set-pinned', pinned),
    setArchived: (id, archived) => mutate(id, 'set-archived', archived),
    rename: (id, title) => mutate(id, 'rename', title),
    moveToFolder: (id, folderId) => mutate(id, 'move-to-folder', folderId),
    deleteConversation: (id) => mutate(id, 'delete', null),
    createFolder: (name, parentId = null) =>
      mutate(createLocalId(), 'create-folder', { name, parentId }),
    renameFolder: (id, name) => mutate(id, 'rename-folder', name),
    deleteFolder: (id) => mutate(id, 'delete-folder', null),
  }
}

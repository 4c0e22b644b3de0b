import type { Conversation, Folder } from './conversation'

export type SyncDiagnostics = {
  malformedDeltas: number
  discardedDeltas: number
  staleResultsDiscarded: number
  droppedQueuedDeltas: number
}

export type DiagnosticCounter = keyof SyncDiagnostics

export type ActiveLoad =
  | { status: 'idle' }
  | { status: 'loading'; token: number; conversationId: string }
  | {
      status: 'settled'
      token: number
      conversationId: string
      source: 'remote' | 'fallback'
    }

export type RemovedEntry<T> = {
  entry: T
  index: number
}

export type RemovedConversation = RemovedEntry<Conversation> & {
  // what was on screen when the conversation was removed, if it was active;
  // `conversation` is null while its load is still in flight
  active: {
    conversationId: string
    conversation: Conversation | null
    load: ActiveLoad
  } | null
}

export type RemovedFolder = RemovedEntry<Folder>

export type MutationKind =
  | 'set-pinned'
  | 'set-archived'
  | 'rename'
  | 'move-to-folder'
  | 'delete'
  | 'create-folder'
  | 'rename-folder'
  | 'delete-folder'

export type MutationValues = {
  'set-pinned': boolean
  'set-archived': boolean
  rename: string
  'move-to-folder': string | null
  delete: null
  'create-folder': { name: string; parentId: string | null }
  'rename-folder': string
  'delete-folder': null
}

export type MutationOutcomes = {
  'set-pinned': void
  'set-archived': void
  rename: void
  'move-to-folder': void
  delete: void
  'create-folder': Folder
  'rename-folder': void
  'delete-folder': void
}

export type MutationError =
  | { kind: 'transient-network'; message: string; cause: unknown }
  | { kind: 'stale-result'; message: string }
  | { kind: 'not-found'; message: string }
  | { kind: 'invalid-input'; message: string }

export type MutationResult<T> =
  | { ok: true; value: T; stale: boolean }
  | { ok: false; error: MutationError }

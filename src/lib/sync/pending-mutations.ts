import type { Conversation, ConversationField } from '@/types/conversation'
import type { MutationKind, RemovedConversation, RemovedFolder } from '@/types/sync'

export type PendingMutation<V> = {
  entityId: string
  kind: MutationKind
  // value to restore on rollback: the newest server-side value known so far
  baseline: V
  seq: number
  // seq of the first mutation in the chain of supersessions this one belongs to
  chainStart: number
  // seq of the newest superseded call the server accepted, 0 when none
  confirmedSeq: number
  issuedAt: number
  // a server value arrived for this field while the mutation was in flight
  heldServerValue: boolean
}

/** Outstanding optimistic mutations for one field, keyed by entity id. */
export type PendingRegistry<V> = {
  begin: (entityId: string, kind: MutationKind, baseline: V) => PendingMutation<V>
  get: (entityId: string) => PendingMutation<V> | undefined
  has: (entityId: string) => boolean
  isLatest: (entityId: string, seq: number) => boolean
  confirm: (entityId: string, seq: number, value: V) => boolean
  hold: (entityId: string, value: V) => boolean
  settle: (entityId: string) => PendingMutation<V> | undefined
  rebase: (shouldRebase: (baseline: V) => boolean, value: V) => string[]
  size: () => number
  clear: () => void
}

export type ConversationFieldRegistries = {
  [F in ConversationField]: PendingRegistry<Conversation[F]>
}

export type PendingMutations = {
  fields: ConversationFieldRegistries
  // existence of a conversation; a null baseline means absent on the server
  conversation: PendingRegistry<RemovedConversation | null>
  // existence of a folder; a null baseline means absent on the server
  folder: PendingRegistry<RemovedFolder | null>
  folderName: PendingRegistry<string>
  hasAnyFor: (entityId: string) => boolean
  count: () => number
  clear: () => void
}

type SequenceSource = () => number

const createPendingRegistry = <V>(
  nextSeq: SequenceSource,
  now: () => number,
): PendingRegistry<V> => {
  const entries = new Map<string, PendingMutation<V>>()

  return {
    begin: (entityId, kind, baseline) => {
      const existing = entries.get(entityId)
      const seq = nextSeq()
      const mutation: PendingMutation<V> = {
        entityId,
        kind,
        // a superseding mutation inherits the rollback target of the one it replaces
        baseline: existing ? existing.baseline : baseline,
        seq,
        chainStart: existing ? existing.chainStart : seq,
        confirmedSeq: existing ? existing.confirmedSeq : 0,
        issuedAt: now(),
        heldServerValue: existing?.heldServerValue ?? false,
      }
      entries.set(entityId, mutation)
      return mutation
    },

    get: (entityId) => entries.get(entityId),

    has: (entityId) => entries.has(entityId),

    isLatest: (entityId, seq) => entries.get(entityId)?.seq === seq,

    // A late success only counts while the chain that superseded it is still
    // in flight, and never over a newer accepted call.
    confirm: (entityId, seq, value) => {
      const existing = entries.get(entityId)
      if (!existing || seq < existing.chainStart || seq <= existing.confirmedSeq) {
        return false
      }
      existing.baseline = value
      existing.confirmedSeq = seq
      return true
    },

    hold: (entityId, value) => {
      const existing = entries.get(entityId)
      if (!existing) {
        return false
      }
      existing.baseline = value
      existing.heldServerValue = true
      return true
    },

    settle: (entityId) => {
      const existing = entries.get(entityId)
      entries.delete(entityId)
      return existing
    },

    rebase: (shouldRebase, value) => {
      const rebased: string[] = []
      for (const mutation of entries.values()) {
        if (shouldRebase(mutation.baseline)) {
          mutation.baseline = value
          rebased.push(mutation.entityId)
        }
      }
      return rebased
    },

    size: () => entries.size,

    clear: () => entries.clear(),
  }
}

export const createPendingMutations = (
  now: () => number = Date.now,
): PendingMutations => {
  let seq = 0
  const nextSeq = () => {
    seq += 1
    return seq
  }

  const fields: ConversationFieldRegistries = {
    title: createPendingRegistry<string>(nextSeq, now),
    pinned: createPendingRegistry<boolean>(nextSeq, now),
    archived: createPendingRegistry<boolean>(nextSeq, now),
    folderId: createPendingRegistry<string | null>(nextSeq, now),
  }
  const conversation = createPendingRegistry<RemovedConversation | null>(nextSeq, now)
  const folder = createPendingRegistry<RemovedFolder | null>(nextSeq, now)
  const folderName = createPendingRegistry<string>(nextSeq, now)

  const all = () => [
    fields.title,
    fields.pinned,
    fields.archived,
    fields.folderId,
    conversation,
    folder,
    folderName,
  ]

  return {
    fields,
    conversation,
    folder,
    folderName,
    hasAnyFor: (entityId) => all().some((registry) => registry.has(entityId)),
    count: () => all().reduce((total, registry) => total + registry.size(), 0),
    clear: () => {
      for (const registry of all()) {
        registry.clear()
      }
    },
  }
}

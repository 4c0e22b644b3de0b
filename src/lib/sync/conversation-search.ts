import type { ConversationsApi } from '@/types/api'
import type { ConversationPartitions } from '@/types/conversation'
import type { ConversationStore } from '@/stores/conversationStore'
import type { SyncLogger } from '@/lib/logger'
import { partitionConversations } from './conversation-views'

export type SearchResult =
  | { mode: 'local'; query: '' }
  | { mode: 'remote'; query: string; partitions: ConversationPartitions }
  | { mode: 'failed'; query: string; message: string }
  | { mode: 'stale'; query: string }

export type ConversationSearch = {
  search: (query: string) => Promise<SearchResult>
  reset: () => void
}

type SearchDeps = {
  store: ConversationStore
  api: ConversationsApi
  logger: SyncLogger
}

export const createConversationSearch = ({
  store,
  api,
  logger,
}: SearchDeps): ConversationSearch => {
  let latestToken = 0

  return {
    search: async (query) => {
      latestToken += 1
      const token = latestToken
      const trimmed = query.trim()
      if (!trimmed) {
        return { mode: 'local', query: '' }
      }

      try {
        const results = await api.searchConversations(trimmed)
        if (token !== latestToken) {
          store.getState().recordDiagnostic('staleResultsDiscarded')
          return { mode: 'stale', query: trimmed }
        }
        return {
          mode: 'remote',
          query: trimmed,
          partitions: partitionConversations(results, store.getState().folders),
        }
      } catch (error) {
        if (token !== latestToken) {
          store.getState().recordDiagnostic('staleResultsDiscarded')
          return { mode: 'stale', query: trimmed }
        }
        logger.log('SEARCH', 'Remote search failed', { query: trimmed, error })
        return {
          mode: 'failed',
          query: trimmed,
          message: error instanceof Error ? error.message : String(error),
        }
      }
    },

    reset: () => {
      latestToken += 1
    },
  }
}

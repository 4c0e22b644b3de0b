import type { ConversationsApi } from '@/types/api'
import type { Conversation } from '@/types/conversation'
import type { ConversationStore } from '@/stores/conversationStore'
import type { SyncLogger } from '@/lib/logger'
import { mergeRemoteConversation } from './merge-remote'
import type { PendingMutations } from './pending-mutations'

export type SwitchOutcome = 'settled' | 'fallback' | 'idle' | 'stale'

export type SwitchController = {
  select: (conversationId: string) => Promise<SwitchOutcome>
  clear: () => void
  getLatestToken: () => number
}

type SwitchDeps = {
  store: ConversationStore
  api: ConversationsApi
  pending: PendingMutations
  logger: SyncLogger
}

export const createSwitchController = ({
  store,
  api,
  pending,
  logger,
}: SwitchDeps): SwitchController => {
  let latestToken = 0

  const mintToken = () => {
    latestToken += 1
    return latestToken
  }

  const isCurrent = (token: number) => {
    const { activeLoad } = store.getState()
    return (
      token === latestToken &&
      activeLoad.status === 'loading' &&
      activeLoad.token === token
    )
  }

  const discard = (token: number, conversationId: string) => {
    store.getState().recordDiagnostic('staleResultsDiscarded')
    logger.log('SWITCH', 'Stale load discarded', { token, conversationId, latestToken })
    return 'stale' as const
  }

  const land = (token: number, remote: Conversation) => {
    const state = store.getState()
    const merged = mergeRemoteConversation(
      remote,
      state.getConversation(remote.id),
      pending,
    )
    if (!pending.conversation.has(remote.id)) {
      state.upsertConversation(merged)
    }
    store.getState().settleActiveLoad(token, merged, 'remote')
  }

  return {
    select: async (conversationId) => {
      const token = mintToken()
      store.getState().beginActiveLoad(conversationId, token)

      let remote: Conversation
      try {
        remote = await api.getConversation(conversationId)
      } catch (error) {
        if (!isCurrent(token)) {
          return discard(token, conversationId)
        }

        const summary = store.getState().getConversation(conversationId)
        logger.log('SWITCH', 'Load failed, using list summary', {
          conversationId,
          hasSummary: summary !== undefined,
          error,
        })
        store.getState().settleActiveLoad(token, summary ?? null, 'fallback')
        return summary ? 'fallback' : 'idle'
      }

      if (!isCurrent(token)) {
        return discard(token, conversationId)
      }

      land(token, remote)
      return 'settled'
    },

    clear: () => {
      mintToken()
      store.getState().clearActiveConversation()
    },

    getLatestToken: () => latestToken,
  }
}

import type { ConversationsApi } from '@/types/api'
import type { ConversationPartitions } from '@/types/conversation'
import type { ConversationDeltaRequest } from '@/types/delta'
import type { SyncDiagnostics } from '@/types/sync'
import type { SyncConfig } from '@/config/sync-config'
import { getSyncConfig, requireSetting } from '@/config/sync-config'
import { createHttpConversationsApi } from '@/lib/api/http-conversations-api'
import type { FetchLike } from '@/lib/api/http-conversations-api'
import type { SyncLogger } from '@/lib/logger'
import { createSyncLogger } from '@/lib/logger'
import type { ConversationStore } from '@/stores/conversationStore'
import { createConversationStore } from '@/stores/conversationStore'
import { createConversationSearch } from './conversation-search'
import type { ConversationSearch } from './conversation-search'
import { createPartitionSelector } from './conversation-views'
import { createDeltaListener } from './delta-listener'
import type { DeltaListener, DeltaSocket } from './delta-listener'
import { createDeltaReconciler } from './delta-reconciler'
import type { DeltaReconciler } from './delta-reconciler'
import { mergeRemoteConversationList, mergeRemoteFolderList } from './merge-remote'
import { createMutationCoordinator } from './mutation-coordinator'
import type { MutationCoordinator } from './mutation-coordinator'
import { createPendingMutations } from './pending-mutations'
import type { PendingMutations } from './pending-mutations'
import { createSwitchController } from './switch-controller'
import type { SwitchController } from './switch-controller'

export type LoadReport = {
  conversations: 'loaded' | 'failed'
  folders: 'loaded' | 'failed'
}

export type ConversationSync = {
  store: ConversationStore
  pending: PendingMutations
  reconciler: DeltaReconciler
  mutations: MutationCoordinator
  switcher: SwitchController
  search: ConversationSearch
  selectPartitions: () => ConversationPartitions
  loadInitial: () => Promise<LoadReport>
  refresh: () => Promise<LoadReport>
  bindSocket: (
    socket: DeltaSocket,
    request: ConversationDeltaRequest,
    options?: { focused?: boolean },
  ) => DeltaListener
  diagnostics: () => SyncDiagnostics
}

type SyncOptions = {
  // built from SYNC_API_BASE_URL and SYNC_API_TOKEN when omitted
  api?: ConversationsApi
  fetch?: FetchLike
  config?: SyncConfig
  logger?: SyncLogger
  store?: ConversationStore
}

export const createConversationSync = (options: SyncOptions = {}): ConversationSync => {
  const config = options.config ?? getSyncConfig()
  const logger =
    options.logger ?? createSyncLogger({ enabled: config.debugLogging, scope: 'sync' })
  const store = options.store ?? createConversationStore({ devtools: config.devtools })
  const pending = createPendingMutations()
  const api =
    options.api ??
    createHttpConversationsApi({
      baseUrl: requireSetting(config.apiBaseUrl, 'SYNC_API_BASE_URL'),
      token: config.apiToken,
      fetch: options.fetch,
      logger,
    })

  const reconciler = createDeltaReconciler({ store, pending, logger })
  const mutations = createMutationCoordinator({ store, api, pending, logger })
  const switcher = createSwitchController({ store, api, pending, logger })
  const search = createConversationSearch({ store, api, logger })
  const partitions = createPartitionSelector()

  const load = async (): Promise<LoadReport> => {
    const [conversations, folders] = await Promise.allSettled([
      api.listConversations(),
      api.listFolders(),
    ])

    const report: LoadReport = { conversations: 'failed', folders: 'failed' }
    if (conversations.status === 'fulfilled') {
      const state = store.getState()
      state.setConversations(
        mergeRemoteConversationList(conversations.value, state.conversations, pending),
      )
      report.conversations = 'loaded'
    } else {
      logger.log('LOAD', 'Conversation list failed to load', conversations.reason)
    }

    if (folders.status === 'fulfilled') {
      const state = store.getState()
      state.setFolders(mergeRemoteFolderList(folders.value, state.folders, pending))
      report.folders = 'loaded'
    } else {
      // conversations stay visible as regular until folders arrive
      logger.log('LOAD', 'Folder list failed to load', folders.reason)
    }
    return report
  }

  return {
    store,
    pending,
    reconciler,
    mutations,
    switcher,
    search,
    selectPartitions: () => partitions(store.getState()),
    loadInitial: load,
    refresh: load,
    bindSocket: (socket, request, bindOptions = {}) => {
      const listener = createDeltaListener({
        socket,
        request,
        store,
        logger,
        onDelta: (delta) => reconciler.apply(delta),
        maxQueuedDeltas: config.maxQueuedDeltas,
        focused: bindOptions.focused,
      })
      listener.start()
      return listener
    },
    diagnostics: () => store.getState().diagnostics,
  }
}

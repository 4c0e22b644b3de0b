export type * from './types/conversation'
export type * from './types/delta'
export type * from './types/api'
export type * from './types/sync'

export { getSyncConfig, requireSetting, DEFAULT_MAX_QUEUED_DELTAS } from './config/sync-config'
export type { SyncConfig } from './config/sync-config'
export { createSyncLogger, silentLogger } from './lib/logger'
export type { SyncLogger } from './lib/logger'
export {
  createChatMessage,
  createConversation,
  createFolder,
  normalizeTimestamp,
} from './lib/conversation/records'
export { createHttpConversationsApi } from './lib/api/http-conversations-api'
export {
  createConversationStore,
  selectActiveMessages,
} from './stores/conversationStore'
export type { ConversationStore, ConversationStoreState } from './stores/conversationStore'
export { decodeDelta } from './lib/sync/delta-decoder'
export { createDeltaReconciler } from './lib/sync/delta-reconciler'
export { createMutationCoordinator } from './lib/sync/mutation-coordinator'
export type { MutationCoordinator } from './lib/sync/mutation-coordinator'
export { createSwitchController } from './lib/sync/switch-controller'
export type { SwitchController, SwitchOutcome } from './lib/sync/switch-controller'
export { partitionConversations, createPartitionSelector } from './lib/sync/conversation-views'
export { createConversationSearch } from './lib/sync/conversation-search'
export type { SearchResult } from './lib/sync/conversation-search'
export { createDeltaListener } from './lib/sync/delta-listener'
export type { DeltaListener, DeltaSocket } from './lib/sync/delta-listener'
export { createPendingMutations } from './lib/sync/pending-mutations'
export { createConversationSync } from './lib/sync/conversation-sync'
export type { ConversationSync, LoadReport } from './lib/sync/conversation-sync'

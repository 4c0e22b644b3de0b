import { createStore } from "zustand/vanilla";
import { devtools } from "zustand/middleware";
import type {
  ChatMessage,
  Conversation,
  ConversationChanges,
  ConversationField,
  Folder,
} from "@/types/conversation";
import type {
  ActiveLoad,
  DiagnosticCounter,
  RemovedConversation,
  RemovedFolder,
  SyncDiagnostics,
} from "@/types/sync";
import { withField } from "@/lib/conversation/records";

export type ConversationStoreState = {
  conversations: Conversation[];
  folders: Folder[];
  conversationsLoaded: boolean;
  foldersLoaded: boolean;
  activeConversationId: string | null;
  activeConversation: Conversation | null;
  activeLoad: ActiveLoad;
  version: number;
  diagnostics: SyncDiagnostics;
};

export type FolderChanges = Partial<Pick<Folder, "name" | "parentId" | "updatedAt">>;

export type ConversationStoreActions = {
  getConversation: (id: string) => Conversation | undefined;
  getFolder: (id: string) => Folder | undefined;
  setConversations: (conversations: Conversation[]) => void;
  upsertConversation: (conversation: Conversation) => void;
  patchConversation: (id: string, changes: ConversationChanges) => boolean;
  setConversationField: <F extends ConversationField>(
    id: string,
    field: F,
    value: Conversation[F]
  ) => boolean;
  removeConversation: (id: string) => RemovedConversation | null;
  insertConversation: (conversation: Conversation, index: number) => void;
  restoreActiveConversation: (active: NonNullable<RemovedConversation["active"]>) => boolean;
  updateMessages: (
    conversationId: string,
    updater: (messages: ChatMessage[]) => ChatMessage[]
  ) => boolean;
  setFolders: (folders: Folder[]) => void;
  insertFolder: (folder: Folder, index?: number) => void;
  patchFolder: (id: string, changes: FolderChanges) => boolean;
  replaceFolder: (id: string, folder: Folder) => boolean;
  removeFolder: (id: string) => RemovedFolder | null;
  clearFolderReferences: (folderId: string) => string[];
  beginActiveLoad: (conversationId: string, token: number) => void;
  settleActiveLoad: (
    token: number,
    conversation: Conversation | null,
    source: "remote" | "fallback"
  ) => boolean;
  clearActiveConversation: () => void;
  recordDiagnostic: (counter: DiagnosticCounter, amount?: number) => void;
  reset: () => void;
};

export type ConversationStore = ReturnType<typeof createConversationStore>;

type StoreOptions = {
  devtools?: boolean;
  name?: string;
};

export const createEmptyDiagnostics = (): SyncDiagnostics => ({
  malformedDeltas: 0,
  discardedDeltas: 0,
  staleResultsDiscarded: 0,
  droppedQueuedDeltas: 0,
});

export const createInitialConversationState = (): ConversationStoreState => ({
  conversations: [],
  folders: [],
  conversationsLoaded: false,
  foldersLoaded: false,
  activeConversationId: null,
  activeConversation: null,
  activeLoad: { status: "idle" },
  version: 0,
  diagnostics: createEmptyDiagnostics(),
});

const insertAt = <T>(items: T[], item: T, index: number): T[] => {
  const next = [...items];
  if (index < 0 || index > next.length) {
    next.push(item);
  } else {
    next.splice(index, 0, item);
  }
  return next;
};

type ConversationSlice = Pick<
  ConversationStoreState,
  "conversations" | "activeConversation"
>;

// Applies `update` to the list entry and to the open detail when they share the id.
const mapConversation = (
  state: ConversationSlice,
  id: string,
  update: (conversation: Conversation) => Conversation
): (ConversationSlice & { found: boolean }) => {
  let found = false;
  const conversations = state.conversations.map((item) => {
    if (item.id !== id) {
      return item;
    }
    found = true;
    return update(item);
  });

  let activeConversation = state.activeConversation;
  if (activeConversation && activeConversation.id === id) {
    found = true;
    activeConversation = update(activeConversation);
  }

  return { conversations, activeConversation, found };
};

export const createConversationStore = (options: StoreOptions = {}) =>
  createStore<ConversationStoreState & ConversationStoreActions>()(
    devtools(
      (set, get) => ({
        ...createInitialConversationState(),

        getConversation: (id) =>
          get().conversations.find((item) => item.id === id),

        getFolder: (id) => get().folders.find((item) => item.id === id),

        setConversations: (conversations) =>
          set((state) => ({
            ...state,
            conversations: [...conversations],
            conversationsLoaded: true,
            version: state.version + 1,
          })),

        upsertConversation: (conversation) =>
          set((state) => {
            const exists = state.conversations.some(
              (item) => item.id === conversation.id
            );
            const conversations = exists
              ? state.conversations.map((item) =>
                  item.id === conversation.id ? conversation : item
                )
              : [conversation, ...state.conversations];
            const activeConversation =
              state.activeConversation?.id === conversation.id
                ? {
                    ...conversation,
                    messages:
                      conversation.messages.length > 0
                        ? conversation.messages
                        : state.activeConversation.messages,
                  }
                : state.activeConversation;

            return {
              ...state,
              conversations,
              activeConversation,
              version: state.version + 1,
            };
          }),

        patchConversation: (id, changes) => {
          const result = mapConversation(get(), id, (item) => ({
            ...item,
            ...changes,
          }));
          if (!result.found) {
            return false;
          }

          set((state) => ({
            ...state,
            conversations: result.conversations,
            activeConversation: result.activeConversation,
            version: state.version + 1,
          }));
          return true;
        },

        setConversationField: (id, field, value) => {
          const result = mapConversation(get(), id, (item) =>
            withField(item, field, value)
          );
          if (!result.found) {
            return false;
          }

          set((state) => ({
            ...state,
            conversations: result.conversations,
            activeConversation: result.activeConversation,
            version: state.version + 1,
          }));
          return true;
        },

        removeConversation: (id) => {
          const state = get();
          const index = state.conversations.findIndex((item) => item.id === id);
          if (index === -1) {
            return null;
          }

          const entry = state.conversations[index];
          const isActive = state.activeConversationId === id;
          // captured while the load is still in flight too, so it can land after a restore
          const active = isActive
            ? {
                conversationId: id,
                conversation: state.activeConversation,
                load: state.activeLoad,
              }
            : null;

          set((current) => ({
            ...current,
            conversations: current.conversations.filter((item) => item.id !== id),
            ...(isActive
              ? {
                  activeConversationId: null,
                  activeConversation: null,
                  activeLoad: { status: "idle" } as const,
                }
              : {}),
            version: current.version + 1,
          }));

          return { entry, index, active };
        },

        insertConversation: (conversation, index) =>
          set((state) => ({
            ...state,
            conversations: insertAt(
              state.conversations.filter((item) => item.id !== conversation.id),
              conversation,
              index
            ),
            version: state.version + 1,
          })),

        restoreActiveConversation: (active) => {
          const { activeConversationId, activeLoad } = get();
          if (activeConversationId !== null || activeLoad.status !== "idle") {
            return false;
          }

          set((state) => ({
            ...state,
            activeConversationId: active.conversationId,
            activeConversation: active.conversation,
            activeLoad: active.load,
            version: state.version + 1,
          }));
          return true;
        },

        updateMessages: (conversationId, updater) => {
          const result = mapConversation(get(), conversationId, (item) => ({
            ...item,
            messages: updater(item.messages),
          }));
          if (!result.found) {
            return false;
          }

          set((state) => ({
            ...state,
            conversations: result.conversations,
            activeConversation: result.activeConversation,
            version: state.version + 1,
          }));
          return true;
        },

        setFolders: (folders) =>
          set((state) => ({
            ...state,
            folders: [...folders],
            foldersLoaded: true,
            version: state.version + 1,
          })),

        insertFolder: (folder, index = -1) =>
          set((state) => ({
            ...state,
            folders: insertAt(
              state.folders.filter((item) => item.id !== folder.id),
              folder,
              index
            ),
            version: state.version + 1,
          })),

        patchFolder: (id, changes) => {
          if (!get().getFolder(id)) {
            return false;
          }

          set((state) => ({
            ...state,
            folders: state.folders.map((item) =>
              item.id === id ? { ...item, ...changes } : item
            ),
            version: state.version + 1,
          }));
          return true;
        },

        replaceFolder: (id, folder) => {
          if (!get().getFolder(id)) {
            return false;
          }

          set((state) => {
            const repoint = (item: Conversation) =>
              item.folderId === id ? { ...item, folderId: folder.id } : item;

            return {
              ...state,
              folders: state.folders.map((item) => (item.id === id ? folder : item)),
              conversations: state.conversations.map(repoint),
              activeConversation: state.activeConversation
                ? repoint(state.activeConversation)
                : null,
              version: state.version + 1,
            };
          });
          return true;
        },

        removeFolder: (id) => {
          const { folders } = get();
          const index = folders.findIndex((item) => item.id === id);
          if (index === -1) {
            return null;
          }

          const entry = folders[index];
          set((state) => ({
            ...state,
            folders: state.folders.filter((item) => item.id !== id),
            version: state.version + 1,
          }));
          return { entry, index };
        },

        clearFolderReferences: (folderId) => {
          const affected = get()
            .conversations.filter((item) => item.folderId === folderId)
            .map((item) => item.id);
          const activeAffected = get().activeConversation?.folderId === folderId;
          if (affected.length === 0 && !activeAffected) {
            return [];
          }

          set((state) => {
            const unfile = (item: Conversation) =>
              item.folderId === folderId ? { ...item, folderId: null } : item;

            return {
              ...state,
              conversations: state.conversations.map(unfile),
              activeConversation: state.activeConversation
                ? unfile(state.activeConversation)
                : null,
              version: state.version + 1,
            };
          });
          return affected;
        },

        beginActiveLoad: (conversationId, token) =>
          set((state) => ({
            ...state,
            activeConversationId: conversationId,
            activeConversation: null,
            activeLoad: { status: "loading", token, conversationId },
            version: state.version + 1,
          })),

        settleActiveLoad: (token, conversation, source) => {
          const { activeLoad } = get();
          if (activeLoad.status !== "loading" || activeLoad.token !== token) {
            return false;
          }

          const { conversationId } = activeLoad;
          set((state) => ({
            ...state,
            activeConversation: conversation,
            activeLoad: conversation
              ? {
                  status: "settled",
                  token,
                  conversationId,
                  source,
                }
              : { status: "idle" },
            activeConversationId: conversation ? conversationId : null,
            version: state.version + 1,
          }));
          return true;
        },

        clearActiveConversation: () =>
          set((state) => ({
            ...state,
            activeConversationId: null,
            activeConversation: null,
            activeLoad: { status: "idle" },
            version: state.version + 1,
          })),

        recordDiagnostic: (counter, amount = 1) =>
          set((state) => ({
            ...state,
            diagnostics: {
              ...state.diagnostics,
              [counter]: state.diagnostics[counter] + amount,
            },
          })),

        reset: () =>
          set((state) => ({
            ...state,
            ...createInitialConversationState(),
            version: state.version + 1,
          })),
      }),
      { name: options.name ?? "ConversationStore", enabled: options.devtools ?? false }
    )
  );

export const selectActiveMessages = (state: ConversationStoreState): ChatMessage[] =>
  state.activeConversation?.messages ?? [];

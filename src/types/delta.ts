import type { ChatMessageRole, ConversationChanges, MessageFile } from './conversation'

export type ConversationDeltaSource = 'chat' | 'channel'

export type ConversationDeltaRequest = {
  source: ConversationDeltaSource
  conversationId?: string
  sessionId?: string
  requireFocus: boolean
}

export type DeltaAck = (response?: unknown) => void

export type IncomingMessage = {
  id: string
  role: ChatMessageRole
  content: string
  model: string | null
  createdAt: string | null
}

type MessageTarget = {
  conversationId: string
  // null targets the conversation's last message
  messageId: string | null
}

export type DeltaEvent =
  | { kind: 'message-append'; conversationId: string; message: IncomingMessage }
  | ({ kind: 'message-chunk'; content: string } & MessageTarget)
  | ({ kind: 'message-replace'; content: string } & MessageTarget)
  | ({ kind: 'message-complete'; content: string | null } & MessageTarget)
  | ({ kind: 'message-error'; error: string } & MessageTarget)
  | ({ kind: 'message-status'; status: string } & MessageTarget)
  | ({ kind: 'message-files'; files: MessageFile[] } & MessageTarget)
  | { kind: 'conversation-updated'; conversationId: string; changes: ConversationChanges }
  | { kind: 'conversation-deleted'; conversationId: string }
  | { kind: 'unknown'; type: string }

export type DeltaEventKind = DeltaEvent['kind']

export type ConversationDelta = {
  source: ConversationDeltaSource
  raw: unknown
  type: string | null
  payload: Record<string, unknown> | null
  sessionId: string | null
  // null when the envelope or payload could not be interpreted
  event: DeltaEvent | null
  ack?: DeltaAck
}

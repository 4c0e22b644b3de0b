import { describe, expect, it, vi } from 'vitest'
import { envelope } from '@/test/fixtures'
import { conversationIdOf, decodeDelta } from './delta-decoder'

describe('decodeDelta', () => {
  it('returns a null event for envelopes without a type', () => {
    const delta = decodeDelta('chat', { data: { data: {} } })
    expect(delta).toMatchObject({ type: null, payload: null, sessionId: null, event: null })
  })

  it('keeps the ack and session id from the envelope', () => {
    const ack = vi.fn()
    const delta = decodeDelta(
      'channel',
      envelope('message-chunk', { content: 'hi' }, { chat_id: 'c1', session_id: 's1' }),
      ack,
    )
    expect(delta.source).toBe('channel')
    expect(delta.sessionId).toBe('s1')
    expect(delta.ack).toBe(ack)
    expect(delta.event).toEqual({
      kind: 'message-chunk',
      conversationId: 'c1',
      messageId: null,
      content: 'hi',
    })
  })

  it('reads ids from the payload before the envelope', () => {
    const delta = decodeDelta(
      'chat',
      envelope(
        'chat:message:delta',
        { chat_id: 'c2', message_id: 'm2', content: 'x' },
        { chat_id: 'c1', message_id: 'm1' },
      ),
    )
    expect(delta.event).toEqual({
      kind: 'message-chunk',
      conversationId: 'c2',
      messageId: 'm2',
      content: 'x',
    })
  })

  it('decodes message-append with normalised timestamps', () => {
    const delta = decodeDelta(
      'chat',
      envelope('message-append', {
        conversationId: 'c1',
        message: { id: 'm1', role: 'user', content: 'hello', created_at: 1_700_000_000 },
      }),
    )
    expect(delta.event).toEqual({
      kind: 'message-append',
      conversationId: 'c1',
      message: {
        id: 'm1',
        role: 'user',
        content: 'hello',
        model: null,
        createdAt: '2023-11-14T22:13:20.000Z',
      },
    })
  })

  it('splits chat:completion frames into chunk and complete', () => {
    const chunk = decodeDelta(
      'chat',
      envelope('chat:completion', { choices: [{ delta: { content: 'ab' } }] }, { chat_id: 'c1' }),
    )
    expect(chunk.event).toMatchObject({ kind: 'message-chunk', content: 'ab' })

    const done = decodeDelta(
      'chat',
      envelope('chat:completion', { done: true }, { chat_id: 'c1' }),
    )
    expect(done.event).toMatchObject({ kind: 'message-complete', content: null })

    const usage = decodeDelta(
      'chat',
      envelope('chat:completion', { usage: { tokens: 3 } }, { chat_id: 'c1' }),
    )
    expect(usage.event).toEqual({ kind: 'unknown', type: 'chat:completion' })
  })

  it('skips replace frames with empty content', () => {
    const replace = decodeDelta('chat', envelope('chat:message', { content: 'Hi' }, { chat_id: 'c1' }))
    expect(replace.event).toEqual({
      kind: 'message-replace',
      conversationId: 'c1',
      messageId: null,
      content: 'Hi',
    })

    const empty = decodeDelta('chat', envelope('chat:message', { content: '' }, { chat_id: 'c1' }))
    expect(empty.event).toEqual({ kind: 'unknown', type: 'chat:message' })
  })

  it('reads errors given as text or as an object', () => {
    const text = decodeDelta('chat', envelope('chat:message:error', { error: 'boom' }, { chat_id: 'c1' }))
    expect(text.event).toMatchObject({ kind: 'message-error', error: 'boom' })

    const nested = decodeDelta(
      'chat',
      envelope('chat:message:error', { error: { content: 'rate limited' } }, { chat_id: 'c1' }),
    )
    expect(nested.event).toMatchObject({ kind: 'message-error', error: 'rate limited' })

    const empty = decodeDelta('chat', envelope('chat:message:error', {}, { chat_id: 'c1' }))
    expect(empty.event).toBeNull()
  })

  it('accepts files as a list or wrapped object', () => {
    const list = decodeDelta('chat', envelope('files', ['a.png', { url: 'b.png' }], { chat_id: 'c1' }))
    expect(list.event).toMatchObject({
      kind: 'message-files',
      files: [
        { type: 'image', url: 'a.png' },
        { type: 'image', url: 'b.png' },
      ],
    })
  })

  it('maps conversation updates from snake and camel case', () => {
    const delta = decodeDelta(
      'chat',
      envelope('conversation-updated', {
        chat_id: 'c1',
        title: 'New',
        folder_id: null,
        tags: ['a', 'a'],
        updated_at: '1700000000',
      }),
    )
    expect(delta.event).toEqual({
      kind: 'conversation-updated',
      conversationId: 'c1',
      changes: {
        title: 'New',
        folderId: null,
        tags: ['a'],
        updatedAt: '2023-11-14T22:13:20.000Z',
      },
    })
  })

  it('maps title and tag aliases to conversation updates', () => {
    expect(decodeDelta('chat', envelope('chat:title', 'Renamed', { chat_id: 'c1' })).event).toEqual({
      kind: 'conversation-updated',
      conversationId: 'c1',
      changes: { title: 'Renamed' },
    })
    expect(
      decodeDelta('chat', envelope('chat:tags', { tags: ['x'] }, { chat_id: 'c1' })).event,
    ).toEqual({ kind: 'conversation-updated', conversationId: 'c1', changes: { tags: ['x'] } })
  })

  it('treats known types without a conversation id as malformed', () => {
    expect(decodeDelta('chat', envelope('conversation-deleted', {})).event).toBeNull()
  })

  it('passes unknown types through as unknown events', () => {
    const delta = decodeDelta('chat', envelope('typing', { user: 'u1' }))
    expect(delta.event).toEqual({ kind: 'unknown', type: 'typing' })
    expect(conversationIdOf({ kind: 'unknown', type: 'typing' })).toBeNull()
  })
})

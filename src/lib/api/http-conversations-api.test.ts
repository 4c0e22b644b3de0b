import { describe, expect, it, vi } from 'vitest'
import { createHttpConversationsApi, MAX_LIST_PAGES } from './http-conversations-api'

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })

const createFetch = (...responses: Response[]) => {
  const queue = [...responses]
  return vi.fn(async (_input: string, _init?: RequestInit) => {
    const next = queue.shift()
    return next ?? jsonResponse([])
  })
}

const chatPayload = {
  id: 'c1',
  title: 'Trip',
  created_at: 1_700_000_000,
  updated_at: 1_700_000_060,
  pinned: true,
  archived: null,
  folder_id: 'f1',
  chat: {
    models: ['model-a'],
    tags: ['travel', 'travel'],
    messages: [
      { id: 'm1', role: 'user', content: 'Plan it', timestamp: 1_700_000_000 },
      { id: 'm2', role: 'tool', content: null, files: ['map.png', { url: 'map.png' }] },
    ],
  },
}

describe('createHttpConversationsApi', () => {
  it('sends the bearer token and maps a chat payload', async () => {
    const fetch = createFetch(jsonResponse(chatPayload))
    const api = createHttpConversationsApi({
      baseUrl: 'https://chat.example.test/',
      token: 'test-secret',
      fetch,
    })

    const conversation = await api.getConversation('c1')

    expect(fetch).toHaveBeenCalledWith('https://chat.example.test/api/v1/chats/c1', {
      method: 'GET',
      headers: { Accept: 'application/json', Authorization: 'Bearer test-secret' },
      body: undefined,
    })
    expect(conversation).toMatchObject({
      id: 'c1',
      title: 'Trip',
      createdAt: '2023-11-14T22:13:20.000Z',
      updatedAt: '2023-11-14T22:14:20.000Z',
      pinned: true,
      archived: false,
      folderId: 'f1',
      tags: ['travel'],
      model: 'model-a',
    })
    expect(conversation.messages.map((message) => [message.id, message.role, message.content])).toEqual([
      ['m1', 'user', 'Plan it'],
      ['m2', 'assistant', ''],
    ])
    expect(conversation.messages[1].files).toEqual([{ type: 'image', url: 'map.png' }])
  })

  it('posts mutation bodies as JSON', async () => {
    const fetch = createFetch(jsonResponse(null), jsonResponse(null), jsonResponse(null))
    const api = createHttpConversationsApi({ baseUrl: 'https://chat.example.test', fetch })

    await api.pinConversation('c1', true)
    await api.moveConversationToFolder('c1', null)
    await api.updateConversation('c1', { title: 'New' })

    expect(fetch.mock.calls.map(([url, init]) => [url, init?.method, init?.body])).toEqual([
      ['https://chat.example.test/api/v1/chats/c1/pin', 'POST', '{"pinned":true}'],
      ['https://chat.example.test/api/v1/chats/c1/folder', 'POST', '{"folder_id":null}'],
      ['https://chat.example.test/api/v1/chats/c1', 'POST', '{"chat":{"title":"New"}}'],
    ])
  })

  it('pages through the chat list until an empty page', async () => {
    const fetch = createFetch(
      jsonResponse([{ id: 'a' }, { id: 'b' }]),
      jsonResponse([{ id: 'c' }]),
      jsonResponse([]),
    )
    const api = createHttpConversationsApi({ baseUrl: 'https://chat.example.test', fetch })

    const conversations = await api.listConversations()

    expect(conversations.map((item) => item.id)).toEqual(['a', 'b', 'c'])
    expect(fetch.mock.calls.map(([url]) => url)).toEqual([
      'https://chat.example.test/api/v1/chats/?page=0',
      'https://chat.example.test/api/v1/chats/?page=1',
      'https://chat.example.test/api/v1/chats/?page=2',
    ])
    expect(MAX_LIST_PAGES).toBe(100)
  })

  it('creates folders with an optional parent', async () => {
    const fetch = createFetch(
      jsonResponse({ id: 'f1', name: 'Work', parent_id: 'root', created_at: '2024-01-01T00:00:00Z' }),
    )
    const api = createHttpConversationsApi({ baseUrl: 'https://chat.example.test', fetch })

    await expect(api.createFolder('Work', 'root')).resolves.toEqual({
      id: 'f1',
      name: 'Work',
      parentId: 'root',
      createdAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-01-01T00:00:00.000Z',
    })
    expect(fetch.mock.calls[0][1]?.body).toBe('{"name":"Work","parent_id":"root"}')
  })

  it('throws on error statuses and unexpected shapes', async () => {
    const fetch = createFetch(jsonResponse({ detail: 'nope' }, 500), jsonResponse({ not: 'a list' }))
    const api = createHttpConversationsApi({ baseUrl: 'https://chat.example.test', fetch })

    await expect(api.deleteConversation('c1')).rejects.toThrow('DELETE /api/v1/chats/c1 failed: 500')
    await expect(api.listFolders()).rejects.toThrow('Unexpected response from /api/v1/folders/')
  })

  it('encodes search queries', async () => {
    const fetch = createFetch(jsonResponse([]))
    const api = createHttpConversationsApi({ baseUrl: 'https://chat.example.test', fetch })

    await api.searchConversations('a&b c')

    expect(fetch.mock.calls[0][0]).toBe('https://chat.example.test/api/v1/chats/search?q=a%26b%20c')
  })
})

import { describe, expect, it } from 'vitest'
import {
  createChatMessage,
  createConversation,
  createFolder,
  dedupeTags,
  mergeFiles,
  normalizeTimestamp,
  withField,
} from './records'

describe('normalizeTimestamp', () => {
  it('treats small numbers as epoch seconds', () => {
    expect(normalizeTimestamp(1_700_000_000)).toBe('2023-11-14T22:13:20.000Z')
  })

  it('treats large numbers as epoch milliseconds', () => {
    expect(normalizeTimestamp(1_700_000_000_000)).toBe('2023-11-14T22:13:20.000Z')
  })

  it('parses numeric strings and ISO strings', () => {
    expect(normalizeTimestamp('1700000000')).toBe('2023-11-14T22:13:20.000Z')
    expect(normalizeTimestamp('2024-02-03T04:05:06Z')).toBe('2024-02-03T04:05:06.000Z')
  })

  it('returns the fallback for unusable values', () => {
    expect(normalizeTimestamp('not a date', 'fallback')).toBe('fallback')
    expect(normalizeTimestamp(null)).toBe('1970-01-01T00:00:00.000Z')
  })
})

describe('record constructors', () => {
  it('fills conversation defaults', () => {
    expect(createConversation({ id: 'c1', createdAt: '2024-01-01T00:00:00.000Z' })).toEqual({
      id: 'c1',
      title: '',
      createdAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-01-01T00:00:00.000Z',
      pinned: false,
      archived: false,
      folderId: null,
      tags: [],
      model: null,
      messages: [],
      metadata: {},
    })
  })

  it('deduplicates tags and trims blanks', () => {
    expect(dedupeTags(['a', ' a ', '', 'b'])).toEqual(['a', 'b'])
    expect(createConversation({ id: 'c1', tags: ['x', 'x'] }).tags).toEqual(['x'])
  })

  it('fills folder defaults', () => {
    expect(createFolder({ id: 'f1', name: 'Work' })).toEqual({
      id: 'f1',
      name: 'Work',
      parentId: null,
      createdAt: '1970-01-01T00:00:00.000Z',
      updatedAt: '1970-01-01T00:00:00.000Z',
    })
  })

  it('deduplicates message files by url', () => {
    const message = createChatMessage({
      id: 'm1',
      files: [
        { type: 'image', url: 'a.png' },
        { type: 'image', url: 'a.png' },
      ],
    })
    expect(message.role).toBe('assistant')
    expect(message.isStreaming).toBe(false)
    expect(message.files).toEqual([{ type: 'image', url: 'a.png' }])
    expect(
      mergeFiles(message.files, [
        { type: 'image', url: 'b.png' },
        { type: 'image', url: 'a.png' },
      ]),
    ).toEqual([
      { type: 'image', url: 'a.png' },
      { type: 'image', url: 'b.png' },
    ])
  })
})

describe('withField', () => {
  it('returns a copy with one field replaced', () => {
    const original = createConversation({ id: 'c1', title: 'Draft' })
    const next = withField(original, 'pinned', true)

    expect(next).toEqual({ ...original, pinned: true })
    expect(original.pinned).toBe(false)
  })
})

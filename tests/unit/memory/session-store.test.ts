import { describe, expect, it } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'
import { InMemorySessionStore, JsonSessionStore, type SessionRecord } from '../../../src/memory/session-store.js'

const record: SessionRecord = {
    id: 'session-1',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:05:00.000Z',
    status: 'completed',
    turns: [
        { role: 'user', content: 'hello', timestamp: '2026-01-01T00:00:00.000Z' },
        { role: 'assistant', text: 'Hi.', toolCalls: [], timestamp: '2026-01-01T00:00:01.000Z' },
    ],
}

describe('JsonSessionStore', () => {
    it('saves, lists and loads sessions', async () => {
        const fs = new MockFileSystem()
        const store = new JsonSessionStore(fs, '/ws/.codeloom/sessions')

        await store.save(record)

        expect(store.pathFor('session-1')).toBe('/ws/.codeloom/sessions/session-1.json')
        expect(await store.list()).toEqual(['session-1'])
        expect(await store.load('session-1')).toEqual(record)
    })

    it('returns null for a missing session and an empty list for a missing dir', async () => {
        const store = new JsonSessionStore(new MockFileSystem(), '/ws/.codeloom/sessions')
        expect(await store.load('nope')).toBeNull()
        expect(await store.list()).toEqual([])
    })

    it('rejects a malformed session file', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/s/bad.json', JSON.stringify({ id: 'bad', turns: 'none' }))
        await expect(new JsonSessionStore(fs, '/s').load('bad')).rejects.toThrow()
    })
})

describe('InMemorySessionStore', () => {
    it('stores copies', async () => {
        const store = new InMemorySessionStore()
        const copy = structuredClone(record)
        await store.save(copy)
        copy.turns.push({ role: 'user', content: 'later', timestamp: record.createdAt })

        expect((await store.load('session-1'))?.turns).toHaveLength(2)
        expect(await store.list()).toEqual(['session-1'])
    })
})

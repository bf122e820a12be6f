import { describe, it, expect } from 'vitest'
import { ExtractionCache } from '../../../src/backlog/cache.js'
import type { BacklogRecord } from '../../../src/backlog/schema.js'

const record: BacklogRecord = { title: 'Add cache', difficulty: 2, description: 'cache it', timestamp: '2025-01-01T00:00:00Z' }

describe('ExtractionCache', () => {
    it('stores and returns records by model and prompt', () => {
        const cache = new ExtractionCache()
        cache.set('gpt-4o-mini', 'add cache', record)
        expect(cache.get('gpt-4o-mini', 'add cache')).toBe(record)
        expect(cache.has('gpt-4o-mini', 'add cache')).toBe(true)
    })

    it('keeps models apart', () => {
        const cache = new ExtractionCache()
        cache.set('gpt-4o-mini', 'add cache', record)
        expect(cache.get('gpt-4o', 'add cache')).toBeUndefined()
    })

    it('does not confuse keys that concatenate the same way', () => {
        const cache = new ExtractionCache()
        cache.set('a', 'bc', record)
        expect(cache.has('ab', 'c')).toBe(false)
    })

    it('clears', () => {
        const cache = new ExtractionCache()
        cache.set('m', 'p', record)
        expect(cache.size).toBe(1)
        cache.clear()
        expect(cache.size).toBe(0)
    })
})

import { describe, it, expect } from 'vitest'
import { SchemaViolationError } from '../../../src/core/errors.js'
import { validateRecord } from '../../../src/backlog/schema.js'

const valid = {
    title: 'Add OAuth login flow',
    difficulty: 3,
    description: 'Implement OAuth login flow for users.',
    timestamp: '2025-06-17T18:00:00Z',
}

function violation(value: unknown): SchemaViolationError {
    const result = validateRecord(value)
    if (result.ok) throw new Error('expected a schema violation')
    return result.error
}

describe('validateRecord', () => {
    it('accepts a complete record', () => {
        const result = validateRecord(valid)
        expect(result.ok).toBe(true)
        if (result.ok) expect(result.value).toEqual(valid)
    })

    it('returns a frozen record', () => {
        const result = validateRecord(valid)
        expect(result.ok && Object.isFrozen(result.value)).toBe(true)
    })

    it('accepts both ends of the difficulty range', () => {
        expect(validateRecord({ ...valid, difficulty: 1 }).ok).toBe(true)
        expect(validateRecord({ ...valid, difficulty: 5 }).ok).toBe(true)
    })

    it('rejects difficulty 0 and 6', () => {
        for (const difficulty of [0, 6]) {
            const error = violation({ ...valid, difficulty })
            expect(error.field).toBe('difficulty')
            expect(error.message).toBe('difficulty must be between 1 and 5')
        }
    })

    it('names a missing key', () => {
        const { title: _title, ...rest } = valid
        const error = violation(rest)
        expect(error.field).toBe('title')
        expect(error.message).toBe("Missing key 'title' in response JSON")
    })

    it('names a mistyped field', () => {
        const error = violation({ ...valid, difficulty: '3' })
        expect(error.field).toBe('difficulty')
        expect(error.message).toBe("Field 'difficulty' expected number, got string")
    })

    it('rejects a fractional difficulty', () => {
        expect(violation({ ...valid, difficulty: 2.5 }).field).toBe('difficulty')
    })

    it('rejects extra keys', () => {
        const error = violation({ ...valid, priority: 'high' })
        expect(error.field).toBe('priority')
        expect(error.message).toBe("Unexpected key(s) 'priority' in response JSON")
    })

    it('rejects values that are not objects', () => {
        expect(violation([valid]).field).toBeNull()
        expect(violation(null).field).toBeNull()
        expect(violation('title').field).toBeNull()
    })

    it('reports the first of several problems', () => {
        expect(violation({ not: 'schema' }).message).toBe("Missing key 'title' in response JSON")
    })
})

import { describe, it, expect } from 'vitest'
import { isMetaInstruction, sanitizeDictation } from '../../../src/backlog/sanitize.js'

describe('sanitizeDictation', () => {
    it('collapses whitespace', () => {
        expect(sanitizeDictation('  test   input  ')).toBe('test input')
        expect(sanitizeDictation('add\tretry\n\nlogic')).toBe('add retry logic')
    })

    it('marks meta-instructions as backlog content', () => {
        expect(sanitizeDictation('be more clever with the readme')).toBe('Backlog item: be more clever with the readme')
        expect(sanitizeDictation('make it work better')).toBe('Backlog item: make it work better')
    })

    it('matches lead-ins case-insensitively after trimming', () => {
        expect(sanitizeDictation('   Please   add dark mode ')).toBe('Backlog item: Please add dark mode')
        expect(sanitizeDictation('YOUR parser drops commas')).toBe('Backlog item: YOUR parser drops commas')
    })

    it('leaves ordinary dictation alone', () => {
        expect(sanitizeDictation('Add login functionality')).toBe('Add login functionality')
    })
})

describe('isMetaInstruction', () => {
    it('checks prefixes only', () => {
        expect(isMetaInstruction('improve csv import speed')).toBe(true)
        expect(isMetaInstruction('we need a retry budget')).toBe(true)
        expect(isMetaInstruction('add an improve button')).toBe(false)
    })
})

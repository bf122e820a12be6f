import { describe, it, expect } from 'vitest'
import {
    buildEditRequest,
    buildSystemPrompt,
    DEFAULT_SYSTEM_PROMPT,
    README_MISSING_NOTE,
} from '../../../src/backlog/system-prompt.js'

const TEMPLATE = 'You are a backlog helper.\nReply with JSON.'

describe('buildSystemPrompt', () => {
    it('inserts the README excerpt after the first line', () => {
        const prompt = buildSystemPrompt(TEMPLATE, { excerpt: '# Demo\n\nA demo project.', found: true })
        expect(prompt).toBe(
            'You are a backlog helper.\n\nProject Context (extracted from README):\n# Demo\n\nA demo project.\n\nReply with JSON.'
        )
    })

    it('inserts a note when no README was found', () => {
        const prompt = buildSystemPrompt(TEMPLATE, { excerpt: '', found: false })
        expect(prompt).toBe(`You are a backlog helper.\n\n${README_MISSING_NOTE}\n\nReply with JSON.`)
    })

    it('adds no section for a README with nothing to summarize', () => {
        const prompt = buildSystemPrompt(TEMPLATE, { excerpt: '', found: true })
        expect(prompt).toBe('You are a backlog helper.\n\nReply with JSON.')
    })

    it('handles a single-line template', () => {
        expect(buildSystemPrompt('Only line', { excerpt: 'ctx', found: true })).toBe(
            'Only line\n\nProject Context (extracted from README):\nctx\n\n'
        )
    })

    it('keeps the persona sentence of the default template on top', () => {
        const prompt = buildSystemPrompt(DEFAULT_SYSTEM_PROMPT, { excerpt: 'ctx', found: true })
        expect(prompt.split('\n')[0]).toBe('You are a senior developer assisting in backlog grooming.')
        expect(prompt).toContain('Difficulty rubric: 1 = Tiny tweak')
    })
})

describe('buildEditRequest', () => {
    it('ends with the instruction', () => {
        const request = buildEditRequest('{"title":"A"}', 'make it harder')
        expect(request.split('\n')).toEqual([
            'Revise this existing backlog item according to the edit instructions.',
            'Return the complete updated item as JSON with the same four fields; keep the timestamp unless asked to change it.',
            '',
            'Current item:',
            '{"title":"A"}',
            '',
            'Edit instructions: make it harder',
        ])
    })
})

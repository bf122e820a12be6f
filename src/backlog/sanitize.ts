// Lead-ins that read as instructions to the tool rather than as backlog content.
export const META_INSTRUCTION_PREFIXES = [
    'be more',
    'make it',
    'you should',
    'can you',
    'please',
    'i want',
    'we need',
    'the way you',
    'your',
    'improve',
] as const

export const BACKLOG_ITEM_MARKER = 'Backlog item: '

export function isMetaInstruction(text: string): boolean {
    const lowered = text.toLowerCase()
    return META_INSTRUCTION_PREFIXES.some((prefix) => lowered.startsWith(prefix))
}

/** Trims, marks meta-instructions as content, and collapses whitespace runs to single spaces. */
export function sanitizeDictation(text: string): string {
    let cleaned = text.trim()
    if (isMetaInstruction(cleaned)) {
        cleaned = `${BACKLOG_ITEM_MARKER}${cleaned}`
    }
    return cleaned.split(/\s+/).filter(Boolean).join(' ')
}

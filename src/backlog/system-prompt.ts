export const TITLE_EXAMPLES = 'Add OAuth login flow; Refactor payment adapter module; Improve CSV import performance'

export const DIFFICULTY_RUBRIC =
    '1 = Tiny tweak (≤30 min); 2 = Small feature (≤2 h); 3 = Medium feature (≤1 day); ' +
    '4 = Large feature (1-3 days); 5 = Complex new module (>3 days)'

export const DEFAULT_SYSTEM_PROMPT = `You are a senior developer assisting in backlog grooming.

Given a raw dictation line, respond with **ONLY** valid JSON matching this schema:
{
  "title": str,  # 5-6 word git-style imperative
  "difficulty": int,  # 1-5 per rubric below
  "description": str,  # cleaned full text
  "timestamp": str  # ISO-8601 in UTC
}

Rules:
- Use these good title examples as style reference: ${TITLE_EXAMPLES}.
- Difficulty rubric: ${DIFFICULTY_RUBRIC}
- Do not add fields. Reply with JSON only.`

export const README_MISSING_NOTE = 'Note: README.md file could not be found. Ignoring project context.'

export interface ReadmeContext {
    excerpt: string
    found: boolean
}

/**
 * Inserts the project context section right after the template's first line,
 * so the persona sentence stays on top.
 */
export function buildSystemPrompt(template: string, context: ReadmeContext): string {
    let section = ''
    if (context.found && context.excerpt) {
        section = `Project Context (extracted from README):\n${context.excerpt}\n\n`
    } else if (!context.found) {
        section = `${README_MISSING_NOTE}\n\n`
    }

    const newline = template.indexOf('\n')
    const firstLine = newline === -1 ? template : template.slice(0, newline)
    const rest = newline === -1 ? '' : template.slice(newline + 1)
    return `${firstLine}\n\n${section}${rest}`
}

export function buildEditRequest(currentJson: string, instruction: string): string {
    return [
        'Revise this existing backlog item according to the edit instructions.',
        'Return the complete updated item as JSON with the same four fields; keep the timestamp unless asked to change it.',
        '',
        `Current item:\n${currentJson}`,
        '',
        `Edit instructions: ${instruction}`,
    ].join('\n')
}

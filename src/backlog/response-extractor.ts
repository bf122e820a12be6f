import { errorMessage, MalformedResponseError, NoJsonFoundError } from '../core/errors.js'
import { err, ok, type Result } from '../core/result.js'

/**
 * Isolates the part of a model reply most likely to be a single JSON object.
 *
 * Leading prose is dropped up to the first `{`, trailing prose after the last `}`.
 * No bracket matching is attempted, so a `}` inside trailing text still ends the candidate.
 */
export function extractJsonCandidate(raw: string): Result<string, NoJsonFoundError> {
    const content = raw.trim()
    if (content.startsWith('{')) return ok(content)

    const start = content.indexOf('{')
    if (start === -1) return err(new NoJsonFoundError())

    const candidate = content.slice(start)
    const end = candidate.lastIndexOf('}')
    if (end >= 0 && end < candidate.length - 1) {
        return ok(candidate.slice(0, end + 1))
    }
    return ok(candidate)
}

export type ParseFailure = NoJsonFoundError | MalformedResponseError

export function parseModelResponse(raw: string): Result<unknown, ParseFailure> {
    const candidate = extractJsonCandidate(raw)
    if (!candidate.ok) return candidate

    try {
        return ok(JSON.parse(candidate.value))
    } catch (error) {
        return err(new MalformedResponseError(`JSON parsing error: ${errorMessage(error)}`, { cause: error }))
    }
}

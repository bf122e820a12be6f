import { z } from 'zod'
import { SchemaViolationError } from '../core/errors.js'
import { err, ok, type Result } from '../core/result.js'

export const MIN_DIFFICULTY = 1
export const MAX_DIFFICULTY = 5

export const BacklogRecordSchema = z
    .object({
        title: z.string(),
        difficulty: z.number().int().min(MIN_DIFFICULTY).max(MAX_DIFFICULTY),
        description: z.string(),
        timestamp: z.string(),
    })
    .strict()

export type BacklogRecord = Readonly<z.infer<typeof BacklogRecordSchema>>

function describeIssue(issue: z.ZodIssue): string {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'record'
    switch (issue.code) {
        case z.ZodIssueCode.invalid_type:
            return issue.received === 'undefined'
                ? `Missing key '${field}' in response JSON`
                : `Field '${field}' expected ${issue.expected}, got ${issue.received}`
        case z.ZodIssueCode.too_small:
        case z.ZodIssueCode.too_big:
            return `${field} must be between ${MIN_DIFFICULTY} and ${MAX_DIFFICULTY}`
        case z.ZodIssueCode.unrecognized_keys:
            return `Unexpected key(s) ${issue.keys.map((k) => `'${k}'`).join(', ')} in response JSON`
        default:
            return `Field '${field}': ${issue.message}`
    }
}

function issueField(issue: z.ZodIssue): string | null {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) return issue.keys[0] ?? null
    const first = issue.path[0]
    return first === undefined ? null : String(first)
}

/**
 * Checks a decoded model reply against the four-field backlog schema.
 *
 * Exactly `title`, `difficulty`, `description` and `timestamp` must be present;
 * `difficulty` must be an integer in [1, 5]. The first violation is reported.
 */
export function validateRecord(value: unknown): Result<BacklogRecord, SchemaViolationError> {
    const parsed = BacklogRecordSchema.safeParse(value)
    if (parsed.success) return ok(Object.freeze(parsed.data))

    const issue = parsed.error.issues[0]
    if (!issue) return err(new SchemaViolationError('Response JSON does not match the backlog schema', null))
    return err(new SchemaViolationError(describeIssue(issue), issueField(issue), { cause: parsed.error }))
}

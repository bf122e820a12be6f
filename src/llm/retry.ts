import { classifyError, MalformedResponseError, NoJsonFoundError } from '../core/errors.js'

export interface RetryOptions {
    maxRetries: number
    baseDelay: number
    maxDelay: number
    /** Which failures earn another attempt. Defaults to transient errors. */
    shouldRetry?: (error: unknown) => boolean
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void
}

/** Back-off policy for backend failures: network, auth, rate limiting. */
export const TRANSPORT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 2,
    baseDelay: 2000,
    maxDelay: 60000,
}

/** Immediate re-ask when the reply held no usable JSON. */
export const PARSE_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 2,
    baseDelay: 0,
    maxDelay: 0,
}

export function isTransient(error: unknown): boolean {
    return classifyError(error) === 'transient'
}

export function isParseFailure(error: unknown): boolean {
    return error instanceof NoJsonFoundError || error instanceof MalformedResponseError
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

export async function withRetry<T>(fn: () => Promise<T>, opts = TRANSPORT_RETRY_OPTIONS): Promise<T> {
    const shouldRetry = opts.shouldRetry ?? isTransient
    for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
        try {
            return await fn()
        } catch (error) {
            if (!shouldRetry(error) || attempt === opts.maxRetries) {
                throw error
            }
            const delay = Math.min(opts.baseDelay * 2 ** attempt, opts.maxDelay)
            const jitter = delay * 0.1 * Math.random()
            opts.onRetry?.(error, attempt + 1, delay + jitter)
            if (delay > 0) await sleep(delay + jitter)
        }
    }
    throw new Error('Unreachable')
}

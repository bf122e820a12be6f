export type ErrorKind = 'transient' | 'permanent'

export type ExitCode = 0 | 1 | 2

export class BacklogError extends Error {
    readonly kind: ErrorKind
    readonly exitCode: ExitCode

    constructor(message: string, kind: ErrorKind, exitCode: ExitCode, options?: ErrorOptions) {
        super(message, options)
        this.name = 'BacklogError'
        this.kind = kind
        this.exitCode = exitCode
    }
}

export class EmptyInputError extends BacklogError {
    constructor(message = 'Empty dictation provided', options?: ErrorOptions) {
        super(message, 'permanent', 1, options)
        this.name = 'EmptyInputError'
    }
}

export class NoJsonFoundError extends BacklogError {
    constructor(message = 'No JSON object found in response', options?: ErrorOptions) {
        super(message, 'permanent', 2, options)
        this.name = 'NoJsonFoundError'
    }
}

export class MalformedResponseError extends BacklogError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', 2, options)
        this.name = 'MalformedResponseError'
    }
}

export class SchemaViolationError extends BacklogError {
    readonly field: string | null

    constructor(message: string, field: string | null, options?: ErrorOptions) {
        super(message, 'permanent', 2, options)
        this.name = 'SchemaViolationError'
        this.field = field
    }
}

/** Any failure talking to the model backend: network, auth, rate limit, aborted request. */
export class BackendError extends BacklogError {
    readonly status: number | undefined

    constructor(message: string, status?: number, options?: ErrorOptions) {
        super(message, 'transient', 2, options)
        this.name = 'BackendError'
        this.status = status
    }
}

export class StorageError extends BacklogError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', 2, options)
        this.name = 'StorageError'
    }
}

export class ConfigError extends BacklogError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', 2, options)
        this.name = 'ConfigError'
    }
}

export function classifyHttpError(status: number): ErrorKind {
    if ([429, 500, 502, 503, 504].includes(status)) return 'transient'
    return 'permanent'
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'AbortError') return true
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof BacklogError) return error.kind
    if (error instanceof TypeError && error.message.includes('fetch')) return 'transient'
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return classifyHttpError(error.status)
    }
    return 'permanent'
}

export function exitCodeFor(error: unknown): ExitCode {
    if (error instanceof BacklogError) return error.exitCode
    return 2
}

/** Node system errors carry a string `code` such as ENOENT or EPERM. */
export function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code
    }
    return undefined
}

export type ErrorKind = 'transient' | 'permanent'

/**
 * Category a failure belongs to. Everything except `fatal_engine` is recoverable
 * inside the conversation and ends up as an error tool result or error turn.
 */
export type ErrorCategory =
    | 'validation'
    | 'sandbox_violation'
    | 'permission_denied'
    | 'execution'
    | 'transport'
    | 'fatal_engine'

export class CodeloomError extends Error {
    readonly kind: ErrorKind
    readonly category: ErrorCategory

    constructor(message: string, kind: ErrorKind, category: ErrorCategory, options?: ErrorOptions) {
        super(message, options)
        this.name = 'CodeloomError'
        this.kind = kind
        this.category = category
    }
}

export class ValidationError extends CodeloomError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', 'validation', options)
        this.name = 'ValidationError'
    }
}

export class SandboxViolation extends CodeloomError {
    readonly path: string

    constructor(path: string, root: string, options?: ErrorOptions) {
        super(`Path '${path}' resolves outside of workspace ${root}`, 'permanent', 'sandbox_violation', options)
        this.name = 'SandboxViolation'
        this.path = path
    }
}

export class PermissionDeniedError extends CodeloomError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', 'permission_denied', options)
        this.name = 'PermissionDeniedError'
    }
}

export class ExecutionError extends CodeloomError {
    readonly code?: number

    constructor(message: string, options?: ErrorOptions & { code?: number }) {
        super(message, 'permanent', 'execution', options)
        this.name = 'ExecutionError'
        this.code = options?.code
    }
}

export class TransportError extends CodeloomError {
    readonly status?: number

    constructor(message: string, options?: ErrorOptions & { status?: number }) {
        const kind = options?.status === undefined ? 'transient' : classifyHttpError(options.status)
        super(message, kind, 'transport', options)
        this.name = 'TransportError'
        this.status = options?.status
    }
}

export class FatalEngineError extends CodeloomError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', 'fatal_engine', options)
        this.name = 'FatalEngineError'
    }
}

export function classifyHttpError(status: number): ErrorKind {
    if ([408, 429, 500, 502, 503, 504].includes(status)) return 'transient'
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

function hasStatus(error: unknown): error is { status: number } {
    return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof CodeloomError) return error.kind
    if (error instanceof TypeError && error.message.includes('fetch')) return 'transient'
    if (hasStatus(error)) return classifyHttpError(error.status)
    return 'permanent'
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}

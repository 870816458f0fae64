import { classifyError, TransportError } from '../core/errors.js'
import type { RetryConfig } from '../config/schema.js'

export type RetryOptions = RetryConfig

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelay: 1000,
    maxDelay: 60000,
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason)
            return
        }
        const onAbort = () => {
            clearTimeout(timer)
            reject(signal?.reason)
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort)
            resolve()
        }, ms)
        signal?.addEventListener('abort', onAbort, { once: true })
    })
}

export function backoffDelay(attempt: number, opts: RetryOptions, random = Math.random): number {
    const delay = Math.min(opts.baseDelay * 2 ** attempt, opts.maxDelay)
    return delay + delay * 0.1 * random()
}

/** Retries transient failures with exponential backoff and jitter. Permanent errors and aborts pass straight through. */
export async function withRetry<T>(
    fn: () => Promise<T>,
    opts: RetryOptions = DEFAULT_RETRY_OPTIONS,
    signal?: AbortSignal
): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await fn()
        } catch (error) {
            if (signal?.aborted || classifyError(error) === 'permanent' || attempt >= opts.maxRetries) {
                throw error
            }
            await sleep(backoffDelay(attempt, opts), signal)
        }
    }
}

type CircuitState = 'closed' | 'open' | 'half_open'

/**
 * Stops calling the provider after `threshold` consecutive transport failures.
 * The cooldown runs from the last real failure; rejections while open do not count.
 */
export class CircuitBreaker {
    private state: CircuitState = 'closed'
    private failures = 0
    private lastFailure = 0

    constructor(
        private threshold: number = 5,
        private cooldownMs: number = 30000,
        private now: () => number = Date.now
    ) {}

    /** Throws while open; moves to half_open once the cooldown has passed. */
    check(): void {
        if (this.state !== 'open') return
        const remaining = this.cooldownMs - (this.now() - this.lastFailure)
        if (remaining <= 0) {
            this.state = 'half_open'
            return
        }
        throw new TransportError(
            `Model endpoint failed ${this.failures} times in a row; retry in ${Math.ceil(remaining / 1000)}s`
        )
    }

    onSuccess(): void {
        this.failures = 0
        this.state = 'closed'
    }

    onFailure(): void {
        this.failures++
        this.lastFailure = this.now()
        if (this.failures >= this.threshold) {
            this.state = 'open'
        }
    }

    getState(): CircuitState {
        return this.state
    }
}

import type { ResourceScope } from './types.js'

interface Waiter {
    scopes: ResourceScope[]
    grant: (release: () => void) => void
}

function overlaps(a: string, b: string): boolean {
    if (a === b) return true
    const [shorter, longer] = a.length < b.length ? [a, b] : [b, a]
    return longer.startsWith(shorter.endsWith('/') ? shorter : `${shorter}/`)
}

function conflicts(a: ResourceScope[], b: ResourceScope[]): boolean {
    return a.some((x) => b.some((y) => (x.mode === 'write' || y.mode === 'write') && overlaps(x.key, y.key)))
}

/**
 * Readers/writer lock over path-like scopes. Readers of a scope share it; a writer excludes
 * every reader and writer of an overlapping scope. Waiters are granted in arrival order.
 */
export class ResourceLock {
    private readonly active = new Set<ResourceScope[]>()
    private readonly queue: Waiter[] = []

    async acquire(scopes: ResourceScope[], signal?: AbortSignal): Promise<() => void> {
        if (scopes.length === 0) return () => {}
        signal?.throwIfAborted()

        if (this.grantable(scopes, this.queue.length)) {
            return this.hold(scopes)
        }

        return new Promise((resolve, reject) => {
            const waiter: Waiter = {
                scopes,
                grant: (release) => {
                    signal?.removeEventListener('abort', onAbort)
                    resolve(release)
                },
            }
            const onAbort = () => {
                const idx = this.queue.indexOf(waiter)
                if (idx !== -1) this.queue.splice(idx, 1)
                reject(signal?.reason)
                this.drain()
            }
            signal?.addEventListener('abort', onAbort, { once: true })
            this.queue.push(waiter)
        })
    }

    get held(): number {
        return this.active.size
    }

    private grantable(scopes: ResourceScope[], queuedBefore: number): boolean {
        for (const holder of this.active) {
            if (conflicts(holder, scopes)) return false
        }
        for (let i = 0; i < queuedBefore; i++) {
            const waiter = this.queue[i]
            if (waiter && conflicts(waiter.scopes, scopes)) return false
        }
        return true
    }

    private hold(scopes: ResourceScope[]): () => void {
        this.active.add(scopes)
        let released = false
        return () => {
            if (released) return
            released = true
            this.active.delete(scopes)
            this.drain()
        }
    }

    private drain(): void {
        for (let i = 0; i < this.queue.length; ) {
            const waiter = this.queue[i]
            if (waiter && this.grantable(waiter.scopes, i)) {
                this.queue.splice(i, 1)
                waiter.grant(this.hold(waiter.scopes))
            } else {
                i++
            }
        }
    }
}

import { randomUUID } from 'node:crypto'
import type { Logger } from '../logger/index.js'
import type { Span, SpanKind, Trace, TraceSummary } from './types.js'

function newSpan(kind: SpanKind, name: string, attributes: Record<string, unknown>, parent?: Span): Span {
    return { id: randomUUID(), kind, name, parentId: parent?.id, startTime: Date.now(), attributes, children: [] }
}

/**
 * Collects one trace per session. Tool calls of a step run concurrently, so
 * spans are parented explicitly rather than through a stack: a span without
 * an explicit parent goes under the innermost open task span.
 */
export class Tracer {
    private trace: Trace | null = null
    private openTasks: Span[] = []

    constructor(private logger: Logger) {}

    startTrace(sessionId: string): Trace {
        const root = newSpan('task', 'session', { sessionId })
        this.trace = { id: randomUUID(), sessionId, root, startTime: root.startTime }
        this.openTasks = [root]
        return this.trace
    }

    startSpan(kind: SpanKind, name: string, attributes: Record<string, unknown> = {}, parent?: Span): Span {
        const owner = parent ?? this.openTasks.at(-1)
        const span = newSpan(kind, name, attributes, owner)
        owner?.children.push(span)
        if (kind === 'task') this.openTasks.push(span)
        this.logger.debug({ spanId: span.id, kind, name }, 'span:start')
        return span
    }

    /** Ends a span and returns its duration. Ending twice keeps the first end time. */
    endSpan(span: Span): number {
        span.endTime ??= Date.now()
        this.openTasks = this.openTasks.filter((s) => s !== span)
        const duration = span.endTime - span.startTime
        this.logger.debug({ spanId: span.id, duration }, 'span:end')
        return duration
    }

    /** Adds a span that already finished elsewhere, such as a managed process. */
    record(kind: SpanKind, name: string, startTime: number, endTime: number, attributes: Record<string, unknown> = {}): void {
        const owner = this.trace?.root
        if (!owner) return
        owner.children.push({ ...newSpan(kind, name, attributes, owner), startTime, endTime })
    }

    endTrace(): Trace | null {
        const trace = this.trace
        if (!trace) return null
        const now = Date.now()
        for (const span of this.openTasks) span.endTime ??= now
        trace.endTime = now
        this.logger.debug({ traceId: trace.id, summary: summarize(trace) }, 'trace:summary')
        this.trace = null
        this.openTasks = []
        return trace
    }

    getTrace(): Trace | null {
        return this.trace
    }
}

export function summarize(trace: Trace): TraceSummary {
    const summary: TraceSummary = {}
    const visit = (span: Span) => {
        if (span.endTime !== undefined && span !== trace.root) {
            const entry = (summary[span.kind] ??= { count: 0, totalMs: 0 })
            entry.count++
            entry.totalMs += span.endTime - span.startTime
        }
        for (const child of span.children) visit(child)
    }
    visit(trace.root)
    return summary
}

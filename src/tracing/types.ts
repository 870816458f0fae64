export type SpanKind = 'task' | 'model_call' | 'tool' | 'process'

export interface Span {
    id: string
    kind: SpanKind
    name: string
    parentId?: string
    startTime: number
    endTime?: number
    attributes: Record<string, unknown>
    children: Span[]
}

export interface Trace {
    id: string
    sessionId: string
    root: Span
    startTime: number
    endTime?: number
}

/** Per-kind totals over the finished spans of a trace. */
export type TraceSummary = Partial<Record<SpanKind, { count: number; totalMs: number }>>

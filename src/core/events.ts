import type { ToolCall, Turn } from '../conversation/types.js'
import type { TaskState } from '../engine/types.js'
import type { OutputChunk, ProcessState } from '../process/types.js'
import type { RiskClass } from '../tools/types.js'
import type { ErrorCategory } from './errors.js'

export type EventMap = {
    'task:state': { previous: TaskState; current: TaskState }
    'message:added': { turn: Turn }
    'text:delta': { delta: string; text: string }
    'tool:before': { call: ToolCall; riskClass: RiskClass }
    'tool:after': { call: ToolCall; duration: number; isError: boolean }
    'tool:progress': { callId: string; chunk: OutputChunk }
    'approval:requested': { call: ToolCall; riskClass: RiskClass }
    'approval:resolved': { callId: string; approved: boolean; reason?: string }
    'process:output': { processId: number; chunk: OutputChunk }
    'process:exit': { processId: number; state: ProcessState }
    'step:error': { category: ErrorCategory; message: string }
    'session:end': { sessionId: string; turns: number }
}

type EventHandler<T> = (data: T) => void

type HandlerSets = { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> }

export class TypedEventEmitter {
    private handlers: HandlerSets = {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): () => void {
        const handlers: { [P in K]?: Set<EventHandler<EventMap[P]>> } = this.handlers
        let set: Set<EventHandler<EventMap[K]>> | undefined = handlers[event]
        if (!set) {
            set = new Set()
            handlers[event] = set
        }
        set.add(handler)
        return () => this.off(event, handler)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        const set: Set<EventHandler<EventMap[K]>> | undefined = this.handlers[event]
        set?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set: Set<EventHandler<EventMap[K]>> | undefined = this.handlers[event]
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // cross-cutting listeners should not crash the main flow
            }
        }
    }

    removeAll(): void {
        this.handlers = {}
    }
}

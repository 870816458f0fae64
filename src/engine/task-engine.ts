import { randomUUID } from 'node:crypto'
import { Conversation, contentToText } from '../conversation/conversation.js'
import type { ToolCall, Turn } from '../conversation/types.js'
import { CodeloomError, errorMessage, ValidationError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import { buildSystemPrompt, describeEnvironment, toChatMessages } from '../llm/prompt.js'
import { type AccumulatedResponse, type AccumulatorEvent, type RawToolCall, StreamAccumulator } from '../llm/stream-accumulator.js'
import type { ModelClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import type { SessionStore } from '../memory/session-store.js'
import type { PermissionGate } from '../permissions/gate.js'
import type { ApprovalOutcome, PermissionDecision } from '../permissions/types.js'
import type { ProcessSupervisor } from '../process/supervisor.js'
import type { Tracer } from '../tracing/tracer.js'
import { type DispatchResult, errorResult, type ToolDispatcher } from '../tools/dispatcher.js'
import type { ToolRegistry } from '../tools/registry.js'
import { type EngineOptions, isTerminalTool, type StepOutcome, type TaskState, type TaskStatus } from './types.js'

export interface TaskEngineDeps {
    model: ModelClient
    registry: ToolRegistry
    dispatcher: ToolDispatcher
    gate: PermissionGate
    supervisor: ProcessSupervisor
    fs: FileSystem
    logger: Logger
    tracer: Tracer
    eventBus: TypedEventEmitter
    sessionStore?: SessionStore
}

interface ParsedCall {
    call: ToolCall
    parseError?: string
}

interface ScheduledCall {
    call: ToolCall
    startedAt: number
    result: Promise<DispatchResult>
}

const STARTABLE: TaskStatus[] = ['idle', 'completed', 'cancelled', 'failed']
const ACTIVE: TaskStatus[] = ['running', 'waiting_approval', 'paused']

export const CANCELLED_RESULT = 'Tool call cancelled by the operator'

function parseArguments(raw: string): { value: Record<string, unknown> } | { error: string } {
    const text = raw.trim()
    if (text === '') return { value: {} }
    let parsed: unknown
    try {
        parsed = JSON.parse(text)
    } catch (error) {
        return { error: `Malformed tool arguments: ${errorMessage(error)}` }
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        return { error: 'Malformed tool arguments: expected a JSON object' }
    }
    return { value: Object.fromEntries(Object.entries(parsed)) }
}

/**
 * Drives one task at a time: streams model responses, routes each tool call
 * through the permission gate and dispatcher, and appends results in the order
 * the calls were authorized. Nothing escapes `step`/`run`; failures become
 * error turns or a failed state.
 */
export class TaskEngine {
    readonly sessionId: string
    private readonly conversation: Conversation
    private readonly createdAt = new Date().toISOString()
    private readonly systemPrompt: string
    private current: TaskState = { status: 'idle' }
    private controller = new AbortController()
    private pauseRequested = false
    private steps = 0

    constructor(
        private deps: TaskEngineDeps,
        private options: EngineOptions,
        init: { sessionId?: string; turns?: readonly Turn[] } = {}
    ) {
        this.sessionId = init.sessionId ?? randomUUID()
        this.conversation = init.turns ? Conversation.fromTurns(init.turns) : new Conversation()
        this.systemPrompt =
            options.systemPrompt ?? buildSystemPrompt({ workspace: options.workspaceRoot, userInstructions: '' })
    }

    get state(): TaskState {
        return this.current
    }

    get turns(): readonly Turn[] {
        return this.conversation.turns
    }

    /** Appends the instruction as a user turn and moves to running. */
    async startTask(instruction: string): Promise<void> {
        if (!STARTABLE.includes(this.current.status)) {
            throw new ValidationError(`Cannot start a task while ${this.current.status}`)
        }

        let environment: string | undefined
        try {
            environment = await describeEnvironment(this.deps.fs, this.options.workspaceRoot)
        } catch (error) {
            this.deps.logger.warn({ error: errorMessage(error) }, 'engine:environment-failed')
        }

        if (!this.deps.tracer.getTrace()) this.deps.tracer.startTrace(this.sessionId)
        this.controller = new AbortController()
        this.pauseRequested = false
        this.steps = 0
        this.record(this.conversation.appendUser(instruction, environment))
        this.setState({ status: 'running' })
    }

    /** Runs one model round trip plus the tool calls it produced. */
    async step(): Promise<StepOutcome> {
        if (this.current.status !== 'running' || this.controller.signal.aborted) {
            return this.outcome(0, '')
        }

        if (this.pauseRequested) {
            this.pauseRequested = false
            this.setState({ status: 'paused' })
            await this.persist()
            return this.outcome(0, '')
        }

        if (++this.steps > this.options.maxStepsPerTask) {
            this.setState({ status: 'failed', error: `Task exceeded ${this.options.maxStepsPerTask} steps` })
            await this.persist()
            return this.outcome(0, '')
        }

        const signal = this.controller.signal
        const span = this.deps.tracer.startSpan('task', 'step', { step: this.steps })
        try {
            return await this.runStep(signal)
        } catch (error) {
            if (signal.aborted) return this.outcome(0, '')
            this.deps.logger.error({ error: errorMessage(error) }, 'engine:step-crashed')
            this.resolvePending(`Tool call aborted: ${errorMessage(error)}`)
            this.setState({ status: 'failed', error: errorMessage(error) })
            await this.persist()
            return this.outcome(0, '')
        } finally {
            this.deps.tracer.endSpan(span)
        }
    }

    /** Starts a task and steps until it stops running. */
    async run(instruction: string): Promise<TaskState> {
        try {
            await this.startTask(instruction)
        } catch (error) {
            this.deps.logger.warn({ error: errorMessage(error) }, 'engine:start-rejected')
            return this.current
        }
        return this.drive()
    }

    /**
     * Operator input outside of an approval: the answer to an `ask_question`, or a
     * new instruction once the previous one settled.
     */
    async sendMessage(text: string): Promise<TaskState> {
        return this.run(text)
    }

    approve(callId: string, options: { remember?: boolean } = {}): void {
        this.deps.gate.approve(callId, options)
    }

    reject(callId: string, reason: string): void {
        this.deps.gate.reject(callId, reason)
    }

    /** Requests a pause; it takes effect at the next step boundary. */
    pause(): void {
        if (this.current.status === 'running' || this.current.status === 'waiting_approval') {
            this.pauseRequested = true
        }
    }

    async resume(): Promise<TaskState> {
        this.pauseRequested = false
        if (this.current.status !== 'paused') return this.current
        this.setState({ status: 'running' })
        return this.drive()
    }

    /**
     * Aborts the model request and every in-flight tool, reaps all managed
     * processes and answers every unresolved call with a cancelled result.
     */
    async cancel(): Promise<void> {
        if (!ACTIVE.includes(this.current.status)) return

        this.controller.abort()
        this.deps.gate.clear()
        this.pauseRequested = false
        // processes of unresolved calls first, then anything earlier steps left running
        for (const call of this.conversation.pendingCalls()) {
            const killed = await this.deps.supervisor.killForCall(call.id)
            if (killed.length > 0) {
                this.deps.logger.debug({ callId: call.id, processes: killed.map((p) => p.id) }, 'engine:call-processes-killed')
            }
        }
        await this.deps.supervisor.killAll()

        this.resolvePending(CANCELLED_RESULT)
        this.setState({ status: 'cancelled' })
        await this.persist()
    }

    /** Cancels anything active and hands the final log to the session store. */
    async close(): Promise<void> {
        await this.cancel()
        await this.persist()
        const trace = this.deps.tracer.endTrace()
        if (trace) {
            this.deps.logger.debug({ traceId: trace.id, duration: (trace.endTime ?? trace.startTime) - trace.startTime }, 'trace:end')
        }
        this.deps.eventBus.emit('session:end', { sessionId: this.sessionId, turns: this.conversation.length })
    }

    private async drive(): Promise<TaskState> {
        while (this.current.status === 'running' && !this.controller.signal.aborted) {
            await this.step()
        }
        return this.current
    }

    private async runStep(signal: AbortSignal): Promise<StepOutcome> {
        let response: AccumulatedResponse
        try {
            response = await this.streamResponse(signal)
        } catch (error) {
            if (signal.aborted) return this.outcome(0, '')
            const category = error instanceof CodeloomError ? error.category : 'transport'
            const message = errorMessage(error)
            this.deps.logger.warn({ category, error: message }, 'engine:step-failed')
            this.record(this.conversation.appendError(category, message))
            this.deps.eventBus.emit('step:error', { category, message })
            this.setState({ status: 'idle' })
            return this.outcome(0, '')
        }
        if (signal.aborted) return this.outcome(0, response.text)

        const parsed = this.parseCalls(response.toolCalls)
        this.record(
            this.conversation.appendAssistant(
                response.text,
                parsed.map((p) => p.call)
            )
        )

        if (parsed.length === 0) {
            this.setState({ status: 'idle' })
            await this.persist()
            return this.outcome(0, response.text)
        }

        const terminal = await this.processCalls(parsed, signal)
        if (signal.aborted) return this.outcome(parsed.length, response.text)

        if (terminal !== undefined) {
            this.setState({ status: 'completed', summary: terminal })
            await this.persist()
        }
        return this.outcome(parsed.length, response.text)
    }

    private async streamResponse(signal: AbortSignal): Promise<AccumulatedResponse> {
        const accumulator = new StreamAccumulator()
        const stream = this.deps.model.stream({
            model: this.options.model,
            messages: toChatMessages(this.systemPrompt, this.conversation.turns),
            tools: this.deps.registry.getToolDefinitions(),
            signal,
        })

        for await (const chunk of stream) {
            this.forward(accumulator.push(chunk))
        }
        const { response, events } = accumulator.finish()
        this.forward(events)
        return response
    }

    private forward(events: AccumulatorEvent[]): void {
        for (const event of events) {
            if (event.type === 'text') {
                this.deps.eventBus.emit('text:delta', { delta: event.delta, text: event.text })
            } else {
                this.deps.logger.debug({ callId: event.call.id, tool: event.call.name }, 'engine:tool-call-streamed')
            }
        }
    }

    private parseCalls(raw: RawToolCall[]): ParsedCall[] {
        const seen = new Set<string>()
        return raw.map((r) => {
            const id = this.conversation.hasCall(r.id) || seen.has(r.id) ? `call_${randomUUID()}` : r.id
            seen.add(id)
            const args = parseArguments(r.rawArguments)
            if ('error' in args) {
                return { call: { id, name: r.name, arguments: {}, rawArguments: r.rawArguments }, parseError: args.error }
            }
            return { call: { id, name: r.name, arguments: args.value } }
        })
    }

    /**
     * Authorizes calls in order and starts allowed ones immediately, so same-turn
     * calls overlap unless their resource scopes conflict. Results are appended in
     * authorization order. Returns the summary when a terminal tool succeeded.
     */
    private async processCalls(parsed: ParsedCall[], signal: AbortSignal): Promise<string | undefined> {
        const scheduled: ScheduledCall[] = []
        const settled = (call: ToolCall, result: DispatchResult) =>
            scheduled.push({ call, startedAt: Date.now(), result: Promise.resolve(result) })

        for (const { call, parseError } of parsed) {
            if (signal.aborted) break

            if (parseError) {
                settled(call, errorResult('validation', `ValidationError: ${parseError}`))
                continue
            }

            const prepared = this.deps.dispatcher.prepare(call)
            if (!prepared.ok) {
                settled(call, prepared.error)
                continue
            }

            const riskClass = prepared.value.tool.riskClass
            let decision: PermissionDecision
            try {
                decision = this.deps.gate.authorize(call, riskClass)
            } catch (error) {
                settled(call, errorResult('permission_denied', `PermissionDeniedError: ${errorMessage(error)}`))
                continue
            }

            if (decision.kind === 'deny') {
                settled(call, errorResult('permission_denied', `PermissionDeniedError: ${decision.reason}`))
                continue
            }

            if (decision.kind === 'ask') {
                this.setState({ status: 'waiting_approval', call })
                let outcome: ApprovalOutcome
                try {
                    outcome = await this.deps.gate.waitForDecision(call.id, signal)
                } catch (error) {
                    if (signal.aborted) break
                    throw error
                }
                this.setState({ status: 'running' })
                if (!outcome.approved) {
                    settled(call, errorResult('permission_denied', outcome.reason))
                    continue
                }
            }

            this.deps.eventBus.emit('tool:before', { call, riskClass })
            scheduled.push({
                call,
                startedAt: Date.now(),
                result: this.deps.dispatcher.execute(prepared.value, {
                    signal,
                    onProgress: (chunk) => this.deps.eventBus.emit('tool:progress', { callId: call.id, chunk }),
                }),
            })
        }

        let terminal: string | undefined
        for (const { call, startedAt, result } of scheduled) {
            const outcome = await result
            if (signal.aborted || this.conversation.isResolved(call.id)) continue

            this.record(this.conversation.appendToolResult(call.id, outcome.content, outcome.isError))
            this.deps.eventBus.emit('tool:after', { call, duration: Date.now() - startedAt, isError: outcome.isError })
            if (isTerminalTool(call.name) && !outcome.isError && terminal === undefined) {
                terminal = contentToText(outcome.content)
            }
        }
        return terminal
    }

    private resolvePending(content: string): void {
        for (const call of this.conversation.pendingCalls()) {
            this.record(this.conversation.appendToolResult(call.id, content, true))
        }
    }

    private record(turn: Turn): void {
        this.deps.eventBus.emit('message:added', { turn })
    }

    private setState(next: TaskState): void {
        const previous = this.current
        this.current = next
        this.deps.logger.debug({ from: previous.status, to: next.status }, 'engine:state')
        this.deps.eventBus.emit('task:state', { previous, current: next })
    }

    private outcome(toolCalls: number, text: string): StepOutcome {
        return { state: this.current, toolCalls, text }
    }

    private async persist(): Promise<void> {
        const store = this.deps.sessionStore
        if (!store) return
        try {
            await store.save({
                id: this.sessionId,
                createdAt: this.createdAt,
                updatedAt: new Date().toISOString(),
                status: this.current.status,
                turns: this.conversation.snapshot(),
            })
        } catch (error) {
            this.deps.logger.warn({ error: errorMessage(error) }, 'engine:persist-failed')
        }
    }
}

import { finished } from 'node:stream/promises'
import type { Readable } from 'node:stream'
import { ExecutionError, errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import { execaLauncher } from './launcher.js'
import { TailBuffer } from './tail-buffer.js'
import {
    isTerminalState,
    type LaunchedProcess,
    type LaunchResult,
    type OutputChunk,
    type OutputStream,
    type ProcessLauncher,
    type ProcessSnapshot,
    type ProcessState,
    type SpawnOptions,
    type SupervisorOptions,
    type WaitResult,
} from './types.js'

const DEFAULT_HISTORY_LIMIT = 50
const SPAWN_FAILURE_EXIT_CODE = 127

type OutputListener = (chunk: OutputChunk) => void

interface ProcessEntry {
    id: number
    command: string
    args: string[]
    cwd: string
    interactive: boolean
    callId?: string
    state: ProcessState
    child: LaunchedProcess
    stdout: TailBuffer
    stderr: TailBuffer
    listeners: Set<OutputListener>
    startedAt: number
    endedAt?: number
    termination?: 'killed' | 'timed_out'
    forceKillTimer?: NodeJS.Timeout
    timeoutTimer?: NodeJS.Timeout
    /** Settles once the process exited and its output streams drained. */
    done: Promise<void>
}

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Owns every external process the agent starts. Callers only hold numeric ids;
 * output reaches them through listeners, never through the raw child handle.
 */
export class ProcessSupervisor {
    private readonly live = new Map<number, ProcessEntry>()
    private readonly history = new Map<number, ProcessSnapshot>()
    private readonly launcher: ProcessLauncher
    private readonly historyLimit: number
    private readonly useProcessGroups = process.platform !== 'win32'
    private counter = 0
    private closed = false

    constructor(
        private options: SupervisorOptions,
        private logger: Logger,
        private eventBus?: TypedEventEmitter
    ) {
        this.launcher = options.launcher ?? execaLauncher
        this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT
    }

    get liveCount(): number {
        return this.live.size
    }

    spawn(command: string, args: string[], options: SpawnOptions): number {
        if (this.closed) {
            throw new ExecutionError('Process supervisor is shut down')
        }

        const id = ++this.counter
        const child = this.launcher(command, args, { ...options, detached: this.useProcessGroups })
        const entry: ProcessEntry = {
            id,
            command,
            args,
            cwd: options.cwd,
            interactive: options.interactive ?? false,
            callId: options.callId,
            state: { status: 'starting' },
            child,
            stdout: new TailBuffer(this.options.outputTailBytes),
            stderr: new TailBuffer(this.options.outputTailBytes),
            listeners: new Set(),
            startedAt: Date.now(),
            done: Promise.resolve(),
        }
        if (child.pid !== undefined) entry.state = { status: 'running' }

        this.live.set(id, entry)
        this.pipe(entry, 'stdout', child.stdout)
        this.pipe(entry, 'stderr', child.stderr)
        entry.done = this.track(entry)

        this.logger.debug({ processId: id, command, args, pid: child.pid }, 'process:spawn')
        return id
    }

    get(id: number): ProcessSnapshot | undefined {
        const entry = this.live.get(id)
        if (entry) return this.snapshot(entry)
        return this.history.get(id)
    }

    list(): ProcessSnapshot[] {
        return [...this.live.values()].map((entry) => this.snapshot(entry))
    }

    subscribe(id: number, listener: OutputListener): () => void {
        const entry = this.live.get(id)
        if (!entry) return () => {}
        entry.listeners.add(listener)
        return () => entry.listeners.delete(listener)
    }

    async sendInput(id: number, data: string | Uint8Array): Promise<void> {
        const entry = this.live.get(id)
        if (!entry) {
            throw new ExecutionError(`Process ${id} is not running`)
        }
        if (!entry.interactive || !entry.child.stdin) {
            throw new ExecutionError(`Process ${id} does not accept input`)
        }
        if (isTerminalState(entry.state) || entry.termination) {
            throw new ExecutionError(`Process ${id} has already exited`)
        }

        const stdin = entry.child.stdin
        await new Promise<void>((resolve, reject) => {
            stdin.write(data, (error) => (error ? reject(new ExecutionError(errorMessage(error), { cause: error })) : resolve()))
        })
    }

    closeInput(id: number): void {
        this.live.get(id)?.child.stdin?.end()
    }

    /**
     * Resolves when the process finishes or `thresholdMs` elapses, whichever comes first.
     * The process keeps running after a threshold result.
     */
    async waitFor(id: number, thresholdMs: number, signal?: AbortSignal): Promise<WaitResult> {
        const entry = this.live.get(id)
        if (!entry) {
            const snapshot = this.history.get(id)
            if (!snapshot) throw new ExecutionError(`Unknown process ${id}`)
            return { done: true, snapshot }
        }

        let timer: NodeJS.Timeout | undefined
        let onAbort: (() => void) | undefined
        const finishedInTime = await Promise.race([
            entry.done.then(() => true),
            new Promise<boolean>((resolve) => {
                timer = setTimeout(() => resolve(false), thresholdMs)
                onAbort = () => resolve(false)
                signal?.addEventListener('abort', onAbort, { once: true })
            }),
        ])
        clearTimeout(timer)
        if (onAbort) signal?.removeEventListener('abort', onAbort)

        return { done: finishedInTime, snapshot: this.snapshot(entry) }
    }

    /** Terminates and reaps the process. Calling it again returns the same terminal snapshot. */
    async kill(id: number): Promise<ProcessSnapshot> {
        return this.terminate(id, 'killed')
    }

    timeout(id: number, durationMs: number): void {
        const entry = this.live.get(id)
        if (!entry || isTerminalState(entry.state)) return
        clearTimeout(entry.timeoutTimer)
        entry.timeoutTimer = setTimeout(() => {
            this.terminate(id, 'timed_out').catch((error: unknown) => {
                this.logger.warn({ processId: id, error: errorMessage(error) }, 'process:timeout-failed')
            })
        }, durationMs)
    }

    async killForCall(callId: string): Promise<ProcessSnapshot[]> {
        const owned = [...this.live.values()].filter((entry) => entry.callId === callId)
        return Promise.all(owned.map((entry) => this.terminate(entry.id, 'killed')))
    }

    async killAll(): Promise<void> {
        await Promise.all([...this.live.keys()].map((id) => this.terminate(id, 'killed')))
    }

    async shutdown(): Promise<void> {
        this.closed = true
        await this.killAll()
        this.logger.debug({ history: this.history.size }, 'process:supervisor-shutdown')
    }

    private async terminate(id: number, reason: 'killed' | 'timed_out'): Promise<ProcessSnapshot> {
        const entry = this.live.get(id)
        if (!entry) {
            const snapshot = this.history.get(id)
            if (!snapshot) throw new ExecutionError(`Unknown process ${id}`)
            return snapshot
        }

        if (!isTerminalState(entry.state) && !entry.termination) {
            entry.termination = reason
            this.signal(entry, 'SIGTERM')
            entry.forceKillTimer = setTimeout(() => this.signal(entry, 'SIGKILL'), this.options.killGraceMs)
        }

        await entry.done
        return this.get(id) ?? this.snapshot(entry)
    }

    private signal(entry: ProcessEntry, signal: NodeJS.Signals): void {
        const pid = entry.child.pid
        if (pid !== undefined && this.useProcessGroups) {
            try {
                process.kill(-pid, signal)
                return
            } catch (error) {
                this.logger.debug({ processId: entry.id, signal, error: errorMessage(error) }, 'process:group-signal-failed')
            }
        }
        entry.child.kill(signal)
    }

    private pipe(entry: ProcessEntry, stream: OutputStream, readable: Readable | null): void {
        if (!readable) return
        readable.setEncoding('utf8')
        readable.on('data', (data: string) => {
            const buffer = stream === 'stdout' ? entry.stdout : entry.stderr
            buffer.append(data)
            const chunk: OutputChunk = { stream, data }
            for (const listener of entry.listeners) listener(chunk)
            this.eventBus?.emit('process:output', { processId: entry.id, chunk })
        })
    }

    private async track(entry: ProcessEntry): Promise<void> {
        const result = await entry.child.exited.catch(
            (error: unknown): LaunchResult => ({ failureMessage: errorMessage(error) })
        )

        await this.drain(entry)

        clearTimeout(entry.forceKillTimer)
        clearTimeout(entry.timeoutTimer)
        entry.state = this.finalState(entry, result)
        entry.endedAt = Date.now()
        if (result.failureMessage) entry.stderr.append(`${result.failureMessage}\n`)

        entry.listeners.clear()
        this.release(entry)
        this.logger.debug({ processId: entry.id, state: entry.state }, 'process:exit')
        this.eventBus?.emit('process:exit', { processId: entry.id, state: entry.state })
    }

    private async drain(entry: ProcessEntry): Promise<void> {
        const streams = [entry.child.stdout, entry.child.stderr].filter((s): s is Readable => s !== null)
        // premature close is expected for killed processes
        const drained = Promise.all(streams.map((s) => finished(s).catch(() => undefined)))
        await Promise.race([drained, delay(this.options.killGraceMs)])
        for (const s of streams) {
            if (!s.destroyed) s.destroy()
        }
        entry.child.stdin?.destroy()
    }

    private finalState(entry: ProcessEntry, result: LaunchResult): ProcessState {
        if (entry.termination === 'timed_out') return { status: 'timed_out' }
        if (entry.termination === 'killed') return { status: 'killed', signal: result.signal }
        if (result.exitCode !== undefined) return { status: 'completed', exitCode: result.exitCode }
        if (result.signal !== undefined) return { status: 'killed', signal: result.signal }
        return { status: 'completed', exitCode: SPAWN_FAILURE_EXIT_CODE }
    }

    private release(entry: ProcessEntry): void {
        this.live.delete(entry.id)
        this.history.set(entry.id, this.snapshot(entry))
        while (this.history.size > this.historyLimit) {
            const oldest = this.history.keys().next().value
            if (oldest === undefined) break
            this.history.delete(oldest)
        }
    }

    private snapshot(entry: ProcessEntry): ProcessSnapshot {
        return {
            id: entry.id,
            command: entry.command,
            args: [...entry.args],
            cwd: entry.cwd,
            interactive: entry.interactive,
            callId: entry.callId,
            state: entry.state,
            stdoutTail: entry.stdout.text,
            stderrTail: entry.stderr.text,
            startedAt: entry.startedAt,
            endedAt: entry.endedAt,
        }
    }
}

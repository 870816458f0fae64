import type { Readable, Writable } from 'node:stream'

export type OutputStream = 'stdout' | 'stderr'

export interface OutputChunk {
    stream: OutputStream
    data: string
}

export type ProcessState =
    | { status: 'starting' }
    | { status: 'running' }
    | { status: 'completed'; exitCode: number }
    | { status: 'killed'; signal?: string }
    | { status: 'timed_out' }

export function isTerminalState(state: ProcessState): boolean {
    return state.status === 'completed' || state.status === 'killed' || state.status === 'timed_out'
}

export interface SpawnOptions {
    cwd: string
    interactive?: boolean
    /** Run `command` through the system shell; `args` are appended to the command line. */
    shell?: boolean
    env?: Record<string, string>
    /** Tool call that owns the process, so cancelling the call can reap it. */
    callId?: string
}

export interface ProcessSnapshot {
    id: number
    command: string
    args: string[]
    cwd: string
    interactive: boolean
    callId?: string
    state: ProcessState
    stdoutTail: string
    stderrTail: string
    startedAt: number
    endedAt?: number
}

export interface WaitResult {
    done: boolean
    snapshot: ProcessSnapshot
}

export interface LaunchResult {
    exitCode?: number
    signal?: string
    failureMessage?: string
}

/** Minimal view of a spawned child that the supervisor drives. */
export interface LaunchedProcess {
    pid?: number
    stdout: Readable | null
    stderr: Readable | null
    stdin: Writable | null
    kill(signal?: NodeJS.Signals): boolean
    exited: Promise<LaunchResult>
}

export interface LaunchOptions extends SpawnOptions {
    detached: boolean
}

export type ProcessLauncher = (command: string, args: string[], options: LaunchOptions) => LaunchedProcess

export interface SupervisorOptions {
    killGraceMs: number
    outputTailBytes: number
    /** Terminal snapshots kept after their handles are released, for later polling. */
    historyLimit?: number
    launcher?: ProcessLauncher
}

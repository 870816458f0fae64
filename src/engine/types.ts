import type { ToolCall } from '../conversation/types.js'

export type TaskState =
    | { status: 'idle' }
    | { status: 'running' }
    | { status: 'waiting_approval'; call: ToolCall }
    | { status: 'paused' }
    | { status: 'completed'; summary: string }
    | { status: 'failed'; error: string }
    | { status: 'cancelled' }

export type TaskStatus = TaskState['status']

/** Tools whose result ends the task instead of handing control back to the model. */
export const TERMINAL_TOOLS = ['attempt_completion', 'ask_question'] as const

export type TerminalToolName = (typeof TERMINAL_TOOLS)[number]

export function isTerminalTool(name: string): name is TerminalToolName {
    return (TERMINAL_TOOLS as readonly string[]).includes(name)
}

export interface StepOutcome {
    /** State after the step settled. */
    state: TaskState
    toolCalls: number
    text: string
}

export interface EngineOptions {
    workspaceRoot: string
    /** A task that needs more model round trips than this fails. */
    maxStepsPerTask: number
    model?: string
    systemPrompt?: string
}

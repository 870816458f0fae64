import pc from 'picocolors'
import type { ToolCall } from '../conversation/types.js'
import type { TaskState } from '../engine/types.js'
import type { ProcessSnapshot } from '../process/types.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    tool: (name: string) => pc.blue(name),
}

export function banner(version: string): string {
    return `${colors.brand('codeloom')} ${colors.dim(`v${version}`)}`
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

const MAX_ARG_PREVIEW = 120

export function formatToolCall(call: ToolCall): string {
    const args = JSON.stringify(call.arguments)
    const preview = args.length > MAX_ARG_PREVIEW ? `${args.slice(0, MAX_ARG_PREVIEW)}…` : args
    return `${colors.tool(call.name)} ${colors.dim(preview)}`
}

export function formatState(state: TaskState): string {
    switch (state.status) {
        case 'completed':
            return colors.success(`completed: ${state.summary}`)
        case 'failed':
            return colors.error(`failed: ${state.error}`)
        case 'waiting_approval':
            return colors.warn(`waiting for approval of ${state.call.name}`)
        case 'cancelled':
            return colors.warn('cancelled')
        default:
            return state.status
    }
}

export function formatProcess(snapshot: ProcessSnapshot): string {
    const status =
        snapshot.state.status === 'completed' ? `exit ${snapshot.state.exitCode}` : snapshot.state.status
    return `${String(snapshot.id).padStart(3)}  ${status.padEnd(10)} ${snapshot.command}`
}

import type { ProcessSnapshot } from '../../process/types.js'

export interface CommandResult {
    managedProcessId: number
    status: ProcessSnapshot['state']['status']
    exitCode: number | null
    stdoutTail: string
    stderrTail: string
}

export function toCommandResult(snapshot: ProcessSnapshot): CommandResult {
    return {
        managedProcessId: snapshot.id,
        status: snapshot.state.status,
        exitCode: snapshot.state.status === 'completed' ? snapshot.state.exitCode : null,
        stdoutTail: snapshot.stdoutTail,
        stderrTail: snapshot.stderrTail,
    }
}

/** Text the model sees for a command. The first line carries the process id that follow-up tools take. */
export function formatCommandResult(snapshot: ProcessSnapshot): string {
    const result = toCommandResult(snapshot)
    const lines = [
        `Process ${result.managedProcessId}: ${result.status}` +
            (result.exitCode !== null ? ` (exit code ${result.exitCode})` : ''),
    ]
    if (result.status === 'running' || result.status === 'starting') {
        lines.push(
            `The command is still running. Use get_command_result with processId ${result.managedProcessId} to poll it` +
                (snapshot.interactive ? ', send_command_input to write to its stdin' : '') +
                ' or terminate_command to stop it.'
        )
    }
    lines.push('<stdout>', result.stdoutTail, '</stdout>')
    if (result.stderrTail) lines.push('<stderr>', result.stderrTail, '</stderr>')
    return lines.join('\n')
}

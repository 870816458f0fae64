import { z } from 'zod'
import type { Tool } from '../types.js'
import { formatCommandResult } from './format.js'

const ExecuteInput = z.object({
    command: z.string().min(1).describe('Shell command line to run in the workspace root'),
    interactive: z
        .boolean()
        .optional()
        .describe('Keep stdin open so input can be sent with send_command_input (default: false)'),
    timeoutMs: z.number().int().positive().optional().describe('Kill the command after this many milliseconds'),
})

type ExecuteInput = z.infer<typeof ExecuteInput>

export interface ExecuteCommandOptions {
    /** How long to wait for completion before returning an in-progress result. */
    inProgressThresholdMs: number
}

export function createExecuteCommandTool(options: ExecuteCommandOptions): Tool<ExecuteInput> {
    return {
        name: 'execute_command',
        description:
            'Execute a shell command in the workspace. Returns the exit code and output tails. ' +
            `Commands still running after ${options.inProgressThresholdMs}ms return an in-progress result ` +
            'with a managed process id; the command keeps running in the background',
        parameters: ExecuteInput,
        riskClass: 'destructive',
        async execute(input, ctx) {
            const id = ctx.supervisor.spawn(ctx.sandbox.wrapCommand(input.command), [], {
                cwd: ctx.workspaceRoot,
                shell: true,
                interactive: input.interactive ?? false,
                callId: ctx.callId,
            })
            const unsubscribe = ctx.supervisor.subscribe(id, ctx.onProgress)
            if (input.timeoutMs !== undefined) ctx.supervisor.timeout(id, input.timeoutMs)

            try {
                const { snapshot } = await ctx.supervisor.waitFor(id, options.inProgressThresholdMs, ctx.signal)
                if (ctx.signal.aborted) {
                    const killed = await ctx.supervisor.kill(id)
                    return { content: formatCommandResult(killed), isError: true }
                }
                return {
                    content: formatCommandResult(snapshot),
                    isError: snapshot.state.status === 'timed_out',
                }
            } finally {
                unsubscribe()
            }
        },
    }
}

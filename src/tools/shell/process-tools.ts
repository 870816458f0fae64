import { z } from 'zod'
import { ExecutionError } from '../../core/errors.js'
import type { Tool } from '../types.js'
import { formatCommandResult } from './format.js'

const INPUT_SETTLE_MS = 300

const ProcessIdInput = z.object({
    processId: z.number().int().positive().describe('Managed process id returned by execute_command'),
})

type ProcessIdInput = z.infer<typeof ProcessIdInput>

const processScope = (input: { processId: number }) => [{ key: `process:${input.processId}`, mode: 'write' as const }]

export const getCommandResultTool: Tool<ProcessIdInput> = {
    name: 'get_command_result',
    description: 'Get the current status and output tails of a command started with execute_command',
    parameters: ProcessIdInput,
    riskClass: 'safe',
    async execute(input, ctx) {
        const snapshot = ctx.supervisor.get(input.processId)
        if (!snapshot) throw new ExecutionError(`Unknown process ${input.processId}`)
        return formatCommandResult(snapshot)
    },
}

const SendInput = ProcessIdInput.extend({
    input: z.string().describe('Text to write to the process stdin'),
    appendNewline: z.boolean().optional().describe('Append "\\n" to the input (default: true)'),
})

type SendInput = z.infer<typeof SendInput>

export const sendCommandInputTool: Tool<SendInput> = {
    name: 'send_command_input',
    description: 'Write text to the stdin of an interactive command and return its output shortly after',
    parameters: SendInput,
    riskClass: 'mutating',
    resourceScope: processScope,
    async execute(input, ctx) {
        const data = input.appendNewline === false ? input.input : `${input.input}\n`
        await ctx.supervisor.sendInput(input.processId, data)
        const { snapshot } = await ctx.supervisor.waitFor(input.processId, INPUT_SETTLE_MS, ctx.signal)
        return formatCommandResult(snapshot)
    },
}

export const terminateCommandTool: Tool<ProcessIdInput> = {
    name: 'terminate_command',
    description: 'Terminate a running command and return its final output',
    parameters: ProcessIdInput,
    riskClass: 'mutating',
    resourceScope: processScope,
    async execute(input, ctx) {
        return formatCommandResult(await ctx.supervisor.kill(input.processId))
    },
}

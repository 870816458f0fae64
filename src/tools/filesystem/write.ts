import { z } from 'zod'
import type { Tool } from '../types.js'
import { fileScope } from './scope.js'

const WriteInput = z.object({
    path: z.string().describe('Path of the file to write, relative to the workspace root'),
    content: z.string().describe('Complete content of the file. Missing directories are created'),
})

type WriteInput = z.infer<typeof WriteInput>

export const writeToFileTool: Tool<WriteInput> = {
    name: 'write_to_file',
    description: 'Write content to a file, creating it (and its directories) if needed or overwriting it',
    parameters: WriteInput,
    riskClass: 'mutating',
    resourceScope: (input, sandbox) => fileScope(sandbox, input.path, 'write'),
    async execute(input, ctx) {
        const target = await ctx.sandbox.resolveReal(input.path, ctx.fs)
        await ctx.fs.writeText(target, input.content)
        const lines = input.content === '' ? 0 : input.content.split('\n').length
        return `File written: ${ctx.sandbox.relative(target)} (${lines} lines)`
    },
}

import { z } from 'zod'
import type { Tool } from '../types.js'
import { fileScope } from './scope.js'

const ReadInput = z.object({
    path: z.string().describe('Path of the file to read, relative to the workspace root'),
    offset: z.number().int().nonnegative().optional().describe('Line offset to start reading from (0-based)'),
    maxLines: z.number().int().positive().optional().describe('Max lines to read (default: all)'),
})

type ReadInput = z.infer<typeof ReadInput>

export const readFileTool: Tool<ReadInput> = {
    name: 'read_file',
    description: 'Read the contents of a file in the workspace',
    parameters: ReadInput,
    riskClass: 'safe',
    resourceScope: (input, sandbox) => fileScope(sandbox, input.path, 'read'),
    async execute(input, ctx) {
        let content = await ctx.fs.readText(await ctx.sandbox.resolveReal(input.path, ctx.fs))

        if (input.offset !== undefined || input.maxLines !== undefined) {
            const lines = content.split('\n')
            const start = input.offset ?? 0
            const end = input.maxLines !== undefined ? start + input.maxLines : lines.length
            content = lines.slice(start, end).join('\n')
        }

        return content
    },
}

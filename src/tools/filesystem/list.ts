import { z } from 'zod'
import type { Tool } from '../types.js'
import { fileScope, IGNORED_DIRECTORIES } from './scope.js'

const ListInput = z.object({
    path: z.string().describe('Directory to list, relative to the workspace root'),
    maxDepth: z.number().int().positive().optional().describe('Max depth to list (default: 1, direct children only)'),
})

type ListInput = z.infer<typeof ListInput>

export const listFilesTool: Tool<ListInput> = {
    name: 'list_files',
    description:
        'List files and directories within a directory. Directories end with "/". ' +
        'With maxDepth greater than 1 the listing descends into subdirectories',
    parameters: ListInput,
    riskClass: 'safe',
    resourceScope: (input, sandbox) => fileScope(sandbox, input.path, 'read'),
    async execute(input, ctx) {
        const dir = await ctx.sandbox.resolveReal(input.path, ctx.fs)
        const entries = await ctx.fs.glob('**', {
            cwd: dir,
            deep: input.maxDepth ?? 1,
            onlyFiles: false,
            ignore: IGNORED_DIRECTORIES,
        })
        return entries.length > 0 ? entries.join('\n') : 'No files found.'
    },
}

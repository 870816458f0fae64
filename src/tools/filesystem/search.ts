import { z } from 'zod'
import { ValidationError } from '../../core/errors.js'
import type { Tool } from '../types.js'
import { fileScope, IGNORED_DIRECTORIES, insideWorkspace } from './scope.js'

const MAX_MATCHES = 200
const MAX_FILE_BYTES = 1024 * 1024
const MAX_LINE_LENGTH = 300

const SearchInput = z.object({
    path: z.string().describe('Directory to search recursively, relative to the workspace root'),
    regex: z.string().describe('Regular expression (JavaScript syntax) to match against each line'),
    filePattern: z.string().optional().describe('Glob to filter files, e.g. "*.ts" (default: all files)'),
})

type SearchInput = z.infer<typeof SearchInput>

function compile(source: string): RegExp {
    try {
        return new RegExp(source)
    } catch (error) {
        throw new ValidationError(`Invalid regex: ${source}`, { cause: error })
    }
}

export const searchFilesTool: Tool<SearchInput> = {
    name: 'search_files',
    description:
        'Search file contents under a directory with a regular expression. ' +
        'Returns matching lines as "file:line: text"',
    parameters: SearchInput,
    riskClass: 'safe',
    resourceScope: (input, sandbox) => fileScope(sandbox, input.path, 'read'),
    async execute(input, ctx) {
        const pattern = compile(input.regex)
        const dir = await ctx.sandbox.resolveReal(input.path, ctx.fs)
        const glob = input.filePattern ? `**/${input.filePattern}` : '**/*'
        const files = await ctx.fs.glob(glob, { cwd: dir, absolute: true, ignore: IGNORED_DIRECTORIES })

        const matches: string[] = []
        for (const file of files) {
            if (ctx.signal.aborted) break
            if (!(await insideWorkspace(file, ctx))) continue
            const stat = await ctx.fs.stat(file)
            if (stat.size > MAX_FILE_BYTES) continue

            const content = await ctx.fs.readText(file)
            if (content.includes('\0')) continue

            const lines = content.split('\n')
            for (let i = 0; i < lines.length; i++) {
                const line = lines[i] ?? ''
                if (!pattern.test(line)) continue
                matches.push(`${ctx.sandbox.relative(file)}:${i + 1}: ${line.slice(0, MAX_LINE_LENGTH).trim()}`)
                if (matches.length >= MAX_MATCHES) {
                    matches.push(`(results truncated at ${MAX_MATCHES} matches)`)
                    return matches.join('\n')
                }
            }
        }

        return matches.length > 0 ? matches.join('\n') : 'No matches found.'
    },
}

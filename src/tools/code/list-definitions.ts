import path from 'node:path'
import { z } from 'zod'
import { isSupportedExtension, parseDefinitions } from '../../code-understanding/parser.js'
import type { FileDefinitions } from '../../code-understanding/types.js'
import { errorMessage } from '../../core/errors.js'
import { fileScope, insideWorkspace } from '../filesystem/scope.js'
import type { Tool } from '../types.js'

const MAX_FILES = 50
const MAX_FILE_BYTES = 1024 * 1024

const ListDefinitionsInput = z.object({
    path: z.string().describe('Directory whose top-level source files are scanned, relative to the workspace root'),
})

type ListDefinitionsInput = z.infer<typeof ListDefinitionsInput>

function format(files: FileDefinitions[], relative: (file: string) => string): string {
    const lines: string[] = []
    for (const file of files) {
        lines.push(relative(file.filePath))
        for (const definition of file.definitions) {
            const indent = definition.kind === 'method' ? '  ' : ''
            lines.push(`│ ${indent}${definition.signature}`)
        }
        lines.push('')
    }
    return lines.join('\n').trimEnd()
}

export const listCodeDefinitionNamesTool: Tool<ListDefinitionsInput> = {
    name: 'list_code_definition_names',
    description:
        'List the definitions (classes, functions, methods, interfaces, types) declared in source files ' +
        'at the top level of a directory. Gives an overview of how the code is structured without reading every file',
    parameters: ListDefinitionsInput,
    riskClass: 'safe',
    resourceScope: (input, sandbox) => fileScope(sandbox, input.path, 'read'),
    async execute(input, ctx) {
        const dir = await ctx.sandbox.resolveReal(input.path, ctx.fs)
        const candidates = (await ctx.fs.glob('*', { cwd: dir, deep: 1, absolute: true })).filter((file) =>
            isSupportedExtension(path.extname(file)),
        )

        const parsed: FileDefinitions[] = []
        for (const file of candidates.slice(0, MAX_FILES)) {
            if (ctx.signal.aborted) break
            if (!(await insideWorkspace(file, ctx))) continue
            if ((await ctx.fs.stat(file)).size > MAX_FILE_BYTES) continue

            try {
                const definitions = await parseDefinitions(file, await ctx.fs.readText(file))
                if (definitions && definitions.definitions.length > 0) parsed.push(definitions)
            } catch (error) {
                ctx.logger.warn({ file, error: errorMessage(error) }, 'definitions:parse-failed')
            }
        }

        if (parsed.length === 0) return 'No source code definitions found.'
        const listing = format(parsed, (file) => ctx.sandbox.relative(file))
        return candidates.length > MAX_FILES ? `${listing}\n\n(only the first ${MAX_FILES} files were scanned)` : listing
    },
}

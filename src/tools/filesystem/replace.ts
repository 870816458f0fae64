import { z } from 'zod'
import { ExecutionError, ValidationError } from '../../core/errors.js'
import type { Tool } from '../types.js'
import { fileScope } from './scope.js'

const SEARCH_MARKER = /^<{3,} SEARCH\s*$/
const DIVIDER_MARKER = /^={3,}\s*$/
const REPLACE_MARKER = /^>{3,} REPLACE\s*$/

export interface ReplaceBlock {
    search: string
    replace: string
}

/**
 * Parses blocks of the form
 *
 * ```
 * <<<<<<< SEARCH
 * old text
 * =======
 * new text
 * >>>>>>> REPLACE
 * ```
 */
export function parseReplaceBlocks(diff: string): ReplaceBlock[] {
    const blocks: ReplaceBlock[] = []
    let section: 'outside' | 'search' | 'replace' = 'outside'
    let search: string[] = []
    let replace: string[] = []

    for (const line of diff.split('\n')) {
        if (section === 'outside') {
            if (SEARCH_MARKER.test(line)) {
                section = 'search'
                search = []
                replace = []
            }
        } else if (section === 'search') {
            if (DIVIDER_MARKER.test(line)) section = 'replace'
            else search.push(line)
        } else if (REPLACE_MARKER.test(line)) {
            blocks.push({ search: search.join('\n'), replace: replace.join('\n') })
            section = 'outside'
        } else {
            replace.push(line)
        }
    }

    if (section !== 'outside') {
        throw new ValidationError('Unterminated SEARCH/REPLACE block')
    }
    if (blocks.length === 0) {
        throw new ValidationError('No SEARCH/REPLACE blocks found in diff')
    }
    return blocks
}

const ReplaceInput = z.object({
    path: z.string().describe('Path of the file to modify, relative to the workspace root'),
    diff: z
        .string()
        .describe(
            'One or more blocks of "<<<<<<< SEARCH\\n<exact text>\\n=======\\n<replacement>\\n>>>>>>> REPLACE". ' +
                'Each block replaces the first occurrence of its search text'
        ),
})

type ReplaceInput = z.infer<typeof ReplaceInput>

export const replaceInFileTool: Tool<ReplaceInput> = {
    name: 'replace_in_file',
    description: 'Edit sections of an existing file using SEARCH/REPLACE blocks',
    parameters: ReplaceInput,
    riskClass: 'mutating',
    resourceScope: (input, sandbox) => fileScope(sandbox, input.path, 'write'),
    async execute(input, ctx) {
        const blocks = parseReplaceBlocks(input.diff)
        const target = await ctx.sandbox.resolveReal(input.path, ctx.fs)
        let content = await ctx.fs.readText(target)

        for (const [index, block] of blocks.entries()) {
            const at = content.indexOf(block.search)
            if (block.search === '' || at === -1) {
                throw new ExecutionError(
                    `Search text of block ${index + 1} not found in ${ctx.sandbox.relative(target)}. No changes were written`
                )
            }
            content = content.slice(0, at) + block.replace + content.slice(at + block.search.length)
        }

        await ctx.fs.writeText(target, content)
        return `Applied ${blocks.length} edit(s) to ${ctx.sandbox.relative(target)}`
    },
}

import { SandboxViolation } from '../../core/errors.js'
import type { SandboxManager } from '../../security/sandbox.js'
import { WORKSPACE_SCOPE_PREFIX } from '../dispatcher.js'
import type { ResourceScope, ToolContext } from '../types.js'

export function fileScope(sandbox: SandboxManager, candidate: string, mode: ResourceScope['mode']): ResourceScope[] {
    return [{ key: `${WORKSPACE_SCOPE_PREFIX}${sandbox.resolve(candidate)}`, mode }]
}

export const IGNORED_DIRECTORIES = ['**/node_modules', '**/node_modules/**', '**/.git', '**/.git/**']

/** False for a linked file whose target lies outside the workspace. */
export async function insideWorkspace(file: string, ctx: ToolContext): Promise<boolean> {
    try {
        await ctx.sandbox.resolveReal(file, ctx.fs)
        return true
    } catch (error) {
        if (error instanceof SandboxViolation) return false
        throw error
    }
}

import type { ZodSchema } from 'zod'
import type { ToolResultContent } from '../conversation/types.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import type { ProcessSupervisor } from '../process/supervisor.js'
import type { OutputChunk } from '../process/types.js'
import type { SandboxManager } from '../security/sandbox.js'

export type RiskClass = 'safe' | 'mutating' | 'destructive' | 'network'

export interface ResourceScope {
    /** Namespaced key, e.g. `fs:/abs/path` or `memory`. Keys overlap when one is a path prefix of the other. */
    key: string
    mode: 'read' | 'write'
}

export interface ToolContext {
    callId: string
    workspaceRoot: string
    signal: AbortSignal
    /** Sink for partial output streamed before the tool returns. */
    onProgress: (chunk: OutputChunk) => void
    fs: FileSystem
    sandbox: SandboxManager
    supervisor: ProcessSupervisor
    logger: Logger
}

export interface ToolOutput {
    content: ToolResultContent
    isError?: boolean
}

export interface Tool<TInput = unknown> {
    name: string
    description: string
    parameters: ZodSchema<TInput>
    /** JSON schema advertised to the model when the zod schema is only a passthrough (remote tools). */
    jsonSchema?: Record<string, unknown>
    riskClass: RiskClass
    resourceScope?(input: TInput, sandbox: SandboxManager): ResourceScope[]
    execute(input: TInput, ctx: ToolContext): Promise<ToolResultContent | ToolOutput>
}

export type AnyTool = Tool<unknown>

export interface ToolDefinition {
    type: 'function'
    function: {
        name: string
        description: string
        parameters: Record<string, unknown>
    }
}

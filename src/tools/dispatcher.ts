import type { ToolCall, ToolResultContent } from '../conversation/types.js'
import { CodeloomError, type ErrorCategory, errorMessage, isAbortError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { err, ok, type Result } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import type { ProcessSupervisor } from '../process/supervisor.js'
import type { OutputChunk } from '../process/types.js'
import type { SandboxManager } from '../security/sandbox.js'
import type { Tracer } from '../tracing/tracer.js'
import type { ToolRegistry } from './registry.js'
import { ResourceLock } from './resource-lock.js'
import type { AnyTool, ResourceScope, ToolContext, ToolOutput } from './types.js'

export interface DispatchResult {
    content: ToolResultContent
    isError: boolean
    errorCategory?: ErrorCategory
}

export interface PreparedCall {
    call: ToolCall
    tool: AnyTool
    input: unknown
    scopes: ResourceScope[]
}

export interface DispatchOptions {
    signal: AbortSignal
    onProgress?: (chunk: OutputChunk) => void
}

interface DispatcherDeps {
    registry: ToolRegistry
    fs: FileSystem
    sandbox: SandboxManager
    supervisor: ProcessSupervisor
    logger: Logger
    tracer: Tracer
}

export const WORKSPACE_SCOPE_PREFIX = 'fs:'

export function errorResult(category: ErrorCategory, message: string): DispatchResult {
    return { content: message, isError: true, errorCategory: category }
}

function isToolOutput(value: ToolResultContent | ToolOutput): value is ToolOutput {
    return typeof value === 'object' && !Array.isArray(value) && 'content' in value
}

export class ToolDispatcher {
    private readonly locks = new ResourceLock()

    constructor(private deps: DispatcherDeps) {}

    /** Resolves the tool and validates arguments without any side effect. */
    prepare(call: ToolCall): Result<PreparedCall, DispatchResult> {
        const tool = this.deps.registry.get(call.name)
        if (!tool) {
            return err(errorResult('validation', `ValidationError: Tool '${call.name}' not found`))
        }

        const parsed = tool.parameters.safeParse(call.arguments)
        if (!parsed.success) {
            const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
            return err(errorResult('validation', `ValidationError: Invalid arguments for ${call.name}: ${issues}`))
        }

        try {
            const scopes = tool.resourceScope?.(parsed.data, this.deps.sandbox) ?? this.defaultScopes(tool)
            return ok({ call, tool, input: parsed.data, scopes })
        } catch (error) {
            return err(this.toErrorResult(call, error))
        }
    }

    async dispatch(call: ToolCall, options: DispatchOptions): Promise<DispatchResult> {
        const prepared = this.prepare(call)
        if (!prepared.ok) return prepared.error
        return this.execute(prepared.value, options)
    }

    async execute(prepared: PreparedCall, options: DispatchOptions): Promise<DispatchResult> {
        const { call, tool, input, scopes } = prepared
        const span = this.deps.tracer.startSpan('tool', call.name, { callId: call.id })

        let release: (() => void) | undefined
        try {
            release = await this.locks.acquire(scopes, options.signal)
            const ctx: ToolContext = {
                callId: call.id,
                workspaceRoot: this.deps.sandbox.root,
                signal: options.signal,
                onProgress: options.onProgress ?? (() => {}),
                fs: this.deps.fs,
                sandbox: this.deps.sandbox,
                supervisor: this.deps.supervisor,
                logger: this.deps.logger,
            }
            const output = await tool.execute(input, ctx)
            if (isToolOutput(output)) {
                return { content: output.content, isError: output.isError ?? false, errorCategory: output.isError ? 'execution' : undefined }
            }
            return { content: output, isError: false }
        } catch (error) {
            return this.toErrorResult(call, error)
        } finally {
            release?.()
            this.deps.tracer.endSpan(span)
        }
    }

    private defaultScopes(tool: AnyTool): ResourceScope[] {
        if (tool.riskClass === 'destructive') {
            return [{ key: `${WORKSPACE_SCOPE_PREFIX}${this.deps.sandbox.root}`, mode: 'write' }]
        }
        return []
    }

    private toErrorResult(call: ToolCall, error: unknown): DispatchResult {
        if (isAbortError(error)) {
            return errorResult('execution', `Tool '${call.name}' was cancelled`)
        }
        if (error instanceof CodeloomError) {
            this.deps.logger.debug({ tool: call.name, category: error.category, error: error.message }, 'tool:error')
            return errorResult(error.category, `${error.name}: ${error.message}`)
        }
        this.deps.logger.debug({ tool: call.name, error: errorMessage(error) }, 'tool:error')
        return errorResult('execution', `ExecutionError: Tool '${call.name}' failed: ${errorMessage(error)}`)
    }
}

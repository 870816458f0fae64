import path from 'node:path'
import type { ResolvedConfig } from '../config/schema.js'
import { SESSIONS_DIR } from '../config/defaults.js'
import type { Turn } from '../conversation/types.js'
import { TaskEngine } from '../engine/task-engine.js'
import { createModelClient } from '../llm/client.js'
import { buildSystemPrompt } from '../llm/prompt.js'
import type { ModelClient } from '../llm/types.js'
import { createLogger, type Logger } from '../logger/index.js'
import { type HostFactory, McpManager } from '../mcp/manager.js'
import { KnowledgeGraph } from '../memory/knowledge-graph.js'
import { JsonSessionStore, type SessionStore } from '../memory/session-store.js'
import { PermissionGate } from '../permissions/gate.js'
import { ProcessSupervisor } from '../process/supervisor.js'
import { SandboxManager } from '../security/sandbox.js'
import { ToolDispatcher } from '../tools/dispatcher.js'
import type { ToolRegistry } from '../tools/registry.js'
import { createToolRegistry, registerMcpTools } from '../tools/setup.js'
import { Tracer } from '../tracing/tracer.js'
import { errorMessage, FatalEngineError, toError } from './errors.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    tracer: Tracer
    fs: FileSystem
    sandbox: SandboxManager
    supervisor: ProcessSupervisor
    toolRegistry: ToolRegistry
    dispatcher: ToolDispatcher
    gate: PermissionGate
    model: ModelClient
    mcpManager: McpManager
    memory: KnowledgeGraph
    sessionStore: SessionStore
    /** Connects protocol hosts, merges their tools and seals the registry. */
    initialize(): Promise<void>
    createEngine(init?: { sessionId?: string; turns?: readonly Turn[] }): TaskEngine
    shutdown(): Promise<void>
}

/** Replaceable collaborators, for tests and embedding. */
export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
    model?: ModelClient
    hostFactory?: HostFactory
    sessionStore?: SessionStore
    fetch?: typeof fetch
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const tracer = new Tracer(logger)
    const fs = overrides.fs ?? new NodeFileSystem()
    const sandbox = new SandboxManager(config.workspace, config.sandbox.enabled, logger)
    const supervisor = new ProcessSupervisor(
        { killGraceMs: config.engine.killGraceMs, outputTailBytes: config.engine.outputTailBytes },
        logger,
        eventBus
    )
    eventBus.on('process:exit', ({ processId, state }) => {
        const snapshot = supervisor.get(processId)
        if (!snapshot) return
        tracer.record('process', snapshot.command, snapshot.startedAt, snapshot.endedAt ?? Date.now(), {
            processId,
            status: state.status,
        })
    })
    const mcpManager = new McpManager(config.mcp.servers, logger, overrides.hostFactory)
    const memory = new KnowledgeGraph(fs, path.resolve(config.workspace, config.memoryFile), logger)
    const toolRegistry = createToolRegistry({ config, memory, mcpManager, fetch: overrides.fetch })
    const dispatcher = new ToolDispatcher({ registry: toolRegistry, fs, sandbox, supervisor, logger, tracer })
    const gate = new PermissionGate(config.permissionMode, logger, eventBus)
    const model = overrides.model ?? createModelClient(config, logger, tracer)
    const sessionStore = overrides.sessionStore ?? new JsonSessionStore(fs, path.join(config.workspace, SESSIONS_DIR))

    let systemPrompt: string | null = null

    return {
        config,
        logger,
        eventBus,
        tracer,
        fs,
        sandbox,
        supervisor,
        toolRegistry,
        dispatcher,
        gate,
        model,
        mcpManager,
        memory,
        sessionStore,

        async initialize() {
            await mcpManager.initialize()
            registerMcpTools(toolRegistry, mcpManager, logger)

            const serverPrompts: Record<string, string> = {}
            for (const server of mcpManager.connected()) {
                if (server.systemPrompt) serverPrompts[server.host.name] = server.systemPrompt
            }
            systemPrompt = buildSystemPrompt({
                workspace: config.workspace,
                userInstructions: config.userInstructions,
                serverPrompts,
            })
            logger.debug({ tools: toolRegistry.listAll().length }, 'container:initialized')
        },

        createEngine(init) {
            if (systemPrompt === null) {
                throw new FatalEngineError('Container must be initialized before creating an engine')
            }
            return new TaskEngine(
                { model, registry: toolRegistry, dispatcher, gate, supervisor, fs, logger, tracer, eventBus, sessionStore },
                {
                    workspaceRoot: config.workspace,
                    maxStepsPerTask: config.engine.maxStepsPerTask,
                    model: config.model,
                    systemPrompt,
                },
                init
            )
        },

        async shutdown() {
            const errors: Error[] = []
            try {
                await supervisor.shutdown()
            } catch (e) {
                errors.push(toError(e))
            }
            try {
                await mcpManager.shutdown()
            } catch (e) {
                errors.push(toError(e))
            }
            eventBus.removeAll()
            if (errors.length > 0) {
                logger.warn({ errors: errors.map((e) => errorMessage(e)) }, 'Errors during shutdown')
            }
        },
    }
}

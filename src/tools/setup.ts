import type { ResolvedConfig } from '../config/schema.js'
import type { Logger } from '../logger/index.js'
import type { McpManager } from '../mcp/manager.js'
import { createAccessResourceTool, createMcpToolBridge } from '../mcp/tool-bridge.js'
import type { KnowledgeGraph } from '../memory/knowledge-graph.js'
import { listCodeDefinitionNamesTool } from './code/list-definitions.js'
import { askQuestionTool, attemptCompletionTool } from './control/control-tools.js'
import { listFilesTool } from './filesystem/list.js'
import { readFileTool } from './filesystem/read.js'
import { replaceInFileTool } from './filesystem/replace.js'
import { searchFilesTool } from './filesystem/search.js'
import { writeToFileTool } from './filesystem/write.js'
import { createMemoryTools } from './memory/memory-tools.js'
import { ToolRegistry } from './registry.js'
import { createExecuteCommandTool } from './shell/execute-command.js'
import { getCommandResultTool, sendCommandInputTool, terminateCommandTool } from './shell/process-tools.js'
import { createWebFetchTool } from './web/web-fetch.js'
import { createWebSearchTool } from './web/web-search.js'

export interface ToolSetupOptions {
    config: Pick<ResolvedConfig, 'engine' | 'webFetch' | 'webSearch'>
    memory: KnowledgeGraph
    mcpManager: McpManager
    fetch?: typeof fetch
}

/** Registers the static tool set. Remote tools are merged later by `registerMcpTools`. */
export function createToolRegistry(options: ToolSetupOptions): ToolRegistry {
    const { config } = options
    const registry = new ToolRegistry()

    registry.register(readFileTool)
    registry.register(listFilesTool)
    registry.register(searchFilesTool)
    registry.register(writeToFileTool)
    registry.register(replaceInFileTool)
    registry.register(listCodeDefinitionNamesTool)

    registry.register(createExecuteCommandTool({ inProgressThresholdMs: config.engine.inProgressThresholdMs }))
    registry.register(getCommandResultTool)
    registry.register(sendCommandInputTool)
    registry.register(terminateCommandTool)

    registry.register(createWebFetchTool({ ...config.webFetch, fetch: options.fetch }))
    if (config.webSearch) {
        registry.register(createWebSearchTool(config.webSearch, options.fetch))
    }

    for (const tool of createMemoryTools(options.memory)) {
        registry.register(tool)
    }

    registry.register(createAccessResourceTool(options.mcpManager))
    registry.register(attemptCompletionTool)
    registry.register(askQuestionTool)

    return registry
}

/** Merges every connected server's tools as `mcp__<server>__<tool>` and seals the registry. */
export function registerMcpTools(registry: ToolRegistry, mcpManager: McpManager, logger: Logger): void {
    for (const { host, tools } of mcpManager.connected()) {
        for (const info of tools) {
            registry.register(createMcpToolBridge(host, info))
        }
        logger.debug({ server: host.name, tools: tools.length }, 'mcp:tools-registered')
    }
    registry.seal()
}

import { zodToJsonSchema } from 'zod-to-json-schema'
import { FatalEngineError } from '../core/errors.js'
import type { AnyTool, ToolDefinition } from './types.js'

/**
 * Name-keyed table of tool descriptors. Filled once at startup; a duplicate name is a
 * startup invariant violation.
 */
export class ToolRegistry {
    private tools = new Map<string, AnyTool>()
    private definitionCache: ToolDefinition[] | null = null
    private sealed = false

    register(tool: AnyTool): void {
        if (this.sealed) {
            throw new FatalEngineError(`Cannot register '${tool.name}': registry is sealed`)
        }
        if (this.tools.has(tool.name)) {
            throw new FatalEngineError(`Duplicate tool registration: '${tool.name}'`)
        }
        this.tools.set(tool.name, tool)
        this.definitionCache = null
    }

    /** Freezes the tool set once every static and remote tool is merged. */
    seal(): void {
        this.sealed = true
    }

    get isSealed(): boolean {
        return this.sealed
    }

    get(name: string): AnyTool | undefined {
        return this.tools.get(name)
    }

    has(name: string): boolean {
        return this.tools.has(name)
    }

    getToolDefinitions(): ToolDefinition[] {
        if (this.definitionCache) return this.definitionCache

        this.definitionCache = this.listAll().map((tool) => ({
            type: 'function' as const,
            function: {
                name: tool.name,
                description: tool.description,
                parameters: tool.jsonSchema ?? schemaFor(tool),
            },
        }))
        return this.definitionCache
    }

    listAll(): AnyTool[] {
        return [...this.tools.values()]
    }
}

function schemaFor(tool: AnyTool): Record<string, unknown> {
    return zodToJsonSchema(tool.parameters, { target: 'openApi3' }) as Record<string, unknown>
}

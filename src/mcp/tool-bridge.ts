import {
    type CallToolResult,
    CallToolResultSchema,
    ReadResourceResultSchema,
} from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'
import type { ContentBlock } from '../conversation/types.js'
import { ExecutionError } from '../core/errors.js'
import type { Tool, ToolOutput } from '../tools/types.js'
import type { McpManager } from './manager.js'
import type { ProtocolHost, ProtocolRequest, RemoteToolInfo } from './types.js'

export const MCP_TOOL_PREFIX = 'mcp__'

export function namespacedToolName(server: string, tool: string): string {
    return `${MCP_TOOL_PREFIX}${server}__${tool}`
}

/** Sends a request and turns a host-level `{error}` into an ExecutionError. */
export async function requestOrThrow(host: ProtocolHost, request: ProtocolRequest, signal?: AbortSignal): Promise<unknown> {
    const response = await host.request(request, signal)
    if ('error' in response) {
        throw new ExecutionError(`MCP server '${host.name}' error ${response.error.code}: ${response.error.message}`, {
            code: response.error.code,
        })
    }
    return response.result
}

type CallToolContent = CallToolResult['content'][number]

function toContentBlock(item: CallToolContent): ContentBlock {
    switch (item.type) {
        case 'text':
            return { type: 'text', text: item.text }
        case 'image':
            return { type: 'image', data: item.data, mimeType: item.mimeType }
        case 'resource': {
            const resource = item.resource
            const text = 'text' in resource && typeof resource.text === 'string' ? resource.text : undefined
            return { type: 'resource', uri: resource.uri, text }
        }
        default:
            return { type: 'text', text: JSON.stringify(item) }
    }
}

export function createMcpToolBridge(host: ProtocolHost, info: RemoteToolInfo): Tool<Record<string, unknown>> {
    return {
        name: namespacedToolName(host.name, info.name),
        description: `[MCP:${host.name}] ${info.description}`,
        parameters: z.record(z.unknown()),
        jsonSchema: info.inputSchema,
        riskClass: 'network',
        async execute(input, ctx): Promise<ToolOutput> {
            const result = await requestOrThrow(
                host,
                { method: 'tools/call', params: { name: info.name, arguments: input } },
                ctx.signal
            )
            const parsed = CallToolResultSchema.safeParse(result)
            if (!parsed.success) {
                return { content: JSON.stringify(result) }
            }
            return { content: parsed.data.content.map(toContentBlock), isError: parsed.data.isError ?? false }
        },
    }
}

const AccessResourceInput = z.object({
    serverName: z.string().describe('Name of the MCP server providing the resource'),
    uri: z.string().describe('URI of the resource to read'),
})

type AccessResourceInput = z.infer<typeof AccessResourceInput>

export function createAccessResourceTool(manager: McpManager): Tool<AccessResourceInput> {
    return {
        name: 'access_mcp_resource',
        description: 'Read a resource (file, data, API response) exposed by a connected MCP server',
        parameters: AccessResourceInput,
        riskClass: 'network',
        async execute(input, ctx) {
            const host = manager.getHost(input.serverName)
            if (!host) throw new ExecutionError(`MCP server '${input.serverName}' is not connected`)

            const result = await requestOrThrow(host, { method: 'resources/read', params: { uri: input.uri } }, ctx.signal)
            const parsed = ReadResourceResultSchema.safeParse(result)
            if (!parsed.success) return JSON.stringify(result)

            return parsed.data.contents.map((item): ContentBlock => {
                return 'text' in item && typeof item.text === 'string'
                    ? { type: 'resource', uri: item.uri, text: item.text }
                    : { type: 'resource', uri: item.uri, text: `[binary ${item.mimeType ?? 'data'}]` }
            })
        },
    }
}

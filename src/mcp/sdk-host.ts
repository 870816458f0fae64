import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js'
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js'
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import { McpError } from '@modelcontextprotocol/sdk/types.js'
import type { McpServerConfig } from '../config/schema.js'
import { errorMessage, isAbortError, ValidationError } from '../core/errors.js'
import {
    INTERNAL_ERROR,
    METHOD_NOT_FOUND,
    type ProtocolHost,
    type ProtocolRequest,
    type ProtocolResponse,
    type RemoteToolInfo,
} from './types.js'

function resolveEnv(env?: Record<string, string>): Record<string, string> {
    if (!env) return {}
    const resolved: Record<string, string> = {}
    for (const [key, value] of Object.entries(env)) {
        resolved[key] = value.replace(/\$\{(\w+)\}/g, (_, name: string) => process.env[name] ?? '')
    }
    return resolved
}

function createTransport(name: string, config: McpServerConfig): Transport {
    if (config.url) {
        return new StreamableHTTPClientTransport(new URL(config.url))
    }
    if (!config.command) {
        throw new ValidationError(`MCP server '${name}' has neither command nor url`)
    }
    return new StdioClientTransport({
        command: config.command,
        args: config.args,
        env: { ...getDefaultEnvironment(), ...resolveEnv(config.env) },
        stderr: 'ignore',
    })
}

/** Protocol host backed by the MCP SDK client over stdio or streamable HTTP. */
export class SdkProtocolHost implements ProtocolHost {
    private client: Client | null = null

    constructor(
        readonly name: string,
        private config: McpServerConfig
    ) {}

    async initialize(): Promise<RemoteToolInfo[]> {
        const client = new Client({ name: 'codeloom', version: '0.1.0' })
        await client.connect(createTransport(this.name, this.config))
        this.client = client

        const { tools } = await client.listTools()
        return tools.map((t) => ({
            name: t.name,
            description: t.description ?? '',
            inputSchema: { ...t.inputSchema },
        }))
    }

    async request(request: ProtocolRequest, signal?: AbortSignal): Promise<ProtocolResponse> {
        const client = this.client
        if (!client) {
            return { error: { code: INTERNAL_ERROR, message: `MCP server '${this.name}' is not connected` } }
        }

        try {
            const params = request.params ?? {}
            switch (request.method) {
                case 'tools/call':
                    return {
                        result: await client.callTool(
                            { name: String(params.name), arguments: toArguments(params.arguments) },
                            undefined,
                            { signal }
                        ),
                    }
                case 'resources/read':
                    return { result: await client.readResource({ uri: String(params.uri) }, { signal }) }
                case 'resources/list':
                    return { result: await client.listResources(undefined, { signal }) }
                default:
                    return { error: { code: METHOD_NOT_FOUND, message: `Unsupported method '${request.method}'` } }
            }
        } catch (error) {
            if (isAbortError(error)) throw error
            if (error instanceof McpError) return { error: { code: error.code, message: error.message } }
            return { error: { code: INTERNAL_ERROR, message: errorMessage(error) } }
        }
    }

    async close(): Promise<void> {
        const client = this.client
        this.client = null
        await client?.close()
    }
}

function toArguments(value: unknown): Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return {}
    return Object.fromEntries(Object.entries(value))
}

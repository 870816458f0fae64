import type { McpServerConfig } from '../config/schema.js'
import { errorMessage, toError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { SdkProtocolHost } from './sdk-host.js'
import type { ProtocolHost, RemoteToolInfo, ServerStatus } from './types.js'

const MAX_RETRIES = 3
const RETRY_BASE_MS = 1000

export type HostFactory = (name: string, config: McpServerConfig) => ProtocolHost

interface ServerConnection {
    host: ProtocolHost
    status: ServerStatus
    tools: RemoteToolInfo[]
    systemPrompt?: string
}

export interface ConnectedServer {
    host: ProtocolHost
    tools: RemoteToolInfo[]
    systemPrompt?: string
}

const defaultFactory: HostFactory = (name, config) => new SdkProtocolHost(name, config)

export class McpManager {
    private connections = new Map<string, ServerConnection>()

    constructor(
        private configs: Record<string, McpServerConfig>,
        private logger: Logger,
        private createHost: HostFactory = defaultFactory,
        private retryBaseMs = RETRY_BASE_MS
    ) {}

    /** Connects every enabled server; a server that keeps failing is logged and left out. */
    async initialize(): Promise<void> {
        for (const [name, config] of Object.entries(this.configs)) {
            if (config.enabled === false) continue
            try {
                await this.connectServer(name, config)
            } catch (error) {
                this.logger.error(`MCP server '${name}' failed to connect: ${errorMessage(error)}`)
            }
        }
    }

    async connectServer(name: string, config: McpServerConfig): Promise<void> {
        let lastError: Error | null = null

        for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
            const host = this.createHost(name, config)
            this.connections.set(name, { host, status: 'connecting', tools: [] })
            try {
                const tools = await host.initialize()
                this.connections.set(name, { host, status: 'ready', tools, systemPrompt: config.systemPrompt })
                this.logger.info(`MCP server '${name}' connected with ${tools.length} tools`)
                return
            } catch (error) {
                lastError = toError(error)
                await host.close().catch((closeError: unknown) => {
                    this.logger.debug({ server: name, error: errorMessage(closeError) }, 'mcp:close-failed')
                })
                if (attempt < MAX_RETRIES - 1) {
                    await new Promise((r) => setTimeout(r, this.retryBaseMs * 2 ** attempt))
                }
            }
        }

        this.connections.set(name, { host: this.createHost(name, config), status: 'error', tools: [] })
        throw lastError ?? new Error(`Failed to connect to MCP server '${name}'`)
    }

    getHost(name: string): ProtocolHost | undefined {
        const conn = this.connections.get(name)
        return conn?.status === 'ready' ? conn.host : undefined
    }

    connected(): ConnectedServer[] {
        return [...this.connections.values()]
            .filter((conn) => conn.status === 'ready')
            .map(({ host, tools, systemPrompt }) => ({ host, tools, systemPrompt }))
    }

    getStatus(): Map<string, ServerStatus> {
        const statuses = new Map<string, ServerStatus>()
        for (const [name, conn] of this.connections) {
            statuses.set(name, conn.status)
        }
        return statuses
    }

    async shutdown(): Promise<void> {
        for (const [name, conn] of this.connections) {
            if (conn.status !== 'ready') continue
            try {
                await conn.host.close()
            } catch (error) {
                this.logger.debug({ server: name, error: errorMessage(error) }, 'mcp:close-failed')
            }
            conn.status = 'closed'
        }
        this.connections.clear()
    }
}

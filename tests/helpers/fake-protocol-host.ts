import type { ProtocolHost, ProtocolRequest, ProtocolResponse, RemoteToolInfo } from '../../src/mcp/types.js'

type Handler = (request: ProtocolRequest) => ProtocolResponse | Promise<ProtocolResponse>

/** In-process tool server answering requests from a handler. */
export class FakeProtocolHost implements ProtocolHost {
    readonly requests: ProtocolRequest[] = []
    closed = false
    initializeCalls = 0

    constructor(
        readonly name: string,
        private tools: RemoteToolInfo[],
        private handler: Handler = () => ({ error: { code: -32601, message: 'Method not found' } }),
        private failInitializations = 0
    ) {}

    async initialize(): Promise<RemoteToolInfo[]> {
        this.initializeCalls++
        if (this.initializeCalls <= this.failInitializations) {
            throw new Error(`${this.name} refused connection`)
        }
        return this.tools
    }

    async request(request: ProtocolRequest): Promise<ProtocolResponse> {
        this.requests.push(request)
        return this.handler(request)
    }

    async close(): Promise<void> {
        this.closed = true
    }
}

export interface ProtocolRequest {
    method: string
    params?: Record<string, unknown>
}

export interface ProtocolErrorBody {
    code: number
    message: string
}

export type ProtocolResponse = { result: unknown } | { error: ProtocolErrorBody }

export interface RemoteToolInfo {
    name: string
    description: string
    inputSchema: Record<string, unknown>
}

/**
 * An externally-hosted tool server. Everything the engine needs from it goes
 * through `request`; transport failures come back as `{error}` rather than throwing.
 */
export interface ProtocolHost {
    readonly name: string
    initialize(): Promise<RemoteToolInfo[]>
    request(request: ProtocolRequest, signal?: AbortSignal): Promise<ProtocolResponse>
    close(): Promise<void>
}

export type ServerStatus = 'connecting' | 'ready' | 'error' | 'closed'

/** JSON-RPC error codes used when the host itself cannot answer. */
export const METHOD_NOT_FOUND = -32601
export const INTERNAL_ERROR = -32603

import type { ToolDefinition } from '../tools/types.js'

export interface WireToolCall {
    id: string
    type: 'function'
    function: {
        name: string
        arguments: string
    }
}

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant' | 'tool'
    content: string | null
    tool_calls?: WireToolCall[]
    tool_call_id?: string
}

export interface ChatParams {
    model?: string
    messages: ChatMessage[]
    tools?: ToolDefinition[]
    temperature?: number
    maxTokens?: number
    signal?: AbortSignal
}

export type FinishReason = 'stop' | 'tool_calls' | 'length' | 'other'

export interface Usage {
    promptTokens: number
    completionTokens: number
}

/** One increment of a streamed model response. Tool-call fragments are keyed by `index`. */
export type StreamChunk =
    | { type: 'text'; delta: string }
    | { type: 'tool_call'; index: number; id?: string; name?: string; argumentsDelta?: string }
    | { type: 'finish'; reason: FinishReason; usage?: Usage }

export interface ModelClient {
    /** Streams one response. Failures surface as `TransportError`, aborts as an AbortError. */
    stream(params: ChatParams): AsyncIterable<StreamChunk>
}

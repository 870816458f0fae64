import type { ErrorCategory } from '../core/errors.js'

export interface ToolCall {
    id: string
    name: string
    arguments: Record<string, unknown>
    /** Raw argument text as streamed by the model, kept when it failed to parse. */
    rawArguments?: string
}

export type ContentBlock =
    | { type: 'text'; text: string }
    | { type: 'image'; data: string; mimeType: string }
    | { type: 'resource'; uri: string; text?: string }

export type ToolResultContent = string | ContentBlock[]

export interface UserMessage {
    role: 'user'
    content: string
    /** Workspace summary sent to the model after the message; never shown to the operator. */
    environment?: string
    timestamp: string
}

export interface AssistantMessage {
    role: 'assistant'
    text: string
    toolCalls: ToolCall[]
    timestamp: string
}

export interface ToolResult {
    role: 'tool'
    callId: string
    toolName: string
    content: ToolResultContent
    isError: boolean
    timestamp: string
}

export interface ErrorTurn {
    role: 'error'
    category: ErrorCategory
    message: string
    timestamp: string
}

export type Turn = UserMessage | AssistantMessage | ToolResult | ErrorTurn

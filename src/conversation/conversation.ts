import type { AssistantMessage, ContentBlock, ToolCall, ToolResult, ToolResultContent, Turn } from './types.js'

export class ConversationInvariantError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'ConversationInvariantError'
    }
}

function now(): string {
    return new Date().toISOString()
}

export function contentToText(content: ToolResultContent): string {
    if (typeof content === 'string') return content
    return content.map(blockToText).join('\n')
}

function blockToText(block: ContentBlock): string {
    switch (block.type) {
        case 'text':
            return block.text
        case 'image':
            return `[image ${block.mimeType}]`
        case 'resource':
            return block.text ?? `[resource ${block.uri}]`
    }
}

/**
 * Append-only turn log. Every tool result must answer exactly one earlier tool call,
 * and no user or assistant turn may be appended while a call is still unanswered.
 */
export class Conversation {
    private readonly log: Turn[] = []
    private readonly issued = new Map<string, ToolCall>()
    private readonly resolved = new Set<string>()

    get turns(): readonly Turn[] {
        return this.log
    }

    get length(): number {
        return this.log.length
    }

    appendUser(content: string, environment?: string): Turn {
        this.assertSettled('user message')
        return this.push({ role: 'user', content, environment, timestamp: now() })
    }

    appendAssistant(text: string, toolCalls: ToolCall[]): AssistantMessage {
        this.assertSettled('assistant message')
        const seen = new Set<string>()
        for (const call of toolCalls) {
            if (this.issued.has(call.id) || seen.has(call.id)) {
                throw new ConversationInvariantError(`Duplicate tool call id '${call.id}'`)
            }
            seen.add(call.id)
        }
        const frozen = toolCalls.map((call) => Object.freeze({ ...call, arguments: { ...call.arguments } }))
        for (const call of frozen) this.issued.set(call.id, call)
        const turn: AssistantMessage = { role: 'assistant', text, toolCalls: frozen, timestamp: now() }
        this.push(turn)
        return turn
    }

    appendToolResult(callId: string, content: ToolResultContent, isError: boolean): ToolResult {
        const call = this.issued.get(callId)
        if (!call) {
            throw new ConversationInvariantError(`Tool result references unknown call '${callId}'`)
        }
        if (this.resolved.has(callId)) {
            throw new ConversationInvariantError(`Tool call '${callId}' already has a result`)
        }
        this.resolved.add(callId)
        const turn: ToolResult = {
            role: 'tool',
            callId,
            toolName: call.name,
            content,
            isError,
            timestamp: now(),
        }
        this.push(turn)
        return turn
    }

    appendError(category: Extract<Turn, { role: 'error' }>['category'], message: string): Turn {
        return this.push({ role: 'error', category, message, timestamp: now() })
    }

    hasCall(callId: string): boolean {
        return this.issued.has(callId)
    }

    isResolved(callId: string): boolean {
        return this.resolved.has(callId)
    }

    /** Calls issued by the model that still lack a result, in issue order. */
    pendingCalls(): ToolCall[] {
        return [...this.issued.values()].filter((call) => !this.resolved.has(call.id))
    }

    lastAssistant(): AssistantMessage | undefined {
        for (let i = this.log.length - 1; i >= 0; i--) {
            const turn = this.log[i]
            if (turn?.role === 'assistant') return turn
        }
        return undefined
    }

    snapshot(): Turn[] {
        return structuredClone(this.log)
    }

    /** Rebuilds a conversation from persisted turns, re-checking every invariant on the way. */
    static fromTurns(turns: readonly Turn[]): Conversation {
        const conversation = new Conversation()
        for (const turn of turns) {
            conversation.replay(turn).timestamp = turn.timestamp
        }
        return conversation
    }

    private replay(turn: Turn): Turn {
        switch (turn.role) {
            case 'user':
                return this.appendUser(turn.content, turn.environment)
            case 'assistant':
                return this.appendAssistant(turn.text, turn.toolCalls)
            case 'tool':
                return this.appendToolResult(turn.callId, turn.content, turn.isError)
            case 'error':
                return this.appendError(turn.category, turn.message)
        }
    }

    private assertSettled(what: string): void {
        const pending = this.pendingCalls()
        if (pending.length > 0) {
            throw new ConversationInvariantError(
                `Cannot append ${what} while tool calls are unresolved: ${pending.map((c) => c.id).join(', ')}`
            )
        }
    }

    private push<T extends Turn>(turn: T): T {
        this.log.push(turn)
        return turn
    }
}

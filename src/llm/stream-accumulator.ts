import { randomUUID } from 'node:crypto'
import type { FinishReason, StreamChunk } from './types.js'

export type AccumulatorState = 'idle' | 'in_text' | 'in_tool_args'

export interface RawToolCall {
    id: string
    name: string
    /** Argument JSON exactly as streamed; parsing is left to the caller. */
    rawArguments: string
}

export type AccumulatorEvent =
    | { type: 'text'; delta: string; text: string }
    | { type: 'tool_call'; call: RawToolCall }

export interface AccumulatedResponse {
    text: string
    toolCalls: RawToolCall[]
    finishReason: FinishReason | null
}

interface OpenCall {
    index: number
    id?: string
    name: string
    args: string
}

/**
 * Folds streamed chunks into the assistant's text and complete tool calls.
 *
 * idle ─text→ in_text ─tool_call→ in_tool_args ─(new index | text | finish)→ idle, call emitted
 *
 * A tool call is complete once a fragment for a different index arrives or the
 * stream finishes; its argument text is never inspected here.
 */
export class StreamAccumulator {
    private current: AccumulatorState = 'idle'
    private text = ''
    private open: OpenCall | null = null
    private completed: RawToolCall[] = []
    private finishReason: FinishReason | null = null

    get state(): AccumulatorState {
        return this.current
    }

    push(chunk: StreamChunk): AccumulatorEvent[] {
        switch (chunk.type) {
            case 'text':
                return this.onText(chunk.delta)
            case 'tool_call':
                return this.onToolCall(chunk)
            case 'finish':
                this.finishReason = chunk.reason
                return this.closeCall()
        }
    }

    /** Closes any open call and returns the whole response. */
    finish(): { response: AccumulatedResponse; events: AccumulatorEvent[] } {
        const events = this.closeCall()
        this.current = 'idle'
        return {
            response: { text: this.text, toolCalls: [...this.completed], finishReason: this.finishReason },
            events,
        }
    }

    private onText(delta: string): AccumulatorEvent[] {
        if (delta === '') return []
        // text interleaved after tool calls is kept; it closes the open call
        const events = this.closeCall()
        this.current = 'in_text'
        this.text += delta
        events.push({ type: 'text', delta, text: this.text })
        return events
    }

    private onToolCall(chunk: Extract<StreamChunk, { type: 'tool_call' }>): AccumulatorEvent[] {
        const events = this.open && this.open.index !== chunk.index ? this.closeCall() : []

        if (!this.open) {
            this.open = { index: chunk.index, name: '', args: '' }
        }
        if (chunk.id) this.open.id = chunk.id
        if (chunk.name) this.open.name += chunk.name
        if (chunk.argumentsDelta) this.open.args += chunk.argumentsDelta

        this.current = 'in_tool_args'
        return events
    }

    private closeCall(): AccumulatorEvent[] {
        const open = this.open
        if (!open) return []
        this.open = null
        this.current = 'idle'
        const call: RawToolCall = { id: open.id ?? `call_${randomUUID()}`, name: open.name, rawArguments: open.args }
        this.completed.push(call)
        return [{ type: 'tool_call', call }]
    }
}

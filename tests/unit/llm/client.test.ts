import type OpenAI from 'openai'
import { describe, expect, it, vi } from 'vitest'
import { TransportError } from '../../../src/core/errors.js'
import { type CompletionRequest, createStreamingClient } from '../../../src/llm/client.js'
import { CircuitBreaker } from '../../../src/llm/retry.js'
import type { StreamChunk } from '../../../src/llm/types.js'
import { Tracer } from '../../../src/tracing/tracer.js'
import { testConfig } from '../../helpers/config.js'
import { silentLogger } from '../../helpers/logger.js'

const config = { ...testConfig('/tmp/codeloom-client'), retry: { maxRetries: 0, baseDelay: 1, maxDelay: 1 } }
const params = { messages: [{ role: 'user' as const, content: 'hi' }] }

function chunk(delta: OpenAI.ChatCompletionChunk.Choice.Delta, finishReason: 'stop' | null = null): OpenAI.ChatCompletionChunk {
    return {
        id: 'chunk',
        object: 'chat.completion.chunk',
        created: 0,
        model: 'test-model',
        choices: [{ index: 0, delta, finish_reason: finishReason }],
    }
}

async function* chunks(...items: OpenAI.ChatCompletionChunk[]): AsyncIterable<OpenAI.ChatCompletionChunk> {
    yield* items
}

async function drain(stream: AsyncIterable<StreamChunk>): Promise<StreamChunk[]> {
    const out: StreamChunk[] = []
    for await (const c of stream) out.push(c)
    return out
}

describe('createStreamingClient', () => {
    it('maps provider chunks to stream chunks', async () => {
        const complete = vi.fn<CompletionRequest>(async () =>
            chunks(
                chunk({ content: 'Hel' }),
                chunk({ tool_calls: [{ index: 0, id: 'call_1', function: { name: 'read_file', arguments: '{"pa' } }] }),
                chunk({ content: 'lo' }, 'stop')
            )
        )
        const logger = silentLogger()
        const client = createStreamingClient(config, logger, new Tracer(logger), complete)

        expect(await drain(client.stream(params))).toEqual([
            { type: 'text', delta: 'Hel' },
            { type: 'tool_call', index: 0, id: 'call_1', name: 'read_file', argumentsDelta: '{"pa' },
            { type: 'text', delta: 'lo' },
            { type: 'finish', reason: 'stop', usage: undefined },
        ])
        expect(complete.mock.calls[0]?.[0]).toMatchObject({ model: config.model, stream: true, messages: [{ role: 'user', content: 'hi' }] })
    })

    it('does not extend the cooldown while the breaker is open', async () => {
        let now = 0
        const breaker = new CircuitBreaker(2, 30_000, () => now)
        const complete = vi.fn<CompletionRequest>(async () => {
            throw new TransportError('Service Unavailable', { status: 503 })
        })
        const logger = silentLogger()
        const client = createStreamingClient(config, logger, new Tracer(logger), complete, breaker)

        await expect(drain(client.stream(params))).rejects.toThrow('Service Unavailable')
        await expect(drain(client.stream(params))).rejects.toThrow('Service Unavailable')
        expect(breaker.getState()).toBe('open')

        now = 20_000
        await expect(drain(client.stream(params))).rejects.toThrow(
            new TransportError('Model endpoint failed 2 times in a row; retry in 10s')
        )
        expect(complete).toHaveBeenCalledTimes(2)

        now = 30_000
        complete.mockResolvedValueOnce(chunks(chunk({ content: 'back' }, 'stop')))
        expect(await drain(client.stream(params))).toEqual([
            { type: 'text', delta: 'back' },
            { type: 'finish', reason: 'stop', usage: undefined },
        ])
        expect(complete).toHaveBeenCalledTimes(3)
        expect(breaker.getState()).toBe('closed')
    })
})

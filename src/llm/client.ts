import OpenAI from 'openai'
import type { ResolvedConfig } from '../config/schema.js'
import { errorMessage, isAbortError, TransportError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { Tracer } from '../tracing/tracer.js'
import { CircuitBreaker, withRetry } from './retry.js'
import type { ChatMessage, ChatParams, FinishReason, ModelClient, StreamChunk } from './types.js'

type ClientConfig = Pick<ResolvedConfig, 'apiKey' | 'baseURL' | 'model' | 'temperature' | 'maxTokens' | 'retry'>

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content ?? '' }
        case 'user':
            return { role: 'user', content: message.content ?? '' }
        case 'assistant':
            return {
                role: 'assistant',
                content: message.content,
                tool_calls: message.tool_calls?.length ? message.tool_calls : undefined,
            }
        case 'tool':
            return { role: 'tool', content: message.content ?? '', tool_call_id: message.tool_call_id ?? '' }
    }
}

function toFinishReason(reason: string): FinishReason {
    if (reason === 'stop' || reason === 'tool_calls' || reason === 'length') return reason
    return 'other'
}

/** Wraps provider failures in `TransportError`; aborts are passed through untouched. */
export function toTransportError(error: unknown, signal?: AbortSignal): unknown {
    if (signal?.aborted || isAbortError(error) || error instanceof OpenAI.APIUserAbortError) return error
    if (error instanceof TransportError) return error
    if (error instanceof OpenAI.APIError) {
        return new TransportError(error.message, { status: error.status, cause: error })
    }
    return new TransportError(errorMessage(error), { cause: error })
}

/** Opens one provider stream; the SDK call in production, a fake in tests. */
export type CompletionRequest = (
    request: OpenAI.ChatCompletionCreateParamsStreaming,
    signal?: AbortSignal
) => Promise<AsyncIterable<OpenAI.ChatCompletionChunk>>

export function createModelClient(config: ClientConfig, logger: Logger, tracer: Tracer): ModelClient {
    const openai = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        maxRetries: 0,
        defaultHeaders: { 'X-Title': 'codeloom' },
    })

    return createStreamingClient(config, logger, tracer, (request, signal) =>
        openai.chat.completions.create(request, { signal })
    )
}

/** Retry, circuit breaking and chunk mapping around any OpenAI-compatible stream. */
export function createStreamingClient(
    config: ClientConfig,
    logger: Logger,
    tracer: Tracer,
    complete: CompletionRequest,
    breaker = new CircuitBreaker()
): ModelClient {
    return {
        async *stream(params: ChatParams): AsyncIterable<StreamChunk> {
            const model = params.model ?? config.model
            // an open breaker rejects without counting as another failure
            breaker.check()
            const span = tracer.startSpan('model_call', 'chat', { model, messages: params.messages.length })

            try {
                const stream = await withRetry(
                    async () => {
                        try {
                            return await complete(
                                {
                                    model,
                                    messages: params.messages.map(toOpenAIMessage),
                                    tools: params.tools?.length ? params.tools : undefined,
                                    temperature: params.temperature ?? config.temperature,
                                    max_tokens: params.maxTokens ?? config.maxTokens,
                                    stream: true,
                                },
                                params.signal
                            )
                        } catch (error) {
                            throw toTransportError(error, params.signal)
                        }
                    },
                    config.retry,
                    params.signal
                )

                for await (const chunk of stream) {
                    const choice = chunk.choices[0]
                    if (!choice) continue

                    if (choice.delta.content) {
                        yield { type: 'text', delta: choice.delta.content }
                    }
                    for (const tc of choice.delta.tool_calls ?? []) {
                        yield {
                            type: 'tool_call',
                            index: tc.index,
                            id: tc.id,
                            name: tc.function?.name,
                            argumentsDelta: tc.function?.arguments,
                        }
                    }
                    if (choice.finish_reason) {
                        const usage = chunk.usage
                            ? { promptTokens: chunk.usage.prompt_tokens, completionTokens: chunk.usage.completion_tokens }
                            : undefined
                        logger.debug({ model, finishReason: choice.finish_reason, usage }, 'model:finish')
                        yield { type: 'finish', reason: toFinishReason(choice.finish_reason), usage }
                    }
                }
                breaker.onSuccess()
            } catch (error) {
                const wrapped = toTransportError(error, params.signal)
                if (wrapped instanceof TransportError) breaker.onFailure()
                throw wrapped
            } finally {
                tracer.endSpan(span)
            }
        },
    }
}

import { gfm } from '@truto/turndown-plugin-gfm'
import TurndownService from 'turndown'
import { z } from 'zod'
import { TransportError } from '../../core/errors.js'
import type { Tool } from '../types.js'

const turndown = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
})
turndown.use(gfm)
turndown.remove(['script', 'style', 'nav', 'footer', 'header', 'aside', 'iframe', 'noscript'])

export function htmlToMarkdown(html: string): string {
    return turndown.turndown(html)
}

export const CACHE_TTL = 15 * 60 * 1000
export const MAX_CACHE_SIZE = 100

export class FetchCache {
    private entries = new Map<string, { content: string; timestamp: number }>()

    constructor(
        private ttl = CACHE_TTL,
        private maxSize = MAX_CACHE_SIZE
    ) {}

    get size(): number {
        return this.entries.size
    }

    get(url: string): string | null {
        const entry = this.entries.get(url)
        if (!entry) return null
        if (Date.now() - entry.timestamp > this.ttl) {
            this.entries.delete(url)
            return null
        }
        return entry.content
    }

    set(url: string, content: string): void {
        const now = Date.now()
        if (this.entries.size >= this.maxSize) {
            for (const [key, entry] of this.entries) {
                if (now - entry.timestamp > this.ttl) this.entries.delete(key)
            }
        }
        if (this.entries.size >= this.maxSize) {
            const oldest = this.entries.keys().next().value
            if (oldest !== undefined) this.entries.delete(oldest)
        }
        this.entries.set(url, { content, timestamp: now })
    }
}

const WebFetchInput = z.object({
    url: z.string().url().describe('URL to fetch'),
    maxLength: z.number().int().positive().optional().describe('Max response length in chars'),
    raw: z.boolean().optional().describe('Return raw HTML without markdown conversion (default: false)'),
})

type WebFetchInput = z.infer<typeof WebFetchInput>

export interface WebFetchOptions {
    maxLength: number
    timeoutMs: number
    fetch?: typeof fetch
    cache?: FetchCache
}

export function createWebFetchTool(options: WebFetchOptions): Tool<WebFetchInput> {
    const fetchImpl = options.fetch ?? fetch
    const cache = options.cache ?? new FetchCache()

    return {
        name: 'web_fetch',
        description: 'Fetch content from a URL and convert HTML to Markdown',
        parameters: WebFetchInput,
        riskClass: 'network',
        async execute(input, ctx) {
            const cached = cache.get(input.url)
            if (cached !== null) return cached

            const response = await fetchImpl(input.url, {
                headers: { 'User-Agent': 'codeloom/0.1 (coding agent)' },
                signal: AbortSignal.any([ctx.signal, AbortSignal.timeout(options.timeoutMs)]),
            })

            if (!response.ok) {
                throw new TransportError(`HTTP ${response.status}: ${response.statusText}`, {
                    status: response.status,
                })
            }

            const contentType = response.headers.get('content-type') ?? ''
            let text = await response.text()

            if (!input.raw && contentType.includes('text/html')) {
                text = htmlToMarkdown(text)
            }

            const maxLen = input.maxLength ?? options.maxLength
            if (text.length > maxLen) {
                text = `${text.slice(0, maxLen)}\n\n[Content truncated at ${maxLen} chars]`
            }

            cache.set(input.url, text)
            return text
        },
    }
}

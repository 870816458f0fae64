import { z } from 'zod'
import type { WebSearchConfig } from '../../config/schema.js'
import { TransportError } from '../../core/errors.js'
import type { Tool } from '../types.js'
import { htmlToMarkdown } from './web-fetch.js'

export interface SearchHit {
    title: string
    url: string
    description: string
}

const BraveResponse = z.object({
    web: z
        .object({
            results: z.array(z.object({ title: z.string(), url: z.string(), description: z.string().optional() })),
        })
        .optional(),
})

const SearxResponse = z.object({
    results: z.array(z.object({ title: z.string(), url: z.string(), content: z.string().optional() })),
})

async function getJSON(fetchImpl: typeof fetch, url: URL, init: RequestInit): Promise<unknown> {
    const response = await fetchImpl(url, init)
    if (!response.ok) {
        throw new TransportError(`Search provider returned HTTP ${response.status}`, { status: response.status })
    }
    return response.json()
}

export async function searchBrave(
    config: { apiKey: string },
    query: string,
    count: number,
    signal: AbortSignal,
    fetchImpl: typeof fetch = fetch
): Promise<SearchHit[]> {
    const url = new URL('https://api.search.brave.com/res/v1/web/search')
    url.searchParams.set('q', query)
    url.searchParams.set('count', String(count))
    const body = BraveResponse.parse(
        await getJSON(fetchImpl, url, {
            headers: { Accept: 'application/json', 'X-Subscription-Token': config.apiKey },
            signal,
        })
    )
    return (body.web?.results ?? []).map((r) => ({
        title: r.title,
        url: r.url,
        description: htmlToMarkdown(r.description ?? ''),
    }))
}

export async function searchSearx(
    config: { url: string },
    query: string,
    count: number,
    signal: AbortSignal,
    fetchImpl: typeof fetch = fetch
): Promise<SearchHit[]> {
    const url = new URL('/search', config.url)
    url.searchParams.set('q', query)
    url.searchParams.set('format', 'json')
    const body = SearxResponse.parse(await getJSON(fetchImpl, url, { headers: { Accept: 'application/json' }, signal }))
    return body.results.slice(0, count).map((r) => ({ title: r.title, url: r.url, description: r.content ?? '' }))
}

export function formatHits(query: string, hits: SearchHit[]): string {
    if (hits.length === 0) return `No results for "${query}".`
    return hits.map((hit, i) => `${i + 1}. ${hit.title}\n   ${hit.url}\n   ${hit.description}`.trimEnd()).join('\n\n')
}

const WebSearchInput = z.object({
    query: z.string().min(1).describe('Search query'),
    maxResults: z.number().int().positive().max(20).optional().describe('Max results (default: 5)'),
})

type WebSearchInput = z.infer<typeof WebSearchInput>

export function createWebSearchTool(config: WebSearchConfig, fetchImpl: typeof fetch = fetch): Tool<WebSearchInput> {
    return {
        name: 'web_search',
        description: 'Search the web and return titles, URLs and snippets',
        parameters: WebSearchInput,
        riskClass: 'network',
        async execute(input, ctx) {
            const count = input.maxResults ?? 5
            const hits =
                config.type === 'brave'
                    ? await searchBrave(config, input.query, count, ctx.signal, fetchImpl)
                    : await searchSearx(config, input.query, count, ctx.signal, fetchImpl)
            return formatHits(input.query, hits)
        },
    }
}

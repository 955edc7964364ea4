import axios from 'axios'
import { z } from 'zod'
import { defineTool, type ToolDefinition } from '../../types'

export interface SearchHit {
    title: string
    link: string
    snippet: string
}

const SerpApiResponse = z.object({
    organic_results: z.array(z.object({
        title: z.string().default(''),
        link: z.string().default(''),
        snippet: z.string().default(''),
    }).passthrough()).default([]),
}).passthrough()

interface DuckTopic {
    Text?: string
    FirstURL?: string
    Topics?: DuckTopic[]
}

const DuckTopicSchema: z.ZodType<DuckTopic> = z.lazy(() => z.object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
    Topics: z.array(DuckTopicSchema).optional(),
}))

const DuckResponse = z.object({
    AbstractText: z.string().optional(),
    Abstract: z.string().optional(),
    AbstractURL: z.string().optional(),
    AbstractSource: z.string().optional(),
    RelatedTopics: z.array(DuckTopicSchema).optional(),
}).passthrough()

const USER_AGENT = 'Tessera-Agent/0.1'

export function formatSearchResults(items: SearchHit[], limit: number): string {
    const lines = items.slice(0, limit).map((it, i) => {
        const title = it.title || '(no title)'
        return it.link
            ? `${i + 1}. ${title}\n   ${it.link}\n   ${it.snippet}`
            : `${i + 1}. ${title}\n   ${it.snippet}`
    })
    return lines.length > 0 ? lines.join('\n') : 'No results.'
}

async function searchSerpApi(query: string, limit: number, apiKey: string): Promise<SearchHit[]> {
    const { data } = await axios.get('https://serpapi.com/search.json', {
        timeout: 20_000,
        headers: { 'User-Agent': USER_AGENT },
        params: { engine: 'google', q: query, num: Math.max(1, Math.min(limit, 10)), api_key: apiKey },
    })
    return SerpApiResponse.parse(data).organic_results
        .slice(0, limit)
        .map(r => ({ title: r.title, link: r.link, snippet: r.snippet }))
}

// DuckDuckGo Instant Answer: limited coverage, but needs no key
async function searchDuckDuckGo(query: string): Promise<SearchHit[]> {
    const { data } = await axios.get('https://api.duckduckgo.com/', {
        timeout: 20_000,
        headers: { 'User-Agent': USER_AGENT },
        params: { q: query, format: 'json', no_html: '1', no_redirect: '1' },
    })
    const parsed = DuckResponse.parse(data)
    const items: SearchHit[] = []

    const abstract = parsed.AbstractText || parsed.Abstract || ''
    if (abstract) {
        items.push({ title: 'Summary', snippet: abstract, link: parsed.AbstractURL || '' })
    }

    const collect = (topics: DuckTopic[]) => {
        for (const t of topics) {
            if (t.Topics) {
                collect(t.Topics)   // nested groups
                continue
            }
            const text = t.Text ?? ''
            const url = t.FirstURL ?? ''
            if (text || url) items.push({ title: text, link: url, snippet: '' })
        }
    }
    collect(parsed.RelatedTopics ?? [])

    return items
}

export function createWebSearchTool(options: { serpApiKey?: string } = {}): ToolDefinition {
    return defineTool({
        name: 'web_search',
        description: 'Search the web for current information, news, research, and facts.',
        category: 'research',
        inputSchema: z.object({
            query: z.string().min(1).describe('Search query'),
            limit: z.number().int().positive().default(5).describe('Max results to return (default: 5)'),
        }).strict(),

        async execute({ query, limit }) {
            const items = options.serpApiKey
                ? await searchSerpApi(query, limit, options.serpApiKey)
                : await searchDuckDuckGo(query)
            return formatSearchResults(items, limit)
        },
    })
}

import axios from 'axios'
import { z } from 'zod'
import { defineTool } from '../../types'

// Any scheme, as long as there is a host
function assertAbsoluteUrl(raw: string): URL {
    let parsed: URL
    try {
        parsed = new URL(raw)
    } catch {
        throw new Error('Invalid URL')
    }
    if (!parsed.protocol || !parsed.host) throw new Error('Invalid URL')
    return parsed
}

function assertHttpUrl(raw: string): URL {
    const parsed = assertAbsoluteUrl(raw)
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new Error(`Unsupported URL scheme: ${parsed.protocol}`)
    }
    return parsed
}

// Validates and echoes the URL without touching the network
export const openUrlTool = defineTool({
    name: 'open_url',
    description: 'Validate a URL and return it so the user can open it.',
    category: 'research',
    inputSchema: z.object({
        url: z.string().describe('Absolute URL including scheme'),
    }).strict(),

    execute({ url }) {
        assertAbsoluteUrl(url)
        return url
    },
})

export const fetchUrlTool = defineTool({
    name: 'fetch_url',
    description: 'Fetch the text content of a webpage or API endpoint.',
    category: 'research',
    inputSchema: z.object({
        url: z.string().describe('URL to fetch'),
        max_chars: z.number().int().positive().default(3000).describe('Max characters to return (default: 3000)'),
    }).strict(),

    async execute({ url, max_chars }) {
        assertHttpUrl(url)
        const { data, headers } = await axios.get<unknown>(url, {
            timeout: 10_000,
            headers: { 'User-Agent': 'Tessera-Agent/0.1 (AI assistant)' },
            maxContentLength: 500_000,
        })

        let text: string
        const contentType = String(headers['content-type'] ?? '')

        if (contentType.includes('json')) {
            text = JSON.stringify(data, null, 2)
        } else if (typeof data === 'string') {
            // Strip HTML tags
            text = data
                .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
                .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
                .replace(/<[^>]+>/g, ' ')
                .replace(/\s{2,}/g, ' ')
                .trim()
        } else {
            text = String(data)
        }

        return {
            url,
            content: text.slice(0, max_chars),
            truncated: text.length > max_chars,
            content_type: contentType,
        }
    },
})

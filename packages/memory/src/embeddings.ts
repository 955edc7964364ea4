import OpenAI from 'openai'
import { ConfigurationError } from '@tessera/shared'

/** Converts text to fixed-dimension vectors, one per input, same order. */
export interface Embedder {
    embed(texts: string[]): Promise<number[][]>
}

export interface OpenAIEmbedderOptions {
    apiKey?: string
    baseURL?: string
    model?: string      // default text-embedding-3-small
    dimensions?: number // v3 models can shorten their output to match the memory
    timeoutMs?: number
}

export class OpenAIEmbedder implements Embedder {
    private readonly client: OpenAI
    private readonly model: string
    private readonly dimensions?: number
    // Cache embeddings for identical strings within a process lifetime
    private readonly cache = new Map<string, number[]>()

    constructor(options: OpenAIEmbedderOptions = {}) {
        const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY
        if (!apiKey) throw new ConfigurationError('OpenAI API key not provided. Set OPENAI_API_KEY or pass apiKey.')

        this.client = new OpenAI({ apiKey, baseURL: options.baseURL, timeout: options.timeoutMs ?? 60_000 })
        this.model = options.model ?? 'text-embedding-3-small'
        this.dimensions = options.dimensions
    }

    async embed(texts: string[]): Promise<number[][]> {
        const missing = [...new Set(texts.filter(t => !this.cache.has(t)))]

        if (missing.length > 0) {
            const response = await this.client.embeddings.create({
                model: this.model,
                input: missing.map(t => t.slice(0, 8000)),   // max safe input
                ...(this.dimensions ? { dimensions: this.dimensions } : {}),
            })
            // The API returns one item per input, tagged with its position
            for (const item of response.data) {
                const source = missing[item.index]
                if (source !== undefined) this.cache.set(source, item.embedding)
            }
        }

        return texts.map(t => {
            const vector = this.cache.get(t)
            if (!vector) throw new Error(`Embedding missing for input: ${t.slice(0, 40)}`)
            return vector
        })
    }
}


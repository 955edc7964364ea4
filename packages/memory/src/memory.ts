import { DimensionMismatchError, NotConfiguredError } from '@tessera/shared'
import type { Embedder } from './embeddings'
import { InMemoryVectorStore, type VectorStore } from './vector-store'
import type { MemoryMetadata, MemoryRecord, SearchResult } from './types'

export interface RetrievalMemoryOptions {
    store?: VectorStore
    embedder?: Embedder
    dim?: number   // ignored when a store is given; the store's dim wins
}

/** High-level memory built on an embedder and a vector store. */
export class RetrievalMemory {
    private readonly vectors: VectorStore
    readonly dim: number
    private embedder?: Embedder

    constructor(options: RetrievalMemoryOptions = {}) {
        this.vectors = options.store ?? new InMemoryVectorStore(options.dim ?? 768)
        this.dim = this.vectors.dim
        this.embedder = options.embedder
    }

    get size(): number {
        return this.vectors.size
    }

    hasEmbedder(): boolean {
        return this.embedder !== undefined
    }

    setEmbedder(embedder: Embedder): void {
        this.embedder = embedder
    }

    // `text` is kept as the record's document for later recall
    store(text: string, embedding: number[], metadata: MemoryMetadata = {}): string {
        if (embedding.length !== this.dim) throw new DimensionMismatchError(this.dim, embedding.length)
        return this.vectors.add(embedding, metadata, text)
    }

    async storeText(text: string, metadata: MemoryMetadata = {}): Promise<string> {
        const [vector] = await this.requireEmbedder().embed([text])
        if (!vector) throw new Error('Embedder returned no vector')
        return this.store(text, vector, metadata)
    }

    async retrieve(query: string, topK = 5): Promise<SearchResult[]> {
        const [vector] = await this.requireEmbedder().embed([query])
        if (!vector) throw new Error('Embedder returned no vector')
        return this.vectors.search(vector, topK)
    }

    get(id: string): MemoryRecord | undefined {
        return this.vectors.get(id)
    }

    delete(id: string): boolean {
        return this.vectors.delete(id)
    }

    private requireEmbedder(): Embedder {
        if (!this.embedder) throw new NotConfiguredError('Embeddings provider not configured for memory')
        return this.embedder
    }
}

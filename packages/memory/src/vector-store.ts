import { DimensionMismatchError } from '@tessera/shared'
import type { MemoryMetadata, MemoryRecord, SearchResult } from './types'

/** Adds and searches vectors with metadata. Swappable behind RetrievalMemory. */
export interface VectorStore {
    readonly dim: number
    readonly size: number
    add(vector: number[], metadata: MemoryMetadata, text: string): string
    search(queryVector: number[], topK: number): SearchResult[]
    get(id: string): MemoryRecord | undefined
    delete(id: string): boolean
}

// Cosine similarity; a zero-norm vector (or any non-finite result) counts as 0
export function cosineSimilarity(a: number[], b: number[]): number {
    let dot = 0
    let normA = 0
    let normB = 0
    for (let i = 0; i < a.length; i++) {
        const x = a[i] ?? 0
        const y = b[i] ?? 0
        dot += x * y
        normA += x * x
        normB += y * y
    }
    if (normA === 0 || normB === 0) return 0
    const sim = dot / (Math.sqrt(normA) * Math.sqrt(normB))
    return Number.isFinite(sim) ? sim : 0
}

/**
 * Exact, in-process vector store. Search is a linear scan: agent memory stays
 * small, so there is no index.
 */
export class InMemoryVectorStore implements VectorStore {
    // Map keeps insertion order, which is the tie-break for equal similarity
    private readonly records = new Map<string, MemoryRecord>()
    private seq = 0

    constructor(readonly dim: number = 768) {}

    get size(): number {
        return this.records.size
    }

    add(vector: number[], metadata: MemoryMetadata, text: string): string {
        if (vector.length !== this.dim) throw new DimensionMismatchError(this.dim, vector.length)

        const id = `vec_${++this.seq}`
        this.records.set(id, { id, vector: [...vector], metadata: { ...metadata }, text })
        return id
    }

    search(queryVector: number[], topK: number): SearchResult[] {
        if (queryVector.length !== this.dim) throw new DimensionMismatchError(this.dim, queryVector.length)
        if (topK <= 0) return []

        const scored = [...this.records.values()].map(record => ({
            record,
            similarity: cosineSimilarity(queryVector, record.vector),
        }))

        // Array.prototype.sort is stable, so ties keep insertion order
        scored.sort((a, b) => b.similarity - a.similarity)

        return scored.slice(0, topK).map(({ record, similarity }) => ({
            id: record.id,
            similarity,
            metadata: { ...record.metadata },
            text: record.text,
        }))
    }

    // Copies: stored records never change after add
    get(id: string): MemoryRecord | undefined {
        const record = this.records.get(id)
        if (!record) return undefined
        return { ...record, vector: [...record.vector], metadata: { ...record.metadata } }
    }

    delete(id: string): boolean {
        return this.records.delete(id)
    }
}

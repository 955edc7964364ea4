export type MemoryMetadata = Record<string, unknown>

export interface MemoryRecord {
    id: string
    vector: number[]
    metadata: MemoryMetadata
    text: string
}

export interface SearchResult {
    id: string
    similarity: number
    metadata: MemoryMetadata
    text: string
}

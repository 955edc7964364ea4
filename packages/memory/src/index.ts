// Everything the rest of the system needs — single import point
export { RetrievalMemory } from './memory'
export type { RetrievalMemoryOptions } from './memory'
export { OpenAIEmbedder } from './embeddings'
export type { Embedder, OpenAIEmbedderOptions } from './embeddings'
export { InMemoryVectorStore, cosineSimilarity } from './vector-store'
export type { VectorStore } from './vector-store'
export { buildMemoryBlock, MEMORY_BLOCK_HEADER } from './context-builder'
export type { MemoryMetadata, MemoryRecord, SearchResult } from './types'

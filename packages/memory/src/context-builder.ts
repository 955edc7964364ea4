import type { SearchResult } from './types'

export const MEMORY_BLOCK_HEADER = 'Relevant memory items (most similar first):'

// Returns the system-message body for retrieved memory, or null when no snippet has text
export function buildMemoryBlock(results: SearchResult[]): string | null {
    const lines = results
        .map(r => r.text)
        .filter(text => text.length > 0)
        .map(text => `- ${text}`)

    if (lines.length === 0) return null
    return `${MEMORY_BLOCK_HEADER}\n${lines.join('\n')}`
}

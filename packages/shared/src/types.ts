export type ChatRole = 'system' | 'user' | 'assistant' | 'tool'

export interface ChatMessage {
    role: ChatRole
    content: string
    name?: string
}

export interface GenerationOptions {
    temperature?: number
    maxTokens?: number
    timeoutMs?: number
    providerOptions?: Record<string, unknown>   // passed through to the provider, which validates it
}

export interface GenerateResult {
    text: string
    raw: unknown
}

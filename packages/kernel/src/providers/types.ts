import type { ChatMessage, GenerateResult, GenerationOptions } from '@tessera/shared'

/** A chat model behind a vendor SDK. Implementations validate their own providerOptions. */
export interface LLMProvider {
    readonly model: string
    generate(messages: ChatMessage[], options?: GenerationOptions): Promise<GenerateResult>
}

export interface ProviderConfig {
    model: string
    apiKey?: string
    baseURL?: string
    timeoutMs?: number
}

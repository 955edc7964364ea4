import { ConfigurationError, type ChatMessage, type GenerateResult, type GenerationOptions } from '@tessera/shared'
import { GROQ_BASE_URL, OpenAIChatProvider } from './providers/openai-chat'
import type { LLMProvider, ProviderConfig } from './providers/types'

// Keys fall back to the provider's own environment variable
export function buildProvider(kind: string, config: ProviderConfig): LLMProvider {
    switch (kind.toLowerCase()) {
        case 'openai':
        case 'openai-chat':
            return new OpenAIChatProvider({ ...config, apiKey: config.apiKey ?? process.env.OPENAI_API_KEY })
        case 'groq':
            return new OpenAIChatProvider({
                ...config,
                apiKey: config.apiKey ?? process.env.GROQ_API_KEY,
                baseURL: config.baseURL ?? GROQ_BASE_URL,
            })
        default:
            throw new ConfigurationError(`Unsupported provider: ${kind}`)
    }
}

/** Named chat models; generation goes to whichever one is active. */
export class LLMManager {
    private readonly models = new Map<string, LLMProvider>()
    private active: string | null = null

    get activeModel(): string | null {
        return this.active
    }

    // The first model loaded becomes active
    loadModel(name: string, provider: LLMProvider): void {
        this.models.set(name, provider)
        if (this.active === null) this.active = name
    }

    unloadModel(name: string): boolean {
        if (!this.models.delete(name)) return false
        if (this.active === name) this.active = null
        return true
    }

    setActiveModel(name: string): boolean {
        if (!this.models.has(name)) return false
        this.active = name
        return true
    }

    listModels(): string[] {
        return [...this.models.keys()]
    }

    async generate(messages: ChatMessage[], options: GenerationOptions = {}): Promise<GenerateResult> {
        const provider = this.active === null ? undefined : this.models.get(this.active)
        if (!provider) throw new ConfigurationError('No active model configured in LLMManager.')
        return provider.generate(messages, options)
    }
}

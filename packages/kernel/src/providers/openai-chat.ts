import OpenAI from 'openai'
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions'
import { z } from 'zod'
import { ConfigurationError, type ChatMessage, type GenerateResult, type GenerationOptions } from '@tessera/shared'
import type { LLMProvider, ProviderConfig } from './types'

// Groq is OpenAI-compatible — just a different baseURL
export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1'

const DEFAULT_TIMEOUT_MS = 60_000

// The subset of chat.completions parameters callers may pass through
const ProviderOptionsSchema = z.object({
    top_p: z.number().min(0).max(1).optional(),
    stop: z.union([z.string(), z.array(z.string()).max(4)]).optional(),
    presence_penalty: z.number().min(-2).max(2).optional(),
    frequency_penalty: z.number().min(-2).max(2).optional(),
    seed: z.number().int().optional(),
    user: z.string().optional(),
    response_format: z.union([
        z.object({ type: z.literal('text') }),
        z.object({ type: z.literal('json_object') }),
    ]).optional(),
}).strict()

export type ProviderOptions = z.infer<typeof ProviderOptionsSchema>

export function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content }
        case 'assistant':
            return { role: 'assistant', content: message.content }
        case 'tool':
            // No tool_call_id to pair with, so tool output goes back as user text
            return { role: 'user', content: `Tool result (${message.name ?? 'tool'}):\n${message.content}` }
        case 'user':
            return { role: 'user', content: message.content }
    }
}

function parseProviderOptions(raw: Record<string, unknown> | undefined): ProviderOptions {
    const parsed = ProviderOptionsSchema.safeParse(raw ?? {})
    if (!parsed.success) {
        const problems = parsed.error.issues.map(i =>
            i.code === 'unrecognized_keys' ? `unsupported option(s) ${i.keys.join(', ')}` : `${i.path.join('.')}: ${i.message}`
        )
        throw new ConfigurationError(`Invalid provider options: ${problems.join('; ')}`)
    }
    return parsed.data
}

export class OpenAIChatProvider implements LLMProvider {
    readonly model: string
    private readonly client: OpenAI
    private readonly timeoutMs: number

    constructor(config: ProviderConfig) {
        const apiKey = config.apiKey
        if (!apiKey) throw new ConfigurationError(`API key not provided for model ${config.model}. Set OPENAI_API_KEY or GROQ_API_KEY to match LLM_PROVIDER.`)

        this.model = config.model
        this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS
        this.client = new OpenAI({ apiKey, baseURL: config.baseURL })
    }

    async generate(messages: ChatMessage[], options: GenerationOptions = {}): Promise<GenerateResult> {
        const extra = parseProviderOptions(options.providerOptions)

        const response = await this.client.chat.completions.create(
            {
                model: this.model,
                messages: messages.map(toOpenAIMessage),
                temperature: options.temperature ?? 0.7,
                ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
                ...extra,
            },
            { timeout: options.timeoutMs ?? this.timeoutMs },
        )

        return { text: response.choices[0]?.message?.content ?? '', raw: response }
    }
}

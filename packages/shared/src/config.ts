import { z } from 'zod'
import { ConfigurationError } from './errors'

const optionalString = z
    .string()
    .optional()
    .transform(v => (v === undefined || v.trim() === '' || v === 'undefined' ? undefined : v.trim()))

export const SettingsSchema = z.object({
    APP_NAME: z.string().default('Tessera'),
    LLM_PROVIDER: z.enum(['openai', 'groq']).default('openai'),
    DEFAULT_LLM_MODEL: z.string().default('gpt-4o-mini'),
    OPENAI_API_KEY: optionalString,
    OPENAI_BASE_URL: optionalString,
    GROQ_API_KEY: optionalString,
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    VECTOR_DIM: z.coerce.number().int().positive().default(1536),
    MEMORY_TOP_K: z.coerce.number().int().min(0).default(3),
    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_KEY: optionalString,
    SERPAPI_API_KEY: optionalString,
    DATA_DIR: z.string().default('./data'),
})

export type Settings = z.infer<typeof SettingsSchema>

export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
    const parsed = SettingsSchema.safeParse(env)
    if (!parsed.success) {
        const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
        console.error(`[config] Invalid settings: ${problems.join('; ')}`)
        throw new ConfigurationError(`Invalid settings: ${problems.join('; ')}`)
    }
    return parsed.data
}

// The API key the chat provider needs, given the selected provider
export function resolveLlmApiKey(settings: Settings): string | undefined {
    return settings.LLM_PROVIDER === 'groq' ? settings.GROQ_API_KEY : settings.OPENAI_API_KEY
}

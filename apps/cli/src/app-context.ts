import path from 'path'
import { AgentManager } from '@tessera/agents'
import { SupabaseEventStore, getSupabase, hasSupabaseCredentials, type EventStore } from '@tessera/db'
import { Kernel, type LLMProvider } from '@tessera/kernel'
import { OpenAIEmbedder, RetrievalMemory, type Embedder } from '@tessera/memory'
import type { Settings } from '@tessera/shared'
import { SchedulingAgent, createSchedulerSkill, getBuiltinSkills } from '@tessera/tools'

export interface AppContext {
    settings: Settings
    kernel: Kernel
    agent: AgentManager
    memory: RetrievalMemory
    scheduler?: SchedulingAgent
}

// Collaborators tests swap for in-process fakes
export interface AppOverrides {
    provider?: LLMProvider
    embedder?: Embedder | null
    eventStore?: EventStore | null
}

function resolveEmbedder(settings: Settings, override: Embedder | null | undefined): Embedder | undefined {
    if (override !== undefined) return override ?? undefined
    if (!settings.OPENAI_API_KEY) return undefined
    return new OpenAIEmbedder({
        apiKey: settings.OPENAI_API_KEY,
        baseURL: settings.OPENAI_BASE_URL,
        model: settings.EMBEDDING_MODEL,
        dimensions: settings.VECTOR_DIM,
        timeoutMs: settings.LLM_TIMEOUT_MS,
    })
}

function resolveEventStore(settings: Settings, override: EventStore | null | undefined): EventStore | undefined {
    if (override !== undefined) return override ?? undefined
    const creds = { url: settings.SUPABASE_URL, key: settings.SUPABASE_SERVICE_KEY }
    if (!hasSupabaseCredentials(creds)) return undefined
    return new SupabaseEventStore(getSupabase(creds))
}

export function buildApp(settings: Settings, overrides: AppOverrides = {}): AppContext {
    const memory = new RetrievalMemory({
        dim: settings.VECTOR_DIM,
        embedder: resolveEmbedder(settings, overrides.embedder),
    })

    const kernel = overrides.provider
        ? Kernel.withProvider(overrides.provider, {
            memory,
            memoryTopK: settings.MEMORY_TOP_K,
            defaultTemperature: settings.LLM_TEMPERATURE,
        })
        : Kernel.fromSettings(settings, { memory })

    const skills = getBuiltinSkills({
        dataDir: path.resolve(settings.DATA_DIR),
        serpApiKey: settings.SERPAPI_API_KEY,
    })

    const eventStore = resolveEventStore(settings, overrides.eventStore)
    const scheduler = eventStore ? new SchedulingAgent(eventStore) : undefined
    if (scheduler) skills.push(createSchedulerSkill(scheduler, memory))
    else console.log('[config] Supabase not configured, scheduling tools disabled')

    const agent = new AgentManager(kernel, { skills })
    return { settings, kernel, agent, memory, scheduler }
}

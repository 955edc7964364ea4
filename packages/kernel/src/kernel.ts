import { buildMemoryBlock, type RetrievalMemory } from '@tessera/memory'
import { ToolRegistry, type ToolDefinition } from '@tessera/tools'
import {
    errorMessage,
    resolveLlmApiKey,
    type ChatMessage,
    type GenerateResult,
    type GenerationOptions,
    type Settings,
} from '@tessera/shared'
import { LLMManager, buildProvider } from './llm-manager'
import type { LLMProvider } from './providers/types'

export interface KernelOptions {
    llm?: LLMManager
    memory?: RetrievalMemory
    memoryTopK?: number          // default 3
    defaultTemperature?: number  // default 0.7
    tools?: ToolDefinition[]
}

export interface ProcessOptions extends GenerationOptions {
    systemPrompt?: string
    context?: ChatMessage[]
}

/**
 * Prompt assembly around the active model.
 *
 * `process()` runs one memory-augmented turn:
 *   [system prompt] + [context] + [retrieved memory block] + user text → model
 * and on success writes the user text and the reply back to memory. Memory is a
 * side channel: retrieval and write failures are logged and dropped, while
 * model failures propagate and leave memory untouched.
 */
export class Kernel {
    readonly llm: LLMManager
    readonly memory?: RetrievalMemory
    readonly tools: ToolRegistry
    private readonly memoryTopK: number
    private readonly defaultTemperature: number

    constructor(options: KernelOptions = {}) {
        this.llm = options.llm ?? new LLMManager()
        this.memory = options.memory
        this.memoryTopK = options.memoryTopK ?? 3
        this.defaultTemperature = options.defaultTemperature ?? 0.7
        this.tools = new ToolRegistry(options.tools)
    }

    static fromSettings(settings: Settings, options: Omit<KernelOptions, 'llm'> = {}): Kernel {
        const provider = buildProvider(settings.LLM_PROVIDER, {
            model: settings.DEFAULT_LLM_MODEL,
            apiKey: resolveLlmApiKey(settings),
            baseURL: settings.LLM_PROVIDER === 'openai' ? settings.OPENAI_BASE_URL : undefined,
            timeoutMs: settings.LLM_TIMEOUT_MS,
        })
        return Kernel.withProvider(provider, {
            memoryTopK: settings.MEMORY_TOP_K,
            defaultTemperature: settings.LLM_TEMPERATURE,
            ...options,
        })
    }

    static withProvider(provider: LLMProvider, options: Omit<KernelOptions, 'llm'> = {}, name = 'default'): Kernel {
        const llm = new LLMManager()
        llm.loadModel(name, provider)
        return new Kernel({ ...options, llm })
    }

    registerTool(tool: ToolDefinition): void {
        this.tools.register(tool)
    }

    useTool(name: string, args: unknown = {}): Promise<unknown> {
        return this.tools.invoke(name, args)
    }

    async process(text: string, options: ProcessOptions = {}): Promise<string> {
        const { systemPrompt, context, ...generation } = options

        const messages: ChatMessage[] = []
        if (systemPrompt) messages.push({ role: 'system', content: systemPrompt })
        if (context) messages.push(...context)

        const memoryBlock = await this.recall(text)
        if (memoryBlock) messages.push({ role: 'system', content: memoryBlock })

        messages.push({ role: 'user', content: text })

        const result = await this.generateResponse(messages, generation)
        const output = result.text

        await this.remember(text, output)
        return output
    }

    // Low level: messages go to the model as given
    generateResponse(messages: ChatMessage[], options: GenerationOptions = {}): Promise<GenerateResult> {
        return this.llm.generate(messages, {
            ...options,
            temperature: options.temperature ?? this.defaultTemperature,
        })
    }

    private async recall(query: string): Promise<string | null> {
        if (!this.memory?.hasEmbedder()) return null
        try {
            const results = await this.memory.retrieve(query, this.memoryTopK)
            return buildMemoryBlock(results)
        } catch (err) {
            console.warn('[kernel] memory retrieval failed, continuing without it:', errorMessage(err))
            return null
        }
    }

    private async remember(userText: string, output: string): Promise<void> {
        if (!this.memory?.hasEmbedder()) return
        try {
            await this.memory.storeText(userText, { role: 'user' })
            if (output) await this.memory.storeText(output, { role: 'assistant' })
        } catch (err) {
            console.warn('[kernel] memory write failed (non-fatal):', errorMessage(err))
        }
    }
}

// Everything the rest of the system needs — single import point
export { Kernel } from './kernel'
export type { KernelOptions, ProcessOptions } from './kernel'
export { LLMManager, buildProvider } from './llm-manager'
export { OpenAIChatProvider, GROQ_BASE_URL, toOpenAIMessage } from './providers/openai-chat'
export type { ProviderOptions } from './providers/openai-chat'
export type { LLMProvider, ProviderConfig } from './providers/types'

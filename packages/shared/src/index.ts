// Everything the rest of the system needs — single import point
export * from './errors'
export * from './schemas'
export * from './config'
export type { ChatMessage, ChatRole, GenerationOptions, GenerateResult } from './types'

export const VERSION = '0.1.0'

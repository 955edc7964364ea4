import type { ChatMessage, GenerateResult, GenerationOptions } from '@tessera/shared'
import type { Embedder } from '@tessera/memory'
import type { LLMProvider } from '../src'

export interface RecordedCall {
    messages: ChatMessage[]
    options: GenerationOptions
}

/** Replays canned replies in order and records what it was asked. */
export class ScriptedProvider implements LLMProvider {
    readonly model = 'scripted'
    readonly calls: RecordedCall[] = []

    constructor(private readonly replies: Array<string | Error>) {}

    async generate(messages: ChatMessage[], options: GenerationOptions = {}): Promise<GenerateResult> {
        this.calls.push({ messages, options })
        const reply = this.replies.shift()
        if (reply === undefined) throw new Error('ScriptedProvider ran out of replies')
        if (reply instanceof Error) throw reply
        return { text: reply, raw: { reply } }
    }
}

/** Looks vectors up by exact text; anything unlisted gets `fallback`. */
export class TableEmbedder implements Embedder {
    readonly inputs: string[] = []

    constructor(
        private readonly table: Record<string, number[]>,
        private readonly fallback: number[],
    ) {}

    async embed(texts: string[]): Promise<number[][]> {
        this.inputs.push(...texts)
        return texts.map(text => this.table[text] ?? this.fallback)
    }
}

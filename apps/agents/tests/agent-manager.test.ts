import { describe, it, expect, vi, beforeEach } from 'vitest'
import { z } from 'zod'
import { Kernel, type LLMProvider } from '@tessera/kernel'
import type { ChatMessage, GenerateResult, GenerationOptions } from '@tessera/shared'
import { calculatorSkill, defineTool } from '@tessera/tools'
import { AgentManager, INTERPRETER_SYSTEM_PROMPT } from '../src'

class ScriptedProvider implements LLMProvider {
    readonly model = 'scripted'
    readonly calls: Array<{ messages: ChatMessage[]; options: GenerationOptions }> = []

    constructor(private readonly replies: Array<string | Error>) {}

    async generate(messages: ChatMessage[], options: GenerationOptions = {}): Promise<GenerateResult> {
        this.calls.push({ messages, options })
        const reply = this.replies.shift()
        if (reply === undefined) throw new Error('ScriptedProvider ran out of replies')
        if (reply instanceof Error) throw reply
        return { text: reply, raw: null }
    }
}

function agentReplying(...replies: Array<string | Error>) {
    const provider = new ScriptedProvider(replies)
    const agent = new AgentManager(Kernel.withProvider(provider), { skills: [calculatorSkill] })
    return { agent, provider }
}

const plan = (action: string, args?: unknown) => JSON.stringify({ thought: 'test', action, args })

describe('AgentManager.execute', () => {
    beforeEach(() => {
        vi.restoreAllMocks()
        vi.spyOn(console, 'log').mockImplementation(() => {})
        vi.spyOn(console, 'warn').mockImplementation(() => {})
        vi.spyOn(console, 'error').mockImplementation(() => {})
    })

    it('asks the kernel for a plan with the interpreter prompt and tool catalogue', async () => {
        const { agent, provider } = agentReplying(plan('respond', { message: 'hi' }))

        await agent.execute('hello')

        const call = provider.calls[0]
        expect(call?.options).toEqual({ temperature: 0.2, maxTokens: 256 })
        const system = call?.messages[0]
        expect(system?.role).toBe('system')
        expect(system?.content.startsWith(INTERPRETER_SYSTEM_PROMPT)).toBe(true)
        expect(system?.content).toContain('### calculator\n')
        expect(call?.messages[1]).toEqual({ role: 'user', content: 'hello' })
    })

    it('returns a respond message exactly', async () => {
        const message = 'Line one\n"quoted" {braces} ünïcode'
        const { agent } = agentReplying(plan('respond', { message }))
        expect(await agent.execute('say it')).toBe(message)
    })

    it('returns empty text for a respond without a usable message', async () => {
        const { agent } = agentReplying(plan('respond', {}), plan('respond', ['x']), plan('respond'))
        expect(await agent.execute('a')).toBe('')
        expect(await agent.execute('b')).toBe('')
        expect(await agent.execute('c')).toBe('')
    })

    it('stringifies a non-string respond message', async () => {
        const { agent } = agentReplying(plan('respond', { message: 42 }))
        expect(await agent.execute('number please')).toBe('42')
    })

    it('passes unstructured model text straight through', async () => {
        const { agent } = agentReplying('I am not sure what you mean.')
        expect(await agent.execute('???')).toBe('I am not sure what you mean.')
    })

    it('reports unknown tools', async () => {
        const { agent } = agentReplying(plan('fly', { to: 'moon' }))
        expect(await agent.execute('fly me')).toBe('Unknown tool: fly')
    })

    it('reports a non-string action as an unknown tool', async () => {
        const { agent } = agentReplying('{"action": 7, "args": {}}', '{"action": null}')
        expect(await agent.execute('a')).toBe('Unknown tool: 7')
        expect(await agent.execute('b')).toBe('Unknown tool: null')
    })

    it('runs a tool and returns its result as text', async () => {
        const { agent } = agentReplying(plan('calculator', { expression: '2 + 2 * 3' }))
        expect(await agent.execute('what is 2 + 2 * 3?')).toBe('8')
    })

    it('reports argument mismatches', async () => {
        const { agent } = agentReplying(plan('calculator', { expr: '1+1' }), plan('calculator', '1+1'))
        expect(await agent.execute('a')).toBe(
            "Tool 'calculator' argument error: missing required argument 'expression'; unexpected keyword argument 'expr'"
        )
        expect(await agent.execute('b')).toBe("Tool 'calculator' argument error: args must be an object, got string")
    })

    it('reports tool failures', async () => {
        const { agent } = agentReplying(plan('calculator', { expression: '1 / 0' }))
        expect(await agent.execute('divide')).toBe("Tool 'calculator' failed: division by zero")
    })

    it('renders structured results as JSON', async () => {
        const { agent } = agentReplying(plan('list_notes'))
        agent.registerTool(defineTool({
            name: 'list_notes',
            description: 'List notes.',
            category: 'data',
            inputSchema: z.object({}).strict(),
            execute: () => ['a', 'b'],
        }))
        expect(await agent.execute('notes?')).toBe('[\n  "a",\n  "b"\n]')
    })

    it('forgets unregistered tools', async () => {
        const { agent } = agentReplying(plan('calculator', { expression: '1' }))
        expect(agent.unregisterTool('calculator')).toBe(true)
        expect(agent.tools.has('calculator')).toBe(false)
        expect(await agent.execute('one')).toBe('Unknown tool: calculator')
    })

    it('propagates kernel failures', async () => {
        const { agent } = agentReplying(new Error('model unavailable'))
        await expect(agent.execute('hi')).rejects.toThrow('model unavailable')
    })
})

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { loadSettings } from '@tessera/shared'
import { buildApp } from '../src/app-context'
import { handleLine } from '../src/commands'
import { ScriptedProvider, TableEmbedder } from './fakes'

const respond = (message: string) => JSON.stringify({ thought: 'reply', action: 'respond', args: { message } })

function makeApp(replies: Array<string | Error> = [], withMemory = true) {
    return buildApp(loadSettings({ VECTOR_DIM: '2' }), {
        provider: new ScriptedProvider(replies),
        embedder: withMemory ? new TableEmbedder({ 'buy milk': [1, 0], groceries: [1, 0] }, [0, 1]) : null,
        eventStore: null,
    })
}

describe('handleLine', () => {
    beforeEach(() => {
        vi.restoreAllMocks()
        vi.spyOn(console, 'log').mockImplementation(() => {})
        vi.spyOn(console, 'warn').mockImplementation(() => {})
    })

    it('lists commands', async () => {
        const { output } = await handleLine(makeApp(), 'help')
        expect(output.split('\n')).toEqual([
            'Commands:',
            '  help               Show this list',
            '  version            Show the version',
            '  status             Show model, memory and tool status',
            '  tools              List the tools the agent can call',
            '  remember <text>    Store a note in memory',
            '  recall <query>     Search memory',
            '  exit               Leave the shell (also: quit)',
            '',
            'Anything else is sent to the agent.',
        ])
    })

    it('shows the version', async () => {
        expect(await handleLine(makeApp(), 'version')).toEqual({ output: 'Tessera v0.1.0' })
    })

    it('reports status', async () => {
        const { output } = await handleLine(makeApp(), 'status')
        expect(output).toBe([
            'Tessera Status:',
            '- Model: openai/gpt-4o-mini (active: default)',
            '- Memory: 0 items, dim 2',
            '- Tools: 10',
            '- Scheduler: disabled',
        ].join('\n'))
    })

    it('lists tools with descriptions', async () => {
        const { output } = await handleLine(makeApp(), 'tools')
        expect(output.split('\n')[0]).toBe(
            'calculator     Evaluate an arithmetic expression. Supports + - * / % ** and parentheses.'
        )
        expect(output.split('\n')).toHaveLength(10)
    })

    it('remembers and recalls notes', async () => {
        const app = makeApp()

        expect(await handleLine(app, 'recall groceries')).toEqual({ output: 'Nothing stored yet.' })
        expect(await handleLine(app, 'remember buy milk')).toEqual({ output: 'Stored vec_1' })
        expect(await handleLine(app, 'recall groceries')).toEqual({ output: '1.000  buy milk' })
    })

    it('explains memory commands when memory is off', async () => {
        const app = makeApp([], false)
        expect(await handleLine(app, 'remember x')).toEqual({ output: 'Memory is disabled: no embeddings provider configured.' })
        expect(await handleLine(app, 'remember')).toEqual({ output: 'Usage: remember <text>' })
    })

    it('exits on exit and quit in any case', async () => {
        const app = makeApp()
        expect(await handleLine(app, 'exit')).toEqual({ output: 'Goodbye!', exit: true })
        expect(await handleLine(app, '  QUIT ')).toEqual({ output: 'Goodbye!', exit: true })
    })

    it('ignores blank lines', async () => {
        expect(await handleLine(makeApp(), '   ')).toEqual({ output: '' })
    })

    it('sends anything else to the agent', async () => {
        const app = makeApp([respond('Hi there!'), respond('Not a command.')])
        expect(await handleLine(app, 'hello agent')).toEqual({ output: 'Hi there!' })
        expect(await handleLine(app, 'constructor')).toEqual({ output: 'Not a command.' })
    })

    it('turns agent failures into an error line', async () => {
        const app = makeApp([new Error('model unavailable')])
        expect(await handleLine(app, 'hello')).toEqual({ output: 'Error: model unavailable' })
    })
})

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { z } from 'zod'
import { ToolArgumentError, ToolNotFoundError } from '@tessera/shared'
import { ToolRegistry, buildToolsPrompt, defineTool, formatToolResult } from '../src'

const echoTool = defineTool({
    name: 'echo',
    description: 'Repeat text.',
    category: 'data',
    inputSchema: z.object({
        text: z.string().describe('Text to repeat'),
        times: z.number().int().default(1),
    }).strict(),
    execute: ({ text, times }) => Array.from({ length: times }, () => text).join(' '),
})

describe('ToolRegistry', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {})
    })

    it('invokes a tool with bound arguments and defaults', async () => {
        const registry = new ToolRegistry([echoTool])
        expect(await registry.invoke('echo', { text: 'hi', times: 3 })).toBe('hi hi hi')
        expect(await registry.invoke('echo', { text: 'hi' })).toBe('hi')
    })

    it('lets the last registration under a name win', async () => {
        const registry = new ToolRegistry([echoTool])
        registry.register({ ...echoTool, execute: () => 'replaced' })
        expect(registry.size).toBe(1)
        expect(await registry.invoke('echo', { text: 'hi' })).toBe('replaced')
    })

    it('unregisters tools', () => {
        const registry = new ToolRegistry([echoTool])
        expect(registry.unregister('echo')).toBe(true)
        expect(registry.unregister('echo')).toBe(false)
        expect(registry.has('echo')).toBe(false)
    })

    it('throws ToolNotFoundError for unknown names', async () => {
        await expect(new ToolRegistry().invoke('nope', {})).rejects.toBeInstanceOf(ToolNotFoundError)
    })

    it('reports missing and unexpected keywords as argument errors', async () => {
        const registry = new ToolRegistry([echoTool])
        const err = await registry.invoke('echo', { unexpected: 1 }).catch((e: unknown) => e)
        expect(err).toBeInstanceOf(ToolArgumentError)
        expect(err).toMatchObject({
            toolName: 'echo',
            message: "missing required argument 'text'; unexpected keyword argument 'unexpected'",
        })
    })

    it('reports wrongly typed values and non-object args', async () => {
        const registry = new ToolRegistry([echoTool])
        await expect(registry.invoke('echo', { text: 5 })).rejects.toThrow("'text': Expected string, received number")
        await expect(registry.invoke('echo', [1, 2])).rejects.toThrow('args must be an object, got array')
    })

    it('treats absent args as an empty object', async () => {
        const noArgs = defineTool({
            name: 'ping',
            description: 'Ping.',
            category: 'data',
            inputSchema: z.object({}).strict(),
            execute: () => 'pong',
        })
        expect(await new ToolRegistry([noArgs]).invoke('ping', undefined)).toBe('pong')
    })

    it('propagates runtime failures unchanged', async () => {
        const boom = defineTool({
            name: 'boom',
            description: 'Fails.',
            category: 'data',
            inputSchema: z.object({}).strict(),
            execute: () => {
                throw new Error('kaput')
            },
        })
        await expect(new ToolRegistry([boom]).invoke('boom', {})).rejects.toThrow('kaput')
    })
})

describe('formatToolResult', () => {
    it('renders values as display text', () => {
        expect(formatToolResult('plain')).toBe('plain')
        expect(formatToolResult(8)).toBe('8')
        expect(formatToolResult(false)).toBe('false')
        expect(formatToolResult(undefined)).toBe('')
        expect(formatToolResult(null)).toBe('')
        expect(formatToolResult(['a.txt'])).toBe('[\n  "a.txt"\n]')
        expect(formatToolResult(Symbol('token'))).toBe('Symbol(token)')
    })
})

describe('buildToolsPrompt', () => {
    it('lists each tool with its inputs', () => {
        expect(buildToolsPrompt([echoTool])).toBe(
            '## TOOLS AVAILABLE\nSet "action" to a tool name and "args" to its inputs.\n\n' +
            '### echo\nRepeat text.\nInputs (* = required):\n  text*: string — Text to repeat\n  times: number'
        )
    })

    it('says so when there are no tools', () => {
        expect(buildToolsPrompt([])).toBe('## TOOLS AVAILABLE\nNone. Always use the "respond" action.')
    })
})

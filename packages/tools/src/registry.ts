import { z } from 'zod'
import { ToolArgumentError, ToolNotFoundError } from '@tessera/shared'
import type { Skill, ToolDefinition, ToolInput } from './types'

export class ToolRegistry {
    private readonly tools = new Map<string, ToolDefinition>()

    constructor(initial: ToolDefinition[] = []) {
        for (const tool of initial) this.register(tool)
    }

    // Last registration under a name wins
    register(tool: ToolDefinition): void {
        this.tools.set(tool.name, tool)
    }

    registerSkill(skill: Skill): void {
        for (const tool of skill.tools) this.register(tool)
    }

    unregister(name: string): boolean {
        return this.tools.delete(name)
    }

    has(name: string): boolean {
        return this.tools.has(name)
    }

    get(name: string): ToolDefinition | undefined {
        return this.tools.get(name)
    }

    names(): string[] {
        return [...this.tools.keys()]
    }

    list(): ToolDefinition[] {
        return [...this.tools.values()]
    }

    get size(): number {
        return this.tools.size
    }

    // Invoke a tool by name; argument problems surface as ToolArgumentError
    async invoke(name: string, args: unknown): Promise<unknown> {
        const tool = this.tools.get(name)
        if (!tool) throw new ToolNotFoundError(name)

        const input = bindArguments(tool, args)
        const start = Date.now()
        try {
            return await tool.execute(input)
        } finally {
            console.log(`[tool] ${name} (${Date.now() - start}ms)`)
        }
    }
}

export function bindArguments(tool: ToolDefinition, args: unknown): ToolInput {
    const raw = args ?? {}
    if (typeof raw !== 'object' || Array.isArray(raw)) {
        throw new ToolArgumentError(tool.name, `args must be an object, got ${Array.isArray(raw) ? 'array' : typeof raw}`)
    }

    const parsed = tool.inputSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ToolArgumentError(tool.name, formatIssues(parsed.error))
    }
    return parsed.data
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => {
            if (issue.code === 'unrecognized_keys') {
                return `unexpected keyword argument${issue.keys.length > 1 ? 's' : ''} ${issue.keys.map(k => `'${k}'`).join(', ')}`
            }
            const path = issue.path.join('.')
            if (issue.code === 'invalid_type' && issue.received === 'undefined') {
                return `missing required argument '${path}'`
            }
            return path ? `'${path}': ${issue.message}` : issue.message
        })
        .join('; ')
}

// Format tool definitions for injection into the interpreter system prompt
export function buildToolsPrompt(tools: ToolDefinition[]): string {
    if (tools.length === 0) return '## TOOLS AVAILABLE\nNone. Always use the "respond" action.'

    const lines = tools.map(t => {
        const params = describeInputs(t.inputSchema)
        return `### ${t.name}\n${t.description}\nInputs (* = required):\n${params || '  (none)'}`
    })

    return `## TOOLS AVAILABLE\nSet "action" to a tool name and "args" to its inputs.\n\n${lines.join('\n\n')}`
}

function describeInputs(schema: z.ZodTypeAny): string {
    if (!(schema instanceof z.ZodObject)) return ''
    const shape: Record<string, z.ZodTypeAny> = schema.shape
    return Object.entries(shape)
        .map(([key, field]) => {
            const required = !field.isOptional()
            return `  ${key}${required ? '*' : ''}: ${typeName(field)}${field.description ? ` — ${field.description}` : ''}`
        })
        .join('\n')
}

function typeName(field: z.ZodTypeAny): string {
    if (field instanceof z.ZodOptional || field instanceof z.ZodDefault || field instanceof z.ZodNullable) {
        return typeName(field._def.innerType)
    }
    if (field instanceof z.ZodEffects) return typeName(field.innerType())
    if (field instanceof z.ZodString) return 'string'
    if (field instanceof z.ZodNumber) return 'number'
    if (field instanceof z.ZodBoolean) return 'boolean'
    if (field instanceof z.ZodArray) return 'array'
    return 'object'
}

// Converts a tool result to the text shown to the user
export function formatToolResult(result: unknown): string {
    if (result === undefined || result === null) return ''
    if (typeof result === 'string') return result
    if (typeof result === 'number' || typeof result === 'boolean' || typeof result === 'bigint') return String(result)
    // undefined for functions and symbols
    return JSON.stringify(result, null, 2) ?? String(result)
}

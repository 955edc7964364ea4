import { z } from 'zod'

export type ToolCategory = 'research' | 'data' | 'files' | 'math' | 'scheduling'

export type ToolInput = Record<string, unknown>

export interface ToolDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
    name: string
    description: string
    category: ToolCategory
    // Binds the model's raw `args` to typed input; a strict object rejects unknown keys
    inputSchema: S
    execute: (input: z.output<S>) => unknown
}

export const SkillManifestSchema = z.object({
    name: z.string(),
    display_name: z.string(),
    description: z.string(),
    version: z.string(),
    category: z.enum(['research', 'data', 'files', 'math', 'scheduling']),
    requires_auth: z.boolean().optional(),
    enabled_by_default: z.boolean().optional(),
})

export type SkillManifest = z.infer<typeof SkillManifestSchema>

export interface Skill {
    manifest: SkillManifest
    tools: ToolDefinition[]
}

// Keeps the schema's inferred input type while returning the erased definition the registry stores
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): ToolDefinition {
    return definition
}

import type { Kernel } from '@tessera/kernel'
import { ActionPlanSchema } from '@tessera/shared'
import { ToolRegistry, buildToolsPrompt, type Skill, type ToolDefinition } from '@tessera/tools'
import { parseAction } from './lib/action-interpreter'
import { runAction } from './lib/tool-runner'

export const INTERPRETER_SYSTEM_PROMPT = [
    'You are a tool-using agent. Given a user\'s input, decide whether to use a tool',
    'and respond in strict JSON ONLY with keys: thought (string), action (string), args (object).',
    'Use \'respond\' as action when a direct answer is sufficient.',
].join(' ')

// Low temperature and a short budget: the reply is a small JSON object
const INTERPRET_TEMPERATURE = 0.2
const INTERPRET_MAX_TOKENS = 256

export interface AgentManagerOptions {
    tools?: ToolDefinition[]
    skills?: Skill[]
}

/**
 * One turn per call: ask the kernel for an action plan (INTERPRET), then answer
 * directly or run the chosen tool (DISPATCH). Parse and tool failures come back
 * as text; kernel failures propagate.
 */
export class AgentManager {
    private readonly registry: ToolRegistry

    constructor(readonly kernel: Kernel, options: AgentManagerOptions = {}) {
        this.registry = new ToolRegistry(options.tools)
        for (const skill of options.skills ?? []) this.registry.registerSkill(skill)
    }

    get tools(): ToolRegistry {
        return this.registry
    }

    registerTool(tool: ToolDefinition): void {
        this.registry.register(tool)
    }

    registerSkill(skill: Skill): void {
        this.registry.registerSkill(skill)
    }

    unregisterTool(name: string): boolean {
        return this.registry.unregister(name)
    }

    systemPrompt(): string {
        return `${INTERPRETER_SYSTEM_PROMPT}\n${ActionPlanSchema.description ?? ''}\n\n${buildToolsPrompt(this.registry.list())}`
    }

    async execute(userInput: string): Promise<string> {
        const modelText = await this.kernel.process(userInput, {
            systemPrompt: this.systemPrompt(),
            temperature: INTERPRET_TEMPERATURE,
            maxTokens: INTERPRET_MAX_TOKENS,
        })

        const plan = parseAction(modelText)
        if (!plan) {
            console.log('[agent] No action plan in model output, returning it as is')
            return modelText
        }

        console.log(`[agent] action=${String(plan.action)}`)
        return runAction(plan, this.registry)
    }
}

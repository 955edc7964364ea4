import { ToolArgumentError, errorMessage, type ActionPlan } from '@tessera/shared'
import { formatToolResult, type ToolRegistry } from '@tessera/tools'

export const RESPOND_ACTION = 'respond'

function respondMessage(args: unknown): string {
    if (typeof args !== 'object' || args === null || Array.isArray(args) || !('message' in args)) return ''
    const { message } = args
    return message === undefined || message === null ? '' : String(message)
}

// Runs one action plan; every outcome, including failure, becomes user-visible text
export async function runAction(plan: ActionPlan, registry: ToolRegistry): Promise<string> {
    const name = String(plan.action)

    if (name === RESPOND_ACTION) return respondMessage(plan.args)

    if (!registry.has(name)) {
        console.warn(`[agent] Unknown tool requested: ${name}`)
        return `Unknown tool: ${name}`
    }

    try {
        const result = await registry.invoke(name, plan.args)
        return formatToolResult(result)
    } catch (err) {
        if (err instanceof ToolArgumentError) {
            console.warn(`[agent] ${name} argument error: ${err.details}`)
            return `Tool '${name}' argument error: ${err.details}`
        }
        console.error(`[agent] ${name} failed:`, errorMessage(err))
        return `Tool '${name}' failed: ${errorMessage(err)}`
    }
}

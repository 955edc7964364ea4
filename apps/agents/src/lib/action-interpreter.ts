import { ActionPlanSchema, type ActionPlan } from '@tessera/shared'

function tryParsePlan(text: string): ActionPlan | null {
    let decoded: unknown
    try {
        decoded = JSON.parse(text)
    } catch {
        return null
    }
    if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) return null

    const plan = ActionPlanSchema.safeParse(decoded)
    return plan.success ? plan.data : null
}

/**
 * Pulls an action plan out of raw model text. Tries the whole text first, then
 * the span from the first `{` to the last `}`, which covers prose and code
 * fences around the JSON. Only one plan per reply is assumed.
 */
export function parseAction(modelText: string): ActionPlan | null {
    const text = modelText.trim()

    const direct = tryParsePlan(text)
    if (direct) return direct

    const start = text.indexOf('{')
    const end = text.lastIndexOf('}')
    if (start === -1 || end <= start) return null

    return tryParsePlan(text.slice(start, end + 1))
}

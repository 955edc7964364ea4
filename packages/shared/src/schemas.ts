import { z } from 'zod'

// Any decoded object with an `action` key is a plan; a non-string action is reported as an unknown tool.
// `args` stays unknown here: each tool's own schema binds it at dispatch time
export const ActionPlanSchema = z.object({
    thought: z.unknown().optional(),
    action: z.unknown(),
    args: z.unknown().optional(),
}).passthrough().refine(plan => 'action' in plan, { message: 'action is required' }).describe(
    'Respond ONLY with a JSON object with keys "thought" (string), "action" (string) and "args" (object). Use "respond" as action with args {"message": "..."} when a direct answer is sufficient. No markdown, no explanation outside the JSON object.'
)

export type ActionPlan = z.infer<typeof ActionPlanSchema>

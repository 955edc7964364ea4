import { z } from 'zod'
import type { RetrievalMemory } from '@tessera/memory'
import { errorMessage } from '@tessera/shared'
import { defineTool, type ToolDefinition } from '../../types'
import type { SchedulingAgent } from './scheduling-agent'

/**
 * add_event / list_events / remove_event over a SchedulingAgent. When a memory
 * with an embedder is given, adding an event also stores a short note about it.
 * That write is detached: it may finish after the tool has returned, and its
 * failure is only logged.
 */
export function createSchedulerTools(agent: SchedulingAgent, memory?: RetrievalMemory): ToolDefinition[] {
    const addEvent = defineTool({
        name: 'add_event',
        description: 'Schedule an event. "when" accepts phrases like "tomorrow at 8AM", "in 30 minutes" or "2025-10-01 14:00".',
        category: 'scheduling',
        inputSchema: z.object({
            title: z.string().min(1).describe('What the event is'),
            when: z.string().min(1).describe('When it happens, in natural language'),
        }).strict(),

        async execute({ title, when }) {
            const eventId = await agent.addEvent(title, when)

            if (memory?.hasEmbedder()) {
                const note = `Event: ${title} at ${when} (id=${eventId})`
                void memory.storeText(note, { kind: 'event', event_id: eventId }).catch(err => {
                    console.warn('[scheduler] memory note failed (non-fatal):', errorMessage(err))
                })
            }

            return `event_id=${eventId}`
        },
    })

    const listEvents = defineTool({
        name: 'list_events',
        description: 'List scheduled events, soonest first.',
        category: 'scheduling',
        inputSchema: z.object({}).strict(),

        async execute() {
            const rows = await agent.listEvents()
            if (rows.length === 0) return 'No events.'
            return rows.map(r => `${r.id}\t${r.whenTs}\t${r.title}`).join('\n')
        },
    })

    const removeEvent = defineTool({
        name: 'remove_event',
        description: 'Remove a scheduled event by id.',
        category: 'scheduling',
        inputSchema: z.object({
            event_id: z.coerce.number().int().positive().describe('Id returned by add_event'),
        }).strict(),

        async execute({ event_id }) {
            return (await agent.removeEvent(event_id)) ? 'removed' : 'not_found'
        },
    })

    return [addEvent, listEvents, removeEvent]
}

import type { SupabaseClient } from '@supabase/supabase-js'

export interface EventRecord {
    id: number
    title: string
    whenTs: string   // ISO-8601 local time, minute precision, no zone
}

/** Keyed store for scheduled events. `list()` is always ascending by `whenTs`. */
export interface EventStore {
    insert(title: string, whenTs: string): Promise<number>
    list(): Promise<EventRecord[]>
    remove(id: number): Promise<boolean>
}

interface EventRow {
    id: number
    title: string
    when_ts: string
}

// Matches migrations/001_events.sql
const TABLE = 'events'

export class SupabaseEventStore implements EventStore {
    constructor(private readonly client: SupabaseClient) {}

    async insert(title: string, whenTs: string): Promise<number> {
        const { data, error } = await this.client
            .from(TABLE)
            .insert({ title, when_ts: whenTs })
            .select('id')
            .single<Pick<EventRow, 'id'>>()

        if (error) {
            console.error('[DB] event insert failed:', error.message)
            throw new Error(`Event insert failed: ${error.message}`)
        }
        return Number(data.id)
    }

    async list(): Promise<EventRecord[]> {
        const { data, error } = await this.client
            .from(TABLE)
            .select('id, title, when_ts')
            .order('when_ts', { ascending: true })
            .returns<EventRow[]>()

        if (error) {
            console.error('[DB] event list failed:', error.message)
            throw new Error(`Event list failed: ${error.message}`)
        }
        return (data ?? []).map(row => ({ id: Number(row.id), title: row.title, whenTs: row.when_ts }))
    }

    async remove(id: number): Promise<boolean> {
        const { data, error } = await this.client
            .from(TABLE)
            .delete()
            .eq('id', id)
            .select('id')
            .returns<Pick<EventRow, 'id'>[]>()

        if (error) {
            console.error('[DB] event delete failed:', error.message)
            throw new Error(`Event delete failed: ${error.message}`)
        }
        return (data ?? []).length > 0
    }
}

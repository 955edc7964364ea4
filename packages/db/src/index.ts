export { getSupabase, hasSupabaseCredentials } from './client'
export type { SupabaseCredentials } from './client'
export { SupabaseEventStore } from './events'
export type { EventRecord, EventStore } from './events'

import { createClient, SupabaseClient } from '@supabase/supabase-js'
import { ConfigurationError } from '@tessera/shared'

let supabaseInstance: SupabaseClient | null = null

export interface SupabaseCredentials {
    url?: string
    key?: string
}

export const hasSupabaseCredentials = (creds: SupabaseCredentials = fromEnv()): boolean =>
    Boolean(creds.url && creds.key && creds.url !== 'undefined' && creds.key !== 'undefined')

export const getSupabase = (creds: SupabaseCredentials = fromEnv()): SupabaseClient => {
    if (supabaseInstance) return supabaseInstance

    const { url, key } = creds

    if (!url || !key || url === 'undefined' || key === 'undefined') {
        const missing: string[] = []
        if (!url || url === 'undefined') missing.push('SUPABASE_URL')
        if (!key || key === 'undefined') missing.push('SUPABASE_SERVICE_KEY')

        console.error(`[DB] Critical: ${missing.join(' and ')} missing from environment.`)
        throw new ConfigurationError(`Supabase environment variables are missing: ${missing.join(', ')}`)
    }

    supabaseInstance = createClient(url, key)
    return supabaseInstance
}

function fromEnv(): SupabaseCredentials {
    return { url: process.env.SUPABASE_URL, key: process.env.SUPABASE_SERVICE_KEY }
}

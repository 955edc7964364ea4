import { describe, it, expect, vi, beforeEach } from 'vitest'

vi.mock('@supabase/supabase-js', () => ({
    createClient: vi.fn(() => ({ from: vi.fn() })),
}))

import { createClient } from '@supabase/supabase-js'
import { ConfigurationError } from '@tessera/shared'
import { getSupabase, hasSupabaseCredentials } from '../src'

describe('hasSupabaseCredentials', () => {
    it('requires both url and key', () => {
        expect(hasSupabaseCredentials({ url: 'http://localhost:54321', key: 'test-secret' })).toBe(true)
        expect(hasSupabaseCredentials({ url: 'http://localhost:54321' })).toBe(false)
        expect(hasSupabaseCredentials({ url: 'undefined', key: 'test-secret' })).toBe(false)
    })
})

describe('getSupabase', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => {})
    })

    it('names every missing variable', () => {
        expect(() => getSupabase({})).toThrow(ConfigurationError)
        expect(() => getSupabase({ url: 'http://localhost:54321' })).toThrow(
            'Supabase environment variables are missing: SUPABASE_SERVICE_KEY'
        )
    })

    it('creates the client once and reuses it', () => {
        const first = getSupabase({ url: 'http://localhost:54321', key: 'test-secret' })
        const second = getSupabase({ url: 'http://other:1', key: 'other' })
        expect(second).toBe(first)
        expect(createClient).toHaveBeenCalledTimes(1)
        expect(createClient).toHaveBeenCalledWith('http://localhost:54321', 'test-secret')
    })
})

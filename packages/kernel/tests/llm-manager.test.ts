import { describe, it, expect } from 'vitest'
import { ConfigurationError } from '@tessera/shared'
import { LLMManager } from '../src'
import { ScriptedProvider } from './helpers'

describe('LLMManager', () => {
    it('activates the first model loaded', () => {
        const llm = new LLMManager()
        llm.loadModel('fast', new ScriptedProvider([]))
        llm.loadModel('smart', new ScriptedProvider([]))

        expect(llm.activeModel).toBe('fast')
        expect(llm.listModels()).toEqual(['fast', 'smart'])
    })

    it('routes generation to the active model', async () => {
        const fast = new ScriptedProvider(['from fast'])
        const smart = new ScriptedProvider(['from smart'])
        const llm = new LLMManager()
        llm.loadModel('fast', fast)
        llm.loadModel('smart', smart)

        expect(llm.setActiveModel('smart')).toBe(true)
        expect(llm.setActiveModel('missing')).toBe(false)

        const result = await llm.generate([{ role: 'user', content: 'hi' }], { temperature: 0.1 })
        expect(result.text).toBe('from smart')
        expect(fast.calls).toHaveLength(0)
        expect(smart.calls[0]?.options).toEqual({ temperature: 0.1 })
    })

    it('clears the active model when it is unloaded', async () => {
        const llm = new LLMManager()
        llm.loadModel('only', new ScriptedProvider(['x']))

        expect(llm.unloadModel('only')).toBe(true)
        expect(llm.unloadModel('only')).toBe(false)
        expect(llm.activeModel).toBeNull()
        await expect(llm.generate([{ role: 'user', content: 'hi' }]))
            .rejects.toThrow(new ConfigurationError('No active model configured in LLMManager.'))
    })
})

import calculatorSkill from './calculator'
import createFilesystemSkill from './filesystem'
import createWebSearchSkill from './web_search'
import type { Skill } from '../types'

export interface BuiltinSkillOptions {
    dataDir: string
    serpApiKey?: string
}

// Skills that need no external service beyond optional API keys
export function getBuiltinSkills(options: BuiltinSkillOptions): Skill[] {
    return [
        calculatorSkill,
        createFilesystemSkill(options.dataDir),
        createWebSearchSkill({ serpApiKey: options.serpApiKey }),
    ]
}

export { calculatorSkill, createFilesystemSkill, createWebSearchSkill }
export { createSchedulerSkill, SchedulingAgent, parseNaturalTime, formatLocalTimestamp } from './scheduler'

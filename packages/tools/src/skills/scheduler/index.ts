import type { RetrievalMemory } from '@tessera/memory'
import { createSchedulerTools } from './tool'
import type { SchedulingAgent } from './scheduling-agent'
import manifest from './skill.json'
import { SkillManifestSchema, type Skill } from '../../types'

export { SchedulingAgent } from './scheduling-agent'
export { parseNaturalTime, formatLocalTimestamp } from './time-parser'

export function createSchedulerSkill(agent: SchedulingAgent, memory?: RetrievalMemory): Skill {
    return {
        manifest: SkillManifestSchema.parse(manifest),
        tools: createSchedulerTools(agent, memory),
    }
}

export default createSchedulerSkill

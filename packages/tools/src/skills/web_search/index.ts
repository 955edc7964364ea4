import { createWebSearchTool } from './tool'
import { fetchUrlTool, openUrlTool } from './fetch-url'
import manifest from './skill.json'
import { SkillManifestSchema, type Skill } from '../../types'

export function createWebSearchSkill(options: { serpApiKey?: string } = {}): Skill {
    return {
        manifest: SkillManifestSchema.parse(manifest),
        tools: [createWebSearchTool(options), fetchUrlTool, openUrlTool],
    }
}

export default createWebSearchSkill

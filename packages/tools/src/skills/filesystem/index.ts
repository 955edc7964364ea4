import { createFilesystemTools } from './tool'
import manifest from './skill.json'
import { SkillManifestSchema, type Skill } from '../../types'

export function createFilesystemSkill(root: string): Skill {
    return {
        manifest: SkillManifestSchema.parse(manifest),
        tools: createFilesystemTools(root),
    }
}

export default createFilesystemSkill

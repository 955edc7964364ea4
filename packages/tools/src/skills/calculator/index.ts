import { calculatorTool } from './tool'
import manifest from './skill.json'
import { SkillManifestSchema, type Skill } from '../../types'

export const calculatorSkill: Skill = {
    manifest: SkillManifestSchema.parse(manifest),
    tools: [calculatorTool],
}

export default calculatorSkill

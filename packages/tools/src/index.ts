// Everything the rest of the system needs — single import point
export { ToolRegistry, bindArguments, buildToolsPrompt, formatToolResult } from './registry'
export { defineTool, SkillManifestSchema } from './types'
export type { Skill, SkillManifest, ToolCategory, ToolDefinition, ToolInput } from './types'
export * from './skills'
export { evaluateExpression } from './skills/calculator/expression'
export { formatSearchResults } from './skills/web_search/tool'
export type { SearchHit } from './skills/web_search/tool'

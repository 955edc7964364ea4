// Everything the rest of the system needs — single import point
export { AgentManager, INTERPRETER_SYSTEM_PROMPT } from './agent-manager'
export type { AgentManagerOptions } from './agent-manager'
export { parseAction } from './lib/action-interpreter'
export { runAction, RESPOND_ACTION } from './lib/tool-runner'

import { VERSION, errorMessage } from '@tessera/shared'
import type { AppContext } from './app-context'

export interface CommandResult {
    output: string
    exit?: boolean
}

type CommandHandler = (app: AppContext, arg: string) => Promise<CommandResult> | CommandResult

interface Command {
    usage: string
    summary: string
    run: CommandHandler
}

const RECALL_LIMIT = 5

const exit: Command = {
    usage: 'exit',
    summary: 'Leave the shell (also: quit)',
    run: () => ({ output: 'Goodbye!', exit: true }),
}

const commands: Record<string, Command> = {
    help: {
        usage: 'help',
        summary: 'Show this list',
        run: () => ({ output: helpText() }),
    },
    version: {
        usage: 'version',
        summary: 'Show the version',
        run: app => ({ output: `${app.settings.APP_NAME} v${VERSION}` }),
    },
    status: {
        usage: 'status',
        summary: 'Show model, memory and tool status',
        run: app => ({ output: statusText(app) }),
    },
    tools: {
        usage: 'tools',
        summary: 'List the tools the agent can call',
        run: app => ({
            output: app.agent.tools.list().map(t => `${t.name.padEnd(14)} ${t.description}`).join('\n') || 'No tools registered.',
        }),
    },
    remember: {
        usage: 'remember <text>',
        summary: 'Store a note in memory',
        async run(app, arg) {
            if (!arg) return { output: 'Usage: remember <text>' }
            if (!app.memory.hasEmbedder()) return { output: 'Memory is disabled: no embeddings provider configured.' }
            const id = await app.memory.storeText(arg, { kind: 'note' })
            return { output: `Stored ${id}` }
        },
    },
    recall: {
        usage: 'recall <query>',
        summary: 'Search memory',
        async run(app, arg) {
            if (!arg) return { output: 'Usage: recall <query>' }
            if (!app.memory.hasEmbedder()) return { output: 'Memory is disabled: no embeddings provider configured.' }
            const hits = await app.memory.retrieve(arg, RECALL_LIMIT)
            if (hits.length === 0) return { output: 'Nothing stored yet.' }
            return { output: hits.map(h => `${h.similarity.toFixed(3)}  ${h.text}`).join('\n') }
        },
    },
    exit,
    quit: exit,
}

// Map lookup: "constructor" and friends are not commands
export const COMMANDS = new Map(Object.entries(commands))

function helpText(): string {
    const rows = [...COMMANDS]
        .filter(([name]) => name !== 'quit')
        .map(([, c]) => `  ${c.usage.padEnd(18)} ${c.summary}`)
    return ['Commands:', ...rows, '', 'Anything else is sent to the agent.'].join('\n')
}

function statusText(app: AppContext): string {
    const { settings } = app
    return [
        `${settings.APP_NAME} Status:`,
        `- Model: ${settings.LLM_PROVIDER}/${settings.DEFAULT_LLM_MODEL} (active: ${app.kernel.llm.activeModel ?? 'none'})`,
        `- Memory: ${app.memory.hasEmbedder() ? `${app.memory.size} items, dim ${app.memory.dim}` : 'disabled'}`,
        `- Tools: ${app.agent.tools.size}`,
        `- Scheduler: ${app.scheduler ? 'enabled' : 'disabled'}`,
    ].join('\n')
}

// Dispatches one input line: a known command word, or a turn for the agent
export async function handleLine(app: AppContext, line: string): Promise<CommandResult> {
    const input = line.trim()
    if (!input) return { output: '' }

    const [word = '', ...rest] = input.split(/\s+/)
    const command = COMMANDS.get(word.toLowerCase())
    const arg = rest.join(' ')

    try {
        if (command) return await command.run(app, arg)
        return { output: await app.agent.execute(input) }
    } catch (err) {
        return { output: `Error: ${errorMessage(err)}` }
    }
}

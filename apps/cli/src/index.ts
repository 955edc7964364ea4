#!/usr/bin/env tsx
import 'dotenv/config'
import * as readline from 'readline'
import { errorMessage, loadSettings } from '@tessera/shared'
import { buildApp } from './app-context'
import { handleLine } from './commands'

const DIM = '\x1b[2m%s\x1b[0m'
const YELLOW = '\x1b[33m%s\x1b[0m'
const RED = '\x1b[31m%s\x1b[0m'

async function main(): Promise<void> {
    const settings = loadSettings()
    const app = buildApp(settings)

    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: `${settings.APP_NAME.toLowerCase()}> `,
    })

    console.log(YELLOW, '----------------------------------------')
    console.log(YELLOW, `  ${settings.APP_NAME} - Interactive Agent Shell`)
    console.log(YELLOW, '----------------------------------------')
    console.log(DIM, `Model: ${settings.LLM_PROVIDER}/${settings.DEFAULT_LLM_MODEL}`)
    console.log('Type "help" for commands, "exit" to quit.\n')

    rl.prompt()

    rl.on('line', async line => {
        try {
            const result = await handleLine(app, line)
            if (result.output) console.log(result.output)
            if (result.exit) process.exit(0)
        } catch (err) {
            console.log(RED, `Error: ${errorMessage(err)}`)
        }

        console.log('')
        rl.prompt()
    }).on('close', () => {
        console.log('\nGoodbye!')
        process.exit(0)
    })
}

main().catch(err => {
    console.error(RED, `Fatal: ${errorMessage(err)}`)
    process.exit(1)
})

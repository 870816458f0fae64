import path from 'node:path'
import { Command, Option } from 'commander'
import { SESSIONS_DIR } from '../config/defaults.js'
import { loadConfig } from '../config/loader.js'
import type { PermissionMode } from '../config/schema.js'
import { createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { JsonSessionStore } from '../memory/session-store.js'
import { runOnce, startREPL } from './repl.js'
import { colors, formatError } from './ui.js'

export const VERSION = '0.1.0'

interface RootOptions {
    mode?: PermissionMode
    workspace?: string
    model?: string
    key?: string
    yes?: boolean
    sandbox?: boolean
    resume?: string
    debug?: boolean
}

async function run(instruction: string | undefined, options: RootOptions): Promise<number> {
    const fs = new NodeFileSystem()
    const config = await loadConfig({
        fs,
        projectDir: options.workspace,
        cliFlags: {
            model: options.model,
            apiKey: options.key,
            logLevel: options.debug ? 'debug' : undefined,
            permissionMode: options.yes ? 'full_autonomous' : options.mode,
            sandbox: options.sandbox ? { enabled: true } : undefined,
        },
    })

    if (!config.apiKey) {
        console.error(formatError('No API key. Set CODELOOM_API_KEY, pass --key or add apiKey to the config file.'))
        return 1
    }

    const container = createContainer(config)
    try {
        await container.initialize()

        const saved = options.resume ? await container.sessionStore.load(options.resume) : null
        if (options.resume && !saved) {
            console.error(formatError(`Session '${options.resume}' not found`))
            return 1
        }
        const engine = container.createEngine(saved ? { sessionId: saved.id, turns: saved.turns } : undefined)

        if (instruction) {
            const state = await runOnce(container, engine, instruction)
            await engine.close()
            return state.status === 'completed' ? 0 : 1
        }

        await startREPL(container, engine, VERSION)
        return 0
    } finally {
        await container.shutdown()
    }
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('codeloom')
        .description('Autonomous coding agent for your workspace')
        .version(VERSION)
        .argument('[instruction]', 'Run a single instruction instead of the interactive session')
        .addOption(
            new Option('--mode <mode>', 'Permission mode').choices(['full_autonomous', 'manual_approval', 'deny_all'])
        )
        .option('-w, --workspace <dir>', 'Workspace root (default: current directory)')
        .option('-m, --model <model>', 'Model to use')
        .option('-k, --key <key>', 'API key')
        .option('-y, --yes', 'Approve every tool call (full_autonomous)')
        .option('--sandbox', 'Run shell commands inside the OS sandbox')
        .option('--resume <sessionId>', 'Continue a saved session')
        .option('--debug', 'Enable debug logging')
        .action(async (instruction: string | undefined, options: RootOptions) => {
            try {
                process.exitCode = await run(instruction, options)
            } catch (error) {
                console.error(formatError(errorMessage(error)))
                process.exitCode = 1
            }
        })

    program
        .command('sessions')
        .description('List saved sessions of a workspace')
        .option('-w, --workspace <dir>', 'Workspace root (default: current directory)')
        .action(async (options: { workspace?: string }) => {
            const fs = new NodeFileSystem()
            const config = await loadConfig({ fs, projectDir: options.workspace })
            const store = new JsonSessionStore(fs, path.join(config.workspace, SESSIONS_DIR))
            const ids = await store.list()
            console.log(ids.length > 0 ? ids.join('\n') : colors.dim('No saved sessions.'))
        })

    return program
}

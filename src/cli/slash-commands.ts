import { PermissionModeSchema } from '../config/schema.js'
import type { Container } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import type { TaskEngine } from '../engine/task-engine.js'
import { colors, formatProcess, formatState } from './ui.js'

export interface ReplSession {
    container: Pick<Container, 'config' | 'gate' | 'supervisor' | 'sessionStore' | 'toolRegistry'>
    engine: Pick<TaskEngine, 'state' | 'sessionId' | 'turns' | 'cancel' | 'resume'>
}

interface SlashCommand {
    name: string
    description: string
    handler: (session: ReplSession, args: string) => Promise<string>
}

const commands: SlashCommand[] = [
    {
        name: '/help',
        description: 'Show commands',
        handler: async () => {
            const lines = commands.map((c) => `  ${colors.bold(c.name.padEnd(12))} ${c.description}`)
            return `Commands:\n${lines.join('\n')}\n  ${colors.bold('/exit'.padEnd(12))} Quit`
        },
    },
    {
        name: '/status',
        description: 'Show task state, mode and session',
        handler: async ({ container, engine }) =>
            [
                `State: ${formatState(engine.state)}`,
                `Mode: ${container.gate.mode}`,
                `Model: ${container.config.model}`,
                `Session: ${engine.sessionId} (${engine.turns.length} turns)`,
                `Live processes: ${container.supervisor.liveCount}`,
            ].join('\n'),
    },
    {
        name: '/mode',
        description: 'Show or set the permission mode',
        handler: async ({ container }, args) => {
            if (!args) return `Mode: ${container.gate.mode}`
            const parsed = PermissionModeSchema.safeParse(args)
            if (!parsed.success) return `Unknown mode '${args}'. Use ${PermissionModeSchema.options.join(', ')}`
            container.gate.setMode(parsed.data)
            return `Mode set to ${parsed.data}`
        },
    },
    {
        name: '/processes',
        description: 'List running commands',
        handler: async ({ container }) => {
            const live = container.supervisor.list()
            if (live.length === 0) return 'No running processes.'
            return live.map(formatProcess).join('\n')
        },
    },
    {
        name: '/kill',
        description: 'Terminate a running command by id',
        handler: async ({ container }, args) => {
            const id = Number.parseInt(args, 10)
            if (Number.isNaN(id)) return 'Usage: /kill <processId>'
            try {
                return formatProcess(await container.supervisor.kill(id))
            } catch (error) {
                return errorMessage(error)
            }
        },
    },
    {
        name: '/cancel',
        description: 'Cancel the current task',
        handler: async ({ engine }) => {
            await engine.cancel()
            return formatState(engine.state)
        },
    },
    {
        name: '/resume',
        description: 'Resume a paused task',
        handler: async ({ engine }) => formatState(await engine.resume()),
    },
    {
        name: '/sessions',
        description: 'List saved sessions',
        handler: async ({ container }) => {
            const ids = await container.sessionStore.list()
            return ids.length > 0 ? ids.join('\n') : 'No saved sessions.'
        },
    },
    {
        name: '/tools',
        description: 'List available tools',
        handler: async ({ container }) =>
            container.toolRegistry
                .listAll()
                .map((t) => `  ${colors.tool(t.name.padEnd(28))} ${colors.dim(t.riskClass)}`)
                .join('\n'),
    },
]

export function getSlashCommands(): { name: string; description: string }[] {
    return commands.map(({ name, description }) => ({ name, description }))
}

/** Runs a slash command; null when the input is not a known command. */
export async function handleSlashCommand(input: string, session: ReplSession): Promise<string | null> {
    const trimmed = input.trim()
    const space = trimmed.indexOf(' ')
    const name = space === -1 ? trimmed : trimmed.slice(0, space)
    const args = space === -1 ? '' : trimmed.slice(space + 1).trim()

    const command = commands.find((c) => c.name === name)
    if (!command) return null
    return command.handler(session, args)
}

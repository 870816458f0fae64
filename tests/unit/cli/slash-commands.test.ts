import { describe, expect, it, vi } from 'vitest'
import { getSlashCommands, handleSlashCommand, type ReplSession } from '../../../src/cli/slash-commands.js'
import type { TaskState } from '../../../src/engine/types.js'
import { InMemorySessionStore } from '../../../src/memory/session-store.js'
import { PermissionGate } from '../../../src/permissions/gate.js'
import { ProcessSupervisor } from '../../../src/process/supervisor.js'
import { readFileTool } from '../../../src/tools/filesystem/read.js'
import { ToolRegistry } from '../../../src/tools/registry.js'
import { createExecuteCommandTool } from '../../../src/tools/shell/execute-command.js'
import { NODE, SCRIPTS } from '../../helpers/children.js'
import { stripAnsi, testConfig } from '../../helpers/config.js'
import { silentLogger } from '../../helpers/logger.js'

function createSession(state: TaskState = { status: 'idle' }) {
    const logger = silentLogger()
    const toolRegistry = new ToolRegistry()
    toolRegistry.register(readFileTool)
    toolRegistry.register(createExecuteCommandTool({ inProgressThresholdMs: 100 }))
    const sessionStore = new InMemorySessionStore()
    const supervisor = new ProcessSupervisor({ killGraceMs: 300, outputTailBytes: 1024 }, logger)
    const engine = {
        state,
        sessionId: 'session-1',
        turns: [],
        cancel: vi.fn(async () => {}),
        resume: vi.fn(async (): Promise<TaskState> => ({ status: 'running' })),
    }
    const session: ReplSession = {
        container: {
            config: testConfig('/ws'),
            gate: new PermissionGate('manual_approval', logger),
            supervisor,
            sessionStore,
            toolRegistry,
        },
        engine,
    }
    return { session, engine, supervisor, sessionStore }
}

async function run(input: string, session: ReplSession): Promise<string | null> {
    const output = await handleSlashCommand(input, session)
    return output === null ? null : stripAnsi(output)
}

describe('slash commands', () => {
    it('returns null for unknown commands', async () => {
        const { session } = createSession()
        expect(await run('/nope', session)).toBeNull()
        expect(await run('plain text', session)).toBeNull()
    })

    it('lists every command in /help', async () => {
        const { session } = createSession()
        const help = await run('/help', session)

        for (const { name } of getSlashCommands()) {
            expect(help).toContain(name)
        }
        expect(help).toContain('/exit')
    })

    it('shows status', async () => {
        const { session } = createSession({ status: 'failed', error: 'boom' })
        expect(await run('/status', session)).toBe(
            [
                'State: failed: boom',
                'Mode: manual_approval',
                'Model: anthropic/claude-sonnet-4.5',
                'Session: session-1 (0 turns)',
                'Live processes: 0',
            ].join('\n')
        )
    })

    it('switches the permission mode', async () => {
        const { session } = createSession()
        expect(await run('/mode deny_all', session)).toBe('Mode set to deny_all')
        expect(session.container.gate.mode).toBe('deny_all')
        expect(await run('/mode', session)).toBe('Mode: deny_all')
        expect(await run('/mode reckless', session)).toBe(
            "Unknown mode 'reckless'. Use full_autonomous, manual_approval, deny_all"
        )
    })

    it('lists and kills running processes', async () => {
        const { session, supervisor } = createSession()
        try {
            expect(await run('/processes', session)).toBe('No running processes.')

            const id = supervisor.spawn(NODE, ['-e', SCRIPTS.sleepForever], { cwd: '/' })
            expect(await run('/processes', session)).toMatch(new RegExp(`^\\s*${id}  running`))

            expect(await run(`/kill ${id}`, session)).toMatch(new RegExp(`^\\s*${id}  killed`))
            expect(await run('/kill abc', session)).toBe('Usage: /kill <processId>')
            expect(await run('/kill 999', session)).toBe('Unknown process 999')
        } finally {
            await supervisor.shutdown()
        }
    })

    it('cancels and resumes through the engine', async () => {
        const { session, engine } = createSession({ status: 'paused' })

        await run('/cancel', session)
        expect(engine.cancel).toHaveBeenCalledOnce()

        expect(await run('/resume', session)).toBe('running')
        expect(engine.resume).toHaveBeenCalledOnce()
    })

    it('lists sessions and tools', async () => {
        const { session, sessionStore } = createSession()
        expect(await run('/sessions', session)).toBe('No saved sessions.')

        await sessionStore.save({ id: 'abc', createdAt: '', updatedAt: '', status: 'idle', turns: [] })
        expect(await run('/sessions', session)).toBe('abc')

        const tools = await run('/tools', session)
        expect(tools?.split('\n').map((line) => line.trim().split(/\s+/))).toEqual([
            ['read_file', 'safe'],
            ['execute_command', 'destructive'],
        ])
    })
})

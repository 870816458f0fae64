import path from 'node:path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import type { ResolvedConfig } from '../../src/config/schema.js'
import { type Container, createContainer } from '../../src/core/container.js'
import { FatalEngineError } from '../../src/core/errors.js'
import type { TaskEngine } from '../../src/engine/task-engine.js'
import { InMemorySessionStore } from '../../src/memory/session-store.js'
import { nodeScript, SCRIPTS } from '../helpers/children.js'
import { testConfig } from '../helpers/config.js'
import { toolResults } from '../helpers/engine-harness.js'
import { FakeProtocolHost } from '../helpers/fake-protocol-host.js'
import { silentLogger } from '../helpers/logger.js'
import { type ScriptedResponse, ScriptedModelClient, toolCall } from '../helpers/scripted-model-client.js'
import { createTestWorkspace, type TestWorkspace } from '../helpers/workspace.js'

interface Agent {
    ws: TestWorkspace
    container: Container
    engine: TaskEngine
    model: ScriptedModelClient
    approvals: string[]
}

let agent: Agent | undefined

async function startAgent(responses: ScriptedResponse[], overrides: Partial<ResolvedConfig> = {}): Promise<Agent> {
    const ws = await createTestWorkspace()
    const model = new ScriptedModelClient(responses)
    const config = testConfig(ws.root, overrides)
    const container = createContainer({ ...config, engine: { ...config.engine, inProgressThresholdMs: 150 } }, {
        logger: silentLogger(),
        model,
        sessionStore: new InMemorySessionStore(),
        hostFactory: (name) =>
            new FakeProtocolHost(name, [{ name: 'search', description: 'Search the docs', inputSchema: { type: 'object' } }], (req) => ({
                result: { content: [{ type: 'text', text: `results for ${JSON.stringify(req.params?.arguments)}` }] },
            })),
    })
    await container.initialize()
    const engine = container.createEngine()
    const approvals: string[] = []
    container.eventBus.on('approval:requested', ({ call }) => approvals.push(call.name))
    agent = { ws, container, engine, model, approvals }
    return agent
}

const complete = (result = 'Done.') => ({ toolCalls: [toolCall('attempt_completion', { result })] })

afterEach(async () => {
    if (!agent) return
    await agent.engine.close()
    await agent.container.shutdown()
    await agent.ws.cleanup()
    agent = undefined
})

describe('agent flow', () => {
    it('requires initialization before creating an engine', () => {
        const container = createContainer(testConfig('/tmp/codeloom-unused'), {
            logger: silentLogger(),
            model: new ScriptedModelClient([]),
            sessionStore: new InMemorySessionStore(),
        })
        expect(() => container.createEngine()).toThrow(FatalEngineError)
    })

    it('lists files under manual approval without asking', async () => {
        const { ws, engine, approvals } = await startAgent(
            [{ toolCalls: [toolCall('list_files', { path: '.' }, 'c1')] }, complete('Listed.')],
            { permissionMode: 'manual_approval' }
        )
        await ws.write({ 'main.ts': 'console.log(1)\n', 'lib/util.ts': '' })

        const state = await engine.run('what files are there?')

        expect(state).toEqual({ status: 'completed', summary: 'Listed.' })
        expect(approvals).toEqual([])
        expect(toolResults(engine.turns)[0]).toEqual({ callId: 'c1', content: 'lib/\nmain.ts', isError: false })
    })

    it('never spawns a rejected destructive command', async () => {
        const { ws, engine, container, approvals } = await startAgent(
            [{ toolCalls: [toolCall('execute_command', { command: 'rm -rf .' }, 'c1')] }, { text: 'Okay, I will not.' }],
            { permissionMode: 'manual_approval' }
        )
        await ws.write({ 'keep.txt': 'precious' })
        container.eventBus.on('approval:requested', ({ call }) => engine.reject(call.id, 'unsafe'))

        const state = await engine.run('clean up everything')

        expect(state).toEqual({ status: 'idle' })
        expect(approvals).toEqual(['execute_command'])
        expect(toolResults(engine.turns)).toEqual([{ callId: 'c1', content: 'unsafe', isError: true }])
        expect(container.supervisor.get(1)).toBeUndefined()
        expect(await ws.fs.readText(path.join(ws.root, 'keep.txt'))).toBe('precious')
    })

    it('manages a long-running interactive command across steps', async () => {
        const { engine, container } = await startAgent(
            [
                { toolCalls: [toolCall('execute_command', { command: nodeScript(SCRIPTS.echoStdin), interactive: true }, 'c1')] },
                { toolCalls: [toolCall('send_command_input', { processId: 1, input: 'ping' }, 'c2')] },
                { toolCalls: [toolCall('terminate_command', { processId: 1 }, 'c3')] },
                complete('Stopped the echo server.'),
            ],
            { permissionMode: 'full_autonomous' }
        )

        const state = await engine.run('start the echo server')

        expect(state).toEqual({ status: 'completed', summary: 'Stopped the echo server.' })
        const [started, sent, stopped] = toolResults(engine.turns).map((r) => ({
            head: String(r.content).split('\n')[0],
            isError: r.isError,
        }))
        expect(started).toEqual({ head: 'Process 1: running', isError: false })
        expect(sent).toEqual({ head: 'Process 1: running', isError: false })
        expect(stopped).toEqual({ head: 'Process 1: killed', isError: false })
        expect(container.supervisor.liveCount).toBe(0)
    })

    it('never invokes non-safe tools under deny_all', async () => {
        const { ws, engine, container } = await startAgent(
            [
                {
                    toolCalls: [
                        toolCall('execute_command', { command: 'touch created.txt' }, 'c1'),
                        toolCall('write_to_file', { path: 'x.txt', content: 'x' }, 'c2'),
                        toolCall('read_file', { path: 'a.txt' }, 'c3'),
                    ],
                },
                { text: 'Blocked.' },
            ],
            { permissionMode: 'deny_all' }
        )
        await ws.write({ 'a.txt': 'alpha' })

        await engine.run('try everything')

        expect(toolResults(engine.turns)).toEqual([
            {
                callId: 'c1',
                content: 'PermissionDeniedError: Permission mode deny_all forbids destructive tools',
                isError: true,
            },
            { callId: 'c2', content: 'PermissionDeniedError: Permission mode deny_all forbids mutating tools', isError: true },
            { callId: 'c3', content: 'alpha', isError: false },
        ])
        expect(container.supervisor.get(1)).toBeUndefined()
        expect(await ws.fs.exists(path.join(ws.root, 'x.txt'))).toBe(false)
    })

    it('kills every managed process on cancel', async () => {
        const { engine, container, model } = await startAgent(
            [{ toolCalls: [toolCall('execute_command', { command: nodeScript(SCRIPTS.sleepForever) }, 'c1')] }, { hang: true }],
            { permissionMode: 'full_autonomous' }
        )

        const running = engine.run('start a server')
        await vi.waitFor(() => expect(model.totalCalls).toBe(2), { timeout: 10_000 })
        expect(container.supervisor.liveCount).toBe(1)

        await engine.cancel()
        await running

        expect(engine.state).toEqual({ status: 'cancelled' })
        expect(container.supervisor.liveCount).toBe(0)
        expect(container.supervisor.get(1)?.state.status).toBe('killed')
    })

    it('keeps the conversation usable after a transport failure', async () => {
        const { engine } = await startAgent([{ error: new Error('socket hang up') }, complete()])

        expect(await engine.run('go')).toEqual({ status: 'idle' })
        expect(engine.turns.at(-1)).toMatchObject({ role: 'error', category: 'transport', message: 'socket hang up' })

        expect(await engine.sendMessage('retry')).toEqual({ status: 'completed', summary: 'Done.' })
    })

    it('reports paths outside the workspace as sandbox violations', async () => {
        const { engine } = await startAgent([
            { toolCalls: [toolCall('read_file', { path: '../../etc/passwd' }, 'c1')] },
            { text: 'Cannot read that.' },
        ])

        await engine.run('read the password file')

        const [result] = toolResults(engine.turns)
        expect(result?.isError).toBe(true)
        expect(String(result?.content)).toMatch(/^SandboxViolation: Path '\.\.\/\.\.\/etc\/passwd' resolves outside of workspace /)
    })

    it('routes namespaced calls to a connected protocol host', async () => {
        const { engine, container, model } = await startAgent(
            [{ toolCalls: [toolCall('mcp__docs__search', { query: 'streams' }, 'c1')] }, complete()],
            {
                permissionMode: 'full_autonomous',
                mcp: { servers: { docs: { command: 'docs-server', systemPrompt: 'Search the docs before answering.' } } },
            }
        )

        await engine.run('how do streams work?')

        expect(container.toolRegistry.isSealed).toBe(true)
        expect(toolResults(engine.turns)[0]).toEqual({
            callId: 'c1',
            content: [{ type: 'text', text: 'results for {"query":"streams"}' }],
            isError: false,
        })
        const system = model.getCall(0).params.messages[0]?.content
        expect(system).toContain('## MCP server: docs\n\nSearch the docs before answering.')
        expect(model.getCall(0).params.tools?.map((t) => t.function.name)).toContain('mcp__docs__search')
    })
})

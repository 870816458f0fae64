import { afterEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { TransportError, ValidationError } from '../../../src/core/errors.js'
import { CANCELLED_RESULT } from '../../../src/engine/task-engine.js'
import { createExecuteCommandTool } from '../../../src/tools/shell/execute-command.js'
import type { AnyTool } from '../../../src/tools/types.js'
import { createEngineHarness, DEFAULT_TEST_TOOLS, type EngineHarness, toolResults } from '../../helpers/engine-harness.js'
import { nodeScript, SCRIPTS } from '../../helpers/children.js'
import { toolCall } from '../../helpers/scripted-model-client.js'

function spyTool(name: string, riskClass: AnyTool['riskClass'], run: () => Promise<string> = async () => 'done') {
    const execute = vi.fn(run)
    const tool: AnyTool = { name, description: name, parameters: z.object({}), riskClass, execute }
    return { tool, execute }
}

const complete = (id: string, result = 'All done.') => ({ toolCalls: [toolCall('attempt_completion', { result }, id)] })

describe('TaskEngine', () => {
    let h: EngineHarness

    afterEach(async () => {
        await h.cleanup()
    })

    it('returns to idle after a plain text answer', async () => {
        h = await createEngineHarness({ responses: [{ text: 'Hello there' }] })

        const state = await h.engine.run('hi')

        expect(state).toEqual({ status: 'idle' })
        expect(h.engine.turns.map((t) => t.role)).toEqual(['user', 'assistant'])
        expect(h.engine.turns[1]).toMatchObject({ role: 'assistant', text: 'Hello there', toolCalls: [] })
        const messages = h.model.getCall(0).params.messages
        expect(messages[0]).toEqual({ role: 'system', content: 'You are a test agent.' })
        expect(messages[1]?.content).toMatch(/^hi\n\n<environment_details>\n/)
    })

    it('runs tools and completes through attempt_completion', async () => {
        h = await createEngineHarness({
            responses: [{ toolCalls: [toolCall('read_file', { path: 'a.txt' }, 'c1')] }, complete('c2', 'Read it.')],
        })
        await h.ws.write({ 'a.txt': 'alpha' })

        const state = await h.engine.run('read a.txt')

        expect(state).toEqual({ status: 'completed', summary: 'Read it.' })
        expect(h.engine.turns.map((t) => t.role)).toEqual(['user', 'assistant', 'tool', 'assistant', 'tool'])
        expect(toolResults(h.engine.turns)).toEqual([
            { callId: 'c1', content: 'alpha', isError: false },
            { callId: 'c2', content: 'Read it.', isError: false },
        ])
        expect(h.model.getCall(1).params.messages.at(-1)).toEqual({ role: 'tool', tool_call_id: 'c1', content: 'alpha' })
        expect(h.states).toEqual(['running', 'completed'])
    })

    it('ends the task with the question from ask_question', async () => {
        h = await createEngineHarness({
            responses: [{ toolCalls: [toolCall('ask_question', { question: 'Which database?' }, 'c1')] }],
        })

        expect(await h.engine.run('set up storage')).toEqual({ status: 'completed', summary: 'Which database?' })
    })

    it('answers malformed arguments with a validation error and keeps going', async () => {
        const { tool, execute } = spyTool('noop', 'safe')
        h = await createEngineHarness({
            responses: [{ toolCalls: [{ id: 'c1', name: 'noop', args: '{"path": ' }] }, { text: 'Sorry.' }],
            tools: [tool],
        })

        const state = await h.engine.run('go')

        expect(state.status).toBe('idle')
        const [result] = toolResults(h.engine.turns)
        expect(result?.isError).toBe(true)
        expect(String(result?.content)).toMatch(/^ValidationError: Malformed tool arguments: /)
        expect(execute).not.toHaveBeenCalled()
        expect(h.engine.turns[1]).toMatchObject({ toolCalls: [{ id: 'c1', arguments: {}, rawArguments: '{"path": ' }] })
    })

    it('rejects non-object arguments', async () => {
        h = await createEngineHarness({
            responses: [{ toolCalls: [{ id: 'c1', name: 'read_file', args: '[1, 2]' }] }, { text: 'ok' }],
        })

        await h.engine.run('go')

        expect(toolResults(h.engine.turns)[0]?.content).toBe(
            'ValidationError: Malformed tool arguments: expected a JSON object'
        )
    })

    it('answers unknown tools with a validation error', async () => {
        h = await createEngineHarness({ responses: [{ toolCalls: [toolCall('teleport', {}, 'c1')] }, { text: 'ok' }] })

        await h.engine.run('go')

        expect(toolResults(h.engine.turns)).toEqual([
            { callId: 'c1', content: "ValidationError: Tool 'teleport' not found", isError: true },
        ])
    })

    it('re-keys duplicate call ids', async () => {
        h = await createEngineHarness({
            responses: [
                { toolCalls: [toolCall('noop', {}, 'dup'), toolCall('noop', {}, 'dup')] },
                { text: 'ok' },
            ],
            tools: [spyTool('noop', 'safe').tool],
        })

        await h.engine.run('go')

        const ids = toolResults(h.engine.turns).map((r) => r.callId)
        expect(ids[0]).toBe('dup')
        expect(ids[1]).toMatch(/^call_/)
        expect(new Set(ids).size).toBe(2)
    })

    it('runs allowed calls concurrently and appends results in call order', async () => {
        const finished: string[] = []
        const slow = spyTool('slow', 'safe', async () => {
            await new Promise((r) => setTimeout(r, 100))
            finished.push('slow')
            return 'slow result'
        })
        const fast = spyTool('fast', 'safe', async () => {
            finished.push('fast')
            return 'fast result'
        })
        h = await createEngineHarness({
            responses: [{ toolCalls: [toolCall('slow', {}, 'c1'), toolCall('fast', {}, 'c2')] }, { text: 'ok' }],
            tools: [slow.tool, fast.tool],
        })

        await h.engine.run('go')

        expect(finished).toEqual(['fast', 'slow'])
        expect(toolResults(h.engine.turns).map((r) => r.content)).toEqual(['slow result', 'fast result'])
    })

    it('never invokes non-safe tools under deny_all', async () => {
        const { tool, execute } = spyTool('mutate', 'mutating')
        h = await createEngineHarness({
            responses: [{ toolCalls: [toolCall('mutate', {}, 'c1')] }, { text: 'ok' }],
            tools: [tool],
            mode: 'deny_all',
        })

        await h.engine.run('go')

        expect(execute).not.toHaveBeenCalled()
        expect(toolResults(h.engine.turns)).toEqual([
            { callId: 'c1', content: 'PermissionDeniedError: Permission mode deny_all forbids mutating tools', isError: true },
        ])
    })

    it('waits for operator approval in manual_approval', async () => {
        const { tool, execute } = spyTool('mutate', 'mutating')
        h = await createEngineHarness({
            responses: [{ toolCalls: [toolCall('mutate', {}, 'c1')] }, complete('c2')],
            tools: [tool, ...DEFAULT_TEST_TOOLS.filter((t) => t.name === 'attempt_completion')],
            mode: 'manual_approval',
        })
        h.bus.on('approval:requested', ({ call }) => {
            setTimeout(() => h.engine.approve(call.id), 10)
        })

        const state = await h.engine.run('go')

        expect(state.status).toBe('completed')
        expect(execute).toHaveBeenCalledOnce()
        expect(h.states).toEqual(['running', 'waiting_approval', 'running', 'completed'])
    })

    it('turns a rejection into an error result carrying the reason', async () => {
        const { tool, execute } = spyTool('mutate', 'destructive')
        h = await createEngineHarness({
            responses: [{ toolCalls: [toolCall('mutate', {}, 'c1')] }, { text: 'Understood.' }],
            tools: [tool],
            mode: 'manual_approval',
        })
        h.bus.on('approval:requested', ({ call }) => h.engine.reject(call.id, 'unsafe'))

        await h.engine.run('go')

        expect(execute).not.toHaveBeenCalled()
        expect(toolResults(h.engine.turns)).toEqual([{ callId: 'c1', content: 'unsafe', isError: true }])
        expect(h.model.getCall(1).params.messages.at(-1)).toEqual({ role: 'tool', tool_call_id: 'c1', content: 'Error: unsafe' })
    })

    it('records a transport failure as an error turn and returns to idle', async () => {
        h = await createEngineHarness({
            responses: [{ error: new TransportError('HTTP 503: Service Unavailable', { status: 503 }) }, { text: 'Back.' }],
        })
        const errors: string[] = []
        h.bus.on('step:error', ({ category, message }) => errors.push(`${category}: ${message}`))

        expect(await h.engine.run('go')).toEqual({ status: 'idle' })
        expect(h.engine.turns.at(-1)).toMatchObject({ role: 'error', category: 'transport', message: 'HTTP 503: Service Unavailable' })
        expect(errors).toEqual(['transport: HTTP 503: Service Unavailable'])

        expect(await h.engine.sendMessage('try again')).toEqual({ status: 'idle' })
        expect(h.engine.turns.map((t) => t.role)).toEqual(['user', 'error', 'user', 'assistant'])
        expect(h.model.getCall(1).params.messages.map((m) => m.role)).toEqual(['system', 'user', 'user'])
    })

    it('fails a task that exceeds the step limit', async () => {
        const read = () => ({ toolCalls: [toolCall('read_file', { path: 'a.txt' })] })
        h = await createEngineHarness({ responses: [read(), read(), read()], maxStepsPerTask: 2 })
        await h.ws.write({ 'a.txt': 'alpha' })

        expect(await h.engine.run('loop')).toEqual({ status: 'failed', error: 'Task exceeded 2 steps' })
        expect(h.model.totalCalls).toBe(2)
    })

    it('pauses at the next step boundary and resumes', async () => {
        const pauser = spyTool('pauser', 'safe', async () => {
            h.engine.pause()
            return 'pausing'
        })
        h = await createEngineHarness({
            responses: [{ toolCalls: [toolCall('pauser', {}, 'c1')] }, complete('c2')],
            tools: [pauser.tool, ...DEFAULT_TEST_TOOLS.filter((t) => t.name === 'attempt_completion')],
        })

        expect(await h.engine.run('go')).toEqual({ status: 'paused' })
        expect(h.model.totalCalls).toBe(1)

        expect(await h.engine.resume()).toEqual({ status: 'completed', summary: 'All done.' })
    })

    it('cancels an in-flight model request', async () => {
        h = await createEngineHarness({ responses: [{ hang: true }] })

        const running = h.engine.run('go')
        await vi.waitFor(() => expect(h.model.totalCalls).toBe(1))
        await expect(h.engine.startTask('another')).rejects.toThrow(ValidationError)

        await h.engine.cancel()
        await running

        expect(h.engine.state).toEqual({ status: 'cancelled' })
        expect(h.engine.turns.map((t) => t.role)).toEqual(['user'])
    })

    it('answers a call awaiting approval with a cancelled result', async () => {
        const { tool, execute } = spyTool('mutate', 'mutating')
        h = await createEngineHarness({
            responses: [{ toolCalls: [toolCall('mutate', {}, 'c1')] }],
            tools: [tool],
            mode: 'manual_approval',
        })

        const running = h.engine.run('go')
        await vi.waitFor(() => expect(h.engine.state.status).toBe('waiting_approval'))
        await h.engine.cancel()
        await running

        expect(h.engine.state).toEqual({ status: 'cancelled' })
        expect(h.gate.pending).toBeNull()
        expect(execute).not.toHaveBeenCalled()
        expect(toolResults(h.engine.turns)).toEqual([{ callId: 'c1', content: CANCELLED_RESULT, isError: true }])
    })

    it('kills the processes of a call still in flight on cancel', async () => {
        h = await createEngineHarness({
            responses: [{ toolCalls: [toolCall('execute_command', { command: nodeScript(SCRIPTS.sleepForever) }, 'c1')] }],
            tools: [createExecuteCommandTool({ inProgressThresholdMs: 60_000 })],
        })
        const killForCall = vi.spyOn(h.ws.supervisor, 'killForCall')

        const running = h.engine.run('serve')
        await vi.waitFor(() => expect(h.ws.supervisor.liveCount).toBe(1), { timeout: 10_000 })
        await h.engine.cancel()
        await running

        expect(killForCall).toHaveBeenCalledWith('c1')
        expect(h.ws.supervisor.liveCount).toBe(0)
        expect(h.engine.state).toEqual({ status: 'cancelled' })
        expect(toolResults(h.engine.turns)).toEqual([{ callId: 'c1', content: CANCELLED_RESULT, isError: true }])
    })

    it('persists the session when the task settles', async () => {
        h = await createEngineHarness({ responses: [complete('c1')] })

        await h.engine.run('finish')

        const record = await h.sessionStore.load(h.engine.sessionId)
        expect(record?.status).toBe('completed')
        expect(record?.turns.map((t) => t.role)).toEqual(['user', 'assistant', 'tool'])
    })

    it('continues a restored session', async () => {
        h = await createEngineHarness({ responses: [{ text: 'First.' }, { text: 'Second.' }] })
        await h.engine.run('one')

        const restored = h.createEngine({ sessionId: h.engine.sessionId, turns: h.engine.turns })
        await restored.run('two')

        expect(restored.sessionId).toBe(h.engine.sessionId)
        expect(restored.turns.map((t) => t.role)).toEqual(['user', 'assistant', 'user', 'assistant'])
        expect(h.model.getCall(1).params.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user'])
    })

    it('announces the end of the session on close', async () => {
        h = await createEngineHarness({ responses: [{ text: 'Hi.' }] })
        const ended = vi.fn()
        h.bus.on('session:end', ended)
        await h.engine.run('hello')

        await h.engine.close()

        expect(ended).toHaveBeenCalledWith({ sessionId: h.engine.sessionId, turns: 2 })
    })
})

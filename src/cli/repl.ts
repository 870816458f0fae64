import type { Container } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import type { TaskEngine } from '../engine/task-engine.js'
import type { TaskState } from '../engine/types.js'
import { promptInput } from './input.js'
import { askApproval } from './prompts.js'
import { handleSlashCommand } from './slash-commands.js'
import { banner, colors, formatError, formatState, formatToolCall } from './ui.js'

/** Prints streamed text, tool activity and approval prompts for one engine. Returns a disposer. */
export function attachConsole(container: Container, engine: TaskEngine): () => void {
    const { eventBus } = container
    const out = process.stdout

    const subscriptions = [
        eventBus.on('text:delta', ({ delta }) => out.write(delta)),
        eventBus.on('tool:before', ({ call }) => out.write(`\n${colors.dim('→')} ${formatToolCall(call)}\n`)),
        eventBus.on('tool:progress', ({ chunk }) => out.write(colors.dim(chunk.data))),
        eventBus.on('tool:after', ({ call, duration, isError }) => {
            const label = isError ? colors.error('failed') : colors.success('done')
            out.write(`${colors.dim('←')} ${call.name} ${label} ${colors.dim(`${duration}ms`)}\n`)
        }),
        eventBus.on('step:error', ({ category, message }) => out.write(`\n${formatError(`${category}: ${message}`)}\n`)),
        eventBus.on('approval:requested', ({ call, riskClass }) => {
            askApproval(call, riskClass)
                .then((answer) => {
                    if (answer.kind === 'approve') engine.approve(call.id, { remember: answer.remember })
                    else engine.reject(call.id, answer.reason)
                })
                .catch((error: unknown) => {
                    container.logger.warn({ error: errorMessage(error) }, 'repl:approval-failed')
                    engine.reject(call.id, 'Approval prompt failed')
                })
        }),
    ]

    return () => {
        for (const unsubscribe of subscriptions) unsubscribe()
    }
}

async function runWithInterrupt(engine: TaskEngine, work: () => Promise<TaskState>): Promise<TaskState> {
    const onInterrupt = () => {
        process.stdout.write(`\n${colors.warn('Cancelling…')}\n`)
        engine.cancel().catch((error: unknown) => process.stderr.write(formatError(errorMessage(error))))
    }
    process.once('SIGINT', onInterrupt)
    try {
        return await work()
    } finally {
        process.removeListener('SIGINT', onInterrupt)
    }
}

export async function runOnce(container: Container, engine: TaskEngine, instruction: string): Promise<TaskState> {
    const detach = attachConsole(container, engine)
    try {
        const state = await runWithInterrupt(engine, () => engine.run(instruction))
        process.stdout.write(`\n${formatState(state)}\n`)
        return state
    } finally {
        detach()
    }
}

export async function startREPL(container: Container, engine: TaskEngine, version: string): Promise<void> {
    console.log(banner(version))
    console.log(colors.dim(`Model: ${container.config.model} · Mode: ${container.gate.mode}`))
    console.log(colors.dim(`Workspace: ${container.config.workspace}`))
    console.log(colors.dim('Type /help for commands, /exit to quit\n'))

    const detach = attachConsole(container, engine)
    try {
        while (true) {
            const input = await promptInput()
            if (input === null) break

            const text = input.trim()
            if (!text) continue
            if (text === '/exit' || text === '/quit') break

            if (text.startsWith('/')) {
                try {
                    const result = await handleSlashCommand(text, { container, engine })
                    console.log(result ?? colors.warn(`Unknown command ${text.split(' ')[0]}. Type /help`))
                } catch (error) {
                    console.log(formatError(errorMessage(error)))
                }
                continue
            }

            const state = await runWithInterrupt(engine, () => engine.sendMessage(text))
            console.log(`\n${formatState(state)}\n`)
        }
    } finally {
        detach()
        await engine.close()
        console.log(colors.dim('Goodbye!'))
    }
}

import { contentToText } from '../conversation/conversation.js'
import type { Turn } from '../conversation/types.js'
import type { FileSystem } from '../core/fs.js'
import { IGNORED_DIRECTORIES } from '../tools/filesystem/scope.js'
import type { ChatMessage } from './types.js'

export const MAX_ENVIRONMENT_FILES = 200

export interface SystemPromptInput {
    workspace: string
    userInstructions: string
    /** Extra instructions contributed by connected MCP servers, keyed by server name. */
    serverPrompts?: Record<string, string>
}

export function buildSystemPrompt(input: SystemPromptInput): string {
    const sections = [
        `## Role\n\n${input.userInstructions}`,
        [
            '## Tool use',
            '',
            '- Use one tool at a time when a step depends on the result of the previous one; independent reads may be issued together.',
            '- Paths are relative to the workspace root. Paths outside the workspace are rejected.',
            '- Prefer replace_in_file for small edits and write_to_file for new files or full rewrites.',
            '- Commands that are still running after a short wait return a managed process id. Poll them with get_command_result, feed them with send_command_input and stop them with terminate_command.',
            '- When the task is done, call attempt_completion with the result. If you need information only the operator has, call ask_question.',
        ].join('\n'),
        `## Workspace\n\nThe workspace root is ${input.workspace}. The shell starts there.`,
    ]

    for (const [server, prompt] of Object.entries(input.serverPrompts ?? {})) {
        sections.push(`## MCP server: ${server}\n\n${prompt}`)
    }

    return sections.join('\n\n')
}

/** Workspace summary attached to every user message. */
export async function describeEnvironment(fs: FileSystem, workspace: string, now = new Date()): Promise<string> {
    const files = await fs.glob('**', {
        cwd: workspace,
        deep: 3,
        onlyFiles: false,
        ignore: IGNORED_DIRECTORIES,
    })
    const listed = files.slice(0, MAX_ENVIRONMENT_FILES)
    const more = files.length > listed.length ? `\n(${files.length - listed.length} more entries not shown)` : ''

    return [
        '<environment_details>',
        `Current time: ${now.toISOString()}`,
        `Working directory: ${workspace}`,
        '',
        'Files:',
        listed.length > 0 ? listed.join('\n') + more : 'No files found.',
        '</environment_details>',
    ].join('\n')
}

/**
 * Converts the conversation log into chat messages. Error turns stay local and
 * are not sent to the model.
 */
export function toChatMessages(systemPrompt: string, turns: readonly Turn[]): ChatMessage[] {
    const messages: ChatMessage[] = [{ role: 'system', content: systemPrompt }]

    for (const turn of turns) {
        switch (turn.role) {
            case 'user':
                messages.push({
                    role: 'user',
                    content: turn.environment ? `${turn.content}\n\n${turn.environment}` : turn.content,
                })
                break
            case 'assistant':
                messages.push({
                    role: 'assistant',
                    content: turn.text || null,
                    tool_calls:
                        turn.toolCalls.length > 0
                            ? turn.toolCalls.map((call) => ({
                                  id: call.id,
                                  type: 'function' as const,
                                  function: {
                                      name: call.name,
                                      arguments: call.rawArguments ?? JSON.stringify(call.arguments),
                                  },
                              }))
                            : undefined,
                })
                break
            case 'tool':
                messages.push({
                    role: 'tool',
                    tool_call_id: turn.callId,
                    content: turn.isError ? `Error: ${contentToText(turn.content)}` : contentToText(turn.content),
                })
                break
            case 'error':
                break
        }
    }

    return messages
}

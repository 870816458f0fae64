import { z } from 'zod'
import type { Tool } from '../types.js'

const CompletionInput = z.object({
    result: z.string().describe('Final result of the task, written so the operator needs no follow-up'),
    command: z.string().optional().describe('Optional command the operator can run to see the result'),
})

type CompletionInput = z.infer<typeof CompletionInput>

export const attemptCompletionTool: Tool<CompletionInput> = {
    name: 'attempt_completion',
    description:
        'Present the result of the task to the operator once every step is done and confirmed. ' +
        'Ends the task',
    parameters: CompletionInput,
    riskClass: 'safe',
    async execute(input) {
        return input.command ? `${input.result}\n\nTo see the result run: ${input.command}` : input.result
    },
}

const QuestionInput = z.object({
    question: z.string().describe('Question for the operator'),
    options: z.array(z.string()).max(5).optional().describe('Optional answers the operator can pick from'),
})

type QuestionInput = z.infer<typeof QuestionInput>

export const askQuestionTool: Tool<QuestionInput> = {
    name: 'ask_question',
    description:
        'Ask the operator a question when required information is missing. ' +
        'Ends the current turn; the answer arrives as the next user message',
    parameters: QuestionInput,
    riskClass: 'safe',
    async execute(input) {
        if (!input.options?.length) return input.question
        return `${input.question}\n${input.options.map((o, i) => `${i + 1}. ${o}`).join('\n')}`
    },
}

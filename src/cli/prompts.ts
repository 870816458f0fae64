import * as clack from '@clack/prompts'
import type { ToolCall } from '../conversation/types.js'
import type { RiskClass } from '../tools/types.js'
import { colors, formatToolCall } from './ui.js'

export type ApprovalAnswer = { kind: 'approve'; remember: boolean } | { kind: 'reject'; reason: string }

export async function askApproval(call: ToolCall, riskClass: RiskClass): Promise<ApprovalAnswer> {
    const choice = await clack.select({
        message: `Allow ${colors.warn(riskClass)} tool ${formatToolCall(call)}?`,
        options: [
            { value: 'once', label: 'Approve' },
            { value: 'always', label: `Always approve ${call.name} this session` },
            { value: 'reject', label: 'Reject' },
        ],
    })

    if (clack.isCancel(choice) || choice === 'reject') {
        const reason = await clack.text({ message: 'Reason (sent to the model)', placeholder: 'unsafe' })
        return { kind: 'reject', reason: clack.isCancel(reason) || !reason ? 'Rejected by the operator' : reason }
    }
    return { kind: 'approve', remember: choice === 'always' }
}


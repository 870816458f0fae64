import type { PermissionMode } from '../config/schema.js'
import type { ToolCall } from '../conversation/types.js'
import type { RiskClass } from '../tools/types.js'

export type { PermissionMode }

export type PermissionDecision = { kind: 'allow' } | { kind: 'deny'; reason: string } | { kind: 'ask' }

export type ApprovalOutcome = { approved: true } | { approved: false; reason: string }

export interface PendingApproval {
    call: ToolCall
    riskClass: RiskClass
}

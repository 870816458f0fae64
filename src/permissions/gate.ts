import type { ToolCall } from '../conversation/types.js'
import { PermissionDeniedError, ValidationError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import type { RiskClass } from '../tools/types.js'
import type { ApprovalOutcome, PendingApproval, PermissionDecision, PermissionMode } from './types.js'

/** Pure decision over mode and risk class. */
export function decide(mode: PermissionMode, riskClass: RiskClass): PermissionDecision {
    switch (mode) {
        case 'full_autonomous':
            return { kind: 'allow' }
        case 'deny_all':
            return riskClass === 'safe'
                ? { kind: 'allow' }
                : { kind: 'deny', reason: `Permission mode deny_all forbids ${riskClass} tools` }
        case 'manual_approval':
            return riskClass === 'safe' ? { kind: 'allow' } : { kind: 'ask' }
    }
}

interface PendingEntry extends PendingApproval {
    settle: (outcome: ApprovalOutcome) => void
    outcome: Promise<ApprovalOutcome>
}

/**
 * Authorizes tool calls and holds the single outstanding operator approval.
 * Tools approved with `remember` skip the prompt for the rest of the session.
 */
export class PermissionGate {
    private pendingEntry: PendingEntry | null = null
    /** Outcomes decided before anyone waited on them, e.g. by a synchronous listener. */
    private uncollected = new Map<string, Promise<ApprovalOutcome>>()
    private sessionAllowed = new Set<string>()

    constructor(
        private currentMode: PermissionMode,
        private logger: Logger,
        private eventBus?: TypedEventEmitter
    ) {}

    get mode(): PermissionMode {
        return this.currentMode
    }

    setMode(mode: PermissionMode): void {
        this.currentMode = mode
        this.logger.info({ mode }, 'permission:mode')
    }

    get pending(): PendingApproval | null {
        if (!this.pendingEntry) return null
        return { call: this.pendingEntry.call, riskClass: this.pendingEntry.riskClass }
    }

    /**
     * Decides a call. An `ask` registers it as the pending approval; asking while
     * another approval is outstanding throws `PermissionDeniedError`.
     */
    authorize(call: ToolCall, riskClass: RiskClass): PermissionDecision {
        let decision = decide(this.currentMode, riskClass)
        if (decision.kind === 'ask' && this.sessionAllowed.has(call.name)) {
            decision = { kind: 'allow' }
        }

        this.logger.debug({ tool: call.name, callId: call.id, riskClass, decision: decision.kind }, 'permission:decide')
        if (decision.kind !== 'ask') return decision

        if (this.pendingEntry) {
            throw new PermissionDeniedError(
                `Approval for '${this.pendingEntry.call.id}' is still pending; cannot ask for '${call.id}'`
            )
        }

        let settle: (outcome: ApprovalOutcome) => void = () => {}
        const outcome = new Promise<ApprovalOutcome>((resolve) => {
            settle = resolve
        })
        this.pendingEntry = { call, riskClass, settle, outcome }
        this.eventBus?.emit('approval:requested', { call, riskClass })
        return decision
    }

    approve(callId: string, options: { remember?: boolean } = {}): void {
        const entry = this.take(callId)
        if (options.remember) this.sessionAllowed.add(entry.call.name)
        this.eventBus?.emit('approval:resolved', { callId, approved: true })
        entry.settle({ approved: true })
    }

    reject(callId: string, reason: string): void {
        const entry = this.take(callId)
        this.eventBus?.emit('approval:resolved', { callId, approved: false, reason })
        entry.settle({ approved: false, reason })
    }

    /** Settles when the operator decides, or rejects with the abort reason when `signal` fires first. */
    async waitForDecision(callId: string, signal: AbortSignal): Promise<ApprovalOutcome> {
        const decided = this.uncollected.get(callId)
        if (decided) {
            this.uncollected.delete(callId)
            return decided
        }

        const entry = this.pendingEntry
        if (!entry || entry.call.id !== callId) {
            throw new ValidationError(`No pending approval for call '${callId}'`)
        }

        if (signal.aborted) {
            this.clear()
            throw signal.reason
        }

        let onAbort: (() => void) | undefined
        try {
            return await Promise.race([
                entry.outcome,
                new Promise<never>((_, reject) => {
                    onAbort = () => {
                        this.clear()
                        reject(signal.reason)
                    }
                    signal.addEventListener('abort', onAbort, { once: true })
                }),
            ])
        } finally {
            this.uncollected.delete(callId)
            if (onAbort) signal.removeEventListener('abort', onAbort)
        }
    }

    /** Drops the pending approval without resolving it. */
    clear(): void {
        this.pendingEntry = null
        this.uncollected.clear()
    }

    resetSession(): void {
        this.sessionAllowed.clear()
    }

    private take(callId: string): PendingEntry {
        const entry = this.pendingEntry
        if (!entry || entry.call.id !== callId) {
            throw new ValidationError(`No pending approval for call '${callId}'`)
        }
        this.pendingEntry = null
        this.uncollected.set(callId, entry.outcome)
        return entry
    }
}

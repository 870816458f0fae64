import { describe, expect, it, vi } from 'vitest'
import { PermissionDeniedError, ValidationError } from '../../../src/core/errors.js'
import { TypedEventEmitter } from '../../../src/core/events.js'
import { decide, PermissionGate } from '../../../src/permissions/gate.js'
import type { RiskClass } from '../../../src/tools/types.js'
import { silentLogger } from '../../helpers/logger.js'

const RISKS: RiskClass[] = ['safe', 'mutating', 'destructive', 'network']
const call = (id: string, name = 'execute_command') => ({ id, name, arguments: {} })

describe('decide', () => {
    it('allows everything in full_autonomous', () => {
        for (const risk of RISKS) expect(decide('full_autonomous', risk)).toEqual({ kind: 'allow' })
    })

    it('asks for everything but safe tools in manual_approval', () => {
        expect(decide('manual_approval', 'safe')).toEqual({ kind: 'allow' })
        for (const risk of RISKS.slice(1)) expect(decide('manual_approval', risk)).toEqual({ kind: 'ask' })
    })

    it('denies everything but safe tools in deny_all', () => {
        expect(decide('deny_all', 'safe')).toEqual({ kind: 'allow' })
        expect(decide('deny_all', 'network')).toEqual({
            kind: 'deny',
            reason: 'Permission mode deny_all forbids network tools',
        })
    })

    it('never asks outside manual_approval', () => {
        for (const mode of ['full_autonomous', 'deny_all'] as const) {
            for (const risk of RISKS) expect(decide(mode, risk).kind).not.toBe('ask')
        }
    })
})

describe('PermissionGate', () => {
    it('holds an ask as the single pending approval', () => {
        const gate = new PermissionGate('manual_approval', silentLogger())
        expect(gate.authorize(call('c1'), 'destructive')).toEqual({ kind: 'ask' })
        expect(gate.pending?.call.id).toBe('c1')

        expect(() => gate.authorize(call('c2'), 'mutating')).toThrow(PermissionDeniedError)
        expect(gate.authorize(call('c3', 'read_file'), 'safe')).toEqual({ kind: 'allow' })
    })

    it('settles the pending decision on approve', async () => {
        const bus = new TypedEventEmitter()
        const resolved = vi.fn()
        bus.on('approval:resolved', resolved)
        const gate = new PermissionGate('manual_approval', silentLogger(), bus)
        gate.authorize(call('c1'), 'destructive')

        const decision = gate.waitForDecision('c1', new AbortController().signal)
        gate.approve('c1')

        expect(await decision).toEqual({ approved: true })
        expect(gate.pending).toBeNull()
        expect(resolved).toHaveBeenCalledWith({ callId: 'c1', approved: true })
    })

    it('carries the rejection reason', async () => {
        const gate = new PermissionGate('manual_approval', silentLogger())
        gate.authorize(call('c1'), 'destructive')

        const decision = gate.waitForDecision('c1', new AbortController().signal)
        gate.reject('c1', 'unsafe')

        expect(await decision).toEqual({ approved: false, reason: 'unsafe' })
    })

    it('rejects decisions for calls that are not pending', () => {
        const gate = new PermissionGate('manual_approval', silentLogger())
        expect(() => gate.approve('c9')).toThrow(ValidationError)
        expect(() => gate.reject('c9', 'no')).toThrow("No pending approval for call 'c9'")
    })

    it('remembers approvals per tool for the session', () => {
        const gate = new PermissionGate('manual_approval', silentLogger())
        gate.authorize(call('c1'), 'destructive')
        gate.approve('c1', { remember: true })

        expect(gate.authorize(call('c2'), 'destructive')).toEqual({ kind: 'allow' })
        expect(gate.authorize(call('c3', 'write_to_file'), 'mutating')).toEqual({ kind: 'ask' })

        gate.clear()
        gate.resetSession()
        expect(gate.authorize(call('c4'), 'destructive')).toEqual({ kind: 'ask' })
    })

    it('drops the pending approval when the wait is aborted', async () => {
        const gate = new PermissionGate('manual_approval', silentLogger())
        gate.authorize(call('c1'), 'destructive')
        const controller = new AbortController()

        const decision = gate.waitForDecision('c1', controller.signal)
        controller.abort(new Error('cancelled'))

        await expect(decision).rejects.toThrow('cancelled')
        expect(gate.pending).toBeNull()
    })

    it('applies mode changes to later calls', () => {
        const gate = new PermissionGate('manual_approval', silentLogger())
        gate.setMode('deny_all')
        expect(gate.mode).toBe('deny_all')
        expect(gate.authorize(call('c1'), 'mutating').kind).toBe('deny')
    })
})

describe('PermissionGate with synchronous listeners', () => {
    it('keeps a decision made inside the approval:requested listener', async () => {
        const bus = new TypedEventEmitter()
        const gate = new PermissionGate('manual_approval', silentLogger(), bus)
        bus.on('approval:requested', ({ call }) => gate.reject(call.id, 'not now'))

        expect(gate.authorize(call('c1'), 'destructive')).toEqual({ kind: 'ask' })

        expect(await gate.waitForDecision('c1', new AbortController().signal)).toEqual({
            approved: false,
            reason: 'not now',
        })
        await expect(gate.waitForDecision('c1', new AbortController().signal)).rejects.toThrow(ValidationError)
    })
})

import { describe, expect, it, vi } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'

describe('TypedEventEmitter', () => {
    it('delivers events to subscribers', () => {
        const bus = new TypedEventEmitter()
        const handler = vi.fn()
        bus.on('step:error', handler)

        bus.emit('step:error', { category: 'transport', message: 'down' })

        expect(handler).toHaveBeenCalledWith({ category: 'transport', message: 'down' })
    })

    it('stops delivery after unsubscribe', () => {
        const bus = new TypedEventEmitter()
        const handler = vi.fn()
        const off = bus.on('session:end', handler)
        off()

        bus.emit('session:end', { sessionId: 's1', turns: 0 })

        expect(handler).not.toHaveBeenCalled()
    })

    it('keeps delivering when a listener throws', () => {
        const bus = new TypedEventEmitter()
        const second = vi.fn()
        bus.on('session:end', () => {
            throw new Error('listener bug')
        })
        bus.on('session:end', second)

        expect(() => bus.emit('session:end', { sessionId: 's1', turns: 2 })).not.toThrow()
        expect(second).toHaveBeenCalledOnce()
    })

    it('removeAll drops every handler', () => {
        const bus = new TypedEventEmitter()
        const handler = vi.fn()
        bus.on('session:end', handler)
        bus.removeAll()

        bus.emit('session:end', { sessionId: 's1', turns: 0 })

        expect(handler).not.toHaveBeenCalled()
    })
})

import { describe, expect, it } from 'vitest'
import { err, ok, type Result } from '../../../src/core/result.js'

function parsePort(value: string): Result<number> {
    const port = Number(value)
    return Number.isInteger(port) && port > 0 ? ok(port) : err(`invalid port '${value}'`)
}

describe('Result', () => {
    it('wraps a success value', () => {
        const result = parsePort('8080')
        expect(result).toEqual({ ok: true, value: 8080 })
    })

    it('wraps an error', () => {
        const result = parsePort('abc')
        expect(result.ok).toBe(false)
        if (!result.ok) expect(result.error).toBe("invalid port 'abc'")
    })
})

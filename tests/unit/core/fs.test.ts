import { describe, expect, it } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'

describe('MockFileSystem', () => {
    it('reads back written files', async () => {
        const fs = new MockFileSystem()
        await fs.writeJSON('/ws/a.json', { a: 1 })

        expect(await fs.readJSON('/ws/a.json')).toEqual({ a: 1 })
        expect(await fs.exists('/ws')).toBe(true)
        expect((await fs.stat('/ws')).isDirectory).toBe(true)
    })

    it('throws on missing files', async () => {
        const fs = new MockFileSystem()
        await expect(fs.readText('/nope')).rejects.toThrow('ENOENT: /nope')
    })

    it('matches globs relative to cwd', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/ws/a.ts', '')
        fs.setFile('/ws/src/b.ts', '')
        fs.setFile('/ws/src/c.js', '')
        fs.setFile('/other/d.ts', '')

        expect(await fs.glob('**/*.ts', { cwd: '/ws' })).toEqual(['a.ts', 'src/b.ts'])
        expect(await fs.glob('*.ts', { cwd: '/ws' })).toEqual(['a.ts'])
        expect(await fs.glob('**/*.ts', { cwd: '/ws', absolute: true })).toEqual(['/ws/a.ts', '/ws/src/b.ts'])
    })
})

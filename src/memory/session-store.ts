import path from 'node:path'
import { z } from 'zod'
import type { Turn } from '../conversation/types.js'
import type { FileSystem } from '../core/fs.js'
import type { TaskStatus } from '../engine/types.js'

export interface SessionRecord {
    id: string
    createdAt: string
    updatedAt: string
    status: TaskStatus
    turns: Turn[]
}

export interface SessionStore {
    save(record: SessionRecord): Promise<void>
    load(id: string): Promise<SessionRecord | null>
    list(): Promise<string[]>
}

const SessionHeaderSchema = z.object({
    id: z.string(),
    createdAt: z.string(),
    updatedAt: z.string(),
    status: z.enum(['idle', 'running', 'waiting_approval', 'paused', 'completed', 'failed', 'cancelled']),
    turns: z.array(z.object({ role: z.enum(['user', 'assistant', 'tool', 'error']) }).passthrough()),
})

function isTurn(value: unknown): value is Turn {
    return typeof value === 'object' && value !== null && 'role' in value && 'timestamp' in value
}

/** One pretty-printed JSON file per session under `dir`. */
export class JsonSessionStore implements SessionStore {
    constructor(
        private fs: FileSystem,
        private dir: string
    ) {}

    pathFor(id: string): string {
        return path.join(this.dir, `${id}.json`)
    }

    async save(record: SessionRecord): Promise<void> {
        await this.fs.writeJSON(this.pathFor(record.id), record)
    }

    async load(id: string): Promise<SessionRecord | null> {
        const file = this.pathFor(id)
        if (!(await this.fs.exists(file))) return null

        const parsed = SessionHeaderSchema.parse(await this.fs.readJSON<unknown>(file))
        const turns: unknown[] = parsed.turns
        return { ...parsed, turns: turns.filter(isTurn) }
    }

    async list(): Promise<string[]> {
        if (!(await this.fs.exists(this.dir))) return []
        const files = await this.fs.glob('*.json', { cwd: this.dir })
        return files.map((f) => path.basename(f, '.json'))
    }
}

/** Keeps sessions in memory; used when persistence is disabled and in tests. */
export class InMemorySessionStore implements SessionStore {
    private records = new Map<string, SessionRecord>()

    async save(record: SessionRecord): Promise<void> {
        this.records.set(record.id, structuredClone(record))
    }

    async load(id: string): Promise<SessionRecord | null> {
        const record = this.records.get(id)
        return record ? structuredClone(record) : null
    }

    async list(): Promise<string[]> {
        return [...this.records.keys()]
    }
}

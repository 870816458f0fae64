import { mkdir, readFile, readlink, realpath, rm, stat, writeFile } from 'node:fs/promises'
import path from 'node:path'
import fg from 'fast-glob'

export interface GlobOptions {
    cwd?: string
    /** Maximum directory depth, 1 meaning direct children only. */
    deep?: number
    onlyFiles?: boolean
    ignore?: string[]
    absolute?: boolean
}

export interface FileStat {
    isFile: boolean
    isDirectory: boolean
    size: number
}

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON<T>(path: string): Promise<T>
    writeText(path: string, content: string): Promise<void>
    writeJSON(path: string, data: unknown): Promise<void>
    exists(path: string): Promise<boolean>
    stat(path: string): Promise<FileStat>
    glob(pattern: string, options?: GlobOptions): Promise<string[]>
    /**
     * Canonical path with every symlink resolved. For a path that does not exist
     * yet, the missing tail is appended to its nearest existing ancestor.
     */
    realpath(path: string): Promise<string>
    mkdir(path: string): Promise<void>
    remove(path: string): Promise<void>
}

function errnoCode(error: unknown): unknown {
    return error instanceof Error && 'code' in error ? error.code : undefined
}

export class NodeFileSystem implements FileSystem {
    async readText(filePath: string): Promise<string> {
        return readFile(filePath, 'utf8')
    }

    async readJSON<T>(filePath: string): Promise<T> {
        return JSON.parse(await this.readText(filePath))
    }

    async writeText(filePath: string, content: string): Promise<void> {
        await mkdir(path.dirname(filePath), { recursive: true })
        await writeFile(filePath, content, 'utf8')
    }

    async writeJSON(filePath: string, data: unknown): Promise<void> {
        await this.writeText(filePath, JSON.stringify(data, null, 2))
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await stat(filePath)
            return true
        } catch {
            return false
        }
    }

    async stat(filePath: string): Promise<FileStat> {
        const s = await stat(filePath)
        return { isFile: s.isFile(), isDirectory: s.isDirectory(), size: s.size }
    }

    async glob(pattern: string, options: GlobOptions = {}): Promise<string[]> {
        const results = await fg(pattern, {
            cwd: options.cwd ?? '.',
            deep: options.deep,
            onlyFiles: options.onlyFiles ?? true,
            ignore: options.ignore,
            absolute: options.absolute ?? false,
            markDirectories: true,
            dot: true,
            followSymbolicLinks: false,
        })
        return results.sort()
    }

    async realpath(filePath: string): Promise<string> {
        try {
            return await realpath(filePath)
        } catch (error) {
            if (errnoCode(error) !== 'ENOENT') throw error
        }

        // a dangling link is followed to where a write would land
        const link = await readLinkOrNull(filePath)
        if (link !== null) return this.realpath(path.resolve(path.dirname(filePath), link))

        const parent = path.dirname(filePath)
        if (parent === filePath) return filePath
        return path.join(await this.realpath(parent), path.basename(filePath))
    }

    async mkdir(dirPath: string): Promise<void> {
        await mkdir(dirPath, { recursive: true })
    }

    async remove(filePath: string): Promise<void> {
        await rm(filePath, { recursive: true, force: true })
    }
}

export class MockFileSystem implements FileSystem {
    private files = new Map<string, string>()

    async readText(filePath: string): Promise<string> {
        const content = this.files.get(filePath)
        if (content === undefined) throw new Error(`ENOENT: ${filePath}`)
        return content
    }

    async readJSON<T>(filePath: string): Promise<T> {
        return JSON.parse(await this.readText(filePath))
    }

    async writeText(filePath: string, content: string): Promise<void> {
        this.files.set(filePath, content)
    }

    async writeJSON(filePath: string, data: unknown): Promise<void> {
        this.files.set(filePath, JSON.stringify(data, null, 2))
    }

    async exists(filePath: string): Promise<boolean> {
        return this.files.has(filePath) || [...this.files.keys()].some((k) => k.startsWith(`${filePath}/`))
    }

    async stat(filePath: string): Promise<FileStat> {
        const content = this.files.get(filePath)
        if (content !== undefined) return { isFile: true, isDirectory: false, size: content.length }
        if (await this.exists(filePath)) return { isFile: false, isDirectory: true, size: 0 }
        throw new Error(`ENOENT: ${filePath}`)
    }

    async glob(pattern: string, options: GlobOptions = {}): Promise<string[]> {
        const regex = globToRegExp(pattern)
        const prefix = options.cwd ? `${options.cwd.replace(/\/$/, '')}/` : ''
        return [...this.files.keys()]
            .filter((k) => k.startsWith(prefix))
            .filter((k) => regex.test(k.slice(prefix.length)))
            .map((k) => (options.absolute ? k : k.slice(prefix.length)))
            .sort()
    }

    async realpath(filePath: string): Promise<string> {
        return path.resolve(filePath)
    }

    async mkdir(_path: string): Promise<void> {}

    async remove(filePath: string): Promise<void> {
        this.files.delete(filePath)
    }

    setFile(filePath: string, content: string): void {
        this.files.set(filePath, content)
    }

    getFiles(): Map<string, string> {
        return new Map(this.files)
    }
}

async function readLinkOrNull(filePath: string): Promise<string | null> {
    try {
        return await readlink(filePath)
    } catch (error) {
        // EINVAL: not a link
        const code = errnoCode(error)
        if (code === 'ENOENT' || code === 'EINVAL') return null
        throw error
    }
}

function globToRegExp(pattern: string): RegExp {
    let source = ''
    for (let i = 0; i < pattern.length; i++) {
        const c = pattern.charAt(i)
        if (c === '*' && pattern.charAt(i + 1) === '*') {
            const slash = pattern.charAt(i + 2) === '/'
            source += slash ? '(?:.*/)?' : '.*'
            i += slash ? 2 : 1
        } else if (c === '*') {
            source += '[^/]*'
        } else if (c === '?') {
            source += '[^/]'
        } else {
            source += c.replace(/[.+^${}()|[\]\\]/g, '\\$&')
        }
    }
    return new RegExp(`^${source}$`)
}

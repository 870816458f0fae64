import path from 'node:path'
import { SandboxViolation } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'

export interface SandboxProfile {
    filesystem: {
        denyRead: string[]
        allowWrite: string[]
    }
    network: {
        allowed: boolean
    }
}

export const WORKSPACE_PROFILE: SandboxProfile = {
    filesystem: { denyRead: ['~/.ssh', '~/.aws', '~/.gnupg'], allowWrite: ['.', '/tmp'] },
    network: { allowed: true },
}

/**
 * Normalizes a tool-supplied path to an absolute path inside `root`.
 * Windows separators are folded to `/` first so `..\\..` escapes are caught on every platform.
 */
export function resolveWorkspacePath(root: string, candidate: string): string {
    if (candidate.includes('\0')) {
        throw new SandboxViolation(candidate, root)
    }

    const normalizedRoot = path.resolve(root)
    const unified = candidate.replace(/\\/g, '/')
    const resolved = path.resolve(normalizedRoot, unified)
    if (resolved === normalizedRoot) return normalizedRoot
    if (escapes(normalizedRoot, resolved)) {
        throw new SandboxViolation(candidate, root)
    }
    return resolved
}

function escapes(root: string, target: string): boolean {
    const relative = path.relative(root, target)
    return relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)
}

/** Path relative to the workspace, using `/` separators; `.` for the root itself. */
export function toWorkspaceRelative(root: string, absolute: string): string {
    const relative = path.relative(path.resolve(root), absolute)
    return relative === '' ? '.' : relative.split(path.sep).join('/')
}

export class SandboxManager {
    constructor(
        private readonly workspaceRoot: string,
        private readonly enabled: boolean,
        private readonly logger: Logger,
        private readonly profile: SandboxProfile = WORKSPACE_PROFILE
    ) {}

    get root(): string {
        return this.workspaceRoot
    }

    /** Lexical resolution only; symlinks are not followed. */
    resolve(candidate: string): string {
        return resolveWorkspacePath(this.workspaceRoot, candidate)
    }

    /**
     * Resolves `candidate` and follows symlinks on disk, so a link inside the
     * workspace pointing elsewhere is a violation. Returns the lexical path.
     */
    async resolveReal(candidate: string, fs: FileSystem): Promise<string> {
        const target = this.resolve(candidate)
        const [realRoot, realTarget] = await Promise.all([fs.realpath(this.workspaceRoot), fs.realpath(target)])
        if (escapes(realRoot, realTarget)) {
            this.logger.warn({ path: candidate, resolved: realTarget }, 'sandbox:symlink-escape')
            throw new SandboxViolation(candidate, this.workspaceRoot)
        }
        return target
    }

    relative(absolute: string): string {
        return toWorkspaceRelative(this.workspaceRoot, absolute)
    }

    /** Wraps a shell command line in the platform sandbox when enabled. */
    wrapCommand(command: string): string {
        if (!this.enabled) return command

        if (process.platform === 'darwin') {
            return this.wrapDarwin(command)
        }

        if (process.platform === 'linux') {
            return this.wrapLinux(command)
        }

        this.logger.warn(`Sandbox not supported on ${process.platform}, executing without sandbox`)
        return command
    }

    private expandHome(entry: string): string {
        return entry.replace('~', process.env.HOME ?? '/root')
    }

    private wrapDarwin(command: string): string {
        const rules: string[] = ['(version 1)', '(allow default)']

        for (const denied of this.profile.filesystem.denyRead) {
            rules.push(`(deny file-read* (subpath "${this.expandHome(denied)}"))`)
        }

        rules.push('(deny file-write*)')
        for (const allowed of this.profile.filesystem.allowWrite) {
            const resolved = allowed === '.' ? this.workspaceRoot : allowed
            rules.push(`(allow file-write* (subpath "${resolved}"))`)
        }

        if (!this.profile.network.allowed) {
            rules.push('(deny network*)')
        }

        const seatbelt = rules.join('\n')
        return `sandbox-exec -p '${seatbelt}' /bin/sh -c ${shellQuote(command)}`
    }

    private wrapLinux(command: string): string {
        const args: string[] = ['bwrap', '--die-with-parent', '--ro-bind', '/', '/', '--dev', '/dev', '--proc', '/proc']

        for (const dir of this.profile.filesystem.allowWrite) {
            const resolved = dir === '.' ? this.workspaceRoot : dir
            args.push('--bind', resolved, resolved)
        }

        for (const denied of this.profile.filesystem.denyRead) {
            args.push('--tmpfs', this.expandHome(denied))
        }

        if (!this.profile.network.allowed) {
            args.push('--unshare-net')
        }

        args.push('--chdir', this.workspaceRoot, '--', '/bin/sh', '-c', shellQuote(command))
        return args.join(' ')
    }
}

export function shellQuote(value: string): string {
    return `'${value.replace(/'/g, "'\\''")}'`
}

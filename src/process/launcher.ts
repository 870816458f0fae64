import { execa } from 'execa'
import type { LaunchedProcess, LaunchOptions, LaunchResult } from './types.js'

export function execaLauncher(command: string, args: string[], options: LaunchOptions): LaunchedProcess {
    const subprocess = execa(command, args, {
        cwd: options.cwd,
        shell: options.shell ?? false,
        env: options.env,
        stdin: options.interactive ? 'pipe' : 'ignore',
        buffer: false,
        reject: false,
        detached: options.detached,
        cleanup: true,
    })

    const exited = subprocess.then((result): LaunchResult => {
        const failureMessage =
            result.failed && result.exitCode === undefined && result.signal === undefined && result instanceof Error
                ? result.message
                : undefined
        return { exitCode: result.exitCode, signal: result.signal, failureMessage }
    })

    return {
        pid: subprocess.pid,
        stdout: subprocess.stdout,
        stderr: subprocess.stderr,
        stdin: subprocess.stdin,
        kill: (signal) => subprocess.kill(signal),
        exited,
    }
}

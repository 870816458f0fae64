import { createInterface } from 'node:readline/promises'

/** Reads one line from stdin; resolves null on EOF (Ctrl+D). */
export async function promptInput(prompt = '> '): Promise<string | null> {
    const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY })
    const closed = new Promise<null>((resolve) => rl.once('close', () => resolve(null)))
    try {
        return await Promise.race([rl.question(prompt), closed])
    } finally {
        rl.close()
    }
}

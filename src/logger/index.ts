import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

/** Logs go to stderr so they never interleave with the conversation on stdout. */
export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    const base = { name: 'codeloom', level: config.logLevel }
    if (config.logLevel === 'debug' || config.logLevel === 'trace') {
        return pino({ ...base, transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } } })
    }
    return pino(base, pino.destination(2))
}

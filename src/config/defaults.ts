import os from 'node:os'
import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'apiKey' | 'workspace' | 'configDir'> = {
    model: 'anthropic/claude-sonnet-4.5',
    baseURL: 'https://openrouter.ai/api/v1',
    temperature: 0,
    maxTokens: 8192,
    logLevel: 'info',
    permissionMode: 'manual_approval',
    userInstructions:
        'You are a dedicated software engineer working alone. Choose the approach you think is best and build working software for the request.',
    engine: {
        inProgressThresholdMs: 10_000,
        killGraceMs: 2_000,
        maxStepsPerTask: 100,
        outputTailBytes: 16_384,
    },
    retry: {
        maxRetries: 3,
        baseDelay: 1000,
        maxDelay: 60000,
    },
    mcp: { servers: {} },
    webFetch: { maxLength: 50_000, timeoutMs: 15_000 },
    sandbox: { enabled: false },
    memoryFile: '.codeloom/memory.json',
}

export const CONFIG_DIR = path.join(os.homedir(), '.config', 'codeloom')
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_DIR = '.codeloom'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
export const SESSIONS_DIR = `${LOCAL_CONFIG_DIR}/sessions`

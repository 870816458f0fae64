import { z } from 'zod'

export const PermissionModeSchema = z.enum(['full_autonomous', 'manual_approval', 'deny_all'])

export const McpServerSchema = z
    .object({
        command: z.string().optional(),
        args: z.array(z.string()).optional(),
        env: z.record(z.string()).optional(),
        url: z.string().url().optional(),
        enabled: z.boolean().optional(),
        /** Extra text appended to the system prompt while this server is connected. */
        systemPrompt: z.string().optional(),
    })
    .refine((data) => data.command || data.url, { message: 'Server must have either command (stdio) or url (http)' })

export const WebSearchSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('brave'), apiKey: z.string() }),
    z.object({ type: z.literal('searx'), url: z.string().url() }),
])

export const ConfigSchema = z.object({
    model: z.string().optional(),
    apiKey: z.string().optional(),
    baseURL: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().positive().optional(),
    logLevel: z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
    permissionMode: PermissionModeSchema.optional(),
    workspace: z.string().optional(),
    userInstructions: z.string().optional(),
    engine: z
        .object({
            inProgressThresholdMs: z.number().int().positive().optional(),
            killGraceMs: z.number().int().nonnegative().optional(),
            maxStepsPerTask: z.number().int().positive().optional(),
            outputTailBytes: z.number().int().positive().optional(),
        })
        .optional(),
    retry: z
        .object({
            maxRetries: z.number().int().nonnegative().optional(),
            baseDelay: z.number().int().nonnegative().optional(),
            maxDelay: z.number().int().positive().optional(),
        })
        .optional(),
    mcp: z
        .object({
            servers: z.record(McpServerSchema).optional(),
        })
        .optional(),
    webSearch: WebSearchSchema.optional(),
    webFetch: z
        .object({
            maxLength: z.number().int().positive().optional(),
            timeoutMs: z.number().int().positive().optional(),
        })
        .optional(),
    sandbox: z
        .object({
            enabled: z.boolean().optional(),
        })
        .optional(),
    memoryFile: z.string().optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export type PermissionMode = z.infer<typeof PermissionModeSchema>

export type McpServerConfig = z.infer<typeof McpServerSchema>

export type WebSearchConfig = z.infer<typeof WebSearchSchema>

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'

export interface EngineConfig {
    inProgressThresholdMs: number
    killGraceMs: number
    maxStepsPerTask: number
    outputTailBytes: number
}

export interface RetryConfig {
    maxRetries: number
    baseDelay: number
    maxDelay: number
}

export interface ResolvedConfig {
    model: string
    apiKey: string
    baseURL: string
    temperature: number
    maxTokens: number
    logLevel: LogLevel
    permissionMode: PermissionMode
    /** Absolute path every relative tool path resolves against. */
    workspace: string
    userInstructions: string
    engine: EngineConfig
    retry: RetryConfig
    mcp: { servers: Record<string, McpServerConfig> }
    webSearch?: WebSearchConfig
    webFetch: { maxLength: number; timeoutMs: number }
    sandbox: { enabled: boolean }
    memoryFile: string
    configDir: string
}

import path from 'node:path'
import { ValidationError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, PermissionModeSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
    globalConfigFile?: string
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}
    const raw = await fs.readJSON<unknown>(filePath)
    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ValidationError(`Invalid config file ${filePath}: ${parsed.error.message}`)
    }
    return parsed.data
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        Object.assign(
            merged,
            Object.fromEntries(Object.entries(cfg).filter(([, value]) => value !== undefined))
        )
    }
    return merged
}

function envConfig(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    if (env.CODELOOM_API_KEY) config.apiKey = env.CODELOOM_API_KEY
    if (env.CODELOOM_MODEL) config.model = env.CODELOOM_MODEL
    if (env.CODELOOM_WORKSPACE) config.workspace = env.CODELOOM_WORKSPACE

    const logLevel = ConfigSchema.shape.logLevel.safeParse(env.CODELOOM_LOG_LEVEL)
    if (logLevel.success && logLevel.data) config.logLevel = logLevel.data

    const mode = PermissionModeSchema.safeParse(env.CODELOOM_PERMISSION_MODE)
    if (mode.success) config.permissionMode = mode.data

    // containers have no operator at hand
    if (env.DOCKER_RUN) config.permissionMode = 'full_autonomous'
    return config
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, options.globalConfigFile ?? GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig(env), cliFlags)

    return {
        ...DEFAULT_CONFIG,
        model: merged.model ?? DEFAULT_CONFIG.model,
        baseURL: merged.baseURL ?? DEFAULT_CONFIG.baseURL,
        temperature: merged.temperature ?? DEFAULT_CONFIG.temperature,
        maxTokens: merged.maxTokens ?? DEFAULT_CONFIG.maxTokens,
        logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
        permissionMode: merged.permissionMode ?? DEFAULT_CONFIG.permissionMode,
        userInstructions: merged.userInstructions ?? DEFAULT_CONFIG.userInstructions,
        apiKey: merged.apiKey ?? '',
        workspace: path.resolve(projectDir, merged.workspace ?? '.'),
        configDir: CONFIG_DIR,
        engine: { ...DEFAULT_CONFIG.engine, ...merged.engine },
        retry: { ...DEFAULT_CONFIG.retry, ...merged.retry },
        mcp: { servers: { ...merged.mcp?.servers } },
        webSearch: merged.webSearch,
        webFetch: { ...DEFAULT_CONFIG.webFetch, ...merged.webFetch },
        sandbox: { ...DEFAULT_CONFIG.sandbox, ...merged.sandbox },
        memoryFile: merged.memoryFile ?? DEFAULT_CONFIG.memoryFile,
    }
}

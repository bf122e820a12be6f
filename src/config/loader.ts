import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { BACKLOG_FILE_NAME, CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, type LogLevel, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

const LEVEL_ALIASES: Record<string, LogLevel> = {
    warning: 'warn',
    critical: 'fatal',
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON<unknown>(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch {
        // an unreadable or invalid global file counts as absent
        return {}
    }
    return {}
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        for (const [key, value] of Object.entries(cfg)) {
            if (value !== undefined) {
                ;(merged as Record<string, unknown>)[key] = value
            }
        }
    }
    return merged
}

/** Accepts pino level names in any case, plus the `WARNING`/`CRITICAL` spellings. */
export function normalizeLogLevel(value: string | undefined): LogLevel | undefined {
    if (!value) return undefined
    const lowered = value.trim().toLowerCase()
    const parsed = LogLevelSchema.safeParse(LEVEL_ALIASES[lowered] ?? lowered)
    return parsed.success ? parsed.data : undefined
}

function expandHome(dir: string): string {
    if (dir === '~' || dir.startsWith('~/')) {
        return path.join(path.dirname(CONFIG_DIR), dir.slice(1))
    }
    return dir
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)

    // Priority: CLI flags > env vars > global config > defaults
    const envConfig: Config = {}
    if (env.OPENAI_API_KEY) envConfig.apiKey = env.OPENAI_API_KEY
    if (env.OPENAI_BASE_URL) envConfig.baseURL = env.OPENAI_BASE_URL
    if (env.BACKLOG_MODEL) envConfig.model = env.BACKLOG_MODEL
    if (env.BACKLOG_LOG_DIR) envConfig.logDir = env.BACKLOG_LOG_DIR
    if (env.BACKLOG_FILE) envConfig.backlogFile = env.BACKLOG_FILE
    envConfig.logLevel = normalizeLogLevel(env.BACKLOG_LOG_LEVEL)

    const merged = mergeConfigs(globalConfig, envConfig, cliFlags)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        apiKey: merged.apiKey ?? '',
        logDir: path.resolve(projectDir, expandHome(merged.logDir ?? CONFIG_DIR)),
        backlogFile: path.resolve(projectDir, merged.backlogFile ?? BACKLOG_FILE_NAME),
        projectDir,
    }
}

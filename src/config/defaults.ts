import { homedir } from 'node:os'
import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Pick<ResolvedConfig, 'model' | 'temperature' | 'logLevel'> = {
    model: 'gpt-4o-mini',
    temperature: 0.3,
    logLevel: 'info',
}

export const CONFIG_DIR = path.join(homedir(), '.bckl')
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
// pino-roll numbers the files: bckl.1.log, bckl.2.log, ...
export const LOG_FILE_BASE = 'bckl'
export const LOG_FILE_EXTENSION = '.log'
// 500k = 512000 bytes
export const LOG_MAX_SIZE = '500k'
export const LOG_BACKUP_COUNT = 3
export const BACKLOG_FILE_NAME = 'backlog.csv'
export const PROMPT_FILE_NAME = 'prompt.txt'
export const README_FILE_NAME = 'README.md'
export const README_CONTEXT_CHARS = 200

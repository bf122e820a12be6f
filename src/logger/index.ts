import path from 'node:path'
import pino from 'pino'
import { LOG_BACKUP_COUNT, LOG_FILE_BASE, LOG_FILE_EXTENSION, LOG_MAX_SIZE } from '../config/defaults.js'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

export interface LoggerOptions {
    /** Mirror log lines to stderr in a human-readable form. */
    verbose?: boolean
    /** Size at which the log file rolls over, in pino-roll notation. */
    maxSize?: string
}

/** Base path handed to pino-roll; the files on disk are `<base>.<n>.log`. */
export function logFileBase(config: Pick<ResolvedConfig, 'logDir'>): string {
    return path.join(config.logDir, LOG_FILE_BASE)
}

export function createLogTransport(config: Pick<ResolvedConfig, 'logDir' | 'logLevel'>, options: LoggerOptions = {}) {
    const level: pino.Level = config.logLevel === 'silent' ? 'fatal' : config.logLevel
    const targets: pino.TransportTargetOptions[] = [
        {
            target: 'pino-roll',
            level,
            options: {
                file: logFileBase(config),
                extension: LOG_FILE_EXTENSION,
                size: options.maxSize ?? LOG_MAX_SIZE,
                limit: { count: LOG_BACKUP_COUNT },
                mkdir: true,
            },
        },
    ]
    if (options.verbose) {
        targets.push({ target: 'pino-pretty', level, options: { colorize: true, destination: 2 } })
    }
    return pino.transport({ targets })
}

export function createLogger(config: Pick<ResolvedConfig, 'logDir' | 'logLevel'>, options: LoggerOptions = {}): Logger {
    return pino({ name: 'bckl', level: config.logLevel }, createLogTransport(config, options))
}

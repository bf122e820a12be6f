import { randomUUID } from 'node:crypto'
import { createReadStream, createWriteStream } from 'node:fs'
import { open, rename as fsRename, rm, stat } from 'node:fs/promises'
import path from 'node:path'
import { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import type { BacklogRecord } from '../backlog/schema.js'
import { errorCode, errorMessage, StorageError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { encodeCsvRow } from './csv.js'

export type LogRow = readonly [title: string, difficulty: string, description: string, timestamp: string]

export type PrependOutcome = { status: 'written' } | { status: 'locked'; error: Error }

// Failures that mean another process holds the file open or denies access to it.
const LOCK_CODES = new Set(['EPERM', 'EACCES', 'EBUSY'])

export interface LogStoreOptions {
    logger: Logger
    rename?: (from: string, to: string) => Promise<void>
}

export function recordToRow(record: BacklogRecord): LogRow {
    return [record.title, String(record.difficulty), record.description, record.timestamp]
}

async function fileExists(file: string): Promise<boolean> {
    try {
        await stat(file)
        return true
    } catch (error) {
        if (errorCode(error) === 'ENOENT') return false
        throw error
    }
}

async function* prependedChunks(row: string, target: string, existed: boolean): AsyncGenerator<Buffer> {
    yield Buffer.from(row, 'utf8')
    if (!existed) return
    for await (const chunk of createReadStream(target)) {
        yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8')
    }
}

/**
 * Newest-first backlog file. Every write goes to a sibling temp file that is
 * renamed over the target, so readers see either the old or the new content.
 */
export class LogStore {
    private logger: Logger
    private rename: (from: string, to: string) => Promise<void>

    constructor(options: LogStoreOptions) {
        this.logger = options.logger
        this.rename = options.rename ?? fsRename
    }

    async prependRow(target: string, fields: LogRow): Promise<PrependOutcome> {
        const tempPath = path.join(path.dirname(target), `.bckl_tmp_${randomUUID()}.csv`)
        let renamed = false

        try {
            const existed = await fileExists(target)
            await pipeline(
                Readable.from(prependedChunks(encodeCsvRow(fields), target, existed)),
                createWriteStream(tempPath, { flags: 'wx' })
            )
            await this.flushToDisk(tempPath)
            await this.rename(tempPath, target)
            renamed = true

            this.logger.debug({ file: target }, 'Row prepended')
            return { status: 'written' }
        } catch (error) {
            // reading the target, creating the temp file or renaming over the target
            const code = errorCode(error)
            if (code !== undefined && LOCK_CODES.has(code)) {
                this.logger.warn({ file: target, code, error: errorMessage(error) }, 'Could not write backlog file, it appears to be locked')
                return { status: 'locked', error: error instanceof Error ? error : new Error(String(error)) }
            }
            this.logger.error({ file: target, error: errorMessage(error) }, 'Failed to write backlog file')
            throw new StorageError(`Failed to write ${target}: ${errorMessage(error)}`, { cause: error })
        } finally {
            if (!renamed) await this.discard(tempPath)
        }
    }

    private async flushToDisk(file: string): Promise<void> {
        const handle = await open(file, 'r+')
        try {
            await handle.sync()
        } finally {
            await handle.close()
        }
    }

    private async discard(tempPath: string): Promise<void> {
        try {
            await rm(tempPath, { force: true })
        } catch (error) {
            this.logger.warn({ file: tempPath, error: errorMessage(error) }, 'Could not remove temporary file')
        }
    }
}

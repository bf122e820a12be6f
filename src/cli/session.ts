import { applyEdit, runEditLoop } from '../backlog/edit-loop.js'
import type { BacklogExtractor } from '../backlog/extraction-client.js'
import type { BacklogRecord } from '../backlog/schema.js'
import { EmptyInputError, errorMessage, type ExitCode, exitCodeFor } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { LogStore } from '../storage/log-store.js'
import { recordToRow } from '../storage/log-store.js'
import type { ConsoleIO, Spinner } from './input.js'
import { formatError, formatRecord, formatSaved, formatWarning } from './ui.js'

export const NO_INPUT_MESSAGE = 'No input received – please dictate or type a line and press Enter.'
export const EDIT_FAILED_HINT = 'Original entry preserved. You can try different edit instructions.'

export interface SessionDeps {
    io: ConsoleIO
    extractor: BacklogExtractor
    logStore: Pick<LogStore, 'prependRow'>
    logger: Logger
    /** One spinner for the whole session. */
    spinner?: Spinner
    /** Source of SIGINT while a backend call runs. Defaults to the process. */
    signals?: NodeJS.EventEmitter
}

export interface SessionOptions {
    backlogFile: string
    dryRun?: boolean
    model?: string
}

/** Runs one backend call under the spinner; SIGINT aborts it. */
async function withBackendCall<T>(deps: SessionDeps, message: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const signals = deps.signals ?? process
    const controller = new AbortController()
    const onInterrupt = () => controller.abort()
    signals.once('SIGINT', onInterrupt)
    deps.spinner?.start(message)
    try {
        const result = await fn(controller.signal)
        deps.spinner?.stop('Done')
        return result
    } catch (error) {
        deps.spinner?.stop(controller.signal.aborted ? 'Interrupted' : 'Failed')
        throw error
    } finally {
        signals.removeListener('SIGINT', onInterrupt)
    }
}

/**
 * One dictation → zero or more edits → one saved row.
 * Resolves to the process exit code; only programming errors reject.
 */
export async function runSession(deps: SessionDeps, options: SessionOptions): Promise<ExitCode> {
    const { io, extractor, logger } = deps

    const dictation = await io.readLine('')
    if (dictation.kind === 'interrupt') {
        io.printError('\nCancelled.')
        return 1
    }
    if (dictation.kind === 'eof' || !dictation.text.trim()) {
        io.printError(formatError(NO_INPUT_MESSAGE))
        return 1
    }

    let record: BacklogRecord
    try {
        record = await withBackendCall(deps, 'Structuring backlog item...', (signal) =>
            extractor.extract(dictation.text, options.model, signal)
        )
    } catch (error) {
        if (error instanceof EmptyInputError) {
            io.printError(formatError(NO_INPUT_MESSAGE))
            return 1
        }
        logger.error({ error: errorMessage(error) }, 'Extraction failed')
        io.printError(formatError(errorMessage(error)))
        return exitCodeFor(error)
    }

    if (options.dryRun) {
        io.print(JSON.stringify(record, null, 2))
        logger.info({ dictation: dictation.text.trim() }, 'Dry-run output')
        return 0
    }

    const outcome = await runEditLoop({
        initial: record,
        readInstruction: () => io.readLine('> '),
        applyEdit: (current, instruction) =>
            withBackendCall(deps, 'Applying edit...', (signal) =>
                applyEdit(extractor, current, instruction, options.model, signal)
            ),
        onShow: (current) => io.print(`\n${formatRecord(current)}\n`),
        onRevised: () => logger.info('Entry updated based on edit instructions'),
        onRevisionFailed: (error) => {
            logger.error({ error: error.message }, 'Error processing edit instructions')
            io.printError(formatError(error.message))
            io.print(EDIT_FAILED_HINT)
        },
    })

    if (outcome.status === 'cancelled') {
        io.printError('\nCancelled.')
        return 1
    }

    const accepted = outcome.record
    try {
        const written = await deps.logStore.prependRow(options.backlogFile, recordToRow(accepted))
        if (written.status === 'locked') {
            io.printError(formatWarning(`could not write ${options.backlogFile} (file locked): ${written.error.message}`))
            return 0
        }
    } catch (error) {
        io.printError(formatError(errorMessage(error)))
        return exitCodeFor(error)
    }

    io.print(formatSaved(accepted))
    logger.info({ title: accepted.title }, 'Entry saved')
    return 0
}

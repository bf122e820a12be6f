import { Command } from 'commander'
import dotenv from 'dotenv'
import { loadConfig } from '../config/loader.js'
import { createContainer } from '../core/container.js'
import { ConfigError, errorMessage, type ExitCode, exitCodeFor } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { createConsoleIO, createSpinner } from './input.js'
import { runSession } from './session.js'
import { formatError, VERSION } from './ui.js'

interface ProgramOptions {
    dryRun?: boolean
    verbose?: boolean
    model?: string
    file?: string
}

async function runCli(options: ProgramOptions): Promise<ExitCode> {
    dotenv.config()

    const config = await loadConfig({
        fs: new NodeFileSystem(),
        cliFlags: {
            model: options.model,
            backlogFile: options.file,
            logLevel: options.verbose ? 'debug' : undefined,
        },
    })

    if (!config.apiKey) {
        throw new ConfigError('OPENAI_API_KEY is not set. Export it or add it to a .env file.')
    }

    const container = createContainer(config, { verbose: options.verbose })
    const io = createConsoleIO()
    try {
        return await runSession(
            {
                io,
                extractor: container.extractionClient,
                logStore: container.logStore,
                logger: container.logger,
                spinner: createSpinner(),
            },
            { backlogFile: config.backlogFile, dryRun: options.dryRun, model: options.model }
        )
    } finally {
        io.close()
    }
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('bckl')
        .description('Dictation-driven backlog entry tool')
        .version(`bckl ${VERSION}`)
        .option('--dry-run', 'Print JSON output but do not write to the backlog file')
        .option('-v, --verbose', 'Verbose logging to stderr')
        .option('-m, --model <model>', 'Model to use for extraction')
        .option('-f, --file <path>', 'Backlog file to prepend to (default: ./backlog.csv)')
        .action(async (options: ProgramOptions) => {
            let code: ExitCode
            try {
                code = await runCli(options)
            } catch (error) {
                console.error(formatError(errorMessage(error)))
                code = exitCodeFor(error)
            }
            process.exit(code)
        })

    return program
}

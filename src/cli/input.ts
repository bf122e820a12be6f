import * as clack from '@clack/prompts'
import { createInterface, type Interface } from 'node:readline'
import type { Readable, Writable } from 'node:stream'

export type ConsoleInput = { kind: 'line'; text: string } | { kind: 'eof' } | { kind: 'interrupt' }

export interface ConsoleIO {
    readLine(message: string): Promise<ConsoleInput>
    print(text: string): void
    printError(text: string): void
    close(): void
}

export interface Spinner {
    start(message: string): void
    stop(message?: string): void
}

/**
 * Line-oriented console over plain streams, used when stdin is piped.
 * Lines are queued as they arrive; an interrupt only counts while a read is pending.
 */
export class StreamConsole implements ConsoleIO {
    private rl: Interface
    private queue: ConsoleInput[] = []
    private waiter: ((input: ConsoleInput) => void) | null = null
    private ended = false

    constructor(
        input: Readable,
        private output: Writable,
        private errorOutput: Writable,
        private signals: NodeJS.EventEmitter = process
    ) {
        this.rl = createInterface({ input, terminal: false })
        this.rl.on('line', (line) => this.push({ kind: 'line', text: line }))
        this.rl.on('close', () => {
            this.ended = true
            this.push({ kind: 'eof' })
        })
    }

    readLine(message: string): Promise<ConsoleInput> {
        if (message) this.output.write(message)

        const queued = this.queue.shift()
        if (queued) return Promise.resolve(queued)
        if (this.ended) return Promise.resolve({ kind: 'eof' })

        return new Promise((resolve) => {
            const onInterrupt = () => this.push({ kind: 'interrupt' })
            this.signals.once('SIGINT', onInterrupt)
            this.waiter = (input) => {
                this.signals.removeListener('SIGINT', onInterrupt)
                resolve(input)
            }
        })
    }

    print(text: string): void {
        this.output.write(`${text}\n`)
    }

    printError(text: string): void {
        this.errorOutput.write(`${text}\n`)
    }

    close(): void {
        this.rl.close()
    }

    private push(input: ConsoleInput): void {
        const waiter = this.waiter
        if (waiter) {
            this.waiter = null
            waiter(input)
            return
        }
        if (input.kind !== 'interrupt') this.queue.push(input)
    }
}

/** Interactive console backed by @clack/prompts; Ctrl+C surfaces as clack's cancel symbol. */
export class PromptConsole implements ConsoleIO {
    async readLine(message: string): Promise<ConsoleInput> {
        const result = await clack.text({ message: message.trim() || '>', placeholder: 'blank line to accept' })
        if (clack.isCancel(result)) return { kind: 'interrupt' }
        return { kind: 'line', text: typeof result === 'string' ? result : '' }
    }

    print(text: string): void {
        console.log(text)
    }

    printError(text: string): void {
        console.error(text)
    }

    close(): void {}
}

const silentSpinner: Spinner = {
    start() {},
    stop() {},
}

export function createConsoleIO(): ConsoleIO {
    if (process.stdin.isTTY) return new PromptConsole()
    return new StreamConsole(process.stdin, process.stdout, process.stderr)
}

export function createSpinner(): Spinner {
    return process.stdout.isTTY ? clack.spinner() : silentSpinner
}

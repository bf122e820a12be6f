import { describe, it, expect } from 'vitest'
import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'
import { StreamConsole } from '../../../src/cli/input.js'

function createConsole() {
    const input = new PassThrough()
    const output = new PassThrough()
    const errorOutput = new PassThrough()
    const signals = new EventEmitter()
    const io = new StreamConsole(input, output, errorOutput, signals)
    return { io, input, output, errorOutput, signals }
}

function collect(stream: PassThrough): () => string {
    const chunks: string[] = []
    stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')))
    return () => chunks.join('')
}

describe('StreamConsole', () => {
    it('reads lines in order, then end of input', async () => {
        const { io, input } = createConsole()
        input.write('first line\nsecond line\n')
        input.end()

        expect(await io.readLine('')).toEqual({ kind: 'line', text: 'first line' })
        expect(await io.readLine('')).toEqual({ kind: 'line', text: 'second line' })
        expect(await io.readLine('')).toEqual({ kind: 'eof' })
        expect(await io.readLine('')).toEqual({ kind: 'eof' })
    })

    it('reports an interrupt while a read is pending', async () => {
        const { io, signals } = createConsole()
        const pending = io.readLine('> ')
        signals.emit('SIGINT')
        expect(await pending).toEqual({ kind: 'interrupt' })
        expect(signals.listenerCount('SIGINT')).toBe(0)
        io.close()
    })

    it('removes its interrupt listener once a line arrives', async () => {
        const { io, input, signals } = createConsole()
        const pending = io.readLine('')
        input.write('hello\n')
        expect(await pending).toEqual({ kind: 'line', text: 'hello' })
        expect(signals.listenerCount('SIGINT')).toBe(0)
        io.close()
    })

    it('writes prompts and messages to the right streams', async () => {
        const { io, input, output, errorOutput } = createConsole()
        const out = collect(output)
        const err = collect(errorOutput)

        input.end('x\n')
        await io.readLine('> ')
        io.print('saved')
        io.printError('oops')
        await new Promise((resolve) => setImmediate(resolve))

        expect(out()).toBe('> saved\n')
        expect(err()).toBe('oops\n')
    })

    it('ends pending reads on close', async () => {
        const { io } = createConsole()
        const pending = io.readLine('')
        io.close()
        expect(await pending).toEqual({ kind: 'eof' })
    })
})

import { err, ok, type Result } from '../core/result.js'
import type { BacklogExtractor } from './extraction-client.js'
import type { BacklogRecord } from './schema.js'

export type EditState =
    | { status: 'awaiting_instruction'; record: BacklogRecord }
    | { status: 'revising'; record: BacklogRecord; instruction: string }
    | { status: 'accepted'; record: BacklogRecord }
    | { status: 'cancelled'; record: BacklogRecord }

export type TerminalEditState = Extract<EditState, { status: 'accepted' | 'cancelled' }>

export type EditEvent =
    | { type: 'instruction'; text: string }
    | { type: 'eof' }
    | { type: 'interrupt' }
    | { type: 'revised'; record: BacklogRecord }
    | { type: 'revision_failed'; error: Error }

export type InstructionInput = { kind: 'line'; text: string } | { kind: 'eof' } | { kind: 'interrupt' }

export function isTerminal(state: EditState): state is TerminalEditState {
    return state.status === 'accepted' || state.status === 'cancelled'
}

export function transition(state: EditState, event: EditEvent): EditState {
    switch (state.status) {
        case 'awaiting_instruction':
            switch (event.type) {
                case 'instruction': {
                    const instruction = event.text.trim()
                    if (!instruction) return { status: 'accepted', record: state.record }
                    return { status: 'revising', record: state.record, instruction }
                }
                case 'eof':
                    return { status: 'accepted', record: state.record }
                case 'interrupt':
                    return { status: 'cancelled', record: state.record }
                default:
                    return state
            }
        case 'revising':
            switch (event.type) {
                case 'revised':
                    return { status: 'awaiting_instruction', record: event.record }
                case 'revision_failed':
                    return { status: 'awaiting_instruction', record: state.record }
                case 'interrupt':
                    return { status: 'cancelled', record: state.record }
                default:
                    return state
            }
        case 'accepted':
        case 'cancelled':
            return state
    }
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}

/** One edit round. Never throws; on failure the caller keeps `current`. */
export async function applyEdit(
    extractor: BacklogExtractor,
    current: BacklogRecord,
    instruction: string,
    modelOverride?: string,
    signal?: AbortSignal
): Promise<Result<BacklogRecord, Error>> {
    try {
        return ok(await extractor.revise(current, instruction, modelOverride, signal))
    } catch (error) {
        return err(toError(error))
    }
}

export interface EditLoopOptions {
    initial: BacklogRecord
    readInstruction: () => Promise<InstructionInput>
    applyEdit: (current: BacklogRecord, instruction: string) => Promise<Result<BacklogRecord, Error>>
    onShow?: (record: BacklogRecord) => void
    onRevised?: (record: BacklogRecord) => void
    onRevisionFailed?: (error: Error, kept: BacklogRecord) => void
}

export async function runEditLoop(options: EditLoopOptions): Promise<TerminalEditState> {
    let state: EditState = { status: 'awaiting_instruction', record: options.initial }

    while (!isTerminal(state)) {
        if (state.status === 'awaiting_instruction') {
            options.onShow?.(state.record)
            const input = await options.readInstruction()
            const event: EditEvent = input.kind === 'line' ? { type: 'instruction', text: input.text } : { type: input.kind }
            state = transition(state, event)
            continue
        }

        const result = await options.applyEdit(state.record, state.instruction)
        if (result.ok) {
            state = transition(state, { type: 'revised', record: result.value })
            options.onRevised?.(result.value)
        } else {
            state = transition(state, { type: 'revision_failed', error: result.error })
            options.onRevisionFailed?.(result.error, state.record)
        }
    }

    return state
}

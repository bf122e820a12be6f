import { BackendError, EmptyInputError, errorMessage } from '../core/errors.js'
import type { LLMClient } from '../llm/types.js'
import {
    isParseFailure,
    isTransient,
    PARSE_RETRY_OPTIONS,
    type RetryOptions,
    TRANSPORT_RETRY_OPTIONS,
    withRetry,
} from '../llm/retry.js'
import type { Logger } from '../logger/index.js'
import type { ExtractionCache } from './cache.js'
import { parseModelResponse } from './response-extractor.js'
import { sanitizeDictation } from './sanitize.js'
import { type BacklogRecord, validateRecord } from './schema.js'
import { buildEditRequest } from './system-prompt.js'

export type SystemPromptSource = () => Promise<string>

export interface BacklogExtractor {
    extract(dictation: string, modelOverride?: string, signal?: AbortSignal): Promise<BacklogRecord>
    revise(current: BacklogRecord, instruction: string, modelOverride?: string, signal?: AbortSignal): Promise<BacklogRecord>
}

export interface ExtractionClientOptions {
    llmClient: LLMClient
    cache: ExtractionCache
    systemPrompt: SystemPromptSource
    logger: Logger
    model: string
    temperature: number
    retry?: {
        transport?: Partial<RetryOptions>
        parse?: Partial<RetryOptions>
    }
}

export class ExtractionClient implements BacklogExtractor {
    private transportRetry: RetryOptions
    private parseRetry: RetryOptions

    constructor(private options: ExtractionClientOptions) {
        const { logger } = options
        this.transportRetry = {
            ...TRANSPORT_RETRY_OPTIONS,
            ...options.retry?.transport,
            shouldRetry: isTransient,
            onRetry: (error, attempt, delayMs) =>
                logger.warn({ attempt, delayMs: Math.round(delayMs), error: errorMessage(error) }, 'Backend call failed, backing off'),
        }
        this.parseRetry = {
            ...PARSE_RETRY_OPTIONS,
            ...options.retry?.parse,
            shouldRetry: isParseFailure,
            onRetry: (error, attempt) =>
                logger.warn({ attempt, error: errorMessage(error) }, 'Unusable model reply, asking again'),
        }
    }

    /** Turns one line of dictation into a validated backlog record. */
    async extract(dictation: string, modelOverride?: string, signal?: AbortSignal): Promise<BacklogRecord> {
        if (!dictation.trim()) throw new EmptyInputError()
        return this.request(sanitizeDictation(dictation), modelOverride, signal)
    }

    /** Asks the model for a complete replacement of `current` following `instruction`. */
    async revise(
        current: BacklogRecord,
        instruction: string,
        modelOverride?: string,
        signal?: AbortSignal
    ): Promise<BacklogRecord> {
        const cleaned = instruction.trim()
        if (!cleaned) throw new EmptyInputError('Empty edit instructions provided')
        return this.request(buildEditRequest(JSON.stringify(current), cleaned), modelOverride, signal)
    }

    private async request(userMessage: string, modelOverride?: string, signal?: AbortSignal): Promise<BacklogRecord> {
        const { cache, logger } = this.options
        const model = modelOverride ?? this.options.model

        const cached = cache.get(model, userMessage)
        if (cached) {
            logger.debug({ prompt: userMessage.slice(0, 30) }, 'Using cached response')
            return cached
        }

        const systemPrompt = await this.options.systemPrompt()

        // Both strategies draw on one budget of backend calls.
        const maxCalls = Math.max(this.transportRetry.maxRetries, this.parseRetry.maxRetries) + 1
        let calls = 0
        const canCallAgain = () => calls < maxCalls && !signal?.aborted

        const data = await withRetry(
            async () => {
                const content = await withRetry(
                    () => {
                        calls++
                        return this.callBackend(model, systemPrompt, userMessage, calls, signal)
                    },
                    { ...this.transportRetry, shouldRetry: (error) => canCallAgain() && isTransient(error) }
                )
                const parsed = parseModelResponse(content)
                if (!parsed.ok) throw parsed.error
                return parsed.value
            },
            { ...this.parseRetry, shouldRetry: (error) => canCallAgain() && isParseFailure(error) }
        )

        const validated = validateRecord(data)
        if (!validated.ok) {
            logger.error({ error: validated.error.message }, 'Response failed schema validation')
            throw validated.error
        }

        cache.set(model, userMessage, validated.value)
        return validated.value
    }

    private async callBackend(
        model: string,
        systemPrompt: string,
        userMessage: string,
        call: number,
        signal?: AbortSignal
    ): Promise<string> {
        if (signal?.aborted) throw new BackendError('Request aborted')
        this.options.logger.debug({ call, model }, 'Calling model backend')
        const response = await this.options.llmClient.chat({
            model,
            temperature: this.options.temperature,
            signal,
            messages: [
                { role: 'system', content: systemPrompt },
                { role: 'user', content: userMessage },
            ],
        })
        this.options.logger.debug({ content: response.content }, 'Raw model response')
        return response.content ?? ''
    }
}

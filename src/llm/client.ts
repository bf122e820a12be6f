import OpenAI from 'openai'
import type { ResolvedConfig } from '../config/schema.js'
import { BackendError, BacklogError, errorMessage, isAbortError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { ChatMessage, ChatParams, ChatResponse, LLMClient } from './types.js'

function toMessageParam(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content }
        case 'user':
            return { role: 'user', content: message.content }
    }
}

/** Normalizes anything the SDK throws into a BackendError, keeping the HTTP status when there is one. */
export function toBackendError(error: unknown): BacklogError {
    if (error instanceof BacklogError) return error
    if (isAbortError(error)) return new BackendError('Request aborted', undefined, { cause: error })
    if (error instanceof OpenAI.APIError) {
        return new BackendError(error.message, error.status, { cause: error })
    }
    return new BackendError(errorMessage(error), undefined, { cause: error })
}

export function createLLMClient(
    config: Pick<ResolvedConfig, 'apiKey' | 'baseURL' | 'model' | 'temperature'>,
    logger: Logger
): LLMClient {
    const openai = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        // retries are owned by the extraction client
        maxRetries: 0,
    })

    return {
        async chat(params: ChatParams): Promise<ChatResponse> {
            const model = params.model ?? config.model

            try {
                const response = await openai.chat.completions.create(
                    {
                        model,
                        messages: params.messages.map(toMessageParam),
                        temperature: params.temperature ?? config.temperature,
                    },
                    { signal: params.signal }
                )

                const choice = response.choices[0]
                if (!choice) throw new BackendError('No response from LLM')

                let finishReason: ChatResponse['finishReason'] = 'other'
                if (choice.finish_reason === 'stop') finishReason = 'stop'
                else if (choice.finish_reason === 'length') finishReason = 'length'

                const result: ChatResponse = {
                    content: choice.message.content,
                    finishReason,
                    usage: {
                        promptTokens: response.usage?.prompt_tokens ?? 0,
                        completionTokens: response.usage?.completion_tokens ?? 0,
                    },
                }

                logger.debug({ model, usage: result.usage, finishReason }, 'llm:response')
                return result
            } catch (error) {
                if (params.signal?.aborted) throw new BackendError('Request aborted', undefined, { cause: error })
                throw toBackendError(error)
            }
        },
    }
}

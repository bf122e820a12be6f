export interface ChatMessage {
    role: 'system' | 'user'
    content: string
}

export interface ChatParams {
    model?: string
    messages: ChatMessage[]
    temperature?: number
    signal?: AbortSignal
}

export interface ChatResponse {
    content: string | null
    finishReason: 'stop' | 'length' | 'other'
    usage: { promptTokens: number; completionTokens: number }
}

export interface LLMClient {
    chat(params: ChatParams): Promise<ChatResponse>
}

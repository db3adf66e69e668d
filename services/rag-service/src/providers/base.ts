export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface ChatOptions {
    model?: string;
    temperature?: number;
    max_tokens?: number;
}

export interface LLMProvider {
    readonly name: string;

    /** Completion text as it is generated, one fragment at a time. */
    stream(messages: ChatMessage[], options?: ChatOptions, signal?: AbortSignal): AsyncIterable<string>;
}

import { LLMProvider, ChatMessage, ChatOptions } from './base';

/** Deterministic stand-in for local runs without an API key. */
export class MockLLMProvider implements LLMProvider {
    readonly name = 'mock';

    async *stream(messages: ChatMessage[], options?: ChatOptions, signal?: AbortSignal): AsyncIterable<string> {
        for (const word of this.reply(messages).split(/(?<= )/)) {
            if (signal?.aborted) return;
            yield word;
        }
    }

    private reply(messages: ChatMessage[]): string {
        const lastMsg = messages.length > 0 ? messages[messages.length - 1].content : '';
        return 'Mock response to: ' + lastMsg.trim().substring(0, 50);
    }
}

import axios, { AxiosInstance } from 'axios';
import { errorMessage, logger } from '@docqa/service-template';
import { LLMProvider, ChatMessage, ChatOptions } from './base';
import { sseData } from './sse';
import { LLMFailure } from '../errors';

export type ChatHttpClient = Pick<AxiosInstance, 'post'>;

export interface OpenAICompatibleConfig {
    name?: string;
    apiKey: string;
    baseUrl?: string;
    defaultModel?: string;
    timeoutMs?: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

/** `choices[0].delta.content` of a streamed chunk, or '' when absent. */
export const deltaContent = (chunk: unknown): string => {
    if (!isRecord(chunk) || !Array.isArray(chunk.choices)) return '';
    const [choice] = chunk.choices;
    if (!isRecord(choice) || !isRecord(choice.delta)) return '';
    return typeof choice.delta.content === 'string' ? choice.delta.content : '';
};

/** Groq, OpenAI, Ollama and vLLM all speak the same chat completions API. */
export class OpenAICompatibleProvider implements LLMProvider {
    readonly name: string;
    private http: ChatHttpClient;
    private defaultModel: string;

    constructor(config: OpenAICompatibleConfig, http?: ChatHttpClient) {
        this.name = config.name || 'openai';
        this.defaultModel = config.defaultModel || 'gpt-4o-mini';
        this.http = http || axios.create({
            baseURL: (config.baseUrl || 'https://api.openai.com/v1').replace(/\/+$/, ''),
            timeout: config.timeoutMs ?? 60000,
            headers: {
                'Authorization': `Bearer ${config.apiKey}`,
                'Content-Type': 'application/json'
            }
        });
    }

    async *stream(messages: ChatMessage[], options?: ChatOptions, signal?: AbortSignal): AsyncIterable<string> {
        const model = options?.model || this.defaultModel;

        let source: AsyncIterable<Buffer | string>;
        try {
            const res = await this.http.post<NodeJS.ReadableStream>(
                '/chat/completions',
                this.body(messages, model, options),
                { responseType: 'stream', signal }
            );
            source = res.data;
        } catch (err) {
            throw this.failure(model, err);
        }

        try {
            for await (const data of sseData(source)) {
                const fragment = deltaContent(JSON.parse(data));
                if (fragment) yield fragment;
            }
        } catch (err) {
            throw this.failure(model, err);
        }
    }

    private body(messages: ChatMessage[], model: string, options: ChatOptions | undefined) {
        return {
            model,
            messages,
            temperature: options?.temperature ?? 0.2,
            max_tokens: options?.max_tokens ?? 512,
            stream: true
        };
    }

    private failure(model: string, err: unknown): LLMFailure {
        logger.error(`${this.name} call failed [${model}]`, { error: errorMessage(err) });
        return new LLMFailure(`${this.name} provider error: ${errorMessage(err)}`, { cause: err });
    }
}

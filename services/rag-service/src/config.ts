import { env, envInt, optionalEnv } from '@docqa/service-template';
import { RetrievalConfig, loadRetrievalConfig } from '@docqa/retrieval';

export interface LLMConfig {
    provider: string;
    apiKey?: string;
    baseUrl?: string;
    model?: string;
}

export interface RagConfig {
    port: number;
    temperature: number;
    maxTokens: number;
    llm: LLMConfig;
    retrieval: RetrievalConfig;
}

const temperature = (): number => {
    const raw = env('LLM_TEMPERATURE', '0.2');
    const parsed = Number(raw);
    if (Number.isNaN(parsed)) {
        throw new Error(`Environment variable LLM_TEMPERATURE must be a number, got "${raw}"`);
    }
    return parsed;
};

export const loadConfig = (): RagConfig => ({
    port: envInt('PORT', 3005),
    temperature: temperature(),
    maxTokens: envInt('LLM_MAX_TOKENS', 512),
    llm: {
        provider: env('LLM_PROVIDER', 'groq').toLowerCase(),
        apiKey: optionalEnv('GROQ_API_KEY') || optionalEnv('LLM_API_KEY'),
        baseUrl: optionalEnv('LLM_BASE_URL'),
        model: optionalEnv('LLM_MODEL')
    },
    retrieval: loadRetrievalConfig()
});

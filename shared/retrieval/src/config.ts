import { env, envInt, optionalEnv } from '@docqa/service-template';

export interface EmbeddingConfig {
    provider: string;
    /** Only the openai provider takes a model name. */
    model?: string;
    baseUrl?: string;
    apiKey?: string;
    dimension?: number;
}

export interface RetryConfig {
    maxAttempts: number;
    baseDelayMs: number;
    attemptTimeoutMs: number;
}

export interface StoreConfig {
    provider: string;
    url: string;
    apiKey?: string;
    retry: RetryConfig;
}

export interface RetrievalConfig {
    collection: string;
    maxSearchResults: number;
    embedding: EmbeddingConfig;
    store: StoreConfig;
}

const optionalInt = (name: string): number | undefined => {
    return optionalEnv(name) === undefined ? undefined : envInt(name, 0);
};

export const loadRetrievalConfig = (): RetrievalConfig => ({
    collection: env('COLLECTION_NAME', 'pdf_chunks'),
    maxSearchResults: envInt('MAX_SEARCH_RESULTS', 5),
    embedding: {
        provider: env('EMBEDDING_PROVIDER', 'hash').toLowerCase(),
        model: optionalEnv('EMBEDDING_MODEL'),
        baseUrl: optionalEnv('EMBEDDING_BASE_URL'),
        apiKey: optionalEnv('EMBEDDING_API_KEY'),
        dimension: optionalInt('EMBEDDING_DIMENSION')
    },
    store: {
        provider: env('VECTOR_STORE_PROVIDER', 'qdrant').toLowerCase(),
        url: env('QDRANT_URL', 'http://localhost:6333'),
        apiKey: optionalEnv('QDRANT_API_KEY'),
        retry: {
            maxAttempts: envInt('RETRY_MAX_ATTEMPTS', 3),
            baseDelayMs: envInt('RETRY_BASE_DELAY_MS', 2000),
            attemptTimeoutMs: envInt('STORE_TIMEOUT_MS', 30000)
        }
    }
});

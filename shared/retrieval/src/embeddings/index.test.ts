import { logger } from '@docqa/service-template';
import { DEFAULT_EMBEDDING_MODEL, getEmbeddingProvider, HashEmbeddingProvider, OpenAIEmbeddingProvider } from './index';

describe('getEmbeddingProvider', () => {
    let info: jest.SpyInstance;
    let warn: jest.SpyInstance;

    beforeEach(() => {
        info = jest.spyOn(logger, 'info').mockImplementation(() => logger);
        warn = jest.spyOn(logger, 'warn').mockImplementation(() => logger);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should default to feature hashing and log the effective model', async () => {
        const provider = getEmbeddingProvider({ provider: 'hash', dimension: 64 });

        expect(provider).toBeInstanceOf(HashEmbeddingProvider);
        await expect(provider.dimension()).resolves.toBe(64);
        expect(info).toHaveBeenCalledWith('Embedding with feature-hash-64', { provider: 'hash' });
        expect(warn).not.toHaveBeenCalled();
    });

    it('should warn that the hash provider ignores a configured model name', () => {
        const provider = getEmbeddingProvider({ provider: 'hash', model: 'sentence-transformers/all-MiniLM-L6-v2' });

        expect(provider.modelName).toBe('feature-hash-384');
        expect(warn).toHaveBeenCalledWith("EMBEDDING_MODEL 'sentence-transformers/all-MiniLM-L6-v2' is ignored by the hash embedding provider");
    });

    it('should build an OpenAI-compatible client', () => {
        const provider = getEmbeddingProvider({
            provider: 'openai',
            model: 'text-embedding-3-small',
            baseUrl: 'http://embeddings.test/v1',
            apiKey: 'test-secret'
        });

        expect(provider).toBeInstanceOf(OpenAIEmbeddingProvider);
        expect(provider.modelName).toBe('text-embedding-3-small');
        expect(info).toHaveBeenCalledWith('Embedding with text-embedding-3-small', { provider: 'openai' });
    });

    it('should fall back to the default model name for the OpenAI-compatible client', () => {
        const provider = getEmbeddingProvider({ provider: 'openai', baseUrl: 'http://embeddings.test/v1' });
        expect(provider.modelName).toBe(DEFAULT_EMBEDDING_MODEL);
    });

    it('should require a base URL for the OpenAI-compatible client', () => {
        expect(() => getEmbeddingProvider({ provider: 'openai', model: 'm' }))
            .toThrow('EMBEDDING_BASE_URL is required when EMBEDDING_PROVIDER=openai');
    });

    it('should fall back to hashing for unknown providers', () => {
        expect(getEmbeddingProvider({ provider: 'word2vec' })).toBeInstanceOf(HashEmbeddingProvider);
        expect(warn).toHaveBeenCalledWith("Unknown EMBEDDING_PROVIDER 'word2vec', defaulting to hash.");
    });
});

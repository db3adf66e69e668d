import { logger } from '@docqa/service-template';
import { EmbeddingProvider } from './embeddingProvider';
import { HashEmbeddingProvider } from './hashEmbeddingProvider';
import { OpenAIEmbeddingProvider } from './openAIEmbeddingProvider';
import { EmbeddingConfig } from '../config';

export * from './embeddingProvider';
export * from './hashEmbeddingProvider';
export * from './openAIEmbeddingProvider';

export const DEFAULT_EMBEDDING_MODEL = 'sentence-transformers/all-MiniLM-L6-v2';

const build = (config: EmbeddingConfig): EmbeddingProvider => {
    switch (config.provider) {
        case 'openai':
            if (!config.baseUrl) {
                throw new Error('EMBEDDING_BASE_URL is required when EMBEDDING_PROVIDER=openai');
            }
            return new OpenAIEmbeddingProvider({
                baseUrl: config.baseUrl,
                model: config.model || DEFAULT_EMBEDDING_MODEL,
                apiKey: config.apiKey,
                dimension: config.dimension
            });
        case 'hash':
            if (config.model) {
                logger.warn(`EMBEDDING_MODEL '${config.model}' is ignored by the hash embedding provider`);
            }
            return new HashEmbeddingProvider(config.dimension);
        default:
            logger.warn(`Unknown EMBEDDING_PROVIDER '${config.provider}', defaulting to hash.`);
            return new HashEmbeddingProvider(config.dimension);
    }
};

export const getEmbeddingProvider = (config: EmbeddingConfig): EmbeddingProvider => {
    const provider = build(config);
    logger.info(`Embedding with ${provider.modelName}`, { provider: config.provider });
    return provider;
};

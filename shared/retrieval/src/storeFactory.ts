import { logger } from '@docqa/service-template';
import { VectorStore } from './stores/vectorStore.interface';
import { QdrantStore } from './stores/qdrantStore';
import { MemoryStore } from './stores/memoryStore';
import { RetryPolicy } from './stores/retryPolicy';
import { StoreConfig } from './config';

export function getVectorStore(config: StoreConfig): VectorStore {
    switch (config.provider) {
        case 'memory':
            return new MemoryStore();
        case 'qdrant':
            return new QdrantStore({
                url: config.url,
                apiKey: config.apiKey,
                policy: new RetryPolicy(config.retry)
            });
        default:
            logger.warn(`Unknown VECTOR_STORE_PROVIDER '${config.provider}', defaulting to qdrant.`);
            return new QdrantStore({ url: config.url, apiKey: config.apiKey, policy: new RetryPolicy(config.retry) });
    }
}

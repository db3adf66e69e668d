import 'dotenv/config';
import { createService, errorHandler, logger, startService } from '@docqa/service-template';
import { getEmbeddingProvider, getVectorStore } from '@docqa/retrieval';
import { loadConfig } from './config';
import { createRouter } from './routes';
import { Normalizer } from './normalizer';
import { IngestionPipeline } from './pipeline/ingestionPipeline';
import { UrlConnector } from './connectors/url';

const config = loadConfig();
const app = createService('ingestion-service');

const pipeline = new IngestionPipeline({
    normalizer: new Normalizer(),
    embedder: getEmbeddingProvider(config.retrieval.embedding),
    store: getVectorStore(config.retrieval.store),
    options: {
        collection: config.retrieval.collection,
        chunkSize: config.chunkSize,
        chunkOverlap: config.chunkOverlap,
        embedBatchSize: config.embedBatchSize
    }
});

// Mount Routes
app.use(createRouter({
    pipeline,
    connector: new UrlConnector(),
    uploadDir: config.uploadDir,
    maxUploadBytes: config.maxUploadBytes
}));
app.use(errorHandler);

logger.info('Ingestion pipeline ready', {
    collection: config.retrieval.collection,
    embedding_provider: config.retrieval.embedding.provider,
    store_provider: config.retrieval.store.provider
});

startService(app, config.port);

import os from 'os';
import path from 'path';
import { env, envInt } from '@docqa/service-template';
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE, RetrievalConfig, loadRetrievalConfig } from '@docqa/retrieval';

export interface IngestionConfig {
    port: number;
    uploadDir: string;
    maxUploadBytes: number;
    chunkSize: number;
    chunkOverlap: number;
    embedBatchSize: number;
    retrieval: RetrievalConfig;
}

export const loadConfig = (): IngestionConfig => ({
    port: envInt('PORT', 3000),
    uploadDir: env('UPLOAD_DIR', path.join(os.tmpdir(), 'docqa-uploads')),
    maxUploadBytes: envInt('MAX_UPLOAD_BYTES', 200 * 1024 * 1024),
    chunkSize: envInt('CHUNK_SIZE', DEFAULT_CHUNK_SIZE),
    chunkOverlap: envInt('CHUNK_OVERLAP', DEFAULT_CHUNK_OVERLAP),
    embedBatchSize: envInt('EMBED_BATCH_SIZE', 32),
    retrieval: loadRetrievalConfig()
});

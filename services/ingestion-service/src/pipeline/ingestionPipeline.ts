import crypto from 'crypto';
import { v5 as uuidv5 } from 'uuid';
import { OperationCancelled, errorMessage, logger } from '@docqa/service-template';
import { EmbeddingProvider, Point, VectorStore, chunkText } from '@docqa/retrieval';
import { Normalizer } from '../normalizer';
import { DocumentFormat, FORMAT_LABELS } from '../normalizer/formats';
import { StructuralUnit } from '../normalizer/extractors/base';
import { EmptyExtraction } from '../errors';

/** Namespace for point ids derived from `contentHash:start`. */
export const POINT_ID_NAMESPACE = '6c4c9a3e-1d2b-4f5a-9e7c-2b8d0f1a3c5e';

export const contentHash = (content: Buffer): string => crypto.createHash('sha256').update(content).digest('hex');

// Same bytes map to the same ids; a different document never shares them, whatever its name
export const pointId = (hash: string, start: number): string => uuidv5(`${hash}:${start}`, POINT_ID_NAMESPACE);

export interface PipelineOptions {
    collection: string;
    chunkSize: number;
    chunkOverlap: number;
    embedBatchSize: number;
}

export interface IngestionResult {
    filename: string;
    format: DocumentFormat;
    collection: string;
    chunks_created: number;
    chars_total: number;
    structural_count: number;
    structural_unit: StructuralUnit;
}

export interface PipelineDeps {
    normalizer: Normalizer;
    embedder: EmbeddingProvider;
    store: VectorStore;
    options: PipelineOptions;
}

export class IngestionPipeline {
    private normalizer: Normalizer;
    private embedder: EmbeddingProvider;
    private store: VectorStore;
    private options: PipelineOptions;

    constructor(deps: PipelineDeps) {
        this.normalizer = deps.normalizer;
        this.embedder = deps.embedder;
        this.store = deps.store;
        this.options = deps.options;

        if (!Number.isInteger(this.options.embedBatchSize) || this.options.embedBatchSize < 1) {
            throw new RangeError(`Embedding batch size must be a positive integer, got ${this.options.embedBatchSize}`);
        }
    }

    /**
     * Extract, chunk, embed and store one document. The whole document is
     * written as a single batch; nothing is written when extraction yields
     * no text.
     */
    async ingest(document: { content: Buffer; format: DocumentFormat }, filename: string, signal?: AbortSignal): Promise<IngestionResult> {
        const { collection } = this.options;
        const extracted = await this.normalizer.extract(document.content, document.format);

        if (extracted.text.trim() === '') {
            throw new EmptyExtraction(`No text could be extracted from the ${FORMAT_LABELS[document.format]}.`);
        }

        const chunks = chunkText(extracted.text, { size: this.options.chunkSize, overlap: this.options.chunkOverlap });
        logger.info(`Extracted ${extracted.text.length} characters from ${filename}`, {
            format: document.format,
            [extracted.unit]: extracted.structuralCount,
            chunks: chunks.length
        });

        const hash = contentHash(document.content);
        const points: Point[] = [];
        for (let i = 0; i < chunks.length; i += this.options.embedBatchSize) {
            if (signal?.aborted) throw new OperationCancelled('Ingestion cancelled', { cause: signal.reason });

            const batch = chunks.slice(i, i + this.options.embedBatchSize);
            const vectors = await this.embedder.embedMany(batch.map(c => c.text));
            batch.forEach((chunk, j) => {
                points.push({
                    id: pointId(hash, chunk.start),
                    vector: vectors[j],
                    payload: { text: chunk.text, source: filename, chunk_index: chunk.index }
                });
            });
        }

        try {
            await this.store.ensureCollection(collection, await this.embedder.dimension(), signal);
        } catch (err) {
            if (err instanceof OperationCancelled) throw err;
            // upsert creates the collection itself if this really failed
            logger.warn(`Could not ensure collection ${collection}, continuing`, { error: errorMessage(err) });
        }

        await this.store.upsert(collection, points, signal);
        logger.info(`Stored ${points.length} chunks from ${filename} in ${collection}`);

        return {
            filename,
            format: document.format,
            collection,
            chunks_created: points.length,
            chars_total: extracted.text.length,
            structural_count: extracted.structuralCount,
            structural_unit: extracted.unit
        };
    }
}

import { QdrantClient } from '@qdrant/js-client-rest';
import { OperationCancelled, logger } from '@docqa/service-template';
import { Point, PointPayload, SearchResult, VectorStore } from './vectorStore.interface';
import { RetryPolicy } from './retryPolicy';
import { isAlreadyExists, toStoreFailure } from './failures';
import { CollectionNotFound, RetryableStoreFailure } from '../errors';

export type QdrantApi = Pick<QdrantClient,
    'collectionExists' | 'createCollection' | 'deleteCollection' | 'upsert' | 'query'>;

export interface QdrantStoreConfig {
    url: string;
    apiKey?: string;
    policy?: RetryPolicy;
}

const toPayload = (raw: Record<string, unknown> | null | undefined): PointPayload => {
    const payload: PointPayload = { text: typeof raw?.text === 'string' ? raw.text : '' };
    if (typeof raw?.source === 'string') payload.source = raw.source;
    if (typeof raw?.chunk_index === 'number') payload.chunk_index = raw.chunk_index;
    return payload;
};

interface PendingEnsure {
    dimension: number;
    waiters: number;
    controller: AbortController;
    work: Promise<void>;
}

export class QdrantStore implements VectorStore {
    private client: QdrantApi;
    private policy: RetryPolicy;
    private pendingCreates = new Map<string, PendingEnsure>();

    constructor(config: QdrantStoreConfig, client?: QdrantApi) {
        this.policy = config.policy || new RetryPolicy();
        this.client = client || new QdrantClient({
            url: config.url,
            apiKey: config.apiKey,
            timeout: this.policy.attemptTimeoutMs
        });
    }

    async ensureCollection(name: string, dimension: number, signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) throw new OperationCancelled('Operation cancelled', { cause: signal.reason });

        // Concurrent callers in this process share one round trip
        let pending = this.pendingCreates.get(name);
        if (pending) {
            if (pending.dimension !== dimension) {
                logger.warn(`Collection ${name} is already being ensured with dimension ${pending.dimension}, ignoring ${dimension}`);
            }
        } else {
            pending = this.startEnsure(name, dimension);
        }
        return this.join(name, pending, signal);
    }

    async collectionExists(name: string, signal?: AbortSignal): Promise<boolean> {
        return this.policy.execute(() => this.exists(name), {
            signal,
            operation: `check collection ${name}`
        });
    }

    async deleteCollection(name: string, signal?: AbortSignal): Promise<void> {
        await this.policy.execute(async () => {
            try {
                await this.client.deleteCollection(name);
            } catch (err) {
                const failure = toStoreFailure(err, name);
                if (failure instanceof CollectionNotFound) return;
                throw failure;
            }
        }, { signal, operation: `delete collection ${name}` });
        logger.info(`Deleted collection ${name}`);
    }

    async upsert(name: string, points: Point[], signal?: AbortSignal): Promise<void> {
        if (points.length === 0) return;

        let missing = false;
        await this.policy.execute(async () => {
            if (missing) {
                logger.warn(`Collection ${name} missing on upsert, creating it`);
                await this.create(name, points[0].vector.length);
                missing = false;
            }

            try {
                await this.client.upsert(name, {
                    wait: true,
                    points: points.map(p => ({ id: p.id, vector: p.vector, payload: p.payload }))
                });
            } catch (err) {
                const failure = toStoreFailure(err, name);
                if (failure instanceof CollectionNotFound) missing = true;
                throw failure;
            }
        }, {
            signal,
            operation: `upsert ${points.length} points into ${name}`,
            isRetryable: err => err instanceof RetryableStoreFailure || err instanceof CollectionNotFound
        });
    }

    async query(name: string, vector: number[], limit: number, signal?: AbortSignal): Promise<SearchResult[]> {
        const res = await this.policy.execute(async () => {
            try {
                return await this.client.query(name, { query: vector, limit, with_payload: true });
            } catch (err) {
                throw toStoreFailure(err, name);
            }
        }, { signal, operation: `query ${name}` });

        return res.points
            .map(p => {
                const payload = toPayload(p.payload);
                return { id: String(p.id), score: p.score, text: payload.text, payload };
            })
            .sort((a, b) => b.score - a.score);
    }

    private startEnsure(name: string, dimension: number): PendingEnsure {
        const controller = new AbortController();
        const pending: PendingEnsure = { dimension, waiters: 0, controller, work: Promise.resolve() };

        pending.work = this.policy.execute(async () => {
            if (await this.exists(name)) return;
            await this.create(name, dimension);
        }, { signal: controller.signal, operation: `ensure collection ${name}` }).finally(() => {
            this.forget(name, pending);
        });

        this.pendingCreates.set(name, pending);
        return pending;
    }

    // Each caller waits under its own signal; the shared work stops only once every caller has gone
    private join(name: string, pending: PendingEnsure, signal?: AbortSignal): Promise<void> {
        pending.waiters++;
        if (!signal) return pending.work;

        return new Promise<void>((resolve, reject) => {
            const onAbort = () => {
                pending.waiters--;
                if (pending.waiters === 0) {
                    this.forget(name, pending);
                    pending.controller.abort(signal.reason);
                }
                reject(new OperationCancelled('Operation cancelled', { cause: signal.reason }));
            };
            signal.addEventListener('abort', onAbort, { once: true });

            pending.work.then(() => {
                signal.removeEventListener('abort', onAbort);
                resolve();
            }, err => {
                signal.removeEventListener('abort', onAbort);
                reject(err);
            });
        });
    }

    private forget(name: string, pending: PendingEnsure): void {
        if (this.pendingCreates.get(name) === pending) {
            this.pendingCreates.delete(name);
        }
    }

    private async exists(name: string): Promise<boolean> {
        try {
            const res = await this.client.collectionExists(name);
            return res.exists;
        } catch (err) {
            throw toStoreFailure(err);
        }
    }

    private async create(name: string, dimension: number): Promise<void> {
        try {
            await this.client.createCollection(name, {
                vectors: { size: dimension, distance: 'Cosine' }
            });
            logger.info(`Created collection ${name}`, { dimension });
        } catch (err) {
            if (isAlreadyExists(err)) return;
            throw toStoreFailure(err);
        }
    }
}

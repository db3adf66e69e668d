import { Point, SearchResult, VectorStore } from './vectorStore.interface';
import { CollectionNotFound, PermanentStoreFailure } from '../errors';

interface Collection {
    dimension: number;
    points: Map<string, Point>;
}

const cosine = (a: number[], b: number[]): number => {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) return 0;
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

/**
 * In-process store with Qdrant's semantics for the operations we use.
 * Backs VECTOR_STORE_PROVIDER=memory and the service tests.
 */
export class MemoryStore implements VectorStore {
    private collections = new Map<string, Collection>();

    async ensureCollection(name: string, dimension: number): Promise<void> {
        if (!this.collections.has(name)) {
            this.collections.set(name, { dimension, points: new Map() });
        }
    }

    async collectionExists(name: string): Promise<boolean> {
        return this.collections.has(name);
    }

    async deleteCollection(name: string): Promise<void> {
        this.collections.delete(name);
    }

    async upsert(name: string, points: Point[]): Promise<void> {
        if (points.length === 0) return;

        await this.ensureCollection(name, points[0].vector.length);
        const collection = this.collectionOrThrow(name);

        for (const point of points) {
            this.checkDimension(name, collection, point.vector);
        }
        for (const point of points) {
            collection.points.set(point.id, { ...point, vector: point.vector.slice() });
        }
    }

    async query(name: string, vector: number[], limit: number): Promise<SearchResult[]> {
        const collection = this.collectionOrThrow(name);
        this.checkDimension(name, collection, vector);

        return [...collection.points.values()]
            .map(p => ({ id: p.id, score: cosine(vector, p.vector), text: p.payload.text, payload: p.payload }))
            .sort((a, b) => b.score - a.score)
            .slice(0, limit);
    }

    private collectionOrThrow(name: string): Collection {
        const collection = this.collections.get(name);
        if (!collection) throw new CollectionNotFound(name);
        return collection;
    }

    private checkDimension(name: string, collection: Collection, vector: number[]): void {
        if (vector.length !== collection.dimension) {
            throw new PermanentStoreFailure(
                `Wrong vector dimension for collection ${name}: expected ${collection.dimension}, got ${vector.length}`
            );
        }
    }
}

export type PointPayload = {
    text: string;
    source?: string;
    chunk_index?: number;
};

export interface Point {
    id: string;
    vector: number[];
    payload: PointPayload;
}

export interface SearchResult {
    id: string;
    score: number;
    text: string;
    payload: PointPayload;
}

export interface VectorStore {
    /**
     * Create the collection with cosine distance when it is missing.
     * Idempotent: an "already exists" answer from the store is success.
     */
    ensureCollection(name: string, dimension: number, signal?: AbortSignal): Promise<void>;

    collectionExists(name: string, signal?: AbortSignal): Promise<boolean>;

    deleteCollection(name: string, signal?: AbortSignal): Promise<void>;

    /**
     * Write the whole batch, replacing points with the same id.
     * A missing collection is created from the batch's vector length.
     */
    upsert(name: string, points: Point[], signal?: AbortSignal): Promise<void>;

    /**
     * Top-`limit` points by cosine similarity, highest score first.
     * @throws CollectionNotFound when the collection was never created
     */
    query(name: string, vector: number[], limit: number, signal?: AbortSignal): Promise<SearchResult[]>;
}

import { LazyEmbeddingProvider } from './embeddingProvider';

export const HASH_EMBEDDING_DIMENSION = 384;

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

// 32-bit FNV-1a
const fnv1a = (value: string): number => {
    let hash = 0x811c9dc5;
    for (let i = 0; i < value.length; i++) {
        hash ^= value.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
};

interface HashModel {
    dimension: number;
}

/**
 * Feature-hashing embedder: each lower-cased word token lands in one bucket
 * with a sign taken from the hash. Deterministic and offline; texts sharing
 * vocabulary end up close under cosine similarity.
 */
export class HashEmbeddingProvider extends LazyEmbeddingProvider<HashModel> {
    readonly modelName: string;
    private readonly size: number;

    constructor(size: number = HASH_EMBEDDING_DIMENSION) {
        super();
        if (!Number.isInteger(size) || size <= 0) {
            throw new RangeError(`Embedding dimension must be a positive integer, got ${size}`);
        }
        this.size = size;
        this.modelName = `feature-hash-${size}`;
    }

    protected async load(): Promise<HashModel> {
        return { dimension: this.size };
    }

    protected dimensionOf(model: HashModel): number {
        return model.dimension;
    }

    protected async encode(model: HashModel, texts: string[]): Promise<number[][]> {
        return texts.map(text => this.vectorize(model.dimension, text));
    }

    private vectorize(dimension: number, text: string): number[] {
        const vector = new Array<number>(dimension).fill(0);
        const tokens = text.toLowerCase().match(TOKEN_PATTERN) || [];

        for (const token of tokens) {
            const hash = fnv1a(token);
            const bucket = hash % dimension;
            vector[bucket] += (hash & 0x80000000) === 0 ? 1 : -1;
        }

        // Unit vector for token-free input so cosine stays defined
        if (!vector.some(v => v !== 0)) {
            vector[0] = 1;
        }
        return vector;
    }
}

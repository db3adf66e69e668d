export interface EmbeddingProvider {
    readonly modelName: string;

    /** Vector length; loads the model on first use. */
    dimension(): Promise<number>;

    embed(text: string): Promise<number[]>;

    /** One vector per input, in input order. */
    embedMany(texts: string[]): Promise<number[][]>;
}

export const l2Normalize = (vector: number[]): number[] => {
    let sumSquares = 0;
    for (const v of vector) sumSquares += v * v;

    const norm = Math.sqrt(sumSquares);
    if (norm === 0) return vector.slice();
    return vector.map(v => v / norm);
};

/**
 * Base for providers that need a one-time load step (model download,
 * dimension probe). Concurrent first callers share a single in-flight load;
 * a failed load is forgotten so the next call tries again.
 */
export abstract class LazyEmbeddingProvider<TModel> implements EmbeddingProvider {
    abstract readonly modelName: string;

    private loading?: Promise<TModel>;

    protected abstract load(): Promise<TModel>;

    protected abstract encode(model: TModel, texts: string[]): Promise<number[][]>;

    protected abstract dimensionOf(model: TModel): number;

    protected model(): Promise<TModel> {
        if (!this.loading) {
            this.loading = this.load().catch(err => {
                this.loading = undefined;
                throw err;
            });
        }
        return this.loading;
    }

    async dimension(): Promise<number> {
        return this.dimensionOf(await this.model());
    }

    async embed(text: string): Promise<number[]> {
        const [vector] = await this.embedMany([text]);
        return vector;
    }

    async embedMany(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];

        const model = await this.model();
        const vectors = await this.encode(model, texts);
        return vectors.map(l2Normalize);
    }
}

import axios, { AxiosInstance } from 'axios';
import { errorMessage } from '@docqa/service-template';
import { LazyEmbeddingProvider } from './embeddingProvider';
import { EmbeddingFailure } from '../errors';

export type EmbeddingHttpClient = Pick<AxiosInstance, 'post'>;

export interface OpenAIEmbeddingConfig {
    baseUrl: string;
    model: string;
    apiKey?: string;
    /** Skips the probe request when known up front. */
    dimension?: number;
    timeoutMs?: number;
}

interface EmbeddingsResponse {
    data: { index: number; embedding: number[] }[];
}

interface LoadedModel {
    dimension: number;
}

/**
 * Client for any OpenAI-compatible `/embeddings` endpoint
 * (OpenAI, Ollama, text-embeddings-inference, vLLM).
 */
export class OpenAIEmbeddingProvider extends LazyEmbeddingProvider<LoadedModel> {
    readonly modelName: string;
    private readonly http: EmbeddingHttpClient;
    private readonly configuredDimension?: number;

    constructor(config: OpenAIEmbeddingConfig, http?: EmbeddingHttpClient) {
        super();
        this.modelName = config.model;
        this.configuredDimension = config.dimension;
        this.http = http || axios.create({
            baseURL: config.baseUrl.replace(/\/+$/, ''),
            timeout: config.timeoutMs ?? 30000,
            headers: {
                'Content-Type': 'application/json',
                ...(config.apiKey ? { 'Authorization': `Bearer ${config.apiKey}` } : {})
            }
        });
    }

    protected async load(): Promise<LoadedModel> {
        if (this.configuredDimension !== undefined) {
            return { dimension: this.configuredDimension };
        }

        const [probe] = await this.request(['dimension probe']);
        return { dimension: probe.length };
    }

    protected dimensionOf(model: LoadedModel): number {
        return model.dimension;
    }

    protected async encode(model: LoadedModel, texts: string[]): Promise<number[][]> {
        const vectors = await this.request(texts);

        for (const vector of vectors) {
            if (vector.length !== model.dimension) {
                throw new EmbeddingFailure(
                    `Model ${this.modelName} returned a ${vector.length}-dimensional vector, expected ${model.dimension}`
                );
            }
        }
        return vectors;
    }

    private async request(texts: string[]): Promise<number[][]> {
        let body: EmbeddingsResponse;
        try {
            const res = await this.http.post<EmbeddingsResponse>('/embeddings', {
                model: this.modelName,
                input: texts
            });
            body = res.data;
        } catch (err) {
            throw new EmbeddingFailure(`Embedding request failed: ${errorMessage(err)}`, { cause: err });
        }

        if (!body || !Array.isArray(body.data) || body.data.length !== texts.length) {
            throw new EmbeddingFailure(
                `Embedding endpoint returned ${Array.isArray(body?.data) ? body.data.length : 0} vectors for ${texts.length} inputs`
            );
        }

        return [...body.data]
            .sort((a, b) => a.index - b.index)
            .map(item => item.embedding);
    }
}

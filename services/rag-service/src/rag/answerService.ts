import { OperationCancelled, errorMessage, logger } from '@docqa/service-template';
import { CollectionNotFound, EmbeddingProvider, SearchResult, VectorStore } from '@docqa/retrieval';
import { LLMProvider } from '../providers/base';
import { fillTemplate } from '../prompts';

export const NO_DOCUMENTS_ANSWER = "Collection doesn't exist. Please upload a document first.";
export const NO_RESULTS_ANSWER = 'No results found. Please upload a document first.';
export const ANSWER_ERROR_PREFIX = 'Error generating answer: ';

export type AnswerStatus = 'answered' | 'no_documents' | 'no_results' | 'llm_error';

export interface AnswerWithSources {
    answer: string;
    status: AnswerStatus;
    /** The hits passed to the model as context, best first. */
    sources: SearchResult[];
}

export interface AnsweringOptions {
    collection: string;
    topK: number;
    temperature: number;
    maxTokens: number;
}

export interface AnsweringDeps {
    embedder: EmbeddingProvider;
    store: VectorStore;
    llm: LLMProvider;
    /** Prompt with `{{query}}` and `{{context}}` placeholders. */
    template: string;
    options: AnsweringOptions;
}

export interface AskOptions {
    topK?: number;
    signal?: AbortSignal;
}

export class AnsweringService {
    private embedder: EmbeddingProvider;
    private store: VectorStore;
    private llm: LLMProvider;
    private template: string;
    private options: AnsweringOptions;

    constructor(deps: AnsweringDeps) {
        this.embedder = deps.embedder;
        this.store = deps.store;
        this.llm = deps.llm;
        this.template = deps.template;
        this.options = deps.options;
    }

    async answer(query: string, ask: AskOptions = {}): Promise<string> {
        return (await this.answerWithSources(query, ask)).answer;
    }

    /**
     * Retrieve context for the query and have the model answer from it.
     * Missing data and model failures come back as answer text, never as
     * exceptions; embedding and store failures are thrown.
     */
    async answerWithSources(query: string, ask: AskOptions = {}): Promise<AnswerWithSources> {
        const { signal } = ask;

        if (!(await this.collectionReady(signal))) {
            return { answer: NO_DOCUMENTS_ANSWER, status: 'no_documents', sources: [] };
        }

        let hits: SearchResult[];
        try {
            hits = await this.search(query, ask);
        } catch (err) {
            if (err instanceof CollectionNotFound) {
                return { answer: NO_DOCUMENTS_ANSWER, status: 'no_documents', sources: [] };
            }
            throw err;
        }

        if (hits.length === 0) {
            return { answer: NO_RESULTS_ANSWER, status: 'no_results', sources: [] };
        }

        const context = hits.map(h => h.text).join('\n\n');
        const prompt = fillTemplate(this.template, { query, context });

        try {
            let answer = '';
            for await (const fragment of this.llm.stream(
                [{ role: 'user', content: prompt }],
                { temperature: this.options.temperature, max_tokens: this.options.maxTokens },
                signal
            )) {
                answer += fragment;
            }
            return { answer, status: 'answered', sources: hits };
        } catch (err) {
            logger.warn('Answer generation failed', { provider: this.llm.name, error: errorMessage(err) });
            return { answer: `${ANSWER_ERROR_PREFIX}${errorMessage(err)}`, status: 'llm_error', sources: hits };
        }
    }

    /** Top-K chunks for the query, highest score first. */
    async search(query: string, ask: AskOptions = {}): Promise<SearchResult[]> {
        const vector = await this.embedder.embed(query);
        return this.store.query(this.options.collection, vector, ask.topK ?? this.options.topK, ask.signal);
    }

    async collectionExists(signal?: AbortSignal): Promise<boolean> {
        return this.store.collectionExists(this.options.collection, signal);
    }

    async deleteCollection(signal?: AbortSignal): Promise<void> {
        await this.store.deleteCollection(this.options.collection, signal);
        logger.info(`Collection ${this.options.collection} deleted on request`);
    }

    // A failed existence check counts as "exists"; the query itself decides
    private async collectionReady(signal?: AbortSignal): Promise<boolean> {
        try {
            return await this.store.collectionExists(this.options.collection, signal);
        } catch (err) {
            if (err instanceof OperationCancelled) throw err;
            logger.warn('Collection check failed, assuming it exists', { error: errorMessage(err) });
            return true;
        }
    }
}

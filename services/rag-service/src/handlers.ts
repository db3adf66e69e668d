import { NextFunction, Request, Response } from 'express';
import { loadSchema, parseBody, requestSignal } from '@docqa/service-template';
import { SearchResult } from '@docqa/retrieval';
import { AnsweringService } from './rag/answerService';

interface QueryRequest {
    query: string;
    top_k?: number;
}

const validateAnswer = loadSchema<QueryRequest>('AnswerRequest.json');
const validateSearch = loadSchema<QueryRequest>('SearchRequest.json');

const toSource = (hit: SearchResult) => ({
    id: hit.id,
    score: hit.score,
    text: hit.text,
    source: hit.payload.source,
    chunk_index: hit.payload.chunk_index
});

export const createRagHandlers = (service: AnsweringService, collection: string) => {
    const handleAnswer = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { query, top_k } = parseBody(validateAnswer, req.body);
            const result = await service.answerWithSources(query, { topK: top_k, signal: requestSignal(res) });

            res.json({
                answer: result.answer,
                status: result.status,
                sources: result.sources.map(toSource)
            });
        } catch (err) {
            next(err);
        }
    };

    const handleSearch = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { query, top_k } = parseBody(validateSearch, req.body);
            const hits = await service.search(query, { topK: top_k, signal: requestSignal(res) });

            res.json({ results: hits.map(toSource) });
        } catch (err) {
            next(err);
        }
    };

    const handleCollectionInfo = async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json({ collection, exists: await service.collectionExists(requestSignal(res)) });
        } catch (err) {
            next(err);
        }
    };

    const handleCollectionDelete = async (req: Request, res: Response, next: NextFunction) => {
        try {
            await service.deleteCollection(requestSignal(res));
            res.json({ collection, deleted: true });
        } catch (err) {
            next(err);
        }
    };

    return { handleAnswer, handleSearch, handleCollectionInfo, handleCollectionDelete };
};

import { Router } from 'express';
import { createRagHandlers } from './handlers';
import { AnsweringService } from './rag/answerService';

export const createRouter = (service: AnsweringService, collection: string): Router => {
    const router = Router();
    const handlers = createRagHandlers(service, collection);

    router.post('/rag/answer', handlers.handleAnswer);
    router.post('/rag/search', handlers.handleSearch);

    // Administrative
    router.get('/rag/collection', handlers.handleCollectionInfo);
    router.delete('/rag/collection', handlers.handleCollectionDelete);

    return router;
};

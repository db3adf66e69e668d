import { NextFunction, Request, Response, Router } from 'express';
import multer from 'multer';
import { ValidationFailure } from '@docqa/service-template';
import { createIngestionHandlers, IngestionHandlerDeps } from './handlers/ingestionHandler';

export interface RouterDeps extends IngestionHandlerDeps {
    uploadDir: string;
    maxUploadBytes: number;
}

export const createRouter = (deps: RouterDeps): Router => {
    const router = Router();
    const handlers = createIngestionHandlers(deps);
    const upload = multer({ dest: deps.uploadDir, limits: { fileSize: deps.maxUploadBytes } }).single('file');

    // Stage the multipart `file` field on disk; multer's own limits become 400s
    const stageUpload = (req: Request, res: Response, next: NextFunction) => {
        upload(req, res, (err: unknown) => {
            if (err instanceof multer.MulterError) {
                return next(new ValidationFailure(`Upload rejected: ${err.message}`, [`/${err.field || 'file'} ${err.code}`]));
            }
            next(err);
        });
    };

    // Direct Ingestion
    router.post('/ingest/upload', stageUpload, handlers.uploadDocument);
    router.post('/ingest/url', handlers.ingestUrl);

    return router;
};

import fs from 'fs/promises';
import { NextFunction, Request, Response } from 'express';
import {
    ValidationFailure,
    errorMessage,
    loadSchema,
    logger,
    parseBody,
    requestSignal
} from '@docqa/service-template';
import { IngestionPipeline, IngestionResult } from '../pipeline/ingestionPipeline';
import { Connector, Credentials } from '../connectors/base';
import { FORMAT_LABELS, detectFormat } from '../normalizer/formats';

interface IngestUrlRequest {
    url: string;
    credentials?: Credentials;
}

const validateIngestUrl = loadSchema<IngestUrlRequest>('IngestUrlRequest.json');

export interface IngestionHandlerDeps {
    pipeline: IngestionPipeline;
    connector: Connector;
}

const summary = (result: IngestionResult) => ({
    status: 'success',
    message: `Processed ${FORMAT_LABELS[result.format]} '${result.filename}' into ${result.chunks_created} chunks`,
    ...result
});

export const createIngestionHandlers = ({ pipeline, connector }: IngestionHandlerDeps) => {
    const uploadDocument = async (req: Request, res: Response, next: NextFunction) => {
        const file = req.file; // multer adds this
        try {
            if (!file) {
                throw new ValidationFailure('File required', ['/file is required']);
            }

            const format = detectFormat(file.originalname);
            const content = await fs.readFile(file.path);
            const result = await pipeline.ingest({ content, format }, file.originalname, requestSignal(res));

            res.json(summary(result));
        } catch (err) {
            next(err);
        } finally {
            if (file) {
                await fs.rm(file.path, { force: true }).catch(err => {
                    logger.warn(`Could not remove staged upload ${file.path}`, { error: errorMessage(err) });
                });
            }
        }
    };

    const ingestUrl = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseBody(validateIngestUrl, req.body);
            const document = await connector.fetch(body.url, body.credentials);
            const result = await pipeline.ingest(document, document.filename, requestSignal(res));

            res.json({ ...summary(result), source_url: document.sourceUri });
        } catch (err) {
            next(err);
        }
    };

    return { uploadDocument, ingestUrl };
};

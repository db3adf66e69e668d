import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import bodyParser from 'body-parser';
import { Server } from 'http';
import { logger } from './logger';

export const createService = (name: string): Express => {
    const app = express();
    logger.defaultMeta = { service: name };

    app.use(cors());
    app.use(bodyParser.json({ limit: '1mb' }));

    // Request logging
    app.use((req: Request, res: Response, next: NextFunction) => {
        const startedAt = Date.now();
        logger.info(`Incoming request: ${req.method} ${req.url}`);

        res.on('finish', () => {
            const meta = { status: res.statusCode, duration_ms: Date.now() - startedAt };
            if (res.statusCode >= 500) {
                logger.error(`Request failed: ${req.method} ${req.url}`, meta);
            } else {
                logger.info(`Request completed: ${req.method} ${req.url}`, meta);
            }
        });

        next();
    });

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({ status: 'ok', service: name, timestamp: new Date().toISOString() });
    });

    return app;
};

export const startService = (app: Express, port: number): Server => {
    return app.listen(port, () => {
        logger.info(`Service listening on port ${port}`);
    });
};

/**
 * Signal that fires when the client goes away before the response was written.
 * Handlers pass it down so pending store calls and backoff sleeps stop early.
 */
export const requestSignal = (res: Response): AbortSignal => {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableFinished) {
            controller.abort(new Error('Client closed the request'));
        }
    });
    return controller.signal;
};

export { logger };
export * from './errors';
export * from './env';
export * from './validation';

import { Request, Response, NextFunction } from 'express';
import { logger } from './logger';

/**
 * Base class for every error a service surfaces on purpose.
 * `code` is stable and machine-readable, `status` is the HTTP status the
 * error handler answers with.
 */
export class ServiceError extends Error {
    readonly code: string;
    readonly status: number;

    constructor(message: string, code: string, status: number = 500, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
        this.status = status;
    }
}

export class ValidationFailure extends ServiceError {
    readonly details: string[];

    constructor(message: string, details: string[] = []) {
        super(message, 'VALIDATION_FAILURE', 400);
        this.details = details;
    }
}

export class OperationCancelled extends ServiceError {
    constructor(message: string = 'Operation cancelled', options?: { cause?: unknown }) {
        super(message, 'OPERATION_CANCELLED', 499, options);
    }
}

export const errorMessage = (err: unknown): string => {
    if (err instanceof Error) return err.message;
    return String(err);
};

export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
        return next(err);
    }

    if (err instanceof ValidationFailure) {
        return res.status(err.status).json({ error: err.message, code: err.code, details: err.details });
    }

    if (err instanceof ServiceError) {
        if (err.status >= 500) {
            logger.error(`${req.method} ${req.url} failed`, { code: err.code, error: err.message });
        } else {
            logger.warn(`${req.method} ${req.url} rejected`, { code: err.code, error: err.message });
        }
        return res.status(err.status).json({ error: err.message, code: err.code });
    }

    logger.error(`${req.method} ${req.url} failed unexpectedly`, { error: errorMessage(err) });
    res.status(500).json({ error: errorMessage(err), code: 'INTERNAL_ERROR' });
};

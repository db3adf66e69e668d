import { Request } from 'express';
import { errorHandler, ServiceError, ValidationFailure } from './errors';
import { logger } from './logger';

function mockRequest(): Request {
    const req = {} as Request;
    req.method = 'POST';
    req.url = '/rag/answer';
    return req;
}

function mockResponse() {
    const res = {} as any;
    res.headersSent = false;
    res.status = jest.fn().mockReturnValue(res);
    res.json = jest.fn().mockReturnValue(res);
    return res;
}

describe('errorHandler', () => {
    beforeEach(() => {
        jest.spyOn(logger, 'warn').mockImplementation(() => logger);
        jest.spyOn(logger, 'error').mockImplementation(() => logger);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should answer a ServiceError with its own status and code', () => {
        const res = mockResponse();
        const next = jest.fn();

        errorHandler(new ServiceError('Collection is gone', 'COLLECTION_NOT_FOUND', 404), mockRequest(), res, next);

        expect(res.status).toHaveBeenCalledWith(404);
        expect(res.json).toHaveBeenCalledWith({ error: 'Collection is gone', code: 'COLLECTION_NOT_FOUND' });
        expect(next).not.toHaveBeenCalled();
    });

    it('should include validation details', () => {
        const res = mockResponse();

        errorHandler(new ValidationFailure('Invalid request body', ['/query must be string']), mockRequest(), res, jest.fn());

        expect(res.status).toHaveBeenCalledWith(400);
        expect(res.json).toHaveBeenCalledWith({
            error: 'Invalid request body',
            code: 'VALIDATION_FAILURE',
            details: ['/query must be string']
        });
    });

    it('should map unknown errors to 500', () => {
        const res = mockResponse();

        errorHandler(new Error('boom'), mockRequest(), res, jest.fn());

        expect(res.status).toHaveBeenCalledWith(500);
        expect(res.json).toHaveBeenCalledWith({ error: 'boom', code: 'INTERNAL_ERROR' });
        expect(logger.error).toHaveBeenCalled();
    });

    it('should delegate once headers are sent', () => {
        const res = mockResponse();
        res.headersSent = true;
        const next = jest.fn();
        const err = new Error('late');

        errorHandler(err, mockRequest(), res, next);

        expect(next).toHaveBeenCalledWith(err);
        expect(res.status).not.toHaveBeenCalled();
    });
});

describe('ServiceError', () => {
    test('keeps subclass name and cause', () => {
        const cause = new Error('socket hang up');
        const err = new ValidationFailure('bad');
        const wrapped = new ServiceError('wrapped', 'X', 502, { cause });

        expect(err.name).toBe('ValidationFailure');
        expect(err).toBeInstanceOf(ServiceError);
        expect(wrapped.cause).toBe(cause);
    });
});

import { OperationCancelled } from '@docqa/service-template';
import { classifyFailure, isAlreadyExists, toStoreFailure } from './failures';
import { CollectionNotFound, PermanentStoreFailure, RetryableStoreFailure } from '../errors';

const httpError = (message: string, status: number) => Object.assign(new Error(message), { status });

describe('classifyFailure', () => {
    it('should treat transport problems as retryable', () => {
        expect(classifyFailure('Connection timeout while handshaking')).toBe('retryable');
        expect(classifyFailure('SSL: WRONG_VERSION_NUMBER')).toBe('retryable');
        expect(classifyFailure('TLS session dropped')).toBe('retryable');
        expect(classifyFailure('Read TIMEOUT')).toBe('retryable');
    });

    it('should treat everything else as permanent', () => {
        expect(classifyFailure('Invalid payload schema')).toBe('permanent');
        expect(classifyFailure('Wrong input: Vector dimension error')).toBe('permanent');
        expect(classifyFailure('')).toBe('permanent');
    });
});

describe('toStoreFailure', () => {
    it('should map a 404 on a named collection to CollectionNotFound', () => {
        const failure = toStoreFailure(httpError('Not Found', 404), 'pdf_chunks');

        expect(failure).toBeInstanceOf(CollectionNotFound);
        expect(failure.message).toBe("Collection 'pdf_chunks' does not exist");
    });

    it('should recognise a missing collection from the message', () => {
        const failure = toStoreFailure(new Error("Collection `pdf_chunks` doesn't exist!"), 'pdf_chunks');
        expect(failure).toBeInstanceOf(CollectionNotFound);
    });

    it.each([408, 429, 500, 503])('should retry on status %i', status => {
        expect(toStoreFailure(httpError('upstream said no', status))).toBeInstanceOf(RetryableStoreFailure);
    });

    it.each([400, 401, 403, 422])('should not retry on status %i', status => {
        expect(toStoreFailure(httpError('upstream said no', status))).toBeInstanceOf(PermanentStoreFailure);
    });

    it('should read Node error codes from the error or its cause', () => {
        const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
        const undici = new TypeError('fetch failed', { cause: Object.assign(new Error('other side closed'), { code: 'UND_ERR_SOCKET' }) });

        expect(toStoreFailure(reset)).toBeInstanceOf(RetryableStoreFailure);
        expect(toStoreFailure(undici)).toBeInstanceOf(RetryableStoreFailure);
    });

    it('should fall back to the message text', () => {
        expect(toStoreFailure(new Error('TLS handshake failed'))).toBeInstanceOf(RetryableStoreFailure);
        expect(toStoreFailure(new Error('Invalid payload schema'))).toBeInstanceOf(PermanentStoreFailure);
    });

    it('should pass mapped failures through untouched', () => {
        const permanent = new PermanentStoreFailure('bad vector');
        const cancelled = new OperationCancelled();

        expect(toStoreFailure(permanent)).toBe(permanent);
        expect(toStoreFailure(cancelled)).toBe(cancelled);
    });
});

describe('isAlreadyExists', () => {
    it('should accept a 409 or an "already exists" message', () => {
        expect(isAlreadyExists(httpError('Conflict', 409))).toBe(true);
        expect(isAlreadyExists(new Error('Collection `pdf_chunks` already exists!'))).toBe(true);
        expect(isAlreadyExists(new Error('Bad Request'))).toBe(false);
    });
});

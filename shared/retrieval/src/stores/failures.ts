import { OperationCancelled, errorMessage } from '@docqa/service-template';
import {
    CollectionNotFound,
    PermanentStoreFailure,
    RetryableStoreFailure,
    StoreFailure
} from '../errors';

export type FailureKind = 'retryable' | 'permanent';

const RETRYABLE_MARKERS = ['timeout', 'handshake', 'ssl', 'tls', 'connection'];

const RETRYABLE_CODES = new Set([
    'ECONNRESET',
    'ECONNREFUSED',
    'ECONNABORTED',
    'ETIMEDOUT',
    'EPIPE',
    'EAI_AGAIN',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_SOCKET',
    'UND_ERR_HEADERS_TIMEOUT',
    'UND_ERR_BODY_TIMEOUT'
]);

/** Decide from an error description alone whether another attempt may succeed. */
export const classifyFailure = (description: string): FailureKind => {
    const lowered = description.toLowerCase();
    return RETRYABLE_MARKERS.some(marker => lowered.includes(marker)) ? 'retryable' : 'permanent';
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null;
};

const numberField = (value: unknown, field: string): number | undefined => {
    if (!isRecord(value)) return undefined;
    const found = value[field];
    return typeof found === 'number' ? found : undefined;
};

const stringField = (value: unknown, field: string): string | undefined => {
    if (!isRecord(value)) return undefined;
    const found = value[field];
    return typeof found === 'string' ? found : undefined;
};

const statusOf = (err: unknown): number | undefined => {
    return numberField(err, 'status')
        ?? numberField(isRecord(err) ? err.response : undefined, 'status');
};

const codeOf = (err: unknown): string | undefined => {
    return stringField(err, 'code') ?? stringField(isRecord(err) ? err.cause : undefined, 'code');
};

const describe = (err: unknown): string => {
    const cause = isRecord(err) ? err.cause : undefined;
    return cause === undefined ? errorMessage(err) : `${errorMessage(err)} (${errorMessage(cause)})`;
};

export const isStoreFailure = (err: unknown): err is StoreFailure => {
    return err instanceof RetryableStoreFailure
        || err instanceof PermanentStoreFailure
        || err instanceof CollectionNotFound;
};

/** HTTP 409 or an "already exists" message from the store. */
export const isAlreadyExists = (err: unknown): boolean => {
    return statusOf(err) === 409 || describe(err).toLowerCase().includes('already exists');
};

/**
 * Map whatever the client threw into the store failure taxonomy.
 * Status code wins, then the Node/undici error code, then the message text.
 */
export const toStoreFailure = (err: unknown, collection?: string): StoreFailure | OperationCancelled => {
    if (isStoreFailure(err) || err instanceof OperationCancelled) {
        return err;
    }

    const description = describe(err);
    const lowered = description.toLowerCase();
    const status = statusOf(err);

    if (collection !== undefined
        && (status === 404 || lowered.includes('not found') || lowered.includes("doesn't exist"))) {
        return new CollectionNotFound(collection, { cause: err });
    }

    if (status !== undefined) {
        if (status === 408 || status === 429 || status >= 500) {
            return new RetryableStoreFailure(description, { cause: err });
        }
        if (status >= 400) {
            return new PermanentStoreFailure(description, { cause: err });
        }
    }

    const code = codeOf(err);
    if (code !== undefined && RETRYABLE_CODES.has(code)) {
        return new RetryableStoreFailure(description, { cause: err });
    }

    return classifyFailure(description) === 'retryable'
        ? new RetryableStoreFailure(description, { cause: err })
        : new PermanentStoreFailure(description, { cause: err });
};

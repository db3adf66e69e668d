import { ServiceError } from '@docqa/service-template';

/** Transient transport failure (timeout, TLS handshake, dropped connection). Safe to retry. */
export class RetryableStoreFailure extends ServiceError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'RETRYABLE_STORE_FAILURE', 503, options);
    }
}

/** Schema mismatch, malformed payload, rejected credentials. Retrying cannot help. */
export class PermanentStoreFailure extends ServiceError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'PERMANENT_STORE_FAILURE', 502, options);
    }
}

export class CollectionNotFound extends ServiceError {
    readonly collection: string;

    constructor(collection: string, options?: { cause?: unknown }) {
        super(`Collection '${collection}' does not exist`, 'COLLECTION_NOT_FOUND', 404, options);
        this.collection = collection;
    }
}

export class EmbeddingFailure extends ServiceError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'EMBEDDING_FAILURE', 502, options);
    }
}

export type StoreFailure = RetryableStoreFailure | PermanentStoreFailure | CollectionNotFound;

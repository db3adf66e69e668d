import { ServiceError } from '@docqa/service-template';

export class UnsupportedFormat extends ServiceError {
    constructor(message: string) {
        super(message, 'UNSUPPORTED_FORMAT', 415);
    }
}

export class UnsupportedLegacyFormat extends ServiceError {
    constructor(message: string) {
        super(message, 'UNSUPPORTED_LEGACY_FORMAT', 415);
    }
}

export class EmptyDocument extends ServiceError {
    constructor(message: string) {
        super(message, 'EMPTY_DOCUMENT', 400);
    }
}

export class CorruptDocument extends ServiceError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'CORRUPT_DOCUMENT', 422, options);
    }
}

/** The document parsed but yielded no text (scanned PDF, image-only slides). */
export class EmptyExtraction extends ServiceError {
    constructor(message: string) {
        super(message, 'EMPTY_EXTRACTION', 422);
    }
}

export class DownloadFailure extends ServiceError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'DOWNLOAD_FAILURE', 502, options);
    }
}

import { DocumentFormat } from '../normalizer/formats';

export interface RawDocument {
    sourceUri: string; // the address the caller asked for, before any rewriting
    filename: string;
    content: Buffer;
    format: DocumentFormat;
    contentType?: string;
}

/** Credentials for a protected source. Bearer tokens come from an external OAuth flow. */
export type Credentials =
    | { type: 'basic'; username: string; password: string }
    | { type: 'bearer'; token: string };

export interface Connector {
    fetch(uri: string, credentials?: Credentials): Promise<RawDocument>;
}

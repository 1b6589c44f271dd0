/**
 * Error taxonomy for the feed pipeline. Every class carries a `type`
 * discriminator that ends up in FetchResult / health report entries.
 */

export type FeedErrorType =
    | 'source_unavailable'
    | 'malformed_document'
    | 'malformed_entry'
    | 'serialization_error';

export abstract class FeedError extends Error {
    abstract readonly type: FeedErrorType;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class SourceUnavailableError extends FeedError {
    readonly type = 'source_unavailable';

    constructor(message: string, readonly httpStatus?: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class MalformedDocumentError extends FeedError {
    readonly type = 'malformed_document';
}

export class MalformedEntryError extends FeedError {
    readonly type = 'malformed_entry';
}

export class SerializationError extends FeedError {
    readonly type = 'serialization_error';
}

export class ConfigError extends Error {
    constructor(message: string, readonly issues: string[] = []) {
        super(issues.length ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConfigError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

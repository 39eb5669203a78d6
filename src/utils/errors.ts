import type { FetchedWork } from '../types/index.js';

/**
 * Failure categories. `record` errors are recovered locally and counted;
 * `chunk` errors roll back one chunk; the rest end the run.
 */
export type IngestErrorKind =
    | 'config'
    | 'connection'
    | 'schema'
    | 'fetch'
    | 'record'
    | 'chunk'
    | 'aborted';

/**
 * Base class for every error raised by the ingest pipeline.
 */
export class IngestError extends Error {
    constructor(
        message: string,
        public readonly kind: IngestErrorKind,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'IngestError';
    }
}

export class ConfigError extends IngestError {
    constructor(message: string) {
        super(message, 'config');
        this.name = 'ConfigError';
    }
}

/**
 * The store could not be opened or did not answer a ping.
 */
export class StoreConnectionError extends IngestError {
    constructor(message: string, cause?: unknown) {
        super(message, 'connection', { cause });
        this.name = 'StoreConnectionError';
    }
}

/**
 * The target table could not be created, dropped, or verified.
 */
export class SchemaError extends IngestError {
    constructor(message: string, cause?: unknown) {
        super(message, 'schema', { cause });
        this.name = 'SchemaError';
    }
}

/**
 * A page could not be fetched. Carries every work accumulated before the failing
 * page so the caller can decide whether to go on with a partial set.
 */
export class PageFetchError extends IngestError {
    constructor(
        message: string,
        public readonly page: number,
        public readonly attempts: number,
        public readonly partial: FetchedWork[],
        cause?: unknown
    ) {
        super(message, 'fetch', { cause });
        this.name = 'PageFetchError';
    }
}

/**
 * A raw work could not be turned into a normalized record.
 */
export class RecordTransformError extends IngestError {
    constructor(message: string, cause?: unknown) {
        super(message, 'record', { cause });
        this.name = 'RecordTransformError';
    }
}

/**
 * A single row was rejected by the store (constraint, type, or range violation).
 * The surrounding transaction is still usable.
 */
export class RecordWriteError extends IngestError {
    constructor(
        message: string,
        public readonly recordId: string,
        public readonly code: string | null,
        cause?: unknown
    ) {
        super(message, 'record', { cause });
        this.name = 'RecordWriteError';
    }
}

/**
 * The transaction itself is broken; the whole chunk must be rolled back.
 */
export class ChunkFatalError extends IngestError {
    constructor(
        message: string,
        public readonly code: string | null,
        cause?: unknown
    ) {
        super(message, 'chunk', { cause });
        this.name = 'ChunkFatalError';
    }
}

export class PipelineAbortedError extends IngestError {
    constructor(message = 'Run aborted') {
        super(message, 'aborted');
        this.name = 'PipelineAbortedError';
    }
}

/**
 * Render any thrown value as a one-line message.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

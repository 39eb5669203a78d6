import type { RawWork } from './paper.js';

/**
 * Inclusive publication-date window, as `YYYY-MM-DD` strings.
 */
export interface DateWindow {
    from: string;
    to: string;
    /** Lookback length the window was derived from */
    days: number;
}

/**
 * One page request against a works source.
 */
export interface PageRequest {
    window: DateWindow;

    /** OpenAlex subfield id used as subject filter, or null for no filter */
    subfield: string | null;

    /** Opaque cursor; `null` requests the first page */
    cursor: string | null;

    pageSize: number;
}

/**
 * One page of results.
 * End of results: `items.length < pageSize` or `nextCursor === null`.
 */
export interface WorksPage {
    items: RawWork[];

    /** Total number of works matching the request, when the source reports it */
    totalAvailable: number | null;

    nextCursor: string | null;
}

/**
 * Interface for paginated work sources (OpenAlex, test fakes).
 */
export interface WorksSource {
    /** Human-readable source name, recorded in backup metadata */
    readonly name: string;

    fetchPage(request: PageRequest, signal?: AbortSignal): Promise<WorksPage>;
}

/**
 * Options for source initialization.
 */
export interface WorksSourceOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Contact email for the OpenAlex polite pool */
    email?: string;
}

import type { FetchedWork } from './paper.js';
import type { DateWindow } from './source.js';

/**
 * Orchestrator states. FAILED is terminal and reachable from any step.
 */
export type PipelineState = 'INIT' | 'CONNECTED' | 'FETCHED' | 'PERSISTED' | 'AUDITED' | 'DONE' | 'FAILED';

/**
 * Progress emitted after every fetched page.
 */
export interface FetchProgress {
    page: number;
    pageCount: number;
    cumulative: number;
    totalAvailable: number | null;
}

/**
 * Everything a collector gathered for one window.
 */
export interface CollectResult {
    works: FetchedWork[];
    pages: number;
    totalAvailable: number | null;
    /** True when the page cap stopped pagination before the end of results */
    truncated: boolean;
}

/**
 * Anything that can produce the works of a run: the API fetcher, or a backup replay.
 */
export interface WorkCollector {
    /** Free-text description recorded in backup metadata */
    describe(): string;

    collect(window: DateWindow, signal?: AbortSignal): Promise<CollectResult>;
}

export type UpsertOutcome = 'inserted' | 'updated';

export interface UpsertStats {
    inserted: number;
    updated: number;
    /** Reserved; the full-replace policy never skips */
    skipped: number;
    errors: number;
    chunks: number;
    failedChunks: number;
    /** True when an abort signal stopped processing between chunks */
    aborted: boolean;
}

export interface RunSummary {
    fetched: number;
    inserted: number;
    updated: number;
    skipped: number;
    errors: number;
    chunks: number;
    failedChunks: number;
    pages: number;
    /** True when fetching stopped on an error and the run went on with what it had */
    partialFetch: boolean;
    elapsedMs: number;
}

export type CheckStatus = 'pass' | 'warn' | 'fail' | 'error';

export interface QualityCheckResult {
    name: string;
    description: string;
    status: CheckStatus;
    /** `pass` and `warn` count as passed */
    passed: boolean;
    affectedRows: number;
    samples: string[];
    details: Record<string, number | string | null>;
    error?: string;
}

export interface QualityReport {
    generatedAt: string;
    table: string;
    checks: QualityCheckResult[];
    passed: boolean;
    totals: {
        passed: number;
        warned: number;
        failed: number;
        errored: number;
    };
}

import type {
    CollectResult,
    DateWindow,
    FetchProgress,
    FetchedWork,
    WorkCollector,
    WorksPage,
    WorksSource,
} from '../types/index.js';
import { PageFetchError, PipelineAbortedError, errorMessage } from '../utils/errors.js';
import { sleep as defaultSleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { calculateBackoff, isTransientError, retryAfterOf } from '../utils/retry.js';

export interface FetcherOptions {
    /** OpenAlex subfield id, or null for no subject filter */
    subfield: string | null;
    pageSize: number;
    maxPages: number;
    /** Extra attempts per page after the first, for transient errors only */
    pageRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
    onProgress?: (progress: FetchProgress) => void;
    /** Backoff wait; resolves early when the signal fires */
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    random?: () => number;
    now?: () => Date;
}

/**
 * Walks every page of a works source for one publication window.
 *
 * Pages are requested one at a time. A transient failure is retried with
 * exponential backoff; when a page finally fails, the works already gathered
 * travel with the thrown PageFetchError.
 */
export class WorksFetcher implements WorkCollector {
    private readonly logger = getLogger();
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
    private readonly now: () => Date;

    constructor(
        private readonly source: WorksSource,
        private readonly options: FetcherOptions
    ) {
        this.sleep = options.sleep ?? defaultSleep;
        this.now = options.now ?? (() => new Date());
    }

    describe(): string {
        const subject = this.options.subfield ? `subfield ${this.options.subfield}` : 'all subjects';
        return `${this.source.name} works, ${subject}`;
    }

    /**
     * @throws PageFetchError when a page cannot be fetched
     * @throws PipelineAbortedError when `signal` fires between pages or during a backoff
     */
    async collect(window: DateWindow, signal?: AbortSignal): Promise<CollectResult> {
        const { pageSize, maxPages, subfield } = this.options;
        const works: FetchedWork[] = [];
        let cursor: string | null = null;
        let totalAvailable: number | null = null;
        let pages = 0;

        this.logger.info(
            { from: window.from, to: window.to, subfield, pageSize, maxPages },
            'Fetching works'
        );

        while (pages < maxPages) {
            if (signal?.aborted) {
                throw new PipelineAbortedError(`Fetch aborted after ${pages} pages`);
            }

            const pageNumber = pages + 1;
            const page = await this.fetchWithRetry(
                () => this.source.fetchPage({ window, subfield, cursor, pageSize }, signal),
                pageNumber,
                works,
                signal
            );

            const fetchedAt = this.now().toISOString();
            for (const item of page.items) {
                works.push({ ...item, fetched_at: fetchedAt });
            }
            pages = pageNumber;
            totalAvailable = page.totalAvailable ?? totalAvailable;

            const progress: FetchProgress = {
                page: pageNumber,
                pageCount: page.items.length,
                cumulative: works.length,
                totalAvailable,
            };
            this.logger.info(progress, 'Fetched page');
            this.options.onProgress?.(progress);

            if (page.items.length < pageSize || page.nextCursor === null) {
                return { works, pages, totalAvailable, truncated: false };
            }
            cursor = page.nextCursor;
        }

        this.logger.warn(
            { maxPages, fetched: works.length, totalAvailable },
            'Page limit reached before the end of results'
        );
        return { works, pages, totalAvailable, truncated: true };
    }

    private async fetchWithRetry(
        request: () => Promise<WorksPage>,
        page: number,
        partial: FetchedWork[],
        signal?: AbortSignal
    ): Promise<WorksPage> {
        const { pageRetries, initialBackoffMs, maxBackoffMs, random } = this.options;
        let attempt = 0;

        for (;;) {
            try {
                return await request();
            } catch (error) {
                attempt++;

                if (signal?.aborted) {
                    throw new PipelineAbortedError(`Fetch aborted during page ${page}`);
                }

                if (!isTransientError(error) || attempt > pageRetries) {
                    const reason = isTransientError(error) ? 'retries exhausted' : 'non-transient error';
                    throw new PageFetchError(
                        `Page ${page} failed after ${attempt} attempt(s) (${reason}): ${errorMessage(error)}`,
                        page,
                        attempt,
                        partial,
                        error
                    );
                }

                const backoff = calculateBackoff(attempt - 1, { initialMs: initialBackoffMs, maxMs: maxBackoffMs, random });
                const delay = Math.max(backoff, retryAfterOf(error) ?? 0);
                this.logger.warn(
                    { page, attempt, maxRetries: pageRetries, delay: Math.round(delay), error: errorMessage(error) },
                    'Retrying page'
                );
                await this.sleep(delay, signal);
                if (signal?.aborted) {
                    throw new PipelineAbortedError(`Fetch aborted while waiting to retry page ${page}`);
                }
            }
        }
    }
}

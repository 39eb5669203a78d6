import type { NormalizedPaper, UpsertStats } from '../types/index.js';
import type { PaperStore } from '../storage/database.js';
import { ChunkFatalError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { transformWork } from './transform.js';

export interface UpserterOptions {
    batchSize: number;
    /** Checked between chunks; a chunk in progress always completes */
    signal?: AbortSignal;
}

/**
 * Writes records in fixed-size chunks, one transaction per chunk.
 *
 * A rejected record is counted and the chunk goes on. A chunk-fatal error
 * rolls the chunk back and every record in it is counted as an error; the
 * next chunk starts on a clean transaction.
 */
export class BatchUpserter {
    private readonly logger = getLogger();

    constructor(
        private readonly store: PaperStore,
        private readonly options: UpserterOptions
    ) {
        if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
            throw new RangeError(`batchSize must be a positive integer, got ${options.batchSize}`);
        }
    }

    /**
     * Upsert already-normalized records.
     */
    upsert(records: readonly NormalizedPaper[]): UpsertStats {
        return this.process(records, (record) => record);
    }

    /**
     * Transform and upsert raw works. A work that cannot be transformed counts
     * as a record error of its chunk.
     */
    ingest(works: readonly unknown[]): UpsertStats {
        return this.process(works, (work) => transformWork(work));
    }

    private process<T>(items: readonly T[], toRecord: (item: T) => NormalizedPaper): UpsertStats {
        const { batchSize, signal } = this.options;
        const stats: UpsertStats = { inserted: 0, updated: 0, skipped: 0, errors: 0, chunks: 0, failedChunks: 0, aborted: false };
        const totalChunks = Math.ceil(items.length / batchSize);

        for (let start = 0; start < items.length; start += batchSize) {
            if (signal?.aborted) {
                this.logger.warn({ processed: start, total: items.length }, 'Upsert aborted between chunks');
                stats.aborted = true;
                break;
            }

            const chunk = items.slice(start, start + batchSize);
            const index = stats.chunks + 1;
            const result = this.processChunk(chunk, toRecord, index);

            stats.chunks = index;
            stats.errors += result.errors;
            if (result.committed) {
                stats.inserted += result.inserted;
                stats.updated += result.updated;
            } else {
                stats.failedChunks++;
            }

            this.logger.info(
                {
                    chunk: index,
                    totalChunks,
                    size: chunk.length,
                    inserted: result.inserted,
                    updated: result.updated,
                    errors: result.errors,
                    committed: result.committed,
                },
                'Processed chunk'
            );
        }

        return stats;
    }

    private processChunk<T>(
        chunk: readonly T[],
        toRecord: (item: T) => NormalizedPaper,
        index: number
    ): { inserted: number; updated: number; errors: number; committed: boolean } {
        let inserted = 0;
        let updated = 0;
        let errors = 0;

        try {
            this.store.begin();

            for (const item of chunk) {
                try {
                    const outcome = this.store.upsertPaper(toRecord(item));
                    if (outcome === 'inserted') inserted++;
                    else updated++;
                } catch (error) {
                    if (error instanceof ChunkFatalError) throw error;
                    errors++;
                    this.logger.warn({ chunk: index, error: errorMessage(error) }, 'Record rejected');
                }
            }

            this.store.commit();
            return { inserted, updated, errors, committed: true };
        } catch (error) {
            this.logger.error(
                { chunk: index, size: chunk.length, error: errorMessage(error) },
                'Chunk failed; rolling back'
            );
            this.rollbackChunk(index);
            return { inserted: 0, updated: 0, errors: chunk.length, committed: false };
        }
    }

    private rollbackChunk(index: number): void {
        try {
            this.store.rollback();
        } catch (error) {
            this.logger.error({ chunk: index, error: errorMessage(error) }, 'Rollback failed');
        }
    }
}

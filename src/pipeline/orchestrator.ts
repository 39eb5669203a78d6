import type {
    DateWindow,
    FetchedWork,
    IngestConfig,
    PipelineState,
    QualityReport,
    RunSummary,
    WorkCollector,
} from '../types/index.js';
import { writeBackup } from '../ingest/backup.js';
import { BatchUpserter } from '../ingest/upserter.js';
import { QualityAuditor } from '../quality/auditor.js';
import { writeQualityReport } from '../quality/report.js';
import { lookbackWindow } from '../sources/utils.js';
import { PaperStore } from '../storage/database.js';
import { ensurePapersTable } from '../storage/schema.js';
import { PageFetchError, PipelineAbortedError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface PipelineDependencies {
    /** Where the works of the run come from */
    collector: WorkCollector;
    /** Opens the store; defaults to a PaperStore on `config.dbPath` */
    connect?: () => PaperStore;
    now?: () => Date;
    /** Honoured between pages and between chunks */
    signal?: AbortSignal;
}

export interface PipelineResult {
    ok: boolean;
    /** DONE or FAILED */
    state: PipelineState;
    /** Every state entered, starting with INIT */
    transitions: PipelineState[];
    /** Always present; partial when the run failed */
    summary: RunSummary;
    report: QualityReport | null;
    backupPath: string | null;
    reportPath: string | null;
    error: Error | null;
}

function emptySummary(): RunSummary {
    return {
        fetched: 0,
        inserted: 0,
        updated: 0,
        skipped: 0,
        errors: 0,
        chunks: 0,
        failedChunks: 0,
        pages: 0,
        partialFetch: false,
        elapsedMs: 0,
    };
}

/**
 * Runs one ingest: connect, fetch, persist, audit.
 *
 * INIT → CONNECTED → FETCHED → PERSISTED → AUDITED → DONE; any fatal step
 * moves the run to FAILED. `run()` reports failures in its result: the outcome, the summary
 * gathered so far and the failure travel in the result. The store is opened
 * once and closed once per run.
 */
export class IngestPipeline {
    private readonly logger = getLogger();
    private readonly connect: () => PaperStore;
    private readonly now: () => Date;
    private state: PipelineState = 'INIT';
    private transitions: PipelineState[] = ['INIT'];

    constructor(
        private readonly config: IngestConfig,
        private readonly deps: PipelineDependencies
    ) {
        this.connect = deps.connect ?? (() => new PaperStore(config.dbPath));
        this.now = deps.now ?? (() => new Date());
    }

    async run(): Promise<PipelineResult> {
        if (this.transitions.length > 1) {
            throw new Error('IngestPipeline.run() can only be called once');
        }

        const startedAt = Date.now();
        const summary = emptySummary();
        const { signal } = this.deps;
        let store: PaperStore | null = null;
        let report: QualityReport | null = null;
        let backupPath: string | null = null;
        let reportPath: string | null = null;
        let failure: Error | null = null;

        try {
            // INIT → CONNECTED
            store = this.connect();
            this.enter('CONNECTED');

            // CONNECTED → FETCHED
            const window = lookbackWindow(this.config.days, this.now());
            const works = await this.fetch(window, summary);
            this.enter('FETCHED');

            if (works.length > 0 && this.config.backupDir) {
                backupPath = this.backup(works, window);
            }

            // FETCHED → PERSISTED
            ensurePapersTable(store, { force: this.config.force });
            const stats = new BatchUpserter(store, { batchSize: this.config.batchSize, signal }).ingest(works);
            summary.inserted = stats.inserted;
            summary.updated = stats.updated;
            summary.skipped = stats.skipped;
            summary.errors = stats.errors;
            summary.chunks = stats.chunks;
            summary.failedChunks = stats.failedChunks;
            if (stats.aborted) {
                throw new PipelineAbortedError(`Run aborted after ${stats.chunks} chunk(s)`);
            }
            this.enter('PERSISTED');

            // PERSISTED → AUDITED
            if (this.config.skipQualityChecks) {
                this.logger.info('Quality checks skipped');
            } else {
                report = new QualityAuditor(store, {
                    citationCeiling: this.config.citationCeiling,
                    sampleLimit: this.config.sampleLimit,
                }).run(this.now());
                if (this.config.reportsDir) {
                    reportPath = this.saveReport(this.config.reportsDir, report);
                }
            }
            this.enter('AUDITED');

            this.enter('DONE');
        } catch (error) {
            failure = error instanceof Error ? error : new Error(String(error));
            this.logger.error({ state: this.state, error: errorMessage(error) }, 'Run failed');
            this.enter('FAILED');
        } finally {
            if (store) this.release(store);
        }

        summary.elapsedMs = Date.now() - startedAt;
        this.logger[failure ? 'error' : 'info']({ ...summary, state: this.state }, 'Run summary');

        return {
            ok: failure === null,
            state: this.state,
            transitions: [...this.transitions],
            summary,
            report,
            backupPath,
            reportPath,
            error: failure,
        };
    }

    private release(store: PaperStore): void {
        try {
            store.close();
        } catch (error) {
            this.logger.error({ error: errorMessage(error) }, 'Failed to close the store');
        }
    }

    private enter(next: PipelineState): void {
        this.logger.debug({ from: this.state, to: next }, 'Pipeline transition');
        this.state = next;
        this.transitions.push(next);
    }

    /**
     * A failed fetch still yields its partial works when there are any.
     */
    private async fetch(window: DateWindow, summary: RunSummary): Promise<FetchedWork[]> {
        try {
            const result = await this.deps.collector.collect(window, this.deps.signal);
            summary.fetched = result.works.length;
            summary.pages = result.pages;
            return result.works;
        } catch (error) {
            if (!(error instanceof PageFetchError) || error.partial.length === 0) throw error;

            this.logger.warn(
                { page: error.page, kept: error.partial.length, error: error.message },
                'Fetch failed; continuing with partial results'
            );
            summary.fetched = error.partial.length;
            summary.pages = error.page - 1;
            summary.partialFetch = true;
            return error.partial;
        }
    }

    private backup(works: FetchedWork[], window: DateWindow): string | null {
        const dir = this.config.backupDir;
        if (!dir) return null;
        try {
            return writeBackup(dir, works, {
                description: this.deps.collector.describe(),
                window,
                subfield: this.config.subfield,
                now: this.now(),
            });
        } catch (error) {
            this.logger.error({ dir, error: errorMessage(error) }, 'Backup could not be written; continuing');
            return null;
        }
    }

    private saveReport(dir: string, report: QualityReport): string | null {
        try {
            return writeQualityReport(dir, report);
        } catch (error) {
            this.logger.error({ dir, error: errorMessage(error) }, 'Quality report could not be written');
            return null;
        }
    }
}

import { existsSync } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger, isLogLevel } from '../utils/logger.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { BackupReplayCollector } from '../ingest/backup.js';
import { WorksFetcher } from '../ingest/fetcher.js';
import { IngestPipeline, type PipelineResult } from '../pipeline/orchestrator.js';
import { QualityAuditor, auditCouldNotRun } from '../quality/auditor.js';
import { renderQualityReport, writeQualityReport } from '../quality/report.js';
import { OpenAlexWorksSource } from '../sources/openalex.js';
import { PaperStore } from '../storage/database.js';
import { PAPERS_TABLE } from '../storage/schema.js';
import type { IngestConfig, LogLevel, WorkCollector } from '../types/index.js';

const VERSION = '0.1.0';

interface CommonOptions {
    db?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface PersistOptions extends CommonOptions {
    batchSize?: number;
    force?: boolean;
    skipQualityChecks?: boolean;
}

interface RunOptions extends PersistOptions {
    days?: number;
    subfield?: string | false;
    pageSize?: number;
    maxPages?: number;
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function parseLogLevel(value: string): LogLevel {
    if (!isLogLevel(value)) {
        throw new InvalidArgumentError('Expected one of: debug, info, warn, error, silent.');
    }
    return value;
}

/**
 * Only flags the user actually passed become overrides.
 */
function toConfigFlags(opts: RunOptions): Partial<IngestConfig> {
    const flags: Partial<IngestConfig> = {};
    if (opts.db !== undefined) flags.dbPath = opts.db;
    if (opts.logLevel !== undefined) flags.logLevel = opts.logLevel;
    if (opts.jsonLogs) flags.jsonLogs = true;
    if (opts.batchSize !== undefined) flags.batchSize = opts.batchSize;
    if (opts.force) flags.force = true;
    if (opts.skipQualityChecks) flags.skipQualityChecks = true;
    if (opts.days !== undefined) flags.days = opts.days;
    if (opts.pageSize !== undefined) flags.pageSize = opts.pageSize;
    if (opts.maxPages !== undefined) flags.maxPages = opts.maxPages;
    if (opts.subfield === false) flags.subfield = null;
    else if (opts.subfield !== undefined) flags.subfield = opts.subfield;
    return flags;
}

/**
 * Resolve configuration and set up logging. Reports bad configuration and
 * returns null so the caller can stop.
 */
async function setup(flags: Partial<IngestConfig>): Promise<IngestConfig | null> {
    try {
        const config = await resolveConfig(flags);
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        return config;
    } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        console.error(`Configuration error: ${error.message}`);
        process.exitCode = 1;
        return null;
    }
}

function abortOnInterrupt(): AbortController {
    const controller = new AbortController();
    process.once('SIGINT', () => {
        getLogger().warn('Interrupted; stopping after the current page or chunk');
        controller.abort();
    });
    return controller;
}

function printSummary(result: PipelineResult): void {
    const s = result.summary;
    const written = s.inserted + s.updated;
    const successRate = s.fetched > 0 ? ((written / s.fetched) * 100).toFixed(1) : '0.0';

    console.log(`\n📊 Run Summary (${result.state})\n`);
    console.log(`  Fetched:      ${s.fetched} in ${s.pages} page(s)${s.partialFetch ? ' [partial]' : ''}`);
    console.log(`  Inserted:     ${s.inserted}`);
    console.log(`  Updated:      ${s.updated}`);
    console.log(`  Skipped:      ${s.skipped}`);
    console.log(`  Errors:       ${s.errors}`);
    console.log(`  Chunks:       ${s.chunks} (${s.failedChunks} failed)`);
    console.log(`  Success rate: ${successRate}%`);
    console.log(`  Elapsed:      ${(s.elapsedMs / 1000).toFixed(1)}s`);

    if (result.report) {
        const { totals } = result.report;
        console.log(
            `  Quality:      ${result.report.passed ? 'PASS' : 'FAIL'} ` +
            `(${totals.passed} passed, ${totals.warned} warnings, ${totals.failed} failed, ${totals.errored} errors)`
        );
    }
    if (result.backupPath) console.log(`  Backup:       ${result.backupPath}`);
    if (result.reportPath) console.log(`  Report:       ${result.reportPath}`);
    if (result.error) console.log(`\n  Failure: ${result.error.message}`);

    console.log('');
}

async function runPipeline(config: IngestConfig, collector: WorkCollector): Promise<void> {
    const controller = abortOnInterrupt();
    const pipeline = new IngestPipeline(config, { collector, signal: controller.signal });
    const result = await pipeline.run();

    printSummary(result);
    if (!result.ok) process.exitCode = 1;
}

/**
 * Open an existing database; a missing file is an error, not a new database.
 */
function openExisting(dbPath: string): PaperStore {
    if (!existsSync(dbPath)) {
        throw new Error(`Database not found: ${dbPath}`);
    }
    return new PaperStore(dbPath);
}

const program = new Command();

program
    .name('paper-ingest')
    .description('Ingest recent OpenAlex works into SQLite and audit their quality.')
    .version(VERSION);

// ─── RUN command ──────────────────────────────────────────

program
    .command('run')
    .description('Fetch recent works from OpenAlex, upsert them, and run quality checks')
    .option('-d, --days <n>', 'Lookback window in days', parsePositiveInt)
    .option('-b, --batch-size <n>', 'Records per transaction chunk', parsePositiveInt)
    .option('-f, --force', 'Drop and recreate the papers table first')
    .option('--skip-quality-checks', 'Do not run the quality audit')
    .option('--db <path>', 'SQLite database path')
    .option('--subfield <id>', 'OpenAlex subfield id to filter on')
    .option('--no-subfield', 'Fetch all subjects')
    .option('--page-size <n>', 'Works per page (max 200)', parsePositiveInt)
    .option('--max-pages <n>', 'Maximum pages to fetch', parsePositiveInt)
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: RunOptions) => {
        const config = await setup(toConfigFlags(opts));
        if (!config) return;

        getLogger().info(
            { days: config.days, subfield: config.subfield, batchSize: config.batchSize, dbPath: config.dbPath },
            'Starting ingest'
        );

        const source = new OpenAlexWorksSource({ email: config.email });
        const fetcher = new WorksFetcher(source, {
            subfield: config.subfield,
            pageSize: config.pageSize,
            maxPages: config.maxPages,
            pageRetries: config.pageRetries,
            initialBackoffMs: config.initialBackoffMs,
            maxBackoffMs: config.maxBackoffMs,
        });

        await runPipeline(config, fetcher);
    });

// ─── REPLAY command ───────────────────────────────────────

program
    .command('replay')
    .description('Upsert the works of a backup file, then run quality checks')
    .argument('<backupFile>', 'Backup written by a previous run')
    .option('-b, --batch-size <n>', 'Records per transaction chunk', parsePositiveInt)
    .option('-f, --force', 'Drop and recreate the papers table first')
    .option('--skip-quality-checks', 'Do not run the quality audit')
    .option('--db <path>', 'SQLite database path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (backupFile: string, opts: PersistOptions) => {
        const config = await setup(toConfigFlags(opts));
        if (!config) return;

        if (!existsSync(backupFile)) {
            console.error(`Backup not found: ${backupFile}`);
            process.exitCode = 1;
            return;
        }

        // Replaying must not produce another backup of the same works
        await runPipeline({ ...config, backupDir: null }, new BackupReplayCollector(backupFile));
    });

// ─── AUDIT command ────────────────────────────────────────

program
    .command('audit')
    .description('Run the quality checks against an existing database')
    .option('--db <path>', 'SQLite database path')
    .option('--table <name>', 'Table to audit', PAPERS_TABLE)
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: CommonOptions & { table: string }) => {
        const config = await setup(toConfigFlags(opts));
        if (!config) return;

        let store: PaperStore | null = null;
        try {
            store = openExisting(config.dbPath);
            const report = new QualityAuditor(store, {
                table: opts.table,
                citationCeiling: config.citationCeiling,
                sampleLimit: config.sampleLimit,
            }).run();

            console.log(renderQualityReport(report));
            if (config.reportsDir) {
                console.log(`Report written: ${writeQualityReport(config.reportsDir, report)}`);
            }
            if (auditCouldNotRun(report)) {
                console.error(`Audit failed: no check could run against table "${opts.table}"`);
                process.exitCode = 1;
            }
        } catch (error) {
            console.error(`Audit failed: ${errorMessage(error)}`);
            process.exitCode = 1;
        } finally {
            store?.close();
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show row count, table structure, and top domains')
    .option('--db <path>', 'SQLite database path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLogLevel)
    .action(async (opts: CommonOptions) => {
        const config = await setup(toConfigFlags(opts));
        if (!config) return;

        let store: PaperStore | null = null;
        try {
            store = openExisting(config.dbPath);
            if (!store.tableExists(PAPERS_TABLE)) {
                throw new Error(`Table "${PAPERS_TABLE}" does not exist in ${config.dbPath}`);
            }

            console.log('\n📊 Papers Database\n');
            console.log(`  Path:    ${config.dbPath}`);
            console.log(`  SQLite:  ${store.version}`);
            console.log(`  Rows:    ${store.countRows()}`);

            console.log('\n  Columns:');
            for (const column of store.columnInfo(PAPERS_TABLE)) {
                const flags = [column.primaryKey ? 'PK' : '', column.notNull ? 'NOT NULL' : ''].filter(Boolean).join(' ');
                console.log(`    ${column.name.padEnd(32)} ${column.type.padEnd(8)} ${flags}`.trimEnd());
            }

            const domains = store.all(
                `SELECT COALESCE(primary_domain_name, '(none)') AS domain, COUNT(*) AS count
                 FROM ${PAPERS_TABLE} GROUP BY primary_domain_name ORDER BY count DESC LIMIT 5`
            );
            if (domains.length > 0) {
                console.log('\n  Top domains:');
                for (const row of domains) {
                    console.log(`    ${String(row['domain'])}: ${String(row['count'])}`);
                }
            }

            console.log('');
        } catch (error) {
            console.error(`Inspect failed: ${errorMessage(error)}`);
            process.exitCode = 1;
        } finally {
            store?.close();
        }
    });

await program.parseAsync(process.argv);

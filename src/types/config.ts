/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Full ingest configuration merged from CLI flags, env vars, and config file.
 */
export interface IngestConfig {
    // Store
    dbPath: string;
    force: boolean;

    // Fetch window & paging
    days: number;
    subfield: string | null;
    pageSize: number;
    maxPages: number;
    pageRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
    email?: string;

    // Persistence
    batchSize: number;

    // Audit
    skipQualityChecks: boolean;
    citationCeiling: number;
    sampleLimit: number;

    // Artifacts
    backupDir: string | null;
    reportsDir: string | null;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * OpenAlex subfield 1702: Computer Science → Artificial Intelligence.
 */
export const AI_SUBFIELD_ID = '1702';

/**
 * OpenAlex caps `per_page` at 200.
 */
export const MAX_PAGE_SIZE = 200;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: IngestConfig = {
    dbPath: './papers.db',
    force: false,
    days: 3,
    subfield: AI_SUBFIELD_ID,
    pageSize: MAX_PAGE_SIZE,
    maxPages: 50,
    pageRetries: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    batchSize: 100,
    skipQualityChecks: false,
    citationCeiling: 100000,
    sampleLimit: 5,
    backupDir: 'temp',
    reportsDir: 'reports',
    logLevel: 'info',
    jsonLogs: false,
};

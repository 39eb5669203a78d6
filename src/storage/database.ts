import Database from 'better-sqlite3';
import type { NormalizedPaper, UpsertOutcome } from '../types/index.js';
import { ChunkFatalError, RecordWriteError, StoreConnectionError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { NOW_SQL, PAPERS_TABLE, PAPER_COLUMNS } from './schema.js';

export type SqlValue = string | number | bigint | Buffer | null;
export type SqlRow = Record<string, SqlValue>;

export interface ColumnInfo {
    name: string;
    type: string;
    notNull: boolean;
    primaryKey: boolean;
}

/**
 * SQLite result codes that leave the current transaction unusable.
 * Extended codes (e.g. SQLITE_IOERR_WRITE) match by prefix.
 */
const FATAL_CODE_PREFIXES = [
    'SQLITE_IOERR',
    'SQLITE_FULL',
    'SQLITE_CORRUPT',
    'SQLITE_NOTADB',
    'SQLITE_NOMEM',
    'SQLITE_BUSY',
    'SQLITE_LOCKED',
    'SQLITE_READONLY',
    'SQLITE_INTERRUPT',
    'SQLITE_ABORT',
    'SQLITE_CANTOPEN',
    'SQLITE_PROTOCOL',
];

const COLUMN_NAMES = PAPER_COLUMNS.map((c) => c.name);

const UPSERT_SQL = `
INSERT INTO ${PAPERS_TABLE} (${COLUMN_NAMES.join(', ')})
VALUES (${COLUMN_NAMES.map((name) => `@${name}`).join(', ')})
ON CONFLICT(id) DO UPDATE SET
${COLUMN_NAMES.filter((name) => name !== 'id').map((name) => `  ${name} = excluded.${name},`).join('\n')}
  updated_at = ${NOW_SQL}
`;

/**
 * Papers store wrapper around better-sqlite3.
 * Handles WAL mode, explicit chunk transactions, the id-keyed upsert and
 * classification of write failures.
 */
export class PaperStore {
    private db: Database.Database;
    private statements = new Map<string, Database.Statement<unknown[], SqlRow>>();
    private chunkOpen = false;
    private readonly logger = getLogger();

    /**
     * Open (or create) the database file and verify it answers.
     * @throws StoreConnectionError when the file cannot be opened or queried
     */
    constructor(readonly dbPath: string) {
        this.db = openDatabase(dbPath);
        this.logger.debug({ dbPath, sqlite: this.version }, 'Database connection established');
    }

    get version(): string {
        const row = this.get('SELECT sqlite_version() AS version');
        return typeof row?.['version'] === 'string' ? row['version'] : 'unknown';
    }

    get inTransaction(): boolean {
        return this.db.inTransaction;
    }

    // ─── Schema ───────────────────────────────────────────────

    tableExists(table: string): boolean {
        return this.get("SELECT 1 AS present FROM sqlite_master WHERE type = 'table' AND name = ?", table) !== undefined;
    }

    exec(sql: string): void {
        this.db.exec(sql);
        this.statements.clear();
    }

    /**
     * Run `fn` inside a single transaction; rolls back if it throws.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    columnInfo(table: string): ColumnInfo[] {
        return this.all('SELECT name, type, "notnull" AS not_null, pk FROM pragma_table_info(?)', table).map((row) => ({
            name: String(row['name']),
            type: String(row['type']),
            notNull: row['not_null'] === 1,
            primaryKey: typeof row['pk'] === 'number' && row['pk'] > 0,
        }));
    }

    // ─── Chunk transactions ───────────────────────────────────

    /**
     * @throws ChunkFatalError when the transaction cannot be opened
     */
    begin(): void {
        try {
            this.db.exec('BEGIN');
            this.chunkOpen = true;
        } catch (error) {
            throw this.fatal('Cannot begin transaction', error);
        }
    }

    /**
     * @throws ChunkFatalError when the commit fails; the chunk is then lost
     */
    commit(): void {
        try {
            this.db.exec('COMMIT');
            this.chunkOpen = false;
        } catch (error) {
            throw this.fatal('Commit failed', error);
        }
    }

    /**
     * Roll back the open transaction, if SQLite has not already done so.
     */
    rollback(): void {
        this.chunkOpen = false;
        if (this.db.inTransaction) {
            this.db.exec('ROLLBACK');
        }
    }

    // ─── Papers ───────────────────────────────────────────────

    /**
     * Insert a paper or fully replace the stored row with the same id.
     * `created_at` survives replacement; `updated_at` is refreshed.
     *
     * @throws RecordWriteError when only this row was rejected
     * @throws ChunkFatalError when the surrounding transaction is broken
     */
    upsertPaper(paper: NormalizedPaper): UpsertOutcome {
        try {
            const existed = this.statement(`SELECT 1 AS present FROM ${PAPERS_TABLE} WHERE id = ?`).get(paper.id) !== undefined;
            this.statement(UPSERT_SQL).run(toSqlParams(paper));
            return existed ? 'updated' : 'inserted';
        } catch (error) {
            throw this.classifyWriteError(error, paper.id);
        }
    }

    getPaperById(id: string): NormalizedPaper | undefined {
        const row = this.statement(`SELECT * FROM ${PAPERS_TABLE} WHERE id = ?`).get(id);
        return row ? rowToPaper(row) : undefined;
    }

    /**
     * Store-managed timestamps of a row.
     */
    getTimestamps(id: string): { createdAt: string; updatedAt: string } | undefined {
        const row = this.statement(`SELECT created_at, updated_at FROM ${PAPERS_TABLE} WHERE id = ?`).get(id);
        if (!row) return undefined;
        return { createdAt: String(row['created_at']), updatedAt: String(row['updated_at']) };
    }

    countRows(table: string = PAPERS_TABLE): number {
        const row = this.get(`SELECT COUNT(*) AS count FROM "${table.replace(/"/g, '""')}"`);
        return Number(row?.['count'] ?? 0);
    }

    // ─── Raw queries ──────────────────────────────────────────

    all(sql: string, ...params: unknown[]): SqlRow[] {
        return this.statement(sql).all(...params);
    }

    get(sql: string, ...params: unknown[]): SqlRow | undefined {
        return this.statement(sql).get(...params);
    }

    /**
     * Close the database connection. Safe to call more than once.
     */
    close(): void {
        if (!this.db.open) return;
        if (this.db.inTransaction) {
            this.logger.warn('Closing database with an open transaction; rolling back');
            this.db.exec('ROLLBACK');
        }
        this.statements.clear();
        this.db.close();
        this.logger.debug({ dbPath: this.dbPath }, 'Database closed');
    }

    get isOpen(): boolean {
        return this.db.open;
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }

    private statement(sql: string): Database.Statement<unknown[], SqlRow> {
        let stmt = this.statements.get(sql);
        if (!stmt) {
            stmt = this.db.prepare<unknown[], SqlRow>(sql);
            this.statements.set(sql, stmt);
        }
        return stmt;
    }

    private classifyWriteError(error: unknown, recordId: string): RecordWriteError | ChunkFatalError {
        if (error instanceof ChunkFatalError || error instanceof RecordWriteError) return error;

        const code = sqliteCode(error);
        const transactionLost = this.chunkOpen && !this.db.inTransaction;

        if (transactionLost || (code !== null && FATAL_CODE_PREFIXES.some((prefix) => code.startsWith(prefix)))) {
            return this.fatal(`Write of ${recordId} broke the transaction`, error);
        }

        return new RecordWriteError(`Rejected ${recordId}: ${errorMessage(error)}`, recordId, code, error);
    }

    private fatal(message: string, error: unknown): ChunkFatalError {
        return new ChunkFatalError(`${message}: ${errorMessage(error)}`, sqliteCode(error), error);
    }
}

function openDatabase(dbPath: string): Database.Database {
    let db: Database.Database | null = null;
    try {
        db = new Database(dbPath);
        db.pragma('journal_mode = WAL');
        db.prepare('SELECT sqlite_version() AS version').get();
        return db;
    } catch (error) {
        if (db?.open) db.close();
        throw new StoreConnectionError(`Cannot open database at ${dbPath}: ${errorMessage(error)}`, error);
    }
}

function sqliteCode(error: unknown): string | null {
    return error instanceof Database.SqliteError ? error.code : null;
}

/**
 * Named parameters for the upsert statement; booleans become 0/1.
 */
export function toSqlParams(paper: NormalizedPaper): Record<string, SqlValue> {
    const params: Record<string, SqlValue> = {};
    for (const name of COLUMN_NAMES) {
        const value = paper[name];
        params[name] = typeof value === 'boolean' ? (value ? 1 : 0) : value;
    }
    return params;
}

function readText(row: SqlRow, column: string): string | null {
    const value = row[column];
    if (value === null || value === undefined) return null;
    return typeof value === 'string' ? value : String(value);
}

function readNumber(row: SqlRow, column: string): number | null {
    const value = row[column];
    if (typeof value === 'number') return value;
    if (typeof value === 'bigint') return Number(value);
    return null;
}

function readBoolean(row: SqlRow, column: string): boolean | null {
    const value = readNumber(row, column);
    return value === null ? null : value !== 0;
}

/**
 * Map a stored row back to a paper, turning 0/1 integers into booleans.
 */
export function rowToPaper(row: SqlRow): NormalizedPaper {
    return {
        id: readText(row, 'id') ?? '',
        doi: readText(row, 'doi'),
        title: readText(row, 'title'),
        display_name: readText(row, 'display_name'),

        publication_year: readNumber(row, 'publication_year'),
        publication_date: readText(row, 'publication_date'),
        created_date: readText(row, 'created_date'),
        updated_date: readText(row, 'updated_date'),
        fetched_at: readText(row, 'fetched_at'),

        language: readText(row, 'language'),
        paper_type: readText(row, 'paper_type'),
        type_crossref: readText(row, 'type_crossref'),

        is_open_access: readBoolean(row, 'is_open_access'),
        oa_status: readText(row, 'oa_status'),
        oa_url: readText(row, 'oa_url'),

        cited_by_count: readNumber(row, 'cited_by_count'),
        referenced_works_count: readNumber(row, 'referenced_works_count'),
        authors_count: readNumber(row, 'authors_count'),
        countries_distinct_count: readNumber(row, 'countries_distinct_count'),
        institutions_distinct_count: readNumber(row, 'institutions_distinct_count'),

        citation_normalized_percentile: readNumber(row, 'citation_normalized_percentile'),
        is_in_top_1_percent: readBoolean(row, 'is_in_top_1_percent'),
        is_in_top_10_percent: readBoolean(row, 'is_in_top_10_percent'),

        journal_name: readText(row, 'journal_name'),
        journal_issn: readText(row, 'journal_issn'),
        journal_is_oa: readBoolean(row, 'journal_is_oa'),
        journal_is_indexed_scopus: readBoolean(row, 'journal_is_indexed_scopus'),
        journal_is_core: readBoolean(row, 'journal_is_core'),
        journal_host_organization: readText(row, 'journal_host_organization'),

        primary_domain_name: readText(row, 'primary_domain_name'),
        primary_domain_score: readNumber(row, 'primary_domain_score'),
        primary_field_name: readText(row, 'primary_field_name'),
        primary_field_score: readNumber(row, 'primary_field_score'),
        primary_subfield_name: readText(row, 'primary_subfield_name'),
        primary_subfield_score: readNumber(row, 'primary_subfield_score'),
        primary_topic_name: readText(row, 'primary_topic_name'),
        primary_topic_score: readNumber(row, 'primary_topic_score'),
        topics_count: readNumber(row, 'topics_count'),

        is_retracted: readBoolean(row, 'is_retracted'),
        is_paratext: readBoolean(row, 'is_paratext'),
        has_fulltext: readBoolean(row, 'has_fulltext'),
    };
}

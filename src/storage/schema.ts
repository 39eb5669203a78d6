import type { ColumnType, PaperColumn } from '../types/index.js';
import { SchemaError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { PaperStore } from './database.js';

export const PAPERS_TABLE = 'papers';

export interface ColumnDefinition {
    name: PaperColumn;
    type: ColumnType;
    ddl: string;
}

/**
 * Column set of the `papers` table, in DDL order.
 * Booleans are stored as 0/1 integers, dates and timestamps as ISO text.
 */
export const PAPER_COLUMNS: readonly ColumnDefinition[] = [
    // Identity
    { name: 'id', type: 'text', ddl: 'TEXT PRIMARY KEY NOT NULL' },
    { name: 'doi', type: 'text', ddl: 'TEXT UNIQUE' },
    { name: 'title', type: 'text', ddl: 'TEXT NOT NULL' },
    { name: 'display_name', type: 'text', ddl: 'TEXT' },

    // Temporal
    { name: 'publication_year', type: 'integer', ddl: 'INTEGER' },
    { name: 'publication_date', type: 'date', ddl: 'TEXT' },
    { name: 'created_date', type: 'date', ddl: 'TEXT' },
    { name: 'updated_date', type: 'timestamp', ddl: 'TEXT' },
    { name: 'fetched_at', type: 'timestamp', ddl: 'TEXT' },

    // Basic metadata
    { name: 'language', type: 'text', ddl: 'TEXT' },
    { name: 'paper_type', type: 'text', ddl: 'TEXT' },
    { name: 'type_crossref', type: 'text', ddl: 'TEXT' },

    // Open access
    { name: 'is_open_access', type: 'boolean', ddl: 'INTEGER' },
    { name: 'oa_status', type: 'text', ddl: 'TEXT' },
    { name: 'oa_url', type: 'text', ddl: 'TEXT' },

    // Quantitative measures
    { name: 'cited_by_count', type: 'integer', ddl: 'INTEGER DEFAULT 0' },
    { name: 'referenced_works_count', type: 'integer', ddl: 'INTEGER DEFAULT 0' },
    { name: 'authors_count', type: 'integer', ddl: 'INTEGER DEFAULT 0' },
    { name: 'countries_distinct_count', type: 'integer', ddl: 'INTEGER DEFAULT 0' },
    { name: 'institutions_distinct_count', type: 'integer', ddl: 'INTEGER DEFAULT 0' },

    // Citation metrics
    { name: 'citation_normalized_percentile', type: 'real', ddl: 'REAL' },
    { name: 'is_in_top_1_percent', type: 'boolean', ddl: 'INTEGER DEFAULT 0' },
    { name: 'is_in_top_10_percent', type: 'boolean', ddl: 'INTEGER DEFAULT 0' },

    // Venue
    { name: 'journal_name', type: 'text', ddl: 'TEXT' },
    { name: 'journal_issn', type: 'text', ddl: 'TEXT' },
    { name: 'journal_is_oa', type: 'boolean', ddl: 'INTEGER' },
    { name: 'journal_is_indexed_scopus', type: 'boolean', ddl: 'INTEGER' },
    { name: 'journal_is_core', type: 'boolean', ddl: 'INTEGER' },
    { name: 'journal_host_organization', type: 'text', ddl: 'TEXT' },

    // Topic classification
    { name: 'primary_domain_name', type: 'text', ddl: 'TEXT' },
    { name: 'primary_domain_score', type: 'real', ddl: 'REAL' },
    { name: 'primary_field_name', type: 'text', ddl: 'TEXT' },
    { name: 'primary_field_score', type: 'real', ddl: 'REAL' },
    { name: 'primary_subfield_name', type: 'text', ddl: 'TEXT' },
    { name: 'primary_subfield_score', type: 'real', ddl: 'REAL' },
    { name: 'primary_topic_name', type: 'text', ddl: 'TEXT' },
    { name: 'primary_topic_score', type: 'real', ddl: 'REAL' },
    { name: 'topics_count', type: 'integer', ddl: 'INTEGER DEFAULT 0' },

    // Flags
    { name: 'is_retracted', type: 'boolean', ddl: 'INTEGER DEFAULT 0' },
    { name: 'is_paratext', type: 'boolean', ddl: 'INTEGER DEFAULT 0' },
    { name: 'has_fulltext', type: 'boolean', ddl: 'INTEGER DEFAULT 0' },
];

/**
 * Confidence-score columns, all expected in [0, 1].
 */
export const SCORE_COLUMNS: readonly PaperColumn[] = [
    'primary_domain_score',
    'primary_field_score',
    'primary_subfield_score',
    'primary_topic_score',
];

export const NOW_SQL = "strftime('%Y-%m-%dT%H:%M:%fZ', 'now')";

/**
 * STRICT makes SQLite reject values that do not fit the declared column type.
 */
const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS ${PAPERS_TABLE} (
${PAPER_COLUMNS.map((c) => `  ${c.name} ${c.ddl},`).join('\n')}
  created_at TEXT NOT NULL DEFAULT (${NOW_SQL}),
  updated_at TEXT NOT NULL DEFAULT (${NOW_SQL})
) STRICT;
`;

const INDEXED_COLUMNS: readonly string[] = [
    'publication_year',
    'cited_by_count',
    'is_open_access',
    'primary_domain_name',
    'primary_field_name',
    'primary_subfield_name',
    'primary_topic_name',
    'journal_name',
    'created_at',
];

const CREATE_INDEXES_SQL = INDEXED_COLUMNS
    .map((column) => `CREATE INDEX IF NOT EXISTS idx_${PAPERS_TABLE}_${column} ON ${PAPERS_TABLE}(${column});`)
    .join('\n');

export type SchemaOutcome = 'created' | 'recreated' | 'exists';

/**
 * Make sure the papers table and its indexes exist.
 *
 * Idempotent unless `force` is set, in which case the table is dropped and
 * recreated, destroying every stored row. Drop and create share one transaction.
 *
 * @throws SchemaError when the table cannot be verified or created
 */
export function ensurePapersTable(store: PaperStore, options: { force?: boolean } = {}): SchemaOutcome {
    const logger = getLogger();
    const force = options.force ?? false;

    try {
        const exists = store.tableExists(PAPERS_TABLE);

        if (exists && !force) {
            logger.info({ table: PAPERS_TABLE }, 'Papers table already exists');
            return 'exists';
        }

        if (exists) {
            logger.warn({ table: PAPERS_TABLE }, 'Force flag set, dropping and recreating papers table');
        }

        store.transaction(() => {
            if (exists) store.exec(`DROP TABLE IF EXISTS ${PAPERS_TABLE};`);
            store.exec(CREATE_TABLE_SQL);
            store.exec(CREATE_INDEXES_SQL);
        });

        logger.info({ table: PAPERS_TABLE, indexes: INDEXED_COLUMNS.length }, 'Papers table created');
        return exists ? 'recreated' : 'created';
    } catch (error) {
        throw new SchemaError(`Failed to ensure table "${PAPERS_TABLE}": ${errorMessage(error)}`, error);
    }
}

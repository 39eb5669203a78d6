import type { CheckStatus, QualityCheckResult, QualityReport } from '../types/index.js';
import type { PaperStore, SqlValue } from '../storage/database.js';
import { PAPERS_TABLE, SCORE_COLUMNS } from '../storage/schema.js';
import { errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface AuditorOptions {
    table?: string;
    /** Citation counts above this are flagged as a warning */
    citationCeiling: number;
    /** Max offending identifiers kept per check */
    sampleLimit: number;
}

interface CheckOutcome {
    status: CheckStatus;
    affectedRows: number;
    samples: string[];
    details: Record<string, number | string | null>;
}

interface QualityCheck {
    name: string;
    description: string;
    evaluate: () => CheckOutcome;
}

function quoteIdentifier(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
}

function toNumber(value: SqlValue | undefined): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'bigint') return Number(value);
    return 0;
}

function toNullableNumber(value: SqlValue | undefined): number | null {
    return value === null || value === undefined ? null : toNumber(value);
}

/**
 * Runs a fixed battery of data-quality checks against the papers table.
 *
 * Checks run in order and never stop the audit: a check whose query fails is
 * recorded with status `error`.
 */
export class QualityAuditor {
    private readonly logger = getLogger();
    private readonly table: string;
    private readonly checks: QualityCheck[];

    constructor(
        private readonly store: PaperStore,
        private readonly options: AuditorOptions
    ) {
        this.table = quoteIdentifier(options.table ?? PAPERS_TABLE);
        this.checks = [
            {
                name: 'missing_required_fields',
                description: 'Rows with a null id or title',
                evaluate: () => this.missingRequiredFields(),
            },
            {
                name: 'citation_count_sanity',
                description: `cited_by_count must be non-negative; above ${options.citationCeiling} is suspicious`,
                evaluate: () => this.citationCountSanity(),
            },
            {
                name: 'topic_score_range',
                description: 'Topic classification scores must lie in [0, 1]',
                evaluate: () => this.topicScoreRange(),
            },
            {
                name: 'duplicate_ids',
                description: 'Ids stored on more than one row',
                evaluate: () => this.duplicates('id'),
            },
            {
                name: 'duplicate_dois',
                description: 'Non-null DOIs stored on more than one row',
                evaluate: () => this.duplicates('doi'),
            },
        ];
    }

    run(now: Date = new Date()): QualityReport {
        const results = this.checks.map((check) => this.runCheck(check));

        const totals = {
            passed: results.filter((r) => r.status === 'pass').length,
            warned: results.filter((r) => r.status === 'warn').length,
            failed: results.filter((r) => r.status === 'fail').length,
            errored: results.filter((r) => r.status === 'error').length,
        };
        const passed = totals.failed === 0 && totals.errored === 0;

        this.logger.info({ ...totals, passed }, 'Quality audit complete');

        return {
            generatedAt: now.toISOString(),
            table: this.options.table ?? PAPERS_TABLE,
            checks: results,
            passed,
            totals,
        };
    }

    private runCheck(check: QualityCheck): QualityCheckResult {
        try {
            const outcome = check.evaluate();
            const level = outcome.status === 'pass' ? 'debug' : 'warn';
            this.logger[level]({ check: check.name, status: outcome.status, affected: outcome.affectedRows }, 'Quality check');
            return {
                name: check.name,
                description: check.description,
                passed: outcome.status === 'pass' || outcome.status === 'warn',
                ...outcome,
            };
        } catch (error) {
            this.logger.error({ check: check.name, error: errorMessage(error) }, 'Quality check could not run');
            return {
                name: check.name,
                description: check.description,
                status: 'error',
                passed: false,
                affectedRows: 0,
                samples: [],
                details: {},
                error: errorMessage(error),
            };
        }
    }

    private samples(where: string, params: unknown[] = [], orderBy = 'sample'): string[] {
        return this.store
            .all(
                `SELECT COALESCE(id, '(rowid ' || rowid || ')') AS sample FROM ${this.table} WHERE ${where} ORDER BY ${orderBy} LIMIT ?`,
                ...params,
                this.options.sampleLimit
            )
            .map((row) => String(row['sample']));
    }

    private missingRequiredFields(): CheckOutcome {
        const row = this.store.get(
            `SELECT
               COALESCE(SUM(CASE WHEN id IS NULL THEN 1 ELSE 0 END), 0) AS missing_id,
               COALESCE(SUM(CASE WHEN title IS NULL THEN 1 ELSE 0 END), 0) AS missing_title,
               COALESCE(SUM(CASE WHEN id IS NULL OR title IS NULL THEN 1 ELSE 0 END), 0) AS affected
             FROM ${this.table}`
        );
        const affected = toNumber(row?.['affected']);

        return {
            status: affected > 0 ? 'fail' : 'pass',
            affectedRows: affected,
            samples: affected > 0 ? this.samples('id IS NULL OR title IS NULL') : [],
            details: {
                missing_id: toNumber(row?.['missing_id']),
                missing_title: toNumber(row?.['missing_title']),
            },
        };
    }

    private citationCountSanity(): CheckOutcome {
        const ceiling = this.options.citationCeiling;
        const row = this.store.get(
            `SELECT
               COALESCE(SUM(CASE WHEN cited_by_count < 0 THEN 1 ELSE 0 END), 0) AS negative,
               COALESCE(SUM(CASE WHEN cited_by_count > ? THEN 1 ELSE 0 END), 0) AS excessive,
               COALESCE(SUM(CASE WHEN cited_by_count IS NULL THEN 1 ELSE 0 END), 0) AS null_count,
               MIN(cited_by_count) AS min,
               MAX(cited_by_count) AS max,
               ROUND(AVG(cited_by_count), 2) AS avg
             FROM ${this.table}`,
            ceiling
        );
        const negative = toNumber(row?.['negative']);
        const excessive = toNumber(row?.['excessive']);
        const affected = negative + excessive;

        let status: CheckStatus = 'pass';
        if (negative > 0) status = 'fail';
        else if (excessive > 0) status = 'warn';

        return {
            status,
            affectedRows: affected,
            samples: affected > 0
                ? this.samples('cited_by_count < 0 OR cited_by_count > ?', [ceiling], '(cited_by_count < 0) DESC, sample')
                : [],
            details: {
                negative,
                above_ceiling: excessive,
                ceiling,
                null_count: toNumber(row?.['null_count']),
                min: toNullableNumber(row?.['min']),
                max: toNullableNumber(row?.['max']),
                avg: toNullableNumber(row?.['avg']),
            },
        };
    }

    private topicScoreRange(): CheckOutcome {
        const outOfRange = (column: string): string => `(${column} IS NOT NULL AND (${column} < 0 OR ${column} > 1))`;
        const anyOutOfRange = SCORE_COLUMNS.map(outOfRange).join(' OR ');

        const row = this.store.get(
            `SELECT
               ${SCORE_COLUMNS.map((column) => `COALESCE(SUM(CASE WHEN ${outOfRange(column)} THEN 1 ELSE 0 END), 0) AS ${column}`).join(',\n               ')},
               COALESCE(SUM(CASE WHEN ${anyOutOfRange} THEN 1 ELSE 0 END), 0) AS affected
             FROM ${this.table}`
        );
        const affected = toNumber(row?.['affected']);

        const details: Record<string, number> = {};
        for (const column of SCORE_COLUMNS) {
            details[column] = toNumber(row?.[column]);
        }

        return {
            status: affected > 0 ? 'fail' : 'pass',
            affectedRows: affected,
            samples: affected > 0 ? this.samples(anyOutOfRange) : [],
            details,
        };
    }

    private duplicates(column: 'id' | 'doi'): CheckOutcome {
        const groups = `SELECT ${column} AS value, COUNT(*) AS occurrences FROM ${this.table}
                        WHERE ${column} IS NOT NULL GROUP BY ${column} HAVING COUNT(*) > 1`;

        const summary = this.store.get(
            `SELECT COUNT(*) AS group_count, COALESCE(SUM(occurrences), 0) AS row_count FROM (${groups})`
        );
        const duplicated = toNumber(summary?.['group_count']);

        const samples = duplicated > 0
            ? this.store
                .all(`${groups} ORDER BY occurrences DESC, value LIMIT ?`, this.options.sampleLimit)
                .map((row) => String(row['value']))
            : [];

        return {
            status: duplicated > 0 ? 'fail' : 'pass',
            affectedRows: duplicated,
            samples,
            details: {
                duplicated_values: duplicated,
                rows_involved: toNumber(summary?.['row_count']),
            },
        };
    }
}

/**
 * True when every check errored, i.e. the audit never reached the data.
 */
export function auditCouldNotRun(report: QualityReport): boolean {
    return report.checks.length > 0 && report.totals.errored === report.checks.length;
}

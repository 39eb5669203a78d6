import type { QualityCheckResult, QualityReport } from '../types/index.js';
import { fileTimestamp, freeBaseName, writeNewFile } from '../utils/artifacts.js';
import { getLogger } from '../utils/logger.js';

const RULE = '='.repeat(80);
const SUBRULE = '-'.repeat(40);

function renderCheck(check: QualityCheckResult): string[] {
    const lines = [
        check.name.toUpperCase().replace(/_/g, ' '),
        SUBRULE,
        `Status: ${check.status.toUpperCase()}`,
        `Description: ${check.description}`,
    ];

    if (check.error !== undefined) {
        lines.push(`Error: ${check.error}`);
        return lines;
    }

    lines.push(`Affected: ${check.affectedRows}`);
    for (const [key, value] of Object.entries(check.details)) {
        lines.push(`  ${key}: ${value ?? 'n/a'}`);
    }
    if (check.samples.length > 0) {
        lines.push('Samples:');
        for (const sample of check.samples) {
            lines.push(`  - ${sample}`);
        }
    }
    return lines;
}

/**
 * Plain-text rendering of a quality report.
 */
export function renderQualityReport(report: QualityReport): string {
    const lines = [
        RULE,
        'DATA QUALITY REPORT',
        RULE,
        `Generated: ${report.generatedAt}`,
        `Table: ${report.table}`,
        `Status: ${report.passed ? 'PASS' : 'FAIL'}`,
        '',
        'SUMMARY',
        SUBRULE,
        `Checks: ${report.checks.length}`,
        `Passed: ${report.totals.passed}`,
        `Warnings: ${report.totals.warned}`,
        `Failed: ${report.totals.failed}`,
        `Errors: ${report.totals.errored}`,
        '',
    ];

    for (const check of report.checks) {
        lines.push(...renderCheck(check), '');
    }

    lines.push(RULE, 'END OF REPORT', RULE);
    return `${lines.join('\n')}\n`;
}

/**
 * Write `data_quality_report_<stamp>.txt` and its `.json` sibling.
 * An earlier report with the same stamp is kept; the new pair gets a `_1`,
 * `_2`, ... suffix. Returns the path of the text report.
 */
export function writeQualityReport(dir: string, report: QualityReport): string {
    const base = freeBaseName(dir, `data_quality_report_${fileTimestamp(new Date(report.generatedAt))}`, ['.txt', '.json']);
    const textPath = writeNewFile(dir, `${base}.txt`, renderQualityReport(report));
    writeNewFile(dir, `${base}.json`, `${JSON.stringify(report, null, 2)}\n`);

    getLogger().info({ path: textPath }, 'Quality report written');
    return textPath;
}

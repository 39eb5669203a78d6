/**
 * Shared utilities for works sources.
 */
import type { DateWindow } from '../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Format a date as `YYYY-MM-DD` in UTC.
 */
export function formatDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * Inclusive publication window ending today (UTC) and starting `days` earlier.
 * "3 days" on 2024-05-10 → 2024-05-07 .. 2024-05-10
 */
export function lookbackWindow(days: number, now: Date = new Date()): DateWindow {
    return {
        from: formatDate(new Date(now.getTime() - days * DAY_MS)),
        to: formatDate(now),
        days,
    };
}

/**
 * Strip the OpenAlex URL prefix from a subfield id.
 * "https://openalex.org/subfields/1702" → "1702"
 */
export function normalizeSubfieldId(subfield: string | null | undefined): string | null {
    if (!subfield) return null;
    const id = subfield
        .trim()
        .replace(/^https?:\/\/openalex\.org\/subfields\//i, '')
        .replace(/^subfields\//i, '');
    return id || null;
}

/**
 * OpenAlex `filter` expression for a window and optional subfield.
 */
export function buildWorksFilter(window: DateWindow, subfield: string | null): string {
    const clauses = [
        `from_publication_date:${window.from}`,
        `to_publication_date:${window.to}`,
    ];
    const subfieldId = normalizeSubfieldId(subfield);
    if (subfieldId) clauses.push(`topics.subfield.id:${subfieldId}`);
    return clauses.join(',');
}

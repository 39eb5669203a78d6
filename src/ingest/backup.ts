import { readFileSync } from 'node:fs';
import type { CollectResult, DateWindow, FetchedWork, RawWork, WorkCollector } from '../types/index.js';
import { fileTimestamp, writeArtifact } from '../utils/artifacts.js';
import { PipelineAbortedError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface BackupMetadata {
    timestamp: string;
    total_count: number;
    source_description: string;
    window: DateWindow | null;
    subfield: string | null;
}

export interface BackupFile {
    metadata: BackupMetadata;
    records: RawWork[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseWindow(value: unknown): DateWindow | null {
    if (!isRecord(value)) return null;
    const { from, to, days } = value;
    if (typeof from !== 'string' || typeof to !== 'string' || typeof days !== 'number') return null;
    return { from, to, days };
}

/**
 * Write the fetched works as `works_<stamp>.json` under `dir`.
 */
export function writeBackup(
    dir: string,
    works: readonly RawWork[],
    details: { description: string; window: DateWindow | null; subfield: string | null; now?: Date }
): string {
    const now = details.now ?? new Date();
    const backup: BackupFile = {
        metadata: {
            timestamp: now.toISOString(),
            total_count: works.length,
            source_description: details.description,
            window: details.window,
            subfield: details.subfield,
        },
        records: [...works],
    };

    const filePath = writeArtifact(dir, `works_${fileTimestamp(now)}`, '.json', JSON.stringify(backup, null, 2));
    getLogger().info({ path: filePath, records: works.length }, 'Backup written');
    return filePath;
}

/**
 * Read and validate a backup artifact.
 * Records that are not objects are dropped with a warning.
 */
export function readBackup(filePath: string): BackupFile {
    let parsed: unknown;
    try {
        parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new Error(`Cannot read backup ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    const metadata = isRecord(parsed) ? parsed['metadata'] : undefined;
    const entries: unknown = isRecord(parsed) ? parsed['records'] : undefined;
    if (!isRecord(metadata) || !Array.isArray(entries)) {
        throw new Error(`Invalid backup ${filePath}: expected { metadata, records[] }`);
    }

    const records: RawWork[] = entries.filter(isRecord);
    const dropped = entries.length - records.length;
    if (dropped > 0) {
        getLogger().warn({ path: filePath, dropped }, 'Dropped non-object records from backup');
    }

    return {
        metadata: {
            timestamp: typeof metadata['timestamp'] === 'string' ? metadata['timestamp'] : '',
            total_count: typeof metadata['total_count'] === 'number' ? metadata['total_count'] : records.length,
            source_description: typeof metadata['source_description'] === 'string' ? metadata['source_description'] : '',
            window: parseWindow(metadata['window']),
            subfield: typeof metadata['subfield'] === 'string' ? metadata['subfield'] : null,
        },
        records,
    };
}

/**
 * Replays a backup artifact instead of calling the API.
 * Works without `fetched_at` are stamped with the backup's timestamp.
 */
export class BackupReplayCollector implements WorkCollector {
    constructor(private readonly filePath: string) {}

    describe(): string {
        return `replay of ${this.filePath}`;
    }

    async collect(_window: DateWindow, signal?: AbortSignal): Promise<CollectResult> {
        const backup = readBackup(this.filePath);
        if (signal?.aborted) {
            throw new PipelineAbortedError('Replay aborted');
        }

        const stamp = backup.metadata.timestamp || new Date().toISOString();
        const works: FetchedWork[] = backup.records.map((record) => ({
            ...record,
            fetched_at: typeof record.fetched_at === 'string' ? record.fetched_at : stamp,
        }));

        getLogger().info({ path: this.filePath, records: works.length }, 'Replaying backup');
        return { works, pages: 1, totalAvailable: works.length, truncated: false };
    }
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { BackupReplayCollector, readBackup, writeBackup } from '../ingest/backup.js';
import { PipelineAbortedError } from '../utils/errors.js';
import { makeTempDir, removeTempDir } from './helpers.js';
import type { DateWindow } from '../types/index.js';

const WINDOW: DateWindow = { from: '2024-05-07', to: '2024-05-10', days: 3 };
const NOW = new Date('2024-05-10T12:00:00.000Z');

describe('backups', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeTempDir(dir);
    });

    function write(records: Record<string, unknown>[]): string {
        return writeBackup(path.join(dir, 'temp'), records, {
            description: 'Fake works, subfield 1702',
            window: WINDOW,
            subfield: '1702',
            now: NOW,
        });
    }

    describe('writeBackup / readBackup', () => {
        it('should write a timestamped file that reads back unchanged', () => {
            const records = [
                { id: 'W1', title: 'One', fetched_at: '2024-05-10T11:59:00.000Z' },
                { id: 'W2', title: 'Two', fetched_at: '2024-05-10T11:59:00.000Z' },
            ];

            const filePath = write(records);

            expect(filePath).toBe(path.join(dir, 'temp', 'works_20240510_120000.json'));
            expect(readBackup(filePath)).toEqual({
                metadata: {
                    timestamp: '2024-05-10T12:00:00.000Z',
                    total_count: 2,
                    source_description: 'Fake works, subfield 1702',
                    window: WINDOW,
                    subfield: '1702',
                },
                records,
            });
        });

        it('should not replace a backup written in the same second', () => {
            const firstPath = write([{ id: 'W1' }]);
            const secondPath = write([{ id: 'W2' }]);

            expect(secondPath).toBe(path.join(dir, 'temp', 'works_20240510_120000_1.json'));
            expect(readBackup(firstPath).records).toEqual([{ id: 'W1' }]);
            expect(readBackup(secondPath).records).toEqual([{ id: 'W2' }]);
        });

        it('should reject a file without metadata and records', () => {
            const filePath = path.join(dir, 'bad.json');
            fs.writeFileSync(filePath, JSON.stringify({ records: [] }));

            expect(() => readBackup(filePath)).toThrow('expected { metadata, records[] }');
        });

        it('should reject a file that is not JSON', () => {
            const filePath = path.join(dir, 'broken.json');
            fs.writeFileSync(filePath, '{ not json');

            expect(() => readBackup(filePath)).toThrow(`Cannot read backup ${filePath}`);
        });

        it('should drop records that are not objects', () => {
            const filePath = path.join(dir, 'mixed.json');
            fs.writeFileSync(filePath, JSON.stringify({ metadata: {}, records: [{ id: 'W1' }, 7, null] }));

            expect(readBackup(filePath)).toEqual({
                metadata: { timestamp: '', total_count: 1, source_description: '', window: null, subfield: null },
                records: [{ id: 'W1' }],
            });
        });
    });

    describe('BackupReplayCollector', () => {
        it('should replay records and stamp those without fetched_at', async () => {
            const filePath = write([
                { id: 'W1', fetched_at: '2024-05-09T08:00:00.000Z' },
                { id: 'W2' },
            ]);

            const result = await new BackupReplayCollector(filePath).collect(WINDOW);

            expect(result).toEqual({
                works: [
                    { id: 'W1', fetched_at: '2024-05-09T08:00:00.000Z' },
                    { id: 'W2', fetched_at: '2024-05-10T12:00:00.000Z' },
                ],
                pages: 1,
                totalAvailable: 2,
                truncated: false,
            });
        });

        it('should describe itself by file', () => {
            expect(new BackupReplayCollector('/tmp/works.json').describe()).toBe('replay of /tmp/works.json');
        });

        it('should honour an aborted signal', async () => {
            const filePath = write([{ id: 'W1' }]);
            const controller = new AbortController();
            controller.abort();

            await expect(new BackupReplayCollector(filePath).collect(WINDOW, controller.signal))
                .rejects.toThrow(PipelineAbortedError);
        });
    });
});

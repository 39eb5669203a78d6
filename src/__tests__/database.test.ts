import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { PaperStore, rowToPaper, toSqlParams } from '../storage/database.js';
import { PAPERS_TABLE, ensurePapersTable } from '../storage/schema.js';
import { transformWork } from '../ingest/transform.js';
import { ChunkFatalError, RecordWriteError, SchemaError, StoreConnectionError } from '../utils/errors.js';
import { makeTempDir, removeTempDir, sampleWork } from './helpers.js';
import type { NormalizedPaper } from '../types/index.js';

function samplePaper(overrides: Partial<NormalizedPaper> = {}): NormalizedPaper {
    return { ...transformWork({ ...sampleWork(), fetched_at: '2024-05-10T12:00:00.000Z' }), ...overrides };
}

describe('PaperStore', () => {
    let dir: string;
    let store: PaperStore;

    beforeEach(() => {
        dir = makeTempDir();
        store = new PaperStore(path.join(dir, 'test.db'));
    });

    afterEach(() => {
        store.close();
        removeTempDir(dir);
    });

    describe('connection', () => {
        it('should use WAL journal mode', () => {
            expect(store.getRawDb().pragma('journal_mode', { simple: true })).toBe('wal');
        });

        it('should report the SQLite version', () => {
            expect(store.version).toMatch(/^3\.\d+\.\d+$/);
        });

        it('should fail with StoreConnectionError when the directory does not exist', () => {
            expect(() => new PaperStore(path.join(dir, 'missing', 'nested', 'test.db'))).toThrow(StoreConnectionError);
        });

        it('should close more than once without throwing', () => {
            store.close();
            store.close();
            expect(store.isOpen).toBe(false);
        });
    });

    describe('ensurePapersTable', () => {
        it('should create, keep, and on force recreate the table', () => {
            expect(ensurePapersTable(store)).toBe('created');
            expect(ensurePapersTable(store)).toBe('exists');

            store.upsertPaper(samplePaper());
            expect(store.countRows()).toBe(1);

            expect(ensurePapersTable(store, { force: true })).toBe('recreated');
            expect(store.countRows()).toBe(0);
        });

        it('should create every column plus the store timestamps', () => {
            ensurePapersTable(store);
            const columns = store.columnInfo(PAPERS_TABLE);

            expect(columns).toHaveLength(43);
            expect(columns[0]).toEqual({ name: 'id', type: 'TEXT', notNull: true, primaryKey: true });
            expect(columns.map((c) => c.name).slice(-2)).toEqual(['created_at', 'updated_at']);
        });

        it('should create the secondary indexes', () => {
            ensurePapersTable(store);
            const indexes = store.all(
                "SELECT name FROM sqlite_master WHERE type = 'index' AND name LIKE 'idx_papers_%' ORDER BY name"
            );

            expect(indexes).toHaveLength(9);
            expect(indexes[0]?.['name']).toBe('idx_papers_cited_by_count');
        });

        it('should wrap failures in SchemaError', () => {
            class BrokenStore extends PaperStore {
                override exec(): void {
                    throw new Error('disk says no');
                }
            }
            const broken = new BrokenStore(path.join(dir, 'broken.db'));
            try {
                expect(() => ensurePapersTable(broken)).toThrow(SchemaError);
                expect(() => ensurePapersTable(broken)).toThrow('Failed to ensure table "papers": disk says no');
            } finally {
                broken.close();
            }
        });
    });

    describe('upsertPaper', () => {
        beforeEach(() => {
            ensurePapersTable(store);
        });

        it('should round-trip every column', () => {
            const paper = samplePaper();
            expect(store.upsertPaper(paper)).toBe('inserted');
            expect(store.getPaperById(paper.id)).toEqual(paper);
        });

        it('should keep nulls as nulls', () => {
            const paper = transformWork({ id: 'W-sparse', title: 'Sparse' });
            store.upsertPaper(paper);

            const stored = store.getPaperById('W-sparse');
            expect(stored?.is_open_access).toBeNull();
            expect(stored?.primary_topic_score).toBeNull();
            expect(stored?.is_retracted).toBe(false);
        });

        it('should replace the row and keep created_at on a second write', () => {
            const paper = samplePaper();
            store.upsertPaper(paper);
            const first = store.getTimestamps(paper.id);

            expect(store.upsertPaper({ ...paper, cited_by_count: 99, title: 'Revised' })).toBe('updated');

            const second = store.getTimestamps(paper.id);
            expect(store.countRows()).toBe(1);
            expect(store.getPaperById(paper.id)?.cited_by_count).toBe(99);
            expect(store.getPaperById(paper.id)?.title).toBe('Revised');
            expect(second?.createdAt).toBe(first?.createdAt);
            expect((second?.updatedAt ?? '') >= (first?.updatedAt ?? '')).toBe(true);
        });

        it('should stamp ISO-8601 UTC timestamps', () => {
            store.upsertPaper(samplePaper());
            expect(store.getTimestamps('https://openalex.org/W100')?.createdAt).toMatch(
                /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/
            );
        });

        it('should reject a missing title as a record error', () => {
            const error = captureError(() => store.upsertPaper(samplePaper({ title: null })));

            expect(error).toBeInstanceOf(RecordWriteError);
            expect(error).toMatchObject({ recordId: 'https://openalex.org/W100', code: 'SQLITE_CONSTRAINT_NOTNULL' });
        });

        it('should reject a duplicate DOI on another id as a record error', () => {
            store.upsertPaper(samplePaper());
            const error = captureError(() => store.upsertPaper(samplePaper({ id: 'W-other' })));

            expect(error).toBeInstanceOf(RecordWriteError);
            expect(error).toMatchObject({ recordId: 'W-other', code: 'SQLITE_CONSTRAINT_UNIQUE' });
        });

        it('should leave the transaction usable after a record error', () => {
            store.begin();
            store.upsertPaper(samplePaper());
            expect(() => store.upsertPaper(samplePaper({ id: 'W-bad', doi: null, title: null }))).toThrow(RecordWriteError);
            store.upsertPaper(samplePaper({ id: 'W-good', doi: null }));
            store.commit();

            expect(store.countRows()).toBe(2);
        });
    });

    describe('chunk transactions', () => {
        beforeEach(() => {
            ensurePapersTable(store);
        });

        it('should discard writes on rollback', () => {
            store.begin();
            store.upsertPaper(samplePaper());
            expect(store.inTransaction).toBe(true);
            store.rollback();

            expect(store.inTransaction).toBe(false);
            expect(store.countRows()).toBe(0);
        });

        it('should raise ChunkFatalError when a transaction cannot begin', () => {
            store.begin();
            expect(() => store.begin()).toThrow(ChunkFatalError);
            store.rollback();
        });

        it('should raise ChunkFatalError when there is nothing to commit', () => {
            expect(() => store.commit()).toThrow(ChunkFatalError);
        });

        it('should roll back an open transaction on close', () => {
            store.begin();
            store.upsertPaper(samplePaper());
            store.close();

            const reopened = new PaperStore(store.dbPath);
            try {
                expect(reopened.countRows()).toBe(0);
            } finally {
                reopened.close();
            }
        });
    });
});

describe('toSqlParams / rowToPaper', () => {
    it('should store booleans as 0/1 and read them back', () => {
        const paper = samplePaper();
        const params = toSqlParams(paper);

        expect(params['is_open_access']).toBe(1);
        expect(params['is_retracted']).toBe(0);
        expect(params['journal_is_core']).toBe(0);
        expect(params['title']).toBe('Learning to Test Things');
        expect(rowToPaper(params)).toEqual(paper);
    });
});

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected the call to throw');
}

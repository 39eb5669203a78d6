import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { PageRequest, RawWork, WorksPage, WorksSource } from '../types/index.js';

/**
 * Fresh temporary directory; removed by `removeTempDir`.
 */
export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'paper-ingest-test-'));
}

export function removeTempDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

const PHYSICAL_SCIENCES = { id: 'https://openalex.org/domains/3', display_name: 'Physical Sciences' };
const COMPUTER_SCIENCE = { id: 'https://openalex.org/fields/17', display_name: 'Computer Science' };
const ARTIFICIAL_INTELLIGENCE = { id: 'https://openalex.org/subfields/1702', display_name: 'Artificial Intelligence' };

/**
 * A fully populated OpenAlex work. Three topics: the first two share the
 * AI subfield, the third sits in another field of the same domain.
 */
export function sampleWork(overrides: Record<string, unknown> = {}): RawWork {
    return {
        id: 'https://openalex.org/W100',
        doi: 'https://doi.org/10.1000/test.100',
        ids: { openalex: 'https://openalex.org/W100' },
        title: 'Learning to Test Things',
        display_name: 'Learning to Test Things',
        publication_year: 2024,
        publication_date: '2024-05-08',
        created_date: '2024-05-09',
        updated_date: '2024-05-10T01:02:03.456789',
        language: 'en',
        type: 'article',
        type_crossref: 'journal-article',
        open_access: { is_oa: true, oa_status: 'gold', oa_url: 'https://example.org/w100.pdf' },
        primary_location: {
            is_oa: true,
            pdf_url: 'https://example.org/location.pdf',
            source: {
                display_name: 'Journal of Tests',
                issn_l: '1234-5678',
                is_oa: true,
                is_in_doaj: true,
                is_indexed_in_scopus: true,
                is_core: false,
                host_organization_name: 'Test Press',
            },
        },
        cited_by_count: 12,
        referenced_works: ['https://openalex.org/W1', 'https://openalex.org/W2', 'https://openalex.org/W3'],
        authorships: [
            {
                countries: ['US'],
                institutions: [{ id: 'https://openalex.org/I1', country_code: 'US' }],
            },
            {
                countries: ['DE', 'US'],
                institutions: [
                    { id: 'https://openalex.org/I2', country_code: 'DE' },
                    { id: 'https://openalex.org/I1', country_code: 'US' },
                ],
            },
        ],
        citation_normalized_percentile: { value: 0.87, is_in_top_1_percent: false, is_in_top_10_percent: true },
        topics: [
            {
                id: 'https://openalex.org/T1',
                display_name: 'Neural Test Generation',
                score: 0.9,
                subfield: ARTIFICIAL_INTELLIGENCE,
                field: COMPUTER_SCIENCE,
                domain: PHYSICAL_SCIENCES,
            },
            {
                id: 'https://openalex.org/T2',
                display_name: 'Automated Reasoning',
                score: 0.95,
                subfield: ARTIFICIAL_INTELLIGENCE,
                field: COMPUTER_SCIENCE,
                domain: PHYSICAL_SCIENCES,
            },
            {
                id: 'https://openalex.org/T3',
                display_name: 'Bayesian Statistics',
                score: 0.99,
                subfield: { id: 'https://openalex.org/subfields/2613', display_name: 'Statistics and Probability' },
                field: { id: 'https://openalex.org/fields/26', display_name: 'Mathematics' },
                domain: PHYSICAL_SCIENCES,
            },
        ],
        is_retracted: false,
        is_paratext: false,
        has_fulltext: true,
        ...overrides,
    };
}

/**
 * In-process works source. Page `i` is served for cursor `page-i` (the first
 * page for a null cursor); `failures` holds errors thrown, in order, before
 * a page is served.
 */
export class FakeWorksSource implements WorksSource {
    readonly name = 'Fake';
    readonly requests: PageRequest[] = [];
    private readonly failures: Map<number, unknown[]>;

    constructor(
        private readonly pages: RawWork[][],
        failures: Record<number, unknown[]> = {}
    ) {
        this.failures = new Map(Object.entries(failures).map(([page, errors]) => [Number(page), [...errors]]));
    }

    async fetchPage(request: PageRequest): Promise<WorksPage> {
        this.requests.push(request);
        const index = request.cursor === null ? 0 : Number(request.cursor.replace('page-', ''));

        const pending = this.failures.get(index);
        if (pending && pending.length > 0) {
            throw pending.shift();
        }

        const total = this.pages.reduce((sum, page) => sum + page.length, 0);
        return {
            items: this.pages[index] ?? [],
            totalAvailable: total,
            nextCursor: index + 1 < this.pages.length ? `page-${index + 1}` : null,
        };
    }
}

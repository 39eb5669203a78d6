import { createHash } from 'node:crypto';
import type { NormalizedPaper, RawWork } from '../types/index.js';
import { RecordTransformError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk a chain of object members; any non-object link yields undefined.
 */
function pick(value: unknown, ...path: string[]): unknown {
    let current = value;
    for (const key of path) {
        if (!isObject(current)) return undefined;
        current = current[key];
    }
    return current;
}

function asText(value: unknown): string | null {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value === 'boolean') return String(value);
    return null;
}

/** Text with a blank value read as absent. */
function presentText(value: unknown): string | null {
    const text = asText(value);
    return text !== null && text.trim() !== '' ? text : null;
}

function asReal(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

function asInteger(value: unknown): number | null {
    const real = asReal(value);
    return real === null ? null : Math.trunc(real);
}

function asBoolean(value: unknown): boolean | null {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value !== 0;
    if (value === 'true') return true;
    if (value === 'false') return false;
    return null;
}

function lengthOf(value: unknown): number {
    return Array.isArray(value) ? value.length : 0;
}

function objects(value: unknown): JsonObject[] {
    return Array.isArray(value) ? value.filter(isObject) : [];
}

/**
 * Evaluate one field extraction; a throw degrades the field to `fallback`.
 */
function safely<T>(field: string, extract: () => T, fallback: T): T {
    try {
        return extract();
    } catch (error) {
        getLogger().debug({ field, error: errorMessage(error) }, 'Field extraction failed; using fallback');
        return fallback;
    }
}

/**
 * Key-sorted copy, so equal content always serializes identically.
 */
function canonicalize(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(canonicalize);
    if (isObject(value)) {
        return Object.fromEntries(
            Object.keys(value).sort().map((key) => [key, canonicalize(value[key])])
        );
    }
    return value;
}

/**
 * First non-empty of `id`, `doi`, `ids.openalex`.
 */
export function extractWorkId(work: RawWork): string | null {
    for (const candidate of [work.id, work.doi, pick(work.ids, 'openalex')]) {
        const text = asText(candidate)?.trim();
        if (text) return text;
    }
    return null;
}

/**
 * Content-derived id for works that carry none. `fetched_at` is left out so
 * re-fetching the same work yields the same id.
 */
export function fallbackId(work: RawWork): string {
    const content: JsonObject = {};
    for (const [key, value] of Object.entries(work)) {
        if (key !== 'fetched_at') content[key] = value;
    }
    const digest = createHash('sha256').update(JSON.stringify(canonicalize(content))).digest('hex');
    return `fallback_${digest.slice(0, 16)}`;
}

function distinctCountries(authorships: JsonObject[]): number {
    const countries = new Set<string>();
    for (const authorship of authorships) {
        for (const code of Array.isArray(authorship['countries']) ? authorship['countries'] : []) {
            const text = asText(code);
            if (text) countries.add(text);
        }
        const legacy = asText(authorship['country_code']);
        if (legacy) countries.add(legacy);
        for (const institution of objects(authorship['institutions'])) {
            const text = asText(institution['country_code']);
            if (text) countries.add(text);
        }
    }
    return countries.size;
}

function distinctInstitutions(authorships: JsonObject[]): number {
    const institutions = new Set<string>();
    for (const authorship of authorships) {
        for (const institution of objects(authorship['institutions'])) {
            const id = asText(institution['id']);
            if (id) institutions.add(id);
        }
    }
    return institutions.size;
}

type TopicLevel = 'domain' | 'field' | 'subfield';

/**
 * Highest score among topics that share the primary topic's node at `level`.
 */
function levelScore(topics: JsonObject[], level: TopicLevel): number | null {
    const primary = topics[0];
    if (!primary) return null;

    const nodeId = asText(pick(primary, level, 'id'));
    if (nodeId === null) return asReal(primary['score']);

    let best: number | null = null;
    for (const topic of topics) {
        if (asText(pick(topic, level, 'id')) !== nodeId) continue;
        const score = asReal(topic['score']);
        if (score !== null && (best === null || score > best)) best = score;
    }
    return best;
}

/**
 * Flatten one OpenAlex work into a papers row.
 *
 * Never fails on missing or malformed members: each column degrades to null
 * (or to its documented default). Only a value that is not an object at all
 * is rejected.
 *
 * @throws RecordTransformError when `input` is not an object
 */
export function transformWork(input: unknown): NormalizedPaper {
    if (!isObject(input)) {
        throw new RecordTransformError(`Cannot transform ${Array.isArray(input) ? 'array' : typeof input} into a paper`);
    }
    const work: JsonObject = input;

    let id: string;
    try {
        id = extractWorkId(work) ?? fallbackId(work);
    } catch (error) {
        throw new RecordTransformError(`Cannot derive an id: ${errorMessage(error)}`, error);
    }

    const text = (field: string, extract: () => unknown): string | null => safely(field, () => asText(extract()), null);
    const integer = (field: string, extract: () => unknown): number | null => safely(field, () => asInteger(extract()), null);
    const real = (field: string, extract: () => unknown): number | null => safely(field, () => asReal(extract()), null);
    const flag = (field: string, extract: () => unknown, fallback: boolean | null = null): boolean | null =>
        safely(field, () => asBoolean(extract()) ?? fallback, fallback);

    const topics = safely('topics', () => objects(work['topics']), []);
    const primaryTopic = topics[0];
    const authorships = safely('authorships', () => objects(work['authorships']), []);
    const venue = (...path: string[]): unknown => pick(work['primary_location'], 'source', ...path);

    return {
        id,
        doi: text('doi', () => work['doi']),
        title: text('title', () => presentText(work['title']) ?? work['display_name']),
        display_name: text('display_name', () => work['display_name']),

        publication_year: integer('publication_year', () => work['publication_year']),
        publication_date: text('publication_date', () => work['publication_date']),
        created_date: text('created_date', () => work['created_date']),
        updated_date: text('updated_date', () => work['updated_date']),
        fetched_at: text('fetched_at', () => work['fetched_at']),

        language: text('language', () => work['language']),
        paper_type: text('paper_type', () => work['type']),
        type_crossref: text('type_crossref', () => work['type_crossref']),

        is_open_access: flag('is_open_access', () =>
            asBoolean(pick(work['open_access'], 'is_oa')) ?? pick(work['primary_location'], 'is_oa')),
        oa_status: text('oa_status', () => pick(work['open_access'], 'oa_status')),
        oa_url: text('oa_url', () =>
            asText(pick(work['open_access'], 'oa_url')) ?? pick(work['primary_location'], 'pdf_url')),

        cited_by_count: safely('cited_by_count', () => asInteger(work['cited_by_count']) ?? 0, 0),
        referenced_works_count: safely('referenced_works_count', () => lengthOf(work['referenced_works']), 0),
        authors_count: safely('authors_count', () => lengthOf(work['authorships']), 0),
        countries_distinct_count: safely('countries_distinct_count', () => distinctCountries(authorships), 0),
        institutions_distinct_count: safely('institutions_distinct_count', () => distinctInstitutions(authorships), 0),

        citation_normalized_percentile: real('citation_normalized_percentile', () =>
            pick(work['citation_normalized_percentile'], 'value')),
        is_in_top_1_percent: flag('is_in_top_1_percent', () =>
            pick(work['citation_normalized_percentile'], 'is_in_top_1_percent'), false),
        is_in_top_10_percent: flag('is_in_top_10_percent', () =>
            pick(work['citation_normalized_percentile'], 'is_in_top_10_percent'), false),

        journal_name: text('journal_name', () => venue('display_name')),
        journal_issn: text('journal_issn', () => venue('issn_l')),
        journal_is_oa: flag('journal_is_oa', () => venue('is_oa')),
        journal_is_indexed_scopus: flag('journal_is_indexed_scopus', () => venue('is_indexed_in_scopus')),
        journal_is_core: flag('journal_is_core', () => venue('is_core')),
        journal_host_organization: text('journal_host_organization', () => venue('host_organization_name')),

        primary_domain_name: text('primary_domain_name', () => pick(primaryTopic, 'domain', 'display_name')),
        primary_domain_score: safely('primary_domain_score', () => levelScore(topics, 'domain'), null),
        primary_field_name: text('primary_field_name', () => pick(primaryTopic, 'field', 'display_name')),
        primary_field_score: safely('primary_field_score', () => levelScore(topics, 'field'), null),
        primary_subfield_name: text('primary_subfield_name', () => pick(primaryTopic, 'subfield', 'display_name')),
        primary_subfield_score: safely('primary_subfield_score', () => levelScore(topics, 'subfield'), null),
        primary_topic_name: text('primary_topic_name', () => pick(primaryTopic, 'display_name')),
        primary_topic_score: real('primary_topic_score', () => pick(primaryTopic, 'score')),
        topics_count: safely('topics_count', () => lengthOf(work['topics']), 0),

        is_retracted: flag('is_retracted', () => work['is_retracted'], false),
        is_paratext: flag('is_paratext', () => work['is_paratext'], false),
        has_fulltext: flag('has_fulltext', () => work['has_fulltext'], false),
    };
}

/**
 * A work as returned by the OpenAlex `/works` endpoint.
 *
 * Only the members the transformer reads are listed. Every member may be
 * missing, null, or carry an unexpected type, so consumers must read them
 * defensively. `fetched_at` is added by the fetcher when the page arrives.
 */
export interface RawWork {
    id?: unknown;
    doi?: unknown;
    ids?: unknown;
    title?: unknown;
    display_name?: unknown;
    publication_year?: unknown;
    publication_date?: unknown;
    created_date?: unknown;
    updated_date?: unknown;
    language?: unknown;
    type?: unknown;
    type_crossref?: unknown;
    open_access?: unknown;
    primary_location?: unknown;
    cited_by_count?: unknown;
    referenced_works?: unknown;
    authorships?: unknown;
    citation_normalized_percentile?: unknown;
    topics?: unknown;
    is_retracted?: unknown;
    is_paratext?: unknown;
    has_fulltext?: unknown;
    fetched_at?: unknown;
    [key: string]: unknown;
}

/**
 * Flat row shape of the `papers` table, one per OpenAlex work.
 * Store-managed `created_at` / `updated_at` are not part of it.
 */
export interface NormalizedPaper {
    // Identity
    id: string;
    doi: string | null;
    title: string | null;
    display_name: string | null;

    // Temporal
    publication_year: number | null;
    publication_date: string | null;
    created_date: string | null;
    updated_date: string | null;
    fetched_at: string | null;

    // Basic metadata
    language: string | null;
    paper_type: string | null;
    type_crossref: string | null;

    // Open access
    is_open_access: boolean | null;
    oa_status: string | null;
    oa_url: string | null;

    // Quantitative measures
    cited_by_count: number | null;
    referenced_works_count: number | null;
    authors_count: number | null;
    countries_distinct_count: number | null;
    institutions_distinct_count: number | null;

    // Citation metrics
    citation_normalized_percentile: number | null;
    is_in_top_1_percent: boolean | null;
    is_in_top_10_percent: boolean | null;

    // Venue
    journal_name: string | null;
    journal_issn: string | null;
    journal_is_oa: boolean | null;
    journal_is_indexed_scopus: boolean | null;
    journal_is_core: boolean | null;
    journal_host_organization: string | null;

    // Topic classification: domain → field → subfield → topic
    primary_domain_name: string | null;
    primary_domain_score: number | null;
    primary_field_name: string | null;
    primary_field_score: number | null;
    primary_subfield_name: string | null;
    primary_subfield_score: number | null;
    primary_topic_name: string | null;
    primary_topic_score: number | null;
    topics_count: number | null;

    // Flags
    is_retracted: boolean | null;
    is_paratext: boolean | null;
    has_fulltext: boolean | null;
}

export type PaperColumn = keyof NormalizedPaper;

/**
 * Declared storage type of a column. Dates and timestamps are kept as ISO text.
 */
export type ColumnType = 'text' | 'integer' | 'real' | 'boolean' | 'date' | 'timestamp';

/**
 * A raw work tagged with the time its page was fetched.
 */
export type FetchedWork = RawWork & { fetched_at: string };

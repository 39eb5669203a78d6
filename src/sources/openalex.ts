import type { PageRequest, RawWork, WorksPage, WorksSource, WorksSourceOptions } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { buildWorksFilter } from './utils.js';

const OPENALEX_BASE = 'https://api.openalex.org';

/**
 * Cursor that starts OpenAlex deep pagination.
 */
export const FIRST_CURSOR = '*';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * OpenAlex `/works` source, paginated with cursors.
 *
 * @see https://docs.openalex.org/how-to-use-the-api/get-lists-of-entities/paging
 */
export class OpenAlexWorksSource implements WorksSource {
    readonly name = 'OpenAlex';
    private httpClient: HttpClient;
    private apiKey?: string;
    private email?: string;
    private readonly logger = getLogger();

    constructor(options?: WorksSourceOptions) {
        this.apiKey = options?.apiKey ?? process.env['OPENALEX_API_KEY'];
        this.email = options?.email;
        this.httpClient = getHttpClient({ email: options?.email });
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    buildUrl(request: PageRequest): string {
        const params = new URLSearchParams({
            filter: buildWorksFilter(request.window, request.subfield),
            per_page: String(request.pageSize),
            cursor: request.cursor ?? FIRST_CURSOR,
        });

        this.addAuthParams(params);

        return `${OPENALEX_BASE}/works?${params.toString()}`;
    }

    async fetchPage(request: PageRequest, signal?: AbortSignal): Promise<WorksPage> {
        const url = this.buildUrl(request);
        this.logger.debug({ url }, 'OpenAlex works page');

        const response = await this.httpClient.get(url, { source: 'openalex', signal });
        return this.parsePage(response.data);
    }

    /**
     * Narrow a `/works` response body into a page.
     * Results that are not objects are dropped.
     */
    parsePage(body: unknown): WorksPage {
        if (!isRecord(body) || !Array.isArray(body['results'])) {
            throw new Error('Unexpected OpenAlex response: missing results array');
        }

        const items: RawWork[] = [];
        let dropped = 0;
        for (const result of body['results']) {
            if (isRecord(result)) items.push(result);
            else dropped++;
        }
        if (dropped > 0) {
            this.logger.warn({ dropped }, 'Dropped non-object results from OpenAlex page');
        }

        const meta = isRecord(body['meta']) ? body['meta'] : {};
        const count = meta['count'];
        const nextCursor = meta['next_cursor'];

        return {
            items,
            totalAvailable: typeof count === 'number' ? count : null,
            nextCursor: typeof nextCursor === 'string' && nextCursor !== '' ? nextCursor : null,
        };
    }

    private addAuthParams(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('mailto', this.email);
        }
    }
}

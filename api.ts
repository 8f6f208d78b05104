import { CatalogGateway, CatalogPayload, GatewayResult } from './types/interfaces';
import { AppConfig } from './config';

export type FetchFn = typeof fetch;

export interface UpstreamResponse {
    status: number;
    body: string;
}

export class TimeoutError extends Error {
    constructor(
        public url: string,
        public timeoutMs: number
    ) {
        super(`Request to ${url} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

/**
 * GET a URL and read its body under a single timer, so a slow body counts
 * against the same timeout as a slow connect.
 */
export async function fetchWithTimeout(
    url: string,
    options: { timeout: number; fetchFn?: FetchFn }
): Promise<UpstreamResponse> {
    const fetchFn = options.fetchFn ?? fetch;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeout);

    try {
        const response = await fetchFn(url, { method: 'GET', signal: controller.signal });
        const body = await response.text();
        return { status: response.status, body };
    } catch (error) {
        if (error instanceof Error && error.name === 'AbortError') {
            throw new TimeoutError(url, options.timeout);
        }
        throw error;
    } finally {
        clearTimeout(timeoutId);
    }
}

export const ABSENT: GatewayResult = { kind: 'absent' };

export function found(payload: CatalogPayload): GatewayResult {
    return { kind: 'found', payload };
}

export function payloadOf(result: GatewayResult): CatalogPayload | null {
    return result.kind === 'found' ? result.payload : null;
}

function isPayload(value: unknown): value is CatalogPayload {
    return typeof value === 'object' && value !== null;
}

export function normalizeEndpoint(endpoint: string): string {
    const trimmed = endpoint.trim();
    return trimmed.startsWith('/') ? trimmed.slice(1) : trimmed;
}

export function buildSearchEndpoint(searchType: string, query: string, limit: number): string {
    return `search/${encodeURIComponent(searchType)}?q=${encodeURIComponent(query)}&limit=${limit}`;
}

export interface DeezerGateway extends CatalogGateway {
    buildUrl(endpoint: string): string;
}

export function createDeezerGateway(
    config: Pick<AppConfig, 'apiBaseUrl' | 'requestTimeoutMs'>,
    fetchFn?: FetchFn
): DeezerGateway {
    const baseUrl = config.apiBaseUrl.replace(/\/+$/, '');
    const timeoutMs = config.requestTimeoutMs;
    const buildUrl = (endpoint: string): string => `${baseUrl}/${normalizeEndpoint(endpoint)}`;

    return {
        buildUrl,

        // Never throws: every failure is reported as ABSENT
        async request(endpoint: string): Promise<GatewayResult> {
            const url = buildUrl(endpoint);
            console.log(`Deezer request: ${url}`);

            let response: UpstreamResponse;
            try {
                response = await fetchWithTimeout(url, { timeout: timeoutMs, fetchFn });
            } catch (error) {
                if (error instanceof TimeoutError) {
                    console.log(`Deezer timeout: ${error.message}`);
                } else if (error instanceof TypeError) {
                    console.log(`Deezer connection error: cannot reach ${url} (${error.message})`);
                } else {
                    console.log(`Deezer request error: ${error instanceof Error ? error.message : String(error)}`);
                }
                return ABSENT;
            }

            console.log(`Deezer response status: ${response.status}`);
            if (response.status !== 200) {
                console.log(`Deezer HTTP error ${response.status}`);
                return ABSENT;
            }

            let data: unknown;
            try {
                data = JSON.parse(response.body);
            } catch (error) {
                console.log(`Deezer JSON decode error: ${error instanceof Error ? error.message : String(error)}`);
                console.log(`Deezer response text: ${response.body.slice(0, 200)}`);
                return ABSENT;
            }

            if (!isPayload(data)) {
                console.log(`Deezer response is not an object or array: ${response.body.slice(0, 200)}`);
                return ABSENT;
            }

            if (!Array.isArray(data) && 'error' in data) {
                console.log(`Deezer API error: ${JSON.stringify(data.error)}`);
                return ABSENT;
            }

            console.log('Deezer request successful');
            return found(data);
        }
    };
}

import { CatalogGateway, CatalogPayload, DetailContext, PageView, ResourceType } from './types/interfaces';
import { buildSearchEndpoint, payloadOf } from './api';

export const DEFAULT_SEARCH_TYPE = 'track';

function countItems(payload: CatalogPayload | null): number | null {
    if (payload === null || Array.isArray(payload)) {
        return null;
    }
    return Array.isArray(payload.data) ? payload.data.length : null;
}

function logListResult(label: string, payload: CatalogPayload | null): void {
    if (payload === null) {
        console.log(`No ${label} data received`);
        return;
    }
    const count = countItems(payload);
    console.log(`${label} data received: ${count ?? 0} items`);
}

export function createCatalogService(gateway: CatalogGateway, options: { resultLimit: number }) {
    const fetchPayload = async (endpoint: string): Promise<CatalogPayload | null> =>
        payloadOf(await gateway.request(endpoint));

    const detail = async (endpoint: string, title: string, type: ResourceType): Promise<PageView> => {
        const data = await fetchPayload(endpoint);
        return { template: 'detail.html', context: { data, title, type } };
    };

    return {
        async home(): Promise<PageView> {
            const chart_data = await fetchPayload('chart/0');
            const editorial_data = await fetchPayload('editorial');
            return { template: 'index.html', context: { chart_data, editorial_data } };
        },

        async search(query?: string, searchType?: string): Promise<PageView> {
            const q = query ?? '';
            const search_type = searchType ? searchType : DEFAULT_SEARCH_TYPE;
            let results: CatalogPayload | null = null;

            console.log(`Search called - query: "${q}", type: "${search_type}"`);

            if (q) {
                const started = Date.now();
                results = await fetchPayload(buildSearchEndpoint(search_type, q, options.resultLimit));
                const elapsed = (Date.now() - started) / 1000;

                if (results !== null) {
                    console.log(`Search completed in ${elapsed.toFixed(2)}s`);
                    const count = countItems(results);
                    console.log(count === null ? 'No "data" key in search results' : `Search results: ${count} items`);
                } else {
                    console.log('No search results received from Deezer');
                }
            }

            return { template: 'search.html', context: { results, query: q, search_type } };
        },

        user(id: string): Promise<PageView> {
            return detail(`user/${id}`, `User ${id}`, 'user');
        },

        async track(id: string): Promise<PageView> {
            console.log(`Fetching track details for ID: ${id}`);
            return detail(`track/${id}`, 'Track Details', 'track');
        },

        async editorials(): Promise<PageView> {
            const data = await fetchPayload('editorial');
            logListResult('Editorial', data);
            return { template: 'detail.html', context: { data, title: 'Editorial Picks', type: 'editorial' } };
        },

        // Deezer has no single-editorial resource, so the page shows its selection
        async editorialSelection(id: string): Promise<PageView> {
            const data = await fetchPayload(`editorial/${id}/selection`);
            logListResult('Editorial selection', data);
            const context: DetailContext = {
                data,
                title: 'Editorial Selection',
                type: 'editorial_detail',
                editorial_id: id
            };
            return { template: 'detail.html', context };
        },

        album(id: string): Promise<PageView> {
            return detail(`album/${id}`, 'Album Details', 'album');
        },

        async artist(id: string): Promise<PageView> {
            const [data, top_tracks] = await Promise.all([
                fetchPayload(`artist/${id}`),
                fetchPayload(`artist/${id}/top?limit=${options.resultLimit}`)
            ]);
            return {
                template: 'detail.html',
                context: { data, top_tracks, title: 'Artist Details', type: 'artist' }
            };
        },

        playlist(id: string): Promise<PageView> {
            return detail(`playlist/${id}`, 'Playlist Details', 'playlist');
        },

        async genres(): Promise<PageView> {
            const data = await fetchPayload('genre');
            logListResult('Genre', data);
            return { template: 'detail.html', context: { data, title: 'Music Genres', type: 'genre' } };
        },

        async radios(): Promise<PageView> {
            const data = await fetchPayload('radio');
            logListResult('Radio', data);
            return { template: 'detail.html', context: { data, title: 'Radio Stations', type: 'radio' } };
        },

        episode(id: string): Promise<PageView> {
            return detail(`episode/${id}`, 'Episode Details', 'episode');
        }
    };
}

export type CatalogService = ReturnType<typeof createCatalogService>;

export interface APIError extends Error {
    statusCode?: number;
}

// Deezer payloads are passed through to the templates as-is
export type CatalogPayload = { [key: string]: unknown } | unknown[];

export type GatewayResult =
    | { kind: 'found'; payload: CatalogPayload }
    | { kind: 'absent' };

export interface CatalogGateway {
    request(endpoint: string): Promise<GatewayResult>;
}

export type ResourceType =
    | 'user'
    | 'track'
    | 'editorial'
    | 'editorial_detail'
    | 'album'
    | 'artist'
    | 'playlist'
    | 'genre'
    | 'radio'
    | 'episode';

export interface HomeContext {
    chart_data: CatalogPayload | null;
    editorial_data: CatalogPayload | null;
}

export interface SearchContext {
    results: CatalogPayload | null;
    query: string;
    search_type: string;
    error?: string;
}

export interface DetailContext {
    data: CatalogPayload | null;
    title: string;
    type: ResourceType;
    top_tracks?: CatalogPayload | null;
    editorial_id?: string;
}

export type PageView =
    | { template: 'index.html'; context: HomeContext }
    | { template: 'search.html'; context: SearchContext }
    | { template: 'detail.html'; context: DetailContext };

export class AppError extends Error implements APIError {
    constructor(
        message: string,
        public statusCode: number = 500
    ) {
        super(message);
        this.name = 'AppError';
    }
}

export class NotFoundError extends AppError {
    constructor(message: string = 'Page not found') {
        super(message, 404);
        this.name = 'NotFoundError';
    }
}

export class ConfigError extends Error {
    constructor(
        public variable: string,
        message: string
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

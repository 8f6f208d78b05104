import { ConfigError } from './types/interfaces';

export interface AppConfig {
    apiBaseUrl: string;
    host: string;
    port: number;
    requestTimeoutMs: number;
    // Limit for search results and artist top tracks
    resultLimit: number;
}

export const DEFAULT_CONFIG: AppConfig = {
    apiBaseUrl: 'https://api.deezer.com',
    host: '0.0.0.0',
    port: 5000,
    requestTimeoutMs: 15 * 1000, // 15 seconds
    resultLimit: 10
};

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    if (!/^\d+$/.test(raw.trim())) {
        throw new ConfigError(name, `${name} must be a positive integer, got "${raw}"`);
    }
    const value = parseInt(raw.trim(), 10);
    if (value <= 0) {
        throw new ConfigError(name, `${name} must be a positive integer, got "${raw}"`);
    }
    return value;
}

function readString(env: Env, name: string, fallback: string): string {
    const raw = env[name];
    return raw !== undefined && raw.trim() !== '' ? raw.trim() : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
    return {
        apiBaseUrl: readString(env, 'DEEZER_BASE_URL', DEFAULT_CONFIG.apiBaseUrl),
        host: readString(env, 'HOST', DEFAULT_CONFIG.host),
        port: readPositiveInt(env, 'PORT', DEFAULT_CONFIG.port),
        requestTimeoutMs: readPositiveInt(env, 'REQUEST_TIMEOUT_MS', DEFAULT_CONFIG.requestTimeoutMs),
        resultLimit: readPositiveInt(env, 'RESULT_LIMIT', DEFAULT_CONFIG.resultLimit)
    };
}

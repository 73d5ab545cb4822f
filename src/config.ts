import { ConfigError } from './errors';

export type StoreBackend = 'memory' | 'file' | 'redis';

export type StoreConfig = {
    backend: StoreBackend;
    storeDir: string;
    redisUrl: string;
};

export type AppConfig = {
    port: number;
    store: StoreConfig;
    pageCacheTtlSeconds: number;
};

const BACKENDS: readonly StoreBackend[] = ['memory', 'file', 'redis'];

function isBackend(value: string): value is StoreBackend {
    return BACKENDS.some(backend => backend === value);
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
    }
    return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const backend = env.STORE_BACKEND || 'memory';
    if (!isBackend(backend)) {
        throw new ConfigError(`STORE_BACKEND must be one of ${BACKENDS.join(', ')}, got "${backend}"`);
    }

    const port = positiveInt(env, 'PORT', 3000);
    if (port > 65535) {
        throw new ConfigError(`PORT out of range: ${port}`);
    }

    return {
        port,
        store: {
            backend,
            storeDir: env.STORE_DIR || 'var/store',
            redisUrl: env.REDIS_URL || 'redis://localhost:6379',
        },
        pageCacheTtlSeconds: positiveInt(env, 'PAGE_CACHE_TTL', 10),
    };
}

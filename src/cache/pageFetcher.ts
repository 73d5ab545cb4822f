import { HttpError } from '../errors';
import { KeyValueStore } from '../store/kvStore';
import { ExpiringCache, stringCodec } from './expiringCache';

export type PageFetcher = (url: string) => Promise<string>;

export const httpGet: PageFetcher = async (url) => {
    const response = await fetch(url);
    if (!response.ok) {
        throw new HttpError(url, response.status);
    }
    return response.text();
};

export type PageCacheOptions = {
    ttlSeconds?: number;
    fetcher?: PageFetcher;
};

/** Page bodies cached for `ttlSeconds` (10 by default), with per-URL access counts. */
export function createPageCache(
    store: KeyValueStore,
    { ttlSeconds = 10, fetcher = httpGet }: PageCacheOptions = {},
): ExpiringCache<string> {
    return new ExpiringCache(store, fetcher, { ttlSeconds, codec: stringCodec });
}

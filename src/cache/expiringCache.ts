import { DecodeError } from '../errors';
import { logger } from '../logger';
import { KeyValueStore, parseCounter } from '../store/kvStore';

export type ValueCodec<T> = {
    /** Names the stored form in decode errors. */
    name: string;
    encode(value: T): string;
    decode(text: string): T;
};

export const stringCodec: ValueCodec<string> = {
    name: 'string',
    encode: value => value,
    decode: text => text,
};

export function jsonCodec<T>(): ValueCodec<T> {
    return {
        name: 'json',
        encode: value => JSON.stringify(value),
        decode: (text): T => JSON.parse(text),
    };
}

export type ExpiringCacheOptions<T> = {
    ttlSeconds: number;
    codec: ValueCodec<T>;
    keyPrefix?: string;
    countPrefix?: string;
    /** Share one read-check-write per key between concurrent callers. Defaults to true. */
    singleFlight?: boolean;
};

/**
 * Read-through cache over a single-argument function. Entries live for
 * `ttlSeconds` in the backing store; expiry is the store's to enforce on read.
 */
export class ExpiringCache<T> {
    private readonly ttlSeconds: number;
    private readonly codec: ValueCodec<T>;
    private readonly keyPrefix: string;
    private readonly countPrefix: string;
    private readonly singleFlight: boolean;
    private inflight = new Map<string, Promise<T>>();

    constructor(
        private readonly store: KeyValueStore,
        private readonly fn: (arg: string) => Promise<T>,
        opts: ExpiringCacheOptions<T>,
    ) {
        if (!Number.isInteger(opts.ttlSeconds) || opts.ttlSeconds <= 0) {
            throw new RangeError(`ttlSeconds must be a positive integer, got ${opts.ttlSeconds}`);
        }
        this.ttlSeconds = opts.ttlSeconds;
        this.codec = opts.codec;
        this.keyPrefix = opts.keyPrefix ?? 'cache';
        this.countPrefix = opts.countPrefix ?? 'count';
        this.singleFlight = opts.singleFlight ?? true;
    }

    cacheKey(arg: string): string {
        return `${this.keyPrefix}:${arg}`;
    }

    countKey(arg: string): string {
        return `${this.countPrefix}:${arg}`;
    }

    async fetch(arg: string): Promise<T> {
        await this.store.incr(this.countKey(arg));

        if (!this.singleFlight) {
            return this.readThrough(arg);
        }

        // No await between the lookup and the set, so a second caller
        // always sees the first caller's flight.
        const key = this.cacheKey(arg);
        const pending = this.inflight.get(key);
        if (pending) {
            logger.debug({ key }, 'cache fetch coalesced');
            return pending;
        }

        const flight = this.readThrough(arg).finally(() => {
            this.inflight.delete(key);
        });
        this.inflight.set(key, flight);
        return flight;
    }

    async accessCount(arg: string): Promise<number> {
        const key = this.countKey(arg);
        return parseCounter(key, await this.store.get(key));
    }

    async invalidate(arg: string): Promise<boolean> {
        return this.store.del(this.cacheKey(arg));
    }

    private async readThrough(arg: string): Promise<T> {
        const key = this.cacheKey(arg);
        const cached = await this.store.get(key);
        if (cached !== null) {
            logger.debug({ key }, 'cache hit');
            return this.decode(key, cached.toString('utf8'));
        }

        logger.debug({ key, ttlSeconds: this.ttlSeconds }, 'cache miss');
        const result = await this.fn(arg);
        await this.store.setex(key, this.ttlSeconds, this.codec.encode(result));
        return result;
    }

    private decode(key: string, text: string): T {
        try {
            return this.codec.decode(text);
        } catch (err) {
            if (err instanceof DecodeError) throw err;
            throw new DecodeError(key, this.codec.name, text, { cause: err });
        }
    }
}

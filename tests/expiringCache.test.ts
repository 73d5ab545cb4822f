import { ExpiringCache, jsonCodec, stringCodec } from '../src/cache/expiringCache';
import { InMemoryStore } from '../src/store/inMemoryStore';
import { DecodeError } from '../src/errors';

describe('ExpiringCache', () => {
    let store: InMemoryStore;

    beforeEach(() => {
        store = new InMemoryStore();
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('should invoke the function once per argument within the ttl', async () => {
        const fn = jest.fn(async (arg: string) => `value of ${arg}`);
        const cache = new ExpiringCache(store, fn, { ttlSeconds: 10, codec: stringCodec });

        expect(await cache.fetch('a')).toBe('value of a');
        expect(await cache.fetch('a')).toBe('value of a');
        expect(await cache.fetch('b')).toBe('value of b');
        expect(await cache.fetch('a')).toBe('value of a');

        expect(fn).toHaveBeenCalledTimes(2);
        expect(fn.mock.calls).toEqual([['a'], ['b']]);
    });

    it('should count every access, hits included', async () => {
        jest.useFakeTimers();
        const fn = jest.fn(async (arg: string) => arg);
        const cache = new ExpiringCache(store, fn, { ttlSeconds: 10, codec: stringCodec });

        await cache.fetch('a');
        jest.advanceTimersByTime(300);
        await cache.fetch('a');
        jest.advanceTimersByTime(300);
        await cache.fetch('a');

        expect(fn).toHaveBeenCalledTimes(1);
        expect(await cache.accessCount('a')).toBe(3);
        expect(await cache.accessCount('never')).toBe(0);
    });

    it('should recompute once the ttl has elapsed', async () => {
        jest.useFakeTimers();
        let version = 0;
        const fn = jest.fn(async () => `v${++version}`);
        const cache = new ExpiringCache(store, fn, { ttlSeconds: 10, codec: stringCodec });

        expect(await cache.fetch('a')).toBe('v1');
        jest.advanceTimersByTime(9000);
        expect(await cache.fetch('a')).toBe('v1');

        jest.advanceTimersByTime(1000);
        expect(await cache.fetch('a')).toBe('v2');
        expect(fn).toHaveBeenCalledTimes(2);

        // the refreshed entry gets a full ttl of its own
        jest.advanceTimersByTime(9000);
        expect(await cache.fetch('a')).toBe('v2');
        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should store entries under the configured prefixes', async () => {
        const cache = new ExpiringCache(store, async (url: string) => `<html>${url}</html>`, {
            ttlSeconds: 5,
            codec: stringCodec,
            keyPrefix: 'page',
            countPrefix: 'hits',
        });

        await cache.fetch('http://example.test/');

        expect((await store.get('page:http://example.test/'))?.toString()).toBe('<html>http://example.test/</html>');
        expect((await store.get('hits:http://example.test/'))?.toString()).toBe('1');
    });

    it('should run the function once for concurrent misses', async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>(resolve => {
            release = resolve;
        });
        const fn = jest.fn(async (arg: string) => {
            await gate;
            return arg.repeat(2);
        });
        const cache = new ExpiringCache(store, fn, { ttlSeconds: 10, codec: stringCodec });

        const pending = Promise.all([cache.fetch('z'), cache.fetch('z'), cache.fetch('z')]);
        await new Promise(resolve => setImmediate(resolve));
        release();

        expect(await pending).toEqual(['zz', 'zz', 'zz']);
        expect(fn).toHaveBeenCalledTimes(1);
        expect(await cache.accessCount('z')).toBe(3);
    });

    it('should let concurrent misses race without single flight', async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>(resolve => {
            release = resolve;
        });
        const fn = jest.fn(async (arg: string) => {
            await gate;
            return arg;
        });
        const cache = new ExpiringCache(store, fn, { ttlSeconds: 10, codec: stringCodec, singleFlight: false });

        const pending = Promise.all([cache.fetch('z'), cache.fetch('z')]);
        await new Promise(resolve => setImmediate(resolve));
        release();
        await pending;

        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should not cache a failure', async () => {
        const fn = jest.fn(async (arg: string) => arg)
            .mockRejectedValueOnce(new Error('upstream down'));
        const cache = new ExpiringCache(store, fn, { ttlSeconds: 10, codec: stringCodec });

        await expect(cache.fetch('a')).rejects.toThrow('upstream down');
        expect(await store.get('cache:a')).toBeNull();

        expect(await cache.fetch('a')).toBe('a');
        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should propagate store failures', async () => {
        jest.spyOn(store, 'incr').mockRejectedValueOnce(new Error('connection refused'));
        const fn = jest.fn(async (arg: string) => arg);
        const cache = new ExpiringCache(store, fn, { ttlSeconds: 10, codec: stringCodec });

        await expect(cache.fetch('a')).rejects.toThrow('connection refused');
        expect(fn).not.toHaveBeenCalled();
    });

    it('should recompute after invalidate but keep the access count', async () => {
        const fn = jest.fn(async (arg: string) => arg);
        const cache = new ExpiringCache(store, fn, { ttlSeconds: 10, codec: stringCodec });

        await cache.fetch('a');
        expect(await cache.invalidate('a')).toBe(true);
        await cache.fetch('a');

        expect(fn).toHaveBeenCalledTimes(2);
        expect(await cache.accessCount('a')).toBe(2);
    });

    it('should round-trip structured results through the json codec', async () => {
        const fn = jest.fn(async (id: string) => ({ id, tags: ['x', 'y'] }));
        const cache = new ExpiringCache(store, fn, { ttlSeconds: 10, codec: jsonCodec<{ id: string; tags: string[] }>() });

        await cache.fetch('42');
        expect(await cache.fetch('42')).toEqual({ id: '42', tags: ['x', 'y'] });
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should report a malformed cached entry as a decode error', async () => {
        const fn = jest.fn(async (id: string) => ({ id }));
        const cache = new ExpiringCache(store, fn, { ttlSeconds: 10, codec: jsonCodec<{ id: string }>() });
        await store.setex('cache:a', 10, '{oops');

        const err = await cache.fetch('a').catch((e: unknown) => e);

        expect(err).toBeInstanceOf(DecodeError);
        expect(err).toMatchObject({ key: 'cache:a', expected: 'json' });
        expect(err).toHaveProperty('message', 'value at "cache:a" is not a valid json: "{oops"');
        expect(fn).not.toHaveBeenCalled();
    });

    it('should reject a non-positive ttl', () => {
        expect(() => new ExpiringCache(store, async (s: string) => s, { ttlSeconds: 0, codec: stringCodec }))
            .toThrow(RangeError);
        expect(() => new ExpiringCache(store, async (s: string) => s, { ttlSeconds: 1.5, codec: stringCodec }))
            .toThrow(RangeError);
    });
});

import { createPageCache, httpGet } from '../src/cache/pageFetcher';
import { HttpError } from '../src/errors';
import { InMemoryStore } from '../src/store/inMemoryStore';

describe('page cache', () => {
    let store: InMemoryStore;

    beforeEach(() => {
        store = new InMemoryStore();
    });

    afterEach(() => {
        jest.restoreAllMocks();
        jest.useRealTimers();
    });

    it('should cache page bodies for ten seconds by default', async () => {
        jest.useFakeTimers();
        const fetcher = jest.fn(async (url: string) => `<p>${url}</p>`);
        const pages = createPageCache(store, { fetcher });

        await pages.fetch('http://slow.test/page');
        jest.advanceTimersByTime(9999);
        await pages.fetch('http://slow.test/page');
        expect(fetcher).toHaveBeenCalledTimes(1);

        jest.advanceTimersByTime(1);
        expect(await pages.fetch('http://slow.test/page')).toBe('<p>http://slow.test/page</p>');
        expect(fetcher).toHaveBeenCalledTimes(2);
        expect(await pages.accessCount('http://slow.test/page')).toBe(3);
    });

    it('should keep pages under cache:<url> and counts under count:<url>', async () => {
        const pages = createPageCache(store, { ttlSeconds: 30, fetcher: async () => 'body' });

        await pages.fetch('http://a.test/');

        expect((await store.get('cache:http://a.test/'))?.toString()).toBe('body');
        expect((await store.get('count:http://a.test/'))?.toString()).toBe('1');
    });

    describe('httpGet', () => {
        it('should return the response text', async () => {
            const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(new Response('<h1>ok</h1>', { status: 200 }));

            expect(await httpGet('http://ok.test/')).toBe('<h1>ok</h1>');
            expect(fetchSpy).toHaveBeenCalledWith('http://ok.test/');
        });

        it('should throw an HttpError for non-2xx responses', async () => {
            jest.spyOn(global, 'fetch').mockResolvedValue(new Response('gone', { status: 404 }));

            const err = await httpGet('http://missing.test/').catch((e: unknown) => e);
            expect(err).toBeInstanceOf(HttpError);
            expect(err).toMatchObject({ status: 404, url: 'http://missing.test/' });
        });
    });
});

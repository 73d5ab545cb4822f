import express, { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import { DataCache } from './dataCache';
import { ExpiringCache } from './cache/expiringCache';
import { DecodeError, HttpError } from './errors';
import { logger } from './logger';

export type AppContext = {
    cache: DataCache;
    pages: ExpiringCache<string>;
};

type View = 'str' | 'int' | 'float' | 'raw';
const VIEWS: readonly View[] = ['str', 'int', 'float', 'raw'];

function isView(value: unknown): value is View {
    return VIEWS.some(view => view === value);
}

function readView(cache: DataCache, key: string, view: View): Promise<string | number | null> {
    switch (view) {
        case 'str':
            return cache.getStr(key);
        case 'int':
            return cache.getInt(key);
        case 'float':
            return cache.getFloat(key);
        case 'raw':
            return cache.get(key, raw => raw.toString('base64'));
    }
}

export function createApp({ cache, pages }: AppContext) {
    const app = express();
    app.use(bodyParser.json());

    app.post('/data', async (req, res, next) => {
        const { data } = req.body ?? {};
        if (typeof data !== 'string' && typeof data !== 'number') {
            return res.status(400).json({ error: 'data must be a string or a number' });
        }
        try {
            const key = await cache.store(data);
            return res.status(201).json({ key });
        } catch (err) {
            return next(err);
        }
    });

    app.get('/data/:key', async (req, res, next) => {
        const view = req.query.as ?? 'str';
        if (!isView(view)) {
            return res.status(400).json({ error: `as must be one of ${VIEWS.join(', ')}` });
        }
        try {
            const value = await readView(cache, req.params.key, view);
            if (value === null) {
                return res.status(404).json({ error: 'key not found' });
            }
            return res.json({ key: req.params.key, value });
        } catch (err) {
            return next(err);
        }
    });

    app.get('/calls/:method', async (req, res, next) => {
        const method = req.params.method;
        try {
            const [count, history] = await Promise.all([cache.calls(method), cache.history(method)]);
            return res.json({ method, count, history });
        } catch (err) {
            return next(err);
        }
    });

    app.get('/page', async (req, res, next) => {
        const url = req.query.url;
        if (typeof url !== 'string' || url === '') {
            return res.status(400).json({ error: 'url query parameter is required' });
        }
        try {
            const body = await pages.fetch(url);
            const count = await pages.accessCount(url);
            res.setHeader('x-access-count', String(count));
            return res.type('html').send(body);
        } catch (err) {
            return next(err);
        }
    });

    app.get('/page/count', async (req, res, next) => {
        const url = req.query.url;
        if (typeof url !== 'string' || url === '') {
            return res.status(400).json({ error: 'url query parameter is required' });
        }
        try {
            return res.json({ url, count: await pages.accessCount(url) });
        } catch (err) {
            return next(err);
        }
    });

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof DecodeError) {
            return res.status(422).json({ error: err.message });
        }
        if (err instanceof HttpError) {
            logger.warn({ url: err.url, status: err.status }, 'upstream fetch failed');
            return res.status(502).json({ error: err.message });
        }
        logger.error({ err, path: req.path }, 'request failed');
        return res.status(500).json({ error: String(err) });
    });

    return app;
}

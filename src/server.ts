import { createApp } from './app';
import { createPageCache } from './cache/pageFetcher';
import { loadConfig } from './config';
import { DataCache } from './dataCache';
import { logger } from './logger';
import { createStore } from './store';

async function main() {
    const config = loadConfig();
    const store = await createStore(config.store);
    const cache = await DataCache.create(store);
    const pages = createPageCache(store, { ttlSeconds: config.pageCacheTtlSeconds });

    const app = createApp({ cache, pages });
    const server = app.listen(config.port, () => logger.info({ port: config.port }, 'kv-recall listening'));

    let shuttingDown = false;
    async function shutdown() {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info('shutting down server');

        server.close(() => {
            logger.info('HTTP server closed');
        });

        try {
            await store.close();
            process.exit(0);
        } catch (err) {
            logger.error({ err }, 'failed to close store');
            process.exit(1);
        }
    }

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
}

main().catch((err) => {
    logger.fatal({ err }, 'failed to start');
    process.exit(1);
});

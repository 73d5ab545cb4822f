import { commandOptions, createClient, RedisClientType } from 'redis';
import { DecodeError, WrongTypeError } from '../errors';
import { logger } from '../logger';
import { KeyValueStore, StoreValue, toBuffer } from './kvStore';

const asBuffers = commandOptions({ returnBuffers: true });

/**
 * node-redis backing. Replies are requested as buffers so binary values
 * round-trip unchanged. Connection failures propagate to the caller.
 */
export class RedisStore implements KeyValueStore {
    constructor(private readonly client: RedisClientType) {}

    static async connect(url: string): Promise<RedisStore> {
        const client: RedisClientType = createClient({
            url,
            socket: {
                reconnectStrategy: (retries) => Math.min(retries * 50, 2000),
            },
        });
        client.on('error', (err) => logger.error({ err }, 'redis error'));
        await client.connect();
        logger.info({ url }, 'redis store connected');
        return new RedisStore(client);
    }

    async get(key: string): Promise<Buffer | null> {
        return this.run(key, 'string', () => this.client.get(asBuffers, key));
    }

    async set(key: string, value: StoreValue): Promise<void> {
        await this.run(key, 'string', () => this.client.set(key, toBuffer(value)));
    }

    async setex(key: string, ttlSeconds: number, value: StoreValue): Promise<void> {
        await this.run(key, 'string', () => this.client.setEx(key, ttlSeconds, toBuffer(value)));
    }

    async incr(key: string): Promise<number> {
        return this.run(key, 'string', () => this.client.incr(key));
    }

    async rpush(key: string, value: StoreValue): Promise<number> {
        return this.run(key, 'list', () => this.client.rPush(key, toBuffer(value)));
    }

    async lrange(key: string, start: number, end: number): Promise<Buffer[]> {
        return this.run(key, 'list', () => this.client.lRange(asBuffers, key, start, end));
    }

    async del(key: string): Promise<boolean> {
        const removed = await this.run(key, 'string', () => this.client.del(key));
        return removed > 0;
    }

    async flush(): Promise<void> {
        await this.client.flushDb();
    }

    async close(): Promise<void> {
        await this.client.quit();
        logger.info('redis store closed');
    }

    // Maps the server's type errors onto ours; anything else is rethrown as is.
    private async run<T>(key: string, expected: 'string' | 'list', command: () => Promise<T>): Promise<T> {
        try {
            return await command();
        } catch (err) {
            if (err instanceof Error && err.message.startsWith('WRONGTYPE')) {
                throw new WrongTypeError(key, expected);
            }
            if (err instanceof Error && err.message.includes('not an integer')) {
                throw new DecodeError(key, 'integer', err.message);
            }
            throw err;
        }
    }
}

import { StoreConfig } from '../config';
import { logger } from '../logger';
import { FileBasedStore } from './fileBasedStore';
import { InMemoryStore } from './inMemoryStore';
import { KeyValueStore } from './kvStore';
import { RedisStore } from './redisStore';

export type { KeyValueStore, StoreValue } from './kvStore';
export { InMemoryStore } from './inMemoryStore';
export { FileBasedStore } from './fileBasedStore';
export { RedisStore } from './redisStore';

export async function createStore(config: StoreConfig): Promise<KeyValueStore> {
    logger.info({ backend: config.backend }, 'opening store');
    switch (config.backend) {
        case 'memory':
            return new InMemoryStore();
        case 'file':
            return new FileBasedStore(config.storeDir);
        case 'redis':
            return RedisStore.connect(config.redisUrl);
    }
}

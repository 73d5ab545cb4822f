import { v4 as uuidv4 } from 'uuid';
import { DecodeError } from './errors';
import { callCount, formatReplay, instrument, Operation, replay, ReplayEntry } from './instrument/callInstrumentor';
import { logger } from './logger';
import { KeyValueStore, parseInteger } from './store/kvStore';

export type StorableData = Buffer | string | number;

const FLOAT = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Stores values under random keys and reads them back with typed views.
 * `store` is counted and history-recorded under `DataCache.store`.
 */
export class DataCache {
    static readonly STORE = 'DataCache.store';

    readonly store: Operation<[StorableData], string>;

    constructor(private readonly kv: KeyValueStore) {
        this.store = instrument(kv, DataCache.STORE, (data: StorableData) => this.write(data));
    }

    /** Builds a cache over a freshly flushed store. */
    static async create(kv: KeyValueStore): Promise<DataCache> {
        await kv.flush();
        return new DataCache(kv);
    }

    get(key: string): Promise<Buffer | null>;
    get<T>(key: string, decode: (raw: Buffer) => T): Promise<T | null>;
    async get<T>(key: string, decode?: (raw: Buffer) => T): Promise<Buffer | T | null> {
        const raw = await this.kv.get(key);
        if (raw === null) return null;
        return decode ? decode(raw) : raw;
    }

    getStr(key: string): Promise<string | null> {
        return this.get(key, raw => raw.toString('utf8'));
    }

    getInt(key: string): Promise<number | null> {
        return this.get(key, raw => parseInteger(key, raw.toString('utf8')));
    }

    getFloat(key: string): Promise<number | null> {
        return this.get(key, raw => {
            const text = raw.toString('utf8').trim();
            if (!FLOAT.test(text)) throw new DecodeError(key, 'float', text);
            return Number(text);
        });
    }

    calls(method: string = DataCache.STORE): Promise<number> {
        return callCount(this.kv, method);
    }

    history(method: string = DataCache.STORE): Promise<ReplayEntry[]> {
        return replay(this.kv, method);
    }

    async replay(method: string = DataCache.STORE): Promise<string[]> {
        const [count, entries] = await Promise.all([this.calls(method), this.history(method)]);
        return formatReplay(method, entries, count);
    }

    private async write(data: StorableData): Promise<string> {
        const key = uuidv4();
        await this.kv.set(key, data);
        logger.debug({ key }, 'value stored');
        return key;
    }
}

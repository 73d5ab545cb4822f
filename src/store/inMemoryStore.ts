import { WrongTypeError } from '../errors';
import { KeyValueStore, StoreValue, parseCounter, sliceRange, toBuffer } from './kvStore';

type MemoryEntry =
    | { kind: 'string'; value: Buffer; expiresAt: number | null }
    | { kind: 'list'; items: Buffer[] };

export class InMemoryStore implements KeyValueStore {
    private map = new Map<string, MemoryEntry>();

    async get(key: string): Promise<Buffer | null> {
        const entry = this.live(key);
        if (!entry) return null;
        if (entry.kind !== 'string') throw new WrongTypeError(key, 'string');
        return Buffer.from(entry.value);
    }

    async set(key: string, value: StoreValue): Promise<void> {
        this.map.set(key, { kind: 'string', value: toBuffer(value), expiresAt: null });
    }

    async setex(key: string, ttlSeconds: number, value: StoreValue): Promise<void> {
        const expiresAt = Date.now() + ttlSeconds * 1000;
        this.map.set(key, { kind: 'string', value: toBuffer(value), expiresAt });
    }

    async incr(key: string): Promise<number> {
        const entry = this.live(key);
        if (entry && entry.kind !== 'string') throw new WrongTypeError(key, 'string');
        const next = parseCounter(key, entry ? entry.value : null) + 1;
        // incr keeps an existing expiry
        this.map.set(key, { kind: 'string', value: toBuffer(next), expiresAt: entry ? entry.expiresAt : null });
        return next;
    }

    async rpush(key: string, value: StoreValue): Promise<number> {
        const entry = this.live(key);
        if (!entry) {
            this.map.set(key, { kind: 'list', items: [toBuffer(value)] });
            return 1;
        }
        if (entry.kind !== 'list') throw new WrongTypeError(key, 'list');
        entry.items.push(toBuffer(value));
        return entry.items.length;
    }

    async lrange(key: string, start: number, end: number): Promise<Buffer[]> {
        const entry = this.live(key);
        if (!entry) return [];
        if (entry.kind !== 'list') throw new WrongTypeError(key, 'list');
        return sliceRange(entry.items, start, end).map(item => Buffer.from(item));
    }

    async del(key: string): Promise<boolean> {
        return this.live(key) !== undefined && this.map.delete(key);
    }

    async flush(): Promise<void> {
        this.map.clear();
    }

    async close(): Promise<void> {
        this.map.clear();
    }

    // Expiry is checked lazily on access; there is no sweep timer.
    private live(key: string): MemoryEntry | undefined {
        const entry = this.map.get(key);
        if (!entry) return undefined;
        if (entry.kind === 'string' && entry.expiresAt !== null && Date.now() >= entry.expiresAt) {
            this.map.delete(key);
            return undefined;
        }
        return entry;
    }
}

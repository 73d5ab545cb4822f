import { DecodeError } from '../errors';

export type StoreValue = Buffer | string | number;

/**
 * Minimal key-value contract the instrumentor and the expiring cache are
 * written against. Every backing must give per-key atomic `incr` and `rpush`.
 */
export interface KeyValueStore {
    get(key: string): Promise<Buffer | null>;
    set(key: string, value: StoreValue): Promise<void>;
    setex(key: string, ttlSeconds: number, value: StoreValue): Promise<void>;
    incr(key: string): Promise<number>;
    rpush(key: string, value: StoreValue): Promise<number>;
    lrange(key: string, start: number, end: number): Promise<Buffer[]>;
    del(key: string): Promise<boolean>;
    flush(): Promise<void>;
    close(): Promise<void>;
}

// Always a fresh copy: stored entries never share memory with callers.
export function toBuffer(value: StoreValue): Buffer {
    if (Buffer.isBuffer(value)) return Buffer.from(value);
    return Buffer.from(String(value), 'utf8');
}

// Inclusive range with negative indices counted from the end.
export function sliceRange<T>(items: T[], start: number, end: number): T[] {
    const len = items.length;
    const from = start < 0 ? Math.max(len + start, 0) : start;
    const to = end < 0 ? len + end : Math.min(end, len - 1);
    if (from > to || from >= len) return [];
    return items.slice(from, to + 1);
}

const INTEGER = /^-?\d+$/;

/** Decimal integer text, surrounding whitespace allowed, within the safe integer range. */
export function parseInteger(key: string, text: string): number {
    const trimmed = text.trim();
    const value = Number(trimmed);
    if (!INTEGER.test(trimmed) || !Number.isSafeInteger(value)) {
        throw new DecodeError(key, 'integer', trimmed);
    }
    return value;
}

export function parseCounter(key: string, raw: Buffer | null): number {
    if (raw === null) return 0;
    return parseInteger(key, raw.toString('utf8'));
}

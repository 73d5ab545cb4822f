import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { DecodeError, WrongTypeError } from '../errors';
import { KeyValueStore, StoreValue, parseCounter, sliceRange, toBuffer } from './kvStore';

type FileEntry =
    | { key: string; kind: 'string'; value: string; expiresAt: number | null }
    | { key: string; kind: 'list'; items: string[] };

// Leaves room for the ".json.tmp" suffix under the usual 255-byte limit.
const MAX_ENCODED_NAME = 200;

/**
 * Keeps every key in its own JSON file under `storeDir`. Bytes are stored
 * base64 encoded; writes go through a temp file and an atomic rename.
 */
export class FileBasedStore implements KeyValueStore {
    private storeDir: string;

    constructor(storeDir: string = 'var/store') {
        this.storeDir = storeDir;
        this.ensureStoreDir();
    }

    private ensureStoreDir() {
        if (!fs.existsSync(this.storeDir)) {
            fs.mkdirSync(this.storeDir, { recursive: true });
        }
    }

    private getFilePath(key: string): string {
        // base64url keeps distinct keys in distinct, filesystem-safe names;
        // keys too long for a file name fall back to a digest. base64url has
        // no '.', so the two forms never collide.
        const encoded = Buffer.from(key, 'utf8').toString('base64url');
        const name = encoded.length <= MAX_ENCODED_NAME
            ? encoded
            : `sha256.${crypto.createHash('sha256').update(key, 'utf8').digest('hex')}`;
        return path.join(this.storeDir, `${name}.json`);
    }

    async get(key: string): Promise<Buffer | null> {
        const entry = this.read(key);
        if (!entry) return null;
        if (entry.kind !== 'string') throw new WrongTypeError(key, 'string');
        return Buffer.from(entry.value, 'base64');
    }

    async set(key: string, value: StoreValue): Promise<void> {
        this.write({ key, kind: 'string', value: toBuffer(value).toString('base64'), expiresAt: null });
    }

    async setex(key: string, ttlSeconds: number, value: StoreValue): Promise<void> {
        const expiresAt = Date.now() + ttlSeconds * 1000;
        this.write({ key, kind: 'string', value: toBuffer(value).toString('base64'), expiresAt });
    }

    async incr(key: string): Promise<number> {
        const entry = this.read(key);
        if (entry && entry.kind !== 'string') throw new WrongTypeError(key, 'string');
        const next = parseCounter(key, entry ? Buffer.from(entry.value, 'base64') : null) + 1;
        this.write({
            key,
            kind: 'string',
            value: toBuffer(next).toString('base64'),
            expiresAt: entry ? entry.expiresAt : null,
        });
        return next;
    }

    async rpush(key: string, value: StoreValue): Promise<number> {
        const entry = this.read(key);
        if (entry && entry.kind !== 'list') throw new WrongTypeError(key, 'list');
        const items = entry ? entry.items : [];
        items.push(toBuffer(value).toString('base64'));
        this.write({ key, kind: 'list', items });
        return items.length;
    }

    async lrange(key: string, start: number, end: number): Promise<Buffer[]> {
        const entry = this.read(key);
        if (!entry) return [];
        if (entry.kind !== 'list') throw new WrongTypeError(key, 'list');
        return sliceRange(entry.items, start, end).map(item => Buffer.from(item, 'base64'));
    }

    async del(key: string): Promise<boolean> {
        if (!this.read(key)) return false;
        fs.unlinkSync(this.getFilePath(key));
        return true;
    }

    async flush(): Promise<void> {
        if (!fs.existsSync(this.storeDir)) {
            return;
        }

        const files = fs.readdirSync(this.storeDir);
        for (const file of files) {
            if (file.endsWith('.json') || file.endsWith('.tmp')) {
                fs.unlinkSync(path.join(this.storeDir, file));
            }
        }
    }

    async close(): Promise<void> {
        // nothing held open between calls
    }

    private write(entry: FileEntry): void {
        this.ensureStoreDir();
        const filePath = this.getFilePath(entry.key);
        const tmpPath = `${filePath}.tmp`;

        fs.writeFileSync(tmpPath, JSON.stringify(entry), 'utf8');
        fs.renameSync(tmpPath, filePath);
    }

    private read(key: string): FileEntry | null {
        const filePath = this.getFilePath(key);
        if (!fs.existsSync(filePath)) {
            return null;
        }

        const content = fs.readFileSync(filePath, 'utf8');
        const entry = parseEntry(content);
        if (!entry) {
            throw new DecodeError(key, 'store entry', content);
        }

        if (entry.kind === 'string' && entry.expiresAt !== null && Date.now() >= entry.expiresAt) {
            fs.unlinkSync(filePath);
            return null;
        }
        return entry;
    }
}

function parseEntry(content: string): FileEntry | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch {
        return null;
    }
    if (typeof parsed !== 'object' || parsed === null) return null;

    const record: Record<string, unknown> = { ...parsed };
    const { key, kind } = record;
    if (typeof key !== 'string') return null;

    if (kind === 'string') {
        const { value, expiresAt } = record;
        if (typeof value !== 'string') return null;
        if (expiresAt === null) return { key, kind, value, expiresAt: null };
        if (typeof expiresAt !== 'number') return null;
        return { key, kind, value, expiresAt };
    }
    if (kind === 'list') {
        const { items } = record;
        if (!Array.isArray(items) || !items.every((item): item is string => typeof item === 'string')) return null;
        return { key, kind, items };
    }
    return null;
}

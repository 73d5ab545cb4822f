export class KvRecallError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Raised when stored bytes cannot be read back as the requested type,
 * e.g. an integer view of non-numeric bytes.
 */
export class DecodeError extends KvRecallError {
    constructor(public readonly key: string, public readonly expected: string, raw: string, options?: { cause?: unknown }) {
        super(`value at "${key}" is not a valid ${expected}: ${JSON.stringify(raw)}`, options);
    }
}

export class WrongTypeError extends KvRecallError {
    constructor(public readonly key: string, public readonly expected: 'string' | 'list') {
        super(`operation against key "${key}" holding the wrong kind of value (expected ${expected})`);
    }
}

export class HttpError extends KvRecallError {
    constructor(public readonly url: string, public readonly status: number) {
        super(`GET ${url} failed with status ${status}`);
    }
}

export class ConfigError extends KvRecallError {}

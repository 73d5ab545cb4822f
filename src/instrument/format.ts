// Stable text forms for recorded call inputs and outputs.

export function formatValue(value: unknown): string {
    if (value === null || value === undefined) return 'null';
    if (typeof value === 'string') return JSON.stringify(value);
    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
        return String(value);
    }
    if (Buffer.isBuffer(value)) {
        const bytes = Array.from(value, byte => byte.toString(16).padStart(2, '0'));
        return bytes.length > 0 ? `<Buffer ${bytes.join(' ')}>` : '<Buffer>';
    }
    if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
    return JSON.stringify(value) ?? String(value);
}

/** Argument tuple, e.g. `("x",)` for a single string or `(1, 2)` for two numbers. */
export function formatArgs(args: readonly unknown[]): string {
    const parts = args.map(formatValue);
    return `(${parts.join(', ')}${parts.length === 1 ? ',' : ''})`;
}

/** Results are recorded bare when they are strings (keys, page bodies). */
export function formatResult(result: unknown): string {
    return typeof result === 'string' ? result : formatValue(result);
}

export function formatFailure(err: unknown): string {
    if (err instanceof Error) return `!${err.name}: ${err.message}`;
    return `!Error: ${String(err)}`;
}

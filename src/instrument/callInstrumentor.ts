import { logger } from '../logger';
import { KeyValueStore, parseCounter } from '../store/kvStore';
import { formatArgs, formatFailure, formatResult } from './format';

export type Operation<A extends unknown[], R> = (...args: A) => Promise<R>;

export type InstrumentOptions = {
    count?: boolean;
    history?: boolean;
};

export type ReplayEntry = {
    call: number;
    inputs: string;
    outputs: string;
};

export const callsKey = (name: string) => `${name}:calls`;
export const inputsKey = (name: string) => `${name}:inputs`;
export const outputsKey = (name: string) => `${name}:outputs`;

/**
 * Increments `<name>:calls` before every invocation. The count is taken
 * whether or not the operation then succeeds.
 */
export function countCalls<A extends unknown[], R>(
    store: KeyValueStore,
    name: string,
    op: Operation<A, R>,
): Operation<A, R> {
    const key = callsKey(name);
    return async (...args: A): Promise<R> => {
        await store.incr(key);
        return op(...args);
    };
}

type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

// Tail of the recording chain per store and method name.
const recordTails = new WeakMap<KeyValueStore, Map<string, Promise<void>>>();

function tailsFor(store: KeyValueStore): Map<string, Promise<void>> {
    let tails = recordTails.get(store);
    if (!tails) {
        tails = new Map();
        recordTails.set(store, tails);
    }
    return tails;
}

/**
 * Records the argument tuple on `<name>:inputs` and the result on
 * `<name>:outputs`. Calls run concurrently, but each input/output pair is
 * written in call order, one pair at a time per name, so index i of one
 * list always pairs with index i of the other. A failed call still gets an
 * output entry.
 */
export function callHistory<A extends unknown[], R>(
    store: KeyValueStore,
    name: string,
    op: Operation<A, R>,
): Operation<A, R> {
    const inKey = inputsKey(name);
    const outKey = outputsKey(name);
    return async (...args: A): Promise<R> => {
        const input = formatArgs(args);
        const outcome: Promise<Settled<R>> = Promise.resolve().then(() => op(...args)).then(
            (value): Settled<R> => ({ ok: true, value }),
            (error: unknown): Settled<R> => ({ ok: false, error }),
        );

        const tails = tailsFor(store);
        const previous = tails.get(name) ?? Promise.resolve();
        const recorded = previous.then(async () => {
            const settled = await outcome;
            await store.rpush(inKey, input);
            await store.rpush(outKey, settled.ok ? formatResult(settled.value) : formatFailure(settled.error));
            return settled;
        });

        const release = (): void => {
            if (tails.get(name) === tail) tails.delete(name);
        };
        const tail: Promise<void> = recorded.then(release, release);
        tails.set(name, tail);

        const settled = await recorded;
        if (!settled.ok) throw settled.error;
        return settled.value;
    };
}

export function instrument<A extends unknown[], R>(
    store: KeyValueStore,
    name: string,
    op: Operation<A, R>,
    { count = true, history = true }: InstrumentOptions = {},
): Operation<A, R> {
    let wrapped = op;
    if (history) wrapped = callHistory(store, name, wrapped);
    if (count) wrapped = countCalls(store, name, wrapped);
    return wrapped;
}

export async function callCount(store: KeyValueStore, name: string): Promise<number> {
    const key = callsKey(name);
    return parseCounter(key, await store.get(key));
}

export async function replay(store: KeyValueStore, name: string): Promise<ReplayEntry[]> {
    const [inputs, outputs] = await Promise.all([
        store.lrange(inputsKey(name), 0, -1),
        store.lrange(outputsKey(name), 0, -1),
    ]);

    if (inputs.length !== outputs.length) {
        // an in-flight call has pushed its input but not yet its output
        logger.debug({ name, inputs: inputs.length, outputs: outputs.length }, 'history lists differ in length');
    }

    const entries: ReplayEntry[] = [];
    const n = Math.min(inputs.length, outputs.length);
    for (let i = 0; i < n; i++) {
        entries.push({
            call: i + 1,
            inputs: inputs[i].toString('utf8'),
            outputs: outputs[i].toString('utf8'),
        });
    }
    return entries;
}

export function formatReplay(name: string, entries: ReplayEntry[], count: number): string[] {
    const lines = [`${name} was called ${count} ${count === 1 ? 'time' : 'times'}:`];
    for (const entry of entries) {
        lines.push(`Call ${entry.call}:`);
        lines.push(`    Inputs: ${entry.inputs}`);
        lines.push(`    Outputs: ${entry.outputs}`);
    }
    return lines;
}

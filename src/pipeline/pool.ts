import { JobCancelledError } from './errors';

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Results
 * keep the input order whatever the completion order. An aborted signal
 * stops new items from starting and rejects once in-flight ones settle.
 */
export async function runPool<T, R>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<R>,
    signal?: AbortSignal
): Promise<R[]> {
    const limit = Math.max(1, Math.floor(concurrency) || 1);
    const results: R[] = new Array(items.length);
    const active: Promise<void>[] = [];
    let idx = 0;

    async function runOne(i: number) {
        results[i] = await worker(items[i], i);
    }

    try {
        while (idx < items.length) {
            while (active.length < limit && idx < items.length) {
                if (signal?.aborted) throw new JobCancelledError();
                const p: Promise<void> = runOne(idx).finally(() => {
                    const pos = active.indexOf(p);
                    if (pos >= 0) active.splice(pos, 1);
                });
                active.push(p);
                idx++;
            }
            if (active.length) await Promise.race(active);
        }
    } finally {
        // In-flight work settles before the pool returns or rejects
        await Promise.allSettled(active);
    }
    if (signal?.aborted) throw new JobCancelledError();
    return results;
}

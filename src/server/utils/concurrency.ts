import { CancellationError } from '../types/errors.js';

export interface ConcurrencyLimiter {
    run<T>(fn: () => Promise<T>): Promise<T>;
    readonly activeCount: number;
    readonly pendingCount: number;
}

/**
 * pLimit
 *
 * Limits the concurrency of async operations.
 * Similar to p-limit but lightweight and built-in.
 *
 * @param concurrency - Max number of concurrent operations
 */
export function pLimit(concurrency: number): ConcurrencyLimiter {
    if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
        throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }

    const queue: (() => void)[] = [];
    let activeCount = 0;

    const next = () => {
        activeCount--;
        const nextFn = queue.shift();
        if (nextFn) {
            nextFn();
        }
    };

    const run = async <T>(fn: () => Promise<T>): Promise<T> => {
        const execute = async () => {
            activeCount++;
            try {
                return await fn();
            } finally {
                next();
            }
        };

        if (activeCount < concurrency) {
            return execute();
        }

        return new Promise<T>((resolve, reject) => {
            queue.push(() => {
                execute().then(resolve, reject);
            });
        });
    };

    return {
        run,
        get activeCount() {
            return activeCount;
        },
        get pendingCount() {
            return queue.length;
        },
    };
}

export interface FanOutOptions {
    signal?: AbortSignal; // Cancels the whole fan-out
    concurrency?: number; // Default: unbounded
}

/**
 * Run `fn` over every item concurrently and collect the results in input order.
 *
 * All-or-nothing: the first task to fail aborts the signal shared by its
 * siblings, and the fan-out rejects with that first error. Results of
 * siblings that settle afterwards are discarded.
 */
export async function fanOut<T, R>(
    items: readonly T[],
    fn: (item: T, index: number, signal: AbortSignal) => Promise<R>,
    options: FanOutOptions = {}
): Promise<R[]> {
    const { signal: parentSignal } = options;
    if (parentSignal?.aborted) {
        throw new CancellationError('Fan-out cancelled before start');
    }

    const controller = new AbortController();
    const onParentAbort = () => controller.abort(new CancellationError('Fan-out cancelled'));
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });

    const limit = pLimit(options.concurrency ?? Infinity);
    let failed = false;
    let firstError: unknown;

    try {
        return await Promise.all(
            items.map((item, index) =>
                limit.run(async () => {
                    if (controller.signal.aborted) {
                        throw new CancellationError('Fan-out aborted', { index });
                    }
                    try {
                        return await fn(item, index, controller.signal);
                    } catch (error) {
                        if (!failed) {
                            failed = true;
                            firstError = error;
                            controller.abort(error);
                        }
                        throw error;
                    }
                })
            )
        );
    } catch (error) {
        throw failed ? firstError : error;
    } finally {
        parentSignal?.removeEventListener('abort', onParentAbort);
    }
}

/**
 * Partition items into consecutive groups of at most `size`
 */
export function toBatches<T>(items: readonly T[], size: number): T[][] {
    if (!Number.isInteger(size) || size < 1) {
        throw new TypeError('Expected `size` to be a number from 1 and up');
    }

    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        batches.push(items.slice(i, i + size));
    }
    return batches;
}

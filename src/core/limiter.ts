/**
 * Promise-based counting semaphore.
 * Usage:
 *   const limit = createLimiter(10);
 *   await Promise.all(items.map((item) => limit(() => doWork(item))));
 *
 * With a concurrency of 1 it is a mutex: tasks run one at a time in call order.
 */
export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

export interface LimiterHandle {
    run: Limiter;
    activeCount: () => number;
    pendingCount: () => number;
}

export function createLimiterHandle(concurrency: number): LimiterHandle {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new Error('concurrency must be an integer >= 1');
    }

    let active = 0;
    const queue: Array<() => void> = [];

    const next = (): void => {
        if (active >= concurrency) return;
        const fn = queue.shift();
        if (!fn) return;
        active += 1;
        fn();
    };

    const run: Limiter = <T>(task: () => Promise<T>): Promise<T> => {
        return new Promise<T>((resolve, reject) => {
            queue.push(() => {
                task()
                    .then(resolve, reject)
                    .finally(() => {
                        active -= 1;
                        next();
                    });
            });
            next();
        });
    };

    return {
        run,
        activeCount: () => active,
        pendingCount: () => queue.length,
    };
}

export function createLimiter(concurrency: number): Limiter {
    return createLimiterHandle(concurrency).run;
}

export function createMutex(): Limiter {
    return createLimiter(1);
}

/**
 * In-process locking for cache entries.
 * Serializes work on one cache key within this process; the lock files in
 * the cache directory are the only cross-process guard.
 */

export interface LockProvider {
    /**
     * Acquire a named lock and execute the provided function.
     * The lock is released when the function promise resolves or rejects.
     */
    withLock<T>(name: string, fn: () => Promise<T>): Promise<T>;
}

/**
 * Promise-chain implementation: callers for one name run in arrival order.
 */
export class InProcessLockProvider implements LockProvider {
    private tails = new Map<string, Promise<void>>();

    async withLock<T>(name: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(name) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(name, tail);

        await previous;
        try {
            return await fn();
        } finally {
            release();
            if (this.tails.get(name) === tail) {
                this.tails.delete(name);
            }
        }
    }

    /** Names with a holder or waiters. */
    get activeNames(): string[] {
        return [...this.tails.keys()];
    }
}

/**
 * Strict test lock provider with overlap detection (tripwire).
 * Wraps another provider and throws if a second caller enters while the
 * first is still in its critical section. Use this to PROVE mutual
 * exclusion in tests.
 */
export class StrictTestLockProvider implements LockProvider {
    private inCritical = new Set<string>();
    public overlapCount = 0;

    constructor(private readonly inner: LockProvider = new InProcessLockProvider()) {}

    async withLock<T>(name: string, fn: () => Promise<T>): Promise<T> {
        return this.inner.withLock(name, async () => {
            if (this.inCritical.has(name)) {
                this.overlapCount++;
                throw new Error(`TRIPWIRE: Lock overlap detected for "${name}"`);
            }
            this.inCritical.add(name);
            try {
                return await fn();
            } finally {
                this.inCritical.delete(name);
            }
        });
    }
}

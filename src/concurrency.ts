export type Release = () => void;

/**
 * Counting gate. Waiters are admitted in FIFO order.
 */
export class Semaphore {
    private available: number;

    private readonly waiters: Array<() => void> = [];

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error('semaphore capacity must be a positive integer');
        }

        this.available = capacity;
    }

    get inUse(): number {
        return this.capacity - this.available;
    }

    get waiting(): number {
        return this.waiters.length;
    }

    async acquire(): Promise<Release> {
        if (this.available > 0) {
            this.available -= 1;

            return this.createRelease();
        }

        await new Promise<void>((resolve) => {
            this.waiters.push(resolve);
        });

        return this.createRelease();
    }

    async run<T>(task: () => Promise<T>): Promise<T> {
        const release = await this.acquire();

        try {
            return await task();
        } finally {
            release();
        }
    }

    private createRelease(): Release {
        let released = false;

        return () => {
            if (released) {
                return;
            }

            released = true;
            const next = this.waiters.shift();

            if (next) {
                // slot passes straight to the next waiter
                next();
                return;
            }

            this.available += 1;
        };
    }
}

/**
 * Serializes async critical sections per key. Distinct keys never contend.
 */
export class KeyedMutex {
    private readonly tails = new Map<string, Promise<void>>();

    get activeKeys(): number {
        return this.tails.size;
    }

    async runExclusive<T>(
        key: string,
        task: () => Promise<T>,
    ): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let unlock: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            unlock = resolve;
        });
        const tail = previous.then(() => current);

        this.tails.set(key, tail);
        await previous;

        try {
            return await task();
        } finally {
            unlock();

            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }
}

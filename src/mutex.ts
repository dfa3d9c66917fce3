// Async exclusion primitives for the event loop.

export type Release = () => void;

/**
 * FIFO async mutex. The waiting position is reserved synchronously when
 * acquire() is called, so acquisition order equals call order.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();
    private waiters = 0;

    acquire(): Promise<Release> {
        const previous = this.tail;
        let unlock: Release = () => undefined;
        const current = new Promise<void>((resolve) => {
            unlock = resolve;
        });
        this.tail = previous.then(() => current);
        this.waiters++;

        let released = false;
        const release: Release = () => {
            if (released) return;
            released = true;
            this.waiters--;
            unlock();
        };
        return previous.then(() => release);
    }

    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        const release = await this.acquire();
        try {
            return await fn();
        } finally {
            release();
        }
    }

    /** Holders plus queued acquirers. */
    get pending(): number {
        return this.waiters;
    }
}

/**
 * Counting semaphore with FIFO hand-off: a released slot goes straight to the
 * oldest waiter.
 */
export class Semaphore {
    private active = 0;
    private readonly queue: Array<() => void> = [];

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
        }
    }

    acquire(): Promise<void> {
        if (this.active < this.capacity) {
            this.active++;
            return Promise.resolve();
        }
        return new Promise<void>((resolve) => this.queue.push(resolve));
    }

    release(): void {
        const next = this.queue.shift();
        if (next) {
            next();
        } else {
            this.active--;
        }
    }

    async run<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    get inUse(): number {
        return this.active;
    }

    get limit(): number {
        return this.capacity;
    }
}

/**
 * ChannelWorkerPool — bounded concurrency for per-channel work.
 *
 * A task holds its channel's lock for its whole run, so a channel never runs
 * in parallel with itself and tasks on one channel run in submission order.
 * Tasks on different channels run in parallel, at most `concurrency` at once.
 */

import { ChannelRegistry } from './channel_registry';
import { createLogger } from './logger';
import { Semaphore } from './mutex';

const log = createLogger('pool');

export class ChannelWorkerPool {
    private readonly slots: Semaphore;
    private running = 0;
    private peak = 0;
    private completed = 0;

    constructor(private readonly registry: ChannelRegistry, concurrency: number) {
        this.slots = new Semaphore(concurrency);
        log.debug('Pool created', { concurrency });
    }

    /**
     * Queue `task` on `channel`. The channel position is taken synchronously,
     * so two submits in a row on the same channel always run in that order.
     */
    submit<T>(channel: number, task: () => Promise<T>): Promise<T> {
        return this.registry.withChannel(channel, () => this.slots.run(async () => {
            this.running++;
            this.peak = Math.max(this.peak, this.running);
            try {
                return await task();
            } finally {
                this.running--;
                this.completed++;
            }
        }));
    }

    get concurrency(): number {
        return this.slots.limit;
    }

    /** Highest number of tasks observed running at once. */
    get peakConcurrency(): number {
        return this.peak;
    }

    get completedTasks(): number {
        return this.completed;
    }
}

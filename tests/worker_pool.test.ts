import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { Mutex, Semaphore } from '../src/mutex';
import { ChannelWorkerPool } from '../src/worker_pool';
import { makeRig, sleep } from './helpers/rig';

describe('Mutex', () => {
    test('grants the lock in call order', async () => {
        const mutex = new Mutex();
        const order: number[] = [];
        await Promise.all([30, 10, 0].map((ms, i) => mutex.runExclusive(async () => {
            await sleep(ms);
            order.push(i);
        })));
        assert.deepEqual(order, [0, 1, 2]);
        assert.equal(mutex.pending, 0);
    });

    test('release is idempotent', async () => {
        const mutex = new Mutex();
        const release = await mutex.acquire();
        release();
        release();
        assert.equal(mutex.pending, 0);
        const again = await mutex.acquire();
        assert.equal(mutex.pending, 1);
        again();
    });

    test('a throwing holder still releases the lock', async () => {
        const mutex = new Mutex();
        await assert.rejects(mutex.runExclusive(() => {
            throw new Error('boom');
        }), /boom/);
        assert.equal(await mutex.runExclusive(() => 'next'), 'next');
    });
});

describe('Semaphore', () => {
    test('rejects an invalid capacity', () => {
        assert.throws(() => new Semaphore(0), RangeError);
        assert.throws(() => new Semaphore(1.5), RangeError);
    });

    test('never exceeds its capacity', async () => {
        const slots = new Semaphore(2);
        let running = 0;
        let peak = 0;
        await Promise.all(Array.from({ length: 6 }, () => slots.run(async () => {
            running++;
            peak = Math.max(peak, running);
            await sleep(5);
            running--;
        })));
        assert.equal(peak, 2);
        assert.equal(slots.inUse, 0);
        assert.equal(slots.limit, 2);
    });
});

describe('ChannelWorkerPool', () => {
    test('tasks on one channel run in submission order', async () => {
        const { pool } = makeRig({ channelCount: 2 });
        const order: number[] = [];
        await Promise.all([20, 10, 0].map((ms, i) => pool.submit(0, async () => {
            await sleep(ms);
            order.push(i);
        })));
        assert.deepEqual(order, [0, 1, 2]);
        assert.equal(pool.completedTasks, 3);
    });

    test('tasks on distinct channels overlap up to the concurrency bound', async () => {
        const { registry } = makeRig({ channelCount: 6 });
        const wide = new ChannelWorkerPool(registry, 4);
        await Promise.all([0, 1, 2].map(ch => wide.submit(ch, () => sleep(15))));
        assert.equal(wide.peakConcurrency, 3);

        const narrow = new ChannelWorkerPool(registry, 2);
        await Promise.all([0, 1, 2, 3, 4, 5].map(ch => narrow.submit(ch, () => sleep(5))));
        assert.equal(narrow.peakConcurrency, 2);
        assert.equal(narrow.concurrency, 2);
    });

    test('a failing task rejects without blocking the channel', async () => {
        const { pool } = makeRig({ channelCount: 1 });
        await assert.rejects(pool.submit(0, async () => {
            throw new Error('task failed');
        }), /task failed/);
        assert.equal(await pool.submit(0, async () => 7), 7);
    });
});

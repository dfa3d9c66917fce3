import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { OperationQueue } from '../src/operation_queue';
import { singleChannelOp, twoChannelOp, validateOperation } from '../src/operations';
import { InvalidChannelError, InvalidRequestError } from '../src/errors';
import type { OperationSpec } from '../src/types';

describe('OperationQueue', () => {
    test('assigns increasing seq and unique ids in enqueue order', () => {
        const queue = new OperationQueue();
        const a = queue.enqueue(singleChannelOp('X', 0));
        const b = queue.enqueue(twoChannelOp('CZ', 0, 1));
        const c = queue.enqueue(singleChannelOp('H', [2, 3]));

        assert.deepEqual([a.seq, b.seq, c.seq], [0, 1, 2]);
        assert.equal(new Set([a.id, b.id, c.id]).size, 3);
        assert.equal(queue.length, 3);
        assert.deepEqual(queue.toArray().map(op => op.gate), ['X', 'CZ', 'H']);
        assert.deepEqual([...queue].map(op => op.seq), [0, 1, 2]);
        assert.equal(queue.at(1), b);
        assert.equal(queue.at(3), undefined);
    });

    test('defaults delayMs to 0 and keeps an explicit delay', () => {
        const queue = new OperationQueue();
        assert.equal(queue.enqueue(singleChannelOp('X', 0)).delayMs, 0);
        assert.equal(queue.enqueue(singleChannelOp('X', 0, 15)).delayMs, 15);
    });

    test('enqueued operations are frozen copies of the request', () => {
        const queue = new OperationQueue();
        const channels = [4, 5];
        const op = queue.enqueue({ kind: 'single', gate: 'Y', channels });
        channels.push(6);

        assert.deepEqual(op.channels, [4, 5]);
        assert.ok(Object.isFrozen(op));
        assert.ok(Object.isFrozen(op.channels));
    });

    test('toArray returns a snapshot', () => {
        const queue = new OperationQueue();
        queue.enqueue(singleChannelOp('X', 0));
        const snapshot = queue.toArray();
        queue.enqueue(singleChannelOp('X', 1));
        assert.equal(snapshot.length, 1);
        assert.equal(queue.length, 2);
    });

    test('forChannel lists every operation touching a channel', () => {
        const queue = new OperationQueue();
        queue.enqueue(singleChannelOp('X', [0, 2]));
        queue.enqueue(twoChannelOp('CZ', 1, 2));
        queue.enqueue(singleChannelOp('H', 1));
        assert.deepEqual(queue.forChannel(2).map(op => op.gate), ['X', 'CZ']);
        assert.deepEqual(queue.forChannel(1).map(op => op.gate), ['CZ', 'H']);
        assert.deepEqual(queue.forChannel(7), []);
    });
});

describe('validateOperation', () => {
    test('accepts well-formed operations', () => {
        assert.doesNotThrow(() => validateOperation(singleChannelOp('X', [0, 0, 9]), 10));
        assert.doesNotThrow(() => validateOperation(twoChannelOp('CZ', 0, 9, 100), 10, 100));
    });

    test('rejects out-of-range channels', () => {
        assert.throws(() => validateOperation(singleChannelOp('X', [0, 10]), 10), InvalidChannelError);
        assert.throws(() => validateOperation(twoChannelOp('CZ', -1, 2), 10), InvalidChannelError);
        assert.throws(() => validateOperation(singleChannelOp('X', 2.5), 10), InvalidChannelError);
    });

    test('rejects malformed requests', () => {
        const cases: OperationSpec[] = [
            singleChannelOp('X', []),
            singleChannelOp('', 0),
            singleChannelOp('  ', 0),
            twoChannelOp('CZ', 3, 3),
            singleChannelOp('X', 0, -1),
            singleChannelOp('X', 0, 101),
        ];
        for (const spec of cases) {
            assert.throws(() => validateOperation(spec, 10, 100), InvalidRequestError);
        }
    });
});

import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { OutcomeTally, decodeMajority, emptyCounts, isBit, outcomeCounts } from '../src/majority_vote';
import { InvalidRequestError } from '../src/errors';

describe('majority vote decoding', () => {
    test('2-of-3 ones decodes to 1', () => {
        assert.equal(decodeMajority([1, 0, 1]), 1);
    });

    test('2-of-3 zeros decodes to 0', () => {
        assert.equal(decodeMajority([0, 0, 1]), 0);
        assert.equal(decodeMajority([1, 0, 0]), 0);
    });

    test('single vote decodes to itself', () => {
        assert.equal(decodeMajority([1]), 1);
        assert.equal(decodeMajority([0]), 0);
    });

    test('tie uses the default tie-break 0 on every run', () => {
        for (let i = 0; i < 20; i++) {
            assert.equal(decodeMajority([0, 1]), 0);
            assert.equal(decodeMajority([1, 0]), 0);
            assert.equal(decodeMajority([1, 1, 0, 0]), 0);
        }
    });

    test('tie uses an explicit tie-break', () => {
        assert.equal(decodeMajority([0, 1], 1), 1);
        assert.equal(decodeMajority([1, 0, 0, 1], 1), 1);
    });

    test('tie-break does not affect a clear majority', () => {
        assert.equal(decodeMajority([0, 0, 1], 1), 0);
        assert.equal(decodeMajority([1, 1, 0], 0), 1);
    });

    test('empty vote list is rejected', () => {
        assert.throws(() => decodeMajority([]), (e: unknown) => e instanceof InvalidRequestError && e.code === 'INVALID_REQUEST');
    });
});

describe('outcome counts', () => {
    test('emptyCounts has both bits at zero', () => {
        assert.deepEqual(emptyCounts(), { 0: 0, 1: 0 });
    });

    test('outcomeCounts validates its fields', () => {
        assert.deepEqual(outcomeCounts(2, 3), { 0: 2, 1: 3 });
        assert.throws(() => outcomeCounts(-1, 0), InvalidRequestError);
        assert.throws(() => outcomeCounts(0, 1.5), InvalidRequestError);
    });

    test('tally accumulates and freezes', () => {
        const tally = new OutcomeTally();
        tally.add(1);
        tally.add(0);
        tally.add(1);
        assert.equal(tally.total, 3);
        const counts = tally.freeze();
        assert.deepEqual(counts, { 0: 1, 1: 2 });
        assert.ok(Object.isFrozen(counts));
    });

    test('isBit accepts only 0 and 1', () => {
        assert.equal(isBit(0), true);
        assert.equal(isBit(1), true);
        assert.equal(isBit(2), false);
        assert.equal(isBit('1'), false);
        assert.equal(isBit(null), false);
    });
});

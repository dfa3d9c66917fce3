// Majority-vote decoding for repetition-coded readout.

import { InvalidRequestError } from './errors';
import type { Bit, OutcomeCounts } from './types';

export function isBit(value: unknown): value is Bit {
    return value === 0 || value === 1;
}

/**
 * Strictly more ones decodes to 1, strictly more zeros to 0. An exact tie
 * (only possible for an even vote count) decodes to `tieBreak`.
 */
export function decodeMajority(votes: readonly Bit[], tieBreak: Bit = 0): Bit {
    if (votes.length === 0) {
        throw new InvalidRequestError('Majority vote needs at least one vote');
    }
    let ones = 0;
    for (const v of votes) ones += v;
    const zeros = votes.length - ones;
    if (ones > zeros) return 1;
    if (zeros > ones) return 0;
    return tieBreak;
}

export function emptyCounts(): OutcomeCounts {
    return { 0: 0, 1: 0 };
}

/** Builds a validated counts record: both fields non-negative integers. */
export function outcomeCounts(zeros: number, ones: number): OutcomeCounts {
    if (!Number.isInteger(zeros) || zeros < 0 || !Number.isInteger(ones) || ones < 0) {
        throw new InvalidRequestError(`Outcome counts must be non-negative integers, got 0=${zeros} 1=${ones}`);
    }
    return { 0: zeros, 1: ones };
}

/** Mutable tally used while shots accumulate. */
export class OutcomeTally {
    private zeros = 0;
    private ones = 0;

    add(bit: Bit): void {
        if (bit === 1) this.ones++;
        else this.zeros++;
    }

    get total(): number {
        return this.zeros + this.ones;
    }

    freeze(): OutcomeCounts {
        return Object.freeze(outcomeCounts(this.zeros, this.ones));
    }
}

// Operation builders and pre-enqueue validation.

import { DISPATCH } from './config';
import { InvalidChannelError, InvalidRequestError } from './errors';
import type { OperationSpec, SingleChannelOperationSpec, TwoChannelOperationSpec } from './types';

export function singleChannelOp(gate: string, channels: number | readonly number[], delayMs?: number): SingleChannelOperationSpec {
    return { kind: 'single', gate, channels: typeof channels === 'number' ? [channels] : [...channels], delayMs };
}

export function twoChannelOp(gate: string, channelA: number, channelB: number, delayMs?: number): TwoChannelOperationSpec {
    return { kind: 'two', gate, channels: [channelA, channelB], delayMs };
}

export function assertChannelInRange(channel: number, channelCount: number): void {
    if (!Number.isInteger(channel) || channel < 0 || channel >= channelCount) {
        throw new InvalidChannelError(channel, channelCount);
    }
}

/**
 * Rejects malformed operations before anything is enqueued or sent.
 * Calibration is deliberately not checked here: uncalibrated targets are
 * accepted and skipped at dispatch time.
 */
export function validateOperation(spec: OperationSpec, channelCount: number, maxDelayMs: number = DISPATCH.MAX_DELAY_MS): void {
    const kind: string = spec.kind;
    if (kind !== 'single' && kind !== 'two') {
        throw new InvalidRequestError(`Unknown operation kind: ${kind}`);
    }
    if (typeof spec.gate !== 'string' || spec.gate.trim() === '') {
        throw new InvalidRequestError('Gate label must be a non-empty string', { kind: spec.kind });
    }
    if (!Array.isArray(spec.channels) || spec.channels.length === 0) {
        throw new InvalidRequestError('Operation must target at least one channel', { gate: spec.gate });
    }
    if (spec.kind === 'two') {
        if (spec.channels.length !== 2) {
            throw new InvalidRequestError(`Two-channel operation needs exactly 2 channels, got ${spec.channels.length}`, { gate: spec.gate });
        }
    }
    for (const ch of spec.channels) assertChannelInRange(ch, channelCount);
    if (spec.kind === 'two' && spec.channels[0] === spec.channels[1]) {
        throw new InvalidRequestError(`Two-channel operation targets channel ${spec.channels[0]} twice`, { gate: spec.gate });
    }
    if (spec.delayMs !== undefined) {
        if (!Number.isFinite(spec.delayMs) || spec.delayMs < 0 || spec.delayMs > maxDelayMs) {
            throw new InvalidRequestError(`delayMs must be within [0, ${maxDelayMs}], got ${spec.delayMs}`, { gate: spec.gate });
        }
    }
}

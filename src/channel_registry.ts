/**
 * ChannelRegistry — calibration state for each of N channels.
 *
 * INVARIANT: every read-then-act on a calibration flag happens while holding
 * that channel's lock. `calibrate` takes the lock too, so a flag observed by
 * a dispatch cannot change until the dispatch releases the channel.
 */

import { AuditLog } from './audit';
import { BackendCommandError, InvalidChannelError } from './errors';
import { createLogger } from './logger';
import { Mutex } from './mutex';
import type { Channel, ChannelBackend } from './types';

const log = createLogger('registry');

export interface ChannelRegistryOptions {
    channelCount: number;
    backend: ChannelBackend;
    audit: AuditLog;
}

interface ChannelState {
    calibrated: boolean;
    lastActionAt: string | null;
}

export class ChannelRegistry {
    private readonly states: ChannelState[];
    private readonly locks: Mutex[];
    private readonly backend: ChannelBackend;
    private readonly audit: AuditLog;

    constructor(opts: ChannelRegistryOptions) {
        if (!Number.isInteger(opts.channelCount) || opts.channelCount < 1) {
            throw new RangeError(`channelCount must be a positive integer, got ${opts.channelCount}`);
        }
        this.backend = opts.backend;
        this.audit = opts.audit;
        this.states = Array.from({ length: opts.channelCount }, () => ({ calibrated: false, lastActionAt: null }));
        this.locks = Array.from({ length: opts.channelCount }, () => new Mutex());
    }

    get size(): number {
        return this.states.length;
    }

    /** Throws InvalidChannelError unless `channel` is an integer in [0, size). */
    assertChannel(channel: number): void {
        if (!Number.isInteger(channel) || channel < 0 || channel >= this.states.length) {
            throw new InvalidChannelError(channel, this.states.length);
        }
    }

    isCalibrated(channel: number): boolean {
        this.assertChannel(channel);
        return this.states[channel].calibrated;
    }

    channel(channel: number): Channel {
        this.assertChannel(channel);
        const s = this.states[channel];
        return { index: channel, calibrated: s.calibrated, lastActionAt: s.lastActionAt };
    }

    channels(): Channel[] {
        return this.states.map((s, index) => ({ index, calibrated: s.calibrated, lastActionAt: s.lastActionAt }));
    }

    calibratedChannels(): number[] {
        const out: number[] = [];
        this.states.forEach((s, i) => {
            if (s.calibrated) out.push(i);
        });
        return out;
    }

    /**
     * Re-issues the backend calibration on every call and resets the flag to
     * true. On backend failure the flag keeps its previous value and a
     * `failed` audit entry is written.
     */
    async calibrate(channel: number): Promise<Channel> {
        this.assertChannel(channel);
        return this.withChannel(channel, async () => {
            try {
                await this.backend.calibrate(channel);
            } catch (e) {
                const err = new BackendCommandError('calibrate', [channel], e);
                this.audit.record({ action: 'calibrate', outcome: 'failed', channels: [channel], error: err.message });
                log.error('Calibration failed', { channel, error: err.message });
                throw err;
            }
            const entry = this.audit.record({ action: 'calibrate', outcome: 'ok', channels: [channel] });
            const state = this.states[channel];
            state.calibrated = true;
            state.lastActionAt = entry.timestamp;
            log.debug('Channel calibrated', { channel });
            return { index: channel, calibrated: true, lastActionAt: entry.timestamp };
        });
    }

    /** Calibrates 0..size-1 in order; stops at and rethrows the first failure. */
    async calibrateAll(): Promise<Channel[]> {
        const out: Channel[] = [];
        for (let ch = 0; ch < this.states.length; ch++) {
            out.push(await this.calibrate(ch));
        }
        log.info('All channels calibrated', { count: out.length });
        return out;
    }

    /** Run `fn` while holding the channel's lock. */
    async withChannel<T>(channel: number, fn: () => Promise<T> | T): Promise<T> {
        this.assertChannel(channel);
        return this.locks[channel].runExclusive(fn);
    }

    /**
     * Run `fn` while holding every listed channel's lock. All positions are
     * reserved in the same tick, so concurrent multi-channel holders queue in
     * call order on every lock they share and cannot deadlock.
     */
    async withChannels<T>(channels: readonly number[], fn: () => Promise<T> | T): Promise<T> {
        const unique = [...new Set(channels)].sort((a, b) => a - b);
        unique.forEach(ch => this.assertChannel(ch));
        const releases = await Promise.all(unique.map(ch => this.locks[ch].acquire()));
        try {
            return await fn();
        } finally {
            for (const release of releases) release();
        }
    }
}

/**
 * SimulatedBackend — stand-in instrument driver for running without hardware.
 *
 * Calls take configurable latency; readout is an independent coin flip per
 * read (probability `pOne` of reading 1) from a seeded PRNG, so runs with the
 * same seed and call order reproduce exactly. No quantum state is tracked.
 */

import { SIMULATOR_LATENCY_MS } from '../config';
import { createLogger } from '../logger';
import { sleep } from '../timing';
import type { Bit, ChannelBackend } from '../types';

const log = createLogger('backend:sim');

export interface SimulatedLatency {
    calibrate: number;
    pulse: number;
    twoChannelPulse: number;
    read: number;
}

export interface SimulatedBackendOptions {
    seed?: number;
    pOne?: number;
    latencyMs?: Partial<SimulatedLatency>;
}

/** mulberry32: small, fast, deterministic 32-bit PRNG */
export function createRng(seed: number): () => number {
    let a = seed >>> 0;
    return () => {
        a = (a + 0x6d2b79f5) >>> 0;
        let t = a;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export class SimulatedBackend implements ChannelBackend {
    private readonly rng: () => number;
    private readonly pOne: number;
    private readonly latency: SimulatedLatency;
    private calls = 0;

    constructor(opts: SimulatedBackendOptions = {}) {
        this.rng = createRng(opts.seed ?? Date.now());
        this.pOne = opts.pOne ?? 0.5;
        if (!(this.pOne >= 0 && this.pOne <= 1)) {
            throw new RangeError(`pOne must be within [0, 1], got ${this.pOne}`);
        }
        this.latency = {
            calibrate: opts.latencyMs?.calibrate ?? SIMULATOR_LATENCY_MS.CALIBRATE,
            pulse: opts.latencyMs?.pulse ?? SIMULATOR_LATENCY_MS.PULSE,
            twoChannelPulse: opts.latencyMs?.twoChannelPulse ?? SIMULATOR_LATENCY_MS.TWO_CHANNEL_PULSE,
            read: opts.latencyMs?.read ?? SIMULATOR_LATENCY_MS.READ,
        };
    }

    async calibrate(channel: number): Promise<void> {
        this.calls++;
        log.debug(`Calibrating channel ${channel}`);
        await this.wait(this.latency.calibrate);
    }

    async sendPulse(channel: number, gate: string): Promise<void> {
        this.calls++;
        log.debug(`Applying ${gate} to channel ${channel}`);
        await this.wait(this.latency.pulse);
    }

    async sendTwoChannelPulse(channelA: number, channelB: number, gate: string): Promise<void> {
        this.calls++;
        log.debug(`Applying ${gate} to channels ${channelA},${channelB}`);
        await this.wait(this.latency.twoChannelPulse);
    }

    async readState(channel: number): Promise<Bit> {
        this.calls++;
        await this.wait(this.latency.read);
        const bit: Bit = this.rng() < this.pOne ? 1 : 0;
        log.debug(`Read channel ${channel}`, { bit });
        return bit;
    }

    get callCount(): number {
        return this.calls;
    }

    private async wait(ms: number): Promise<void> {
        if (ms > 0) await sleep(ms);
    }
}

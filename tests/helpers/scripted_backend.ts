// In-process backend for tests: records every call, serves scripted readouts.

import type { Bit, ChannelBackend } from '../../src/types';

export type BackendCall =
    | { method: 'calibrate'; channel: number }
    | { method: 'sendPulse'; channel: number; gate: string }
    | { method: 'sendTwoChannelPulse'; channels: [number, number]; gate: string }
    | { method: 'readState'; channel: number };

export interface ScriptedBackendOptions {
    /** Latency of sendPulse / sendTwoChannelPulse / calibrate */
    latencyMs?: number | ((call: BackendCall) => number);
    defaultRead?: Bit;
    failWhen?: (call: BackendCall) => boolean;
}

const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

export class ScriptedBackend implements ChannelBackend {
    readonly calls: BackendCall[] = [];
    /** Channels that saw two commands in flight at once */
    readonly overlaps: number[] = [];
    private readonly reads = new Map<number, Bit[]>();
    private readonly busy = new Map<number, number>();
    private inFlight = 0;
    peakInFlight = 0;

    constructor(private readonly opts: ScriptedBackendOptions = {}) { }

    scriptReads(channel: number, bits: Bit[]): this {
        this.reads.set(channel, [...(this.reads.get(channel) ?? []), ...bits]);
        return this;
    }

    callsOf<M extends BackendCall['method']>(method: M): Extract<BackendCall, { method: M }>[] {
        return this.calls.filter((c): c is Extract<BackendCall, { method: M }> => c.method === method);
    }

    async calibrate(channel: number): Promise<void> {
        await this.perform({ method: 'calibrate', channel }, [channel]);
    }

    async sendPulse(channel: number, gate: string): Promise<void> {
        await this.perform({ method: 'sendPulse', channel, gate }, [channel]);
    }

    async sendTwoChannelPulse(channelA: number, channelB: number, gate: string): Promise<void> {
        await this.perform({ method: 'sendTwoChannelPulse', channels: [channelA, channelB], gate }, [channelA, channelB]);
    }

    async readState(channel: number): Promise<Bit> {
        const call: BackendCall = { method: 'readState', channel };
        this.calls.push(call);
        if (this.opts.failWhen?.(call)) throw new Error(`scripted failure: readState(${channel})`);
        const queue = this.reads.get(channel);
        const next = queue?.shift();
        return next ?? this.opts.defaultRead ?? 0;
    }

    private async perform(call: BackendCall, channels: number[]): Promise<void> {
        this.calls.push(call);
        for (const ch of channels) {
            const n = (this.busy.get(ch) ?? 0) + 1;
            this.busy.set(ch, n);
            if (n > 1) this.overlaps.push(ch);
        }
        this.inFlight++;
        this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
        try {
            const latency = typeof this.opts.latencyMs === 'function' ? this.opts.latencyMs(call) : this.opts.latencyMs ?? 0;
            if (latency > 0) await sleep(latency);
            if (this.opts.failWhen?.(call)) throw new Error(`scripted failure: ${call.method}(${channels.join(',')})`);
        } finally {
            this.inFlight--;
            for (const ch of channels) this.busy.set(ch, (this.busy.get(ch) ?? 1) - 1);
        }
    }
}

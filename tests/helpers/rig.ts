// Wires the core components over a ScriptedBackend for tests.

import { AuditLog, MemoryAuditSink } from '../../src/audit';
import { ChannelRegistry } from '../../src/channel_registry';
import { Dispatcher } from '../../src/dispatcher';
import { MeasurementEngine } from '../../src/measurement_engine';
import { OperationQueue } from '../../src/operation_queue';
import type { Bit } from '../../src/types';
import { ChannelWorkerPool } from '../../src/worker_pool';
import { ScriptedBackend } from './scripted_backend';
import type { ScriptedBackendOptions } from './scripted_backend';

export interface RigOptions extends ScriptedBackendOptions {
    channelCount?: number;
    concurrency?: number;
    tieBreak?: Bit;
}

export function makeRig(opts: RigOptions = {}) {
    const backend = new ScriptedBackend(opts);
    const sink = new MemoryAuditSink();
    const audit = new AuditLog({ sink, retryBackoffMs: 0 });
    const registry = new ChannelRegistry({ channelCount: opts.channelCount ?? 10, backend, audit });
    const pool = new ChannelWorkerPool(registry, opts.concurrency ?? 4);
    const queue = new OperationQueue();
    const dispatcher = new Dispatcher({ registry, backend, audit, pool });
    const measurement = new MeasurementEngine({ registry, backend, audit, tieBreak: opts.tieBreak });
    return { backend, sink, audit, registry, pool, queue, dispatcher, measurement };
}

export const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

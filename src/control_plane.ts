/**
 * ControlPlane — one session over one processor.
 *
 * Builds registry, queue, pool, dispatcher, measurement engine and audit log
 * once and passes them to each other by reference. Nothing is read from
 * ambient global state; configuration arrives through the constructor.
 */

import { v4 as uuidv4 } from 'uuid';
import { AuditLog } from './audit';
import { ChannelRegistry } from './channel_registry';
import { loadControlPlaneConfig } from './config';
import type { ControlPlaneConfig } from './config';
import { Dispatcher } from './dispatcher';
import { clearCorrelation, createLogger, setCorrelation } from './logger';
import { MeasurementEngine } from './measurement_engine';
import { ModuleLayout } from './module_layout';
import { OperationQueue } from './operation_queue';
import { singleChannelOp, twoChannelOp, validateOperation } from './operations';
import type {
    AuditSink,
    Channel,
    ChannelAddress,
    ChannelBackend,
    DispatchReport,
    LogicalMeasurementResult,
    MeasurementResult,
    OperationSpec,
    Result,
} from './types';
import { ChannelWorkerPool } from './worker_pool';

const log = createLogger('control-plane');

export interface ControlPlaneOptions {
    backend: ChannelBackend;
    /** Overrides on top of the built-in defaults (env is not consulted here) */
    config?: Partial<ControlPlaneConfig>;
    /** Use an existing audit log; otherwise one is built over `auditSink` */
    audit?: AuditLog;
    auditSink?: AuditSink;
    sessionId?: string;
}

export interface ControlPlaneStatus {
    sessionId: string;
    channelCount: number;
    modules: number;
    calibrated: number[];
    queued: number;
    auditEntries: number;
    auditWriteFailures: number;
    skippedTotal: number;
    peakConcurrency: number;
}

export class ControlPlane {
    readonly sessionId: string;
    readonly config: ControlPlaneConfig;
    /** Module addressing; a plane built without `moduleSizes` is one module */
    readonly layout: ModuleLayout;
    readonly audit: AuditLog;
    readonly registry: ChannelRegistry;
    readonly queue: OperationQueue;
    readonly pool: ChannelWorkerPool;
    readonly dispatcher: Dispatcher;
    readonly measurement: MeasurementEngine;

    constructor(opts: ControlPlaneOptions) {
        this.sessionId = opts.sessionId ?? uuidv4();
        const merged = { ...loadControlPlaneConfig({}), ...opts.config };
        this.layout = new ModuleLayout(merged.moduleSizes ?? [merged.channelCount]);
        this.config = { ...merged, channelCount: this.layout.size };
        setCorrelation({ sessionId: this.sessionId });

        this.audit = opts.audit ?? new AuditLog({
            sink: opts.auditSink,
            retryAttempts: this.config.auditRetryAttempts,
            retryBackoffMs: this.config.auditRetryBackoffMs,
        });
        this.registry = new ChannelRegistry({ channelCount: this.config.channelCount, backend: opts.backend, audit: this.audit });
        this.queue = new OperationQueue();
        this.pool = new ChannelWorkerPool(this.registry, this.config.dispatchConcurrency);
        this.dispatcher = new Dispatcher({ registry: this.registry, backend: opts.backend, audit: this.audit, pool: this.pool });
        this.measurement = new MeasurementEngine({
            registry: this.registry,
            backend: opts.backend,
            audit: this.audit,
            tieBreak: this.config.tieBreak,
            maxShots: this.config.maxShots,
            maxRepetition: this.config.maxRepetition,
        });

        log.info('Session started', { channels: this.config.channelCount, modules: this.layout.moduleCount, concurrency: this.config.dispatchConcurrency, tieBreak: this.config.tieBreak });
    }

    calibrate(channel: number): Promise<Channel> {
        return this.registry.calibrate(channel);
    }

    calibrateAll(): Promise<Channel[]> {
        return this.registry.calibrateAll();
    }

    /** Validate, record in the queue, then dispatch. Invalid input touches nothing. */
    apply(spec: OperationSpec): Promise<DispatchReport> {
        validateOperation(spec, this.config.channelCount, this.config.maxDelayMs);
        const op = this.queue.enqueue(spec);
        return this.dispatcher.dispatch(op);
    }

    /** All specs are validated before any is enqueued. */
    applyAll(specs: readonly OperationSpec[]): Promise<Result<DispatchReport>[]> {
        for (const spec of specs) validateOperation(spec, this.config.channelCount, this.config.maxDelayMs);
        const ops = specs.map(spec => this.queue.enqueue(spec));
        return this.dispatcher.dispatchBatch(ops);
    }

    /** Calibrate every channel of one module, in channel order. */
    async calibrateModule(module: number): Promise<Channel[]> {
        const channels = this.layout.channelsOf(module);
        const out: Channel[] = [];
        for (const ch of channels) out.push(await this.registry.calibrate(ch));
        return out;
    }

    /** `apply` with module-local channel numbers. */
    applyOnModule(module: number, gate: string, channels: number | readonly number[], delayMs?: number): Promise<DispatchReport> {
        const local = typeof channels === 'number' ? [channels] : channels;
        const global = local.map(channel => this.layout.toGlobal({ module, channel }));
        return this.apply(singleChannelOp(gate, global, delayMs));
    }

    /**
     * Two-channel gate between channels that may sit on different modules.
     * Both channel locks are held for the pulse, and the pair is skipped
     * whole if either end is uncalibrated.
     */
    applyCrossModule(gate: string, a: ChannelAddress, b: ChannelAddress, delayMs?: number): Promise<DispatchReport> {
        return this.apply(twoChannelOp(gate, this.layout.toGlobal(a), this.layout.toGlobal(b), delayMs));
    }

    measure(channels: readonly number[], shots = 1, repetition = 1): Promise<MeasurementResult> {
        return this.measurement.measure(channels, shots, repetition);
    }

    measureLogical(group: readonly number[], shots = 1): Promise<LogicalMeasurementResult> {
        return this.measurement.measureLogical(group, shots);
    }

    measureOnModule(module: number, channels: readonly number[], shots = 1, repetition = 1): Promise<MeasurementResult> {
        const global = channels.map(channel => this.layout.toGlobal({ module, channel }));
        return this.measure(global, shots, repetition);
    }

    measureLogicalOnModule(module: number, group: readonly number[], shots = 1): Promise<LogicalMeasurementResult> {
        const global = group.map(channel => this.layout.toGlobal({ module, channel }));
        return this.measureLogical(global, shots);
    }

    status(): ControlPlaneStatus {
        return {
            sessionId: this.sessionId,
            channelCount: this.registry.size,
            modules: this.layout.moduleCount,
            calibrated: this.registry.calibratedChannels(),
            queued: this.queue.length,
            auditEntries: this.audit.size,
            auditWriteFailures: this.audit.writeFailures,
            skippedTotal: this.dispatcher.skippedTotal,
            peakConcurrency: this.pool.peakConcurrency,
        };
    }

    close(): void {
        this.audit.close();
        log.info('Session closed', { auditEntries: this.audit.size, auditWriteFailures: this.audit.writeFailures });
        clearCorrelation();
    }
}

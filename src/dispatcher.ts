/**
 * Dispatcher — executes enqueued operations against the backend.
 *
 * Single-channel operations fan out across their target channels through the
 * worker pool. Two-channel operations hold both channel locks and are never
 * pooled. An uncalibrated target is skipped: no backend call, no audit entry,
 * but always reported in `DispatchReport.skipped` and `skippedTotal`.
 */

import { AuditLog } from './audit';
import { ChannelRegistry } from './channel_registry';
import { BackendCommandError, describeError } from './errors';
import { createLogger } from './logger';
import { sleep } from './timing';
import type {
    ChannelBackend,
    DispatchReport,
    Operation,
    Result,
    SingleChannelOperation,
    TwoChannelOperation,
} from './types';
import { ChannelWorkerPool } from './worker_pool';

const log = createLogger('dispatcher');

export interface DispatcherOptions {
    registry: ChannelRegistry;
    backend: ChannelBackend;
    audit: AuditLog;
    pool: ChannelWorkerPool;
}

type ChannelOutcome = 'executed' | 'skipped';

function settle<T>(p: Promise<T>): Promise<Result<T>> {
    return p.then(
        (value): Result<T> => ({ ok: true, value }),
        (e: unknown): Result<T> => ({ ok: false, error: e instanceof Error ? e : new Error(describeError(e)) })
    );
}

export class Dispatcher {
    private readonly registry: ChannelRegistry;
    private readonly backend: ChannelBackend;
    private readonly audit: AuditLog;
    private readonly pool: ChannelWorkerPool;
    private skipped = 0;

    constructor(opts: DispatcherOptions) {
        this.registry = opts.registry;
        this.backend = opts.backend;
        this.audit = opts.audit;
        this.pool = opts.pool;
    }

    /** Channel applications skipped because a target was uncalibrated. */
    get skippedTotal(): number {
        return this.skipped;
    }

    /**
     * Rejects with InvalidChannelError, before any channel is queued, if a
     * target is out of range. Throws BackendCommandError if the backend failed
     * on any channel; the remaining channels of the operation still run to
     * completion first.
     */
    async dispatch(op: Operation): Promise<DispatchReport> {
        for (const ch of op.channels) this.registry.assertChannel(ch);
        return op.kind === 'two' ? this.dispatchTwo(op) : this.dispatchSingle(op);
    }

    /**
     * Dispatches in order without cancellation. Single-channel operations
     * overlap; each two-channel operation completes before the next starts.
     */
    async dispatchBatch(ops: readonly Operation[]): Promise<Result<DispatchReport>[]> {
        const pending: Promise<Result<DispatchReport>>[] = [];
        for (const op of ops) {
            const outcome = settle(this.dispatch(op));
            pending.push(outcome);
            if (op.kind === 'two') await outcome;
        }
        return Promise.all(pending);
    }

    private dispatchSingle(op: SingleChannelOperation): Promise<DispatchReport> {
        // submit() must run for every channel before the first await; dispatch()
        // calls this synchronously, so queue positions follow call order
        const tasks = op.channels.map(ch => this.pool.submit(ch, () => this.pulseChannel(op, ch)));
        return this.collect(op, tasks);
    }

    private async collect(op: SingleChannelOperation, tasks: Promise<ChannelOutcome>[]): Promise<DispatchReport> {
        const settled = await Promise.allSettled(tasks);
        const executed: number[] = [];
        const skipped: number[] = [];
        const failures: Array<{ channel: number; reason: unknown }> = [];

        settled.forEach((s, i) => {
            const channel = op.channels[i];
            if (s.status === 'rejected') failures.push({ channel, reason: s.reason });
            else if (s.value === 'executed') executed.push(channel);
            else skipped.push(channel);
        });

        const report: DispatchReport = {
            operationId: op.id,
            kind: op.kind,
            gate: op.gate,
            status: executed.length === op.channels.length ? 'executed' : executed.length === 0 ? 'skipped' : 'partial',
            executed,
            skipped,
        };

        if (failures.length > 0) {
            throw new BackendCommandError(
                'send_pulse',
                failures.map(f => f.channel),
                failures[0].reason,
                { operationId: op.id, report }
            );
        }
        return report;
    }

    private async pulseChannel(op: SingleChannelOperation, channel: number): Promise<ChannelOutcome> {
        // Runs under the channel lock: the flag cannot change until we return
        if (!this.registry.isCalibrated(channel)) {
            this.noteSkipped(op, [channel]);
            return 'skipped';
        }
        if (op.delayMs > 0) await sleep(op.delayMs);

        try {
            await this.backend.sendPulse(channel, op.gate);
        } catch (e) {
            const err = new BackendCommandError('send_pulse', [channel], e, { operationId: op.id });
            this.audit.record({ action: 'gate', outcome: 'failed', channels: [channel], gate: op.gate, operationId: op.id, error: err.message });
            log.error('Pulse failed', { channel, gate: op.gate, error: err.message });
            throw err;
        }

        this.audit.record({ action: 'gate', outcome: 'ok', channels: [channel], gate: op.gate, operationId: op.id });
        log.debug('Pulse applied', { channel, gate: op.gate });
        return 'executed';
    }

    private dispatchTwo(op: TwoChannelOperation): Promise<DispatchReport> {
        const [a, b] = op.channels;
        return this.registry.withChannels([a, b], async (): Promise<DispatchReport> => {
            const uncalibrated = [a, b].filter(ch => !this.registry.isCalibrated(ch));
            if (uncalibrated.length > 0) {
                this.noteSkipped(op, [a, b], uncalibrated);
                return { operationId: op.id, kind: op.kind, gate: op.gate, status: 'skipped', executed: [], skipped: [a, b] };
            }
            if (op.delayMs > 0) await sleep(op.delayMs);

            try {
                await this.backend.sendTwoChannelPulse(a, b, op.gate);
            } catch (e) {
                const err = new BackendCommandError('send_two_channel_pulse', [a, b], e, { operationId: op.id });
                this.audit.record({ action: 'two_channel_gate', outcome: 'failed', channels: [a, b], gate: op.gate, operationId: op.id, error: err.message });
                log.error('Two-channel pulse failed', { channels: [a, b], gate: op.gate, error: err.message });
                throw err;
            }

            this.audit.record({ action: 'two_channel_gate', outcome: 'ok', channels: [a, b], gate: op.gate, operationId: op.id });
            log.debug('Two-channel pulse applied', { channels: [a, b], gate: op.gate });
            return { operationId: op.id, kind: op.kind, gate: op.gate, status: 'executed', executed: [a, b], skipped: [] };
        });
    }

    private noteSkipped(op: Operation, channels: number[], uncalibrated: number[] = channels): void {
        this.skipped += channels.length;
        log.warn('Skipped uncalibrated target', { operationId: op.id, gate: op.gate, channels, uncalibrated });
    }
}

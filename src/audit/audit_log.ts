/**
 * AuditLog — append-only record of every state-changing action.
 *
 * GUARANTEES:
 * - `seq` strictly increasing from 0, timestamps non-decreasing
 * - entries are deep-frozen copies; nothing is ever mutated or removed
 * - the sink append is synchronous, so concurrent async callers are
 *   serialized by the event loop and lines never interleave
 * - a sink failure is retried, then counted and emitted as `write_failed`;
 *   it never propagates to the operation that produced the entry
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { AUDIT } from '../config';
import { AuditWriteError } from '../errors';
import { createLogger } from '../logger';
import { backoff, monotonicNowIso, sleepSync } from '../timing';
import type { AuditEntry, AuditInput, AuditSink } from '../types';
import { MemoryAuditSink } from './memory_sink';

const log = createLogger('audit');

export interface AuditLogOptions {
    sink?: AuditSink;
    /** Total attempts per entry, including the first (default AUDIT.RETRY_ATTEMPTS) */
    retryAttempts?: number;
    retryBackoffMs?: number;
    clock?: () => Date;
}

export type WriteFailureListener = (error: AuditWriteError, entry: Readonly<AuditEntry>) => void;

function deepFreeze<T>(value: T): Readonly<T> {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        for (const member of Object.values(value)) deepFreeze(member);
        Object.freeze(value);
    }
    return value;
}

export class AuditLog extends EventEmitter {
    private readonly sink: AuditSink;
    private readonly retryAttempts: number;
    private readonly retryBackoffMs: number;
    private readonly clock: () => Date;
    private readonly items: Readonly<AuditEntry>[] = [];
    private lastTimestamp: string | null = null;
    private failures = 0;

    constructor(opts: AuditLogOptions = {}) {
        super();
        this.sink = opts.sink ?? new MemoryAuditSink();
        this.retryAttempts = Math.max(1, opts.retryAttempts ?? AUDIT.RETRY_ATTEMPTS);
        this.retryBackoffMs = Math.max(0, opts.retryBackoffMs ?? AUDIT.RETRY_BACKOFF_MS);
        this.clock = opts.clock ?? (() => new Date());
    }

    record(input: AuditInput): Readonly<AuditEntry> {
        const entry: AuditEntry = {
            ...structuredClone(input),
            seq: this.items.length,
            id: uuidv4(),
            timestamp: monotonicNowIso(this.lastTimestamp, this.clock()),
        };
        const frozen = deepFreeze(entry);
        this.items.push(frozen);
        this.lastTimestamp = frozen.timestamp;
        this.persist(frozen);
        return frozen;
    }

    private persist(entry: Readonly<AuditEntry>): void {
        let lastError: unknown;
        for (let attempt = 0; attempt < this.retryAttempts; attempt++) {
            try {
                this.sink.append(entry);
                return;
            } catch (e) {
                lastError = e;
                if (attempt + 1 < this.retryAttempts) {
                    sleepSync(backoff(attempt, this.retryBackoffMs));
                }
            }
        }
        this.failures++;
        const err = new AuditWriteError(entry.seq, this.retryAttempts, lastError);
        log.error('Audit write failed', { seq: entry.seq, action: entry.action, error: err.message });
        this.emit('write_failed', err, entry);
    }

    onWriteFailure(listener: WriteFailureListener): this {
        return this.on('write_failed', listener);
    }

    entries(): readonly Readonly<AuditEntry>[] {
        return this.items.slice();
    }

    get size(): number {
        return this.items.length;
    }

    /** Entries the sink never accepted. They remain in memory. */
    get writeFailures(): number {
        return this.failures;
    }

    close(): void {
        this.sink.close?.();
    }
}

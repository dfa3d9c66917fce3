/**
 * Control-plane types shared by registry, dispatcher, measurement and audit.
 */

export type Bit = 0 | 1;

/* -------------------------------------------------------------------------- */
/* Backend collaborator                                                       */
/* -------------------------------------------------------------------------- */

/**
 * Instrument driver contract. Every call may be slow. A rejected promise (or a
 * readout that is not 0/1) is treated as a backend command failure.
 */
export interface ChannelBackend {
    calibrate(channel: number): Promise<void>;
    sendPulse(channel: number, gate: string): Promise<void>;
    sendTwoChannelPulse(channelA: number, channelB: number, gate: string): Promise<void>;
    readState(channel: number): Promise<Bit>;
}

/* -------------------------------------------------------------------------- */
/* Channels                                                                   */
/* -------------------------------------------------------------------------- */

export interface Channel {
    index: number;
    calibrated: boolean;
    /** ISO timestamp of the last successful calibration */
    lastActionAt: string | null;
}

/** A channel addressed within one processor module. */
export interface ChannelAddress {
    module: number;
    channel: number;
}

/* -------------------------------------------------------------------------- */
/* Operations                                                                 */
/* -------------------------------------------------------------------------- */

export interface SingleChannelOperationSpec {
    kind: 'single';
    gate: string;
    channels: readonly number[];
    delayMs?: number;
}

export interface TwoChannelOperationSpec {
    kind: 'two';
    gate: string;
    channels: readonly [number, number];
    delayMs?: number;
}

export type OperationSpec = SingleChannelOperationSpec | TwoChannelOperationSpec;

interface Enqueued {
    id: string;
    seq: number;
    enqueuedAt: string;
    delayMs: number;
}

export type SingleChannelOperation = Readonly<Omit<SingleChannelOperationSpec, 'delayMs'> & Enqueued>;
export type TwoChannelOperation = Readonly<Omit<TwoChannelOperationSpec, 'delayMs'> & Enqueued>;
export type Operation = SingleChannelOperation | TwoChannelOperation;

export type DispatchStatus = 'executed' | 'partial' | 'skipped';

export interface DispatchReport {
    operationId: string;
    kind: Operation['kind'];
    gate: string;
    status: DispatchStatus;
    /** Channels that received the pulse */
    executed: number[];
    /** Channels left untouched because they were not calibrated */
    skipped: number[];
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: Error };

/* -------------------------------------------------------------------------- */
/* Measurement                                                                */
/* -------------------------------------------------------------------------- */

export type OutcomeCounts = Readonly<Record<Bit, number>>;

export interface ChannelMeasurement {
    channel: number;
    counts: OutcomeCounts;
}

export interface MeasurementResult {
    requestId: string;
    shots: number;
    repetition: number;
    tieBreak: Bit;
    channels: ChannelMeasurement[];
    /** Requested channels that were not calibrated and were not read */
    skipped: number[];
}

export interface LogicalMeasurementResult {
    requestId: string;
    group: number[];
    shots: number;
    tieBreak: Bit;
    counts: OutcomeCounts;
    skipped: boolean;
    /** Group members that were not calibrated; non-empty iff skipped */
    uncalibrated: number[];
}

/* -------------------------------------------------------------------------- */
/* Audit                                                                      */
/* -------------------------------------------------------------------------- */

export type AuditAction = 'calibrate' | 'gate' | 'two_channel_gate' | 'measure' | 'measure_logical';

export type AuditOutcome = 'ok' | 'failed' | 'skipped';

export type AuditResult =
    | { kind: 'per_channel'; counts: ChannelMeasurement[] }
    | { kind: 'logical'; counts: OutcomeCounts };

export interface AuditInput {
    action: AuditAction;
    outcome: AuditOutcome;
    channels: number[];
    gate?: string;
    operationId?: string;
    requestId?: string;
    shots?: number;
    repetition?: number;
    skipped?: number[];
    result?: AuditResult;
    error?: string;
}

export interface AuditEntry extends AuditInput {
    seq: number;
    id: string;
    timestamp: string;
}

export interface AuditSink {
    append(entry: AuditEntry): void;
    close?(): void;
}

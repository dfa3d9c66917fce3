/**
 * MeasurementEngine — repeated readout with majority-vote decoding.
 *
 * `measure` decodes each channel independently (repetition reads per shot).
 * `measureLogical` decodes one bit per shot from one read of every group
 * member, i.e. a distance-len(group) repetition code with no syndrome
 * extraction. Both write exactly one audit entry per request.
 */

import { v4 as uuidv4 } from 'uuid';
import { AuditLog } from './audit';
import { ChannelRegistry } from './channel_registry';
import { MEASUREMENT } from './config';
import { BackendCommandError, InvalidRequestError } from './errors';
import { createLogger } from './logger';
import { OutcomeTally, decodeMajority, emptyCounts, isBit } from './majority_vote';
import type { Bit, ChannelBackend, ChannelMeasurement, LogicalMeasurementResult, MeasurementResult } from './types';

const log = createLogger('measurement');

export interface MeasurementEngineOptions {
    registry: ChannelRegistry;
    backend: ChannelBackend;
    audit: AuditLog;
    tieBreak?: Bit;
    maxShots?: number;
    maxRepetition?: number;
}

export class MeasurementEngine {
    private readonly registry: ChannelRegistry;
    private readonly backend: ChannelBackend;
    private readonly audit: AuditLog;
    readonly tieBreak: Bit;
    private readonly maxShots: number;
    private readonly maxRepetition: number;

    constructor(opts: MeasurementEngineOptions) {
        this.registry = opts.registry;
        this.backend = opts.backend;
        this.audit = opts.audit;
        this.tieBreak = opts.tieBreak ?? MEASUREMENT.TIE_BREAK;
        this.maxShots = opts.maxShots ?? MEASUREMENT.MAX_SHOTS;
        this.maxRepetition = opts.maxRepetition ?? MEASUREMENT.MAX_REPETITION;
    }

    /**
     * Uncalibrated channels are not read; they are listed in `skipped`.
     * A backend failure writes a `failed` entry and throws BackendCommandError.
     */
    measure(channels: readonly number[], shots = 1, repetition = 1): Promise<MeasurementResult> {
        this.assertChannelSet(channels, 'channels');
        this.assertCount(shots, 'shots', this.maxShots);
        this.assertCount(repetition, 'repetition', this.maxRepetition);
        const requested = [...channels];
        const requestId = uuidv4();

        return this.registry.withChannels(requested, async (): Promise<MeasurementResult> => {
            const active = requested
                .filter(ch => this.registry.isCalibrated(ch))
                .map(channel => ({ channel, tally: new OutcomeTally() }));
            const skipped = requested.filter(ch => !this.registry.isCalibrated(ch));
            if (skipped.length > 0) {
                log.warn('Skipped uncalibrated channels', { requestId, skipped });
            }

            try {
                for (let shot = 0; shot < shots; shot++) {
                    for (const slot of active) {
                        const votes: Bit[] = [];
                        for (let r = 0; r < repetition; r++) {
                            votes.push(await this.readBit(slot.channel));
                        }
                        slot.tally.add(decodeMajority(votes, this.tieBreak));
                    }
                }
            } catch (e) {
                const err = e instanceof BackendCommandError ? e : new BackendCommandError('read_state', active.map(a => a.channel), e);
                this.audit.record({ action: 'measure', outcome: 'failed', channels: requested, requestId, shots, repetition, skipped, error: err.message });
                log.error('Measurement failed', { requestId, error: err.message });
                throw err;
            }

            const perChannel: ChannelMeasurement[] = active.map(a => ({ channel: a.channel, counts: a.tally.freeze() }));
            this.audit.record({
                action: 'measure',
                outcome: active.length > 0 ? 'ok' : 'skipped',
                channels: requested,
                requestId,
                shots,
                repetition,
                skipped,
                result: { kind: 'per_channel', counts: perChannel },
            });
            log.debug('Measurement complete', { requestId, shots, repetition, channels: requested.length });

            return { requestId, shots, repetition, tieBreak: this.tieBreak, channels: perChannel, skipped };
        });
    }

    /**
     * If any member is uncalibrated the whole group is skipped: no reads,
     * zero counts, a `skipped` audit entry.
     */
    measureLogical(group: readonly number[], shots = 1): Promise<LogicalMeasurementResult> {
        this.assertChannelSet(group, 'group');
        this.assertCount(shots, 'shots', this.maxShots);
        const members = [...group];
        const requestId = uuidv4();

        return this.registry.withChannels(members, async (): Promise<LogicalMeasurementResult> => {
            const uncalibrated = members.filter(ch => !this.registry.isCalibrated(ch));
            if (uncalibrated.length > 0) {
                const counts = emptyCounts();
                this.audit.record({
                    action: 'measure_logical',
                    outcome: 'skipped',
                    channels: members,
                    requestId,
                    shots,
                    skipped: uncalibrated,
                    result: { kind: 'logical', counts },
                });
                log.warn('Skipped logical measurement: uncalibrated members', { requestId, uncalibrated });
                return { requestId, group: members, shots, tieBreak: this.tieBreak, counts, skipped: true, uncalibrated };
            }

            const tally = new OutcomeTally();
            try {
                for (let shot = 0; shot < shots; shot++) {
                    const votes: Bit[] = [];
                    for (const ch of members) votes.push(await this.readBit(ch));
                    tally.add(decodeMajority(votes, this.tieBreak));
                }
            } catch (e) {
                const err = e instanceof BackendCommandError ? e : new BackendCommandError('read_state', members, e);
                this.audit.record({ action: 'measure_logical', outcome: 'failed', channels: members, requestId, shots, error: err.message });
                log.error('Logical measurement failed', { requestId, error: err.message });
                throw err;
            }

            const counts = tally.freeze();
            this.audit.record({
                action: 'measure_logical',
                outcome: 'ok',
                channels: members,
                requestId,
                shots,
                result: { kind: 'logical', counts },
            });
            return { requestId, group: members, shots, tieBreak: this.tieBreak, counts, skipped: false, uncalibrated: [] };
        });
    }

    private async readBit(channel: number): Promise<Bit> {
        let value: unknown;
        try {
            value = await this.backend.readState(channel);
        } catch (e) {
            throw new BackendCommandError('read_state', [channel], e);
        }
        if (!isBit(value)) {
            throw new BackendCommandError('read_state', [channel], new Error(`non-binary readout ${String(value)}`));
        }
        return value;
    }

    private assertChannelSet(channels: readonly number[], label: string): void {
        if (!Array.isArray(channels) || channels.length === 0) {
            throw new InvalidRequestError(`${label} must be a non-empty list of channels`);
        }
        for (const ch of channels) this.registry.assertChannel(ch);
        if (new Set(channels).size !== channels.length) {
            throw new InvalidRequestError(`${label} contains duplicate channels`, { [label]: [...channels] });
        }
    }

    private assertCount(value: number, label: string, max: number): void {
        if (!Number.isInteger(value) || value < 1 || value > max) {
            throw new InvalidRequestError(`${label} must be an integer in [1, ${max}], got ${value}`);
        }
    }
}

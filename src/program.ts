/**
 * Program files — a JSON description of one session run:
 * calibrations, then operations (dispatched as one batch), then measurements.
 *
 * With `modules` set, an operation or measurement carrying `module` uses
 * module-local channel numbers; `cross` joins two channels on any modules.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { ControlPlane } from './control_plane';
import { createLogger } from './logger';
import { twoChannelOp } from './operations';
import type { DispatchReport, LogicalMeasurementResult, MeasurementResult, OperationSpec, Result } from './types';

const log = createLogger('program');

const ChannelIndex = z.number().int().nonnegative();
const ModuleIndex = z.number().int().nonnegative();
const Gate = z.string().trim().min(1);
const Delay = z.number().nonnegative().optional();
const Address = z.object({ module: ModuleIndex, channel: ChannelIndex });

const OperationSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('single'), gate: Gate, module: ModuleIndex.optional(), channels: z.array(ChannelIndex).min(1), delayMs: Delay }),
    z.object({ kind: z.literal('two'), gate: Gate, module: ModuleIndex.optional(), channels: z.tuple([ChannelIndex, ChannelIndex]), delayMs: Delay }),
    z.object({ kind: z.literal('cross'), gate: Gate, a: Address, b: Address, delayMs: Delay }),
]);

const MeasurementSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('physical'),
        module: ModuleIndex.optional(),
        channels: z.array(ChannelIndex).min(1),
        shots: z.number().int().positive().default(1),
        repetition: z.number().int().positive().default(1),
    }),
    z.object({
        kind: z.literal('logical'),
        module: ModuleIndex.optional(),
        group: z.array(ChannelIndex).min(1),
        shots: z.number().int().positive().default(1),
    }),
]);

export const ProgramSchema = z.object({
    name: z.string().optional(),
    channels: z.number().int().positive().optional(),
    /** Channels per module; overrides `channels` */
    modules: z.array(z.number().int().positive()).min(1).optional(),
    calibrate: z.union([z.literal('all'), z.array(ChannelIndex)]).default([]),
    operations: z.array(OperationSchema).default([]),
    measurements: z.array(MeasurementSchema).default([]),
});

export type Program = z.infer<typeof ProgramSchema>;
export type ProgramMeasurement = z.infer<typeof MeasurementSchema>;

export type MeasurementOutcome =
    | { kind: 'physical'; result: MeasurementResult }
    | { kind: 'logical'; result: LogicalMeasurementResult };

export interface ProgramRun {
    calibrated: number[];
    dispatch: Result<DispatchReport>[];
    measurements: MeasurementOutcome[];
}

export function parseProgram(raw: unknown): Program {
    const parsed = ProgramSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
        throw new Error(`INVALID_PROGRAM: ${issues}`);
    }
    return parsed.data;
}

export function loadProgram(filePath: string): Program {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (e) {
        throw new Error(`INVALID_PROGRAM: cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return parseProgram(raw);
}

function toSpec(plane: ControlPlane, op: Program['operations'][number]): OperationSpec {
    if (op.kind === 'cross') {
        return twoChannelOp(op.gate, plane.layout.toGlobal(op.a), plane.layout.toGlobal(op.b), op.delayMs);
    }
    const module = op.module;
    const resolve = (channel: number) => (module === undefined ? channel : plane.layout.toGlobal({ module, channel }));
    return op.kind === 'two'
        ? { kind: 'two', gate: op.gate, channels: [resolve(op.channels[0]), resolve(op.channels[1])], delayMs: op.delayMs }
        : { kind: 'single', gate: op.gate, channels: op.channels.map(resolve), delayMs: op.delayMs };
}

/**
 * Calibration or measurement failures abort the run; per-operation dispatch
 * failures are collected in `dispatch` and the run continues.
 */
export async function runProgram(plane: ControlPlane, program: Program): Promise<ProgramRun> {
    log.info('Running program', { name: program.name, operations: program.operations.length, measurements: program.measurements.length });

    const calibrated: number[] = [];
    if (program.calibrate === 'all') {
        for (const c of await plane.calibrateAll()) calibrated.push(c.index);
    } else {
        for (const ch of program.calibrate) calibrated.push((await plane.calibrate(ch)).index);
    }

    const dispatch = await plane.applyAll(program.operations.map(op => toSpec(plane, op)));

    const measurements: MeasurementOutcome[] = [];
    for (const m of program.measurements) {
        if (m.kind === 'physical') {
            const result = m.module === undefined
                ? await plane.measure(m.channels, m.shots, m.repetition)
                : await plane.measureOnModule(m.module, m.channels, m.shots, m.repetition);
            measurements.push({ kind: 'physical', result });
        } else {
            const result = m.module === undefined
                ? await plane.measureLogical(m.group, m.shots)
                : await plane.measureLogicalOnModule(m.module, m.group, m.shots);
            measurements.push({ kind: 'logical', result });
        }
    }

    return { calibrated, dispatch, measurements };
}

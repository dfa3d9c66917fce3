/**
 * Shared Configuration Constants
 *
 * Centralized configuration for the control plane.
 * Values can be overridden via environment variables.
 */

import { z } from 'zod';
import type { Bit } from './types';

// Processor width
export const DEFAULT_CHANNEL_COUNT = 100;

// Dispatch limits
export const DISPATCH = {
    CONCURRENCY: 8,
    MAX_DELAY_MS: 10_000,
};

// Measurement limits
// Ties (even vote counts) decode to TIE_BREAK
export const MEASUREMENT: { MAX_SHOTS: number; MAX_REPETITION: number; TIE_BREAK: Bit } = {
    MAX_SHOTS: 1_000_000,
    MAX_REPETITION: 99,
    TIE_BREAK: 0,
};

// Audit persistence
export const AUDIT = {
    RETRY_ATTEMPTS: 3,
    RETRY_BACKOFF_MS: 25,
    LOG_PATH: 'logs/audit.jsonl',
};

// Simulated instrument latencies (milliseconds)
export const SIMULATOR_LATENCY_MS = {
    CALIBRATE: 10,
    PULSE: 5,
    TWO_CHANNEL_PULSE: 10,
    READ: 0,
};

export type FsyncMode = 'NONE' | 'BEST_EFFORT' | 'REQUIRED';

export interface ControlPlaneConfig {
    channelCount: number;
    /** Channels per module; when set, channelCount is their sum */
    moduleSizes?: number[];
    dispatchConcurrency: number;
    maxDelayMs: number;
    maxShots: number;
    maxRepetition: number;
    tieBreak: Bit;
    auditRetryAttempts: number;
    auditRetryBackoffMs: number;
    auditPath: string;
    auditFsync: FsyncMode;
}

const intFromEnv = (fallback: number, min: number) =>
    z.coerce.number().int().min(min).default(fallback);

// "4,4,2": three modules, ten channels
const moduleListFromEnv = z
    .string()
    .regex(/^\d+(,\d+)*$/, 'expected a comma-separated list of module sizes')
    .transform(s => s.split(',').map(Number))
    .refine(sizes => sizes.every(n => n >= 1), 'module sizes must be at least 1');

const EnvSchema = z.object({
    QCTL_CHANNELS: intFromEnv(DEFAULT_CHANNEL_COUNT, 1),
    QCTL_MODULES: moduleListFromEnv.optional(),
    QCTL_DISPATCH_CONCURRENCY: intFromEnv(DISPATCH.CONCURRENCY, 1),
    QCTL_MAX_DELAY_MS: intFromEnv(DISPATCH.MAX_DELAY_MS, 0),
    QCTL_MAX_SHOTS: intFromEnv(MEASUREMENT.MAX_SHOTS, 1),
    QCTL_MAX_REPETITION: intFromEnv(MEASUREMENT.MAX_REPETITION, 1),
    QCTL_TIE_BREAK: z.enum(['0', '1']).default(MEASUREMENT.TIE_BREAK === 1 ? '1' : '0'),
    QCTL_AUDIT_RETRY_ATTEMPTS: intFromEnv(AUDIT.RETRY_ATTEMPTS, 1),
    QCTL_AUDIT_RETRY_BACKOFF_MS: intFromEnv(AUDIT.RETRY_BACKOFF_MS, 0),
    QCTL_AUDIT_FILE: z.string().min(1).default(AUDIT.LOG_PATH),
    QCTL_AUDIT_FSYNC: z.enum(['NONE', 'BEST_EFFORT', 'REQUIRED']).default('BEST_EFFORT'),
});

/**
 * Resolve configuration from an environment map. Unset variables fall back
 * to the constants above; malformed ones throw with the offending key named.
 */
export function loadControlPlaneConfig(env: Record<string, string | undefined> = process.env): ControlPlaneConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`INVALID_CONFIG: ${issues}`);
    }
    const v = parsed.data;
    const config: ControlPlaneConfig = {
        channelCount: v.QCTL_CHANNELS,
        dispatchConcurrency: v.QCTL_DISPATCH_CONCURRENCY,
        maxDelayMs: v.QCTL_MAX_DELAY_MS,
        maxShots: v.QCTL_MAX_SHOTS,
        maxRepetition: v.QCTL_MAX_REPETITION,
        tieBreak: v.QCTL_TIE_BREAK === '1' ? 1 : 0,
        auditRetryAttempts: v.QCTL_AUDIT_RETRY_ATTEMPTS,
        auditRetryBackoffMs: v.QCTL_AUDIT_RETRY_BACKOFF_MS,
        auditPath: v.QCTL_AUDIT_FILE,
        auditFsync: v.QCTL_AUDIT_FSYNC,
    };
    if (v.QCTL_MODULES) {
        config.moduleSizes = v.QCTL_MODULES;
        config.channelCount = v.QCTL_MODULES.reduce((a, b) => a + b, 0);
    }
    return config;
}

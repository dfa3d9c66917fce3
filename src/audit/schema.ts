// Shape check for audit records read back from disk.

import { z } from 'zod';
import type { AuditEntry } from '../types';

const BitCounts = z.object({ 0: z.number().int().nonnegative(), 1: z.number().int().nonnegative() });

const ChannelMeasurement = z.object({ channel: z.number().int().nonnegative(), counts: BitCounts });

export const AuditEntrySchema = z.object({
    seq: z.number().int().nonnegative(),
    id: z.string().min(1),
    timestamp: z.string().datetime(),
    action: z.enum(['calibrate', 'gate', 'two_channel_gate', 'measure', 'measure_logical']),
    outcome: z.enum(['ok', 'failed', 'skipped']),
    channels: z.array(z.number().int().nonnegative()),
    gate: z.string().optional(),
    operationId: z.string().optional(),
    requestId: z.string().optional(),
    shots: z.number().int().positive().optional(),
    repetition: z.number().int().positive().optional(),
    skipped: z.array(z.number().int().nonnegative()).optional(),
    result: z.discriminatedUnion('kind', [
        z.object({ kind: z.literal('per_channel'), counts: z.array(ChannelMeasurement) }),
        z.object({ kind: z.literal('logical'), counts: BitCounts }),
    ]).optional(),
    error: z.string().optional(),
});

export function parseAuditRecord(raw: unknown, where: string): AuditEntry {
    const parsed = AuditEntrySchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
        throw new Error(`MALFORMED_AUDIT_RECORD at ${where}: ${issues}`);
    }
    return parsed.data;
}

/**
 * Error taxonomy for the control plane.
 *
 * INVALID_CHANNEL / INVALID_REQUEST are thrown before any side effect.
 * BACKEND_COMMAND_FAILURE propagates to the caller after a `failed` audit entry.
 * AUDIT_WRITE_FAILURE is never thrown to the triggering operation; the audit
 * log emits it instead.
 * An operation skipped on an uncalibrated channel is an outcome, not an error.
 */

export const ERRORS = {
    INVALID_CHANNEL: 'INVALID_CHANNEL',
    INVALID_REQUEST: 'INVALID_REQUEST',
    BACKEND_COMMAND_FAILURE: 'BACKEND_COMMAND_FAILURE',
    AUDIT_WRITE_FAILURE: 'AUDIT_WRITE_FAILURE',
} as const;

export type ErrorCode = typeof ERRORS[keyof typeof ERRORS];

export class ControlPlaneError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly context: Record<string, unknown> = {},
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'ControlPlaneError';
    }
}

export class InvalidChannelError extends ControlPlaneError {
    /** `module` is set when the channel was addressed within a module. */
    constructor(public readonly channel: unknown, public readonly channelCount: number, public readonly module?: number) {
        super(
            `Invalid channel ${String(channel)}${module === undefined ? '' : ` on module ${module}`}: expected an integer in [0, ${channelCount})`,
            ERRORS.INVALID_CHANNEL,
            module === undefined ? { channel, channelCount } : { channel, channelCount, module }
        );
        this.name = 'InvalidChannelError';
    }
}

export class InvalidRequestError extends ControlPlaneError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, ERRORS.INVALID_REQUEST, context);
        this.name = 'InvalidRequestError';
    }
}

export type BackendCommand = 'calibrate' | 'send_pulse' | 'send_two_channel_pulse' | 'read_state';

export class BackendCommandError extends ControlPlaneError {
    constructor(
        public readonly command: BackendCommand,
        public readonly channels: number[],
        cause: unknown,
        context: Record<string, unknown> = {}
    ) {
        super(`Backend ${command} failed on channel(s) ${channels.join(',')}: ${describeError(cause)}`, ERRORS.BACKEND_COMMAND_FAILURE, { command, channels, ...context }, cause);
        this.name = 'BackendCommandError';
    }
}

export class AuditWriteError extends ControlPlaneError {
    constructor(public readonly seq: number, public readonly attempts: number, cause: unknown) {
        super(`Audit entry #${seq} not persisted after ${attempts} attempt(s): ${describeError(cause)}`, ERRORS.AUDIT_WRITE_FAILURE, { seq, attempts }, cause);
        this.name = 'AuditWriteError';
    }
}

export function describeError(e: unknown): string {
    if (e instanceof Error) return e.message;
    return String(e);
}

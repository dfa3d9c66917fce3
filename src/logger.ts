/**
 * Component logger for the control plane.
 *
 * Environment:
 *   QCTL_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   QCTL_LOG_JSON   = 1 (default: text)
 *   QCTL_LOG_FILE   = path (optional, appends)
 *   QCTL_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogRecord {
    ts: string;
    level: LogLevel;
    component: string;
    msg: string;
    sid?: string;
    data?: Record<string, unknown>;
}

/** Lowest level that is emitted for the given environment. */
export function resolveMinLevel(env: Record<string, string | undefined>): LogLevel {
    if (env.QCTL_DEBUG === '1' || env.QCTL_DEBUG === 'true') return 'debug';
    const v = (env.QCTL_LOG_LEVEL || 'info').toLowerCase();
    return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' ? v : 'info';
}

export function formatText(record: LogRecord): string {
    const session = record.sid ? ` [${record.sid.slice(0, 8)}]` : '';
    const prefix = `[${record.ts}] [${record.level.toUpperCase().padEnd(5)}] [${record.component}]${session}`;
    return record.data ? `${prefix} ${record.msg} ${JSON.stringify(record.data)}` : `${prefix} ${record.msg}`;
}

export function formatJson(record: LogRecord): string {
    return JSON.stringify(record);
}

const MIN_ORDER = LEVEL_ORDER[resolveMinLevel(process.env)];
const format = process.env.QCTL_LOG_JSON === '1' ? formatJson : formatText;
const LOG_FILE = process.env.QCTL_LOG_FILE || '';

let fileOutputBroken = false;
let sessionId = '';

/** Tag every following line with a session id. Called by ControlPlane. */
export function setCorrelation(opts: { sessionId?: string }): void {
    if (opts.sessionId !== undefined) sessionId = opts.sessionId;
}

export function clearCorrelation(): void {
    sessionId = '';
}

function emit(level: LogLevel, component: string, msg: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < MIN_ORDER) return;

    const record: LogRecord = { ts: new Date().toISOString(), level, component, msg };
    if (sessionId) record.sid = sessionId;
    if (data) record.data = data;
    const line = format(record) + '\n';

    if (level === 'warn' || level === 'error') process.stderr.write(line);
    else process.stdout.write(line);

    if (LOG_FILE && !fileOutputBroken) {
        try {
            fs.appendFileSync(LOG_FILE, line);
        } catch (e) {
            // Report once, then stay on console only
            fileOutputBroken = true;
            process.stderr.write(`[logger] disabling QCTL_LOG_FILE=${LOG_FILE}: ${e instanceof Error ? e.message : String(e)}\n`);
        }
    }
}

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info: (msg, data) => emit('info', component, msg, data),
        warn: (msg, data) => emit('warn', component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}

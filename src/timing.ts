// Time helpers shared by dispatch, audit and the simulator.

export function nowIso(): string {
    return new Date().toISOString();
}

/**
 * ISO timestamp that is never earlier than `prevIso`, so a wall-clock step
 * backwards cannot reorder audit timestamps.
 */
export function monotonicNowIso(prevIso: string | null | undefined, now: Date = new Date()): string {
    if (!prevIso) return now.toISOString();
    const prev = Date.parse(prevIso);
    if (!Number.isFinite(prev)) return now.toISOString();
    return new Date(Math.max(prev, now.getTime())).toISOString();
}

export function sleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

/** Blocking sleep; only for short backoffs inside synchronous code paths. */
export function sleepSync(ms: number): void {
    if (ms <= 0) return;
    Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

export function backoff(attempt: number, baseMs: number, capMs = 1000): number {
    // base, 2*base, 4*base, ... capped
    return Math.min(baseMs * Math.pow(2, attempt), capMs);
}

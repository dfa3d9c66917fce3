/**
 * OperationQueue — the full requested history, in request order.
 *
 * Entries are accepted regardless of calibration; the queue records what was
 * asked for, the audit log records what actually ran. There is no removal API.
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from './logger';
import { nowIso } from './timing';
import type { Operation, OperationSpec } from './types';

const log = createLogger('queue');

export class OperationQueue implements Iterable<Operation> {
    private readonly ops: Operation[] = [];

    enqueue(spec: OperationSpec): Operation {
        const base = {
            id: uuidv4(),
            seq: this.ops.length,
            enqueuedAt: nowIso(),
            gate: spec.gate,
            delayMs: spec.delayMs ?? 0,
        };
        const op: Operation = spec.kind === 'two'
            ? { ...base, kind: 'two', channels: Object.freeze<[number, number]>([spec.channels[0], spec.channels[1]]) }
            : { ...base, kind: 'single', channels: Object.freeze([...spec.channels]) };
        Object.freeze(op);
        this.ops.push(op);
        log.debug('Operation enqueued', { seq: op.seq, kind: op.kind, gate: op.gate, channels: [...op.channels] });
        return op;
    }

    get length(): number {
        return this.ops.length;
    }

    at(index: number): Operation | undefined {
        return this.ops[index];
    }

    toArray(): readonly Operation[] {
        return this.ops.slice();
    }

    forChannel(channel: number): Operation[] {
        return this.ops.filter(op => op.channels.includes(channel));
    }

    [Symbol.iterator](): Iterator<Operation> {
        return this.toArray()[Symbol.iterator]();
    }
}

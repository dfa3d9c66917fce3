// src/audit/memory_sink.ts

import type { AuditEntry, AuditSink } from "../types";
import { stableStringify } from "./stable_stringify";

/** Keeps serialized lines in memory. Default sink when none is configured. */
export class MemoryAuditSink implements AuditSink {
    private readonly buffer: string[] = [];

    append(entry: AuditEntry): void {
        this.buffer.push(stableStringify(entry));
    }

    lines(): readonly string[] {
        return this.buffer.slice();
    }
}

// src/audit/jsonl_sink.ts

import * as fs from "fs";
import * as path from "path";
import type { FsyncMode } from "../config";
import { createLogger } from "../logger";
import type { AuditEntry, AuditSink } from "../types";
import { parseAuditRecord } from "./schema";
import { stableStringify } from "./stable_stringify";

const log = createLogger("audit:jsonl");

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

function errnoCode(e: unknown): string | undefined {
    if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
    return undefined;
}

export interface JsonlAuditSinkOptions {
    filePath: string;
    /** NONE skips fdatasync; BEST_EFFORT tolerates EPERM/EINVAL/EROFS; REQUIRED throws on any fsync error */
    fsyncMode?: FsyncMode;
}

/**
 * One canonical JSON record per line, opened in append mode. Existing lines
 * are never rewritten.
 *
 * An entry is written at most once. When only the fdatasync failed, a retried
 * append of the same entry re-runs the sync and writes nothing.
 */
export class JsonlAuditSink implements AuditSink {
    readonly filePath: string;
    private readonly fsyncMode: FsyncMode;
    private fd: number | null;
    private lastWrittenId: string | null = null;

    constructor(opts: JsonlAuditSinkOptions) {
        this.filePath = opts.filePath;
        this.fsyncMode = opts.fsyncMode ?? "BEST_EFFORT";
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o755 });
        this.fd = fs.openSync(this.filePath, "a", 0o644);
    }

    append(entry: AuditEntry): void {
        if (this.fd === null) {
            throw new Error(`AUDIT_SINK_CLOSED: ${this.filePath}`);
        }
        if (entry.id !== this.lastWrittenId) {
            fs.writeSync(this.fd, stableStringify(entry) + "\n");
            this.lastWrittenId = entry.id;
        }

        if (this.fsyncMode === "NONE") return;
        try {
            fs.fdatasyncSync(this.fd);
        } catch (e) {
            const code = errnoCode(e);
            if (this.fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
            log.warn(`FSYNC_WARN(${code || "UNKNOWN"})`, { file: this.filePath });
        }
    }

    close(): void {
        if (this.fd === null) return;
        const fd = this.fd;
        this.fd = null;
        fs.closeSync(fd);
    }
}

/** Parse a JSONL audit file back into entries, validating every line. */
export function readJsonlAudit(filePath: string): AuditEntry[] {
    const text = fs.readFileSync(filePath, "utf8");
    const out: AuditEntry[] = [];
    text.split("\n").forEach((line, i) => {
        if (!line.trim()) return;
        let raw: unknown;
        try {
            raw = JSON.parse(line);
        } catch (e) {
            throw new Error(`MALFORMED_AUDIT_RECORD at ${filePath}:${i + 1}: ${e instanceof Error ? e.message : String(e)}`);
        }
        out.push(parseAuditRecord(raw, `${filePath}:${i + 1}`));
    });
    return out;
}

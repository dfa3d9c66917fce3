// src/audit/index.ts

export { AuditLog } from "./audit_log";
export type { AuditLogOptions, WriteFailureListener } from "./audit_log";
export { MemoryAuditSink } from "./memory_sink";
export { JsonlAuditSink, readJsonlAudit } from "./jsonl_sink";
export type { JsonlAuditSinkOptions } from "./jsonl_sink";
export { AuditEntrySchema, parseAuditRecord } from "./schema";
export { stableStringify } from "./stable_stringify";

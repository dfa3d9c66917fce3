/**
 * Main entry point - exports all public APIs
 */

export { ControlPlane } from './control_plane';
export type { ControlPlaneOptions, ControlPlaneStatus } from './control_plane';
export { ChannelRegistry } from './channel_registry';
export type { ChannelRegistryOptions } from './channel_registry';
export { OperationQueue } from './operation_queue';
export { Dispatcher } from './dispatcher';
export type { DispatcherOptions } from './dispatcher';
export { ChannelWorkerPool } from './worker_pool';
export { MeasurementEngine } from './measurement_engine';
export { ModuleLayout } from './module_layout';
export type { MeasurementEngineOptions } from './measurement_engine';
export { decodeMajority, emptyCounts, isBit, outcomeCounts, OutcomeTally } from './majority_vote';
export { singleChannelOp, twoChannelOp, validateOperation } from './operations';
export {
    AuditLog,
    AuditEntrySchema,
    JsonlAuditSink,
    MemoryAuditSink,
    parseAuditRecord,
    readJsonlAudit,
    stableStringify,
} from './audit';
export type { AuditLogOptions, JsonlAuditSinkOptions, WriteFailureListener } from './audit';
export { SimulatedBackend, createRng } from './backends/simulated_backend';
export type { SimulatedBackendOptions, SimulatedLatency } from './backends/simulated_backend';
export { loadControlPlaneConfig, DEFAULT_CHANNEL_COUNT, DISPATCH, MEASUREMENT, AUDIT } from './config';
export type { ControlPlaneConfig, FsyncMode } from './config';
export {
    ERRORS,
    ControlPlaneError,
    InvalidChannelError,
    InvalidRequestError,
    BackendCommandError,
    AuditWriteError,
} from './errors';
export type { ErrorCode, BackendCommand } from './errors';
export { ProgramSchema, loadProgram, parseProgram, runProgram } from './program';
export type { Program, ProgramRun, MeasurementOutcome } from './program';
export { Mutex, Semaphore } from './mutex';
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export type * from './types';

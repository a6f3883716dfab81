/**
 * Main entry point - exports all public APIs
 */

export { createLogger, createMemorySink, consoleSink, formatEntry } from './logger';
export type { Logger, LoggerOptions, LogEntry, LogLevel, LogSink, MemorySink } from './logger';
export {
    loadMonitorConfig,
    validateConfig,
    freezeConfig,
    getConfigSummary,
    parseBooleanFlag,
    parseSeconds,
    DEFAULT_CONFIG,
    ENV_KEYS,
} from './config';
export type { MonitorConfig, TransportDebugFlags, LoadConfigOptions } from './config';
export {
    ConfigurationError,
    ExecutionInterrupted,
    JournalError,
    MonitorError,
    createStructuredFault,
    describeError,
} from './structured_error';
export type { FaultCode, FaultSeverity, StructuredFault } from './structured_error';
export type {
    ExecutionRecord,
    ExecutionOutcome,
    ExecutionEventSource,
    ExecutionHooks,
    InterruptCapability,
    PresentationChannel,
    MimeBundle,
    OpenExecution,
    SequenceNumber,
    TimerPhase,
    TimerSnapshot,
    TimerState,
} from './execution_types';
export { nodeScheduler, monotonicClock } from './scheduler';
export type { Scheduler, Clock } from './scheduler';
export { ExecutionTracker, deriveCellId, previewSource } from './execution_tracker';
export type { ExecutionTrackerOptions } from './execution_tracker';
export {
    MetadataPublisher,
    buildMetadataPayload,
    EXECUTION_METADATA_MIME_TYPE,
    EXECUTION_NOTICE_MIME_TYPE,
} from './metadata_publisher';
export type { ExecutionMetadataPayload, ExecutionNoticePayload, NoticeKind } from './metadata_publisher';
export { TimeoutMonitor } from './timeout_monitor';
export type { TimeoutMonitorOptions } from './timeout_monitor';
export { ExecutionMonitor, setupExecutionMonitoring } from './execution_monitor';
export type { ExecutionMonitorDeps, MonitoredHost } from './execution_monitor';
export { CellKernel, errorKindOf } from './kernel';
export type { CellBody, CellContext, CellKernelOptions, CellRequest, CellResult, SourceRunner } from './kernel';
export { WorkerSourceRunner } from './worker_isolator';
export type { WorkerSourceRunnerOptions } from './worker_isolator';
export { ExecutionJournal } from './execution_journal';
export type { JournalExecution, JournalNotice, JournalSummary } from './execution_journal';

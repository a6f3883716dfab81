/**
 * Shared execution-state types: records, timer state and the host seams the
 * monitor consumes.
 */

export type SequenceNumber = number;

/** Sealed once post_execute has been observed. */
export interface ExecutionRecord {
    readonly sequenceNumber: SequenceNumber;
    readonly cellId: string;
    readonly sourcePreview: string;
    /** Monotonic milliseconds. */
    readonly startTime: number;
    readonly endTime: number;
    readonly durationSeconds: number;
    readonly success: boolean;
    /** Present iff success is false. */
    readonly errorKind?: string;
}

/** The part of a record that exists while the execution is in flight. */
export interface OpenExecution {
    readonly sequenceNumber: SequenceNumber;
    readonly cellId: string;
    readonly sourcePreview: string;
    readonly startTime: number;
}

export type ExecutionOutcome =
    | { success: true }
    | { success: false; errorKind: string };

/* -------------------------------------------------------------------------- */
/* Timer state                                                                */
/* -------------------------------------------------------------------------- */

export type TimerPhase = 'ARMED' | 'WARNED' | 'TIMED_OUT' | 'INTERRUPTED' | 'DISARMED';

export interface TimerHandle {
    cancel(): void;
}

export interface TimerState {
    /** Sequence number this state guards (lookup key, not ownership). */
    readonly executionRef: SequenceNumber;
    readonly startTime: number;
    readonly sourcePreview: string;
    /** Absolute monotonic deadlines; null when that phase is skipped. */
    readonly warningDeadline: number | null;
    readonly timeoutDeadline: number | null;
    phase: TimerPhase;
    handles: TimerHandle[];
}

/** Frozen copy of a timer state, as handed to callers outside the monitor. */
export type TimerSnapshot = Readonly<Omit<TimerState, 'handles'>>;

/* -------------------------------------------------------------------------- */
/* Host seams                                                                 */
/* -------------------------------------------------------------------------- */

export interface PreExecuteEvent {
    cellId?: string;
    source: string;
}

export interface PostRunCellEvent {
    executionCount: number;
    success: boolean;
}

export interface ExecutionHooks {
    pre_run_cell: (source: string) => void;
    pre_execute: (event: PreExecuteEvent) => void;
    post_execute: (outcome: ExecutionOutcome) => void;
    post_run_cell: (event: PostRunCellEvent) => void;
}

export type HookName = keyof ExecutionHooks;

/** Lifecycle-hook registration, in the shape of an event emitter. */
export interface ExecutionEventSource {
    on<E extends HookName>(event: E, handler: ExecutionHooks[E]): unknown;
    off<E extends HookName>(event: E, handler: ExecutionHooks[E]): unknown;
}

export interface InterruptCapability {
    /** Best-effort delivery of a cancellation condition; false when nothing was interrupted. */
    interruptCurrentExecution(): boolean;
}

/** Display-data bundle keyed by MIME type. */
export type MimeBundle = Record<string, Record<string, unknown>>;

export interface PresentationChannel {
    publish(bundle: MimeBundle): void;
}

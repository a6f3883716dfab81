/**
 * Structured faults for the execution monitor.
 *
 * Observation, scheduling and escalation faults never reach the monitored
 * execution; they are recorded as machine-readable payloads attached to a
 * log line. Only configuration faults are thrown (at load time).
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type FaultCode =
    // Observation (log / publish)
    | 'OBSERVATION_FAULT'
    | 'PUBLISH_FAULT'
    | 'JOURNAL_FAULT'

    // Load time
    | 'CONFIGURATION_FAULT'
    | 'HOST_UNAVAILABLE'

    // Timer facility
    | 'SCHEDULING_FAULT'

    // Auto-interrupt path
    | 'ESCALATION_FAULT'
    | 'STALE_TARGET';

export type FaultSeverity = 'ERROR' | 'WARNING' | 'INFO';

export interface StructuredFault {
    code: FaultCode;
    message: string;
    severity: FaultSeverity;
    context: Record<string, unknown>;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Builders                                                                   */
/* -------------------------------------------------------------------------- */

export function createStructuredFault(
    code: FaultCode,
    message: string,
    context: Record<string, unknown> = {}
): StructuredFault {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        timestamp: new Date().toISOString(),
    };
}

function getSeverity(code: FaultCode): FaultSeverity {
    const errorCodes: FaultCode[] = ['CONFIGURATION_FAULT', 'HOST_UNAVAILABLE'];
    if (errorCodes.includes(code)) return 'ERROR';
    if (code === 'STALE_TARGET') return 'INFO';
    return 'WARNING';
}

/** Flattens a fault into log data. */
export function faultData(fault: StructuredFault): Record<string, unknown> {
    return { fault };
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class MonitorError extends Error {
    constructor(message: string, public readonly code: FaultCode, public readonly cause?: unknown) {
        super(message);
        this.name = 'MonitorError';
    }
}

export class ConfigurationError extends MonitorError {
    constructor(message: string, public readonly field?: string) {
        super(message, 'CONFIGURATION_FAULT');
        this.name = 'ConfigurationError';
    }
}

export class JournalError extends MonitorError {
    constructor(message: string, cause?: unknown) {
        super(message, 'JOURNAL_FAULT', cause);
        this.name = 'JournalError';
    }
}

/**
 * Cancellation condition delivered to a running cell. The name doubles as the
 * execution's error kind, so an auto-interrupt and a user interrupt look alike.
 */
export class ExecutionInterrupted extends Error {
    constructor(message = 'Execution interrupted') {
        super(message);
        this.name = 'Interrupted';
    }
}

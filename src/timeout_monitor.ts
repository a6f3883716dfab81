/**
 * Timeout Monitor — per-execution deadline state machine.
 *
 *   ARMED → WARNED → TIMED_OUT → INTERRUPTED
 *   any phase → DISARMED (terminal, on post_execute)
 *
 * Timer states live in an arena keyed by sequence number; deadline callbacks
 * capture the sequence number, never the state object, and look it up when
 * they fire. Every transition goes through advance(), which is the single
 * guard per state: a callback that finds its state gone or in a phase it
 * cannot leave does nothing. Callbacks and hooks each run to completion on
 * the event loop, so the phase check and the write cannot interleave.
 *
 * Failures here fail open: an execution whose timers cannot be scheduled
 * runs unmonitored, and an interrupt that cannot be delivered is not retried.
 */

import { createLogger, Logger } from './logger';
import { MonitorConfig } from './config';
import { Clock, monotonicClock, Scheduler, nodeScheduler } from './scheduler';
import { MetadataPublisher, NoticeKind } from './metadata_publisher';
import { escapeNewlines, formatSeconds, LOG_PREVIEW_CHARS } from './execution_tracker';
import {
    InterruptCapability,
    OpenExecution,
    SequenceNumber,
    TimerPhase,
    TimerSnapshot,
    TimerState,
} from './execution_types';
import { createStructuredFault, describeError, faultData } from './structured_error';

export interface TimeoutMonitorOptions {
    config: Readonly<MonitorConfig>;
    host: InterruptCapability;
    /** Sequence number of the execution currently running on the host. */
    currentExecution: () => SequenceNumber | null;
    publisher?: MetadataPublisher | null;
    scheduler?: Scheduler;
    clock?: Clock;
    logger?: Logger;
}

export class TimeoutMonitor {
    private readonly states = new Map<SequenceNumber, TimerState>();
    private readonly config: Readonly<MonitorConfig>;
    private readonly host: InterruptCapability;
    private readonly currentExecution: () => SequenceNumber | null;
    private readonly publisher: MetadataPublisher | null;
    private readonly scheduler: Scheduler;
    private readonly clock: Clock;
    private readonly log: Logger;

    constructor(options: TimeoutMonitorOptions) {
        this.config = options.config;
        this.host = options.host;
        this.currentExecution = options.currentExecution;
        this.publisher = options.publisher ?? null;
        this.scheduler = options.scheduler ?? nodeScheduler;
        this.clock = options.clock ?? monotonicClock;
        this.log = options.logger ?? createLogger('timeout');
    }

    /** Number of in-flight timer states. */
    get armedCount(): number {
        return this.states.size;
    }

    phaseOf(sequenceNumber: SequenceNumber): TimerPhase | undefined {
        return this.states.get(sequenceNumber)?.phase;
    }

    /**
     * Create the timer state for an execution and schedule its deadlines.
     * Returns a snapshot of the armed state, or null when monitoring is off or
     * degraded for this execution. Use phaseOf() to follow later transitions.
     */
    arm(execution: OpenExecution): TimerSnapshot | null {
        if (!this.config.enabled) return null;

        for (const orphan of [...this.states.keys()]) {
            if (orphan === execution.sequenceNumber) continue;
            this.log.warn('Disarming orphaned timer state', { count: orphan, next_count: execution.sequenceNumber });
            this.disarm(orphan);
        }
        this.disarm(execution.sequenceNumber);

        const warningMs = this.config.warningThresholdSeconds * 1000;
        const timeoutMs = this.config.timeoutThresholdSeconds * 1000;
        const state: TimerState = {
            executionRef: execution.sequenceNumber,
            startTime: execution.startTime,
            sourcePreview: execution.sourcePreview,
            warningDeadline: warningMs > 0 ? execution.startTime + warningMs : null,
            timeoutDeadline: timeoutMs > 0 ? execution.startTime + timeoutMs : null,
            phase: 'ARMED',
            handles: [],
        };
        this.states.set(state.executionRef, state);

        const ref = state.executionRef;
        try {
            const now = this.clock();
            if (state.warningDeadline !== null) {
                state.handles.push(this.scheduler.schedule(state.warningDeadline - now, () => this.onWarningDeadline(ref)));
            }
            if (state.timeoutDeadline !== null) {
                state.handles.push(this.scheduler.schedule(state.timeoutDeadline - now, () => this.onTimeoutDeadline(ref)));
            }
        } catch (err) {
            this.log.warn('Timeout monitoring degraded: execution runs unmonitored', faultData(createStructuredFault(
                'SCHEDULING_FAULT',
                describeError(err),
                { count: ref }
            )));
            this.disarm(ref);
            return null;
        }

        this.log.debug('Timeout monitoring armed', {
            count: ref,
            warning_s: this.config.warningThresholdSeconds,
            timeout_s: this.config.timeoutThresholdSeconds,
            auto_interrupt: this.config.autoInterruptEnabled,
        });
        return snapshot(state);
    }

    /**
     * Terminal transition. Cancels pending callbacks without waiting for one
     * that may already be running; late callbacks find no state and return.
     * Returns the phase the state was in, or null if nothing was armed.
     */
    disarm(sequenceNumber: SequenceNumber): TimerPhase | null {
        const state = this.states.get(sequenceNumber);
        if (!state) return null;

        const previous = state.phase;
        state.phase = 'DISARMED';
        this.states.delete(sequenceNumber);

        for (const handle of state.handles) {
            try {
                handle.cancel();
            } catch (err) {
                this.log.debug('Timer cancel failed (guarded by phase)', { count: sequenceNumber, error: describeError(err) });
            }
        }
        state.handles = [];

        this.log.debug('Timeout monitoring disarmed', { count: sequenceNumber, phase: previous });
        return previous;
    }

    /** Disarm everything, e.g. when detaching from the host. */
    disarmAll(): void {
        for (const sequenceNumber of [...this.states.keys()]) {
            this.disarm(sequenceNumber);
        }
    }

    /* ------------------------------------------------------------------------ */
    /* Deadline callbacks                                                       */
    /* ------------------------------------------------------------------------ */

    private onWarningDeadline(sequenceNumber: SequenceNumber): void {
        try {
            const state = this.states.get(sequenceNumber);
            if (!state || !this.advance(state, ['ARMED'], 'WARNED')) return;

            const elapsed = this.elapsedSeconds(state);
            this.log.warn(
                `LONG_EXECUTION | count=${sequenceNumber} | elapsed=${formatSeconds(elapsed, 1)}s | threshold=${formatSeconds(this.config.warningThresholdSeconds, 1)}s`,
                { preview: escapeNewlines(state.sourcePreview.slice(0, LOG_PREVIEW_CHARS)) }
            );
            this.notify(state, 'warning', elapsed, this.config.warningThresholdSeconds, false);
        } catch (err) {
            this.reportCallbackFault('warning', sequenceNumber, err);
        }
    }

    private onTimeoutDeadline(sequenceNumber: SequenceNumber): void {
        try {
            const state = this.states.get(sequenceNumber);
            if (!state || !this.advance(state, ['ARMED', 'WARNED'], 'TIMED_OUT')) return;

            const elapsed = this.elapsedSeconds(state);
            const autoInterrupt = this.config.autoInterruptEnabled;
            const line = `TIMEOUT_INTERRUPT | count=${sequenceNumber} | elapsed=${formatSeconds(elapsed, 1)}s`;
            const data = { threshold_s: this.config.timeoutThresholdSeconds, auto_interrupt: autoInterrupt };
            if (autoInterrupt) {
                this.log.error(line, data);
            } else {
                this.log.warn(line, data);
            }

            this.notify(state, 'timeout', elapsed, this.config.timeoutThresholdSeconds, autoInterrupt);
            if (autoInterrupt) this.requestInterrupt(state);
        } catch (err) {
            this.reportCallbackFault('timeout', sequenceNumber, err);
        }
    }

    private requestInterrupt(state: TimerState): void {
        const active = this.currentExecution();
        if (active !== state.executionRef) {
            this.log.info('Interrupt suppressed: target is no longer the running execution', faultData(createStructuredFault(
                'STALE_TARGET',
                'stale interrupt target',
                { count: state.executionRef, active_count: active }
            )));
            return;
        }
        if (!this.advance(state, ['TIMED_OUT'], 'INTERRUPTED')) return;

        try {
            const delivered = this.host.interruptCurrentExecution();
            if (!delivered) {
                this.log.warn('Interrupt not delivered: host reported no running execution', faultData(createStructuredFault(
                    'ESCALATION_FAULT',
                    'interrupt not delivered',
                    { count: state.executionRef }
                )));
            }
        } catch (err) {
            this.log.error('Failed to deliver interrupt', faultData(createStructuredFault(
                'ESCALATION_FAULT',
                describeError(err),
                { count: state.executionRef }
            )));
        }
    }

    /* ------------------------------------------------------------------------ */
    /* Internal                                                                 */
    /* ------------------------------------------------------------------------ */

    private advance(state: TimerState, from: readonly TimerPhase[], to: TimerPhase): boolean {
        if (!from.includes(state.phase)) return false;
        state.phase = to;
        return true;
    }

    private elapsedSeconds(state: TimerState): number {
        return Math.max(0, (this.clock() - state.startTime) / 1000);
    }

    private notify(state: TimerState, kind: NoticeKind, elapsed: number, threshold: number, interruptRequested: boolean): void {
        this.publisher?.publishNotice({
            execution_count: state.executionRef,
            kind,
            elapsed_seconds: elapsed,
            threshold_seconds: threshold,
            code_preview: state.sourcePreview.slice(0, LOG_PREVIEW_CHARS),
            interrupt_requested: interruptRequested,
        });
    }

    private reportCallbackFault(deadline: string, sequenceNumber: SequenceNumber, err: unknown): void {
        try {
            this.log.error(`Deadline callback failed (${deadline})`, faultData(createStructuredFault(
                'OBSERVATION_FAULT',
                describeError(err),
                { count: sequenceNumber }
            )));
        } catch (logErr) {
            process.stderr.write(`[cellwatch] ${deadline} callback fault for execution ${sequenceNumber}: ${describeError(logErr)}\n`);
        }
    }
}

function snapshot(state: TimerState): TimerSnapshot {
    return Object.freeze({
        executionRef: state.executionRef,
        startTime: state.startTime,
        sourcePreview: state.sourcePreview,
        warningDeadline: state.warningDeadline,
        timeoutDeadline: state.timeoutDeadline,
        phase: state.phase,
    });
}

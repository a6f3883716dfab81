/**
 * Wires the tracker, publisher and (optionally) the timeout monitor onto a
 * host's lifecycle hooks.
 *
 * Hook order per execution:
 *   pre_execute  → tracker (EXEC_START) → timeout monitor arm
 *   post_execute → timeout monitor disarm → tracker (EXEC_END) → publish
 * Disarming before EXEC_END keeps warning/timeout lines inside the
 * START..END window of their execution.
 */

import { createLogger, Logger } from './logger';
import { getConfigSummary, MonitorConfig } from './config';
import { Clock, Scheduler } from './scheduler';
import { ExecutionTracker } from './execution_tracker';
import { MetadataPublisher } from './metadata_publisher';
import { TimeoutMonitor } from './timeout_monitor';
import {
    ExecutionEventSource,
    ExecutionHooks,
    ExecutionOutcome,
    InterruptCapability,
    PostRunCellEvent,
    PreExecuteEvent,
    PresentationChannel,
} from './execution_types';
import { createStructuredFault, describeError, faultData } from './structured_error';

export interface ExecutionMonitorDeps {
    /** Presentation channel(s) receiving metadata and notices. */
    channels: PresentationChannel | PresentationChannel[];
    logger?: Logger;
    scheduler?: Scheduler;
    clock?: Clock;
}

export type MonitoredHost = ExecutionEventSource & InterruptCapability;

export class ExecutionMonitor {
    readonly tracker: ExecutionTracker;
    readonly publisher: MetadataPublisher;
    /** Present only when timeout monitoring is enabled. */
    readonly timeouts: TimeoutMonitor | null;

    private readonly log: Logger;
    private source: ExecutionEventSource | null = null;

    private readonly hooks: ExecutionHooks = {
        pre_run_cell: (source: string) => this.tracker.onPreRunCell(source),
        pre_execute: (event: PreExecuteEvent) => this.onPreExecute(event),
        post_execute: (outcome: ExecutionOutcome) => this.onPostExecute(outcome),
        post_run_cell: (event: PostRunCellEvent) => this.tracker.onPostRunCell(event),
    };

    constructor(readonly config: Readonly<MonitorConfig>, host: InterruptCapability, deps: ExecutionMonitorDeps) {
        this.log = deps.logger ?? createLogger('cellwatch');
        this.publisher = new MetadataPublisher(deps.channels, { logger: this.log.child('publisher') });
        this.tracker = new ExecutionTracker({
            publisher: this.publisher,
            logger: this.log.child('tracker'),
            clock: deps.clock,
        });
        this.timeouts = config.enabled
            ? new TimeoutMonitor({
                config,
                host,
                currentExecution: () => this.tracker.activeSequence,
                publisher: this.publisher,
                scheduler: deps.scheduler,
                clock: deps.clock,
                logger: this.log.child('timeout'),
            })
            : null;
    }

    get attached(): boolean {
        return this.source !== null;
    }

    attach(source: ExecutionEventSource): void {
        if (this.source) this.detach();
        source.on('pre_run_cell', this.hooks.pre_run_cell);
        source.on('pre_execute', this.hooks.pre_execute);
        source.on('post_execute', this.hooks.post_execute);
        source.on('post_run_cell', this.hooks.post_run_cell);
        this.source = source;
        this.log.info('Execution tracking initialized');
        if (this.timeouts) {
            this.log.info('Execution timeout monitor initialized', getConfigSummary(this.config));
        }
    }

    detach(): void {
        const source = this.source;
        if (!source) return;
        source.off('pre_run_cell', this.hooks.pre_run_cell);
        source.off('pre_execute', this.hooks.pre_execute);
        source.off('post_execute', this.hooks.post_execute);
        source.off('post_run_cell', this.hooks.post_run_cell);
        this.timeouts?.disarmAll();
        this.source = null;
    }

    private onPreExecute(event: PreExecuteEvent): void {
        const open = this.tracker.onPreExecute(event);
        if (!open || !this.timeouts) return;
        try {
            this.timeouts.arm(open);
        } catch (err) {
            this.log.warn('Timeout monitoring degraded: execution runs unmonitored', faultData(createStructuredFault(
                'SCHEDULING_FAULT',
                describeError(err),
                { count: open.sequenceNumber }
            )));
        }
    }

    private onPostExecute(outcome: ExecutionOutcome): void {
        const active = this.tracker.activeSequence;
        if (this.timeouts && active !== null) {
            try {
                this.timeouts.disarm(active);
            } catch (err) {
                this.log.error('Failed to disarm timeout monitoring', faultData(createStructuredFault(
                    'OBSERVATION_FAULT',
                    describeError(err),
                    { count: active }
                )));
            }
        }
        this.tracker.onPostExecute(outcome);
    }
}

/**
 * Register execution tracking (always) and timeout monitoring (when enabled)
 * on the host. Never throws: a missing host or a setup failure is logged and
 * yields null.
 */
export function setupExecutionMonitoring(
    host: MonitoredHost | null | undefined,
    config: Readonly<MonitorConfig>,
    deps: ExecutionMonitorDeps
): ExecutionMonitor | null {
    const log = deps.logger ?? createLogger('cellwatch');
    if (!host) {
        log.warn('Execution host not available, skipping execution monitoring setup', faultData(
            createStructuredFault('HOST_UNAVAILABLE', 'no execution host')
        ));
        return null;
    }

    try {
        const monitor = new ExecutionMonitor(config, host, { ...deps, logger: log });
        monitor.attach(host);
        return monitor;
    } catch (err) {
        log.error('Failed to set up execution monitoring', faultData(
            createStructuredFault('OBSERVATION_FAULT', describeError(err))
        ));
        return null;
    }
}

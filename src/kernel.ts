/**
 * CellKernel — in-process execution host.
 *
 * Runs cells strictly one at a time and emits the lifecycle hooks the monitor
 * subscribes to:
 *
 *   pre_run_cell → pre_execute → <cell body> → post_execute → post_run_cell
 *
 * pre_execute and post_execute are always paired, whether the body returns,
 * throws or is interrupted. Interruption is cooperative for callable bodies
 * (AbortSignal, checkpoint(), sleep()); source cells go through a
 * SourceRunner, which may preempt harder (see worker_isolator).
 */

import { EventEmitter } from 'events';
import { createLogger, Logger } from './logger';
import { TransportDebugFlags } from './config';
import {
    ExecutionHooks,
    ExecutionOutcome,
    HookName,
    InterruptCapability,
    MimeBundle,
    PresentationChannel,
} from './execution_types';
import { describeError, ExecutionInterrupted } from './structured_error';

export interface CellContext {
    readonly signal: AbortSignal;
    readonly executionCount: number;
    /** Raises the pending interrupt, if any. */
    checkpoint(): void;
    /** Sleep that ends early, rejecting, when the cell is interrupted. */
    sleep(ms: number): Promise<void>;
}

export type CellBody = (ctx: CellContext) => unknown;

export interface SourceRunner {
    run(source: string, signal: AbortSignal): Promise<unknown>;
}

export interface CellRequest {
    cellId?: string;
    /** Source text; required when no body is given. */
    source?: string;
    body?: CellBody;
}

export interface CellResult {
    executionCount: number;
    success: boolean;
    value?: unknown;
    error?: unknown;
    errorKind?: string;
    /** Display bundles published while the cell was running (hooks included). */
    displays: MimeBundle[];
}

export interface CellKernelOptions {
    runner?: SourceRunner;
    debug?: Partial<TransportDebugFlags>;
    logger?: Logger;
}

interface ActiveCell {
    executionCount: number;
    controller: AbortController;
    displays: MimeBundle[];
}

export function errorKindOf(err: unknown): string {
    return err instanceof Error && err.name ? err.name : 'Error';
}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        if (signal.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(signal.reason);
        };
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal.addEventListener('abort', onAbort, { once: true });
    });
}

export class CellKernel extends EventEmitter implements InterruptCapability, PresentationChannel {
    private readonly runner: SourceRunner | null;
    private readonly debug: TransportDebugFlags;
    private readonly log: Logger;

    private queue: Promise<void> = Promise.resolve();
    private active: ActiveCell | null = null;
    private executionCount = 0;
    private closed = false;

    constructor(options: CellKernelOptions = {}) {
        super();
        this.runner = options.runner ?? null;
        this.debug = { events: options.debug?.events ?? false, display: options.debug?.display ?? false };
        this.log = options.logger ?? createLogger('kernel');
    }

    get busy(): boolean {
        return this.active !== null;
    }

    /** Queue a cell; resolves once it has run and all hooks have fired. */
    execute(request: CellRequest): Promise<CellResult> {
        const run = this.queue.then(() => this.runCell(request));
        // keep the queue alive past a failed cell; the caller still sees the rejection
        this.queue = run.then(
            () => undefined,
            (err: unknown) => { this.log.error('Cell runner failed outside the cell body', { error: describeError(err) }); }
        );
        return run;
    }

    interruptCurrentExecution(): boolean {
        const active = this.active;
        if (!active || active.controller.signal.aborted) return false;
        this.log.info('Interrupting execution', { execution_count: active.executionCount });
        active.controller.abort(new ExecutionInterrupted());
        return true;
    }

    publish(bundle: MimeBundle): void {
        if (this.closed) {
            throw new Error('Presentation channel closed');
        }
        if (this.debug.display) {
            this.log.info('display_data', { mime_types: Object.keys(bundle), execution_count: this.active?.executionCount ?? null });
        }
        this.active?.displays.push(bundle);
        this.emit('display_data', bundle);
    }

    /** Close the presentation channel; later publishes throw. */
    close(): void {
        this.closed = true;
    }

    private async runCell(request: CellRequest): Promise<CellResult> {
        const source = request.source ?? '';
        const executionCount = ++this.executionCount;
        const active: ActiveCell = { executionCount, controller: new AbortController(), displays: [] };
        const signal = active.controller.signal;

        this.emitHook('pre_run_cell', source);
        this.active = active;
        this.emitHook('pre_execute', { cellId: request.cellId, source });

        const ctx: CellContext = {
            signal,
            executionCount,
            checkpoint: () => signal.throwIfAborted(),
            sleep: (ms: number) => abortableSleep(ms, signal),
        };

        let result: CellResult;
        try {
            const value = await this.invoke(request, source, ctx);
            result = { executionCount, success: true, value, displays: active.displays };
        } catch (err) {
            result = { executionCount, success: false, error: err, errorKind: errorKindOf(err), displays: active.displays };
        }

        const outcome: ExecutionOutcome = result.success
            ? { success: true }
            : { success: false, errorKind: result.errorKind ?? 'Error' };
        this.emitHook('post_execute', outcome);
        this.active = null;
        this.emitHook('post_run_cell', { executionCount, success: result.success });
        return result;
    }

    private async invoke(request: CellRequest, source: string, ctx: CellContext): Promise<unknown> {
        if (request.body) return await request.body(ctx);
        if (!this.runner) throw new Error('No source runner configured for source cells');
        return await this.runner.run(source, ctx.signal);
    }

    private emitHook<E extends HookName>(event: E, ...args: Parameters<ExecutionHooks[E]>): void {
        if (this.debug.events) {
            this.log.info(`event ${event}`, { execution_count: this.executionCount });
        }
        try {
            this.emit(event, ...args);
        } catch (err) {
            this.log.error(`Hook handler for ${event} threw`, { error: describeError(err) });
        }
    }
}

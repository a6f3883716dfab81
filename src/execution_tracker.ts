/**
 * Execution Tracker — one record per unit of execution.
 *
 * Subscribed to the host's pre/post hooks. Allocates sequence numbers, logs
 * EXEC_START / EXEC_END and hands sealed records to the Metadata Publisher.
 *
 * INVARIANT: hooks never throw into the host. Observation must not block the
 * observed execution.
 */

import * as crypto from 'crypto';
import { LRUCache } from 'lru-cache';
import { createLogger, Logger } from './logger';
import { Clock, monotonicClock } from './scheduler';
import { MetadataPublisher } from './metadata_publisher';
import {
    ExecutionOutcome,
    ExecutionRecord,
    OpenExecution,
    PostRunCellEvent,
    PreExecuteEvent,
    SequenceNumber,
} from './execution_types';
import { createStructuredFault, describeError, faultData } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Previews & identifiers                                                     */
/* -------------------------------------------------------------------------- */

export const PREVIEW_CHARS = 100;
export const LOG_PREVIEW_CHARS = 50;
export const RUN_PREVIEW_CHARS = 30;
const EMPTY_PREVIEW = '<empty>';
const UNKNOWN_CELL_ID = 'unknown';
const CELL_ID_DIGEST_CHARS = 12;

export function previewSource(source: string, maxChars: number = PREVIEW_CHARS): string {
    return source ? source.slice(0, maxChars) : EMPTY_PREVIEW;
}

export function escapeNewlines(text: string): string {
    return text.replace(/\r?\n/g, '\\n');
}

export function formatSeconds(seconds: number, digits: number): string {
    return seconds.toFixed(digits);
}

// byte-aware: keyed by full source text, so bound by source size, not entry count
const cellIdCache = new LRUCache<string, string>({
    maxSize: 8 * 1024 * 1024,
    sizeCalculation: (_digest: string, source: string) => Math.max(1, source.length),
});

/** Stable identifier for a cell the host did not name. */
export function deriveCellId(source: string): string {
    if (!source) return UNKNOWN_CELL_ID;
    const cached = cellIdCache.get(source);
    if (cached) return cached;
    const digest = crypto.createHash('sha256').update(source, 'utf8').digest('hex').slice(0, CELL_ID_DIGEST_CHARS);
    cellIdCache.set(source, digest);
    return digest;
}

/* -------------------------------------------------------------------------- */
/* Tracker                                                                    */
/* -------------------------------------------------------------------------- */

export interface ExecutionTrackerOptions {
    /** null disables publication (records are still logged). */
    publisher: MetadataPublisher | null;
    logger?: Logger;
    clock?: Clock;
}

export class ExecutionTracker {
    private sequence: SequenceNumber = 0;
    private current: OpenExecution | null = null;
    private readonly publisher: MetadataPublisher | null;
    private readonly log: Logger;
    private readonly clock: Clock;

    constructor(options: ExecutionTrackerOptions) {
        this.publisher = options.publisher;
        this.log = options.logger ?? createLogger('tracker');
        this.clock = options.clock ?? monotonicClock;
    }

    /** Sequence number of the in-flight execution, if any. */
    get activeSequence(): SequenceNumber | null {
        return this.current ? this.current.sequenceNumber : null;
    }

    /** Number of sequence numbers handed out so far. */
    get executionCount(): number {
        return this.sequence;
    }

    onPreExecute(event: PreExecuteEvent): OpenExecution | null {
        try {
            if (this.current) {
                this.safeLog(() => this.log.warn('EXEC_START while a previous execution is still open', {
                    open_count: this.current?.sequenceNumber,
                }));
            }

            const source = event.source ?? '';
            const open: OpenExecution = Object.freeze({
                sequenceNumber: ++this.sequence,
                cellId: event.cellId || deriveCellId(source),
                sourcePreview: previewSource(source),
                startTime: this.clock(),
            });
            this.current = open;

            this.safeLog(() => this.log.info(
                `EXEC_START | count=${open.sequenceNumber} | cell_id=${open.cellId} | preview=${escapeNewlines(open.sourcePreview.slice(0, LOG_PREVIEW_CHARS))}`
            ));
            return open;
        } catch (err) {
            this.reportFault('pre_execute', err);
            return null;
        }
    }

    onPostExecute(outcome: ExecutionOutcome): ExecutionRecord | null {
        try {
            const endTime = this.clock();
            let open = this.current;
            if (!open) {
                this.safeLog(() => this.log.warn('EXEC_END called without matching EXEC_START'));
                open = {
                    sequenceNumber: ++this.sequence,
                    cellId: UNKNOWN_CELL_ID,
                    sourcePreview: EMPTY_PREVIEW,
                    startTime: endTime,
                };
            }
            this.current = null;

            const record = sealRecord(open, endTime, outcome);
            const errorSuffix = record.errorKind ? ` | error=${record.errorKind}` : '';
            this.safeLog(() => this.log.info(
                `EXEC_END | count=${record.sequenceNumber} | duration=${formatSeconds(record.durationSeconds, 2)}s | success=${record.success}${errorSuffix}`
            ));

            this.publisher?.publish(record);
            return record;
        } catch (err) {
            this.current = null;
            this.reportFault('post_execute', err);
            return null;
        }
    }

    onPreRunCell(source: string): void {
        this.safeLog(() => this.log.debug(`PRE_RUN | preview=${escapeNewlines(previewSource(source, RUN_PREVIEW_CHARS))}`));
    }

    onPostRunCell(event: PostRunCellEvent): void {
        this.safeLog(() => this.log.debug(`POST_RUN | exec_count=${event.executionCount}`));
    }

    private safeLog(write: () => void): void {
        try {
            write();
        } catch (err) {
            process.stderr.write(`[cellwatch] tracker log sink failed: ${describeError(err)}\n`);
        }
    }

    private reportFault(hook: string, err: unknown): void {
        this.safeLog(() => this.log.error(`Execution tracking fault in ${hook}`, faultData(
            createStructuredFault('OBSERVATION_FAULT', describeError(err), { hook })
        )));
    }
}

function sealRecord(open: OpenExecution, endTime: number, outcome: ExecutionOutcome): ExecutionRecord {
    const elapsed = (endTime - open.startTime) / 1000;
    const durationSeconds = Number.isFinite(elapsed) && elapsed > 0 ? elapsed : 0;
    const base = {
        sequenceNumber: open.sequenceNumber,
        cellId: open.cellId,
        sourcePreview: open.sourcePreview,
        startTime: open.startTime,
        endTime: Math.max(endTime, open.startTime),
        durationSeconds,
    };
    if (outcome.success) {
        return Object.freeze({ ...base, success: true });
    }
    return Object.freeze({ ...base, success: false, errorKind: outcome.errorKind || 'Error' });
}

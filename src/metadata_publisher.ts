/**
 * Metadata Publisher — hands execution results and timeout notices to the
 * host's presentation channel(s) as tagged display bundles.
 *
 * INVARIANT: publishing never throws. A closed channel or a serialization
 * failure is logged once for that delivery and dropped.
 */

import { createLogger, Logger } from './logger';
import { ExecutionRecord, PresentationChannel, SequenceNumber } from './execution_types';
import { createStructuredFault, describeError, faultData } from './structured_error';

export const EXECUTION_METADATA_MIME_TYPE = 'application/vnd.cellwatch.execution-metadata+json';
export const EXECUTION_NOTICE_MIME_TYPE = 'application/vnd.cellwatch.execution-notice+json';

export type ExecutionMetadataPayload = {
    execution_count: SequenceNumber;
    duration_seconds: number;
    success: boolean;
    error_kind?: string;
    timestamp: string;
};

export type NoticeKind = 'warning' | 'timeout';

export type ExecutionNoticePayload = {
    execution_count: SequenceNumber;
    kind: NoticeKind;
    elapsed_seconds: number;
    threshold_seconds: number;
    code_preview: string;
    interrupt_requested: boolean;
};

export function buildMetadataPayload(record: ExecutionRecord, now: Date = new Date()): ExecutionMetadataPayload {
    const payload: ExecutionMetadataPayload = {
        execution_count: record.sequenceNumber,
        duration_seconds: record.durationSeconds,
        success: record.success,
        timestamp: now.toISOString(),
    };
    if (!record.success && record.errorKind) payload.error_kind = record.errorKind;
    return payload;
}

export interface MetadataPublisherOptions {
    logger?: Logger;
}

export class MetadataPublisher {
    private readonly channels: PresentationChannel[];
    private readonly log: Logger;

    constructor(channels: PresentationChannel | PresentationChannel[], options: MetadataPublisherOptions = {}) {
        this.channels = Array.isArray(channels) ? [...channels] : [channels];
        this.log = options.logger ?? createLogger('publisher');
    }

    /** Publish a sealed execution record. */
    publish(record: ExecutionRecord): void {
        let payload: ExecutionMetadataPayload;
        try {
            payload = buildMetadataPayload(record);
        } catch (err) {
            this.reportFailure('metadata', record.sequenceNumber, err);
            return;
        }
        this.deliver(EXECUTION_METADATA_MIME_TYPE, payload, 'metadata', record.sequenceNumber);
    }

    /** Best-effort warning/timeout notice for an in-flight execution. */
    publishNotice(notice: ExecutionNoticePayload): void {
        this.deliver(EXECUTION_NOTICE_MIME_TYPE, notice, `${notice.kind} notice`, notice.execution_count);
    }

    private deliver(
        mimeType: string,
        payload: ExecutionMetadataPayload | ExecutionNoticePayload,
        what: string,
        sequenceNumber: SequenceNumber
    ): void {
        let body: Record<string, unknown>;
        try {
            // Detached copy; also surfaces values the channel could not serialize
            body = JSON.parse(JSON.stringify(payload));
        } catch (err) {
            this.reportFailure(what, sequenceNumber, err);
            return;
        }

        for (const channel of this.channels) {
            try {
                channel.publish({ [mimeType]: body });
            } catch (err) {
                this.reportFailure(what, sequenceNumber, err);
            }
        }
    }

    private reportFailure(what: string, sequenceNumber: SequenceNumber, err: unknown): void {
        try {
            this.log.error(`Failed to publish execution ${what}`, faultData(createStructuredFault(
                'PUBLISH_FAULT',
                describeError(err),
                { execution_count: sequenceNumber }
            )));
        } catch (logErr) {
            process.stderr.write(`[cellwatch] publish failure for execution ${sequenceNumber} could not be logged: ${describeError(logErr)}\n`);
        }
    }
}

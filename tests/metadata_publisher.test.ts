import test from 'node:test';
import assert from 'node:assert/strict';

import {
    buildMetadataPayload,
    EXECUTION_METADATA_MIME_TYPE,
    EXECUTION_NOTICE_MIME_TYPE,
    MetadataPublisher,
} from '../src/metadata_publisher';
import { createLogger, createMemorySink } from '../src/logger';
import { ExecutionRecord, MimeBundle, PresentationChannel } from '../src/execution_types';
import { FakeHost } from './helpers/manual_timing';

const okRecord: ExecutionRecord = {
    sequenceNumber: 4,
    cellId: 'abc',
    sourcePreview: 'x',
    startTime: 0,
    endTime: 2000,
    durationSeconds: 2,
    success: true,
};

const failedRecord: ExecutionRecord = { ...okRecord, sequenceNumber: 5, success: false, errorKind: 'Interrupted' };

const closedChannel: PresentationChannel = {
    publish: (_bundle: MimeBundle) => { throw new Error('Presentation channel closed'); },
};

test('builds the metadata payload from a record', () => {
    const now = new Date('2026-03-01T12:00:00.000Z');
    assert.deepEqual(buildMetadataPayload(okRecord, now), {
        execution_count: 4,
        duration_seconds: 2,
        success: true,
        timestamp: '2026-03-01T12:00:00.000Z',
    });
    assert.deepEqual(buildMetadataPayload(failedRecord, now), {
        execution_count: 5,
        duration_seconds: 2,
        success: false,
        error_kind: 'Interrupted',
        timestamp: '2026-03-01T12:00:00.000Z',
    });
});

test('publishes one tagged bundle per record', () => {
    const host = new FakeHost();
    new MetadataPublisher(host).publish(failedRecord);

    assert.equal(host.displays.length, 1);
    assert.deepEqual(Object.keys(host.displays[0]), [EXECUTION_METADATA_MIME_TYPE]);
    const payload = host.displays[0][EXECUTION_METADATA_MIME_TYPE];
    assert.equal(payload.execution_count, 5);
    assert.equal(payload.error_kind, 'Interrupted');
});

test('publishes notices under their own MIME type', () => {
    const host = new FakeHost();
    const notice = {
        execution_count: 2,
        kind: 'timeout' as const,
        elapsed_seconds: 300,
        threshold_seconds: 300,
        code_preview: 'train()',
        interrupt_requested: true,
    };
    new MetadataPublisher(host).publishNotice(notice);

    assert.deepEqual(host.displays, [{ [EXECUTION_NOTICE_MIME_TYPE]: notice }]);
});

test('a closed channel is logged once and does not throw', () => {
    const mem = createMemorySink();
    const publisher = new MetadataPublisher(closedChannel, { logger: createLogger('publisher', { sink: mem.sink }) });

    assert.doesNotThrow(() => publisher.publish(okRecord));
    assert.deepEqual(mem.messages('error'), ['Failed to publish execution metadata']);

    const fault = mem.entries[0].data?.fault;
    assert.ok(fault && typeof fault === 'object' && 'code' in fault && 'context' in fault);
    assert.equal(fault.code, 'PUBLISH_FAULT');
    assert.deepEqual(fault.context, { execution_count: 4 });
});

test('a failing channel does not starve the others', () => {
    const mem = createMemorySink();
    const host = new FakeHost();
    const publisher = new MetadataPublisher([closedChannel, host], { logger: createLogger('publisher', { sink: mem.sink }) });

    publisher.publishNotice({
        execution_count: 1,
        kind: 'warning',
        elapsed_seconds: 5,
        threshold_seconds: 5,
        code_preview: '',
        interrupt_requested: false,
    });

    assert.equal(host.displays.length, 1);
    assert.deepEqual(mem.messages('error'), ['Failed to publish execution warning notice']);
});

test('channels receive a copy detached from the caller', () => {
    const host = new FakeHost();
    const notice = {
        execution_count: 3,
        kind: 'warning' as const,
        elapsed_seconds: 5,
        threshold_seconds: 5,
        code_preview: 'x',
        interrupt_requested: false,
    };
    new MetadataPublisher(host).publishNotice(notice);
    notice.code_preview = 'changed';

    assert.equal(host.displays[0][EXECUTION_NOTICE_MIME_TYPE].code_preview, 'x');
});

import test from 'node:test';
import assert from 'node:assert/strict';

import { createLogger, createMemorySink, formatEntry, LogEntry } from '../src/logger';

const entry: LogEntry = {
    ts: '2026-01-01T00:00:00.000Z',
    level: 'warn',
    component: 'tracker',
    msg: 'EXEC_START while a previous execution is still open',
};

test('formatEntry renders a padded text line', () => {
    assert.equal(
        formatEntry(entry, false),
        '[2026-01-01T00:00:00.000Z] [WARN ] [tracker] EXEC_START while a previous execution is still open'
    );
    assert.equal(
        formatEntry({ ...entry, level: 'info', data: { open_count: 3 } }, false),
        '[2026-01-01T00:00:00.000Z] [INFO ] [tracker] EXEC_START while a previous execution is still open {"open_count":3}'
    );
});

test('formatEntry renders JSONL when asked', () => {
    assert.equal(
        formatEntry({ ...entry, data: { open_count: 3 } }, true),
        '{"ts":"2026-01-01T00:00:00.000Z","level":"warn","component":"tracker","msg":"EXEC_START while a previous execution is still open","data":{"open_count":3}}'
    );
});

test('entries below the minimum level are dropped', () => {
    const mem = createMemorySink();
    const log = createLogger('timeout', { sink: mem.sink, level: 'warn' });

    log.debug('armed');
    log.info('disarmed');
    log.warn('LONG_EXECUTION');
    log.error('TIMEOUT_INTERRUPT');

    assert.deepEqual(mem.messages(), ['LONG_EXECUTION', 'TIMEOUT_INTERRUPT']);
    assert.deepEqual(mem.messages('error'), ['TIMEOUT_INTERRUPT']);
});

test('child loggers share the sink and prefix the component', () => {
    const mem = createMemorySink();
    const root = createLogger('cellwatch', { sink: mem.sink, level: 'debug' });

    root.child('tracker').info('EXEC_END', { count: 1 });
    root.child('timeout').child('deadline').debug('fired');

    assert.deepEqual(mem.entries.map(e => e.component), ['cellwatch:tracker', 'cellwatch:timeout:deadline']);
    assert.deepEqual(mem.entries[0].data, { count: 1 });
    assert.equal(mem.entries[1].data, undefined);

    mem.clear();
    assert.deepEqual(mem.entries, []);
});

import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { CellKernel, errorKindOf } from '../src/kernel';
import { setupExecutionMonitoring } from '../src/execution_monitor';
import { EXECUTION_METADATA_MIME_TYPE, EXECUTION_NOTICE_MIME_TYPE } from '../src/metadata_publisher';
import { DEFAULT_CONFIG, freezeConfig } from '../src/config';
import { createLogger, createMemorySink } from '../src/logger';
import { ExecutionInterrupted } from '../src/structured_error';
import { HookName } from '../src/execution_types';

const HOOKS: HookName[] = ['pre_run_cell', 'pre_execute', 'post_execute', 'post_run_cell'];

function quietKernel(options: ConstructorParameters<typeof CellKernel>[0] = {}) {
    const mem = createMemorySink();
    const kernel = new CellKernel({ ...options, logger: createLogger('kernel', { sink: mem.sink, level: 'debug' }) });
    return { kernel, mem };
}

function recordHooks(kernel: CellKernel): string[] {
    const seen: string[] = [];
    for (const hook of HOOKS) {
        kernel.on(hook, () => seen.push(hook));
    }
    return seen;
}

async function untilBusy(kernel: CellKernel): Promise<void> {
    while (!kernel.busy) {
        await new Promise<void>(resolve => setImmediate(resolve));
    }
}

describe('CellKernel', () => {
    test('runs a cell and fires the hooks in order', async () => {
        const { kernel } = quietKernel();
        const seen = recordHooks(kernel);

        const result = await kernel.execute({ body: () => 42 });

        assert.equal(result.success, true);
        assert.equal(result.value, 42);
        assert.equal(result.executionCount, 1);
        assert.deepEqual(seen, HOOKS);
    });

    test('queued cells run one at a time', async () => {
        const { kernel } = quietKernel();
        const seen = recordHooks(kernel);

        const [first, second] = await Promise.all([
            kernel.execute({ body: async (ctx) => { await ctx.sleep(20); return 'a'; } }),
            kernel.execute({ body: () => 'b' }),
        ]);

        assert.deepEqual([first.value, second.value], ['a', 'b']);
        assert.deepEqual([first.executionCount, second.executionCount], [1, 2]);
        assert.deepEqual(seen, [...HOOKS, ...HOOKS]);
    });

    test('a throwing body fails with its error name as the kind', async () => {
        const { kernel } = quietKernel();
        const outcomes: unknown[] = [];
        kernel.on('post_execute', (outcome) => outcomes.push(outcome));

        const result = await kernel.execute({ body: () => { throw new TypeError('bad operand'); } });

        assert.equal(result.success, false);
        assert.equal(result.errorKind, 'TypeError');
        assert.deepEqual(outcomes, [{ success: false, errorKind: 'TypeError' }]);

        const next = await kernel.execute({ body: () => 'still alive' });
        assert.equal(next.value, 'still alive');
    });

    test('interrupt ends a cooperative cell as Interrupted', async () => {
        const { kernel } = quietKernel();
        const running = kernel.execute({ body: async (ctx) => { await ctx.sleep(10_000); } });

        await untilBusy(kernel);
        assert.equal(kernel.interruptCurrentExecution(), true);
        assert.equal(kernel.interruptCurrentExecution(), false);

        const result = await running;
        assert.equal(result.success, false);
        assert.equal(result.errorKind, 'Interrupted');
        assert.ok(result.error instanceof ExecutionInterrupted);
    });

    test('checkpoint raises a pending interrupt', async () => {
        const { kernel } = quietKernel();
        let iterations = 0;
        const running = kernel.execute({
            body: async (ctx) => {
                for (let i = 0; i < 1000; i++) {
                    await new Promise<void>(resolve => setTimeout(resolve, 1));
                    ctx.checkpoint();
                    iterations++;
                }
            },
        });

        await untilBusy(kernel);
        kernel.interruptCurrentExecution();
        const result = await running;

        assert.equal(result.errorKind, 'Interrupted');
        assert.ok(iterations < 1000);
    });

    test('a body that ignores the signal runs to completion', async () => {
        const { kernel } = quietKernel();
        const running = kernel.execute({
            body: async () => {
                await new Promise<void>(resolve => setTimeout(resolve, 20));
                return 'done';
            },
        });

        await untilBusy(kernel);
        assert.equal(kernel.interruptCurrentExecution(), true);
        const result = await running;
        assert.equal(result.success, true);
        assert.equal(result.value, 'done');
    });

    test('interrupt when idle reports false', () => {
        const { kernel } = quietKernel();
        assert.equal(kernel.interruptCurrentExecution(), false);
    });

    test('source cells need a runner', async () => {
        const { kernel } = quietKernel();
        const result = await kernel.execute({ source: 'return 1' });
        assert.equal(result.success, false);
        assert.equal(result.errorKind, 'Error');
        assert.equal(result.error instanceof Error ? result.error.message : '', 'No source runner configured for source cells');
    });

    test('source cells go through the runner with the cell signal', async () => {
        const sources: string[] = [];
        const { kernel } = quietKernel({
            runner: { run: async (source, signal) => { sources.push(source); return signal.aborted ? 'aborted' : 'ran'; } },
        });
        const result = await kernel.execute({ source: 'return 1' });
        assert.equal(result.value, 'ran');
        assert.deepEqual(sources, ['return 1']);
    });

    test('publish collects displays of the running cell and fails once closed', async () => {
        const { kernel } = quietKernel();
        const result = await kernel.execute({ body: () => { kernel.publish({ 'text/plain': { text: 'hi' } }); } });
        assert.deepEqual(result.displays, [{ 'text/plain': { text: 'hi' } }]);

        kernel.close();
        assert.throws(() => kernel.publish({ 'text/plain': { text: 'late' } }), { message: 'Presentation channel closed' });
    });

    test('debug flags log events and displays', async () => {
        const { kernel, mem } = quietKernel({ debug: { events: true, display: true } });
        await kernel.execute({ body: () => { kernel.publish({ 'text/plain': { text: 'x' } }); } });

        assert.deepEqual(mem.messages('info'), [
            'event pre_run_cell',
            'event pre_execute',
            'display_data',
            'event post_execute',
            'event post_run_cell',
        ]);
    });

    test('a throwing hook handler does not break the cell', async () => {
        const { kernel, mem } = quietKernel();
        kernel.on('pre_execute', () => { throw new Error('listener bug'); });

        const result = await kernel.execute({ body: () => 1 });
        assert.equal(result.success, true);
        assert.deepEqual(mem.messages('error'), ['Hook handler for pre_execute threw']);
    });

    test('errorKindOf falls back to Error for non-errors', () => {
        assert.equal(errorKindOf(new RangeError('x')), 'RangeError');
        assert.equal(errorKindOf('boom'), 'Error');
    });
});

describe('CellKernel with execution monitoring', () => {
    test('auto-interrupt stops a long cell on real timers', async () => {
        const { kernel } = quietKernel();
        const mem = createMemorySink();
        const config = freezeConfig({
            ...DEFAULT_CONFIG,
            enabled: true,
            warningThresholdSeconds: 0.02,
            timeoutThresholdSeconds: 0.06,
            autoInterruptEnabled: true,
        });
        const monitor = setupExecutionMonitoring(kernel, config, {
            channels: kernel,
            logger: createLogger('cellwatch', { sink: mem.sink, level: 'info' }),
        });
        assert.ok(monitor);

        const result = await kernel.execute({ cellId: 'slow', body: async (ctx) => { await ctx.sleep(5000); } });
        monitor.detach();

        assert.equal(result.success, false);
        assert.equal(result.errorKind, 'Interrupted');

        const lifecycle = mem.messages().filter(m => /^(EXEC_|LONG_|TIMEOUT_)/.test(m)).map(m => m.split(' | ')[0]);
        assert.deepEqual(lifecycle, ['EXEC_START', 'LONG_EXECUTION', 'TIMEOUT_INTERRUPT', 'EXEC_END']);
        assert.match(mem.messages().find(m => m.startsWith('EXEC_END')) ?? '', /\| success=false \| error=Interrupted$/);

        const notices = result.displays
            .map(d => d[EXECUTION_NOTICE_MIME_TYPE])
            .filter(n => n !== undefined)
            .map(n => [n.kind, n.interrupt_requested]);
        assert.deepEqual(notices, [['warning', false], ['timeout', true]]);

        const metadata = result.displays.map(d => d[EXECUTION_METADATA_MIME_TYPE]).filter(m => m !== undefined);
        assert.equal(metadata.length, 1);
        assert.equal(metadata[0].error_kind, 'Interrupted');
    });

    test('a quick cell leaves no timers behind', async () => {
        const { kernel } = quietKernel();
        const mem = createMemorySink();
        const config = freezeConfig({ ...DEFAULT_CONFIG, enabled: true, warningThresholdSeconds: 30, timeoutThresholdSeconds: 60 });
        const monitor = setupExecutionMonitoring(kernel, config, {
            channels: kernel,
            logger: createLogger('cellwatch', { sink: mem.sink, level: 'info' }),
        });

        const result = await kernel.execute({ body: () => 'ok' });
        assert.equal(result.success, true);
        assert.equal(monitor?.timeouts?.armedCount, 0);
        assert.equal(result.displays.length, 1);
    });
});

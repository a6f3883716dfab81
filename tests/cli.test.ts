import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { CellwatchCLI, parseArgs } from '../src/cli';
import { ExecutionJournal } from '../src/execution_journal';

test('parseArgs splits positionals and flags', () => {
    const parsed = parseArgs(['a.js', '--journal', 'j.db', 'b.js', '--limit=5', '--verbose']);
    assert.deepEqual(parsed.positional, ['a.js', 'b.js']);
    assert.deepEqual([...parsed.flags], [['journal', 'j.db'], ['limit', '5'], ['verbose', 'true']]);
});

test('inline flag values keep everything after the first equals sign', () => {
    const parsed = parseArgs(['--config=dir/a=b.json', '--journal=']);
    assert.equal(parsed.flags.get('config'), 'dir/a=b.json');
    assert.equal(parsed.flags.get('journal'), '');
});

test('unknown commands exit with 1, help with 0', async () => {
    const cli = new CellwatchCLI();
    const original = console.log;
    console.log = () => undefined;
    try {
        assert.equal(await cli.run(['node', 'cellwatch', 'help']), 0);
        assert.equal(await cli.run(['node', 'cellwatch', 'bogus']), 1);
    } finally {
        console.log = original;
    }
});

test('run executes each file as a cell and journals the result', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cellwatch-cli-'));
    const original = { log: console.log, error: console.error };
    const out: string[] = [];
    console.log = (...args: unknown[]) => { out.push(args.join(' ')); };
    console.error = (...args: unknown[]) => { out.push(args.join(' ')); };
    try {
        const ok = path.join(dir, 'ok.js');
        const bad = path.join(dir, 'bad.js');
        fs.writeFileSync(ok, 'return 1 + 1');
        fs.writeFileSync(bad, 'throw new RangeError("too far")');
        const journalPath = path.join(dir, 'journal.db');

        const code = await new CellwatchCLI().run(['node', 'cellwatch', 'run', ok, bad, '--journal', journalPath]);

        assert.equal(code, 1);
        assert.ok(out.includes('[1] 2'));
        assert.ok(out.includes('[2] RangeError: too far'));

        const journal = new ExecutionJournal(journalPath);
        try {
            const rows = journal.recentExecutions();
            assert.deepEqual(rows.map(r => [r.executionCount, r.success, r.errorKind]), [[2, false, 'RangeError'], [1, true, null]]);
        } finally {
            journal.close();
        }
    } finally {
        console.log = original.log;
        console.error = original.error;
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

#!/usr/bin/env node
/**
 * CLI Entry Point for cellwatch
 */

import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';
import { getConfigSummary, loadMonitorConfig, MonitorConfig } from './config';
import { CellKernel } from './kernel';
import { WorkerSourceRunner } from './worker_isolator';
import { ExecutionJournal } from './execution_journal';
import { setupExecutionMonitoring } from './execution_monitor';
import { ConfigurationError, describeError } from './structured_error';

const DEFAULT_JOURNAL_PATH = path.join('.cellwatch', 'journal.db');
const DEFAULT_HISTORY_LIMIT = 20;

interface ParsedArgs {
    positional: string[];
    flags: Map<string, string>;
}

export function parseArgs(args: string[]): ParsedArgs {
    const positional: string[] = [];
    const flags = new Map<string, string>();
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg.startsWith('--')) {
            const body = arg.slice(2);
            const eq = body.indexOf('=');
            if (eq >= 0) {
                flags.set(body.slice(0, eq), body.slice(eq + 1));
            } else if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
                flags.set(body, args[++i]);
            } else {
                flags.set(body, 'true');
            }
        } else {
            positional.push(arg);
        }
    }
    return { positional, flags };
}

class CellwatchCLI {
    private readonly log = createLogger('cli');

    async run(args: string[]): Promise<number> {
        const command = args[2] || 'help';
        const parsed = parseArgs(args.slice(3));

        switch (command) {
            case 'run':
                return this.runCells(parsed);
            case 'history':
                return this.runHistory(parsed);
            case 'config':
                return this.runConfig(parsed);
            default:
                this.showHelp();
                return command === 'help' ? 0 : 1;
        }
    }

    private loadConfig(parsed: ParsedArgs): Readonly<MonitorConfig> | null {
        try {
            return loadMonitorConfig({ filePath: parsed.flags.get('config') });
        } catch (err) {
            if (err instanceof ConfigurationError) {
                console.error(`Error: ${err.message}`);
                return null;
            }
            throw err;
        }
    }

    private openJournal(parsed: ParsedArgs): ExecutionJournal {
        const journalPath = parsed.flags.get('journal') ?? DEFAULT_JOURNAL_PATH;
        fs.mkdirSync(path.dirname(path.resolve(journalPath)), { recursive: true });
        return new ExecutionJournal(journalPath);
    }

    private async runCells(parsed: ParsedArgs): Promise<number> {
        if (parsed.positional.length === 0) {
            console.error('Error: no files given. Usage: cellwatch run <file...>');
            return 1;
        }
        const config = this.loadConfig(parsed);
        if (!config) return 1;

        const journal = this.openJournal(parsed);
        const kernel = new CellKernel({
            runner: new WorkerSourceRunner(),
            debug: config.debug,
            logger: this.log.child('kernel'),
        });
        const monitor = setupExecutionMonitoring(kernel, config, { channels: [kernel, journal] });

        // Ctrl+C interrupts the running cell instead of killing the process
        const onSigint = () => {
            if (!kernel.interruptCurrentExecution()) process.exit(130);
        };
        process.on('SIGINT', onSigint);

        let failures = 0;
        try {
            for (const file of parsed.positional) {
                const source = fs.readFileSync(file, 'utf8');
                const result = await kernel.execute({ cellId: path.basename(file), source });
                if (result.success) {
                    if (result.value !== undefined) console.log(`[${result.executionCount}] ${String(result.value)}`);
                } else {
                    failures++;
                    console.error(`[${result.executionCount}] ${result.errorKind}: ${describeError(result.error)}`);
                }
            }
        } finally {
            process.off('SIGINT', onSigint);
            monitor?.detach();
            journal.close();
        }
        return failures > 0 ? 1 : 0;
    }

    private runHistory(parsed: ParsedArgs): number {
        const journal = this.openJournal(parsed);
        try {
            const limit = Number(parsed.flags.get('limit') ?? DEFAULT_HISTORY_LIMIT);
            const rows = journal.recentExecutions(Number.isFinite(limit) ? limit : DEFAULT_HISTORY_LIMIT);
            for (const row of rows) {
                const status = row.success ? 'ok' : `FAILED (${row.errorKind ?? 'Error'})`;
                console.log(`#${row.executionCount}  ${row.durationSeconds.toFixed(2)}s  ${status}  ${row.publishedAt}`);
                for (const notice of journal.noticesFor(row.executionCount)) {
                    console.log(`    ${notice.kind} at ${notice.elapsedSeconds.toFixed(1)}s (threshold ${notice.thresholdSeconds.toFixed(1)}s)`);
                }
            }
            const s = journal.summary();
            console.log(`\n${s.total} executions, ${s.failed} failed, ${s.interrupted} interrupted, mean ${s.meanDurationSeconds.toFixed(2)}s, max ${s.maxDurationSeconds.toFixed(2)}s`);
            return 0;
        } finally {
            journal.close();
        }
    }

    private runConfig(parsed: ParsedArgs): number {
        const config = this.loadConfig(parsed);
        if (!config) return 1;
        console.log(JSON.stringify(getConfigSummary(config), null, 2));
        return 0;
    }

    private showHelp(): void {
        console.log(`
cellwatch - execution lifecycle monitor

Usage:
  cellwatch run <file...> [--journal <path>] [--config <path>]
      Run each file as one cell (async function body) with monitoring.
  cellwatch history [--journal <path>] [--limit <n>]
      Show recent executions and notices.
  cellwatch config [--config <path>]
      Print the resolved monitor configuration.

Environment:
  CELLWATCH_TIMEOUT_MONITORING  enable timeout monitoring (default: off)
  CELLWATCH_WARNING_THRESHOLD   seconds before a long-execution warning (default: 240)
  CELLWATCH_TIMEOUT_THRESHOLD   seconds before timeout escalation (default: 300)
  CELLWATCH_AUTO_INTERRUPT      interrupt executions past the timeout (default: off)
  CELLWATCH_DEBUG_EVENTS        log every kernel lifecycle event
  CELLWATCH_DEBUG_DISPLAY       log every display bundle
  CELLWATCH_LOG_LEVEL / CELLWATCH_LOG_JSON / CELLWATCH_LOG_FILE
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new CellwatchCLI();
    cli.run(process.argv).then(
        (code) => { process.exitCode = code; },
        (err: unknown) => {
            console.error('Fatal error:', err);
            process.exit(1);
        }
    );
}

export { CellwatchCLI };

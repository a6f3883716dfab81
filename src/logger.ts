/**
 * Structured Logger — leveled logging for the cellwatch monitor
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when CELLWATCH_LOG_JSON=1
 * - Optional file output via CELLWATCH_LOG_FILE
 * - Component name on every line
 * - Injectable sinks, so components under test log into memory
 *
 * Environment:
 *   CELLWATCH_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   CELLWATCH_LOG_JSON   = 1 (default: text)
 *   CELLWATCH_LOG_FILE   = path (optional, appends)
 *   CELLWATCH_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

function resolveMinLevel(env: NodeJS.ProcessEnv): number {
    const debugOverride = env.CELLWATCH_DEBUG === '1' || env.CELLWATCH_DEBUG === 'true';
    if (debugOverride) return LEVEL_ORDER.debug;
    const raw = (env.CELLWATCH_LOG_LEVEL || 'info').toLowerCase();
    return isLogLevel(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

const EFFECTIVE_MIN = resolveMinLevel(process.env);
const JSON_MODE = process.env.CELLWATCH_LOG_JSON === '1';
const LOG_FILE = process.env.CELLWATCH_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Entries & sinks                                                            */
/* -------------------------------------------------------------------------- */

export interface LogEntry {
    ts: string;
    level: LogLevel;
    component: string;
    msg: string;
    data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export function formatEntry(entry: LogEntry, json: boolean = JSON_MODE): string {
    if (json) return JSON.stringify(entry);
    const prefix = `[${entry.ts}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.component}]`;
    return entry.data
        ? `${prefix} ${entry.msg} ${JSON.stringify(entry.data)}`
        : `${prefix} ${entry.msg}`;
}

let fileOutputBroken = false;

/** Process console sink (stderr for warn/error), plus CELLWATCH_LOG_FILE when set. */
export const consoleSink: LogSink = (entry) => {
    const line = formatEntry(entry);
    switch (entry.level) {
        case 'error':
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (LOG_FILE && !fileOutputBroken) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (err) {
            fileOutputBroken = true;
            process.stderr.write(`[cellwatch] log file disabled (${LOG_FILE}): ${err instanceof Error ? err.message : String(err)}\n`);
        }
    }
};

export interface MemorySink {
    sink: LogSink;
    entries: LogEntry[];
    /** Messages in emission order, optionally filtered by level. */
    messages(level?: LogLevel): string[];
    clear(): void;
}

/** Collects entries in memory; used by tests and by embedders that forward logs elsewhere. */
export function createMemorySink(): MemorySink {
    const entries: LogEntry[] = [];
    return {
        entries,
        sink: (entry) => { entries.push(entry); },
        messages: (level) => entries.filter(e => !level || e.level === level).map(e => e.msg),
        clear: () => { entries.length = 0; },
    };
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export interface LoggerOptions {
    sink?: LogSink;
    /** Minimum level; defaults to the environment-derived level. */
    level?: LogLevel;
}

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
    const sink = options.sink ?? consoleSink;
    const minLevel = options.level ? LEVEL_ORDER[options.level] : EFFECTIVE_MIN;

    const emit = (level: LogLevel, msg: string, data?: Record<string, unknown>): void => {
        if (LEVEL_ORDER[level] < minLevel) return;
        const entry: LogEntry = { ts: new Date().toISOString(), level, component, msg };
        if (data) entry.data = data;
        sink(entry);
    };

    return {
        debug: (msg, data) => emit('debug', msg, data),
        info:  (msg, data) => emit('info',  msg, data),
        warn:  (msg, data) => emit('warn',  msg, data),
        error: (msg, data) => emit('error', msg, data),
        child: (sub) => createLogger(`${component}:${sub}`, options),
    };
}

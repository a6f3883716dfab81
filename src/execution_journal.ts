// execution_journal.ts — persistent history of published execution metadata
//
// GUARANTEES:
// - Stores every execution-metadata and execution-notice bundle it receives
// - Ignores bundles of other MIME types (ordinary display output)
// - Forward-compatible schema migrations (schema_version)
// - Write failures surface as JournalError; the publisher contains them
//
// CONTRACT: Synchronous API (better-sqlite3 blocks by design)

import Database from 'better-sqlite3';
import { MimeBundle, PresentationChannel } from './execution_types';
import {
    EXECUTION_METADATA_MIME_TYPE,
    EXECUTION_NOTICE_MIME_TYPE,
    NoticeKind,
} from './metadata_publisher';
import { describeError, JournalError } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface JournalExecution {
    executionCount: number;
    durationSeconds: number;
    success: boolean;
    errorKind: string | null;
    publishedAt: string;
}

export interface JournalNotice {
    executionCount: number;
    kind: NoticeKind;
    elapsedSeconds: number;
    thresholdSeconds: number;
    codePreview: string;
    interruptRequested: boolean;
}

export interface JournalSummary {
    total: number;
    failed: number;
    interrupted: number;
    meanDurationSeconds: number;
    maxDurationSeconds: number;
}

interface ExecutionRow {
    execution_count: number;
    duration_seconds: number;
    success: number;
    error_kind: string | null;
    published_at: string;
}

interface NoticeRow {
    execution_count: number;
    kind: string;
    elapsed_seconds: number;
    threshold_seconds: number;
    code_preview: string;
    interrupt_requested: number;
}

interface SummaryRow {
    total: number;
    failed: number | null;
    interrupted: number | null;
    mean_duration: number | null;
    max_duration: number | null;
}

const SCHEMA_VERSION = 1;
const INTERRUPTED_KIND = 'Interrupted';

/* -------------------------------------------------------------------------- */
/* Payload readers                                                            */
/* -------------------------------------------------------------------------- */

function readNumber(body: Record<string, unknown>, key: string): number {
    const value = body[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new JournalError(`Field '${key}' must be a finite number`);
    }
    return value;
}

function readBoolean(body: Record<string, unknown>, key: string): boolean {
    const value = body[key];
    if (typeof value !== 'boolean') throw new JournalError(`Field '${key}' must be a boolean`);
    return value;
}

function readString(body: Record<string, unknown>, key: string, fallback?: string): string {
    const value = body[key];
    if (typeof value === 'string') return value;
    if (fallback !== undefined && value === undefined) return fallback;
    throw new JournalError(`Field '${key}' must be a string`);
}

function readNoticeKind(body: Record<string, unknown>): NoticeKind {
    const kind = body.kind;
    if (kind === 'warning' || kind === 'timeout') return kind;
    throw new JournalError(`Unknown notice kind: ${String(kind)}`);
}

/* -------------------------------------------------------------------------- */
/* Execution Journal                                                          */
/* -------------------------------------------------------------------------- */

export class ExecutionJournal implements PresentationChannel {
    private readonly db: Database.Database;

    constructor(dbPath: string) {
        try {
            this.db = new Database(dbPath);
            this.configureDatabase();
            this.runMigrations();
        } catch (err) {
            throw new JournalError(`Cannot open execution journal at ${dbPath}: ${describeError(err)}`, err);
        }
    }

    private configureDatabase(): void {
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('synchronous = NORMAL');
        this.db.pragma('busy_timeout = 5000');
    }

    private runMigrations(): void {
        const tx = this.db.transaction(() => {
            this.db.exec(`
                CREATE TABLE IF NOT EXISTS schema_version (
                    version INTEGER PRIMARY KEY,
                    applied_at TEXT DEFAULT CURRENT_TIMESTAMP
                ) STRICT
            `);

            const row = this.db
                .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
                .get();
            const current = row?.version ?? 0;

            if (current < 1) {
                this.db.exec(`
                    CREATE TABLE IF NOT EXISTS executions (
                        id INTEGER PRIMARY KEY AUTOINCREMENT,
                        execution_count INTEGER NOT NULL,
                        duration_seconds REAL NOT NULL,
                        success INTEGER NOT NULL,
                        error_kind TEXT,
                        published_at TEXT NOT NULL,
                        recorded_at TEXT DEFAULT CURRENT_TIMESTAMP,
                        CHECK(success IN (0,1)),
                        CHECK(duration_seconds >= 0)
                    ) STRICT;

                    CREATE TABLE IF NOT EXISTS notices (
                        id INTEGER PRIMARY KEY AUTOINCREMENT,
                        execution_count INTEGER NOT NULL,
                        kind TEXT NOT NULL,
                        elapsed_seconds REAL NOT NULL,
                        threshold_seconds REAL NOT NULL,
                        code_preview TEXT NOT NULL,
                        interrupt_requested INTEGER NOT NULL,
                        recorded_at TEXT DEFAULT CURRENT_TIMESTAMP,
                        CHECK(kind IN ('warning','timeout')),
                        CHECK(interrupt_requested IN (0,1))
                    ) STRICT;

                    CREATE INDEX IF NOT EXISTS idx_executions_count ON executions(execution_count);
                    CREATE INDEX IF NOT EXISTS idx_notices_count ON notices(execution_count);
                `);
                this.db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
            }
        });
        tx();
    }

    /* ------------------------------------------------------------------------ */
    /* PresentationChannel                                                      */
    /* ------------------------------------------------------------------------ */

    publish(bundle: MimeBundle): void {
        const metadata = bundle[EXECUTION_METADATA_MIME_TYPE];
        if (metadata) this.recordExecution(metadata);

        const notice = bundle[EXECUTION_NOTICE_MIME_TYPE];
        if (notice) this.recordNotice(notice);
    }

    private recordExecution(body: Record<string, unknown>): void {
        const success = readBoolean(body, 'success');
        const errorKind = body.error_kind === undefined ? null : readString(body, 'error_kind');
        const params = [
            readNumber(body, 'execution_count'),
            readNumber(body, 'duration_seconds'),
            success ? 1 : 0,
            errorKind,
            readString(body, 'timestamp', new Date().toISOString()),
        ] as const;

        this.write(() => this.db.prepare(`
            INSERT INTO executions (execution_count, duration_seconds, success, error_kind, published_at)
            VALUES (?, ?, ?, ?, ?)
        `).run(...params));
    }

    private recordNotice(body: Record<string, unknown>): void {
        const params = [
            readNumber(body, 'execution_count'),
            readNoticeKind(body),
            readNumber(body, 'elapsed_seconds'),
            readNumber(body, 'threshold_seconds'),
            readString(body, 'code_preview', ''),
            readBoolean(body, 'interrupt_requested') ? 1 : 0,
        ] as const;

        this.write(() => this.db.prepare(`
            INSERT INTO notices (execution_count, kind, elapsed_seconds, threshold_seconds, code_preview, interrupt_requested)
            VALUES (?, ?, ?, ?, ?, ?)
        `).run(...params));
    }

    private write(op: () => void): void {
        try {
            op();
        } catch (err) {
            throw new JournalError(`Journal write failed: ${describeError(err)}`, err);
        }
    }

    /* ------------------------------------------------------------------------ */
    /* Queries                                                                  */
    /* ------------------------------------------------------------------------ */

    /** Most recent first. */
    recentExecutions(limit = 20): JournalExecution[] {
        const rows = this.db.prepare<[number], ExecutionRow>(`
            SELECT execution_count, duration_seconds, success, error_kind, published_at
            FROM executions ORDER BY id DESC LIMIT ?
        `).all(Math.max(0, Math.floor(limit)));

        return rows.map(r => ({
            executionCount: r.execution_count,
            durationSeconds: r.duration_seconds,
            success: r.success === 1,
            errorKind: r.error_kind,
            publishedAt: r.published_at,
        }));
    }

    noticesFor(executionCount: number): JournalNotice[] {
        const rows = this.db.prepare<[number], NoticeRow>(`
            SELECT execution_count, kind, elapsed_seconds, threshold_seconds, code_preview, interrupt_requested
            FROM notices WHERE execution_count = ? ORDER BY id ASC
        `).all(executionCount);

        return rows.map(r => ({
            executionCount: r.execution_count,
            kind: r.kind === 'timeout' ? 'timeout' : 'warning',
            elapsedSeconds: r.elapsed_seconds,
            thresholdSeconds: r.threshold_seconds,
            codePreview: r.code_preview,
            interruptRequested: r.interrupt_requested === 1,
        }));
    }

    summary(): JournalSummary {
        const row = this.db.prepare<[string], SummaryRow>(`
            SELECT
                COUNT(*) AS total,
                SUM(CASE WHEN success = 0 THEN 1 ELSE 0 END) AS failed,
                SUM(CASE WHEN error_kind = ? THEN 1 ELSE 0 END) AS interrupted,
                AVG(duration_seconds) AS mean_duration,
                MAX(duration_seconds) AS max_duration
            FROM executions
        `).get(INTERRUPTED_KIND);

        return {
            total: row?.total ?? 0,
            failed: row?.failed ?? 0,
            interrupted: row?.interrupted ?? 0,
            meanDurationSeconds: row?.mean_duration ?? 0,
            maxDurationSeconds: row?.max_duration ?? 0,
        };
    }

    close(): void {
        this.db.close();
    }
}

// artifact_ledger.ts: outcome log for every snippet the build loop handles
//
// One row per artifact outcome (written, rejected, refined, failed checks),
// so a session can be reviewed after the fact with `recursive-builder status`.
//
// CONTRACT: Synchronous API (better-sqlite3 blocks by design)

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import type { ArtifactStage } from './artifact_writer';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ArtifactStatus =
    | 'accepted'       // verified, written, lint and tests passed
    | 'check_failed'   // verified and written, lint or tests failed
    | 'rejected'       // verdict negative or missing
    | 'no_code'        // refinement reply had no code block
    | 'write_failed';

export interface NewArtifactRecord {
    runId: string;
    branch: string;
    index: number;
    stage: ArtifactStage;
    status: ArtifactStatus;
    path: string | null;
    sha256: string | null;
    feedback: string;
    lintOk: boolean | null;
    testsOk: boolean | null;
}

export interface ArtifactRecord extends NewArtifactRecord {
    id: number;
    createdAt: string;
}

export interface LedgerSummary {
    total: number;
    byStatus: Record<ArtifactStatus, number>;
}

interface LedgerRow {
    id: number;
    run_id: string;
    branch: string;
    part_index: number;
    stage: string;
    status: string;
    path: string | null;
    sha256: string | null;
    feedback: string;
    lint_ok: number | null;
    tests_ok: number | null;
    created_at: string;
}

const SCHEMA_VERSION = 1;

const STATUSES: readonly ArtifactStatus[] = ['accepted', 'check_failed', 'rejected', 'no_code', 'write_failed'];

function toFlag(value: boolean | null): number | null {
    return value === null ? null : value ? 1 : 0;
}

function fromFlag(value: number | null): boolean | null {
    return value === null ? null : value === 1;
}

function isStatus(value: string): value is ArtifactStatus {
    return (STATUSES as readonly string[]).includes(value);
}

function rowToRecord(row: LedgerRow): ArtifactRecord {
    return {
        id: row.id,
        runId: row.run_id,
        branch: row.branch,
        index: row.part_index,
        stage: row.stage === 'refined' ? 'refined' : 'part',
        status: isStatus(row.status) ? row.status : 'rejected',
        path: row.path,
        sha256: row.sha256,
        feedback: row.feedback,
        lintOk: fromFlag(row.lint_ok),
        testsOk: fromFlag(row.tests_ok),
        createdAt: row.created_at,
    };
}

/* -------------------------------------------------------------------------- */
/* Ledger                                                                     */
/* -------------------------------------------------------------------------- */

export class ArtifactLedger {
    private readonly db: Database.Database;

    /** `dbPath` may be ':memory:'. */
    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
        }
        this.db = new Database(dbPath);
        this.configureDatabase(dbPath !== ':memory:');
        this.runMigrations();
    }

    private configureDatabase(onDisk: boolean): void {
        if (onDisk) this.db.pragma('journal_mode = WAL');
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
                .prepare(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
                .get() as { version: number } | undefined;

            const current = row?.version ?? 0;

            if (current < 1) {
                this.db.exec(`
                    CREATE TABLE IF NOT EXISTS artifacts (
                        id INTEGER PRIMARY KEY AUTOINCREMENT,
                        run_id TEXT NOT NULL,
                        branch TEXT NOT NULL,
                        part_index INTEGER NOT NULL,
                        stage TEXT NOT NULL,
                        status TEXT NOT NULL,
                        path TEXT,
                        sha256 TEXT,
                        feedback TEXT NOT NULL DEFAULT '',
                        lint_ok INTEGER,
                        tests_ok INTEGER,
                        created_at TEXT NOT NULL,
                        CHECK(stage IN ('part','refined')),
                        CHECK(status IN ('accepted','check_failed','rejected','no_code','write_failed')),
                        CHECK(part_index >= 0)
                    ) STRICT;

                    CREATE INDEX IF NOT EXISTS idx_artifacts_branch ON artifacts(branch);
                    CREATE INDEX IF NOT EXISTS idx_artifacts_run ON artifacts(run_id);
                `);
                this.db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
            }
        });
        tx();
    }

    record(entry: NewArtifactRecord): ArtifactRecord {
        const createdAt = new Date().toISOString();
        const info = this.db
            .prepare(`
                INSERT INTO artifacts (run_id, branch, part_index, stage, status, path, sha256, feedback, lint_ok, tests_ok, created_at)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
            `)
            .run(
                entry.runId,
                entry.branch,
                entry.index,
                entry.stage,
                entry.status,
                entry.path,
                entry.sha256,
                entry.feedback,
                toFlag(entry.lintOk),
                toFlag(entry.testsOk),
                createdAt
            );
        return { ...entry, id: Number(info.lastInsertRowid), createdAt };
    }

    list(): ArtifactRecord[] {
        const rows = this.db.prepare(`SELECT * FROM artifacts ORDER BY id`).all() as LedgerRow[];
        return rows.map(rowToRecord);
    }

    listForBranch(branch: string): ArtifactRecord[] {
        const rows = this.db
            .prepare(`SELECT * FROM artifacts WHERE branch = ? ORDER BY id`)
            .all(branch) as LedgerRow[];
        return rows.map(rowToRecord);
    }

    listForRun(runId: string): ArtifactRecord[] {
        const rows = this.db
            .prepare(`SELECT * FROM artifacts WHERE run_id = ? ORDER BY id`)
            .all(runId) as LedgerRow[];
        return rows.map(rowToRecord);
    }

    summary(): LedgerSummary {
        const rows = this.db
            .prepare(`SELECT status, COUNT(*) AS n FROM artifacts GROUP BY status`)
            .all() as Array<{ status: string; n: number }>;
        const byStatus: Record<ArtifactStatus, number> = {
            accepted: 0,
            check_failed: 0,
            rejected: 0,
            no_code: 0,
            write_failed: 0,
        };
        let total = 0;
        for (const row of rows) {
            if (isStatus(row.status)) byStatus[row.status] = row.n;
            total += row.n;
        }
        return { total, byStatus };
    }

    close(): void {
        this.db.close();
    }
}

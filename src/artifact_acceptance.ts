/**
 * What happens to a snippet once its verdict is known: write + lint + test for
 * accepted code, a ledger entry and a log line for everything else. Write and
 * check failures become ledger statuses; only a ledger error escapes.
 */

import crypto from 'crypto';
import type { ArtifactChecks } from './artifact_checker';
import type { ArtifactLedger, ArtifactRecord, NewArtifactRecord } from './artifact_ledger';
import type { ArtifactStage, ArtifactWriter } from './artifact_writer';
import { createLogger } from './logger';
import { describeError, ErrorFactory, logStructuredError } from './structured_error';

const log = createLogger('acceptance');

function sha256Hex(s: string): string {
    return crypto.createHash('sha256').update(s).digest('hex');
}

export interface ArtifactAcceptorDeps {
    writer: ArtifactWriter;
    checker: ArtifactChecks;
    ledger: ArtifactLedger;
}

export class ArtifactAcceptor {
    private runId = '';

    constructor(private readonly deps: ArtifactAcceptorDeps) { }

    /** Tag subsequent ledger entries with the active run. */
    setRunId(runId: string): void {
        this.runId = runId;
    }

    async accept(branch: string, index: number, stage: ArtifactStage, code: string, feedback: string): Promise<ArtifactRecord> {
        const base = { branch, index, stage, sha256: sha256Hex(code), feedback };

        let filePath: string;
        try {
            filePath = this.deps.writer.write(branch, index, stage, code);
        } catch (e) {
            const target = this.deps.writer.pathFor(branch, index, stage);
            logStructuredError(log, ErrorFactory.artifactWriteFailed(target, describeError(e)));
            return this.record({ ...base, status: 'write_failed', path: target, lintOk: null, testsOk: null });
        }

        const lintOk = await this.deps.checker.checkLint(filePath);
        const testsOk = await this.deps.checker.checkTests(filePath);

        if (lintOk && testsOk) {
            log.info(`Code snippet verified and checks passed: ${filePath}`);
            return this.record({ ...base, status: 'accepted', path: filePath, lintOk, testsOk });
        }
        logStructuredError(log, ErrorFactory.checkFailed(filePath, lintOk, testsOk));
        return this.record({ ...base, status: 'check_failed', path: filePath, lintOk, testsOk });
    }

    reject(branch: string, index: number, stage: ArtifactStage, code: string, feedback: string): ArtifactRecord {
        return this.record({
            branch,
            index,
            stage,
            status: 'rejected',
            path: null,
            sha256: sha256Hex(code),
            feedback,
            lintOk: null,
            testsOk: null,
        });
    }

    noCode(branch: string, index: number): ArtifactRecord {
        return this.record({
            branch,
            index,
            stage: 'refined',
            status: 'no_code',
            path: null,
            sha256: null,
            feedback: '',
            lintOk: null,
            testsOk: null,
        });
    }

    private record(entry: Omit<NewArtifactRecord, 'runId'>): ArtifactRecord {
        return this.deps.ledger.record({ runId: this.runId, ...entry });
    }
}

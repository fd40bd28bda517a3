// Artifact paths and writes. Files are overwritten in place; parts are never merged.

import * as path from 'path';
import { atomicWriteFileSync } from './atomic_write';
import { createLogger } from './logger';
import { ArtifactWriteError } from './structured_error';

const log = createLogger('artifact-writer');

export type ArtifactStage = 'part' | 'refined';

export function sanitizeBranchName(branch: string): string {
    const safe = branch.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '_');
    return safe || '_';
}

export class ArtifactWriter {
    constructor(private readonly outputDir: string, private readonly extension: string) { }

    fileName(branch: string, index: number, stage: ArtifactStage): string {
        const base = sanitizeBranchName(branch);
        const stem = stage === 'part' ? `${base}_part${index}` : `${base}_refined_${index}`;
        return `${stem}${this.extension}`;
    }

    pathFor(branch: string, index: number, stage: ArtifactStage): string {
        return path.join(this.outputDir, this.fileName(branch, index, stage));
    }

    /** Write the code and return its path. Throws ArtifactWriteError. */
    write(branch: string, index: number, stage: ArtifactStage, code: string): string {
        const filePath = this.pathFor(branch, index, stage);
        try {
            atomicWriteFileSync({ filePath, content: code });
        } catch (e) {
            throw new ArtifactWriteError(filePath, { cause: e });
        }
        log.info(`Code saved to: ${filePath}`);
        return filePath;
    }
}

/**
 * Structured errors for the build loop.
 *
 * Two kinds live here:
 * - thrown errors (BuilderError and subclasses) for failures that leave the
 *   current orchestration step: bad input, backend exhaustion, store writes;
 * - StructuredError records for failures the loop contains and only reports:
 *   missing verdicts, rejected snippets, failing checks.
 */

import type { Logger } from './logger';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Input errors
    | 'VALIDATION_ERROR'
    | 'CONFIG_ERROR'

    // Backend errors
    | 'GENERATION_ERROR'

    // Persistence
    | 'STORE_CORRUPT'
    | 'STORE_WRITE_FAILED'
    | 'ARTIFACT_WRITE_FAILED'

    // Contained outcomes of the verification loop
    | 'VERIFICATION_ABSENT'
    | 'VERIFICATION_REJECTED'
    | 'REFINEMENT_NO_CODE'
    | 'REFINEMENT_REJECTED'
    | 'CHECK_FAILURE'

    // Control flow
    | 'DEPTH_EXCEEDED'
    | 'EMPTY_REPLY'
    | 'QUESTION_SKIPPED';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Thrown errors                                                              */
/* -------------------------------------------------------------------------- */

export class BuilderError extends Error {
    constructor(message: string, public readonly code: ErrorCode, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'BuilderError';
    }

    toStructured(context: Record<string, unknown> = {}): StructuredError {
        return createStructuredError(this.code, this.message, context);
    }
}

export class ValidationError extends BuilderError {
    constructor(message: string) {
        super(message, 'VALIDATION_ERROR');
        this.name = 'ValidationError';
    }
}

export class ConfigError extends BuilderError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'CONFIG_ERROR', options);
        this.name = 'ConfigError';
    }
}

export class GenerationError extends BuilderError {
    constructor(
        message: string,
        public readonly attemptsUsed: number,
        public readonly backendCode: string,
        public readonly httpStatus: number | null = null
    ) {
        super(message, 'GENERATION_ERROR');
        this.name = 'GenerationError';
    }

    toStructured(context: Record<string, unknown> = {}): StructuredError {
        return createStructuredError(this.code, this.message, {
            attempts: this.attemptsUsed,
            backend_code: this.backendCode,
            http_status: this.httpStatus,
            ...context,
        });
    }
}

export class StoreWriteError extends BuilderError {
    constructor(public readonly filePath: string, options?: { cause?: unknown }) {
        super(`Failed to persist conversation store to ${filePath}`, 'STORE_WRITE_FAILED', options);
        this.name = 'StoreWriteError';
    }
}

export class ArtifactWriteError extends BuilderError {
    constructor(public readonly filePath: string, options?: { cause?: unknown }) {
        super(`Failed to write artifact ${filePath}`, 'ARTIFACT_WRITE_FAILED', options);
        this.name = 'ArtifactWriteError';
    }
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {}
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        timestamp: new Date().toISOString()
    };
}

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = [
        'GENERATION_ERROR',
        'STORE_WRITE_FAILED',
        'CONFIG_ERROR'
    ];

    const errorCodes: ErrorCode[] = [
        'STORE_CORRUPT',
        'ARTIFACT_WRITE_FAILED',
        'VALIDATION_ERROR'
    ];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (errorCodes.includes(code)) return 'ERROR';
    return 'WARNING';
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}

/** Write one line for the failure at the level matching its severity. */
export function logStructuredError(log: Logger, err: StructuredError): void {
    const data = { code: err.code, ...err.context };
    if (err.severity === 'WARNING') {
        log.warn(err.message, data);
    } else {
        log.error(err.message, data);
    }
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static verificationAbsent(branch: string, index: number): StructuredError {
        return createStructuredError(
            'VERIFICATION_ABSENT',
            `No verification verdict for ${branch} part ${index}; sending it to refinement`,
            { branch, index }
        );
    }

    static verificationRejected(branch: string, index: number, feedback: string): StructuredError {
        return createStructuredError(
            'VERIFICATION_REJECTED',
            `Verifier marked ${branch} part ${index} incomplete: ${feedback}`,
            { branch, index }
        );
    }

    static refinementNoCode(branch: string, index: number): StructuredError {
        return createStructuredError(
            'REFINEMENT_NO_CODE',
            `Refinement reply for ${branch} part ${index} contained no code block`,
            { branch, index }
        );
    }

    static refinementRejected(branch: string, index: number, feedback: string): StructuredError {
        return createStructuredError(
            'REFINEMENT_REJECTED',
            `Refined snippet ${branch}_refined_${index} is still incomplete: ${feedback}`,
            { branch, index }
        );
    }

    static checkFailed(filePath: string, lintOk: boolean, testsOk: boolean): StructuredError {
        const failed = [lintOk ? null : 'lint', testsOk ? null : 'tests'].filter(Boolean).join(' and ');
        return createStructuredError(
            'CHECK_FAILURE',
            `Artifact ${filePath} failed ${failed}; file kept on disk`,
            { path: filePath, lint_ok: lintOk, tests_ok: testsOk }
        );
    }

    static artifactWriteFailed(filePath: string, reason: string): StructuredError {
        return createStructuredError(
            'ARTIFACT_WRITE_FAILED',
            `Could not write artifact ${filePath}: ${reason}`,
            { path: filePath }
        );
    }

    static depthExceeded(branch: string, depth: number, maxDepth: number): StructuredError {
        return createStructuredError(
            'DEPTH_EXCEEDED',
            `Max recursion depth (${maxDepth}) reached on ${branch}; stopping`,
            { branch, depth, max_depth: maxDepth }
        );
    }

    static emptyReply(branch: string, depth: number): StructuredError {
        return createStructuredError(
            'EMPTY_REPLY',
            `Received empty reply from the model on ${branch}`,
            { branch, depth }
        );
    }

    static questionSkipped(branch: string, question: string, reason: string): StructuredError {
        return createStructuredError(
            'QUESTION_SKIPPED',
            `Skipping question on ${branch}: ${reason}`,
            { branch, question }
        );
    }

    static storeCorrupt(filePath: string, reason: string, movedTo: string | null): StructuredError {
        return createStructuredError(
            'STORE_CORRUPT',
            `Conversation file ${filePath} is unreadable (${reason}); starting with an empty store`,
            { path: filePath, moved_to: movedTo }
        );
    }
}

/**
 * External lint/test checks on a written artifact. Pass/fail only: exit code 0
 * passes; a non-zero exit, a missing binary or a timeout fails.
 */

import { execFile } from 'child_process';
import * as path from 'path';
import { createLogger } from './logger';

const log = createLogger('checks');

const OUTPUT_EXCERPT_CHARS = 2000;

export interface ArtifactChecks {
    checkLint(artifactPath: string): Promise<boolean>;
    checkTests(artifactPath: string): Promise<boolean>;
}

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    timedOut: boolean;
}

export type CommandRunner = (
    command: string,
    args: string[],
    opts: { cwd?: string; timeoutMs: number }
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, opts) => {
    return new Promise<CommandResult>((resolve) => {
        execFile(
            command,
            args,
            { cwd: opts.cwd, timeout: opts.timeoutMs, encoding: 'utf8', maxBuffer: 10 * 1024 * 1024 },
            (error, stdout, stderr) => {
                if (!error) {
                    resolve({ exitCode: 0, stdout, stderr, timedOut: false });
                    return;
                }
                resolve({
                    exitCode: typeof error.code === 'number' ? error.code : -1,
                    stdout,
                    stderr: stderr || error.message,
                    timedOut: error.killed === true && error.signal === 'SIGTERM',
                });
            }
        );
    });
};

/** Replace `{file}` in a command template. */
export function expandCommand(template: string[], artifactPath: string): { command: string; args: string[] } | null {
    if (template.length === 0) return null;
    const [command, ...args] = template.map(part => part.split('{file}').join(artifactPath));
    return { command, args };
}

function excerpt(text: string): string {
    return text.length > OUTPUT_EXCERPT_CHARS ? text.slice(-OUTPUT_EXCERPT_CHARS) : text;
}

export interface CommandCheckerOptions {
    lintCommand: string[];
    testCommand: string[];
    timeoutMs: number;
    /** Working directory for both commands. */
    cwd?: string;
    runner?: CommandRunner;
}

export class CommandChecker implements ArtifactChecks {
    private readonly runner: CommandRunner;

    constructor(private readonly opts: CommandCheckerOptions) {
        this.runner = opts.runner ?? runCommand;
    }

    checkLint(artifactPath: string): Promise<boolean> {
        return this.check('lint', this.opts.lintCommand, artifactPath);
    }

    checkTests(artifactPath: string): Promise<boolean> {
        return this.check('tests', this.opts.testCommand, artifactPath);
    }

    private async check(kind: 'lint' | 'tests', template: string[], artifactPath: string): Promise<boolean> {
        // Absolute, since the commands run in `cwd`.
        const cmd = expandCommand(template, path.resolve(artifactPath));
        if (!cmd) {
            log.info(`No ${kind} command configured; treating ${artifactPath} as passing`);
            return true;
        }

        log.info(`Running ${kind} on ${artifactPath}`, { command: [cmd.command, ...cmd.args].join(' ') });
        let res: CommandResult;
        try {
            res = await this.runner(cmd.command, cmd.args, { cwd: this.opts.cwd, timeoutMs: this.opts.timeoutMs });
        } catch (e) {
            log.warn(`${kind} could not run for ${artifactPath}`, { error: e instanceof Error ? e.message : String(e) });
            return false;
        }
        if (res.exitCode === 0) {
            log.info(`${kind} passed for ${artifactPath}`);
            return true;
        }

        log.warn(`${kind} failed for ${artifactPath}`, {
            exit_code: res.exitCode,
            timed_out: res.timedOut,
            stdout: excerpt(res.stdout),
            stderr: excerpt(res.stderr),
        });
        return false;
    }
}

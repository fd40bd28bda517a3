import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { ArtifactChecks } from '../src/artifact_checker';
import type { HumanInput } from '../src/human_input';
import { configureLogging } from '../src/logger';
import type { GenerateOptions, GenerationCapability, ModelMessage } from '../src/model_router';

configureLogging({ level: 'error', json: false, file: '' });

export interface GenerateCall {
    messages: ModelMessage[];
    options: GenerateOptions | undefined;
}

type Reply = string | Error | ((messages: ModelMessage[]) => string);

/**
 * Generation stub. Verification calls (jsonMode) are answered by `verdict`,
 * everything else from the `replies` queue in order.
 */
export class ScriptedGenerator implements GenerationCapability {
    readonly calls: GenerateCall[] = [];
    private readonly replies: Reply[];

    constructor(replies: Reply[], private readonly verdict: Reply = '{"complete": true, "feedback": "ok"}') {
        this.replies = [...replies];
    }

    get conversationCalls(): GenerateCall[] {
        return this.calls.filter(c => !c.options?.jsonMode);
    }

    get verificationCalls(): GenerateCall[] {
        return this.calls.filter(c => c.options?.jsonMode === true);
    }

    async generate(messages: ModelMessage[], options?: GenerateOptions): Promise<string> {
        this.calls.push({ messages: messages.map(m => ({ ...m })), options });
        const next = options?.jsonMode ? this.verdict : this.replies.shift();
        if (next === undefined) throw new Error('ScriptedGenerator: no reply left');
        if (next instanceof Error) throw next;
        return typeof next === 'function' ? next(messages) : next;
    }
}

export class ScriptedHuman implements HumanInput {
    readonly asked: string[] = [];

    constructor(private readonly answers: string[] = []) { }

    async ask(prompt: string): Promise<string> {
        this.asked.push(prompt);
        return this.answers.shift() ?? '';
    }
}

export class FakeChecks implements ArtifactChecks {
    readonly linted: string[] = [];
    readonly tested: string[] = [];

    constructor(private readonly lintOk = true, private readonly testsOk = true) { }

    async checkLint(artifactPath: string): Promise<boolean> {
        this.linted.push(artifactPath);
        return this.lintOk;
    }

    async checkTests(artifactPath: string): Promise<boolean> {
        this.tested.push(artifactPath);
        return this.testsOk;
    }
}

export function makeTempDir(prefix: string): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

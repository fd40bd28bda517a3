/**
 * Verifier - asks a model, in a separate two-message conversation, whether a
 * snippet is complete. Returns undefined (never throws) when no usable verdict
 * comes back.
 */

import crypto from 'crypto';
import { LRUCache } from 'lru-cache';
import { extractFirstJsonObject } from './json_extract';
import { createLogger } from './logger';
import type { GenerationCapability, ModelMessage } from './model_router';
import {
    DEFAULT_VERIFICATION_PROMPT,
    VERIFICATION_SYSTEM_PROMPT,
    getVerificationUserPrompt,
} from './prompts';
import { formatViolations, SchemaValidator } from './schema_validator';
import { describeError } from './structured_error';

const log = createLogger('verifier');

export interface Verdict {
    complete: boolean;
    feedback: string;
}

export interface VerifierOptions {
    /** Fence tag used when embedding the snippet. */
    language: string;
    /** Cached verdicts keyed by prompt+code; 0 disables caching. */
    cacheSize: number;
}

const validator = new SchemaValidator();
validator.registerSchema('verdict_v1', {
    type: 'object',
    required: ['complete'],
    properties: {
        complete: { type: 'boolean' },
        feedback: { type: 'string' },
    },
});

/** Turn raw model text into a Verdict, or a reason why it is not one. */
export function parseVerdict(text: string): Verdict | { error: string } {
    const obj = extractFirstJsonObject(text);
    if (!obj) {
        return { error: 'no JSON object in verification response' };
    }
    const result = validator.validate(obj, 'verdict_v1');
    if (!result.valid) {
        return { error: `verdict shape invalid: ${formatViolations(result)}` };
    }
    return {
        complete: obj.complete === true,
        feedback: typeof obj.feedback === 'string' ? obj.feedback : '',
    };
}

export class Verifier {
    private readonly cache: LRUCache<string, Verdict> | null;

    constructor(private readonly generator: GenerationCapability, private readonly opts: VerifierOptions) {
        this.cache = opts.cacheSize > 0 ? new LRUCache<string, Verdict>({ max: opts.cacheSize }) : null;
    }

    buildMessages(code: string, prompt: string = DEFAULT_VERIFICATION_PROMPT): ModelMessage[] {
        return [
            { role: 'system', content: VERIFICATION_SYSTEM_PROMPT },
            { role: 'user', content: getVerificationUserPrompt(prompt, code, this.opts.language) },
        ];
    }

    async verify(code: string, prompt: string = DEFAULT_VERIFICATION_PROMPT): Promise<Verdict | undefined> {
        const key = crypto.createHash('sha256').update(`${prompt}\0${code}`).digest('hex');
        const cached = this.cache?.get(key);
        if (cached) {
            log.debug('Verdict served from cache', { key: key.slice(0, 12) });
            return { ...cached };
        }

        let text: string;
        try {
            text = await this.generator.generate(this.buildMessages(code, prompt), { jsonMode: true });
        } catch (e) {
            log.warn('Verification call failed', { error: describeError(e) });
            return undefined;
        }

        const parsed = parseVerdict(text.trim());
        if ('error' in parsed) {
            log.warn('Could not read a verdict from the verification response', { reason: parsed.error });
            return undefined;
        }

        this.cache?.set(key, parsed);
        return { ...parsed };
    }
}

// model_router.ts - generation capability with bounded concurrency and retries

import crypto from 'crypto';
import { createLogger } from './logger';
import { ModelRegistry } from './model_registry';
import { GenerationError, ValidationError } from './structured_error';

const log = createLogger('model-router');

// ============================================================================
// Types
// ============================================================================

export type ModelRole = 'system' | 'user' | 'assistant';

export interface ModelMessage {
    role: ModelRole;
    content: string;
}

export interface GenerateOptions {
    /** Ask the backend for a JSON object reply where the model supports it. */
    jsonMode?: boolean;
}

/** The one capability the build loop needs from a language model. */
export interface GenerationCapability {
    generate(messages: ModelMessage[], options?: GenerateOptions): Promise<string>;
}

export type BackendErrorCode =
    | 'NETWORK_ERROR'
    | 'RATE_LIMITED'
    | 'INFRA_ERROR'
    | 'MODEL_ERROR'
    | 'INVALID_REQUEST';

export interface BackendSuccess {
    ok: true;
    completion: string;
    finishReason: string | null;
    latencyMs: number;
    modelId: string;
}

export interface BackendFailure {
    ok: false;
    errorCode: BackendErrorCode;
    message: string;
    retryable: boolean;
    httpStatus: number | null;
    bodySnippet: string | null;
}

export type BackendResult = BackendSuccess | BackendFailure;

/** A concrete model endpoint. Implementations never throw; failures come back as BackendFailure. */
export interface ChatBackend {
    readonly name: string;
    readonly modelId: string;
    complete(messages: ModelMessage[], options: GenerateOptions): Promise<BackendResult>;
}

export interface ModelRouterConfig {
    maxRetries: number;
    retryBaseMs: number;
    retryMaxMs: number;
    maxBatchSize: number;
}

// ============================================================================
// Concurrency Limiter (simple semaphore)
// ============================================================================

export class ConcurrencyLimiter {
    private activeCount = 0;
    private queue: Array<() => void> = [];

    constructor(private maxSlots: number) { }

    get active(): number {
        return this.activeCount;
    }

    async acquireSlot(): Promise<void> {
        if (this.activeCount < this.maxSlots) {
            this.activeCount++;
            return;
        }

        return new Promise<void>((resolve) => {
            this.queue.push(resolve);
        });
    }

    releaseSlot(): void {
        const next = this.queue.shift();
        if (next) {
            next();
        } else {
            this.activeCount--;
        }
    }
}

// ============================================================================
// Helpers
// ============================================================================

const ERROR_SNIPPET_MAX_CHARS = 500;

const STRIP_PATTERNS = [
    /\b\d{1,3}(?:\.\d{1,3}){3}\b/g,
    /[a-fA-F0-9]{32,}/g,
    /sk-[A-Za-z0-9]{10,}/g,
    /Authorization:\s*Bearer\s+[A-Za-z0-9._-]+/gi,
];

export function sanitizeErrorSnippet(input: string): string {
    let out = input || '';
    for (const re of STRIP_PATTERNS) {
        out = out.replace(re, '[REDACTED]');
    }
    if (out.length > ERROR_SNIPPET_MAX_CHARS) {
        out = out.slice(0, ERROR_SNIPPET_MAX_CHARS);
    }
    return out.replace(/[^\x20-\x7E]+/g, ' ');
}

export function estimateTokensFromMessages(messages: ModelMessage[]): number {
    const text = JSON.stringify(messages);
    const chars = text.length;
    const words = text.split(/\s+/).length;
    // Conservative: ~3.3 chars/token for code/JSON, with word-count floor
    return Math.max(Math.ceil(chars / 3.3), Math.ceil(words * 1.3));
}

/** Delay before attempt `attempt + 1`: base * 2^(attempt-1), capped. */
export function backoffDelayMs(attempt: number, baseMs: number, maxMs: number): number {
    return Math.min(maxMs, baseMs * 2 ** (attempt - 1));
}

function validateMessages(messages: ModelMessage[]): void {
    if (messages.length === 0) {
        throw new ValidationError('messages must be a non-empty array');
    }
    for (const m of messages) {
        if (m.role !== 'system' && m.role !== 'user' && m.role !== 'assistant') {
            throw new ValidationError('message.role must be system|user|assistant');
        }
        if (m.content.trim().length === 0) {
            throw new ValidationError('message.content must be non-empty string');
        }
    }
}

function sha256Hex(s: string): string {
    return crypto.createHash('sha256').update(s).digest('hex');
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

// ============================================================================
// ModelRouter
// ============================================================================

export class ModelRouter implements GenerationCapability {
    private readonly limiter: ConcurrencyLimiter;
    private readonly config: ModelRouterConfig;

    constructor(private readonly backend: ChatBackend, config: ModelRouterConfig) {
        this.config = config;
        this.limiter = new ConcurrencyLimiter(Math.max(1, config.maxBatchSize));
    }

    get backendName(): string {
        return this.backend.name;
    }

    async generate(messages: ModelMessage[], options: GenerateOptions = {}): Promise<string> {
        validateMessages(messages);

        const info = ModelRegistry.getInstance().getModelInfo(this.backend.modelId);
        const promptTokens = estimateTokensFromMessages(messages);
        if (info && promptTokens > info.contextWindow) {
            log.warn('Prompt may exceed model context window', {
                model: this.backend.modelId,
                est_tokens: promptTokens,
                context_window: info.contextWindow,
            });
        }

        const promptHash = sha256Hex(JSON.stringify(messages)).slice(0, 12);
        const maxAttempts = Math.max(1, this.config.maxRetries);

        let last: BackendFailure | null = null;
        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            if (attempt > 1) {
                await sleep(backoffDelayMs(attempt - 1, this.config.retryBaseMs, this.config.retryMaxMs));
            }

            log.debug('API call', { attempt, max_attempts: maxAttempts, backend: this.backend.name, model: this.backend.modelId, prompt_hash: promptHash });

            const res = await this.callBackend(messages, options);
            if (res.ok) {
                log.debug('API success', { latency_ms: res.latencyMs, finish: res.finishReason, chars: res.completion.length });
                return res.completion;
            }

            last = res;
            log.warn('Generation attempt failed', {
                attempt,
                code: res.errorCode,
                status: res.httpStatus,
                retryable: res.retryable,
                message: res.message,
            });
            if (!res.retryable) {
                throw new GenerationError(
                    `${this.backend.name} call failed: ${res.message}`,
                    attempt,
                    res.errorCode,
                    res.httpStatus
                );
            }
        }

        throw new GenerationError(
            `${this.backend.name} call failed after ${maxAttempts} attempts: ${last?.message ?? 'unknown error'}`,
            maxAttempts,
            last?.errorCode ?? 'INFRA_ERROR',
            last?.httpStatus ?? null
        );
    }

    /** One backend call inside a concurrency slot. Backoff sleeps happen outside the slot. */
    private async callBackend(messages: ModelMessage[], options: GenerateOptions): Promise<BackendResult> {
        await this.limiter.acquireSlot();
        try {
            return await this.backend.complete(messages, options);
        } finally {
            this.limiter.releaseSlot();
        }
    }

    /** Several independent generations, at most maxBatchSize in flight; results in input order. */
    async generateBatch(conversations: ModelMessage[][], options: GenerateOptions = {}): Promise<string[]> {
        return Promise.all(conversations.map(messages => this.generate(messages, options)));
    }
}

/**
 * Chat backends: the concrete endpoints behind ModelRouter.
 *
 * - OpenAICompatibleBackend: OpenAI and DeepSeek chat-completions APIs.
 * - TritonBackend: a local Triton Inference Server through its HTTP generate extension.
 *
 * The backend is chosen once at startup from `modelSource`.
 */

import type { BuilderConfig } from './config';
import { createLogger } from './logger';
import { ModelRegistry } from './model_registry';
import {
    BackendErrorCode,
    BackendFailure,
    BackendResult,
    ChatBackend,
    GenerateOptions,
    ModelMessage,
    sanitizeErrorSnippet,
} from './model_router';
import { isRecord } from './schema_validator';
import { describeError } from './structured_error';

const log = createLogger('chat-backend');

function failure(
    errorCode: BackendErrorCode,
    message: string,
    retryable: boolean,
    httpStatus: number | null = null,
    body: string | null = null
): BackendFailure {
    return {
        ok: false,
        errorCode,
        message: sanitizeErrorSnippet(message),
        retryable,
        httpStatus,
        bodySnippet: body === null ? null : sanitizeErrorSnippet(body),
    };
}

function httpFailure(status: number, body: string, label: string): BackendFailure {
    const retryable = status >= 500 || status === 429;
    return failure(status === 429 ? 'RATE_LIMITED' : status >= 500 ? 'INFRA_ERROR' : 'INVALID_REQUEST', `${label} error ${status}`, retryable, status, body);
}

function isAbortError(e: unknown): boolean {
    return e instanceof Error && e.name === 'AbortError';
}

async function postJson(
    url: string,
    headers: Record<string, string>,
    payload: unknown,
    timeoutMs: number
): Promise<{ status: number; ok: boolean; body: string; latencyMs: number } | BackendFailure> {
    const ac = new AbortController();
    const tid = setTimeout(() => ac.abort(), timeoutMs);
    const started = Date.now();
    try {
        const resp = await fetch(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', ...headers },
            body: JSON.stringify(payload),
            signal: ac.signal,
        });
        const body = await resp.text();
        return { status: resp.status, ok: resp.ok, body, latencyMs: Date.now() - started };
    } catch (e) {
        const msg = isAbortError(e) ? `timeout after ${timeoutMs}ms` : `network_error: ${describeError(e)}`;
        return failure('NETWORK_ERROR', msg, true);
    } finally {
        clearTimeout(tid);
    }
}

function parseBody(body: string): unknown {
    try {
        return JSON.parse(body);
    } catch {
        return undefined;
    }
}

// ============================================================================
// OpenAI-compatible chat completions
// ============================================================================

export interface OpenAICompatibleOptions {
    provider: 'openai' | 'deepseek';
    baseUrl: string;
    model: string;
    apiKey: string;
    timeoutMs: number;
}

/** `choices[0].message.content` and `finish_reason` from a chat-completions body. */
export function readChatCompletion(data: unknown): { completion: string; finishReason: string | null } | null {
    if (!isRecord(data) || !Array.isArray(data.choices) || data.choices.length === 0) return null;
    const choice: unknown = data.choices[0];
    if (!isRecord(choice) || !isRecord(choice.message)) return null;
    const content = choice.message.content;
    return {
        completion: typeof content === 'string' ? content : '',
        finishReason: typeof choice.finish_reason === 'string' ? choice.finish_reason : null,
    };
}

export class OpenAICompatibleBackend implements ChatBackend {
    readonly name: string;
    readonly modelId: string;

    constructor(private readonly opts: OpenAICompatibleOptions) {
        this.name = opts.provider;
        this.modelId = opts.model;
        if (!opts.apiKey) {
            log.warn(`No API key configured for ${opts.provider}. Set ${opts.provider === 'openai' ? 'OPENAI_API_KEY' : 'DEEPSEEK_API_KEY'}.`);
        }
    }

    get endpoint(): string {
        return `${this.opts.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    }

    async complete(messages: ModelMessage[], options: GenerateOptions): Promise<BackendResult> {
        const payload: Record<string, unknown> = {
            model: this.opts.model,
            messages,
            stream: false,
        };
        if (options.jsonMode && ModelRegistry.getInstance().supportsJsonMode(this.opts.model)) {
            payload.response_format = { type: 'json_object' };
        }

        const res = await postJson(
            this.endpoint,
            { Authorization: `Bearer ${this.opts.apiKey}` },
            payload,
            this.opts.timeoutMs
        );
        if ('errorCode' in res) return res;
        if (!res.ok) return httpFailure(res.status, res.body, this.name);

        const parsed = readChatCompletion(parseBody(res.body));
        if (!parsed) {
            return failure('MODEL_ERROR', 'provider_response_not_chat_completion', false, res.status, res.body);
        }
        return {
            ok: true,
            completion: parsed.completion,
            finishReason: parsed.finishReason,
            latencyMs: res.latencyMs,
            modelId: this.opts.model,
        };
    }
}

// ============================================================================
// Local Triton Inference Server
// ============================================================================

export interface TritonOptions {
    url: string;
    modelName: string;
    maxTokens: number;
    timeoutMs: number;
}

/** Flatten a conversation into one prompt for a plain text-generation model. */
export function formatPrompt(messages: ModelMessage[]): string {
    return messages.map(m => `${m.role}: ${m.content}`).join('\n\n') + '\n\nassistant:';
}

export class TritonBackend implements ChatBackend {
    readonly name = 'local';
    readonly modelId: string;

    constructor(private readonly opts: TritonOptions) {
        this.modelId = opts.modelName;
    }

    get endpoint(): string {
        const base = /^https?:\/\//.test(this.opts.url) ? this.opts.url : `http://${this.opts.url}`;
        return `${base.replace(/\/+$/, '')}/v2/models/${encodeURIComponent(this.opts.modelName)}/generate`;
    }

    async complete(messages: ModelMessage[], _options: GenerateOptions): Promise<BackendResult> {
        const prompt = formatPrompt(messages);
        const res = await postJson(
            this.endpoint,
            {},
            { text_input: prompt, parameters: { max_tokens: this.opts.maxTokens, stream: false } },
            this.opts.timeoutMs
        );
        if ('errorCode' in res) return res;
        if (!res.ok) return httpFailure(res.status, res.body, 'triton');

        const data = parseBody(res.body);
        if (!isRecord(data) || typeof data.text_output !== 'string') {
            return failure('MODEL_ERROR', 'triton_response_missing_text_output', false, res.status, res.body);
        }
        // Some model repositories echo the prompt in front of the completion.
        const text = data.text_output.startsWith(prompt)
            ? data.text_output.slice(prompt.length)
            : data.text_output;
        return {
            ok: true,
            completion: text.trim(),
            finishReason: null,
            latencyMs: res.latencyMs,
            modelId: this.opts.modelName,
        };
    }
}

// ============================================================================
// Selection
// ============================================================================

export function createChatBackend(config: BuilderConfig): ChatBackend {
    switch (config.modelSource) {
        case 'local':
            return new TritonBackend({
                url: config.local.tritonUrl,
                modelName: config.local.modelName,
                maxTokens: config.local.maxTokens,
                timeoutMs: config.requestTimeoutMs,
            });
        case 'openai':
            return new OpenAICompatibleBackend({ provider: 'openai', ...config.openai, timeoutMs: config.requestTimeoutMs });
        case 'deepseek':
            return new OpenAICompatibleBackend({ provider: 'deepseek', ...config.deepseek, timeoutMs: config.requestTimeoutMs });
    }
}

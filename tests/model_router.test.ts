import test from 'node:test';
import assert from 'node:assert/strict';

import './helpers';
import {
    BackendResult,
    ChatBackend,
    ConcurrencyLimiter,
    GenerateOptions,
    ModelMessage,
    ModelRouter,
    ModelRouterConfig,
    backoffDelayMs,
    sanitizeErrorSnippet,
} from '../src/model_router';
import { GenerationError, ValidationError } from '../src/structured_error';

const FAST: ModelRouterConfig = { maxRetries: 3, retryBaseMs: 1, retryMaxMs: 2, maxBatchSize: 4 };

const MESSAGES: ModelMessage[] = [
    { role: 'system', content: 'sys' },
    { role: 'user', content: 'hello' },
];

function ok(completion: string): BackendResult {
    return { ok: true, completion, finishReason: 'stop', latencyMs: 1, modelId: 'fake-model' };
}

function fail(retryable: boolean, message = 'boom', httpStatus: number | null = 503): BackendResult {
    return {
        ok: false,
        errorCode: retryable ? 'INFRA_ERROR' : 'INVALID_REQUEST',
        message,
        retryable,
        httpStatus,
        bodySnippet: null,
    };
}

class QueueBackend implements ChatBackend {
    readonly name = 'fake';
    readonly modelId = 'fake-model';
    calls = 0;
    options: GenerateOptions[] = [];

    constructor(private readonly results: BackendResult[]) { }

    async complete(_messages: ModelMessage[], options: GenerateOptions): Promise<BackendResult> {
        this.calls++;
        this.options.push(options);
        return this.results.shift() ?? fail(true, 'queue empty');
    }
}

test('first successful completion is returned', async () => {
    const backend = new QueueBackend([ok('hi there')]);
    const router = new ModelRouter(backend, FAST);

    assert.equal(await router.generate(MESSAGES, { jsonMode: true }), 'hi there');
    assert.equal(backend.calls, 1);
    assert.deepEqual(backend.options, [{ jsonMode: true }]);
    assert.equal(router.backendName, 'fake');
});

test('retryable failures are retried until success', async () => {
    const backend = new QueueBackend([fail(true), fail(true), ok('third time')]);
    const router = new ModelRouter(backend, FAST);

    assert.equal(await router.generate(MESSAGES), 'third time');
    assert.equal(backend.calls, 3);
});

test('exhausted retries raise GenerationError with the last failure', async () => {
    const backend = new QueueBackend([fail(true, 'a'), fail(true, 'b'), fail(true, 'c'), ok('too late')]);
    const router = new ModelRouter(backend, FAST);

    await assert.rejects(router.generate(MESSAGES), (e: unknown) => {
        assert.ok(e instanceof GenerationError);
        assert.equal(e.message, 'fake call failed after 3 attempts: c');
        assert.equal(e.attemptsUsed, 3);
        assert.equal(e.backendCode, 'INFRA_ERROR');
        assert.equal(e.httpStatus, 503);
        return true;
    });
    assert.equal(backend.calls, 3);
});

test('non-retryable failure stops immediately', async () => {
    const backend = new QueueBackend([fail(false, 'fake error 400', 400), ok('unused')]);
    const router = new ModelRouter(backend, FAST);

    await assert.rejects(router.generate(MESSAGES), (e: unknown) => {
        assert.ok(e instanceof GenerationError);
        assert.equal(e.message, 'fake call failed: fake error 400');
        assert.equal(e.attemptsUsed, 1);
        assert.equal(e.backendCode, 'INVALID_REQUEST');
        assert.equal(e.httpStatus, 400);
        return true;
    });
    assert.equal(backend.calls, 1);
});

test('invalid messages are rejected before any call', async () => {
    const backend = new QueueBackend([ok('unused')]);
    const router = new ModelRouter(backend, FAST);

    await assert.rejects(router.generate([]), ValidationError);
    await assert.rejects(router.generate([{ role: 'user', content: '  ' }]), ValidationError);
    assert.equal(backend.calls, 0);
});

test('generateBatch keeps input order and never exceeds maxBatchSize in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const backend: ChatBackend = {
        name: 'slow',
        modelId: 'fake-model',
        async complete(messages: ModelMessage[]): Promise<BackendResult> {
            inFlight++;
            peak = Math.max(peak, inFlight);
            const last = messages[messages.length - 1].content;
            await new Promise<void>((r) => setTimeout(r, last === 'q0' ? 20 : 5));
            inFlight--;
            return ok(`answer ${last}`);
        },
    };
    const router = new ModelRouter(backend, { ...FAST, maxBatchSize: 2 });

    const conversations = ['q0', 'q1', 'q2', 'q3', 'q4'].map((q): ModelMessage[] => [{ role: 'user', content: q }]);
    const results = await router.generateBatch(conversations);

    assert.deepEqual(results, ['answer q0', 'answer q1', 'answer q2', 'answer q3', 'answer q4']);
    assert.equal(peak, 2);
});

test('a retrying call gives up its slot while it backs off', async () => {
    const order: string[] = [];
    let failedOnce = false;
    const backend: ChatBackend = {
        name: 'fake',
        modelId: 'fake-model',
        async complete(messages: ModelMessage[]): Promise<BackendResult> {
            const last = messages[messages.length - 1].content;
            order.push(last);
            if (last === 'a' && !failedOnce) {
                failedOnce = true;
                return fail(true);
            }
            return ok(last);
        },
    };
    const router = new ModelRouter(backend, { maxRetries: 2, retryBaseMs: 30, retryMaxMs: 30, maxBatchSize: 1 });

    const results = await Promise.all([
        router.generate([{ role: 'user', content: 'a' }]),
        router.generate([{ role: 'user', content: 'b' }]),
    ]);

    assert.deepEqual(results, ['a', 'b']);
    assert.deepEqual(order, ['a', 'b', 'a']);
});

test('limiter hands a released slot to the next waiter', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await limiter.acquireSlot();
    assert.equal(limiter.active, 1);

    let acquired = false;
    const waiter = limiter.acquireSlot().then(() => { acquired = true; });
    await Promise.resolve();
    assert.equal(acquired, false);

    limiter.releaseSlot();
    await waiter;
    assert.equal(acquired, true);
    assert.equal(limiter.active, 1);

    limiter.releaseSlot();
    assert.equal(limiter.active, 0);
});

test('backoff doubles from the base and is capped', () => {
    assert.deepEqual(
        [1, 2, 3, 4].map(n => backoffDelayMs(n, 1500, 10000)),
        [1500, 3000, 6000, 10000]
    );
});

test('error snippets are redacted and truncated', () => {
    assert.equal(sanitizeErrorSnippet('key sk-abcdefghijklmnop from 10.0.0.1'), 'key [REDACTED] from [REDACTED]');
    assert.equal(sanitizeErrorSnippet('x'.repeat(600)).length, 500);
});

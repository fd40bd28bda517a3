import test from 'node:test';
import assert from 'node:assert/strict';

import './helpers';
import {
    OpenAICompatibleBackend,
    TritonBackend,
    createChatBackend,
    formatPrompt,
    readChatCompletion,
} from '../src/chat_backends';
import { DEFAULT_CONFIG } from '../src/config';
import type { ModelMessage } from '../src/model_router';

type FetchArgs = Parameters<typeof fetch>;

const MESSAGES: ModelMessage[] = [
    { role: 'system', content: 'be brief' },
    { role: 'user', content: 'hello' },
];

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function chatBody(content: string): unknown {
    return { choices: [{ message: { role: 'assistant', content }, finish_reason: 'stop' }] };
}

function requestBody(init: RequestInit | undefined): unknown {
    return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

function openai(model: string): OpenAICompatibleBackend {
    return new OpenAICompatibleBackend({
        provider: 'openai',
        baseUrl: 'https://api.example.test/v1/',
        model,
        apiKey: 'test-key',
        timeoutMs: 1000,
    });
}

test('chat completion request and reply', async (t) => {
    const fetchMock = t.mock.method(globalThis, 'fetch', async (..._args: FetchArgs) => jsonResponse(chatBody('hi!')));

    const res = await openai('gpt-4o-mini').complete(MESSAGES, { jsonMode: true });
    assert.equal(res.ok, true);
    if (res.ok) {
        assert.equal(res.completion, 'hi!');
        assert.equal(res.finishReason, 'stop');
        assert.equal(res.modelId, 'gpt-4o-mini');
    }

    assert.equal(fetchMock.mock.callCount(), 1);
    const [url, init] = fetchMock.mock.calls[0].arguments;
    assert.equal(url, 'https://api.example.test/v1/chat/completions');
    assert.equal(init?.method, 'POST');
    assert.equal(new Headers(init?.headers).get('authorization'), 'Bearer test-key');
    assert.deepEqual(requestBody(init), {
        model: 'gpt-4o-mini',
        messages: MESSAGES,
        stream: false,
        response_format: { type: 'json_object' },
    });
});

test('json mode is not requested from models that reject it', async (t) => {
    const fetchMock = t.mock.method(globalThis, 'fetch', async (..._args: FetchArgs) => jsonResponse(chatBody('{}')));

    await openai('deepseek-reasoner').complete(MESSAGES, { jsonMode: true });
    const [, init] = fetchMock.mock.calls[0].arguments;
    assert.deepEqual(requestBody(init), { model: 'deepseek-reasoner', messages: MESSAGES, stream: false });
});

test('HTTP errors map to retryable and non-retryable failures', async (t) => {
    const statuses = [429, 503, 400];
    t.mock.method(globalThis, 'fetch', async (..._args: FetchArgs) => jsonResponse({ error: 'nope' }, statuses.shift() ?? 500));
    const backend = openai('gpt-4o-mini');

    const limited = await backend.complete(MESSAGES, {});
    const infra = await backend.complete(MESSAGES, {});
    const invalid = await backend.complete(MESSAGES, {});

    assert.deepEqual(
        [limited, infra, invalid].map(r => r.ok ? null : [r.errorCode, r.retryable, r.httpStatus, r.message]),
        [
            ['RATE_LIMITED', true, 429, 'openai error 429'],
            ['INFRA_ERROR', true, 503, 'openai error 503'],
            ['INVALID_REQUEST', false, 400, 'openai error 400'],
        ]
    );
});

test('a body that is not a chat completion is a model error', async (t) => {
    t.mock.method(globalThis, 'fetch', async (..._args: FetchArgs) => jsonResponse({ result: 'text' }));

    const res = await openai('gpt-4o-mini').complete(MESSAGES, {});
    assert.equal(res.ok, false);
    if (!res.ok) {
        assert.equal(res.errorCode, 'MODEL_ERROR');
        assert.equal(res.retryable, false);
        assert.equal(res.message, 'provider_response_not_chat_completion');
    }
});

test('network failure is retryable', async (t) => {
    t.mock.method(globalThis, 'fetch', async (..._args: FetchArgs) => {
        throw new TypeError('fetch failed');
    });

    const res = await openai('gpt-4o-mini').complete(MESSAGES, {});
    assert.equal(res.ok, false);
    if (!res.ok) {
        assert.equal(res.errorCode, 'NETWORK_ERROR');
        assert.equal(res.retryable, true);
        assert.equal(res.message, 'network_error: fetch failed');
        assert.equal(res.httpStatus, null);
    }
});

test('readChatCompletion tolerates null content', () => {
    assert.deepEqual(readChatCompletion({ choices: [{ message: { content: null } }] }), {
        completion: '',
        finishReason: null,
    });
    assert.equal(readChatCompletion({ choices: [] }), null);
});

test('formatPrompt flattens roles and ends with the assistant cue', () => {
    assert.equal(formatPrompt(MESSAGES), 'system: be brief\n\nuser: hello\n\nassistant:');
});

test('triton generate request strips an echoed prompt', async (t) => {
    const prompt = formatPrompt(MESSAGES);
    const fetchMock = t.mock.method(globalThis, 'fetch', async (..._args: FetchArgs) => jsonResponse({ text_output: `${prompt} Hi, how can I help?\n` }));
    const backend = new TritonBackend({ url: 'localhost:8000', modelName: 'llama', maxTokens: 64, timeoutMs: 1000 });

    const res = await backend.complete(MESSAGES, {});
    assert.equal(res.ok, true);
    if (res.ok) assert.equal(res.completion, 'Hi, how can I help?');

    const [url, init] = fetchMock.mock.calls[0].arguments;
    assert.equal(url, 'http://localhost:8000/v2/models/llama/generate');
    assert.deepEqual(requestBody(init), {
        text_input: prompt,
        parameters: { max_tokens: 64, stream: false },
    });
});

test('triton reply without text_output is a model error', async (t) => {
    t.mock.method(globalThis, 'fetch', async (..._args: FetchArgs) => jsonResponse({ outputs: [] }));
    const backend = new TritonBackend({ url: 'http://gpu:8000/', modelName: 'llama', maxTokens: 64, timeoutMs: 1000 });

    assert.equal(backend.endpoint, 'http://gpu:8000/v2/models/llama/generate');
    const res = await backend.complete(MESSAGES, {});
    assert.equal(res.ok ? null : res.errorCode, 'MODEL_ERROR');
});

test('backend is chosen from the model source', () => {
    assert.equal(createChatBackend({ ...DEFAULT_CONFIG, modelSource: 'local' }).name, 'local');
    assert.equal(createChatBackend({ ...DEFAULT_CONFIG, modelSource: 'openai' }).modelId, 'gpt-3.5-turbo');
    assert.equal(createChatBackend({ ...DEFAULT_CONFIG, modelSource: 'deepseek' }).modelId, 'deepseek-reasoner');
});

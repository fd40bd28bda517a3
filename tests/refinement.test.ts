import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { ArtifactAcceptor } from '../src/artifact_acceptance';
import { ArtifactLedger } from '../src/artifact_ledger';
import { ArtifactWriter } from '../src/artifact_writer';
import { ConversationStore } from '../src/conversation_store';
import { getRefinementPrompt } from '../src/prompts';
import { NO_FEEDBACK, RefinementLoop } from '../src/refinement';
import { GenerationError } from '../src/structured_error';
import { Verifier } from '../src/verifier';
import { FakeChecks, ScriptedGenerator, makeTempDir, removeDir } from './helpers';

interface Harness {
    loop: RefinementLoop;
    store: ConversationStore;
    gen: ScriptedGenerator;
    ledger: ArtifactLedger;
    outDir: string;
}

async function withLoop(
    gen: ScriptedGenerator,
    fn: (h: Harness) => Promise<void>
): Promise<void> {
    const dir = makeTempDir('refinement-');
    const ledger = new ArtifactLedger(':memory:');
    try {
        const outDir = path.join(dir, 'generated');
        const store = new ConversationStore({ filePath: path.join(dir, 'state.json'), maxLength: 10 });
        store.append('root', 'system', 'sys');
        store.append('root', 'user', 'build it');
        store.append('root', 'assistant', 'here:\n```python\nx=1\n```');

        const verifier = new Verifier(gen, { language: 'python', cacheSize: 0 });
        const acceptor = new ArtifactAcceptor({ writer: new ArtifactWriter(outDir, '.py'), checker: new FakeChecks(), ledger });
        const loop = new RefinementLoop({ store, generator: gen, verifier, acceptor, language: 'python' });
        await fn({ loop, store, gen, ledger, outDir });
    } finally {
        ledger.close();
        removeDir(dir);
    }
}

test('improved snippet that verifies is written as the refined artifact', async () => {
    const gen = new ScriptedGenerator(['Better:\n```python\nx = 1  # documented\n```']);
    await withLoop(gen, async ({ loop, store, outDir }) => {
        const record = await loop.refine('root', 'needs a comment', 'x=1', 0);

        assert.equal(record.status, 'accepted');
        assert.equal(record.stage, 'refined');
        assert.equal(fs.readFileSync(path.join(outDir, 'root_refined_0.py'), 'utf-8'), 'x = 1  # documented');

        const history = store.get('root');
        assert.equal(history.length, 5);
        assert.equal(history[3].role, 'user');
        assert.equal(history[3].content, getRefinementPrompt('needs a comment', 'x=1', 'python'));
        assert.equal(history[4].role, 'assistant');

        assert.equal(gen.conversationCalls.length, 1);
        assert.equal(gen.conversationCalls[0].messages.length, 4);
        assert.equal(gen.verificationCalls.length, 1);
    });
});

test('a second rejection is recorded and not retried', async () => {
    const gen = new ScriptedGenerator(['```python\nx = 2\n```'], '{"complete": false, "feedback": "still wrong"}');
    await withLoop(gen, async ({ loop, outDir }) => {
        const record = await loop.refine('root', 'wrong', 'x=1', 0);

        assert.equal(record.status, 'rejected');
        assert.equal(record.feedback, 'still wrong');
        assert.equal(gen.conversationCalls.length, 1);
        assert.equal(gen.verificationCalls.length, 1);
        assert.equal(fs.existsSync(path.join(outDir, 'root_refined_0.py')), false);
    });
});

test('reply without a code block records no_code and skips verification', async () => {
    const gen = new ScriptedGenerator(['I am not sure what to change.']);
    await withLoop(gen, async ({ loop, store }) => {
        const record = await loop.refine('root', 'wrong', 'x=1', 2);

        assert.equal(record.status, 'no_code');
        assert.equal(record.index, 2);
        assert.equal(gen.verificationCalls.length, 0);
        assert.equal(store.get('root').length, 5);
    });
});

test('blank reply records no_code without appending it', async () => {
    const gen = new ScriptedGenerator(['   ']);
    await withLoop(gen, async ({ loop, store }) => {
        const record = await loop.refine('root', 'wrong', 'x=1', 0);

        assert.equal(record.status, 'no_code');
        assert.equal(store.get('root').length, 4);
    });
});

test('empty feedback is replaced in the refinement request', async () => {
    const gen = new ScriptedGenerator(['no code']);
    await withLoop(gen, async ({ loop, store }) => {
        await loop.refine('root', '', 'x=1', 0);
        assert.equal(store.get('root')[3].content, getRefinementPrompt(NO_FEEDBACK, 'x=1', 'python'));
    });
});

test('generation failure propagates', async () => {
    const gen = new ScriptedGenerator([new GenerationError('deepseek call failed after 3 attempts: down', 3, 'INFRA_ERROR')]);
    await withLoop(gen, async ({ loop }) => {
        await assert.rejects(loop.refine('root', 'wrong', 'x=1', 0), GenerationError);
    });
});

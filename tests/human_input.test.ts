import test from 'node:test';
import assert from 'node:assert/strict';
import { PassThrough } from 'node:stream';

import './helpers';
import { AutoAnswerInput, ConsoleHumanInput } from '../src/human_input';

test('console input returns the trimmed answer line', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const human = new ConsoleHumanInput(input, output);

    const answer = human.ask('Which database?');
    input.write('  sqlite  \n');

    assert.equal(await answer, 'sqlite');
    assert.equal(output.read().toString(), '\nWhich database?\n> ');
});

test('input ending before an answer yields a blank answer', async () => {
    const input = new PassThrough();
    const human = new ConsoleHumanInput(input, new PassThrough());

    const answer = human.ask('Which database?');
    input.end();

    assert.equal(await answer, '');
});

test('questions after the input has ended are answered blank at once', async () => {
    const input = new PassThrough();
    const human = new ConsoleHumanInput(input, new PassThrough());

    const first = human.ask('Which language?');
    input.end();
    assert.equal(await first, '');

    assert.equal(await human.ask('Which database?'), '');
});

test('auto-answer mode echoes the question in a fixed placeholder', async () => {
    assert.equal(
        await new AutoAnswerInput().ask('Which database?'),
        "Auto-answer for 'Which database?' (simulated)."
    );
});

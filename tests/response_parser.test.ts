import test from 'node:test';
import assert from 'node:assert/strict';

import { extract, extractCodeBlocks, extractQuestions } from '../src/response_parser';

test('questions are trimmed lines ending with a question mark', () => {
    const text = 'Sure.\n  What database do you use?  \nIs this a question? no\nWhich port?';
    assert.deepEqual(extractQuestions(text), ['What database do you use?', 'Which port?']);
});

test('fenced blocks are returned in order with the language tag dropped', () => {
    const text = [
        'First part:',
        '```python',
        'def add(a, b):',
        '    return a + b',
        '```',
        'And a shell step:',
        '```',
        'echo hi',
        '```',
    ].join('\n');

    assert.deepEqual(extractCodeBlocks(text), ['def add(a, b):\n    return a + b', 'echo hi']);
});

test('a reply with two questions and two blocks parses both', () => {
    const text = 'What is the input format?\n```py\nx = 1\n```\nShould errors be logged?\n```py\ny = 2\n```';
    assert.deepEqual(extract(text), {
        questions: ['What is the input format?', 'Should errors be logged?'],
        codeBlocks: ['x = 1', 'y = 2'],
    });
});

test('an unterminated fence yields no block', () => {
    assert.deepEqual(extractCodeBlocks('```python\nprint(1)\n'), []);
});

test('inline single-line fence keeps its content', () => {
    assert.deepEqual(extractCodeBlocks('run ```ls -la``` now'), ['ls -la']);
});

test('empty input parses to nothing', () => {
    assert.deepEqual(extract(''), { questions: [], codeBlocks: [] });
});

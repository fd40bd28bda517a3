/**
 * Where answers to clarifying questions come from.
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import { createLogger } from './logger';

const log = createLogger('human-input');

export interface HumanInput {
    ask(prompt: string): Promise<string>;
}

/**
 * Blocks on stdin until the user answers. No timeout. Once the input has
 * ended every question gets a blank answer.
 */
export class ConsoleHumanInput implements HumanInput {
    constructor(
        private readonly input: Readable = process.stdin,
        private readonly output: Writable = process.stdout
    ) { }

    ask(prompt: string): Promise<string> {
        if (this.input.readableEnded) {
            log.warn('Input already closed; question left unanswered', { question: prompt });
            return Promise.resolve('');
        }

        const rl = readline.createInterface({ input: this.input, output: this.output });

        return new Promise((resolve) => {
            let answered = false;
            rl.once('close', () => {
                if (answered) return;
                log.warn('Input closed before an answer arrived', { question: prompt });
                resolve('');
            });
            rl.question(`\n${prompt}\n> `, (answer) => {
                answered = true;
                rl.close();
                resolve(answer.trim());
            });
        });
    }
}

/** Unattended mode: answers every question with a fixed placeholder. */
export class AutoAnswerInput implements HumanInput {
    async ask(prompt: string): Promise<string> {
        return `Auto-answer for '${prompt}' (simulated).`;
    }
}

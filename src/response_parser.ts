/**
 * Response Parser - pulls clarifying questions and fenced code out of a model reply.
 * Pure: no side effects, never throws.
 */

export interface ParsedResponse {
    questions: string[];
    codeBlocks: string[];
}

// Opening fence, optional language tag (a single token followed by a newline),
// body, closing fence.
const CODE_FENCE = /```(?:[^\s`]*\r?\n)?([\s\S]*?)```/g;

export function extractQuestions(text: string): string[] {
    return text
        .split('\n')
        .map(line => line.trim())
        .filter(line => line.endsWith('?'));
}

export function extractCodeBlocks(text: string): string[] {
    const blocks: string[] = [];
    for (const match of text.matchAll(CODE_FENCE)) {
        blocks.push(match[1].trim());
    }
    return blocks;
}

export function extract(text: string): ParsedResponse {
    return {
        questions: extractQuestions(text),
        codeBlocks: extractCodeBlocks(text),
    };
}

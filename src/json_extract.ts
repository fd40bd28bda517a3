/**
 * Finds the first JSON object embedded in free-form model text.
 *
 * Candidates start at each `{`; a string-aware bracket scan finds where the
 * candidate closes and JSON.parse decides whether it is valid. A candidate
 * that fails (prose in braces, truncated output) moves the search on to the
 * next `{`, so nested or stray braces never swallow a later valid object.
 */

import { isRecord } from './schema_validator';

/** Index of the `}` that closes the object opened at `start`, or -1. */
export function findObjectEnd(text: string, start: number): number {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const ch = text[i];
        if (inString) {
            if (escaped) escaped = false;
            else if (ch === '\\') escaped = true;
            else if (ch === '"') inString = false;
            continue;
        }
        if (ch === '"') inString = true;
        else if (ch === '{') depth++;
        else if (ch === '}') {
            depth--;
            if (depth === 0) return i;
        }
    }
    return -1;
}

function parseObject(candidate: string): Record<string, unknown> | undefined {
    let parsed: unknown;
    try {
        parsed = JSON.parse(candidate);
    } catch {
        return undefined;
    }
    return isRecord(parsed) ? parsed : undefined;
}

export function extractFirstJsonObject(text: string): Record<string, unknown> | undefined {
    for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
        const end = findObjectEnd(text, start);
        if (end === -1) continue;
        const obj = parseObject(text.slice(start, end + 1));
        if (obj) return obj;
    }
    return undefined;
}

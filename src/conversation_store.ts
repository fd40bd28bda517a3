/**
 * Conversation Store
 *
 * Branch name -> ordered message log, kept in memory and mirrored to a JSON
 * snapshot on every mutation.
 *
 * GUARANTEES:
 * - After any append, a branch holds at most `maxLength` messages. When the
 *   window slides, message 0 (the system message by convention) is kept along
 *   with the newest `maxLength - 1` entries.
 * - Messages are never edited after being appended.
 * - Invalid input is rejected before any state changes.
 * - A corrupt snapshot never prevents construction: it is moved aside and the
 *   store starts empty.
 */

import * as fs from 'fs';
import { atomicWriteJsonSync } from './atomic_write';
import { createLogger } from './logger';
import type { ModelMessage, ModelRole } from './model_router';
import { isRecord } from './schema_validator';
import {
    ErrorFactory,
    StoreWriteError,
    ValidationError,
    describeError,
    logStructuredError,
} from './structured_error';

const log = createLogger('conversation-store');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface StoredMessage {
    role: ModelRole;
    content: string;
    timestamp: string;
    /** Store-wide sequence number, increasing in append order. */
    id: number;
}

export type ConversationSnapshot = Record<string, StoredMessage[]>;

export interface ConversationStoreOptions {
    filePath: string;
    maxLength: number;
}

export function isModelRole(value: unknown): value is ModelRole {
    return value === 'system' || value === 'user' || value === 'assistant';
}

/* -------------------------------------------------------------------------- */
/* Snapshot decoding                                                          */
/* -------------------------------------------------------------------------- */

interface DecodedEntry {
    role: ModelRole;
    content: string;
    timestamp?: string;
    id?: number;
}

function decodeEntry(value: unknown): DecodedEntry | null {
    if (!isRecord(value)) return null;
    const { role, content, timestamp, id } = value;
    if (!isModelRole(role) || typeof content !== 'string') return null;
    return {
        role,
        content,
        timestamp: typeof timestamp === 'string' ? timestamp : undefined,
        id: typeof id === 'number' && Number.isInteger(id) && id > 0 ? id : undefined,
    };
}

function decodeSnapshot(raw: unknown): Map<string, DecodedEntry[]> {
    if (!isRecord(raw)) {
        throw new Error('snapshot root is not an object');
    }
    const out = new Map<string, DecodedEntry[]>();
    for (const [branch, entries] of Object.entries(raw)) {
        if (!Array.isArray(entries)) {
            throw new Error(`branch "${branch}" is not a list`);
        }
        const decoded: DecodedEntry[] = [];
        entries.forEach((entry, i) => {
            const msg = decodeEntry(entry);
            if (!msg) throw new Error(`branch "${branch}" entry ${i} is not a message`);
            decoded.push(msg);
        });
        out.set(branch, decoded);
    }
    return out;
}

/* -------------------------------------------------------------------------- */
/* Store                                                                      */
/* -------------------------------------------------------------------------- */

export class ConversationStore {
    private readonly branches = new Map<string, StoredMessage[]>();
    private readonly filePath: string;
    private readonly maxLength: number;
    private nextId = 1;

    constructor(opts: ConversationStoreOptions) {
        if (!Number.isInteger(opts.maxLength) || opts.maxLength < 2) {
            throw new ValidationError(`maxLength must be an integer >= 2, got ${opts.maxLength}`);
        }
        this.filePath = opts.filePath;
        this.maxLength = opts.maxLength;
        this.load();
    }

    get(branch: string): StoredMessage[] {
        return (this.branches.get(branch) ?? []).map(m => ({ ...m }));
    }

    /** Role/content pairs for the generation capability. */
    messages(branch: string): ModelMessage[] {
        return (this.branches.get(branch) ?? []).map(m => ({ role: m.role, content: m.content }));
    }

    append(branch: string, role: string, content: string): StoredMessage {
        if (!branch) {
            throw new ValidationError('branch name must be non-empty');
        }
        if (!isModelRole(role)) {
            throw new ValidationError(`role must be system|user|assistant, got "${role}"`);
        }
        if (typeof content !== 'string' || content.trim().length === 0) {
            throw new ValidationError(`content for ${branch} must be a non-empty string`);
        }

        const message: StoredMessage = {
            role,
            content,
            timestamp: new Date().toISOString(),
            id: this.nextId++,
        };
        const history = [...(this.branches.get(branch) ?? []), message];
        this.branches.set(branch, this.slideWindow(history));
        this.persist();
        return { ...message };
    }

    delete(branch: string): boolean {
        const existed = this.branches.delete(branch);
        if (existed) this.persist();
        return existed;
    }

    list(): Set<string> {
        return new Set(this.branches.keys());
    }

    /** Total characters of content stored for the branch. */
    size(branch: string): number {
        return (this.branches.get(branch) ?? []).reduce((sum, m) => sum + m.content.length, 0);
    }

    snapshot(): ConversationSnapshot {
        const out: ConversationSnapshot = {};
        for (const [branch, messages] of this.branches) {
            out[branch] = messages.map(m => ({ ...m }));
        }
        return out;
    }

    private slideWindow(history: StoredMessage[]): StoredMessage[] {
        if (history.length <= this.maxLength) return history;
        return [history[0], ...history.slice(-(this.maxLength - 1))];
    }

    /* ------------------------------------------------------------------------ */
    /* Persistence                                                              */
    /* ------------------------------------------------------------------------ */

    private persist(): void {
        try {
            atomicWriteJsonSync({ filePath: this.filePath, data: this.snapshot() });
            log.debug('Conversation data saved', { path: this.filePath });
        } catch (e) {
            log.error('Failed to save conversation data', { path: this.filePath, error: describeError(e) });
            throw new StoreWriteError(this.filePath, { cause: e });
        }
    }

    private load(): void {
        if (!fs.existsSync(this.filePath)) {
            log.info('No existing conversation file found; starting fresh', { path: this.filePath });
            return;
        }

        let decoded: Map<string, DecodedEntry[]>;
        try {
            decoded = decodeSnapshot(JSON.parse(fs.readFileSync(this.filePath, 'utf-8')));
        } catch (e) {
            logStructuredError(log, ErrorFactory.storeCorrupt(this.filePath, describeError(e), this.quarantine()));
            return;
        }

        let maxId = 0;
        for (const entries of decoded.values()) {
            for (const entry of entries) {
                if (entry.id !== undefined) maxId = Math.max(maxId, entry.id);
            }
        }
        this.nextId = maxId + 1;

        const loadedAt = new Date().toISOString();
        for (const [branch, entries] of decoded) {
            this.branches.set(branch, entries.map(entry => ({
                role: entry.role,
                content: entry.content,
                timestamp: entry.timestamp ?? loadedAt,
                id: entry.id ?? this.nextId++,
            })));
        }
        log.info('Loaded existing conversation data', { path: this.filePath, branches: this.branches.size });
    }

    /** Move an unreadable snapshot out of the way so the next save does not overwrite it. */
    private quarantine(): string | null {
        const target = `${this.filePath}.corrupt-${Date.now()}`;
        try {
            fs.renameSync(this.filePath, target);
            return target;
        } catch (e) {
            log.warn('Could not move corrupt conversation file aside', { path: this.filePath, error: describeError(e) });
            return null;
        }
    }
}

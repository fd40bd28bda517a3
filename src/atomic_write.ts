// Temp-file-and-rename writes for the conversation snapshot and artifacts.

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';

const log = createLogger('atomic-write');

const FILE_MODE = 0o644;

function errorCode(e: unknown): string | undefined {
    if (typeof e === 'object' && e !== null && 'code' in e) {
        const code = e.code;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}

function isFatalFsyncError(code?: string): boolean {
    return code === 'ENOSPC' || code === 'EIO';
}

/**
 * Best-effort fsync. Out-of-space and I/O errors are rethrown; anything else is
 * logged and returned as a warning line.
 */
export function syncPath(target: string, flags: string): string | null {
    try {
        const fd = fs.openSync(target, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
        return null;
    } catch (e) {
        const code = errorCode(e);
        if (isFatalFsyncError(code)) {
            throw e;
        }
        const warning = `FSYNC_WARN(${code || 'UNKNOWN'}) on ${target}`;
        log.warn(warning);
        return warning;
    }
}

export function atomicWriteFileSync(params: { filePath: string; content: Buffer | string }): void {
    const { filePath, content } = params;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString('hex')}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });

        // tmp always 0600 initially
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        syncPath(tmp, 'r+');

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, FILE_MODE);

        // Directory fsync is not supported on every platform.
        if (process.platform !== 'win32') {
            syncPath(dir, 'r');
        }
    } catch (e) {
        if (fs.existsSync(tmp)) fs.rmSync(tmp, { force: true });
        throw e;
    }
}

export function atomicWriteJsonSync(params: { filePath: string; data: unknown }): void {
    atomicWriteFileSync({
        filePath: params.filePath,
        content: JSON.stringify(params.data, null, 2),
    });
}

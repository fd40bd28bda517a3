import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { atomicWriteFileSync, atomicWriteJsonSync, syncPath } from '../src/atomic_write';
import { makeTempDir, removeDir } from './helpers';

test('writes land at the target with no temp files left behind', () => {
    const dir = makeTempDir('atomic-');
    try {
        const target = path.join(dir, 'nested', 'out.py');
        atomicWriteFileSync({ filePath: target, content: 'print(1)' });
        atomicWriteFileSync({ filePath: target, content: 'print(2)' });

        assert.equal(fs.readFileSync(target, 'utf-8'), 'print(2)');
        assert.deepEqual(fs.readdirSync(path.dirname(target)), ['out.py']);
    } finally {
        removeDir(dir);
    }
});

test('JSON snapshots are pretty-printed', () => {
    const dir = makeTempDir('atomic-');
    try {
        const target = path.join(dir, 'state.json');
        atomicWriteJsonSync({ filePath: target, data: { root: [] } });
        assert.equal(fs.readFileSync(target, 'utf-8'), '{\n  "root": []\n}');
    } finally {
        removeDir(dir);
    }
});

test('a non-fatal fsync failure is reported as a warning instead of thrown', () => {
    const dir = makeTempDir('atomic-');
    try {
        // Opening a directory for writing fails with EISDIR.
        assert.equal(syncPath(dir, 'r+'), `FSYNC_WARN(EISDIR) on ${dir}`);
        assert.equal(syncPath(dir, 'r'), null);
    } finally {
        removeDir(dir);
    }
});

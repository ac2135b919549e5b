import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ERRORS, isKernelError } from '../src/errors';
import {
    atomicWriteFile,
    atomicWriteJson,
    publishFile,
    removeIfPresent,
    tempPathFor,
} from '../src/publish/atomic_write';
import { stableStringify } from '../src/publish/stable_stringify';

describe('atomic publish', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'atomic-write-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('writes the file and leaves no temp files behind', async () => {
        const target = path.join(dir, 'out.txt');
        await atomicWriteFile(target, 'first');
        assert.equal(fs.readFileSync(target, 'utf8'), 'first');
        assert.deepEqual(fs.readdirSync(dir), ['out.txt']);
    });

    test('replaces an existing file and applies the default mode', async () => {
        const target = path.join(dir, 'out.txt');
        fs.writeFileSync(target, 'old');
        await atomicWriteFile(target, 'new');
        assert.equal(fs.readFileSync(target, 'utf8'), 'new');
        assert.equal(fs.statSync(target).mode & 0o777, 0o644);
    });

    test('honours an explicit mode', async () => {
        const target = path.join(dir, 'secret');
        await atomicWriteFile(target, 'x', { mode: 0o600 });
        assert.equal(fs.statSync(target).mode & 0o777, 0o600);
    });

    test('creates missing parent directories', async () => {
        const target = path.join(dir, 'a', 'b', 'c.txt');
        await atomicWriteFile(target, 'deep');
        assert.equal(fs.readFileSync(target, 'utf8'), 'deep');
    });

    test('JSON is canonical and newline terminated', async () => {
        const target = path.join(dir, 'doc.json');
        await atomicWriteJson(target, { b: [true, null], a: 1 });
        assert.equal(fs.readFileSync(target, 'utf8'), '{"a":1,"b":[true,null]}\n');
    });

    test('the target keeps its previous content until the rename', async () => {
        const target = path.join(dir, 'state.json');
        fs.writeFileSync(target, 'previous');

        let seenTmp = '';
        let seenTarget = '';
        await atomicWriteFile(target, 'next', {
            beforeRename: (tmp) => {
                seenTmp = fs.readFileSync(tmp, 'utf8');
                seenTarget = fs.readFileSync(target, 'utf8');
            },
        });

        assert.equal(seenTmp, 'next');
        assert.equal(seenTarget, 'previous');
        assert.equal(fs.readFileSync(target, 'utf8'), 'next');
    });

    test('a failure before the rename leaves the old file and removes the temp file', async () => {
        const target = path.join(dir, 'state.json');
        fs.writeFileSync(target, 'previous');

        await assert.rejects(
            atomicWriteFile(target, 'next', {
                beforeRename: () => {
                    throw new Error('simulated crash');
                },
            }),
            (e: unknown) => isKernelError(e, ERRORS.IO_ERROR) && /simulated crash/.test(e.message)
        );

        assert.equal(fs.readFileSync(target, 'utf8'), 'previous');
        assert.deepEqual(fs.readdirSync(dir), ['state.json']);
    });

    test('publishFile renames a staged file over the target', async () => {
        const target = path.join(dir, 'archive.tar');
        const staged = tempPathFor(target);
        fs.writeFileSync(staged, 'tarball bytes');

        const warnings: string[] = [];
        await publishFile(staged, target, { warnings });

        assert.equal(fs.readFileSync(target, 'utf8'), 'tarball bytes');
        assert.equal(fs.existsSync(staged), false);
    });

    test('publishFile of a missing staged file is IO_ERROR', async () => {
        const target = path.join(dir, 'archive.tar');
        await assert.rejects(publishFile(path.join(dir, 'not-there'), target), (e: unknown) =>
            isKernelError(e, ERRORS.IO_ERROR)
        );
        assert.equal(fs.existsSync(target), false);
    });

    test('temp names are hidden siblings of the target', () => {
        const target = path.join(dir, 'out.json');
        const tmp = tempPathFor(target);
        assert.equal(path.dirname(tmp), dir);
        assert.match(path.basename(tmp), /^\.out\.json\.[0-9a-f]{8}\.part$/);
        assert.notEqual(tempPathFor(target), tmp);
    });

    test('removeIfPresent ignores a missing file', async () => {
        await removeIfPresent(path.join(dir, 'never-existed'));
        const p = path.join(dir, 'x');
        fs.writeFileSync(p, '');
        await removeIfPresent(p);
        assert.equal(fs.existsSync(p), false);
    });
});

describe('stableStringify', () => {
    test('writes bigint as a bare integer and omits undefined keys', () => {
        assert.equal(stableStringify({ z: 10n, a: undefined, m: 'x' }), '{"m":"x","z":10}');
    });

    test('undefined array slots become null', () => {
        assert.equal(stableStringify([1, undefined, 'a']), '[1,null,"a"]');
    });

    test('rejects non-finite numbers', () => {
        assert.throws(() => stableStringify({ x: Number.NaN }), /UNSUPPORTED_JSON_NUMBER/);
    });
});

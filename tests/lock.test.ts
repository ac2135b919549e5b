import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ERRORS, isKernelError } from '../src/errors';
import { LockHandle, UNREADABLE_GRACE_MS, acquireJobLock, lockPathFor } from '../src/publish/lock';

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

// far above any real pid_max, so kill(pid, 0) reports ESRCH
const DEAD_PID = 2147483646;

describe('job lock', () => {
    let dir: string;
    let lockPath: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'job-lock-'));
        lockPath = lockPathFor(path.join(dir, 'state.json'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('lock path sits beside the state file', () => {
        assert.equal(lockPathFor('/var/backups/tar.state.json'), '/var/backups/tar.state.json.lock');
    });

    test('acquire writes the owner record; release removes it and is idempotent', async () => {
        const warnings: string[] = [];
        const lock = await acquireJobLock({ lockPath, timeoutMs: 0, warnings, owner: { job: 'tar' } });

        const record: { job?: unknown; pid?: unknown; nonce?: unknown } = JSON.parse(fs.readFileSync(lockPath, 'utf8'));
        assert.equal(record.job, 'tar');
        assert.equal(record.pid, process.pid);
        assert.equal(typeof record.nonce, 'string');
        assert.deepEqual(fs.readdirSync(dir), ['state.json.lock']);

        await lock.release();
        await lock.release();
        assert.equal(fs.existsSync(lockPath), false);
        assert.deepEqual(warnings, []);
    });

    test('a live lock fails with LOCK_HELD once the timeout passes', async () => {
        const first = await acquireJobLock({ lockPath, timeoutMs: 0, warnings: [], owner: {} });
        try {
            await assert.rejects(
                acquireJobLock({ lockPath, timeoutMs: 0, warnings: [], owner: {} }),
                (e: unknown) => isKernelError(e, ERRORS.LOCK_HELD)
            );
        } finally {
            await first.release();
        }
    });

    test('waits for a holder that releases within the timeout', async () => {
        const first = await acquireJobLock({ lockPath, timeoutMs: 0, warnings: [], owner: {} });
        const releasing = sleep(60).then(() => first.release());

        const warnings: string[] = [];
        const second = await acquireJobLock({ lockPath, timeoutMs: 5000, warnings, owner: {} });
        await releasing;

        assert.ok(warnings.length > 0);
        assert.match(warnings[0], /^LOCK_RETRY after 50ms on /);
        await second.release();
    });

    test('reclaims a lock whose owner process is gone', async () => {
        fs.writeFileSync(lockPath, JSON.stringify({ pid: DEAD_PID, started_ms: Date.now() }));

        const warnings: string[] = [];
        const lock = await acquireJobLock({ lockPath, timeoutMs: 0, warnings, owner: {} });

        assert.deepEqual(warnings, [`STALE_LOCK(PID_DEAD pid=${DEAD_PID}) ${lockPath}`]);
        await lock.release();
    });

    test('reclaims a lock older than the stale TTL', async () => {
        fs.writeFileSync(lockPath, JSON.stringify({ pid: process.pid, started_ms: Date.now() - 60_000 }));

        const warnings: string[] = [];
        const lock = await acquireJobLock({ lockPath, timeoutMs: 0, warnings, owner: {}, staleTtlMs: 1000 });

        assert.equal(warnings.length, 1);
        assert.match(warnings[0], /^STALE_LOCK\(AGE age=\d+ms\) /);
        await lock.release();
    });

    test('an unparseable lock is left alone while it is fresh', async () => {
        fs.writeFileSync(lockPath, '{"pid": 12');

        await assert.rejects(
            acquireJobLock({ lockPath, timeoutMs: 0, warnings: [], owner: {} }),
            (e: unknown) => isKernelError(e, ERRORS.LOCK_HELD)
        );
        assert.equal(fs.readFileSync(lockPath, 'utf8'), '{"pid": 12');
    });

    test('reclaims an unparseable lock once its grace period has passed', async () => {
        fs.writeFileSync(lockPath, '{"pid": 12');
        const old = (Date.now() - UNREADABLE_GRACE_MS - 60_000) / 1000;
        fs.utimesSync(lockPath, old, old);

        const warnings: string[] = [];
        const lock = await acquireJobLock({ lockPath, timeoutMs: 0, warnings, owner: {} });

        assert.deepEqual(warnings, [`STALE_LOCK(UNREADABLE) ${lockPath}`]);
        await lock.release();
    });

    test('the lock file is never visible without its owner record', async () => {
        const attempts = await Promise.allSettled(
            Array.from({ length: 8 }, (_, i) =>
                acquireJobLock({ lockPath, timeoutMs: 0, warnings: [], owner: { job: `job-${i}` } })
            )
        );

        const held: LockHandle[] = [];
        for (const a of attempts) {
            if (a.status === 'fulfilled') held.push(a.value);
            else assert.ok(isKernelError(a.reason, ERRORS.LOCK_HELD));
        }
        assert.equal(held.length, 1);
        assert.deepEqual(fs.readdirSync(dir), ['state.json.lock']);
        await held[0].release();
        assert.deepEqual(fs.readdirSync(dir), []);
    });

    test('two contenders reclaiming the same stale lock end with one holder', async () => {
        fs.writeFileSync(lockPath, JSON.stringify({ pid: DEAD_PID, started_ms: Date.now() }));

        const warnings: string[] = [];
        const attempts = await Promise.allSettled([
            acquireJobLock({ lockPath, timeoutMs: 0, warnings, owner: { job: 'a' } }),
            acquireJobLock({ lockPath, timeoutMs: 0, warnings, owner: { job: 'b' } }),
        ]);

        const held: LockHandle[] = [];
        for (const a of attempts) {
            if (a.status === 'fulfilled') held.push(a.value);
            else assert.ok(isKernelError(a.reason, ERRORS.LOCK_HELD));
        }
        assert.equal(held.length, 1);
        assert.deepEqual(
            warnings.filter((w) => w.startsWith('STALE_LOCK')),
            [`STALE_LOCK(PID_DEAD pid=${DEAD_PID}) ${lockPath}`]
        );
        assert.deepEqual(fs.readdirSync(dir), ['state.json.lock']);
        await held[0].release();
    });

    test('release leaves a lock that another owner has taken over', async () => {
        const lock = await acquireJobLock({ lockPath, timeoutMs: 0, warnings: [], owner: {} });
        const successor = JSON.stringify({ pid: process.pid, started_ms: Date.now(), nonce: 'successor' });
        fs.writeFileSync(lockPath, successor);

        await assert.rejects(lock.release(), (e: unknown) => isKernelError(e, ERRORS.LOCK_HELD));
        assert.equal(fs.readFileSync(lockPath, 'utf8'), successor);
        assert.deepEqual(fs.readdirSync(dir), ['state.json.lock']);
    });
});

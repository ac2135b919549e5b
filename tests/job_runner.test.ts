import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { AuditTrail } from '../src/audit_trail';
import { ERRORS, isKernelError } from '../src/errors';
import { combineSignatures, quickSignature } from '../src/fingerprint';
import { BuildContext, JobDefinition, JobDeps, commandBuild, runIdempotentJob } from '../src/job_runner';
import { silentLogger } from '../src/logger';
import { acquireJobLock, lockPathFor } from '../src/publish/lock';
import { loadState, newStateRecord, saveState } from '../src/state_store';

const NOW = new Date('2024-05-01T00:00:00.000Z');
const UP1 = 'd4'.repeat(32);
const UP2 = 'e5'.repeat(32);

const FULL_BUILD_STEPS = [
    'compute input signature',
    'load prior state',
    'inspect artifact',
    'decide',
    'build artifact',
    'hash artifact',
    'write sidecar',
    'write state',
];

function sha(text: string): string {
    return crypto.createHash('sha256').update(text).digest('hex');
}

describe('runIdempotentJob', () => {
    let dir: string;
    let root: string;
    let out: string;
    let audit: AuditTrail;
    let deps: JobDeps;
    let builds: number;

    function job(overrides: Partial<JobDefinition> = {}): JobDefinition {
        return {
            name: 'tar',
            root,
            statePath: path.join(out, 'tar.state.json'),
            artifactPath: path.join(out, 'home.tar'),
            sidecar: true,
            build: async (ctx: BuildContext) => {
                builds += 1;
                fs.writeFileSync(ctx.stagingPath, `archive of ${ctx.signature.fileCount} files`);
            },
            ...overrides,
        };
    }

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'job-runner-'));
        root = path.join(dir, 'src');
        out = path.join(dir, 'out');
        fs.mkdirSync(root);
        fs.writeFileSync(path.join(root, 'notes.txt'), 'remember the milk');
        fs.writeFileSync(path.join(root, 'todo.txt'), 'backup');

        audit = new AuditTrail(path.join(dir, 'audit.db'));
        deps = { audit, logger: silentLogger(), lockTimeoutMs: 0, now: () => NOW };
        builds = 0;
    });

    afterEach(() => {
        audit.close();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('first run builds, publishes and records everything', async () => {
        const report = await runIdempotentJob(deps, job());

        const expectedInput = (await quickSignature(root)).hash;
        const expectedOutput = sha('archive of 2 files');

        assert.equal(report.outcome, 'NO_PRIOR_STATE');
        assert.equal(report.status, 'success');
        assert.equal(report.inputSignatureHash, expectedInput);
        assert.equal(report.outputSignatureHash, expectedOutput);
        assert.match(report.runId, /^tar-[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
        assert.equal(builds, 1);

        assert.equal(fs.readFileSync(path.join(out, 'home.tar'), 'utf8'), 'archive of 2 files');
        assert.equal(fs.readFileSync(path.join(out, 'home.tar.sha256'), 'utf8'), `${expectedOutput}  home.tar\n`);
        assert.deepEqual(fs.readdirSync(out).sort(), ['home.tar', 'home.tar.sha256', 'tar.state.json']);

        assert.deepEqual(await loadState(path.join(out, 'tar.state.json')), {
            inputSignatureHash: expectedInput,
            outputSignatureHash: expectedOutput,
            upstreamSignatureHash: null,
            timestamp: NOW.toISOString(),
        });

        const run = audit.getRun(report.runId);
        assert.equal(run?.status, 'success');
        assert.equal(run?.inputSignatureHash, expectedInput);
        assert.equal(run?.outputSignatureHash, expectedOutput);
        assert.equal(run?.outputPath, path.join(out, 'home.tar'));
        assert.equal(run?.signatures.jobResult, expectedOutput);

        const steps = audit.stepsFor(report.runId);
        assert.deepEqual(
            steps.map((s) => s.name),
            FULL_BUILD_STEPS
        );
        assert.ok(steps.every((s) => s.status === 'success'));
        assert.equal(steps[3].message, 'NO_PRIOR_STATE: no prior state recorded');
    });

    test('second run over an unchanged tree is skipped', async () => {
        const first = await runIdempotentJob(deps, job());
        const second = await runIdempotentJob(deps, job());

        assert.equal(second.outcome, 'UP_TO_DATE');
        assert.equal(second.status, 'skipped');
        assert.equal(second.outputSignatureHash, first.outputSignatureHash);
        assert.equal(builds, 1);

        assert.equal(audit.getRun(second.runId)?.status, 'skipped');
        assert.deepEqual(
            audit.stepsFor(second.runId).map((s) => `${s.name}:${s.status}`),
            [
                'compute input signature:success',
                'load prior state:success',
                'inspect artifact:success',
                'decide:success',
            ]
        );
        assert.deepEqual(
            audit.lastRuns(2).map((r) => r.status),
            ['skipped', 'success']
        );
    });

    test('changed input rebuilds without hashing the old artifact', async () => {
        await runIdempotentJob(deps, job());
        fs.writeFileSync(path.join(root, 'new.txt'), 'fresh');

        const report = await runIdempotentJob(deps, job());
        assert.equal(report.outcome, 'INPUT_CHANGED');
        assert.equal(builds, 2);
        assert.equal(fs.readFileSync(path.join(out, 'home.tar'), 'utf8'), 'archive of 3 files');

        const inspect = audit.stepsFor(report.runId)[2];
        assert.equal(inspect.status, 'skipped');
        assert.equal(inspect.message, 'not hashed: no matching prior input');
    });

    test('a modified artifact is rebuilt', async () => {
        await runIdempotentJob(deps, job());
        fs.writeFileSync(path.join(out, 'home.tar'), 'tampered');

        const report = await runIdempotentJob(deps, job());
        assert.equal(report.outcome, 'OUTPUT_MISSING_OR_TAMPERED');
        assert.equal(fs.readFileSync(path.join(out, 'home.tar'), 'utf8'), 'archive of 2 files');
    });

    test('a deleted artifact is rebuilt', async () => {
        await runIdempotentJob(deps, job());
        fs.unlinkSync(path.join(out, 'home.tar'));

        const report = await runIdempotentJob(deps, job());
        assert.equal(report.outcome, 'OUTPUT_MISSING_OR_TAMPERED');
        assert.equal(builds, 2);
        assert.equal(audit.stepsFor(report.runId)[2].message, 'artifact missing');
    });

    test('an unreadable state file is rebuilt over', async () => {
        await runIdempotentJob(deps, job());
        fs.writeFileSync(path.join(out, 'tar.state.json'), '{"datetime": ');

        const report = await runIdempotentJob(deps, job());
        assert.equal(report.outcome, 'STATE_UNREADABLE');
        assert.equal((await loadState(path.join(out, 'tar.state.json')))?.outputSignatureHash, report.outputSignatureHash);
    });

    test('without a sidecar the step is left out', async () => {
        const report = await runIdempotentJob(deps, job({ sidecar: false }));
        assert.equal(fs.existsSync(path.join(out, 'home.tar.sha256')), false);
        assert.deepEqual(
            audit.stepsFor(report.runId).map((s) => s.name),
            FULL_BUILD_STEPS.filter((n) => n !== 'write sidecar')
        );
    });

    test('a failing build fails the run and leaves no state or staging file', async () => {
        const failing = job({
            build: async (ctx) => {
                fs.writeFileSync(ctx.stagingPath, 'partial');
                throw new Error('tar: disk quota exceeded');
            },
        });

        await assert.rejects(runIdempotentJob(deps, failing, { runId: 'tar-failing' }), /disk quota exceeded/);

        assert.deepEqual(fs.readdirSync(out), []);
        assert.equal(audit.getRun('tar-failing')?.status, 'failed');

        const steps = audit.stepsFor('tar-failing');
        const last = steps[steps.length - 1];
        assert.equal(last.name, 'build artifact');
        assert.equal(last.status, 'failed');
        assert.equal(last.message, 'tar: disk quota exceeded');
    });

    test('a failed rebuild keeps the previous artifact and state', async () => {
        await runIdempotentJob(deps, job());
        const stateBefore = fs.readFileSync(path.join(out, 'tar.state.json'), 'utf8');
        fs.writeFileSync(path.join(root, 'new.txt'), 'fresh');

        await assert.rejects(
            runIdempotentJob(
                deps,
                job({
                    build: async () => {
                        throw new Error('gpg: no secret key');
                    },
                })
            ),
            /no secret key/
        );

        assert.equal(fs.readFileSync(path.join(out, 'home.tar'), 'utf8'), 'archive of 2 files');
        assert.equal(fs.readFileSync(path.join(out, 'tar.state.json'), 'utf8'), stateBefore);
    });

    test('a concurrent run of the same job fails with LOCK_HELD', async () => {
        const held = await acquireJobLock({
            lockPath: lockPathFor(path.join(out, 'tar.state.json')),
            timeoutMs: 0,
            warnings: [],
            owner: { job: 'tar' },
        });
        try {
            await assert.rejects(runIdempotentJob(deps, job(), { runId: 'tar-second' }), (e: unknown) =>
                isKernelError(e, ERRORS.LOCK_HELD)
            );
        } finally {
            await held.release();
        }

        assert.equal(builds, 0);
        assert.equal(audit.getRun('tar-second')?.status, 'failed');
        assert.deepEqual(audit.stepsFor('tar-second'), []);
    });

    test('the lock is released after every run', async () => {
        await runIdempotentJob(deps, job());
        assert.equal(fs.existsSync(lockPathFor(path.join(out, 'tar.state.json'))), false);
    });

    test('an upstream output change invalidates the job', async () => {
        const upstreamState = path.join(dir, 'manifest.state.json');
        await saveState(upstreamState, newStateRecord({ input: 'aa', output: UP1 }, NOW));
        const withUpstream = job({ upstreamStatePath: upstreamState });

        const first = await runIdempotentJob(deps, withUpstream);
        const treeHash = (await quickSignature(root)).hash;
        assert.equal(first.inputSignatureHash, combineSignatures(treeHash, UP1));
        assert.equal(audit.getRun(first.runId)?.signatures.currentUpstream, UP1);

        const second = await runIdempotentJob(deps, withUpstream);
        assert.equal(second.outcome, 'UP_TO_DATE');

        await saveState(upstreamState, newStateRecord({ input: 'aa', output: UP2 }, NOW));
        const third = await runIdempotentJob(deps, withUpstream);
        assert.equal(third.outcome, 'INPUT_CHANGED');

        const signatures = audit.getRun(third.runId)?.signatures;
        assert.equal(signatures?.currentUpstream, UP2);
        assert.equal(signatures?.previousUpstream, UP1);
        assert.equal(signatures?.previousJob, first.outputSignatureHash);
        assert.equal((await loadState(path.join(out, 'tar.state.json')))?.upstreamSignatureHash, UP2);
    });

    test('child runs carry the given run id and parent', async () => {
        audit.startRun('nightly', 'backup');
        const report = await runIdempotentJob(deps, job(), { runId: 'tar-nightly', parentRunId: 'nightly' });

        assert.equal(report.runId, 'tar-nightly');
        assert.equal(audit.getRun('tar-nightly')?.parentRunId, 'nightly');
    });

    test('commandBuild runs an external tool against the staging path', async () => {
        const script = "require('fs').writeFileSync(process.argv[1], 'written by child')";
        const report = await runIdempotentJob(deps, job({ build: commandBuild([process.execPath, '-e', script, '{output}']) }));

        assert.equal(report.status, 'success');
        assert.equal(fs.readFileSync(path.join(out, 'home.tar'), 'utf8'), 'written by child');
        assert.equal(report.outputSignatureHash, sha('written by child'));
    });
});

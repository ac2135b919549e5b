/**
 * Job Runner — one idempotent job invocation.
 *
 *   start run → lock → signature → prior state → artifact → decide
 *     UP_TO_DATE: finish run `skipped`
 *     otherwise:  build → publish → hash → sidecar → state → finish `success`
 *
 * Any error finishes the run `failed` and propagates. The state file is
 * written last, after the artifact it describes is durable, so a crash at
 * any point leaves either the old (artifact, state) pair or a state that no
 * longer matches the artifact, which the next run detects as tampering.
 */

import * as fsp from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

import { AuditTrail, skipped, succeeded } from './audit_trail';
import { runCommandOrThrow } from './command_runner';
import { FsyncMode, JobConfig, substituteCommand } from './config';
import { Decision, Outcome, describeOutcome, explainDecision } from './decision_engine';
import { messageOf } from './errors';
import { Signature, combineSignatures, contentHash, fileExists, quickSignature } from './fingerprint';
import { Logger } from './logger';
import { AtomicWriteOptions, publishFile, removeIfPresent, tempPathFor } from './publish/atomic_write';
import { LockHandle, acquireJobLock, lockPathFor } from './publish/lock';
import { writeSidecar } from './publish/sidecar';
import { PriorState, newStateRecord, readPriorState, saveState } from './state_store';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface BuildContext {
    runId: string;
    root: string;
    /** Where the build must write the artifact; published over artifactPath afterwards. */
    stagingPath: string;
    artifactPath: string;
    signature: Signature;
    logger: Logger;
}

export interface JobDefinition {
    name: string;
    root: string;
    exclude?: readonly string[];
    statePath: string;
    artifactPath: string;
    /** State file of the job whose output this one consumes. */
    upstreamStatePath?: string;
    sidecar?: boolean;
    build: (ctx: BuildContext) => Promise<void>;
}

export interface JobDeps {
    audit: AuditTrail;
    logger: Logger;
    lockTimeoutMs?: number;
    lockStaleMs?: number;
    fsyncMode?: FsyncMode;
    now?: () => Date;
}

export interface RunJobOptions {
    runId?: string;
    parentRunId?: string;
}

export interface JobReport {
    runId: string;
    name: string;
    outcome: Outcome;
    status: 'success' | 'skipped';
    inputSignatureHash: string;
    outputSignatureHash: string | null;
    artifactPath: string;
    warnings: string[];
}

interface ArtifactView {
    exists: boolean;
    hash: string | null;
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

export function newRunId(name: string): string {
    return `${name}-${uuidv4()}`;
}

/** A build that runs an external command; `{root}` and `{output}` are substituted. */
export function commandBuild(command: readonly string[], timeoutMs = 0): JobDefinition['build'] {
    return async (ctx) => {
        const argv = substituteCommand(command, { root: ctx.root, output: ctx.stagingPath });
        await runCommandOrThrow(argv, { cwd: ctx.root, timeoutMs, logger: ctx.logger });
    };
}

export function jobFromConfig(cfg: JobConfig): JobDefinition {
    return {
        name: cfg.name,
        root: cfg.root,
        exclude: cfg.exclude,
        statePath: cfg.statePath,
        artifactPath: cfg.artifactPath,
        upstreamStatePath: cfg.upstreamStatePath,
        sidecar: cfg.sidecar,
        build: commandBuild(cfg.command),
    };
}

function describePrior(prior: PriorState): string {
    switch (prior.kind) {
        case 'absent':
            return 'no state file';
        case 'unreadable':
            return prior.reason;
        case 'present':
            return `recorded ${prior.record.timestamp}`;
    }
}

/** Output hash of the upstream job, or null when it has no usable state. */
async function upstreamOutputHash(statePath: string, log: Logger): Promise<string | null> {
    const upstream = await readPriorState(statePath);
    if (upstream.kind === 'present') return upstream.record.outputSignatureHash;
    if (upstream.kind === 'unreadable') log.warn('upstream state unreadable', { statePath, reason: upstream.reason });
    return null;
}

/* -------------------------------------------------------------------------- */
/* Runner                                                                     */
/* -------------------------------------------------------------------------- */

export async function runIdempotentJob(
    deps: JobDeps,
    job: JobDefinition,
    opts: RunJobOptions = {}
): Promise<JobReport> {
    const { audit } = deps;
    const now = deps.now ?? (() => new Date());
    const runId = opts.runId ?? newRunId(job.name);
    const log = deps.logger.withContext({ run: runId, job: job.name });
    const warnings: string[] = [];
    const writeOpts: AtomicWriteOptions = { fsyncMode: deps.fsyncMode, warnings };

    audit.startRun(
        runId,
        job.name,
        { root: job.root, artifact: job.artifactPath, state: job.statePath, exclude: [...(job.exclude ?? [])] },
        { parentRunId: opts.parentRunId }
    );
    log.info('run started');

    let lock: LockHandle | null = null;
    try {
        lock = await acquireJobLock({
            lockPath: lockPathFor(job.statePath),
            timeoutMs: deps.lockTimeoutMs ?? 5000,
            staleTtlMs: deps.lockStaleMs,
            warnings,
            owner: { job: job.name, run_id: runId },
        });

        const { data: input } = await audit.withStep(runId, 'compute input signature', async () => {
            const signature = await quickSignature(job.root, job.exclude ?? []);
            const upstreamHash = job.upstreamStatePath ? await upstreamOutputHash(job.upstreamStatePath, log) : null;
            const hash = job.upstreamStatePath ? combineSignatures(signature.hash, upstreamHash) : signature.hash;
            return succeeded(
                { signature, upstreamHash, hash },
                `${signature.fileCount} files, ${signature.totalBytes} bytes`
            );
        });

        audit.recordSignature(runId, 'input', input.hash);
        if (job.upstreamStatePath) audit.recordSignature(runId, 'currentUpstream', input.upstreamHash);

        const { data: prior } = await audit.withStep(runId, 'load prior state', async () => {
            const state = await readPriorState(job.statePath);
            return succeeded(state, describePrior(state));
        });

        if (prior.kind === 'present') {
            audit.recordSignature(runId, 'previousJob', prior.record.outputSignatureHash);
            if (job.upstreamStatePath) audit.recordSignature(runId, 'previousUpstream', prior.record.upstreamSignatureHash);
        }

        // Hashing the artifact is the expensive half; only the tamper check reads it.
        const needsOutputHash = prior.kind === 'present' && prior.record.inputSignatureHash === input.hash;

        const { data: artifact } = await audit.withStep<ArtifactView>(runId, 'inspect artifact', async () => {
            const exists = await fileExists(job.artifactPath);
            if (!exists) return succeeded({ exists, hash: null }, 'artifact missing');
            if (!needsOutputHash) return skipped({ exists, hash: null }, 'not hashed: no matching prior input');
            const hash = await contentHash(job.artifactPath);
            return succeeded({ exists, hash }, hash);
        });

        const { data: decision } = await audit.withStep<Decision>(runId, 'decide', () => {
            const d = explainDecision({
                currentInputSignature: input.hash,
                artifactExists: artifact.exists,
                currentOutputHash: artifact.hash,
                prior,
            });
            return succeeded(d, `${d.outcome}: ${describeOutcome(d.outcome)}`);
        });

        log.info('decision', { outcome: decision.outcome, rule: decision.rule });

        if (!decision.rebuild) {
            audit.recordSignature(runId, 'jobResult', artifact.hash);
            audit.finishRun(runId, 'skipped', {
                outputSignatureHash: artifact.hash ?? undefined,
                outputPath: job.artifactPath,
            });
            flushWarnings(log, warnings);
            return {
                runId,
                name: job.name,
                outcome: decision.outcome,
                status: 'skipped',
                inputSignatureHash: input.hash,
                outputSignatureHash: artifact.hash,
                artifactPath: job.artifactPath,
                warnings,
            };
        }

        await audit.withStep(runId, 'build artifact', async () => {
            const stagingPath = tempPathFor(job.artifactPath);
            try {
                await fsp.mkdir(path.dirname(job.artifactPath), { recursive: true });
                await job.build({
                    runId,
                    root: input.signature.root,
                    stagingPath,
                    artifactPath: job.artifactPath,
                    signature: input.signature,
                    logger: log,
                });
                await publishFile(stagingPath, job.artifactPath, writeOpts);
            } catch (e) {
                try {
                    await removeIfPresent(stagingPath);
                } catch (cleanupErr) {
                    warnings.push(`TMP_CLEANUP_FAILED ${stagingPath}: ${messageOf(cleanupErr)}`);
                }
                throw e;
            }
            return succeeded(undefined, `published ${job.artifactPath}`);
        });

        const { data: outputHash } = await audit.withStep(runId, 'hash artifact', async () => {
            const hash = await contentHash(job.artifactPath);
            return succeeded(hash, hash);
        });

        if (job.sidecar) {
            await audit.withStep(runId, 'write sidecar', async () => {
                const { sidecarPath } = await writeSidecar(job.artifactPath, outputHash, writeOpts);
                return succeeded(undefined, sidecarPath);
            });
        }

        await audit.withStep(runId, 'write state', async () => {
            const record = newStateRecord({ input: input.hash, output: outputHash, upstream: input.upstreamHash }, now());
            await saveState(job.statePath, record, writeOpts);
            return succeeded(undefined, job.statePath);
        });

        audit.recordSignature(runId, 'jobResult', outputHash);
        audit.finishRun(runId, 'success', { outputSignatureHash: outputHash, outputPath: job.artifactPath });
        log.info('run finished', { status: 'success', outcome: decision.outcome });
        flushWarnings(log, warnings);

        return {
            runId,
            name: job.name,
            outcome: decision.outcome,
            status: 'success',
            inputSignatureHash: input.hash,
            outputSignatureHash: outputHash,
            artifactPath: job.artifactPath,
            warnings,
        };
    } catch (e) {
        log.error('run failed', { error: messageOf(e) });
        try {
            audit.finishRun(runId, 'failed');
        } catch (finishErr) {
            log.error('could not mark run failed', { error: messageOf(finishErr) });
        }
        throw e;
    } finally {
        if (lock) {
            try {
                await lock.release();
            } catch (e) {
                log.warn('lock release failed', { lockPath: lock.lockPath, error: messageOf(e) });
            }
        }
    }
}

function flushWarnings(log: Logger, warnings: readonly string[]): void {
    for (const w of warnings) log.warn(w);
}

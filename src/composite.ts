/**
 * Composite jobs (e.g. a full backup made of sync, manifest, tarball and
 * encrypt jobs). The parent run owns one step per child and each child run
 * points back at it through parent_run_id.
 *
 * Children run in order; the first failure stops the sequence.
 */

import { messageOf } from './errors';
import { JobDefinition, JobDeps, JobReport, RunJobOptions, newRunId, runIdempotentJob } from './job_runner';

export interface CompositeDefinition {
    name: string;
    children: readonly JobDefinition[];
}

export interface CompositeReport {
    runId: string;
    name: string;
    /** skipped only when every child skipped */
    status: 'success' | 'skipped';
    children: JobReport[];
}

export async function runComposite(
    deps: JobDeps,
    def: CompositeDefinition,
    opts: RunJobOptions = {}
): Promise<CompositeReport> {
    const { audit } = deps;
    const runId = opts.runId ?? newRunId(def.name);
    const log = deps.logger.withContext({ run: runId, job: def.name });

    audit.startRun(runId, def.name, { children: def.children.map((c) => c.name) }, { parentRunId: opts.parentRunId });

    const reports: JobReport[] = [];
    try {
        for (const child of def.children) {
            const { data } = await audit.withStep(runId, `job ${child.name}`, async () => {
                const report = await runIdempotentJob(deps, child, { parentRunId: runId });
                return { status: report.status, message: `${report.outcome} (${report.runId})`, data: report };
            });
            reports.push(data);
        }
    } catch (e) {
        log.error('composite failed', { error: messageOf(e), completed: reports.length });
        try {
            audit.finishRun(runId, 'failed');
        } catch (finishErr) {
            log.error('could not mark run failed', { error: messageOf(finishErr) });
        }
        throw e;
    }

    const status = reports.every((r) => r.status === 'skipped') ? 'skipped' : 'success';
    audit.finishRun(runId, status);
    log.info('composite finished', { status, children: reports.length });

    return { runId, name: def.name, status, children: reports };
}

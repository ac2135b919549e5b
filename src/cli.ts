#!/usr/bin/env node
/**
 * CLI Entry Point for the backup kernel (`bkernel`)
 */

import * as fs from 'fs';

import { AuditTrail, RunRecord } from './audit_trail';
import { runComposite } from './composite';
import { KernelConfig, RuntimeSettings, loadKernelConfig, loadRuntimeSettings } from './config';
import { ERRORS, KernelError, isKernelError, messageOf } from './errors';
import { quickSignature } from './fingerprint';
import { JobDefinition, JobDeps, jobFromConfig, runIdempotentJob } from './job_runner';
import { Logger, createLogger } from './logger';
import { verifySidecar } from './publish/sidecar';

type Out = (line: string) => void;

class BackupKernelCLI {
    private readonly settings: RuntimeSettings;
    private readonly logger: Logger;

    constructor(
        env: Record<string, string | undefined> = process.env,
        private readonly out: Out = (line) => console.log(line),
        private readonly err: Out = (line) => console.error(line)
    ) {
        this.settings = loadRuntimeSettings(env);
        this.logger = createLogger('bkernel', this.settings.log);
    }

    /** Returns the process exit code. */
    async run(args: string[]): Promise<number> {
        const command = args[2] || 'help';
        const rest = args.slice(3);

        try {
            switch (command) {
                case 'run':
                    return await this.runJob(rest);
                case 'backup':
                    return await this.runBackup(rest);
                case 'status':
                    return this.runStatus(rest);
                case 'steps':
                    return this.runSteps(rest);
                case 'signature':
                    return await this.runSignature(rest);
                case 'verify':
                    return await this.runVerify(rest);
                case 'help':
                case '--help':
                case '-h':
                    this.showHelp();
                    return 0;
                default:
                    this.err(`Unknown command: ${command}`);
                    this.showHelp();
                    return 2;
            }
        } catch (e) {
            if (isKernelError(e)) {
                this.err(`${e.code}: ${e.message}`);
            } else {
                this.err(`Fatal error: ${messageOf(e)}`);
            }
            return 1;
        }
    }

    /* ---------------------------------------------------------------------- */
    /* Plumbing                                                               */
    /* ---------------------------------------------------------------------- */

    private loadConfig(): KernelConfig {
        return loadKernelConfig(this.settings);
    }

    /** Read-only commands work without a config file. */
    private auditDbPath(): string {
        if (!fs.existsSync(this.settings.configPath)) return this.settings.auditDbPath;
        return this.loadConfig().auditDbPath;
    }

    private withAudit<T>(dbPath: string, fn: (audit: AuditTrail) => T): T {
        const audit = new AuditTrail(dbPath, { logger: this.logger.child('audit') });
        try {
            return fn(audit);
        } finally {
            audit.close();
        }
    }

    private deps(audit: AuditTrail): JobDeps {
        return {
            audit,
            logger: this.logger.child('job'),
            lockTimeoutMs: this.settings.lockTimeoutMs,
            lockStaleMs: this.settings.lockStaleMs,
            fsyncMode: this.settings.fsyncMode,
        };
    }

    private jobNamed(config: KernelConfig, name: string): JobDefinition {
        const job = config.jobs.get(name);
        if (!job) {
            const known = [...config.jobs.keys()].join(', ') || '(none)';
            throw new KernelError(`Unknown job "${name}"; configured: ${known}`, ERRORS.INVALID_CONFIG, { job: name });
        }
        return jobFromConfig(job);
    }

    /* ---------------------------------------------------------------------- */
    /* Commands                                                               */
    /* ---------------------------------------------------------------------- */

    private async runJob(args: string[]): Promise<number> {
        const name = args[0];
        if (!name) {
            this.err('Usage: bkernel run <job>');
            return 2;
        }
        const config = this.loadConfig();
        const job = this.jobNamed(config, name);

        const audit = new AuditTrail(config.auditDbPath, { logger: this.logger.child('audit') });
        try {
            const report = await runIdempotentJob(this.deps(audit), job);
            this.out(`${report.name}: ${report.status} (${report.outcome}) run=${report.runId}`);
            return 0;
        } finally {
            audit.close();
        }
    }

    private async runBackup(args: string[]): Promise<number> {
        if (args.length === 0) {
            this.err('Usage: bkernel backup <job> [job...]');
            return 2;
        }
        const config = this.loadConfig();
        const children = args.map((name) => this.jobNamed(config, name));

        const audit = new AuditTrail(config.auditDbPath, { logger: this.logger.child('audit') });
        try {
            const report = await runComposite(this.deps(audit), { name: 'backup', children });
            for (const child of report.children) {
                this.out(`  ${child.name}: ${child.status} (${child.outcome})`);
            }
            this.out(`backup: ${report.status} run=${report.runId}`);
            return 0;
        } finally {
            audit.close();
        }
    }

    private runStatus(args: string[]): number {
        const limit = args[0] === undefined ? 10 : parseInt(args[0], 10);
        if (!Number.isInteger(limit) || limit < 1) {
            this.err('Usage: bkernel status [limit]');
            return 2;
        }

        const runs = this.withAudit(this.auditDbPath(), (audit) => audit.lastRuns(limit));
        if (runs.length === 0) {
            this.out('No runs recorded.');
            return 0;
        }
        for (const run of runs) this.out(formatRun(run));
        return 0;
    }

    private runSteps(args: string[]): number {
        const runId = args[0];
        if (!runId) {
            this.err('Usage: bkernel steps <runId>');
            return 2;
        }

        const { run, steps } = this.withAudit(this.auditDbPath(), (audit) => ({
            run: audit.getRun(runId),
            steps: audit.stepsFor(runId),
        }));
        if (!run) throw new KernelError(`Run not found: ${runId}`, ERRORS.RUN_NOT_FOUND, { runId });

        this.out(formatRun(run));
        for (const step of steps) {
            const msg = step.message ? `  ${step.message}` : '';
            this.out(`  #${step.stepId} ${step.status.padEnd(8)} ${step.name}${msg}`);
        }
        return 0;
    }

    private async runSignature(args: string[]): Promise<number> {
        const excludes: string[] = [];
        let root: string | undefined;

        for (let i = 0; i < args.length; i++) {
            const arg = args[i];
            if (arg === '--exclude') {
                const pattern = args[++i];
                if (pattern === undefined) {
                    this.err('--exclude needs a pattern');
                    return 2;
                }
                excludes.push(pattern);
            } else if (arg.startsWith('--exclude=')) {
                excludes.push(arg.slice('--exclude='.length));
            } else if (root === undefined) {
                root = arg;
            } else {
                this.err(`Unexpected argument: ${arg}`);
                return 2;
            }
        }
        if (root === undefined) {
            this.err('Usage: bkernel signature <root> [--exclude pattern]...');
            return 2;
        }

        const sig = await quickSignature(root, excludes);
        this.out(sig.hash);
        this.out(`  files:        ${sig.fileCount}`);
        this.out(`  bytes:        ${sig.totalBytes}`);
        this.out(`  latest mtime: ${sig.latestMtimeNs} ns`);
        return 0;
    }

    private async runVerify(args: string[]): Promise<number> {
        const artifact = args[0];
        if (!artifact) {
            this.err('Usage: bkernel verify <artifact>');
            return 2;
        }

        const result = await verifySidecar(artifact);
        if (result.ok) {
            this.out(`OK ${result.digest}  ${artifact}`);
            return 0;
        }
        if (result.reason === 'DIGEST_MISMATCH') {
            this.err(`DIGEST_MISMATCH ${artifact}: expected ${result.expected}, got ${result.actual}`);
        } else {
            this.err(`${result.reason} ${artifact}`);
        }
        return 1;
    }

    private showHelp(): void {
        this.out(
            [
                'bkernel - idempotent backup jobs with an audit trail',
                '',
                'Usage:',
                '  bkernel run <job>                       Run one configured job',
                '  bkernel backup <job> [job...]           Run jobs in order under one parent run',
                '  bkernel status [limit]                  Show the most recent runs (default 10)',
                '  bkernel steps <runId>                   Show the steps of a run',
                '  bkernel signature <root> [--exclude p]  Print the quick signature of a tree',
                '  bkernel verify <artifact>               Check an artifact against its .sha256',
                '  bkernel help                            Show this message',
                '',
                'Environment:',
                '  BKERNEL_HOME, BKERNEL_CONFIG, BKERNEL_DB, BKERNEL_LOG_LEVEL, BKERNEL_LOG_JSON,',
                '  BKERNEL_LOG_FILE, BKERNEL_DEBUG, BKERNEL_LOCK_TIMEOUT_MS, BKERNEL_LOCK_STALE_MS,',
                '  BKERNEL_FSYNC',
            ].join('\n')
        );
    }
}

function formatRun(run: RunRecord): string {
    const parent = run.parentRunId ? ` parent=${run.parentRunId}` : '';
    return `${run.startedAt.toISOString()}  ${run.status.padEnd(8)} ${run.name}  ${run.runId}${parent}`;
}

// Run CLI
if (require.main === module) {
    const cli = new BackupKernelCLI();
    cli.run(process.argv).then(
        (code) => {
            process.exitCode = code;
        },
        (err: unknown) => {
            console.error('Fatal error:', err);
            process.exitCode = 1;
        }
    );
}

export { BackupKernelCLI };

/**
 * Command Runner
 *
 * Runs the external tools a job delegates to (tar, gpg, rsync, ...). argv is
 * passed straight to the executable; no shell is involved, so arguments are
 * never re-split or expanded.
 */

import { spawn } from 'child_process';

import { ERRORS, KernelError, messageOf } from './errors';
import type { Logger } from './logger';

export interface CommandResult {
    /** exit code, or null when the process was killed by a signal */
    code: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
}

export interface CommandOptions {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    /** kill the process after this long; 0 disables */
    timeoutMs?: number;
    logger?: Logger;
}

const STDERR_TAIL = 2000;

export function runCommand(argv: readonly string[], opts: CommandOptions = {}): Promise<CommandResult> {
    if (argv.length === 0) {
        return Promise.reject(new KernelError('Empty command', ERRORS.COMMAND_FAILED, { argv }));
    }
    const [file, ...args] = argv;
    opts.logger?.debug('spawn', { argv });

    return new Promise((resolve, reject) => {
        const child = spawn(file, args, {
            cwd: opts.cwd,
            env: opts.env ?? process.env,
            shell: false,
            stdio: ['ignore', 'pipe', 'pipe'],
            timeout: opts.timeoutMs && opts.timeoutMs > 0 ? opts.timeoutMs : undefined,
        });

        const out: Buffer[] = [];
        const err: Buffer[] = [];
        child.stdout.on('data', (chunk: Buffer) => out.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => err.push(chunk));

        child.on('error', (e) => {
            reject(new KernelError(`Cannot run ${file}: ${messageOf(e)}`, ERRORS.COMMAND_FAILED, { argv }, e));
        });

        child.on('close', (code, signal) => {
            resolve({
                code,
                signal,
                stdout: Buffer.concat(out).toString('utf8'),
                stderr: Buffer.concat(err).toString('utf8'),
            });
        });
    });
}

/** Like runCommand, but any non-zero exit raises COMMAND_FAILED. */
export async function runCommandOrThrow(argv: readonly string[], opts: CommandOptions = {}): Promise<CommandResult> {
    const result = await runCommand(argv, opts);
    if (result.code !== 0) {
        const stderr = result.stderr.trim().slice(-STDERR_TAIL);
        const how = result.code === null ? `signal ${result.signal}` : `exit ${result.code}`;
        throw new KernelError(`${argv[0]} failed (${how})${stderr ? `: ${stderr}` : ''}`, ERRORS.COMMAND_FAILED, {
            argv,
            code: result.code,
            signal: result.signal,
            stderr,
        });
    }
    return result;
}

// src/publish/lock.ts
//
// Advisory per-job lock: one rebuild of a given state path at a time.
// The owner record (pid, start time, nonce) is written to a private temp
// file and hard-linked into place, so the lock file never exists without
// its content. A crashed owner is detected through that record and its
// lock is moved aside before anyone re-creates it.

import * as fsp from "fs/promises";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";

import { ERRORS, KernelError, errnoOf } from "../errors";

export interface LockHandle {
    lockPath: string;
    /** Removes the lock if it is still ours; raises LOCK_HELD if another process took it over. */
    release(): Promise<void>;
}

export interface AcquireLockParams {
    lockPath: string;
    timeoutMs: number;
    warnings: string[];
    owner: Record<string, string>;
    staleTtlMs?: number;
}

interface LockRecord {
    pid?: number;
    started_ms?: number;
    nonce?: string;
}

type LockInspection =
    | { state: "gone" }
    | { state: "live" }
    | { state: "stale"; reason: string; text: string };

const DEFAULT_STALE_MS = 6 * 60 * 60 * 1000;

/** An unparseable lock younger than this is assumed to belong to a live owner. */
export const UNREADABLE_GRACE_MS = 10_000;

function sleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

function backoff(attempt: number): number {
    // 50,100,200,400,800,... capped at 1000
    return Math.min(50 * Math.pow(2, attempt), 1000);
}

export function lockPathFor(statePath: string): string {
    return `${statePath}.lock`;
}

function parseLockRecord(text: string): LockRecord | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return null;
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;
    const pid: unknown = Reflect.get(parsed, "pid");
    const startedMs: unknown = Reflect.get(parsed, "started_ms");
    const nonce: unknown = Reflect.get(parsed, "nonce");
    return {
        pid: typeof pid === "number" ? pid : undefined,
        started_ms: typeof startedMs === "number" ? startedMs : undefined,
        nonce: typeof nonce === "string" ? nonce : undefined,
    };
}

function isPidAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (e) {
        // EPERM: exists but owned by someone else
        return errnoOf(e) === "EPERM";
    }
}

async function readIfPresent(p: string): Promise<string | null> {
    try {
        return await fsp.readFile(p, "utf8");
    } catch (e) {
        if (errnoOf(e) === "ENOENT") return null;
        throw e;
    }
}

async function unlinkIfPresent(p: string): Promise<void> {
    try {
        await fsp.unlink(p);
    } catch (e) {
        if (errnoOf(e) !== "ENOENT") throw e;
    }
}

async function inspectLock(lockPath: string, staleMs: number): Promise<LockInspection> {
    const text = await readIfPresent(lockPath);
    if (text === null) return { state: "gone" };

    const record = parseLockRecord(text);
    if (record === null) {
        let mtimeMs: number;
        try {
            mtimeMs = (await fsp.stat(lockPath)).mtimeMs;
        } catch (e) {
            if (errnoOf(e) === "ENOENT") return { state: "gone" };
            throw e;
        }
        return Date.now() - mtimeMs < UNREADABLE_GRACE_MS
            ? { state: "live" }
            : { state: "stale", reason: "UNREADABLE", text };
    }

    if (record.pid !== undefined && !isPidAlive(record.pid)) {
        return { state: "stale", reason: `PID_DEAD pid=${record.pid}`, text };
    }

    const age = Date.now() - (record.started_ms ?? 0);
    if (age > staleMs) return { state: "stale", reason: `AGE age=${age}ms`, text };

    return { state: "live" };
}

/**
 * Moves the lock file aside and removes it only if it still holds `expected`.
 * A lock that changed hands in the meantime is linked back into place.
 * Returns true when `expected` was removed.
 */
async function removeIfUnchanged(lockPath: string, expected: string): Promise<boolean> {
    const aside = `${lockPath}.${process.pid}.${uuidv4()}.aside`;
    try {
        await fsp.rename(lockPath, aside);
    } catch (e) {
        if (errnoOf(e) === "ENOENT") return false;
        throw e;
    }

    try {
        const moved = await readIfPresent(aside);
        if (moved === expected) return true;
        try {
            await fsp.link(aside, lockPath);
        } catch (e) {
            if (errnoOf(e) !== "EEXIST") throw e;
        }
        return false;
    } finally {
        await unlinkIfPresent(aside);
    }
}

/** Publishes `text` as the lock file; false when a lock already exists. */
async function tryCreate(lockPath: string, text: string): Promise<boolean> {
    const tmp = `${lockPath}.${process.pid}.${uuidv4()}.tmp`;
    try {
        await fsp.writeFile(tmp, text, { flag: "wx", mode: 0o644 });
        await fsp.link(tmp, lockPath);
        return true;
    } catch (e) {
        if (errnoOf(e) === "EEXIST") return false;
        throw e;
    } finally {
        await unlinkIfPresent(tmp);
    }
}

export async function acquireJobLock(params: AcquireLockParams): Promise<LockHandle> {
    const { lockPath, timeoutMs, warnings, owner } = params;
    const staleMs = params.staleTtlMs ?? DEFAULT_STALE_MS;

    await fsp.mkdir(path.dirname(lockPath), { recursive: true, mode: 0o755 });

    const started = Date.now();
    let attempt = 0;

    for (;;) {
        const record = {
            ...owner,
            pid: process.pid,
            started_utc: new Date().toISOString(),
            started_ms: Date.now(),
            nonce: uuidv4(),
        };
        const text = JSON.stringify(record, null, 2);
        if (await tryCreate(lockPath, text)) return makeHandle(lockPath, text);

        const found = await inspectLock(lockPath, staleMs);
        if (found.state === "gone") continue;
        if (found.state === "stale") {
            if (await removeIfUnchanged(lockPath, found.text)) {
                warnings.push(`STALE_LOCK(${found.reason}) ${lockPath}`);
            }
            continue;
        }

        if (Date.now() - started >= timeoutMs) {
            throw new KernelError(`Lock held: ${lockPath}`, ERRORS.LOCK_HELD, { lockPath });
        }

        const wait = backoff(attempt++);
        warnings.push(`LOCK_RETRY after ${wait}ms on ${lockPath}`);
        await sleep(wait);
    }
}

function makeHandle(lockPath: string, text: string): LockHandle {
    let released = false;
    return {
        lockPath,
        async release(): Promise<void> {
            if (released) return;
            released = true;
            const current = await readIfPresent(lockPath);
            if (current === null) return;
            if (current !== text || !(await removeIfUnchanged(lockPath, text))) {
                throw new KernelError(`Lock taken over by another owner: ${lockPath}`, ERRORS.LOCK_HELD, {
                    lockPath,
                });
            }
        },
    };
}

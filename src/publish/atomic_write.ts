// src/publish/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as fsp from "fs/promises";
import * as path from "path";

import type { FsyncMode } from "../config";
import { errnoOf, ioError } from "../errors";
import { stableStringify } from "./stable_stringify";

export interface AtomicWriteOptions {
    /** Final permission bits of the published file (default 0644). */
    mode?: number;
    fsyncMode?: FsyncMode;
    /** Non-fatal fsync problems are appended here. */
    warnings?: string[];
    /** Runs after the temp file is durable and before it replaces the target. */
    beforeRename?: (tmpPath: string) => void | Promise<void>;
}

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

/** Temp name in the target's own directory, so the rename never crosses filesystems. */
export function tempPathFor(filePath: string): string {
    const dir = path.dirname(filePath);
    return path.join(dir, `.${path.basename(filePath)}.${crypto.randomBytes(4).toString("hex")}.part`);
}

async function fsyncPath(p: string, flags: string, opts: AtomicWriteOptions): Promise<void> {
    try {
        const fh = await fsp.open(p, flags);
        try {
            await fh.sync();
        } finally {
            await fh.close();
        }
    } catch (e) {
        const code = errnoOf(e);
        if (opts.fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
        opts.warnings?.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${p}`);
    }
}

/** Unlinks `p`; a file that is already gone is not an error. */
export async function removeIfPresent(p: string): Promise<void> {
    try {
        await fsp.unlink(p);
    } catch (e) {
        if (errnoOf(e) !== "ENOENT") throw e;
    }
}

/**
 * Renames a durable temp file over the target, then fsyncs the directory so
 * the rename itself survives a power loss. Removes the temp file if anything
 * before the rename fails.
 */
async function commit(tmp: string, filePath: string, opts: AtomicWriteOptions): Promise<void> {
    const dir = path.dirname(filePath);
    let renamed = false;
    try {
        await fsyncPath(tmp, "r+", opts);
        if (opts.beforeRename) await opts.beforeRename(tmp);

        await fsp.rename(tmp, filePath);
        renamed = true;

        if (opts.mode !== undefined) await fsp.chmod(filePath, opts.mode);

        // directory fsync is not supported on every platform (EISDIR/EPERM on Windows)
        await fsyncPath(dir, "r", opts);
    } catch (e) {
        if (!renamed) {
            try {
                await removeIfPresent(tmp);
            } catch (cleanupErr) {
                opts.warnings?.push(`TMP_CLEANUP_FAILED(${errnoOf(cleanupErr) || "UNKNOWN"}) ${tmp}`);
            }
        }
        throw ioError(`Atomic publish of ${filePath} failed`, e, { path: filePath });
    }
}

/**
 * Writes `content` to `filePath` so that readers only ever observe the
 * previous complete file or the new complete file.
 */
export async function atomicWriteFile(
    filePath: string,
    content: Buffer | string,
    opts: AtomicWriteOptions = {}
): Promise<void> {
    const dir = path.dirname(filePath);
    const tmp = tempPathFor(filePath);

    try {
        await fsp.mkdir(dir, { recursive: true, mode: 0o755 });
        // tmp always 0600 until published
        await fsp.writeFile(tmp, content, { mode: 0o600, flag: "wx" });
    } catch (e) {
        try {
            await removeIfPresent(tmp);
        } catch (cleanupErr) {
            opts.warnings?.push(`TMP_CLEANUP_FAILED(${errnoOf(cleanupErr) || "UNKNOWN"}) ${tmp}`);
        }
        throw ioError(`Atomic publish of ${filePath} failed`, e, { path: filePath });
    }

    await commit(tmp, filePath, { mode: 0o644, ...opts });
}

/** Canonical JSON (sorted keys, no whitespace) followed by a newline. */
export async function atomicWriteJson(filePath: string, data: unknown, opts: AtomicWriteOptions = {}): Promise<void> {
    await atomicWriteFile(filePath, stableStringify(data) + "\n", opts);
}

/**
 * Publishes a file some other process already wrote (tar, gpg, ...) by
 * fsyncing it and renaming it over `target`. `stagedPath` must sit on the
 * same filesystem as `target`; use tempPathFor(target) to pick it.
 */
export async function publishFile(stagedPath: string, target: string, opts: AtomicWriteOptions = {}): Promise<void> {
    try {
        await fsp.access(stagedPath, fs.constants.R_OK);
        await fsp.mkdir(path.dirname(target), { recursive: true, mode: 0o755 });
    } catch (e) {
        throw ioError(`Cannot publish ${stagedPath} to ${target}`, e, { path: target, staged: stagedPath });
    }
    await commit(stagedPath, target, opts);
}

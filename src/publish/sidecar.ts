// src/publish/sidecar.ts
//
// `<artifact>.sha256` files in the coreutils format: "<hex>  <basename>\n".

import * as fsp from "fs/promises";
import * as path from "path";

import { ERRORS, KernelError, errnoOf, ioError } from "../errors";
import { contentHash, fileExists } from "../fingerprint";
import { AtomicWriteOptions, atomicWriteFile } from "./atomic_write";

export interface SidecarEntry {
    digest: string;
    fileName: string;
}

export type SidecarVerification =
    | { ok: true; digest: string }
    | { ok: false; reason: "SIDECAR_MISSING" | "ARTIFACT_MISSING" }
    | { ok: false; reason: "DIGEST_MISMATCH"; expected: string; actual: string };

const SIDECAR_LINE = /^([0-9a-f]{64}) [ *](.+)$/;

export function sidecarPathFor(artifactPath: string): string {
    return `${artifactPath}.sha256`;
}

export function formatSidecar(digest: string, artifactPath: string): string {
    return `${digest}  ${path.basename(artifactPath)}\n`;
}

export function parseSidecar(text: string): SidecarEntry {
    const line = text.split("\n")[0].replace(/\r$/, "");
    const m = SIDECAR_LINE.exec(line);
    if (!m) {
        throw new KernelError(`Malformed checksum line: ${JSON.stringify(line)}`, ERRORS.INVALID_DOCUMENT);
    }
    return { digest: m[1], fileName: m[2] };
}

/** Hashes the artifact (unless a digest is supplied) and publishes its sidecar. */
export async function writeSidecar(
    artifactPath: string,
    digest?: string,
    opts: AtomicWriteOptions = {}
): Promise<{ sidecarPath: string; digest: string }> {
    const hex = digest ?? (await contentHash(artifactPath));
    const sidecarPath = sidecarPathFor(artifactPath);
    await atomicWriteFile(sidecarPath, formatSidecar(hex, artifactPath), opts);
    return { sidecarPath, digest: hex };
}

export async function readSidecar(artifactPath: string): Promise<SidecarEntry | null> {
    let text: string;
    try {
        text = await fsp.readFile(sidecarPathFor(artifactPath), "utf8");
    } catch (e) {
        if (errnoOf(e) === "ENOENT") return null;
        throw ioError(`Cannot read checksum for ${artifactPath}`, e);
    }
    return parseSidecar(text);
}

export async function verifySidecar(artifactPath: string): Promise<SidecarVerification> {
    const entry = await readSidecar(artifactPath);
    if (!entry) return { ok: false, reason: "SIDECAR_MISSING" };

    if (!(await fileExists(artifactPath))) return { ok: false, reason: "ARTIFACT_MISSING" };

    const actual = await contentHash(artifactPath);
    if (actual !== entry.digest) {
        return { ok: false, reason: "DIGEST_MISMATCH", expected: entry.digest, actual };
    }
    return { ok: true, digest: actual };
}

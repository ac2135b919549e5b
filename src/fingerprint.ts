/**
 * Fingerprint Engine
 *
 * Cheap structural signatures of a file tree (count, newest mtime, bytes)
 * for "did the input change?", and full content hashes for validating the
 * output artifact.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';
import { Minimatch } from 'minimatch';

import { ERRORS, KernelError, errnoOf, ioError, messageOf } from './errors';
import { stableStringify } from './publish/stable_stringify';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface Signature {
  /** hex SHA-256; the only field that takes part in equality */
  readonly hash: string;
  readonly root: string;
  readonly fileCount: number;
  readonly latestMtimeNs: bigint;
  readonly totalBytes: bigint;
  readonly excludePatterns: readonly string[];
}

/* -------------------------------------------------------------------------- */
/* Hash helpers                                                               */
/* -------------------------------------------------------------------------- */

const HASH_READ_CHUNK = 1024 * 1024;

// per-entry failures that only drop that entry from the walk
const SKIPPABLE = new Set(['ENOENT', 'EACCES', 'EPERM', 'ELOOP', 'ENOTDIR']);

export function sha256Hex(data: Buffer | string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

export function signaturesEqual(a: Pick<Signature, 'hash'>, b: Pick<Signature, 'hash'>): boolean {
  return a.hash === b.hash;
}

/**
 * Folds several hashes into one, e.g. a tree signature with the output hash
 * of the upstream job it consumes. Absent parts contribute an empty string.
 */
export function combineSignatures(...parts: Array<string | null | undefined>): string {
  return sha256Hex(parts.map((p) => p ?? '').join(':'));
}

/**
 * Re-serializes a JSON document with sorted keys and no whitespace so that
 * formatting never changes its hash.
 */
export function canonicalize(jsonText: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch (e) {
    throw new KernelError(`Invalid JSON document: ${messageOf(e)}`, ERRORS.INVALID_DOCUMENT, {}, e);
  }
  return stableStringify(parsed);
}

export function hashDocument(jsonText: string): string {
  return sha256Hex(canonicalize(jsonText));
}

/** Streaming SHA-256 of a file's bytes. */
export async function contentHash(filePath: string): Promise<string> {
  const hash = crypto.createHash('sha256');
  try {
    const stream = fs.createReadStream(filePath, { highWaterMark: HASH_READ_CHUNK });
    for await (const chunk of stream) {
      hash.update(chunk);
    }
  } catch (e) {
    throw ioError(`Cannot hash ${filePath}`, e, { path: filePath });
  }
  return hash.digest('hex');
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const st = await fsp.stat(filePath);
    return st.isFile();
  } catch (e) {
    const code = errnoOf(e);
    if (code === 'ENOENT' || code === 'ENOTDIR') return false;
    throw ioError(`Cannot stat ${filePath}`, e, { path: filePath });
  }
}

/* -------------------------------------------------------------------------- */
/* Exclusion                                                                  */
/* -------------------------------------------------------------------------- */

export type ExcludeMatcher = (relPath: string) => boolean;

/**
 * Slash-free patterns match a basename at any depth; patterns with a slash
 * match the whole path relative to the root.
 */
export function compileExcludes(patterns: readonly string[]): ExcludeMatcher {
  const compiled = patterns.map((p) => new Minimatch(p, { dot: true, matchBase: true }));
  return (relPath) => compiled.some((m) => m.match(relPath));
}

/* -------------------------------------------------------------------------- */
/* Quick signature                                                            */
/* -------------------------------------------------------------------------- */

export function hashQuickFacts(fileCount: number, latestMtimeNs: bigint, totalBytes: bigint): string {
  return sha256Hex(
    stableStringify({ file_count: fileCount, latest_mtime_ns: latestMtimeNs, total_bytes: totalBytes })
  );
}

async function readDirOrSkip(dir: string): Promise<fs.Dirent[] | null> {
  try {
    return await fsp.readdir(dir, { withFileTypes: true });
  } catch (e) {
    const code = errnoOf(e);
    if (code !== undefined && SKIPPABLE.has(code)) return null;
    throw ioError(`Cannot read directory ${dir}`, e, { path: dir });
  }
}

async function statOrSkip(p: string): Promise<fs.BigIntStats | null> {
  try {
    return await fsp.stat(p, { bigint: true });
  } catch (e) {
    const code = errnoOf(e);
    if (code !== undefined && SKIPPABLE.has(code)) return null;
    throw ioError(`Cannot stat ${p}`, e, { path: p });
  }
}

/**
 * Walks `root` once and reduces it to a Signature. Only regular files (or
 * symlinks to them) are counted; symlinked directories are not followed.
 */
export async function quickSignature(root: string, excludePatterns: readonly string[] = []): Promise<Signature> {
  const absRoot = path.resolve(root);

  let rootStat: fs.Stats;
  try {
    rootStat = await fsp.stat(absRoot);
    // readable root is required; unreadable subtrees below it are skipped
    await fsp.access(absRoot, fs.constants.R_OK | fs.constants.X_OK);
  } catch (e) {
    throw ioError('Signature root unreadable', e, { root: absRoot });
  }
  if (!rootStat.isDirectory()) {
    throw new KernelError(`Signature root is not a directory: ${absRoot}`, ERRORS.IO_ERROR, { root: absRoot });
  }

  const excluded = compileExcludes(excludePatterns);

  let fileCount = 0;
  let latestMtimeNs = 0n;
  let totalBytes = 0n;

  const pending: string[] = [''];
  while (pending.length > 0) {
    const relDir = pending.pop() ?? '';
    const entries = await readDirOrSkip(path.join(absRoot, relDir));
    if (entries === null) {
      if (relDir === '') {
        throw new KernelError(`Signature root unreadable: ${absRoot}`, ERRORS.IO_ERROR, { root: absRoot });
      }
      continue;
    }

    for (const entry of entries) {
      const rel = relDir === '' ? entry.name : `${relDir}/${entry.name}`;
      if (excluded(rel)) continue;

      if (entry.isDirectory()) {
        pending.push(rel);
        continue;
      }
      if (!entry.isFile() && !entry.isSymbolicLink()) continue;

      const st = await statOrSkip(path.join(absRoot, rel));
      if (st === null || !st.isFile()) continue;

      fileCount += 1;
      totalBytes += st.size;
      if (st.mtimeNs > latestMtimeNs) latestMtimeNs = st.mtimeNs;
    }
  }

  return Object.freeze({
    hash: hashQuickFacts(fileCount, latestMtimeNs, totalBytes),
    root: absRoot,
    fileCount,
    latestMtimeNs,
    totalBytes,
    excludePatterns: Object.freeze([...excludePatterns]),
  });
}

/**
 * State Store — one idempotency record per job, kept beside its artifact.
 *
 * On-disk form (canonical JSON, newline terminated):
 *   {"datetime":"<iso>","initial_signature_hash":"<hex>",
 *    "output_signature_hash":"<hex>","upstream_hash":"<hex>"|null}
 *
 * Older files used init_sig_hex / output_sig_hex, or a single `hash` field
 * holding the job's output signature; all are read into the same shape.
 */

import * as fsp from 'fs/promises';

import { ERRORS, KernelError, errnoOf, ioError, messageOf } from './errors';
import { AtomicWriteOptions, atomicWriteJson } from './publish/atomic_write';
import { JsonSchema, SchemaValidator } from './schema_validator';

export interface StateRecord {
    /** null only for legacy records that never stored an input signature */
    inputSignatureHash: string | null;
    outputSignatureHash: string | null;
    upstreamSignatureHash: string | null;
    timestamp: string;
}

export type PriorState =
    | { kind: 'absent' }
    | { kind: 'unreadable'; reason: string }
    | { kind: 'present'; record: StateRecord };

const HEX_OR_NULL: JsonSchema = { type: ['string', 'null'], pattern: '^[0-9a-fA-F]*$' };

const STATE_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        initial_signature_hash: HEX_OR_NULL,
        output_signature_hash: HEX_OR_NULL,
        upstream_hash: HEX_OR_NULL,
        init_sig_hex: HEX_OR_NULL,
        output_sig_hex: HEX_OR_NULL,
        hash: HEX_OR_NULL,
        datetime: { type: 'string' },
        timestamp: { type: 'string' },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('job_state', STATE_SCHEMA);

function pick(doc: Record<string, unknown>, ...keys: string[]): string | null {
    for (const k of keys) {
        const v = doc[k];
        if (typeof v === 'string' && v !== '') return v.toLowerCase();
    }
    return null;
}

function corrupt(statePath: string, reason: string, cause?: unknown): KernelError {
    return new KernelError(`State file ${statePath} is corrupt: ${reason}`, ERRORS.STATE_CORRUPT, { statePath }, cause);
}

/** Normalizes current and legacy field spellings into a StateRecord. */
export function parseStateDocument(text: string, statePath = '<memory>'): StateRecord {
    let doc: unknown;
    try {
        doc = JSON.parse(text);
    } catch (e) {
        throw corrupt(statePath, messageOf(e), e);
    }

    const result = validator.validate(doc, 'job_state');
    if (!result.valid || typeof doc !== 'object' || doc === null || Array.isArray(doc)) {
        throw corrupt(statePath, result.errors.map((e) => `${e.path || '<root>'} ${e.message}`).join('; '));
    }
    const fields = doc as Record<string, unknown>;

    const input = pick(fields, 'initial_signature_hash', 'init_sig_hex');
    const output = pick(fields, 'output_signature_hash', 'output_sig_hex', 'hash');
    if (input === null && output === null) {
        throw corrupt(statePath, 'no signature fields');
    }

    const timestamp = typeof fields.datetime === 'string' ? fields.datetime : fields.timestamp;
    if (typeof timestamp !== 'string') {
        throw corrupt(statePath, 'missing datetime');
    }

    return {
        inputSignatureHash: input,
        outputSignatureHash: output,
        upstreamSignatureHash: pick(fields, 'upstream_hash'),
        timestamp,
    };
}

export function serializeStateRecord(record: StateRecord): Record<string, string | null> {
    return {
        datetime: record.timestamp,
        initial_signature_hash: record.inputSignatureHash,
        output_signature_hash: record.outputSignatureHash,
        upstream_hash: record.upstreamSignatureHash,
    };
}

/**
 * Returns null when there is no state file. A file that exists but cannot
 * be understood raises STATE_CORRUPT, which callers treat as "rebuild".
 */
export async function loadState(statePath: string): Promise<StateRecord | null> {
    let text: string;
    try {
        text = await fsp.readFile(statePath, 'utf-8');
    } catch (e) {
        if (errnoOf(e) === 'ENOENT') return null;
        throw ioError(`Cannot read state file ${statePath}`, e, { statePath });
    }
    return parseStateDocument(text, statePath);
}

/** loadState folded into the tagged form the Decision Engine consumes. */
export async function readPriorState(statePath: string): Promise<PriorState> {
    try {
        const record = await loadState(statePath);
        return record === null ? { kind: 'absent' } : { kind: 'present', record };
    } catch (e) {
        if (e instanceof KernelError && e.code === ERRORS.STATE_CORRUPT) {
            return { kind: 'unreadable', reason: e.message };
        }
        throw e;
    }
}

export async function saveState(statePath: string, record: StateRecord, opts: AtomicWriteOptions = {}): Promise<void> {
    await atomicWriteJson(statePath, serializeStateRecord(record), opts);
}

export function newStateRecord(
    hashes: { input: string; output: string; upstream?: string | null },
    now: Date = new Date()
): StateRecord {
    return {
        inputSignatureHash: hashes.input,
        outputSignatureHash: hashes.output,
        upstreamSignatureHash: hashes.upstream ?? null,
        timestamp: now.toISOString(),
    };
}

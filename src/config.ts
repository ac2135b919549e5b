/**
 * Shared Configuration
 *
 * Environment-driven constants plus the JSON job configuration file.
 *
 * Environment:
 *   BKERNEL_HOME            = state directory (default: ~/.bkernel)
 *   BKERNEL_CONFIG          = job config file (default: $BKERNEL_HOME/config.json)
 *   BKERNEL_DB              = audit database (default: $BKERNEL_HOME/audit.db)
 *   BKERNEL_LOG_LEVEL       = debug|info|warn|error (default: info)
 *   BKERNEL_LOG_JSON        = 1 for JSONL output
 *   BKERNEL_LOG_FILE        = path (optional, appends)
 *   BKERNEL_DEBUG           = 1 (forces debug level)
 *   BKERNEL_LOCK_TIMEOUT_MS = wait for a held job lock (default: 5000)
 *   BKERNEL_LOCK_STALE_MS   = lock age treated as abandoned (default: 6h)
 *   BKERNEL_FSYNC           = BEST_EFFORT|REQUIRED (default: BEST_EFFORT)
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ERRORS, KernelError, messageOf } from './errors';
import type { LogLevel, LoggerOptions } from './logger';
import { JsonSchema, SchemaValidator } from './schema_validator';

export type FsyncMode = 'BEST_EFFORT' | 'REQUIRED';

type Env = Record<string, string | undefined>;

function intFromEnv(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = parseInt(raw, 10);
    return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function isFlagSet(raw: string | undefined): boolean {
    return raw === '1' || raw === 'true';
}

/* -------------------------------------------------------------------------- */
/* Runtime settings                                                           */
/* -------------------------------------------------------------------------- */

export interface RuntimeSettings {
    homeDir: string;
    configPath: string;
    auditDbPath: string;
    lockTimeoutMs: number;
    lockStaleMs: number;
    fsyncMode: FsyncMode;
    log: LoggerOptions;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(raw: string | undefined): LogLevel {
    const lowered = (raw || 'info').toLowerCase();
    const match = LOG_LEVELS.find((l) => l === lowered);
    return match ?? 'info';
}

export function loadRuntimeSettings(env: Env = process.env): RuntimeSettings {
    const homeDir = env.BKERNEL_HOME || path.join(env.HOME || env.USERPROFILE || os.homedir(), '.bkernel');

    return {
        homeDir,
        configPath: env.BKERNEL_CONFIG || path.join(homeDir, 'config.json'),
        auditDbPath: env.BKERNEL_DB || path.join(homeDir, 'audit.db'),
        lockTimeoutMs: intFromEnv(env.BKERNEL_LOCK_TIMEOUT_MS, 5000),
        lockStaleMs: intFromEnv(env.BKERNEL_LOCK_STALE_MS, 6 * 60 * 60 * 1000),
        fsyncMode: env.BKERNEL_FSYNC === 'REQUIRED' ? 'REQUIRED' : 'BEST_EFFORT',
        log: {
            level: isFlagSet(env.BKERNEL_DEBUG) ? 'debug' : parseLogLevel(env.BKERNEL_LOG_LEVEL),
            json: env.BKERNEL_LOG_JSON === '1',
            file: env.BKERNEL_LOG_FILE || undefined,
        },
    };
}

/* -------------------------------------------------------------------------- */
/* Job configuration file                                                     */
/* -------------------------------------------------------------------------- */

export interface JobConfig {
    name: string;
    root: string;
    exclude: string[];
    statePath: string;
    artifactPath: string;
    upstreamStatePath?: string;
    /** argv; `{root}` and `{output}` are substituted before spawning. */
    command: string[];
    sidecar: boolean;
}

export interface KernelConfig {
    auditDbPath: string;
    jobs: Map<string, JobConfig>;
}

const JOB_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['root', 'statePath', 'artifactPath', 'command'],
    properties: {
        root: { type: 'string' },
        exclude: { type: 'array', items: { type: 'string' } },
        statePath: { type: 'string' },
        artifactPath: { type: 'string' },
        upstreamStatePath: { type: 'string' },
        command: { type: 'array', items: { type: 'string' }, minItems: 1 },
        sidecar: { type: 'boolean' },
    },
};

const CONFIG_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['jobs'],
    properties: {
        auditDbPath: { type: 'string' },
        jobs: { type: 'object', additionalProperties: JOB_SCHEMA },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('kernel_config_v1', CONFIG_SCHEMA);

function expandHome(p: string): string {
    if (p === '~') return os.homedir();
    if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
    return p;
}

function readString(obj: Record<string, unknown>, key: string): string | undefined {
    const v = obj[key];
    return typeof v === 'string' ? v : undefined;
}

function readStringArray(obj: Record<string, unknown>, key: string): string[] {
    const v = obj[key];
    return Array.isArray(v) ? v.filter((x): x is string => typeof x === 'string') : [];
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Parses and validates the config document. Relative paths resolve against
 * the directory holding the config file.
 */
export function parseKernelConfig(text: string, configPath: string, settings: RuntimeSettings): KernelConfig {
    let doc: unknown;
    try {
        doc = JSON.parse(text);
    } catch (e) {
        throw new KernelError(`Config is not valid JSON: ${messageOf(e)}`, ERRORS.INVALID_CONFIG, { configPath }, e);
    }

    const result = validator.validate(doc, 'kernel_config_v1');
    if (!result.valid || !isRecord(doc) || !isRecord(doc.jobs)) {
        const detail = result.errors.map((e) => `${e.path || '<root>'}: ${e.message}`).join('; ');
        throw new KernelError(`Invalid config ${configPath}: ${detail}`, ERRORS.INVALID_CONFIG, {
            configPath,
            errors: result.errors,
        });
    }

    const base = path.dirname(path.resolve(configPath));
    const resolve = (p: string) => path.resolve(base, expandHome(p));

    const jobs = new Map<string, JobConfig>();
    for (const [name, raw] of Object.entries(doc.jobs)) {
        if (!isRecord(raw)) continue;
        const upstream = readString(raw, 'upstreamStatePath');
        jobs.set(name, {
            name,
            root: resolve(readString(raw, 'root') ?? ''),
            exclude: readStringArray(raw, 'exclude'),
            statePath: resolve(readString(raw, 'statePath') ?? ''),
            artifactPath: resolve(readString(raw, 'artifactPath') ?? ''),
            upstreamStatePath: upstream === undefined ? undefined : resolve(upstream),
            command: readStringArray(raw, 'command'),
            sidecar: raw.sidecar === true,
        });
    }

    const dbPath = readString(doc, 'auditDbPath');
    return {
        auditDbPath: dbPath === undefined ? settings.auditDbPath : resolve(dbPath),
        jobs,
    };
}

export function loadKernelConfig(settings: RuntimeSettings): KernelConfig {
    let text: string;
    try {
        text = fs.readFileSync(settings.configPath, 'utf-8');
    } catch (e) {
        throw new KernelError(
            `Configuration not found at ${settings.configPath}`,
            ERRORS.INVALID_CONFIG,
            { configPath: settings.configPath },
            e
        );
    }
    return parseKernelConfig(text, settings.configPath, settings);
}

const PLACEHOLDER = /\{(root|output)\}/g;

/** Replaces `{root}` and `{output}` in one pass; substituted text is never re-scanned. */
export function substituteCommand(command: readonly string[], vars: { root: string; output: string }): string[] {
    return command.map((arg) => arg.replace(PLACEHOLDER, (_m, key: string) => (key === 'root' ? vars.root : vars.output)));
}

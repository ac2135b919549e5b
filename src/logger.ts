/**
 * Structured Logger
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) or plain text
 * - Optional file output (append)
 * - Component name on every line
 * - Bound context fields (run id, job name) via withContext()
 *
 * Loggers are plain objects built once per process and handed to whatever
 * needs them; there is no module-level logging state.
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
    level?: LogLevel;
    json?: boolean;
    file?: string;
    /** Replaces console output; used by tests and embedding callers. */
    sink?: LogSink;
    now?: () => Date;
}

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
    withContext(fields: Record<string, string>): Logger;
}

/* -------------------------------------------------------------------------- */
/* Output                                                                     */
/* -------------------------------------------------------------------------- */

function consoleSink(level: LogLevel, line: string): void {
    switch (level) {
        case 'error':
        case 'warn':
            process.stderr.write(line + '\n');
            break;
        default:
            process.stdout.write(line + '\n');
            break;
    }
}

function format(
    opts: LoggerOptions,
    level: LogLevel,
    component: string,
    context: Record<string, string>,
    message: string,
    data?: Record<string, unknown>
): string {
    const ts = (opts.now ?? (() => new Date()))().toISOString();

    if (opts.json) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message, ...context };
        if (data) entry.data = data;
        return JSON.stringify(entry, (_k, v: unknown) => (typeof v === 'bigint' ? v.toString() : v));
    }

    const ctxKeys = Object.keys(context);
    const ctx = ctxKeys.length > 0 ? ` [${ctxKeys.map((k) => `${k}=${context[k]}`).join(' ')}]` : '';
    const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
    return data
        ? `${prefix} ${message} ${JSON.stringify(data, (_k, v: unknown) => (typeof v === 'bigint' ? v.toString() : v))}`
        : `${prefix} ${message}`;
}

/* -------------------------------------------------------------------------- */
/* Factory                                                                    */
/* -------------------------------------------------------------------------- */

function build(component: string, opts: LoggerOptions, context: Record<string, string>): Logger {
    const min = LEVEL_ORDER[opts.level ?? 'info'];
    const sink = opts.sink ?? consoleSink;

    const emit = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
        if (LEVEL_ORDER[level] < min) return;
        const line = format(opts, level, component, context, message, data);
        sink(level, line);

        if (opts.file) {
            try {
                fs.appendFileSync(opts.file, line + '\n');
            } catch (e) {
                // file output is secondary to the sink
                process.stderr.write(`log file append failed (${opts.file}): ${String(e)}\n`);
            }
        }
    };

    return {
        debug: (msg, data) => emit('debug', msg, data),
        info: (msg, data) => emit('info', msg, data),
        warn: (msg, data) => emit('warn', msg, data),
        error: (msg, data) => emit('error', msg, data),
        child: (sub) => build(`${component}:${sub}`, opts, context),
        withContext: (fields) => build(component, opts, { ...context, ...fields }),
    };
}

export function createLogger(component: string, opts: LoggerOptions = {}): Logger {
    return build(component, opts, {});
}

/** Logger that drops everything; the default where a caller passes none. */
export function silentLogger(): Logger {
    return createLogger('silent', { sink: () => undefined, level: 'error' });
}

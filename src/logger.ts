/**
 * Structured Logger
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when json mode is on
 * - Optional file output (appends)
 * - Module context (component name) on every line
 * - Run correlation (run id, branch, depth) propagated through all log entries
 *
 * Defaults come from the environment until configureLogging() is called:
 *   RCB_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   RCB_LOG_JSON   = 1 (default: text)
 *   RCB_LOG_FILE   = path (optional, appends)
 *   RCB_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: string): value is LogLevel {
    return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export interface LoggingOptions {
    level: LogLevel;
    json: boolean;
    file: string;
}

function optionsFromEnv(env: NodeJS.ProcessEnv): LoggingOptions {
    const raw = (env.RCB_LOG_LEVEL || 'info').toLowerCase();
    const debug = env.RCB_DEBUG === '1' || env.RCB_DEBUG === 'true';
    return {
        level: debug ? 'debug' : isLogLevel(raw) ? raw : 'info',
        json: env.RCB_LOG_JSON === '1',
        file: env.RCB_LOG_FILE || '',
    };
}

let _options: LoggingOptions = optionsFromEnv(process.env);
let _fileErrorReported = false;

/** Replace the active output options. Called once at startup from the loaded configuration. */
export function configureLogging(opts: Partial<LoggingOptions>): void {
    _options = { ..._options, ...opts };
    _fileErrorReported = false;
}

/* -------------------------------------------------------------------------- */
/* Run Correlation Context (singleton)                                        */
/* -------------------------------------------------------------------------- */

let _runId = '';
let _branch = '';
let _depth: number | null = null;

/** Set the active run correlation context. Called by the orchestrator per invocation. */
export function setCorrelation(opts: { runId?: string; branch?: string; depth?: number }): void {
    if (opts.runId !== undefined) _runId = opts.runId;
    if (opts.branch !== undefined) _branch = opts.branch;
    if (opts.depth !== undefined) _depth = opts.depth;
}

/** Clear correlation context. Called at run end. */
export function clearCorrelation(): void {
    _runId = '';
    _branch = '';
    _depth = null;
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[_options.level]) return;

    const ts = new Date().toISOString();

    if (_options.json) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_runId) entry.run_id = _runId;
        if (_branch) entry.branch = _branch;
        if (_depth !== null) entry.depth = _depth;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = _runId
            ? ` [${_runId.slice(0, 8)}${_branch ? ':' + _branch : ''}${_depth !== null ? '@' + _depth : ''}]`
            : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (_options.file) {
        try {
            fs.appendFileSync(_options.file, line + '\n');
        } catch (err) {
            if (!_fileErrorReported) {
                _fileErrorReported = true;
                process.stderr.write(`log file ${_options.file} not writable: ${String(err)}\n`);
            }
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
    };
}

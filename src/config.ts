/**
 * Builder Configuration
 *
 * One BuilderConfig is built at startup (defaults, then the JSON config file,
 * then environment overrides) and handed to each component's constructor.
 * API keys are read from the environment only.
 */

import * as fs from 'fs';
import * as path from 'path';
import { isLogLevel, LoggingOptions } from './logger';
import { ConfigError, describeError } from './structured_error';
import { formatViolations, isRecord, JsonSchema, SchemaValidator } from './schema_validator';

export type ModelSource = 'local' | 'openai' | 'deepseek';

export const MODEL_SOURCES: readonly ModelSource[] = ['local', 'openai', 'deepseek'];

export interface RemoteModelConfig {
    model: string;
    baseUrl: string;
    apiKey: string;
}

export interface LocalModelConfig {
    tritonUrl: string;
    modelName: string;
    maxTokens: number;
}

export interface ChecksConfig {
    /** Command template; `{file}` is replaced by the artifact path. */
    lintCommand: string[];
    testCommand: string[];
    timeoutMs: number;
}

export interface BuilderConfig {
    modelSource: ModelSource;
    maxDepth: number;
    maxConversationLength: number;
    maxRetries: number;
    retryBaseMs: number;
    retryMaxMs: number;
    /** Upper bound on generation calls in flight at once. */
    maxBatchSize: number;
    requestTimeoutMs: number;
    conversationFile: string;
    outputDir: string;
    artifactExtension: string;
    codeLanguage: string;
    ledgerPath: string;
    /** Verdicts kept in memory; 0 turns the cache off. */
    verificationCacheSize: number;
    openai: RemoteModelConfig;
    deepseek: RemoteModelConfig;
    local: LocalModelConfig;
    checks: ChecksConfig;
    logging: LoggingOptions;
}

export const DEFAULT_CONFIG_FILE = 'recursive-builder.config.json';

export const DEFAULT_CONFIG: BuilderConfig = {
    modelSource: 'deepseek',
    maxDepth: 10,
    maxConversationLength: 10,
    maxRetries: 3,
    retryBaseMs: 1500,
    retryMaxMs: 10000,
    maxBatchSize: 4,
    requestTimeoutMs: 120000,
    conversationFile: 'conversation_state.json',
    outputDir: 'generated',
    artifactExtension: '.py',
    codeLanguage: 'python',
    ledgerPath: 'artifact_ledger.db',
    verificationCacheSize: 128,
    openai: {
        model: 'gpt-3.5-turbo',
        baseUrl: 'https://api.openai.com/v1',
        apiKey: '',
    },
    deepseek: {
        model: 'deepseek-reasoner',
        baseUrl: 'https://api.deepseek.com/v1',
        apiKey: '',
    },
    local: {
        tritonUrl: 'localhost:8000',
        modelName: 'meta-llama_Meta-Llama-3-8B',
        maxTokens: 1024,
    },
    checks: {
        lintCommand: ['flake8', '{file}'],
        testCommand: ['pytest', '--maxfail=1', '--disable-warnings'],
        timeoutMs: 120000,
    },
    logging: {
        level: 'info',
        json: false,
        file: '',
    },
};

/* -------------------------------------------------------------------------- */
/* File schema                                                                */
/* -------------------------------------------------------------------------- */

const positiveInt: JsonSchema = { type: 'integer', minimum: 1 };
const nonNegativeInt: JsonSchema = { type: 'integer', minimum: 0 };
const nonEmpty: JsonSchema = { type: 'string', minLength: 1 };
const command: JsonSchema = { type: 'array', items: nonEmpty };

const CONFIG_FILE_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        general: {
            type: 'object',
            properties: {
                model_source: { type: 'string', enum: MODEL_SOURCES },
                max_depth: nonNegativeInt,
                max_conversation_length: { type: 'integer', minimum: 2 },
                max_retries: positiveInt,
                retry_base_ms: nonNegativeInt,
                retry_max_ms: nonNegativeInt,
                max_batch_size: positiveInt,
                request_timeout_ms: positiveInt,
                conversation_file: nonEmpty,
                output_dir: nonEmpty,
                artifact_extension: { type: 'string' },
                code_language: { type: 'string' },
                ledger_path: nonEmpty,
                verification_cache_size: nonNegativeInt,
            },
        },
        openai: {
            type: 'object',
            properties: { model: nonEmpty, base_url: nonEmpty },
        },
        deepseek: {
            type: 'object',
            properties: { model: nonEmpty, base_url: nonEmpty },
        },
        local: {
            type: 'object',
            properties: { triton_url: nonEmpty, model_name: nonEmpty, max_tokens: positiveInt },
        },
        checks: {
            type: 'object',
            properties: {
                lint_command: command,
                test_command: command,
                timeout_ms: positiveInt,
            },
        },
        logging: {
            type: 'object',
            properties: {
                level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
                json: { type: 'boolean' },
                file: { type: 'string' },
            },
        },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('config_file_v1', CONFIG_FILE_SCHEMA);

/* -------------------------------------------------------------------------- */
/* Readers (values are schema-checked before they get here)                   */
/* -------------------------------------------------------------------------- */

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = raw[key];
    return isRecord(value) ? value : {};
}

function num(sec: Record<string, unknown>, key: string, fallback: number): number {
    const value = sec[key];
    return typeof value === 'number' ? value : fallback;
}

function str(sec: Record<string, unknown>, key: string, fallback: string): string {
    const value = sec[key];
    return typeof value === 'string' ? value : fallback;
}

function bool(sec: Record<string, unknown>, key: string, fallback: boolean): boolean {
    const value = sec[key];
    return typeof value === 'boolean' ? value : fallback;
}

function strList(sec: Record<string, unknown>, key: string, fallback: string[]): string[] {
    const value = sec[key];
    if (!Array.isArray(value)) return [...fallback];
    return value.filter((v): v is string => typeof v === 'string');
}

function isModelSource(value: string): value is ModelSource {
    return value === 'local' || value === 'openai' || value === 'deepseek';
}

function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number, minimum: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < minimum) {
        throw new ConfigError(`${name} must be an integer >= ${minimum}, got "${raw}"`);
    }
    return n;
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Build a BuilderConfig from a parsed config file object.
 * Throws ConfigError when the object does not match the file schema.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): BuilderConfig {
    const result = validator.validate(raw ?? {}, 'config_file_v1');
    if (!result.valid) {
        throw new ConfigError(`Invalid configuration: ${formatViolations(result)}`);
    }
    const root = isRecord(raw) ? raw : {};
    const d = DEFAULT_CONFIG;

    const general = section(root, 'general');
    const openai = section(root, 'openai');
    const deepseek = section(root, 'deepseek');
    const local = section(root, 'local');
    const checks = section(root, 'checks');
    const logging = section(root, 'logging');

    const sourceRaw = env.RCB_MODEL_SOURCE ?? str(general, 'model_source', d.modelSource);
    if (!isModelSource(sourceRaw)) {
        throw new ConfigError(`Unknown model source "${sourceRaw}" (expected one of ${MODEL_SOURCES.join(', ')})`);
    }

    const levelRaw = str(logging, 'level', d.logging.level);

    const config: BuilderConfig = {
        modelSource: sourceRaw,
        maxDepth: envInt(env, 'RCB_MAX_DEPTH', num(general, 'max_depth', d.maxDepth), 0),
        maxConversationLength: envInt(
            env,
            'RCB_MAX_CONVERSATION_LENGTH',
            num(general, 'max_conversation_length', d.maxConversationLength),
            2
        ),
        maxRetries: num(general, 'max_retries', d.maxRetries),
        retryBaseMs: num(general, 'retry_base_ms', d.retryBaseMs),
        retryMaxMs: num(general, 'retry_max_ms', d.retryMaxMs),
        maxBatchSize: num(general, 'max_batch_size', d.maxBatchSize),
        requestTimeoutMs: num(general, 'request_timeout_ms', d.requestTimeoutMs),
        conversationFile: env.RCB_CONVERSATION_FILE || str(general, 'conversation_file', d.conversationFile),
        outputDir: env.RCB_OUTPUT_DIR || str(general, 'output_dir', d.outputDir),
        artifactExtension: str(general, 'artifact_extension', d.artifactExtension),
        codeLanguage: str(general, 'code_language', d.codeLanguage),
        ledgerPath: str(general, 'ledger_path', d.ledgerPath),
        verificationCacheSize: num(general, 'verification_cache_size', d.verificationCacheSize),
        openai: {
            model: str(openai, 'model', d.openai.model),
            baseUrl: str(openai, 'base_url', d.openai.baseUrl),
            apiKey: env.OPENAI_API_KEY || '',
        },
        deepseek: {
            model: str(deepseek, 'model', d.deepseek.model),
            baseUrl: str(deepseek, 'base_url', d.deepseek.baseUrl),
            apiKey: env.DEEPSEEK_API_KEY || '',
        },
        local: {
            tritonUrl: str(local, 'triton_url', d.local.tritonUrl),
            modelName: str(local, 'model_name', d.local.modelName),
            maxTokens: num(local, 'max_tokens', d.local.maxTokens),
        },
        checks: {
            lintCommand: strList(checks, 'lint_command', d.checks.lintCommand),
            testCommand: strList(checks, 'test_command', d.checks.testCommand),
            timeoutMs: num(checks, 'timeout_ms', d.checks.timeoutMs),
        },
        logging: {
            level: isLogLevel(levelRaw) ? levelRaw : d.logging.level,
            json: bool(logging, 'json', d.logging.json),
            file: str(logging, 'file', d.logging.file),
        },
    };

    if (config.retryMaxMs < config.retryBaseMs) {
        throw new ConfigError(`retry_max_ms (${config.retryMaxMs}) must be >= retry_base_ms (${config.retryBaseMs})`);
    }
    return config;
}

/**
 * Load configuration from a JSON file. A missing file yields the defaults
 * (plus environment overrides).
 */
export function loadConfig(filePath: string = DEFAULT_CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): BuilderConfig {
    if (!fs.existsSync(filePath)) {
        return parseConfig({}, env);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (e) {
        throw new ConfigError(`Cannot read configuration ${filePath}: ${describeError(e)}`, { cause: e });
    }
    return parseConfig(raw, env);
}

/** The file representation of a configuration (API keys are never written). */
export function toConfigFile(config: BuilderConfig): Record<string, unknown> {
    return {
        general: {
            model_source: config.modelSource,
            max_depth: config.maxDepth,
            max_conversation_length: config.maxConversationLength,
            max_retries: config.maxRetries,
            retry_base_ms: config.retryBaseMs,
            retry_max_ms: config.retryMaxMs,
            max_batch_size: config.maxBatchSize,
            request_timeout_ms: config.requestTimeoutMs,
            conversation_file: config.conversationFile,
            output_dir: config.outputDir,
            artifact_extension: config.artifactExtension,
            code_language: config.codeLanguage,
            ledger_path: config.ledgerPath,
            verification_cache_size: config.verificationCacheSize,
        },
        openai: { model: config.openai.model, base_url: config.openai.baseUrl },
        deepseek: { model: config.deepseek.model, base_url: config.deepseek.baseUrl },
        local: {
            triton_url: config.local.tritonUrl,
            model_name: config.local.modelName,
            max_tokens: config.local.maxTokens,
        },
        checks: {
            lint_command: config.checks.lintCommand,
            test_command: config.checks.testCommand,
            timeout_ms: config.checks.timeoutMs,
        },
        logging: { ...config.logging },
    };
}

export function writeDefaultConfig(filePath: string): void {
    if (fs.existsSync(filePath)) {
        throw new ConfigError(`Configuration already exists at ${filePath}`);
    }
    const dir = path.dirname(filePath);
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(toConfigFile(DEFAULT_CONFIG), null, 2) + '\n');
}

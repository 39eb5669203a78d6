import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, MAX_PAGE_SIZE, type IngestConfig } from '../types/index.js';
import { ConfigError, errorMessage } from './errors.js';
import { getLogger, isLogLevel } from './logger.js';

export const CONFIG_FILE = 'paper-ingest.config.json';

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setIfDefined<K extends keyof IngestConfig>(
    target: Partial<IngestConfig>,
    key: K,
    value: IngestConfig[K] | undefined
): void {
    if (value !== undefined) target[key] = value;
}

/**
 * Typed reads from an untrusted config object; a wrong type is a ConfigError.
 */
class FieldReader {
    constructor(
        private readonly raw: Record<string, unknown>,
        private readonly origin: string
    ) {}

    number(key: string): number | undefined {
        const value = this.raw[key];
        if (value === undefined) return undefined;
        if (typeof value !== 'number' || !Number.isFinite(value)) throw this.invalid(key, 'a number');
        return value;
    }

    boolean(key: string): boolean | undefined {
        const value = this.raw[key];
        if (value === undefined) return undefined;
        if (typeof value !== 'boolean') throw this.invalid(key, 'a boolean');
        return value;
    }

    string(key: string): string | undefined {
        const value = this.raw[key];
        if (value === undefined) return undefined;
        if (typeof value !== 'string') throw this.invalid(key, 'a string');
        return value;
    }

    nullableString(key: string): string | null | undefined {
        return this.raw[key] === null ? null : this.string(key);
    }

    private invalid(key: string, expected: string): ConfigError {
        return new ConfigError(`${this.origin}: "${key}" must be ${expected}`);
    }
}

const KNOWN_KEYS = new Set<string>(Object.keys(DEFAULT_CONFIG).concat('email'));

/**
 * Narrow the contents of a config file into configuration overrides.
 */
export function parseConfigObject(raw: unknown, origin: string): Partial<IngestConfig> {
    if (!isRecord(raw)) {
        throw new ConfigError(`${origin}: expected a JSON object`);
    }

    const unrecognized = Object.keys(raw).filter((key) => !KNOWN_KEYS.has(key));
    if (unrecognized.length > 0) {
        getLogger().warn({ origin, keys: unrecognized }, 'Ignoring unknown config keys');
    }

    const read = new FieldReader(raw, origin);
    const config: Partial<IngestConfig> = {};

    setIfDefined(config, 'dbPath', read.string('dbPath'));
    setIfDefined(config, 'force', read.boolean('force'));
    setIfDefined(config, 'days', read.number('days'));
    setIfDefined(config, 'subfield', read.nullableString('subfield'));
    setIfDefined(config, 'pageSize', read.number('pageSize'));
    setIfDefined(config, 'maxPages', read.number('maxPages'));
    setIfDefined(config, 'pageRetries', read.number('pageRetries'));
    setIfDefined(config, 'initialBackoffMs', read.number('initialBackoffMs'));
    setIfDefined(config, 'maxBackoffMs', read.number('maxBackoffMs'));
    setIfDefined(config, 'email', read.string('email'));
    setIfDefined(config, 'batchSize', read.number('batchSize'));
    setIfDefined(config, 'skipQualityChecks', read.boolean('skipQualityChecks'));
    setIfDefined(config, 'citationCeiling', read.number('citationCeiling'));
    setIfDefined(config, 'sampleLimit', read.number('sampleLimit'));
    setIfDefined(config, 'backupDir', read.nullableString('backupDir'));
    setIfDefined(config, 'reportsDir', read.nullableString('reportsDir'));
    setIfDefined(config, 'jsonLogs', read.boolean('jsonLogs'));

    const logLevel = read.string('logLevel');
    if (logLevel !== undefined) {
        if (!isLogLevel(logLevel)) throw new ConfigError(`${origin}: unknown logLevel "${logLevel}"`);
        config.logLevel = logLevel;
    }

    return config;
}

/**
 * Load configuration from paper-ingest.config.json using cosmiconfig.
 * Returns null when no config file is found; defaults then apply.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<IngestConfig> | null> {
    const explorer = cosmiconfig('paper-ingest', {
        searchPlaces: [CONFIG_FILE],
    });

    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = await explorer.search(searchFrom);
    } catch (error) {
        throw new ConfigError(`Cannot load ${CONFIG_FILE}: ${errorMessage(error)}`);
    }
    if (!result || result.isEmpty) return null;

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    const raw: unknown = result.config;
    return parseConfigObject(raw, result.filepath);
}

/**
 * Read relevant environment variables.
 * `OPENALEX_API_KEY` is read by the OpenAlex source itself and never stored in config.
 */
export function loadEnvVars(env: Env = process.env): Partial<IngestConfig> {
    const config: Partial<IngestConfig> = {};

    const dbPath = env['PAPER_INGEST_DB'];
    if (dbPath) config.dbPath = dbPath;

    const email = env['OPENALEX_EMAIL'];
    if (email) config.email = email;

    const logLevel = env['PAPER_INGEST_LOG_LEVEL'];
    if (isLogLevel(logLevel)) config.logLevel = logLevel;

    return config;
}

/**
 * Reject values no component can work with.
 * @throws ConfigError naming the first offending setting
 */
export function validateConfig(config: IngestConfig): IngestConfig {
    const positiveInt = (key: keyof IngestConfig, value: number): void => {
        if (!Number.isInteger(value) || value < 1) {
            throw new ConfigError(`${key} must be a positive integer, got ${value}`);
        }
    };

    if (config.dbPath.trim() === '') throw new ConfigError('dbPath must not be empty');
    positiveInt('days', config.days);
    positiveInt('batchSize', config.batchSize);
    positiveInt('pageSize', config.pageSize);
    positiveInt('maxPages', config.maxPages);
    positiveInt('sampleLimit', config.sampleLimit);

    if (config.pageSize > MAX_PAGE_SIZE) {
        throw new ConfigError(`pageSize must be at most ${MAX_PAGE_SIZE}, got ${config.pageSize}`);
    }
    if (!Number.isInteger(config.pageRetries) || config.pageRetries < 0) {
        throw new ConfigError(`pageRetries must be a non-negative integer, got ${config.pageRetries}`);
    }
    if (config.initialBackoffMs < 0 || config.maxBackoffMs < config.initialBackoffMs) {
        throw new ConfigError(
            `backoff must satisfy 0 <= initialBackoffMs <= maxBackoffMs, got ${config.initialBackoffMs} and ${config.maxBackoffMs}`
        );
    }
    if (config.citationCeiling < 0) {
        throw new ConfigError(`citationCeiling must be non-negative, got ${config.citationCeiling}`);
    }

    return config;
}

export interface ResolveOptions {
    /** Directory to look for the config file in; defaults to the working directory */
    cwd?: string;
    env?: Env;
}

/**
 * Merge configuration from multiple sources and validate the result.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<IngestConfig>,
    options: ResolveOptions = {}
): Promise<IngestConfig> {
    const fileConfig = await loadConfigFile(options.cwd);
    const envConfig = loadEnvVars(options.env);

    const merged: IngestConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
    };

    return validateConfig(merged);
}

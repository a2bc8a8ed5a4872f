import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../utils/errors';

dotenv.config();

const DEFAULT_CONFIG_PATH = path.join(__dirname, 'default.yaml');

const ConfidenceSchema = z.number().min(0).max(1);

const ConfigSchema = z.object({
    pipeline: z.object({
        concurrency: z.number().int().min(1).max(500).default(5),
        per_domain_rate: z.number().min(0).default(2),
        per_domain_burst: z.number().int().min(1).default(1),
        best_guess: z.boolean().default(false),
        capability_failure_threshold: z.number().int().min(1).default(10),
    }).default({}),
    resolver: z.object({
        guess_from_name: z.boolean().default(true),
        guess_tld: z.string().regex(/^[a-z]{2,}$/).default('com'),
        search_enabled: z.boolean().default(true),
    }).default({}),
    generator: z.object({
        max_candidates: z.number().int().min(1).max(64).default(8),
    }).default({}),
    verifier: z.object({
        smtp_enabled: z.boolean().default(true),
        max_mx_hosts: z.number().int().min(1).max(10).default(2),
        catch_all_probe: z.enum(['random', 'sentinel']).default('random'),
        catch_all_sentinel: z.string().min(1).default('mailsleuth-nonexistent-7f3a9c'),
        confidence: z.object({
            valid: ConfidenceSchema.default(0.9),
            valid_unconfirmed: ConfidenceSchema.default(0.7),
            catch_all: ConfidenceSchema.default(0.5),
            invalid_rejected: ConfidenceSchema.default(0.85),
            invalid_no_mx: ConfidenceSchema.default(1.0),
            mx_only: ConfidenceSchema.default(0.3),
            unknown: ConfidenceSchema.default(0),
        }).default({}),
    }).default({}),
    dns: z.object({
        timeout_ms: z.number().int().min(100).default(5000),
        tries: z.number().int().min(1).max(5).default(1),
        servers: z.array(z.string()).default([]),
    }).default({}),
    smtp: z.object({
        port: z.number().int().min(1).max(65535).default(25),
        timeout_ms: z.number().int().min(100).default(10000),
        helo_name: z.string().min(1).default('mailsleuth.local'),
        mail_from: z.string().email().default('probe@mailsleuth.local'),
    }).default({}),
    search: z.object({
        timeout_ms: z.number().int().min(100).default(10000),
        max_results: z.number().int().min(1).default(10),
        user_agent: z.string().default('Mozilla/5.0'),
        skip_domains: z.array(z.string()).default([]),
    }).default({}),
    retry: z.object({
        attempts: z.number().int().min(1).max(10).default(3),
        base_delay_ms: z.number().int().min(0).default(500),
        max_delay_ms: z.number().int().min(0).default(8000),
        jitter_ms: z.number().int().min(0).default(250),
    }).default({}),
    ingest: z.object({
        max_preamble_lines: z.number().int().min(0).default(10),
    }).default({}),
    logging: z.object({
        level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
        silent: z.boolean().default(false),
        file_dir: z.string().default(''),
    }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RetryConfig = Config['retry'];
export type VerifierConfig = Config['verifier'];

const EnvSchema = z.object({
    CONCURRENCY_LIMIT: z.coerce.number().int().optional(),
    PER_DOMAIN_RATE: z.coerce.number().optional(),
    SMTP_ENABLED: z.enum(['true', 'false']).optional(),
    SMTP_PORT: z.coerce.number().int().optional(),
    SMTP_HELO_NAME: z.string().min(1).optional(),
    SMTP_MAIL_FROM: z.string().min(1).optional(),
    DNS_TIMEOUT_MS: z.coerce.number().int().optional(),
    SMTP_TIMEOUT_MS: z.coerce.number().int().optional(),
    LOG_LEVEL: z.string().min(1).optional(),
    LOG_SILENT: z.enum(['true', 'false']).optional(),
    LOG_DIR: z.string().optional(),
});

type Env = z.infer<typeof EnvSchema>;

type RawConfig = Record<string, Record<string, unknown>>;

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `- ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('\n');
}

function section(raw: RawConfig, key: string): Record<string, unknown> {
    if (!raw[key]) raw[key] = {};
    return raw[key];
}

function applyEnv(raw: RawConfig, env: Env): void {
    const set = (key: string, field: string, value: unknown) => {
        if (value !== undefined && value !== '') section(raw, key)[field] = value;
    };

    set('pipeline', 'concurrency', env.CONCURRENCY_LIMIT);
    set('pipeline', 'per_domain_rate', env.PER_DOMAIN_RATE);
    set('verifier', 'smtp_enabled', env.SMTP_ENABLED === undefined ? undefined : env.SMTP_ENABLED === 'true');
    set('smtp', 'port', env.SMTP_PORT);
    set('smtp', 'helo_name', env.SMTP_HELO_NAME);
    set('smtp', 'mail_from', env.SMTP_MAIL_FROM);
    set('dns', 'timeout_ms', env.DNS_TIMEOUT_MS);
    set('smtp', 'timeout_ms', env.SMTP_TIMEOUT_MS);
    set('logging', 'level', env.LOG_LEVEL);
    set('logging', 'silent', env.LOG_SILENT === undefined ? undefined : env.LOG_SILENT === 'true');
    if (env.LOG_DIR !== undefined) section(raw, 'logging').file_dir = env.LOG_DIR;
}

function readYaml(configPath: string): RawConfig {
    let contents: string;
    try {
        contents = fs.readFileSync(configPath, 'utf8');
    } catch (e) {
        throw new ConfigurationError(`Cannot read config file ${configPath}: ${errorMessage(e)}`);
    }

    const loaded: unknown = yaml.load(contents);
    if (loaded === undefined || loaded === null) return {};
    const parsed = z.record(z.record(z.unknown())).safeParse(loaded);
    if (!parsed.success) {
        throw new ConfigurationError(`Config file ${configPath} must be a mapping of sections:\n${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * Parses YAML defaults, layers environment overrides on top and validates the
 * result. Refuses to return a partially valid config.
 */
export function parseConfig(configPath: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): Config {
    const raw = readYaml(configPath);

    const envParsed = EnvSchema.safeParse(env);
    if (!envParsed.success) {
        throw new ConfigurationError(`Invalid environment configuration:\n${formatIssues(envParsed.error)}`);
    }
    applyEnv(raw, envParsed.data);

    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigurationError(`Invalid configuration in ${configPath}:\n${formatIssues(result.error)}`);
    }
    return result.data;
}

let configInstance: Config | null = null;

export const loadConfig = (configPath?: string): Config => {
    configInstance = parseConfig(configPath);
    return configInstance;
};

export const getConfig = (): Config => {
    if (!configInstance) {
        configInstance = parseConfig();
    }
    return configInstance;
};

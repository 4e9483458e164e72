/**
 * Configuration management for the answer service
 */

import { parse as parseYaml } from 'yaml';
import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import type { Config, ConfigPatch, CLIOptions, LogLevel } from './types';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'critical'] as const;

/**
 * Convert snake_case keys to camelCase recursively
 */
function snakeToCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(snakeToCamel);
  }
  if (obj !== null && typeof obj === 'object') {
    return Object.fromEntries(
      Object.entries(obj).map(([key, value]) => {
        const camelKey = key.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
        return [camelKey, snakeToCamel(value)];
      })
    );
  }
  return obj;
}

const FileConfigSchema = z
  .object({
    server: z
      .object({
        host: z.string(),
        port: z.number().int().positive(),
      })
      .partial(),
    llm: z
      .object({
        model: z.string(),
        maxTokens: z.number().int().positive(),
        temperature: z.number().min(0).max(1),
        maxRetries: z.number().int().min(0),
        apiKey: z.string(),
      })
      .partial(),
    search: z
      .object({
        endpoint: z.string().url(),
        site: z.string(),
        resultCount: z.number().int().positive(),
        recency: z.string(),
        apiKey: z.string(),
      })
      .partial(),
    scraper: z
      .object({
        timeoutMs: z.number().int().positive(),
        politenessDelayMs: z.number().int().min(0),
        minContentLength: z.number().int().min(0),
        userAgent: z.string(),
      })
      .partial(),
    execution: z
      .object({
        maxParallel: z.number().int().min(0),
        taskTimeoutMs: z.number().int().min(0),
      })
      .partial(),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS),
        file: z.string(),
        console: z.boolean(),
      })
      .partial(),
  })
  .partial();

const DEFAULT_CONFIG: Config = {
  server: {
    host: '0.0.0.0',
    port: 8080,
  },
  llm: {
    model: 'claude-3-5-haiku-latest',
    maxTokens: 1024,
    temperature: 0.2,
    maxRetries: 3,
    apiKey: undefined,
  },
  search: {
    endpoint: 'https://google.serper.dev/search',
    site: 'www.btselem.org',
    resultCount: 5,
    recency: 'qdr:3y',
    apiKey: undefined,
  },
  scraper: {
    timeoutMs: 15000,
    politenessDelayMs: 200,
    minContentLength: 100,
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  },
  execution: {
    maxParallel: 0,
    taskTimeoutMs: 120000,
  },
  logging: {
    level: 'info',
    file: undefined,
    console: true,
  },
};

/**
 * Layer a patch over a complete config, one section at a time
 */
function mergeConfig(base: Config, patch: ConfigPatch): Config {
  return {
    server: { ...base.server, ...patch.server },
    llm: { ...base.llm, ...patch.llm },
    search: { ...base.search, ...patch.search },
    scraper: { ...base.scraper, ...patch.scraper },
    execution: { ...base.execution, ...patch.execution },
    logging: { ...base.logging, ...patch.logging },
  };
}

/**
 * Load configuration from YAML file
 */
function loadConfigFile(path: string): ConfigPatch {
  if (!existsSync(path)) {
    return {};
  }

  const content = readFileSync(path, 'utf-8');
  const parsed = FileConfigSchema.safeParse(snakeToCamel(parseYaml(content) ?? {}));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid config file ${path}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

function parseInteger(value: string): number | undefined {
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): ConfigPatch {
  const server: Partial<Config['server']> = {};
  const llm: Partial<Config['llm']> = {};
  const search: Partial<Config['search']> = {};
  const execution: Partial<Config['execution']> = {};
  const logging: Partial<Config['logging']> = {};

  if (env.HOST) {
    server.host = env.HOST;
  }
  const port = env.PORT ? parseInteger(env.PORT) : undefined;
  if (port !== undefined) {
    server.port = port;
  }

  if (env.ANTHROPIC_API_KEY) {
    llm.apiKey = env.ANTHROPIC_API_KEY;
  }
  if (env.LLM_MODEL) {
    llm.model = env.LLM_MODEL;
  }

  if (env.SERPER_API_KEY) {
    search.apiKey = env.SERPER_API_KEY;
  }
  if (env.SEARCH_SITE) {
    search.site = env.SEARCH_SITE;
  }

  const maxParallel = env.MAX_PARALLEL ? parseInteger(env.MAX_PARALLEL) : undefined;
  if (maxParallel !== undefined) {
    execution.maxParallel = maxParallel;
  }
  const taskTimeoutMs = env.TASK_TIMEOUT_MS ? parseInteger(env.TASK_TIMEOUT_MS) : undefined;
  if (taskTimeoutMs !== undefined) {
    execution.taskTimeoutMs = taskTimeoutMs;
  }

  if (env.LOG_LEVEL && isLogLevel(env.LOG_LEVEL)) {
    logging.level = env.LOG_LEVEL;
  }
  if (env.LOG_FILE) {
    logging.file = env.LOG_FILE;
  }

  return { server, llm, search, execution, logging };
}

/**
 * Load and merge configuration from all sources
 * Priority (highest to lowest): CLI options > Environment > Config file > Defaults
 */
export function loadConfig(options: CLIOptions, env: NodeJS.ProcessEnv = process.env): Config {
  const configPath = options.config || 'config/default.yaml';

  let config = mergeConfig(DEFAULT_CONFIG, loadConfigFile(configPath));
  config = mergeConfig(config, loadEnvConfig(env));

  const cli: ConfigPatch = { server: {}, execution: {}, logging: {} };
  if (options.host) {
    cli.server = { ...cli.server, host: options.host };
  }
  if (options.port !== undefined) {
    cli.server = { ...cli.server, port: options.port };
  }
  if (options.maxParallel !== undefined) {
    cli.execution = { maxParallel: options.maxParallel };
  }
  if (options.verbose) {
    cli.logging = { level: 'debug' };
  }

  return mergeConfig(config, cli);
}

/**
 * Validate configuration and return any errors
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (!config.llm.apiKey) {
    errors.push('ANTHROPIC_API_KEY is required');
  }

  if (!config.search.apiKey) {
    errors.push('SERPER_API_KEY is required');
  }

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  if (config.execution.maxParallel < 0) {
    errors.push('maxParallel cannot be negative');
  }

  if (config.execution.taskTimeoutMs < 0) {
    errors.push('taskTimeoutMs cannot be negative');
  }

  return errors;
}

export { DEFAULT_CONFIG };

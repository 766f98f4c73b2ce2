/**
 * Authority Sync CLI Configuration Management
 *
 * Loads configuration from .authority-syncrc (YAML) with environment variable
 * overrides and defaults, then validates the merged result.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (AUTHORITY_SYNC_*, KB_ACCESS_TOKEN)
 * 3. Config file (.authority-syncrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';
import { DEFAULT_USER_AGENT } from '../../core/http-client.js';
import { KNOWLEDGE_BASE_DOMAIN } from '../../core/constants.js';
import { createLogger, setLogLevel } from '../../core/utils/logger.js';

const log = createLogger({ module: 'config' });

// ============================================================================
// Configuration Schema
// ============================================================================

const HttpUrl = z.string().url().refine((value) => /^https?:\/\//.test(value), {
  message: 'must be an http(s) URL',
});

const SyncConfigSchema = z.object({
  version: z.literal(1),

  feed: z.object({
    baseUrl: HttpUrl,
    maxPages: z.number().int().min(1).max(1000),
    forceHttps: z.boolean(),
  }),

  knowledgeBase: z.object({
    entityDataBaseUrl: HttpUrl,
    apiUrl: HttpUrl,
    domain: z.string().min(1),
    accessToken: z.string().min(1).optional(),
  }),

  http: z.object({
    userAgent: z.string().min(1),
    timeoutMs: z.number().int().positive(),
    retries: z.number().int().min(0).max(10),
  }),

  paths: z.object({
    ledger: z.string().min(1),
    reports: z.string().min(1),
  }),

  lock: z.object({
    staleAfterHours: z.number().positive(),
  }),

  review: z.object({
    annotate: z.boolean(),
    labelLanguage: z.string().min(1),
  }),

  dryRun: z.boolean(),
  verbose: z.boolean(),
  json: z.boolean(),
  configPath: z.string().nullable(),
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;

/**
 * Config file structure (YAML or JSON); every key optional
 */
const ConfigFileSchema = z
  .object({
    version: z.number().optional(),
    feed: z
      .object({
        base_url: z.string().optional(),
        max_pages: z.number().optional(),
        force_https: z.boolean().optional(),
      })
      .optional(),
    knowledge_base: z
      .object({
        entity_data_url: z.string().optional(),
        api_url: z.string().optional(),
        domain: z.string().optional(),
      })
      .optional(),
    http: z
      .object({
        user_agent: z.string().optional(),
        timeout: z.number().optional(),
        retries: z.number().optional(),
      })
      .optional(),
    paths: z
      .object({
        ledger: z.string().optional(),
        reports: z.string().optional(),
      })
      .optional(),
    lock: z
      .object({
        stale_after_hours: z.number().optional(),
      })
      .optional(),
    review: z
      .object({
        annotate: z.boolean().optional(),
        label_language: z.string().optional(),
      })
      .optional(),
    dry_run: z.boolean().optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG = {
  version: 1,
  feed: {
    baseUrl: 'https://id.loc.gov/authorities/names/activitystreams/feed',
    maxPages: 50,
    forceHttps: true,
  },
  knowledgeBase: {
    entityDataBaseUrl: 'https://www.wikidata.org/wiki/Special:EntityData',
    apiUrl: 'https://www.wikidata.org/w/api.php',
    domain: KNOWLEDGE_BASE_DOMAIN,
  },
  http: {
    userAgent: DEFAULT_USER_AGENT,
    timeoutMs: 30000,
    retries: 3,
  },
  paths: {
    ledger: './data/ledger.sqlite3',
    reports: './data/reports',
  },
  lock: {
    staleAfterHours: 6,
  },
  review: {
    annotate: true,
    labelLanguage: 'en',
  },
} as const;

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.authority-syncrc',
  '.authority-syncrc.yaml',
  '.authority-syncrc.yml',
  '.authority-syncrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 *
 * @throws {ConfigError} If the file is not valid YAML/JSON or has unknown keys
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${filePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

type Env = Readonly<Record<string, string | undefined>>;

function envVar(env: Env, name: string): string | undefined {
  const value = env[`AUTHORITY_SYNC_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function envBool(env: Env, name: string): boolean | undefined {
  const value = envVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Numeric environment variable; a non-numeric value is passed through as NaN
 * so validation rejects it instead of silently using the default
 */
function envNumber(env: Env, name: string): number | undefined {
  const value = envVar(env, name);
  if (value === undefined) return undefined;
  return Number(value);
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory the config file search starts from (default: cwd) */
  readonly cwd?: string;
  /** Environment (default: process.env) */
  readonly env?: Env;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly dryRun?: boolean;
    readonly maxPages?: number;
    readonly ledgerPath?: string;
    readonly reportDir?: string;
    readonly timeout?: number;
    readonly annotate?: boolean;
  };
}

/**
 * Load, merge and validate configuration from all sources
 *
 * Relative paths are resolved against the config file's directory, or the
 * working directory when there is no config file.
 *
 * @throws {ConfigError} If a source is unreadable or the merged result is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): SyncConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let file: ConfigFile = {};

  const explicitPath = options.configPath ?? envVar(env, 'CONFIG');
  if (explicitPath !== undefined) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    file = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath !== null) {
      file = parseConfigFile(configPath);
    }
  }

  const baseDir = configPath !== null ? dirname(configPath) : cwd;
  const accessToken = env['KB_ACCESS_TOKEN'];

  const merged = {
    version: file.version ?? DEFAULT_CONFIG.version,

    feed: {
      baseUrl: envVar(env, 'FEED_URL') ?? file.feed?.base_url ?? DEFAULT_CONFIG.feed.baseUrl,
      maxPages:
        overrides.maxPages ??
        envNumber(env, 'MAX_PAGES') ??
        file.feed?.max_pages ??
        DEFAULT_CONFIG.feed.maxPages,
      forceHttps:
        envBool(env, 'FORCE_HTTPS') ?? file.feed?.force_https ?? DEFAULT_CONFIG.feed.forceHttps,
    },

    knowledgeBase: {
      entityDataBaseUrl:
        envVar(env, 'ENTITY_DATA_URL') ??
        file.knowledge_base?.entity_data_url ??
        DEFAULT_CONFIG.knowledgeBase.entityDataBaseUrl,
      apiUrl:
        envVar(env, 'API_URL') ?? file.knowledge_base?.api_url ?? DEFAULT_CONFIG.knowledgeBase.apiUrl,
      domain:
        envVar(env, 'KB_DOMAIN') ?? file.knowledge_base?.domain ?? DEFAULT_CONFIG.knowledgeBase.domain,
      ...(accessToken !== undefined && accessToken !== '' ? { accessToken } : {}),
    },

    http: {
      userAgent:
        envVar(env, 'USER_AGENT') ?? file.http?.user_agent ?? DEFAULT_CONFIG.http.userAgent,
      timeoutMs:
        overrides.timeout ??
        envNumber(env, 'TIMEOUT') ??
        file.http?.timeout ??
        DEFAULT_CONFIG.http.timeoutMs,
      retries: envNumber(env, 'RETRIES') ?? file.http?.retries ?? DEFAULT_CONFIG.http.retries,
    },

    paths: {
      ledger: resolve(
        baseDir,
        overrides.ledgerPath ?? envVar(env, 'LEDGER_PATH') ?? file.paths?.ledger ?? DEFAULT_CONFIG.paths.ledger
      ),
      reports: resolve(
        baseDir,
        overrides.reportDir ?? envVar(env, 'REPORT_DIR') ?? file.paths?.reports ?? DEFAULT_CONFIG.paths.reports
      ),
    },

    lock: {
      staleAfterHours:
        envNumber(env, 'LOCK_STALE_HOURS') ??
        file.lock?.stale_after_hours ??
        DEFAULT_CONFIG.lock.staleAfterHours,
    },

    review: {
      annotate:
        overrides.annotate ??
        envBool(env, 'ANNOTATE') ??
        file.review?.annotate ??
        DEFAULT_CONFIG.review.annotate,
      labelLanguage:
        envVar(env, 'LABEL_LANGUAGE') ??
        file.review?.label_language ??
        DEFAULT_CONFIG.review.labelLanguage,
    },

    dryRun: overrides.dryRun ?? envBool(env, 'DRY_RUN') ?? file.dry_run ?? false,
    verbose: overrides.verbose ?? envBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? envBool(env, 'JSON') ?? false,
    configPath,
  };

  const parsed = SyncConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Lock staleness window in milliseconds
 */
export function lockStaleAfterMs(config: SyncConfig): number {
  return config.lock.staleAfterHours * 60 * 60 * 1000;
}

/**
 * Apply the logging settings of a loaded configuration
 *
 * `verbose` (flag or AUTHORITY_SYNC_VERBOSE) turns on debug logging for
 * every module; the config file in use is logged at debug level.
 */
export function applyLogSettings(config: SyncConfig): void {
  if (config.verbose) {
    setLogLevel('debug');
  }
  log.debug('Configuration loaded', { configPath: config.configPath ?? '(defaults)' });
}

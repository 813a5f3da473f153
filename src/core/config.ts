/**
 * config.ts: Runtime configuration, built once at process start.
 *
 * Sources, lowest precedence first:
 *   1. schema defaults (and the candidate lists in `locators.json`)
 *   2. the YAML settings file (`config/settings.yaml`, or `--config`, or
 *      the PORTAL_CONFIG env var)
 *   3. environment variables, with `.env` loaded through dotenv
 *
 * The resulting `AppConfig` is passed explicitly into every constructor;
 * nothing reads `process.env` after this module has run.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import dotenv from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, describeError } from './errors';
import { DEFAULT_LOCATORS, locatorSetSchema } from './locators';

export const DEFAULT_CONFIG_PATH = 'config/settings.yaml';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36';

// ─── Schema ────────────────────────────────────────────────

const positiveInt = z.coerce.number().int().positive();

const configSchema = z.object({
  targetSite: z
    .object({
      baseUrl: z.string().url().optional(),
      loginUrl: z.string().url().optional(),
      /** Substrings that mark a URL as a login page. */
      loginUrlPatterns: z.array(z.string().min(1)).min(1).default(['/login']),
    })
    .default({}),

  auth: z
    .object({
      username: z.string().optional(),
      password: z.string().optional(),
      /** Fixed session window, in seconds. */
      sessionTimeout: positiveInt.default(3600),
    })
    .default({}),

  browser: z
    .object({
      headless: z.boolean().default(true),
      userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
      viewportWidth: positiveInt.default(1920),
      viewportHeight: positiveInt.default(1080),
      /** Chromium binary; Puppeteer's own download is disabled for this project. */
      executablePath: z.string().min(1).optional(),
      channel: z.enum(['chrome', 'chrome-beta', 'chrome-canary', 'chrome-dev']).optional(),
      /** Per-keystroke delay when filling fields; 0 sets the value in one go. */
      typingDelayMs: z.coerce.number().int().min(0).default(0),
    })
    .default({}),

  scraping: z
    .object({
      /** Seconds between page-changing actions. */
      requestDelay: z.coerce.number().min(0).default(1),
      /** Seconds allowed for a navigation or a settle wait. */
      requestTimeout: z.coerce.number().positive().default(30),
      /** Browser launch attempts. */
      maxRetries: positiveInt.default(3),
    })
    .default({}),

  timeouts: z
    .object({
      candidateMs: positiveInt.default(2000),
      markerMs: positiveInt.default(2000),
      searchSurfaceMs: positiveInt.default(5000),
      searchInputMs: positiveInt.default(3000),
      resultMs: positiveInt.default(3000),
    })
    .default({}),

  session: z
    .object({
      dir: z.string().min(1).default('session'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),

  locators: locatorSetSchema
    .partial()
    .default({})
    .transform((overrides) => ({ ...DEFAULT_LOCATORS, ...overrides })),
});

export type AppConfig = z.infer<typeof configSchema>;

// ─── Environment overrides ─────────────────────────────────

const ENV_MAPPINGS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['SCRAPING_USERNAME', ['auth', 'username']],
  ['SCRAPING_PASSWORD', ['auth', 'password']],
  ['SESSION_TIMEOUT', ['auth', 'sessionTimeout']],
  ['TARGET_SITE_BASE_URL', ['targetSite', 'baseUrl']],
  ['TARGET_SITE_LOGIN_URL', ['targetSite', 'loginUrl']],
  ['LOG_LEVEL', ['logging', 'level']],
  ['BROWSER_HEADLESS', ['browser', 'headless']],
  ['BROWSER_EXECUTABLE_PATH', ['browser', 'executablePath']],
  ['SESSION_DIR', ['session', 'dir']],
];

const BOOLEAN_ENV = new Set(['BROWSER_HEADLESS']);
const LOWERCASE_ENV = new Set(['LOG_LEVEL']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
  let current = target;
  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  current[path[path.length - 1]] = value;
}

function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  for (const [name, path] of ENV_MAPPINGS) {
    const value = env[name];
    if (value === undefined || value === '') continue;

    if (BOOLEAN_ENV.has(name)) {
      setPath(raw, path, value.toLowerCase() === 'true');
    } else if (LOWERCASE_ENV.has(name)) {
      setPath(raw, path, value.toLowerCase());
    } else {
      setPath(raw, path, value);
    }
  }
}

// ─── Loading ───────────────────────────────────────────────

export interface LoadConfigOptions {
  /** Settings file.  An explicit path that does not exist is an error. */
  configPath?: string;
  /**
   * Environment to read overrides from.  When omitted, `.env` is loaded
   * into `process.env` first and `process.env` is used.
   */
  env?: NodeJS.ProcessEnv;
}

function readSettingsFile(path: string, required: boolean): Record<string, unknown> {
  const absolute = resolve(path);
  if (!existsSync(absolute)) {
    if (required) {
      throw new ConfigError(`Settings file not found: ${absolute}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(absolute, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Could not parse ${absolute}`, [describeError(err)]);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Settings file ${absolute} must contain a mapping at the top level`);
  }
  return parsed;
}

/** Build the configuration.  Throws ConfigError on any invalid value. */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  let env = options.env;
  if (!env) {
    dotenv.config();
    env = process.env;
  }

  const explicitPath = options.configPath ?? env.PORTAL_CONFIG;
  const raw = readSettingsFile(explicitPath ?? DEFAULT_CONFIG_PATH, explicitPath !== undefined);
  return buildConfig(raw, env);
}

/** Validate already-parsed settings, with `env` applied on top.  `raw` is left as it was. */
export function buildConfig(raw: Record<string, unknown>, env: NodeJS.ProcessEnv = {}): AppConfig {
  const settings = structuredClone(raw);
  applyEnvOverrides(settings, env);

  const result = configSchema.safeParse(settings);
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

// ─── Helpers ───────────────────────────────────────────────

export interface TargetSite {
  baseUrl: string;
  loginUrl: string;
  loginUrlPatterns: string[];
}

/**
 * The browser-facing commands need a target.  `loginUrl` falls back to
 * `<baseUrl>/login`.
 */
export function requireTargetSite(config: AppConfig): TargetSite {
  const { baseUrl, loginUrl, loginUrlPatterns } = config.targetSite;
  if (!baseUrl) {
    throw new ConfigError('targetSite.baseUrl is not set (TARGET_SITE_BASE_URL)');
  }
  return {
    baseUrl,
    loginUrl: loginUrl ?? new URL('/login', baseUrl).toString(),
    loginUrlPatterns,
  };
}

/** Copy of the configuration safe to print. */
export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    auth: {
      ...config.auth,
      password: config.auth.password === undefined ? undefined : '********',
    },
  };
}

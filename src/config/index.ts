/**
 * Canonical configuration module for slotpost
 *
 * This module is the single source of truth for environment variable access.
 * Runtime code imports configuration through the typed getters exported here.
 *
 * - Fail fast: invalid configuration throws one error listing every bad field
 * - Centralized validation: all env vars validated with Zod schemas
 * - Typed getters: getTimezone(), getRequiredDropboxConfig(), ...
 *
 * Calling code is responsible for loading .env files (via env/index.ts)
 * BEFORE the first getter call so test overrides are honoured.
 */

import { z } from 'zod';

// ============================================================================
// Configuration Schema
// ============================================================================

/**
 * Boolean coercion: "false", "0" and "" read as false
 */
const booleanSchema = z.union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === 'boolean') return val;
    if (typeof val === 'number') return val !== 0;
    const s = String(val).toLowerCase().trim();
    return s !== 'false' && s !== '0' && s !== '';
  });

/**
 * Treat `VAR=` lines in .env the same as an unset variable
 */
const blankAsUndefined = (val: unknown) => (typeof val === 'string' && val.trim() === '' ? undefined : val);

function isValidTimezone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Scheduling configuration schema
 * Where the ledgers live and how the weekly template is interpreted
 */
const schedulingSchema = z.object({
  // SLOTPOST_DATA_DIR: Directory holding schedule.json, processed.json and pid files
  SLOTPOST_DATA_DIR: z.preprocess(blankAsUndefined, z.string().optional()),

  // TIMEZONE: IANA zone for the weekly template and every stored time
  TIMEZONE: z.preprocess(blankAsUndefined, z.string()
    .default('America/New_York')
    .refine(isValidTimezone, 'TIMEZONE must be a valid IANA time zone (e.g. Europe/Berlin)')),

  // WEEKLY_SCHEDULE: "day:HH:MM[:SS]" comma list, day 0 = Monday
  WEEKLY_SCHEDULE: z.preprocess(blankAsUndefined, z.string().optional()),

  // FAST_MODE: Collapse the week to one slot a few minutes ahead and publish pending entries immediately
  FAST_MODE: z.preprocess(blankAsUndefined, booleanSchema.optional()),
});

/**
 * Daemon configuration schema
 */
const daemonSchema = z.object({
  // WATCH_DIR: Default directory for the watcher role
  WATCH_DIR: z.preprocess(blankAsUndefined, z.string().optional()),

  // ARCHIVE_DIR: Default destination for the mover role
  ARCHIVE_DIR: z.preprocess(blankAsUndefined, z.string().optional()),

  // SCHEDULER_COOLDOWN_MS: Sleep after an uncaught error inside a tick
  SCHEDULER_COOLDOWN_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().nonnegative().default(30000)),

  // MOVER_POLL_MS: How often the mover re-reads processed.json
  MOVER_POLL_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(5000)),

  // SCHEDULER_STOP_FILE: The scheduler exits between ticks once this file exists
  SCHEDULER_STOP_FILE: z.preprocess(blankAsUndefined, z.string().optional()),

  // SCHEDULER_MAX_CYCLES: Exit after this many ticks (smoke runs)
  SCHEDULER_MAX_CYCLES: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional()),
});

/**
 * Storage provider configuration schema (Dropbox)
 */
const dropboxSchema = z.object({
  DROPBOX_APP_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  DROPBOX_APP_SECRET: z.preprocess(blankAsUndefined, z.string().optional()),
  DROPBOX_REFRESH_TOKEN: z.preprocess(blankAsUndefined, z.string().optional()),

  // DROPBOX_FOLDER_PATH: Remote folder uploads are written to
  DROPBOX_FOLDER_PATH: z.preprocess(blankAsUndefined, z.string().default('/slotpost')),
});

/**
 * Social provider configuration schema (Instagram Graph API)
 */
const instagramSchema = z.object({
  FACEBOOK_ACCESS_TOKEN: z.preprocess(blankAsUndefined, z.string().optional()),
  INSTAGRAM_BUSINESS_ACCOUNT_ID: z.preprocess(blankAsUndefined, z.string().regex(/^\d+$/, 'INSTAGRAM_BUSINESS_ACCOUNT_ID must be numeric').optional()),
  GRAPH_API_VERSION: z.preprocess(blankAsUndefined, z.string().regex(/^v\d+\.\d+$/, 'GRAPH_API_VERSION must look like v20.0').default('v20.0')),
});

const configSchema = z.object({
  ...schedulingSchema.shape,
  ...daemonSchema.shape,
  ...dropboxSchema.shape,
  ...instagramSchema.shape,
});

type ConfigType = z.infer<typeof configSchema>;

// ============================================================================
// Internal Configuration Loading
// ============================================================================

let _config: ConfigType | null = null;

function loadConfig(): ConfigType {
  const env = {
    ...process.env,
    // Legacy alias from the first deployments
    FAST_MODE: process.env.FAST_MODE ?? process.env.TEST_MODE,
  };

  const result = configSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const field = issue.path.join('.');
      return `  - ${field}: ${issue.message}`;
    }).join('\n');

    throw new ConfigError(
      `Configuration validation failed:\n${issues}\n\n` +
      `See .env.template for the supported environment variables.`
    );
  }
  return result.data;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Get validated configuration (loads and caches on first call)
 * In test mode (VITEST=true), always re-read to pick up dynamic env var changes
 */
function getConfig(): ConfigType {
  const isTestMode = process.env.VITEST === 'true';
  if (!_config || isTestMode) {
    _config = loadConfig();
  }
  return _config;
}

// ============================================================================
// Public API: Scheduling
// ============================================================================

export function getDataDir(): string {
  return getConfig().SLOTPOST_DATA_DIR || process.cwd();
}

export function getTimezone(): string {
  return getConfig().TIMEZONE;
}

export function getWeeklyTemplateSpec(): string | undefined {
  return getConfig().WEEKLY_SCHEDULE;
}

export function getFastMode(): boolean {
  return getConfig().FAST_MODE ?? false;
}

// ============================================================================
// Public API: Daemons
// ============================================================================

export function getOptionalWatchDir(): string | undefined {
  return getConfig().WATCH_DIR;
}

export function getOptionalArchiveDir(): string | undefined {
  return getConfig().ARCHIVE_DIR;
}

export function getSchedulerCooldownMs(): number {
  return getConfig().SCHEDULER_COOLDOWN_MS;
}

export function getMoverPollMs(): number {
  return getConfig().MOVER_POLL_MS;
}

export function getOptionalSchedulerStopFile(): string | undefined {
  const raw = getConfig().SCHEDULER_STOP_FILE;
  return raw && raw.trim().length > 0 ? raw.trim() : undefined;
}

export function getOptionalSchedulerMaxCycles(): number | undefined {
  return getConfig().SCHEDULER_MAX_CYCLES;
}

// ============================================================================
// Public API: Providers
// ============================================================================

export interface DropboxConfig {
  appKey: string;
  appSecret: string;
  refreshToken: string;
  folderPath: string;
}

export function getRequiredDropboxConfig(): DropboxConfig {
  const config = getConfig();
  const missing = [
    ['DROPBOX_APP_KEY', config.DROPBOX_APP_KEY],
    ['DROPBOX_APP_SECRET', config.DROPBOX_APP_SECRET],
    ['DROPBOX_REFRESH_TOKEN', config.DROPBOX_REFRESH_TOKEN],
  ].filter(([, value]) => !value).map(([name]) => name);

  if (!config.DROPBOX_APP_KEY || !config.DROPBOX_APP_SECRET || !config.DROPBOX_REFRESH_TOKEN) {
    throw new ConfigError(`Dropbox credentials are required but not configured: ${missing.join(', ')}`);
  }

  return {
    appKey: config.DROPBOX_APP_KEY,
    appSecret: config.DROPBOX_APP_SECRET,
    refreshToken: config.DROPBOX_REFRESH_TOKEN,
    folderPath: config.DROPBOX_FOLDER_PATH,
  };
}

export interface InstagramConfig {
  accessToken: string;
  businessAccountId: string;
  graphApiVersion: string;
}

export function getRequiredInstagramConfig(): InstagramConfig {
  const config = getConfig();
  if (!config.FACEBOOK_ACCESS_TOKEN) {
    throw new ConfigError('FACEBOOK_ACCESS_TOKEN is required but not configured');
  }
  if (!config.INSTAGRAM_BUSINESS_ACCOUNT_ID) {
    throw new ConfigError('INSTAGRAM_BUSINESS_ACCOUNT_ID is required but not configured');
  }
  return {
    accessToken: config.FACEBOOK_ACCESS_TOKEN,
    businessAccountId: config.INSTAGRAM_BUSINESS_ACCOUNT_ID,
    graphApiVersion: config.GRAPH_API_VERSION,
  };
}

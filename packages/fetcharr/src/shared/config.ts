/**
 * Configuration loader for fetcharr
 * Loads from YAML config file with environment variable expansion,
 * merges an optional secrets file over it and validates the result.
 */

import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'yaml';
import { z } from 'zod';

import { DEFAULT_TIERS, validateTiers } from '../cascade/tiers.js';
import { ConfigError } from './errors.js';

const tierSchema = z.object({
  name: z.string().min(1),
  patterns: z.array(z.string()),
  fallback: z.boolean().optional(),
});

const selectorsSchema = z.object({
  queryInput: z.string().default('#query'),
  resultBox: z.string().default('div.border-black'),
  resultTitle: z.string().default('h2'),
  resultLabel: z.string().default('span'),
  cachedMarker: z.string().default('button[class*="bg-red-900/30"]'),
  cachedMarkerText: z.string().default('RD (100%)'),
  actionControls: z
    .object({
      'whole-season': z.array(z.string()).default(['button[class*="bg-green-900/30"]']),
      'single-unit': z.array(z.string()).default(['button[class*="bg-green-900/30"]']),
    })
    .default({}),
  actionControlText: z.string().default('DL with RD'),
  packagingFilterText: z.string().default('With extras'),
  showMoreText: z.string().default('Show More Results'),
  showMoreLimit: z.number().int().min(0).default(3),
  libraryHeading: z.string().default('h1.text-xl.font-bold'),
  settingsMovieMaxSize: z.string().default('#dmm-movie-max-size'),
  settingsEpisodeMaxSize: z.string().default('#dmm-episode-max-size'),
  settingsTorrentFilter: z.string().default('#dmm-default-torrents-filter'),
});

/** Catalog preferences written on its settings page when the session opens. */
const optionalSetting = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined || v === '' ? undefined : String(v)));

const catalogSettingsSchema = z.object({
  /** Option value of the max movie size select, in GB (e.g. 15). */
  maxMovieSize: optionalSetting,
  maxEpisodeSize: optionalSetting,
  /** Default torrent filter regex. */
  torrentFilter: optionalSetting,
});

export const configSchema = z.object({
  overseerr: z.object({
    url: z.string().url(),
    apiKey: z.string().min(1, 'overseerr.apiKey is required (or set OVERSEERR_API_KEY)'),
    markAvailable: z.boolean().default(false),
  }),
  trakt: z.object({
    clientId: z.string().min(1, 'trakt.clientId is required (or set TRAKT_CLIENT_ID)'),
    baseUrl: z.string().url().default('https://api.trakt.tv'),
  }),
  catalog: z
    .object({
      baseUrl: z.string().url().default('https://debridmediamanager.com'),
      settings: catalogSettingsSchema.default({}),
    })
    .default({}),
  browser: z
    .object({
      executablePath: z.string().default(''),
      headless: z.boolean().default(true),
      /** localStorage entries seeded on the catalog origin before the first search. */
      storage: z.record(z.string()).default({}),
      navigationTimeoutMs: z.number().int().positive().default(30_000),
      selectors: selectorsSchema.default({}),
    })
    .default({}),
  schedule: z
    .object({
      intervalSeconds: z.number().int().min(60, 'schedule.intervalSeconds must be at least 60').default(180),
      runOnStart: z.boolean().default(true),
    })
    .default({}),
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().positive().default(8787),
    })
    .default({}),
  discrepancies: z
    .object({
      backend: z.enum(['json', 'sqlite']).default('json'),
      path: z.string().default('data/discrepancies.json'),
    })
    .default({}),
  matching: z
    .object({
      titleThreshold: z.number().min(0).max(100).default(75),
      indicatorThreshold: z.number().min(0).max(100).default(65),
      yearTolerance: z.number().int().min(0).default(1),
    })
    .default({}),
  cascade: z
    .object({
      settleMs: z.number().int().min(0).default(1_000),
      indicatorTimeoutMs: z.number().int().min(0).default(3_000),
      actionTimeoutMs: z.number().int().min(0).default(2_000),
      instantFetchSettleMs: z.number().int().min(0).default(2_000),
      extrasActionTimeoutMs: z.number().int().min(0).default(5_000),
      extrasFallback: z.boolean().default(true),
      checkNextEpisode: z.boolean().default(true),
      tiers: z
        .object({
          movie: z.array(tierSchema).default(DEFAULT_TIERS.movie),
          season: z.array(tierSchema).default(DEFAULT_TIERS.season),
          episode: z.array(tierSchema).default(DEFAULT_TIERS.episode),
        })
        .default({}),
    })
    .default({}),
  logs: z
    .object({
      dir: z.string().default('data/logs'),
      level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    })
    .default({}),
});

export type FetcharrConfig = z.infer<typeof configSchema>;
export type SelectorConfig = FetcharrConfig['browser']['selectors'];
export type CatalogSettings = FetcharrConfig['catalog']['settings'];

/**
 * Expand environment variables in a string
 * Supports ${VAR} syntax
 */
function expandEnv(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => process.env[name] ?? '');
}

/**
 * Recursively expand environment variables in an object
 */
function deepExpand(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(deepExpand);
  if (isRecord(obj)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v);
    }
    return out;
  }
  return expandEnv(obj);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects (secrets override config)
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined && sourceValue !== null && sourceValue !== '') {
      result[key] = sourceValue;
    }
  }
  return result;
}

function firstExisting(candidates: Array<string | undefined>): string | null {
  for (const candidate of candidates) {
    if (candidate && fs.existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Find config file from multiple candidate locations
 */
function findConfigFile(baseDir: string): string | null {
  return firstExisting([
    process.env.FETCHARR_CONFIG,
    path.join(baseDir, 'config/config.yaml'),
    path.join(process.cwd(), 'fetcharr.yaml'),
    path.join(process.cwd(), 'config/fetcharr.yaml'),
  ]);
}

function findSecretsFile(baseDir: string): string | null {
  return firstExisting([
    process.env.FETCHARR_SECRETS,
    path.join(baseDir, 'config/secrets.yaml'),
    path.join(process.cwd(), 'secrets.yaml'),
  ]);
}

function readYaml(filePath: string): Record<string, unknown> {
  const parsed: unknown = parse(fs.readFileSync(filePath, 'utf8'));
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new ConfigError(`${filePath} must contain a YAML mapping`);
  return parsed;
}

/** Environment fallbacks for the two credentials, applied when the file leaves them empty. */
function envDefaults(): Record<string, unknown> {
  return {
    overseerr: { url: process.env.OVERSEERR_URL, apiKey: process.env.OVERSEERR_API_KEY },
    trakt: { clientId: process.env.TRAKT_CLIENT_ID },
  };
}

/** Validate an already-parsed config document. Relative paths resolve against baseDir. */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): FetcharrConfig {
  const expanded = deepExpand(raw ?? {});
  const merged = deepMerge(envDefaults(), isRecord(expanded) ? expanded : {});
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }
  const config = result.data;
  for (const kind of ['movie', 'season', 'episode'] as const) {
    validateTiers(kind, config.cascade.tiers[kind]);
  }
  config.discrepancies.path = path.resolve(baseDir, config.discrepancies.path);
  config.logs.dir = path.resolve(baseDir, config.logs.dir);
  return config;
}

/**
 * Load configuration from file
 */
export function loadConfig(baseDir: string, configPath?: string): FetcharrConfig {
  const file = configPath ?? findConfigFile(baseDir);
  if (!file) {
    throw new ConfigError(
      `No config file found. Copy ${path.join(baseDir, 'config/config.example.yaml')} to config/config.yaml or set FETCHARR_CONFIG.`,
    );
  }
  if (!fs.existsSync(file)) throw new ConfigError(`Config file not found: ${file}`);

  let raw = readYaml(file);
  const secrets = findSecretsFile(baseDir);
  if (secrets) raw = deepMerge(raw, readYaml(secrets));
  return parseConfig(raw, baseDir);
}

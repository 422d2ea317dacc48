/**
 * Application Configuration
 *
 * Reads environment variables into an explicit AppConfig that entry scripts
 * build once and pass down. Nothing here reads process.env at import time.
 *
 * Environment variables:
 * - RD_STATION_TOKEN: Required RD Station CRM API token
 * - RD_STATION_BASE_URL: API base URL (defaults to production CRM v1)
 * - RD_STATION_TIMEOUT_MS: Per-request timeout (default 30000)
 * - EXPORT_OUTPUT_DIR: Directory for exported deal pages (default ./exports)
 * - EXPORT_START_DATE: First day to export, YYYY-MM-DD (required by the export)
 * - EXPORT_END_DATE: Last day to export, YYYY-MM-DD (default today, UTC)
 * - EXPORT_PER_PAGE: Deals per page, 1-200 (default 200)
 */

import { ConfigurationError } from './rdstation/errors.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './rdstation/client.js';
import { DaySchema, MAX_PER_PAGE, today } from './rdstation/deals.js';

export type Env = Record<string, string | undefined>;

export interface RdStationConfig {
  token: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface ExportConfig {
  outputDir: string;
  startDate: string;
  endDate: string;
  perPage: number;
}

export interface AppConfig {
  rdStation: RdStationConfig;
  export: ExportConfig;
}

function requiredEnv(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new ConfigurationError(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

function optionalEnv(env: Env, key: string, fallback = ''): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function intEnv(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = optionalEnv(env, key, String(fallback));
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${key} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function dayEnv(env: Env, key: string, value: string): string {
  const result = DaySchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`${key} must be a date in YYYY-MM-DD format, got "${value}"`);
  }
  return result.data;
}

/** Settings every script needs to talk to RD Station. */
export function loadRdStationConfig(env: Env = process.env): RdStationConfig {
  return {
    token: requiredEnv(env, 'RD_STATION_TOKEN'),
    baseUrl: optionalEnv(env, 'RD_STATION_BASE_URL', DEFAULT_BASE_URL),
    timeoutMs: intEnv(env, 'RD_STATION_TIMEOUT_MS', DEFAULT_TIMEOUT_MS, 1, Number.MAX_SAFE_INTEGER),
  };
}

/**
 * Full configuration for the deal export.
 * Throws ConfigurationError listing the first missing or invalid variable.
 */
export function loadConfig(env: Env = process.env, now: Date = new Date()): AppConfig {
  const rdStation = loadRdStationConfig(env);

  const startDate = dayEnv(env, 'EXPORT_START_DATE', requiredEnv(env, 'EXPORT_START_DATE'));
  const endDate = dayEnv(env, 'EXPORT_END_DATE', optionalEnv(env, 'EXPORT_END_DATE', today(now)));
  if (startDate > endDate) {
    throw new ConfigurationError(`EXPORT_START_DATE (${startDate}) is after EXPORT_END_DATE (${endDate})`);
  }

  return {
    rdStation,
    export: {
      outputDir: optionalEnv(env, 'EXPORT_OUTPUT_DIR', './exports'),
      startDate,
      endDate,
      perPage: intEnv(env, 'EXPORT_PER_PAGE', MAX_PER_PAGE, 1, MAX_PER_PAGE),
    },
  };
}

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { ConfigError } from '../utils/errors.js';

export const DEFAULT_BASE_URL = 'https://ffiec.cfpb.gov/v2/data-browser-api';

// First and latest year published through the Data Browser
export const DEFAULT_MIN_YEAR = 2018;
export const DEFAULT_MAX_YEAR = 2024;

export interface HmdaClientConfig {
  baseUrl: string;
  minYear: number;
  maxYear: number;
  /** 0 leaves the request to the runtime's own limits */
  timeoutMs: number;
  verbose: boolean;
}

function integerFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(name, `Environment variable ${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function requireInteger(setting: string, value: number, min = Number.MIN_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(setting, `${setting} must be an integer >= ${min}, got ${value}`);
  }
}

export function resolveConfig(overrides: Partial<HmdaClientConfig> = {}): HmdaClientConfig {
  const config: HmdaClientConfig = {
    baseUrl: overrides.baseUrl ?? (process.env.HMDA_API_URL || DEFAULT_BASE_URL),
    minYear: overrides.minYear ?? integerFromEnv('HMDA_MIN_YEAR', DEFAULT_MIN_YEAR),
    maxYear: overrides.maxYear ?? integerFromEnv('HMDA_MAX_YEAR', DEFAULT_MAX_YEAR),
    timeoutMs: overrides.timeoutMs ?? integerFromEnv('HMDA_TIMEOUT_MS', 0),
    verbose: overrides.verbose ?? process.env.HMDA_VERBOSE === 'true'
  };

  requireInteger('minYear', config.minYear);
  requireInteger('maxYear', config.maxYear);
  requireInteger('timeoutMs', config.timeoutMs, 0);
  if (config.minYear > config.maxYear) {
    throw new ConfigError('minYear', `minYear (${config.minYear}) must be <= maxYear (${config.maxYear})`);
  }

  return { ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') };
}

function loadStateCodes(): ReadonlySet<string> {
  const file = new URL('../data/states.json', import.meta.url);
  const codes: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  if (!Array.isArray(codes) || !codes.every((code): code is string => typeof code === 'string')) {
    throw new Error(`${file.pathname} must contain an array of state codes`);
  }
  return new Set(codes.map((code) => code.toUpperCase()));
}

/** Two-letter postal codes the Data Browser recognizes (states, DC and territories) */
export const STATE_CODES: ReadonlySet<string> = loadStateCodes();

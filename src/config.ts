/**
 * Node configuration
 *
 * Sources, lowest precedence first:
 *   1. built-in defaults
 *   2. <dataDir>/config.json
 *   3. BOOKGOSSIP_* environment variables
 *   4. explicit overrides (CLI flags)
 *
 * The data directory itself comes from overrides, then BOOKGOSSIP_DATA_DIR,
 * then ~/.bookgossip, since it has to be known before config.json is read.
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { ConfigError } from './errors.js';

export type NodeSettings = {
  dataDir: string;
  /** Gossip listen port; 0 picks a free one */
  port: number;
  host: string;
  /** Address announced to other peers */
  advertise?: string;
  bootstrap: string[];
  /** HTTP API port; no API server when unset */
  webPort?: number;
  requireSignatures: boolean;
  announceIntervalMs: number;
  antiEntropyIntervalMs: number;
  silenceCheckIntervalMs: number;
  silenceTimeoutMs: number;
  persistIntervalMs: number;
  redialIntervalMs: number;
};

/**
 * Explicit overrides, usually raw CLI flag values; validated like every other source
 */
export type SettingsOverrides = { readonly [K in keyof NodeSettings]?: unknown };

export const DEFAULT_SETTINGS = {
  port: 7400,
  host: '0.0.0.0',
  requireSignatures: false,
  announceIntervalMs: 5_000,       // 5 seconds
  antiEntropyIntervalMs: 30_000,   // 30 seconds
  silenceCheckIntervalMs: 5_000,   // 5 seconds
  silenceTimeoutMs: 30_000,        // 30 seconds
  persistIntervalMs: 5_000,        // 5 seconds
  redialIntervalMs: 10_000         // 10 seconds
} as const;

type SettingKey = Exclude<keyof NodeSettings, 'dataDir'>;

const ENV_NAMES: Record<SettingKey, string> = {
  port: 'BOOKGOSSIP_PORT',
  host: 'BOOKGOSSIP_HOST',
  advertise: 'BOOKGOSSIP_ADVERTISE',
  bootstrap: 'BOOKGOSSIP_BOOTSTRAP',
  webPort: 'BOOKGOSSIP_WEB_PORT',
  requireSignatures: 'BOOKGOSSIP_REQUIRE_SIGNATURES',
  announceIntervalMs: 'BOOKGOSSIP_ANNOUNCE_INTERVAL_MS',
  antiEntropyIntervalMs: 'BOOKGOSSIP_ANTI_ENTROPY_INTERVAL_MS',
  silenceCheckIntervalMs: 'BOOKGOSSIP_SILENCE_CHECK_INTERVAL_MS',
  silenceTimeoutMs: 'BOOKGOSSIP_SILENCE_TIMEOUT_MS',
  persistIntervalMs: 'BOOKGOSSIP_PERSIST_INTERVAL_MS',
  redialIntervalMs: 'BOOKGOSSIP_REDIAL_INTERVAL_MS'
};

type Layer = Readonly<Record<string, unknown>>;

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: SettingsOverrides = {}
): NodeSettings {
  const dataDir = parseText(overrides.dataDir, 'dataDir') || env.BOOKGOSSIP_DATA_DIR || join(homedir(), '.bookgossip');

  const envLayer: Record<string, unknown> = {};
  for (const [key, name] of Object.entries(ENV_NAMES)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== '') {
      envLayer[key] = value.trim();
    }
  }

  // Highest precedence first
  const layers: readonly Layer[] = [overrides, envLayer, readConfigFile(join(dataDir, 'config.json'))];
  const pick = (key: SettingKey): unknown => {
    for (const layer of layers) {
      if (layer[key] !== undefined) {
        return layer[key];
      }
    }
    return undefined;
  };

  return {
    dataDir,
    port: parsePort(pick('port'), 'port') ?? DEFAULT_SETTINGS.port,
    host: parseText(pick('host'), 'host') ?? DEFAULT_SETTINGS.host,
    advertise: parseAddress(pick('advertise'), 'advertise'),
    bootstrap: parseAddressList(pick('bootstrap'), 'bootstrap'),
    webPort: parsePort(pick('webPort'), 'webPort'),
    requireSignatures: parseBoolean(pick('requireSignatures'), 'requireSignatures') ?? DEFAULT_SETTINGS.requireSignatures,
    announceIntervalMs: parseDuration(pick('announceIntervalMs'), 'announceIntervalMs') ?? DEFAULT_SETTINGS.announceIntervalMs,
    antiEntropyIntervalMs:
      parseDuration(pick('antiEntropyIntervalMs'), 'antiEntropyIntervalMs') ?? DEFAULT_SETTINGS.antiEntropyIntervalMs,
    silenceCheckIntervalMs:
      parseDuration(pick('silenceCheckIntervalMs'), 'silenceCheckIntervalMs') ?? DEFAULT_SETTINGS.silenceCheckIntervalMs,
    silenceTimeoutMs: parseTimeout(pick('silenceTimeoutMs'), 'silenceTimeoutMs') ?? DEFAULT_SETTINGS.silenceTimeoutMs,
    persistIntervalMs: parseDuration(pick('persistIntervalMs'), 'persistIntervalMs') ?? DEFAULT_SETTINGS.persistIntervalMs,
    redialIntervalMs: parseDuration(pick('redialIntervalMs'), 'redialIntervalMs') ?? DEFAULT_SETTINGS.redialIntervalMs
  };
}

function readConfigFile(path: string): Layer {
  if (!existsSync(path)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot parse ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`${path} must contain a JSON object`);
  }

  const layer: Record<string, unknown> = {};
  for (const key of Object.keys(raw)) {
    if (key === 'dataDir') {
      throw new ConfigError(`dataDir cannot be set from ${path}`, key);
    }
    layer[key] = Reflect.get(raw, key);
  }
  return layer;
}

function parseInteger(value: unknown, key: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = typeof value === 'string' && /^[0-9]+$/.test(value) ? parseInt(value, 10) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`${key} must be a non-negative integer, got ${JSON.stringify(value)}`, key);
  }
  return parsed;
}

function parsePort(value: unknown, key: string): number | undefined {
  const port = parseInteger(value, key);
  if (port !== undefined && port > 65535) {
    throw new ConfigError(`${key} must be at most 65535, got ${port}`, key);
  }
  return port;
}

/** Interval in ms; 0 disables the timer */
function parseDuration(value: unknown, key: string): number | undefined {
  return parseInteger(value, key);
}

function parseTimeout(value: unknown, key: string): number | undefined {
  const timeout = parseInteger(value, key);
  if (timeout === 0) {
    throw new ConfigError(`${key} must be greater than 0`, key);
  }
  return timeout;
}

function parseText(value: unknown, key: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${key} must be a non-empty string`, key);
  }
  return value.trim();
}

function parseBoolean(value: unknown, key: string): boolean | undefined {
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
  }
  throw new ConfigError(`${key} must be true or false, got ${JSON.stringify(value)}`, key);
}

function parseAddress(value: unknown, key: string): string | undefined {
  const address = parseText(value, key);
  if (address !== undefined && !/^wss?:\/\/\S+$/.test(address)) {
    throw new ConfigError(`${key} must be a ws:// or wss:// address, got ${address}`, key);
  }
  return address;
}

/**
 * Accepts an array of addresses or a comma-separated string
 */
function parseAddressList(value: unknown, key: string): string[] {
  if (value === undefined) {
    return [];
  }

  const items: unknown[] = typeof value === 'string' ? value.split(',') : Array.isArray(value) ? value : [value];
  const addresses: string[] = [];
  for (const item of items) {
    if (typeof item === 'string' && item.trim() === '') {
      continue;
    }
    const address = parseAddress(item, key);
    if (address !== undefined && !addresses.includes(address)) {
      addresses.push(address);
    }
  }
  return addresses;
}

import type { AppConfig, EncoderProvider, IndexConfig, LogLevel } from '../types/config.types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] };

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const ENCODER_PROVIDERS: readonly EncoderProvider[] = ['transformers', 'ollama'];
const STORES: ReadonlyArray<IndexConfig['store']> = ['sqlite', 'memory'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge<T extends object>(base: T, override: DeepPartial<T>): T {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue;
    const current = result[key];
    result[key] = isPlainObject(val) && isPlainObject(current) ? deepMerge(current, val) : val;
  }
  return result as T;
}

function pick<T extends string>(value: string | undefined, allowed: readonly T[]): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

function loadFileConfig(cwd: string): DeepPartial<AppConfig> {
  const candidates = [
    join(cwd, '.listing-search.json'),
    join(cwd, 'listing-search.config.json'),
  ];
  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      const raw = readFileSync(candidate, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      if (!isPlainObject(parsed)) {
        throw new Error(`Config file ${candidate} must contain a JSON object`);
      }
      // Shape is checked by validateConfig once all layers are merged
      return parsed as DeepPartial<AppConfig>;
    }
  }
  return {};
}

function loadEnvOverrides(): DeepPartial<AppConfig> {
  const overrides: DeepPartial<AppConfig> = {};

  const socketPath = process.env['LISTING_SEARCH_SOCKET'];
  const host = process.env['LISTING_SEARCH_HOST'];
  const port = process.env['LISTING_SEARCH_PORT'];
  const token = process.env['LISTING_SEARCH_TOKEN'];
  const api: DeepPartial<AppConfig['api']> = {};
  if (host) api.host = host;
  if (port) api.port = parseInt(port, 10);
  if (token) api.token = token;
  overrides.api = api;

  const encoder: DeepPartial<AppConfig['encoder']> = {};
  const provider = pick(process.env['LISTING_SEARCH_ENCODER'], ENCODER_PROVIDERS);
  const model = process.env['LISTING_SEARCH_MODEL'];
  const ollamaBaseUrl = process.env['OLLAMA_BASE_URL'];
  if (provider) encoder.provider = provider;
  if (model) encoder.model = model;
  if (ollamaBaseUrl) encoder.ollamaBaseUrl = ollamaBaseUrl;
  overrides.encoder = encoder;

  const index: DeepPartial<AppConfig['index']> = {};
  const store = pick(process.env['LISTING_SEARCH_STORE'], STORES);
  const persistPath = process.env['LISTING_SEARCH_PERSIST_PATH'];
  if (store) index.store = store;
  if (persistPath) index.persistPath = persistPath;
  overrides.index = index;

  const logLevel = pick(process.env['LISTING_SEARCH_LOG_LEVEL'], LOG_LEVELS);
  if (logLevel) overrides.logLevel = logLevel;

  return overrides;
}

export function loadConfig(cwd: string = process.cwd()): AppConfig {
  let config = deepMerge(DEFAULT_CONFIG, loadFileConfig(cwd));
  config = deepMerge(config, loadEnvOverrides());

  // An empty LISTING_SEARCH_SOCKET switches the server to TCP.
  const socketPath = process.env['LISTING_SEARCH_SOCKET'];
  if (socketPath !== undefined) {
    const { socketPath: _previous, ...api } = config.api;
    config = { ...config, api: socketPath === '' ? api : { ...api, socketPath } };
  }

  return config;
}

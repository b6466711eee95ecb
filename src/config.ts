import type { LevelWithSilent, Logger } from 'pino';
import { InvalidArgumentError } from './errors';
import type { ClientConfig, LocalStorage } from './types';

const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com';

/** Default configuration values */
export const DEFAULT_CONFIG = {
  baseUrl: DEFAULT_BASE_URL,
  apiVersion: 'v1beta',
  timeout: 30_000,
  uploadTimeout: 10 * 60_000,
  logLevel: 'warn',
} as const;

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Client configuration with every default applied
 */
export interface ResolvedConfig {
  apiKey: string;
  baseUrl: string;
  apiVersion: string;
  timeout: number;
  uploadTimeout: number;
  logLevel: LevelWithSilent;
  fetch?: typeof fetch;
  storage?: LocalStorage;
  logger?: Logger;
}

export function resolveConfig(config: ClientConfig): ResolvedConfig {
  const resolved: ResolvedConfig = {
    ...config,
    apiKey: config.apiKey.trim(),
    baseUrl: (config.baseUrl ?? DEFAULT_CONFIG.baseUrl).replace(/\/+$/, ''),
    apiVersion: config.apiVersion ?? DEFAULT_CONFIG.apiVersion,
    timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
    uploadTimeout: config.uploadTimeout ?? DEFAULT_CONFIG.uploadTimeout,
    logLevel: config.logLevel ?? DEFAULT_CONFIG.logLevel,
  };

  if (!resolved.apiKey) {
    throw new InvalidArgumentError('apiKey is required');
  }
  if (!/^https?:\/\//.test(resolved.baseUrl)) {
    throw new InvalidArgumentError('baseUrl must start with http:// or https://');
  }
  if (!resolved.apiVersion) {
    throw new InvalidArgumentError('apiVersion must not be empty');
  }
  assertPositiveInt('timeout', resolved.timeout);
  assertPositiveInt('uploadTimeout', resolved.uploadTimeout);

  return resolved;
}

/**
 * Build a client configuration from an environment map.
 *
 * Nothing is read from `process.env` unless the caller passes it in, so
 * several configurations can live in the same process.
 *
 * Recognized variables: GENAI_API_KEY (required), GENAI_BASE_URL,
 * GENAI_TIMEOUT_MS, GENAI_UPLOAD_TIMEOUT_MS, GENAI_LOG_LEVEL.
 */
export function configFromEnv(env: Record<string, string | undefined>): ClientConfig {
  const apiKey = env.GENAI_API_KEY?.trim();
  if (!apiKey) {
    throw new InvalidArgumentError('Missing required env: GENAI_API_KEY');
  }

  const config: ClientConfig = { apiKey };

  const baseUrl = env.GENAI_BASE_URL?.trim();
  if (baseUrl) config.baseUrl = baseUrl;

  const timeout = parsePositiveIntEnv(env, 'GENAI_TIMEOUT_MS');
  if (timeout !== undefined) config.timeout = timeout;

  const uploadTimeout = parsePositiveIntEnv(env, 'GENAI_UPLOAD_TIMEOUT_MS');
  if (uploadTimeout !== undefined) config.uploadTimeout = uploadTimeout;

  const level = env.GENAI_LOG_LEVEL?.trim();
  if (level) {
    const match = LOG_LEVELS.find((l) => l === level);
    if (!match) {
      throw new InvalidArgumentError(
        `GENAI_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`
      );
    }
    config.logLevel = match;
  }

  return config;
}

function parsePositiveIntEnv(
  env: Record<string, string | undefined>,
  name: string
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`${name} must be an integer >= 1`);
  }
  return n;
}

function assertPositiveInt(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError(`${name} must be an integer >= 1`);
  }
}

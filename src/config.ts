import { ConfigError } from './errors.js';
import type { LogLevel } from './providers/ILogProvider.js';
import { LOG_LEVELS } from './providers/ILogProvider.js';

export interface MonitorConfig {
  supabaseUrl: string;
  supabaseServiceRoleKey: string;
  graphixApiUrl: string;
  slackWebhookUrl: string;
  checkIntervalSeconds: number;
  notificationRetentionDays: number;
  indexerPageSize: number;
  httpTimeoutMs: number;
  storeTimeoutMs: number;
  keyStepTimeoutMs: number;
  logLevel: LogLevel;
  axiom: { apiKey: string; dataset: string } | null;
}

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value || !value.trim()) {
    throw new ConfigError(`${name} is required`, { variable: name });
  }
  return value.trim();
}

function optional(env: Env, name: string): string | null {
  const value = env[name];
  if (!value || !value.trim()) return null;
  return value.trim();
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = optional(env, name);
  if (raw === null) return fallback;
  const parsed = Number(raw);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`, { variable: name });
  }
  return parsed;
}

function url(env: Env, name: string): string {
  const value = required(env, name);
  try {
    new URL(value);
  } catch {
    throw new ConfigError(`${name} must be an absolute URL`, { variable: name });
  }
  return value;
}

function logLevel(env: Env): LogLevel {
  const raw = (optional(env, 'LOG_LEVEL') ?? 'info').toLowerCase();
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) {
    throw new ConfigError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`, {
      variable: 'LOG_LEVEL',
    });
  }
  return level;
}

/** `CHECK_INTERVAL` is the older name of `CHECK_INTERVAL_SECONDS`; the new name wins. */
function intervalVariable(env: Env): string {
  return optional(env, 'CHECK_INTERVAL_SECONDS') === null && optional(env, 'CHECK_INTERVAL') !== null
    ? 'CHECK_INTERVAL'
    : 'CHECK_INTERVAL_SECONDS';
}

export function loadConfig(env: Env = process.env): MonitorConfig {
  const axiomKey = optional(env, 'AXIOM_API_KEY');
  const axiomDataset = optional(env, 'AXIOM_DATASET');

  return {
    supabaseUrl: url(env, 'SUPABASE_URL'),
    supabaseServiceRoleKey: required(env, 'SUPABASE_SERVICE_ROLE_KEY'),
    graphixApiUrl: url(env, 'GRAPHIX_API_URL'),
    slackWebhookUrl: url(env, 'SLACK_WEBHOOK_URL'),
    checkIntervalSeconds: positiveInt(env, intervalVariable(env), 300),
    notificationRetentionDays: positiveInt(env, 'NOTIFICATION_RETENTION_DAYS', 60),
    indexerPageSize: positiveInt(env, 'INDEXER_PAGE_SIZE', 100),
    httpTimeoutMs: positiveInt(env, 'HTTP_TIMEOUT_MS', 10_000),
    storeTimeoutMs: positiveInt(env, 'STORE_TIMEOUT_MS', 10_000),
    keyStepTimeoutMs: positiveInt(env, 'KEY_STEP_TIMEOUT_MS', 30_000),
    logLevel: logLevel(env),
    axiom: axiomKey && axiomDataset ? { apiKey: axiomKey, dataset: axiomDataset } : null,
  };
}

import { registerAs } from '@nestjs/config';
import type { LogLevel as NestLogLevel } from '@nestjs/common';
import { join } from 'path';
import { FeedbackErrorKind } from '../../domain/errors';
import { RetryPolicyProps } from '../../domain/value-objects/RetryPolicy';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'verbose';
export type HostKeyChecking = 'yes' | 'no' | 'accept-new';

export interface SchedulerConfig {
  enabled: boolean;
  workerCount: number;
  queueCapacity: number;
  fetchTimeoutMs: number;
  analysisTimeoutMs: number;
  fetchRetry: RetryPolicyProps;
  storeRetry: RetryPolicyProps;
}

export interface SshConfig {
  keyPath: string | null;
  knownHostsPath: string | null;
  strictHostKeyChecking: HostKeyChecking;
  connectTimeoutSeconds: number;
}

export interface AnalysisConfig {
  catalogPath: string;
  killGraceMs: number;
  maxOutputBytes: number;
}

/**
 * Everything the service reads from its environment, validated once at startup.
 */
export interface FeedbackerConfig {
  environment: string;
  logLevel: LogLevel;
  server: { host: string; port: number };
  databaseUrl: string;
  workspaceRoot: string;
  scheduler: SchedulerConfig;
  ssh: SshConfig;
  analysis: AnalysisConfig;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'verbose'];
const HOST_KEY_CHECKING: readonly HostKeyChecking[] = ['yes', 'no', 'accept-new'];
const FETCH_RETRYABLE: readonly FeedbackErrorKind[] = ['NetworkError'];
const STORE_RETRYABLE: readonly FeedbackErrorKind[] = ['PersistenceError'];

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === '' ? undefined : value;
}

function readInteger(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = read(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!/^-?\d+$/.test(raw) || value < min || value > max) {
    throw new ConfigurationError(`Invalid ${name} value: "${raw}" (expected an integer between ${min} and ${max})`);
  }
  return value;
}

// setTimeout fires after 1ms for anything longer.
const MAX_TIMER_MS = 2_147_483_647;

function readDuration(env: Env, name: string, fallback: number, min: number): number {
  return readInteger(env, name, fallback, min, MAX_TIMER_MS);
}

function readNumber(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = read(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ConfigurationError(`Invalid ${name} value: "${raw}" (expected a number between ${min} and ${max})`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = read(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const normalized = raw.toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }
  throw new ConfigurationError(`Invalid ${name} value: "${raw}" (expected true or false)`);
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = read(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const match = choices.find((choice) => choice === raw.toLowerCase());
  if (!match) {
    throw new ConfigurationError(`Invalid ${name} value: "${raw}" (expected one of ${choices.join(', ')})`);
  }
  return match;
}

/**
 * Parses `host:port`, `:port`, a bare port or `[ipv6]:port`.
 */
export function parseServerAddress(raw: string): { host: string; port: number } {
  const match = /^(?:(?:\[([^\]]+)\]|([^:]*)):)?(\d+)$/.exec(raw.trim());
  const port = match ? Number(match[3]) : NaN;
  if (!match || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid SERVER_ADDRESS value: "${raw}" (expected host:port)`);
  }
  const host = match[1] ?? match[2] ?? '';
  return { host: host === '' ? '0.0.0.0' : host, port };
}

export function loadConfiguration(env: Env = process.env, cwd: string = process.cwd()): FeedbackerConfig {
  const baseDelayMs = readDuration(env, 'RETRY_BASE_DELAY_MS', 1000, 0);
  const maxDelayMs = readDuration(env, 'RETRY_MAX_DELAY_MS', 60000, 0);
  if (maxDelayMs < baseDelayMs) {
    throw new ConfigurationError(
      `Invalid RETRY_MAX_DELAY_MS value: "${maxDelayMs}" (must be >= RETRY_BASE_DELAY_MS ${baseDelayMs})`,
    );
  }
  const storeDelayMs = readDuration(env, 'STORE_RETRY_DELAY_MS', 200, 0);

  return {
    environment: read(env, 'ENVIRONMENT') ?? 'development',
    logLevel: readChoice(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
    server: parseServerAddress(read(env, 'SERVER_ADDRESS') ?? '0.0.0.0:3000'),
    databaseUrl: read(env, 'DATABASE_URL') ?? `sqlite:${join(cwd, 'data', 'feedbacker.db')}`,
    workspaceRoot: read(env, 'WORKSPACE_ROOT') ?? join(cwd, 'tmp', 'workspaces'),
    scheduler: {
      enabled: readBoolean(env, 'SCHEDULER_ENABLED', true),
      workerCount: readInteger(env, 'WORKER_POOL_SIZE', 4, 1, 256),
      queueCapacity: readInteger(env, 'QUEUE_CAPACITY', 100, 0),
      fetchTimeoutMs: readDuration(env, 'FETCH_TIMEOUT_MS', 120000, 1),
      analysisTimeoutMs: readDuration(env, 'ANALYSIS_TIMEOUT_MS', 600000, 1),
      fetchRetry: {
        maxAttempts: readInteger(env, 'FETCH_MAX_ATTEMPTS', 3, 1, 100),
        baseDelayMs,
        maxDelayMs,
        multiplier: readNumber(env, 'RETRY_MULTIPLIER', 2, 1, 10),
        jitterRatio: readNumber(env, 'RETRY_JITTER', 0.2, 0, 1),
        retryableKinds: FETCH_RETRYABLE,
      },
      storeRetry: {
        maxAttempts: readInteger(env, 'STORE_MAX_ATTEMPTS', 3, 1, 20),
        baseDelayMs: storeDelayMs,
        maxDelayMs: Math.max(storeDelayMs, 5000),
        multiplier: 2,
        jitterRatio: 0,
        retryableKinds: STORE_RETRYABLE,
      },
    },
    ssh: {
      keyPath: read(env, 'SSH_KEY_PATH') ?? null,
      knownHostsPath: read(env, 'SSH_KNOWN_HOSTS_PATH') ?? null,
      strictHostKeyChecking: readChoice(env, 'SSH_STRICT_HOST_KEY_CHECKING', HOST_KEY_CHECKING, 'accept-new'),
      connectTimeoutSeconds: readInteger(env, 'SSH_CONNECT_TIMEOUT_SECONDS', 15, 1, 600),
    },
    analysis: {
      catalogPath: read(env, 'ANALYSIS_CATALOG_PATH') ?? join(cwd, 'config', 'analysis-steps.json'),
      killGraceMs: readDuration(env, 'ANALYSIS_KILL_GRACE_MS', 5000, 0),
      maxOutputBytes: readInteger(env, 'ANALYSIS_MAX_OUTPUT_BYTES', 10 * 1024 * 1024, 1024),
    },
  };
}

/**
 * Nest enables levels cumulatively: `info` also shows warnings and errors.
 */
export function toNestLogLevels(level: LogLevel): NestLogLevel[] {
  const ladder: NestLogLevel[][] = [['fatal', 'error'], ['warn'], ['log'], ['debug'], ['verbose']];
  return ladder.slice(0, LOG_LEVELS.indexOf(level) + 1).flat();
}

export const feedbackerConfig = registerAs('feedbacker', (): FeedbackerConfig => loadConfiguration());

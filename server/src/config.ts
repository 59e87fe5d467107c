import { ConfigError } from './service/errors';

export interface ServiceConfig {
  port: number;
  collaboratorBaseUrl: string;
  authToken: string;
  collaboratorTimeoutMs: number;
  simulatedDelayMs: number;
  taskConcurrency: number;
  taskHistoryLimit: number;
  corsOrigins: string[];
}

type Env = Record<string, string | undefined>;

const DEFAULT_COLLABORATOR_BASE_URL = 'http://localhost:8080/api/calculate-cpi';

const readInteger = (
  env: Env,
  name: string,
  fallback: number,
  { min }: { min: number }
): number => {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(
      `${name} must be an integer >= ${min} (received "${raw}")`
    );
  }
  return value;
};

const readUrl = (env: Env, name: string, fallback: string): string => {
  const raw = env[name]?.trim() || fallback;
  try {
    new URL(raw);
  } catch {
    throw new ConfigError(`${name} must be an absolute URL (received "${raw}")`);
  }
  return raw.replace(/\/+$/, '');
};

export const loadConfig = (env: Env = process.env): ServiceConfig => {
  const authToken = env.AUTH_TOKEN?.trim();
  if (!authToken) {
    throw new ConfigError('AUTH_TOKEN is required');
  }

  const corsOrigins = (env.CORS_ORIGIN ?? '*')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    port: readInteger(env, 'PORT', 3001, { min: 0 }),
    collaboratorBaseUrl: readUrl(
      env,
      'COLLABORATOR_BASE_URL',
      DEFAULT_COLLABORATOR_BASE_URL
    ),
    authToken,
    collaboratorTimeoutMs: readInteger(env, 'COLLABORATOR_TIMEOUT_MS', 10_000, {
      min: 1,
    }),
    simulatedDelayMs: readInteger(env, 'SIMULATED_DELAY_MS', 30_000, {
      min: 0,
    }),
    taskConcurrency: readInteger(env, 'TASK_CONCURRENCY', 1, { min: 1 }),
    taskHistoryLimit: readInteger(env, 'TASK_HISTORY_LIMIT', 1000, { min: 1 }),
    corsOrigins: corsOrigins.length ? corsOrigins : ['*'],
  };
};

export const loadConfigFromEnvironment = (): ServiceConfig =>
  loadConfig(process.env);

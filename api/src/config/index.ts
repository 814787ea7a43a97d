import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../types/errors.js';

loadEnv();

export const CONFIG_DIR = join(homedir(), '.prflow');
export const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

// Empty strings from .env count as unset
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  API_HOST: z.string().default('localhost'),
  API_PORT: positiveInt(3001),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  GITHUB_TOKEN: optionalString,
  GITHUB_ORG: optionalString,

  GOVERNOR_LIMIT: positiveInt(15),
  REPOSITORY_CONCURRENCY: positiveInt(4),
  PULL_REQUEST_CONCURRENCY: positiveInt(8),
  SUBRESOURCE_CONCURRENCY: positiveInt(16),
  PR_BATCH_SIZE: positiveInt(50),
  RETRY_MAX_ATTEMPTS: positiveInt(3),
  RETRY_BASE_DELAY_MS: nonNegativeInt(2000),
  RATE_LIMIT_BUFFER_MS: nonNegativeInt(500),
  REQUEST_TIMEOUT_MS: positiveInt(30000),
  SNAPSHOT_DIR: optionalString,
});

// Keys that may be stored in ~/.prflow/config.json
const FileSchema = z
  .object({
    GITHUB_TOKEN: z.string(),
    GITHUB_ORG: z.string(),
    LOG_LEVEL: z.string(),
    SNAPSHOT_DIR: z.string(),
  })
  .partial();

export interface AppConfig {
  environment: 'development' | 'test' | 'production';
  logging: {
    level: z.infer<typeof EnvSchema>['LOG_LEVEL'];
    pretty: boolean;
  };
  server: {
    host: string;
    port: number;
    corsOrigin: string;
  };
  github: {
    token?: string;
    organization?: string;
    requestTimeoutMs: number;
  };
  engine: {
    governorLimit: number;
    repositoryConcurrency: number;
    pullRequestConcurrency: number;
    subResourceConcurrency: number;
    batchSize: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    rateLimitBufferMs: number;
  };
  snapshotDir?: string;
}

/**
 * Reads the optional local config file. Environment variables always win
 * over values stored here.
 */
export function readConfigFile(path: string = CONFIG_FILE): Record<string, string> {
  if (!existsSync(path)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Could not read ${path}`, [errorMessage(error)]);
  }

  const parsed = FileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid config file ${path}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    if (value) values[key] = value;
  }
  return values;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  fileValues: Record<string, string> = readConfigFile()
): AppConfig {
  const merged: Record<string, string | undefined> = { ...fileValues };
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') merged[key] = value;
  }

  const parsed = EnvSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    environment: values.NODE_ENV,
    logging: {
      level: values.LOG_LEVEL,
      pretty: values.NODE_ENV === 'development',
    },
    server: {
      host: values.API_HOST,
      port: values.API_PORT,
      corsOrigin: values.CORS_ORIGIN,
    },
    github: {
      token: values.GITHUB_TOKEN,
      organization: values.GITHUB_ORG,
      requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    },
    engine: {
      governorLimit: values.GOVERNOR_LIMIT,
      repositoryConcurrency: values.REPOSITORY_CONCURRENCY,
      pullRequestConcurrency: values.PULL_REQUEST_CONCURRENCY,
      subResourceConcurrency: values.SUBRESOURCE_CONCURRENCY,
      batchSize: values.PR_BATCH_SIZE,
    },
    retry: {
      maxAttempts: values.RETRY_MAX_ATTEMPTS,
      baseDelayMs: values.RETRY_BASE_DELAY_MS,
      rateLimitBufferMs: values.RATE_LIMIT_BUFFER_MS,
    },
    snapshotDir: values.SNAPSHOT_DIR,
  };
}

export function requireGitHubToken(appConfig: AppConfig): string {
  if (!appConfig.github.token) {
    throw new ConfigurationError('GITHUB_TOKEN is not configured', [
      `set it in the environment or in ${CONFIG_FILE}`,
    ]);
  }
  return appConfig.github.token;
}

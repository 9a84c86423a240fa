import path from 'node:path';
import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import { DEFAULT_API_BASE_URL, DEFAULT_BRANCH, DEFAULT_RAW_BASE_URL } from '@devicefleet/ota-client';

export interface AgentConfig {
  backendUrl: string;
  deviceToken: string;
  firmwareDir: string;
  pollIntervalMs: number;
  retryAttempts: number;
  retryDelayMs: number;
  httpTimeoutMs: number;
  repository: {
    apiBaseUrl: string;
    rawBaseUrl: string;
    branch: string;
  };
  keepFiles?: string[];
  keepDirectories?: string[];
  restartExitCode: number;
  logLevel: LevelWithSilent;
}

export class ConfigError extends Error {
  readonly keys: string[];

  constructor(message: string, keys: string[]) {
    super(message);
    this.name = 'ConfigError';
    this.keys = keys;
  }
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

const nameList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

const envSchema = z.object({
  OTA_BACKEND_URL: z.string().url(),
  OTA_BACKEND_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  OTA_DEVICE_TOKEN: z.string().min(1),
  OTA_FIRMWARE_DIR: z.string().optional(),
  OTA_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  OTA_RETRY_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  OTA_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5_000),
  OTA_HTTP_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),
  OTA_REPOSITORY_API_URL: z.string().url().default(DEFAULT_API_BASE_URL),
  OTA_REPOSITORY_RAW_URL: z.string().url().default(DEFAULT_RAW_BASE_URL),
  OTA_REPOSITORY_BRANCH: z.string().min(1).default(DEFAULT_BRANCH),
  OTA_KEEP_FILES: nameList.optional(),
  OTA_KEEP_DIRECTORIES: nameList.optional(),
  OTA_RESTART_EXIT_CODE: z.coerce.number().int().min(0).max(255).default(75),
  OTA_LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

function withPort(url: string, port: number | undefined): string {
  const parsed = new URL(url);
  if (port !== undefined) {
    parsed.port = String(port);
  }
  return parsed.toString().replace(/\/+$/, '');
}

/**
 * Reads the agent configuration from `OTA_*` environment variables. Blank values count
 * as unset.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AgentConfig => {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('OTA_') && value !== undefined && value.trim().length > 0) {
      present[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const keys = Array.from(new Set(parsed.error.issues.map((issue) => String(issue.path[0]))));
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid agent configuration: ${details}`, keys);
  }

  const values = parsed.data;
  return {
    backendUrl: withPort(values.OTA_BACKEND_URL, values.OTA_BACKEND_PORT),
    deviceToken: values.OTA_DEVICE_TOKEN,
    firmwareDir: path.resolve(cwd, values.OTA_FIRMWARE_DIR ?? '.'),
    pollIntervalMs: values.OTA_POLL_INTERVAL_MS,
    retryAttempts: values.OTA_RETRY_ATTEMPTS,
    retryDelayMs: values.OTA_RETRY_DELAY_MS,
    httpTimeoutMs: values.OTA_HTTP_TIMEOUT_MS,
    repository: {
      apiBaseUrl: values.OTA_REPOSITORY_API_URL,
      rawBaseUrl: values.OTA_REPOSITORY_RAW_URL,
      branch: values.OTA_REPOSITORY_BRANCH
    },
    keepFiles: values.OTA_KEEP_FILES,
    keepDirectories: values.OTA_KEEP_DIRECTORIES,
    restartExitCode: values.OTA_RESTART_EXIT_CODE,
    logLevel: values.OTA_LOG_LEVEL
  };
};

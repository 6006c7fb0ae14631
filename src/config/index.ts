/**
 * Runtime configuration from the environment.
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_TIMEOUTS } from './constants';

const logLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .describe('pino log level');

const environmentSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('info'),
  CLUSTERWRIGHT_PACKAGE_DIR: z.string().min(1).optional(),
  CLUSTERWRIGHT_MANAGED_KEY: z.string().min(1).optional(),
  CLUSTERWRIGHT_SSH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export type LogLevel = z.infer<typeof logLevelSchema>;

export interface AppConfig {
  logLevel: LogLevel;
  /** Directory holding pre-fetched binaries and charts */
  packageDir: string;
  /** Private key of the operator's managed identity; its `.pub` sibling is distributed to nodes */
  managedKeyFile: string;
  sshConnectTimeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = environmentSchema.safeParse(env);
  const values = parsed.success ? parsed.data : environmentSchema.parse({});
  return {
    logLevel: values.LOG_LEVEL,
    packageDir: resolve(values.CLUSTERWRIGHT_PACKAGE_DIR ?? 'packages'),
    managedKeyFile: expandHome(values.CLUSTERWRIGHT_MANAGED_KEY ?? '~/.ssh/id_rsa'),
    sshConnectTimeoutMs: values.CLUSTERWRIGHT_SSH_TIMEOUT_MS ?? DEFAULT_TIMEOUTS.sshConnect,
  };
}

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export const config: AppConfig = loadConfig();

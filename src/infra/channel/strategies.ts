/**
 * Credential strategies
 *
 * An ordered list of strategies, each mapping the node credential to one
 * concrete auth method (or `undefined` when it does not apply). The connect
 * helper evaluates them in order and keeps the first session that opens.
 *
 * Order: managed identity key, supplied key, supplied password.
 */

import { readFile } from 'node:fs/promises';
import type { ConnectConfig } from 'ssh2';
import type { Logger } from 'pino';
import { AuthenticationError, ConnectionError, extractErrorMessage } from '@/lib/errors';
import { ConnectAttemptError, type SshConnector, type SshSession } from './ssh-session';

export interface SshEndpoint {
  host: string;
  port: number;
  user: string;
  keyFile?: string;
  password?: string;
}

/**
 * The operator's own identity, escalated to once its key has been distributed.
 */
export interface ManagedIdentity {
  user: string;
  keyFile: string;
}

export interface AuthMethod {
  label: string;
  username: string;
  privateKey?: Buffer;
  password?: string;
}

export type KeyReader = (path: string) => Promise<Buffer>;

export interface StrategyInput {
  endpoint: SshEndpoint;
  managed?: ManagedIdentity;
  readKey: KeyReader;
}

export interface CredentialStrategy {
  name: string;
  resolve(input: StrategyInput): Promise<AuthMethod | undefined>;
}

export const managedKeyStrategy: CredentialStrategy = {
  name: 'managed-key',
  async resolve({ managed, readKey }) {
    if (!managed) return undefined;
    try {
      return {
        label: `${managed.user} with managed key`,
        username: managed.user,
        privateKey: await readKey(managed.keyFile),
      };
    } catch {
      // no managed key on this machine yet
      return undefined;
    }
  },
};

export const suppliedKeyStrategy: CredentialStrategy = {
  name: 'supplied-key',
  async resolve({ endpoint, readKey }) {
    if (!endpoint.keyFile) return undefined;
    return {
      label: `${endpoint.user} with key ${endpoint.keyFile}`,
      username: endpoint.user,
      privateKey: await readKey(endpoint.keyFile),
    };
  },
};

export const suppliedPasswordStrategy: CredentialStrategy = {
  name: 'supplied-password',
  async resolve({ endpoint }) {
    if (!endpoint.password) return undefined;
    return {
      label: `${endpoint.user} with password`,
      username: endpoint.user,
      password: endpoint.password,
    };
  },
};

export const DEFAULT_STRATEGIES: readonly CredentialStrategy[] = [
  managedKeyStrategy,
  suppliedKeyStrategy,
  suppliedPasswordStrategy,
];

export const readKeyFile: KeyReader = (path) => readFile(path);

export interface ConnectOptions {
  endpoint: SshEndpoint;
  managed?: ManagedIdentity;
  connector: SshConnector;
  timeoutMs: number;
  logger: Logger;
  strategies?: readonly CredentialStrategy[];
  readKey?: KeyReader;
}

export interface EstablishedSession {
  session: SshSession;
  method: AuthMethod;
}

/**
 * Tries each applicable strategy in order. All-authentication failures raise
 * `AuthenticationError`; any transport failure raises `ConnectionError`.
 */
export async function connectWithStrategies(options: ConnectOptions): Promise<EstablishedSession> {
  const { endpoint, logger } = options;
  const target = `${endpoint.user}@${endpoint.host}:${endpoint.port}`;
  const input: StrategyInput = {
    endpoint,
    ...(options.managed && { managed: options.managed }),
    readKey: options.readKey ?? readKeyFile,
  };
  const failures: string[] = [];
  let transportFailure: string | undefined;

  for (const strategy of options.strategies ?? DEFAULT_STRATEGIES) {
    let method: AuthMethod | undefined;
    try {
      method = await strategy.resolve(input);
    } catch (error) {
      failures.push(`${strategy.name}: ${extractErrorMessage(error)}`);
      continue;
    }
    if (!method) continue;

    try {
      const session = await options.connector(toConnectConfig(endpoint, method, options.timeoutMs));
      logger.debug({ target, strategy: strategy.name }, 'SSH session established');
      return { session, method };
    } catch (error) {
      const failure = error instanceof ConnectAttemptError ? error : undefined;
      failures.push(`${method.label}: ${extractErrorMessage(error)}`);
      if (failure?.kind !== 'authentication') {
        transportFailure = extractErrorMessage(error);
      }
      logger.debug({ target, strategy: strategy.name, error: extractErrorMessage(error) }, 'SSH strategy failed');
    }
  }

  if (transportFailure !== undefined) {
    throw new ConnectionError(target, `cannot connect: ${transportFailure}`);
  }
  throw new AuthenticationError(target, failures.length > 0 ? failures : ['no usable credential']);
}

function toConnectConfig(endpoint: SshEndpoint, method: AuthMethod, timeoutMs: number): ConnectConfig {
  return {
    host: endpoint.host,
    port: endpoint.port,
    username: method.username,
    readyTimeout: timeoutMs,
    ...(method.privateKey && { privateKey: method.privateKey }),
    ...(method.password !== undefined && { password: method.password }),
  };
}

/**
 * Remote command channel over SSH
 *
 * Connection-level failures drop the session, reconnect through the ordered
 * credential strategies and retry the same command. A nonzero exit is a
 * `RemoteCommandError` and is never retried.
 */

import { randomUUID } from 'node:crypto';
import { posix } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { RETRY, REMOTE_PATHS, TOOL_NAME } from '@/config/constants';
import { ConnectionError, RemoteCommandError, UploadError, extractErrorMessage } from '@/lib/errors';
import { shellQuote } from '@/lib/shell';
import { openSsh2Session, type SshConnector } from './ssh-session';
import {
  connectWithStrategies,
  type CredentialStrategy,
  type EstablishedSession,
  type KeyReader,
  type ManagedIdentity,
  type SshEndpoint,
} from './strategies';
import type { CommandChannel } from './types';

export interface SshChannelOptions {
  endpoint: SshEndpoint;
  logger: Logger;
  managed?: ManagedIdentity;
  connectTimeoutMs: number;
  connector?: SshConnector;
  strategies?: readonly CredentialStrategy[];
  readKey?: KeyReader;
  maxAttempts?: number;
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class SshChannel implements CommandChannel {
  private active: EstablishedSession | undefined;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: SshChannelOptions) {
    this.maxAttempts = options.maxAttempts ?? RETRY.MAX_ATTEMPTS;
    this.backoffMs = options.backoffMs ?? RETRY.BACKOFF_MS;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  get target(): string {
    const { endpoint } = this.options;
    const user = this.active?.method.username ?? endpoint.user;
    return `${user}@${endpoint.host}:${endpoint.port}`;
  }

  /** Identity the current session authenticated as, if connected */
  get authenticatedAs(): string | undefined {
    return this.active?.method.label;
  }

  async execute(command: string): Promise<string> {
    let lastFailure: ConnectionError | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const active = await this.session();
        const { wrapped, stdin } = this.elevate(command, active);
        const outcome = await active.session.exec(wrapped, stdin);
        if (outcome.exitCode === 0) return outcome.stdout;
        throw new RemoteCommandError(this.target, command, outcome.exitCode, outcome.stderr);
      } catch (error) {
        if (!(error instanceof ConnectionError)) throw error;
        lastFailure = error;
        this.drop();
        this.options.logger.warn(
          { target: this.target, attempt, maxAttempts: this.maxAttempts, error: error.message },
          'Connection lost, reconnecting',
        );
        if (attempt < this.maxAttempts) await this.sleep(this.backoffMs);
      }
    }

    throw new ConnectionError(
      this.options.endpoint.host,
      `giving up after ${this.maxAttempts} attempts: ${lastFailure?.message ?? 'unknown error'}`,
      { cause: lastFailure },
    );
  }

  async upload(content: string | Buffer, remotePath: string, mode = 0o644): Promise<void> {
    const staging = posix.join(REMOTE_PATHS.STAGING_DIR, `.${TOOL_NAME}-${randomUUID()}`);
    try {
      const active = await this.session();
      await active.session.writeFile(staging, content, 0o600);
    } catch (error) {
      if (error instanceof ConnectionError) this.drop();
      throw new UploadError(this.target, remotePath, extractErrorMessage(error), { cause: error });
    }

    const dir = posix.dirname(remotePath);
    try {
      await this.execute(
        `mkdir -p ${shellQuote(dir)} && install -m ${mode.toString(8)} ${shellQuote(staging)} ${shellQuote(remotePath)} && rm -f ${shellQuote(staging)}`,
      );
    } catch (error) {
      throw new UploadError(this.target, remotePath, extractErrorMessage(error), { cause: error });
    }
  }

  async close(): Promise<void> {
    this.drop();
  }

  private async session(): Promise<EstablishedSession> {
    if (this.active) return this.active;
    const { endpoint, managed, connector, strategies, readKey, logger, connectTimeoutMs } = this.options;
    this.active = await connectWithStrategies({
      endpoint,
      connector: connector ?? openSsh2Session,
      timeoutMs: connectTimeoutMs,
      logger,
      ...(managed && { managed }),
      ...(strategies && { strategies }),
      ...(readKey && { readKey }),
    });
    logger.debug({ target: this.target, via: this.active.method.label }, 'Connected');
    return this.active;
  }

  private drop(): void {
    if (!this.active) return;
    this.active.session.close();
    this.active = undefined;
  }

  /**
   * Non-root identities run every command through sudo; the password, when
   * the credential has one, is fed on stdin.
   */
  private elevate(command: string, active: EstablishedSession): { wrapped: string; stdin?: string } {
    if (active.method.username === 'root') return { wrapped: command };
    const password = this.options.endpoint.password;
    if (password !== undefined) {
      return { wrapped: `sudo -S -p '' sh -c ${shellQuote(command)}`, stdin: `${password}\n` };
    }
    return { wrapped: `sudo -n sh -c ${shellQuote(command)}` };
  }
}

/**
 * ssh2-backed session
 *
 * Thin promise wrapper over one authenticated `ssh2` Client. Transport
 * problems surface as `ConnectionError`; the caller decides about retries.
 */

import { Client, type ClientChannel, type ConnectConfig, type SFTPWrapper } from 'ssh2';
import { ConnectionError, extractErrorMessage } from '@/lib/errors';
import type { ExecOutcome } from './types';

export interface SshSession {
  exec(command: string, stdin?: string): Promise<ExecOutcome>;
  writeFile(path: string, content: string | Buffer, mode: number): Promise<void>;
  close(): void;
}

/**
 * Raised while establishing a session. `kind` separates rejected credentials
 * from an unreachable or misbehaving transport.
 */
export class ConnectAttemptError extends Error {
  constructor(
    readonly kind: 'authentication' | 'transport',
    message: string,
  ) {
    super(message);
    this.name = 'ConnectAttemptError';
  }
}

export type SshConnector = (config: ConnectConfig) => Promise<SshSession>;

const AUTH_PATTERNS = [/authentication/i, /privateKey/i, /passphrase/i, /permission denied/i];

export function classifyConnectFailure(error: unknown): ConnectAttemptError {
  const message = extractErrorMessage(error);
  const level =
    error instanceof Error && 'level' in error && typeof error.level === 'string'
      ? error.level
      : undefined;
  if (level === 'client-authentication' || AUTH_PATTERNS.some((p) => p.test(message))) {
    return new ConnectAttemptError('authentication', message);
  }
  return new ConnectAttemptError('transport', message);
}

class Ssh2Session implements SshSession {
  private closed = false;
  private readonly pending = new Set<(error: Error) => void>();

  constructor(
    private readonly client: Client,
    private readonly target: string,
  ) {
    client.on('error', (error) => this.fail(error.message));
    client.on('close', () => this.fail('connection closed'));
  }

  exec(command: string, stdin?: string): Promise<ExecOutcome> {
    return this.track((resolve, reject) => {
      this.client.exec(command, (error: Error | undefined, stream: ClientChannel) => {
        if (error) {
          reject(new ConnectionError(this.target, `cannot open exec channel: ${error.message}`));
          return;
        }
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let exitCode: number | null = null;
        stream.on('data', (chunk: Buffer) => stdout.push(chunk));
        stream.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
        stream.on('exit', (code: number | null) => {
          exitCode = code;
        });
        stream.on('close', () =>
          resolve({
            stdout: Buffer.concat(stdout).toString('utf-8'),
            stderr: Buffer.concat(stderr).toString('utf-8'),
            exitCode,
          }),
        );
        if (stdin !== undefined) stream.end(stdin);
        else stream.end();
      });
    });
  }

  writeFile(path: string, content: string | Buffer, mode: number): Promise<void> {
    return this.track((resolve, reject) => {
      this.client.sftp((error: Error | undefined, sftp: SFTPWrapper) => {
        if (error) {
          reject(new ConnectionError(this.target, `cannot open sftp subsystem: ${error.message}`));
          return;
        }
        sftp.writeFile(path, content, { mode }, (writeError?: Error | null) => {
          sftp.end();
          if (writeError) reject(writeError);
          else resolve();
        });
      });
    });
  }

  close(): void {
    this.closed = true;
    this.client.end();
  }

  private track<T>(
    run: (resolve: (value: T) => void, reject: (error: Error) => void) => void,
  ): Promise<T> {
    if (this.closed) {
      return Promise.reject(new ConnectionError(this.target, 'not connected'));
    }
    return new Promise<T>((resolve, reject) => {
      const abort = (error: Error): void => reject(error);
      this.pending.add(abort);
      run(
        (value) => {
          this.pending.delete(abort);
          resolve(value);
        },
        (error) => {
          this.pending.delete(abort);
          reject(error);
        },
      );
    });
  }

  private fail(reason: string): void {
    this.closed = true;
    const error = new ConnectionError(this.target, reason);
    for (const abort of this.pending) abort(error);
    this.pending.clear();
  }
}

/**
 * Opens an authenticated session. Rejects with `ConnectAttemptError`.
 */
export const openSsh2Session: SshConnector = (config) =>
  new Promise<SshSession>((resolve, reject) => {
    const client = new Client();
    const target = `${config.username ?? ''}@${config.host ?? ''}:${config.port ?? 22}`;
    let settled = false;

    client.once('ready', () => {
      settled = true;
      resolve(new Ssh2Session(client, target));
    });
    client.once('error', (error) => {
      if (settled) return;
      settled = true;
      client.end();
      reject(classifyConnectFailure(error));
    });

    try {
      client.connect(config);
    } catch (error) {
      settled = true;
      reject(classifyConnectFailure(error));
    }
  });

/**
 * Local command channel
 *
 * Runs commands through /bin/sh on the operator machine.
 */

import { exec } from 'node:child_process';
import { chmod, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { promisify } from 'node:util';
import type { Logger } from 'pino';
import { RemoteCommandError, UploadError, extractErrorMessage, redactSecrets } from '@/lib/errors';
import type { CommandChannel } from './types';

const execAsync = promisify(exec);

const MAX_BUFFER = 64 * 1024 * 1024;

interface ExecFailure {
  code?: number | string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is Error & ExecFailure {
  return error instanceof Error && ('stderr' in error || 'code' in error);
}

export class LocalChannel implements CommandChannel {
  readonly target = 'local';

  constructor(private readonly logger: Logger) {}

  async execute(command: string): Promise<string> {
    this.logger.debug({ target: this.target, command: redactSecrets(command) }, 'Executing command');
    try {
      const { stdout } = await execAsync(command, { maxBuffer: MAX_BUFFER, shell: '/bin/sh' });
      return stdout;
    } catch (error) {
      if (isExecFailure(error)) {
        const exitCode = typeof error.code === 'number' ? error.code : null;
        throw new RemoteCommandError(this.target, command, exitCode, error.stderr ?? error.message);
      }
      throw error;
    }
  }

  async upload(content: string | Buffer, remotePath: string, mode = 0o644): Promise<void> {
    try {
      await mkdir(dirname(remotePath), { recursive: true });
      await writeFile(remotePath, content);
      await chmod(remotePath, mode);
    } catch (error) {
      throw new UploadError(this.target, remotePath, extractErrorMessage(error), { cause: error });
    }
  }

  async close(): Promise<void> {}
}

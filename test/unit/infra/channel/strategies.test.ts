import { describe, it, expect, jest } from '@jest/globals';
import type { ConnectConfig } from 'ssh2';
import { ConnectAttemptError, type SshSession } from '@/infra/channel/ssh-session';
import { connectWithStrategies, type SshEndpoint } from '@/infra/channel/strategies';
import { AuthenticationError, ConnectionError } from '@/lib/errors';
import { createSilentLogger } from '@/lib/logger';

const endpoint: SshEndpoint = {
  host: '10.0.0.11',
  port: 22,
  user: 'ops',
  keyFile: '/keys/ops',
  password: 'test-secret',
};

const session: SshSession = {
  exec: async () => ({ stdout: '', stderr: '', exitCode: 0 }),
  writeFile: async () => {},
  close: () => {},
};

const readKey = async (path: string) => Buffer.from(`key at ${path}`);

describe('connectWithStrategies', () => {
  it('falls back to the password when the supplied key is rejected', async () => {
    const connector = jest.fn(async (config: ConnectConfig) => {
      if (config.privateKey) throw new ConnectAttemptError('authentication', 'All configured authentication methods failed');
      return session;
    });

    const established = await connectWithStrategies({
      endpoint,
      connector,
      timeoutMs: 1000,
      logger: createSilentLogger(),
      readKey,
    });

    expect(established.method.label).toBe('ops with password');
    expect(connector).toHaveBeenCalledTimes(2);
    expect(connector.mock.calls[1]?.[0]).toEqual({
      host: '10.0.0.11',
      port: 22,
      username: 'ops',
      readyTimeout: 1000,
      password: 'test-secret',
    });
  });

  it('tries the managed identity first', async () => {
    const connector = jest.fn(async (_config: ConnectConfig) => session);

    const established = await connectWithStrategies({
      endpoint,
      managed: { user: 'root', keyFile: '/keys/managed' },
      connector,
      timeoutMs: 1000,
      logger: createSilentLogger(),
      readKey,
    });

    expect(established.method.username).toBe('root');
    expect(established.method.label).toBe('root with managed key');
    expect(connector).toHaveBeenCalledTimes(1);
  });

  it('skips a managed key that cannot be read', async () => {
    const connector = jest.fn(async (_config: ConnectConfig) => session);

    const established = await connectWithStrategies({
      endpoint,
      managed: { user: 'root', keyFile: '/keys/missing' },
      connector,
      timeoutMs: 1000,
      logger: createSilentLogger(),
      readKey: async (path) => {
        if (path === '/keys/missing') throw new Error('ENOENT');
        return Buffer.from('key');
      },
    });

    expect(established.method.label).toBe('ops with key /keys/ops');
  });

  it('raises AuthenticationError when every credential is rejected', async () => {
    const error = await connectWithStrategies({
      endpoint,
      connector: async () => {
        throw new ConnectAttemptError('authentication', 'denied');
      },
      timeoutMs: 1000,
      logger: createSilentLogger(),
      readKey,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error instanceof AuthenticationError && error.attempts).toEqual([
      'ops with key /keys/ops: denied',
      'ops with password: denied',
    ]);
  });

  it('raises ConnectionError when the host is unreachable', async () => {
    await expect(
      connectWithStrategies({
        endpoint,
        connector: async () => {
          throw new ConnectAttemptError('transport', 'connect ECONNREFUSED');
        },
        timeoutMs: 1000,
        logger: createSilentLogger(),
        readKey,
      }),
    ).rejects.toBeInstanceOf(ConnectionError);
  });
});

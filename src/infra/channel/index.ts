/**
 * Command channel factory
 */

import type { Logger } from 'pino';
import type { NodeDescriptor } from '@/config/schema';
import { SshChannel } from './ssh';
import type { ManagedIdentity } from './strategies';
import type { ChannelFactory, CommandChannel } from './types';

export * from './types';
export { LocalChannel } from './local';
export { SshChannel } from './ssh';
export { probe, fileExists } from './probe';
export type { ManagedIdentity } from './strategies';

export interface SshChannelFactoryOptions {
  logger: Logger;
  connectTimeoutMs: number;
  managed?: ManagedIdentity;
}

export function createSshChannelFactory(options: SshChannelFactoryOptions): ChannelFactory<NodeDescriptor> {
  return (node: NodeDescriptor): CommandChannel =>
    new SshChannel({
      endpoint: {
        host: node.address,
        port: node.ssh.port,
        user: node.ssh.user,
        ...(node.ssh.keyFile !== undefined && { keyFile: node.ssh.keyFile }),
        ...(node.ssh.password !== undefined && { password: node.ssh.password }),
      },
      logger: options.logger.child({ node: node.hostname }),
      connectTimeoutMs: options.connectTimeoutMs,
      ...(options.managed && { managed: options.managed }),
    });
}

/**
 * Runs `fn` with a fresh channel and always closes it.
 */
export async function withChannel<T>(
  factory: ChannelFactory<NodeDescriptor>,
  node: NodeDescriptor,
  fn: (channel: CommandChannel) => Promise<T>,
): Promise<T> {
  const channel = factory(node);
  try {
    return await fn(channel);
  } finally {
    await channel.close();
  }
}

/**
 * Where kubectl runs for commands against an existing cluster: the first
 * master over SSH, or the operator machine's own kubectl.
 */

import type { CommandContext } from '@/core/context';
import { masters, type ClusterSpec } from '@/config/schema';
import type { CommandChannel } from '@/infra/channel';
import { ERROR_MESSAGES, ValidationError } from '@/lib/errors';

export type ManagementRoute = 'first-master' | 'local';

export async function withManagementChannel<T>(
  ctx: CommandContext,
  spec: ClusterSpec,
  route: ManagementRoute,
  fn: (channel: CommandChannel) => Promise<T>,
): Promise<T> {
  if (route === 'local') return fn(ctx.local);

  const first = masters(spec)[0];
  if (!first) throw new ValidationError([ERROR_MESSAGES.NO_MASTER]);
  const channel = ctx.openChannel(first);
  try {
    return await fn(channel);
  } finally {
    await channel.close();
  }
}

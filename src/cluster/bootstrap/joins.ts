/**
 * Master and worker joins
 *
 * Masters join one at a time: each join adds an etcd member, and concurrent
 * membership changes are unsafe. Workers fan out.
 */

import type { CommandContext } from '@/core/context';
import { KUBERNETES } from '@/config/constants';
import type { NodeDescriptor } from '@/config/schema';
import { fileExists, withChannel, type CommandChannel } from '@/infra/channel';
import {
  INSTALL_KUBECONFIG,
  RESET_NODE,
  masterJoinCommand,
  workerJoinCommand,
  type JoinCredential,
} from '@/infra/kubernetes/kubeadm';
import { PhaseError } from '@/lib/errors';
import { fanOutOrThrow } from '@/lib/fanout';

/**
 * Clears a previous membership left by an earlier run.
 */
async function clearStaleMembership(ctx: CommandContext, node: NodeDescriptor, channel: CommandChannel): Promise<boolean> {
  if (!(await fileExists(channel, KUBERNETES.KUBELET_CONF))) return false;
  ctx.logger.warn({ node: node.hostname }, 'Node has a stale cluster membership, resetting');
  await channel.execute(RESET_NODE);
  return true;
}

export async function joinMaster(
  ctx: CommandContext,
  node: NodeDescriptor,
  endpoint: string,
  credential: JoinCredential,
): Promise<void> {
  await withChannel(ctx.openChannel, node, async (channel) => {
    await clearStaleMembership(ctx, node, channel);
    await channel.execute(masterJoinCommand(endpoint, credential));
    await channel.execute(INSTALL_KUBECONFIG);
  });
  ctx.logger.info({ node: node.hostname }, 'Master joined');
}

/**
 * Strictly sequential; stops at the first failure.
 */
export async function joinMasters(
  ctx: CommandContext,
  nodes: readonly NodeDescriptor[],
  endpoint: string,
  credential: JoinCredential,
): Promise<void> {
  for (const node of nodes) {
    try {
      await joinMaster(ctx, node, endpoint, credential);
    } catch (error) {
      throw new PhaseError('master-join', node.hostname, error);
    }
  }
}

export async function joinWorkers(
  ctx: CommandContext,
  nodes: readonly NodeDescriptor[],
  endpoint: string,
  credential: JoinCredential,
): Promise<void> {
  await fanOutOrThrow('Worker join', nodes, {
    key: (node) => node.hostname,
    run: (node) =>
      withChannel(ctx.openChannel, node, async (channel) => {
        await clearStaleMembership(ctx, node, channel);
        await channel.execute(workerJoinCommand(endpoint, credential));
        ctx.logger.info({ node: node.hostname }, 'Worker joined');
      }),
    phase: () => 'worker-join',
  });
}

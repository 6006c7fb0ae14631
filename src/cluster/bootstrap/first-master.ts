/**
 * First-master initialization
 */

import type { Logger } from 'pino';
import type { CommandContext } from '@/core/context';
import { KUBERNETES } from '@/config/constants';
import type { ClusterSpec, NodeDescriptor } from '@/config/schema';
import { fileExists, type CommandChannel } from '@/infra/channel';
import { INSTALL_KUBECONFIG, RESET_NODE, initCommand, renderInitConfig } from '@/infra/kubernetes/kubeadm';
import { UserCancelledError } from '@/lib/errors';

export const CONFIRM_TOKEN = 'yes';

export type ExistingControlPlaneDecision = 'fresh' | 'reset';

/**
 * Looks for an existing control plane and, if there is one, asks for the
 * typed confirmation. Read-only: declining throws before anything changes.
 */
export async function decideExistingControlPlane(
  ctx: CommandContext,
  channel: CommandChannel,
  master: NodeDescriptor,
): Promise<ExistingControlPlaneDecision> {
  if (!(await fileExists(channel, KUBERNETES.ADMIN_CONF))) return 'fresh';

  ctx.logger.warn({ node: master.hostname }, 'Existing control plane found on first master');
  if (ctx.forceReset) return 'reset';

  const confirmed = await ctx.prompter.confirmDangerous(
    `${master.hostname} (${master.address}) already runs a Kubernetes control plane. ` +
      'Continuing will DESTROY it: all cluster data, certificates and etcd state on this node are wiped.',
    CONFIRM_TOKEN,
  );
  if (!confirmed) {
    throw new UserCancelledError(`Reset of the existing control plane on ${master.hostname} was declined`);
  }
  return 'reset';
}

export async function resetNode(channel: CommandChannel, logger: Logger): Promise<void> {
  logger.warn('Resetting node');
  await channel.execute(RESET_NODE);
}

export async function initFirstMaster(
  ctx: CommandContext,
  spec: ClusterSpec,
  master: NodeDescriptor,
  channel: CommandChannel,
  decision: ExistingControlPlaneDecision,
): Promise<void> {
  const logger = ctx.logger.child({ node: master.hostname, phase: 'first-master' });
  if (decision === 'reset') await resetNode(channel, logger);

  await channel.upload(renderInitConfig(spec, master), KUBERNETES.INIT_CONFIG_PATH, 0o600);
  logger.info('Running kubeadm init');
  await channel.execute(initCommand());
  await channel.execute(INSTALL_KUBECONFIG);
  logger.info('First master initialized');
}

/**
 * GPU tagging and cluster validation
 */

import type { CommandContext } from '@/core/context';
import { ADDONS, KUBERNETES } from '@/config/constants';
import type { NodeDescriptor } from '@/config/schema';
import type { CommandChannel } from '@/infra/channel';
import { Kubectl } from '@/infra/kubernetes/kubectl';
import { extractErrorMessage } from '@/lib/errors';

/**
 * Labels GPU nodes. Returns one warning per node that could not be labelled.
 */
export async function labelGpuNodes(
  ctx: CommandContext,
  channel: CommandChannel,
  nodes: readonly NodeDescriptor[],
): Promise<string[]> {
  const kubectl = new Kubectl(channel);
  const warnings: string[] = [];

  for (const node of nodes.filter((n) => n.gpu)) {
    try {
      await kubectl.label('node', node.hostname, ADDONS.GPU_LABEL);
      ctx.logger.info({ node: node.hostname }, 'GPU node labelled');
    } catch (error) {
      const message = `Could not label GPU node ${node.hostname}: ${extractErrorMessage(error)}`;
      ctx.logger.warn({ node: node.hostname }, message);
      warnings.push(message);
    }
  }
  return warnings;
}

export interface ValidationSnapshot {
  nodes: string;
  systemPods?: string;
}

/**
 * Node listing must succeed; the system pod listing is informational.
 */
export async function validateCluster(
  ctx: CommandContext,
  channel: CommandChannel,
): Promise<{ snapshot: ValidationSnapshot; warnings: string[] }> {
  const nodes = await channel.execute('kubectl get nodes -o wide');
  ctx.logger.info({ nodes: nodes.trim() }, 'Cluster nodes');

  try {
    const systemPods = await channel.execute(`kubectl get pods -n ${KUBERNETES.SYSTEM_NAMESPACE}`);
    return { snapshot: { nodes, systemPods }, warnings: [] };
  } catch (error) {
    const message = `Could not list system pods: ${extractErrorMessage(error)}`;
    ctx.logger.warn(message);
    return { snapshot: { nodes }, warnings: [message] };
  }
}

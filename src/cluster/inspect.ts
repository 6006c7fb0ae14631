/**
 * Read-only views of a managed cluster.
 */

import type { CommandContext } from '@/core/context';
import { KUBERNETES } from '@/config/constants';
import { controlPlaneEndpoint, type ClusterSpec, type LoadBalancerMode, type NodeRole } from '@/config/schema';
import type { CommandChannel } from '@/infra/channel';
import { shellQuote } from '@/lib/shell';
import { loadState, verifyOwnership } from './state/store';

export interface ClusterInfo {
  name: string;
  version: string;
  endpoint: string;
  nodes: Array<{ hostname: string; address: string; role: NodeRole; gpu: boolean }>;
  addons: {
    loadBalancerMode: LoadBalancerMode;
    bgp: boolean;
    gateway: boolean;
    observability: boolean;
  };
  deployedAt?: string;
  updatedAt?: string;
  toolVersion?: string;
  /** `kubectl get nodes -o wide` as printed */
  liveNodes: string;
}

export async function showClusterInfo(
  ctx: CommandContext,
  channel: CommandChannel,
  cluster: string,
): Promise<ClusterInfo> {
  await verifyOwnership(channel);
  const stored = await loadState(channel, cluster, ctx.logger);
  const spec: ClusterSpec = stored.spec;
  const liveNodes = await channel.execute('kubectl get nodes -o wide');

  return {
    name: spec.name,
    version: spec.version,
    endpoint: controlPlaneEndpoint(spec, KUBERNETES.API_PORT),
    nodes: spec.nodes.map(({ hostname, address, role, gpu }) => ({ hostname, address, role, gpu })),
    addons: {
      loadBalancerMode: spec.addons.loadBalancer.mode,
      bgp: spec.addons.bgp.enabled,
      gateway: spec.addons.gateway.enabled,
      observability: spec.addons.observability.enabled,
    },
    ...(stored.deployedAt !== undefined && { deployedAt: stored.deployedAt }),
    ...(stored.updatedAt !== undefined && { updatedAt: stored.updatedAt }),
    ...(stored.toolVersion !== undefined && { toolVersion: stored.toolVersion }),
    liveNodes,
  };
}

/**
 * Copies the admin kubeconfig from the first master to `outputPath` on the
 * operator machine.
 */
export async function fetchKubeconfig(
  ctx: CommandContext,
  channel: CommandChannel,
  outputPath: string,
): Promise<string> {
  await verifyOwnership(channel);
  const content = await channel.execute(`cat ${shellQuote(KUBERNETES.ADMIN_CONF)}`);
  await ctx.local.upload(content, outputPath, 0o600);
  ctx.logger.info({ path: outputPath }, 'Kubeconfig written');
  return outputPath;
}

/**
 * MetalLB load-balancer addon
 */

import yaml from 'js-yaml';
import type { CommandContext } from '@/core/context';
import { ADDONS } from '@/config/constants';
import type { ClusterSpec } from '@/config/schema';
import type { CommandChannel } from '@/infra/channel';
import { ensureHelm, upgradeInstallCommand } from '@/infra/kubernetes/helm';
import { Kubectl, type KubeObject } from '@/infra/kubernetes/kubectl';
import {
  bgpAdvertisement,
  bgpPeers,
  ipAddressPool,
  l2Advertisement,
} from '@/infra/kubernetes/manifests';

const CONTROL_PLANE_TOLERATION = {
  key: 'node-role.kubernetes.io/control-plane',
  operator: 'Exists',
  effect: 'NoSchedule',
} as const;

/**
 * The addon is installed before any worker joins, so the controller must be
 * schedulable on tainted masters.
 */
export const METALLB_VALUES = {
  controller: { tolerations: [CONTROL_PLANE_TOLERATION] },
  speaker: { tolerations: [CONTROL_PLANE_TOLERATION] },
};

export const METALLB_INSTALL = upgradeInstallCommand({
  release: ADDONS.METALLB_RELEASE,
  chart: ADDONS.METALLB_CHART_PATH,
  namespace: ADDONS.METALLB_NAMESPACE,
  valuesFile: ADDONS.METALLB_VALUES_PATH,
  createNamespace: true,
  wait: true,
});

export const METALLB_ROLLOUT_CHECKS = [
  `kubectl rollout status deployment/metallb-controller -n ${ADDONS.METALLB_NAMESPACE} --timeout=${ADDONS.METALLB_ROLLOUT_TIMEOUT}`,
  `kubectl rollout status daemonset/metallb-speaker -n ${ADDONS.METALLB_NAMESPACE} --timeout=${ADDONS.METALLB_ROLLOUT_TIMEOUT}`,
];

export function needsLoadBalancerAddon(spec: ClusterSpec): boolean {
  return spec.addons.bgp.enabled || spec.addons.loadBalancer.mode === 'l2';
}

/**
 * Pool first, then either the BGP peers and their advertisement or an L2
 * advertisement.
 */
export function loadBalancerResources(spec: ClusterSpec): KubeObject[] {
  const { bgp } = spec.addons;
  const objects: KubeObject[] = [ipAddressPool(spec.name, bgp.loadBalancerIps)];
  if (bgp.enabled) {
    objects.push(...bgpPeers(spec.name, bgp.localAsn, bgp.peers), bgpAdvertisement(spec.name));
  } else {
    objects.push(l2Advertisement(spec.name));
  }
  return objects;
}

export async function applyLoadBalancerResources(channel: CommandChannel, spec: ClusterSpec): Promise<void> {
  await new Kubectl(channel).apply(loadBalancerResources(spec));
}

export async function installMetalLb(ctx: CommandContext, spec: ClusterSpec, channel: CommandChannel): Promise<void> {
  const logger = ctx.logger.child({ phase: 'metallb' });

  await ensureHelm(channel, () => ctx.packages.read('helm', spec.version));
  await channel.upload(await ctx.packages.read('metallb-chart', spec.version), ADDONS.METALLB_CHART_PATH);
  await channel.upload(yaml.dump(METALLB_VALUES), ADDONS.METALLB_VALUES_PATH, 0o600);
  await channel.execute(METALLB_INSTALL);
  for (const check of METALLB_ROLLOUT_CHECKS) {
    await channel.execute(check);
  }
  logger.info('MetalLB ready');

  await applyLoadBalancerResources(channel, spec);
  logger.info({ mode: spec.addons.bgp.enabled ? 'bgp' : 'l2' }, 'Load-balancer resources applied');
}

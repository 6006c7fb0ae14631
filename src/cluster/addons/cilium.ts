/**
 * Cilium networking addon
 *
 * Replaces kube-proxy, so the cluster has no service routing until its agent
 * DaemonSet is ready on every node.
 */

import yaml from 'js-yaml';
import type { Logger } from 'pino';
import type { CommandContext } from '@/core/context';
import { ADDONS, CLUSTER_DEFAULTS, KUBERNETES, POLL_BUDGETS } from '@/config/constants';
import { controlPlaneHost, type ClusterSpec, type LoadBalancerMode } from '@/config/schema';
import { probe, type CommandChannel } from '@/infra/channel';
import { ensureHelm, registryHost, upgradeInstallCommand } from '@/infra/kubernetes/helm';
import { Kubectl } from '@/infra/kubernetes/kubectl';
import { defaultGateway } from '@/infra/kubernetes/manifests';
import { PollTimeoutError, extractErrorMessage } from '@/lib/errors';
import { pollUntil } from '@/lib/poll';

interface ImageOverride {
  repository: string;
  useDigest: false;
}

export interface CiliumValues {
  kubeProxyReplacement: true;
  k8sServiceHost: string;
  k8sServicePort: number;
  ipam: { mode: 'cluster-pool'; operator: { clusterPoolIPv4PodCIDRList: string[] } };
  loadBalancer: { mode: Exclude<LoadBalancerMode, 'l2'> };
  bgpControlPlane: { enabled: false };
  gatewayAPI: { enabled: boolean };
  envoy: { enabled: boolean; image?: ImageOverride };
  hubble: {
    enabled: boolean;
    metrics: { enabled: string[] | null };
    relay: { enabled: boolean; image?: ImageOverride };
    ui: {
      enabled: boolean;
      service: { type: 'NodePort'; nodePort: number };
      frontend?: { image: ImageOverride };
      backend?: { image: ImageOverride };
    };
  };
  image?: ImageOverride;
  operator: { replicas: number; image?: ImageOverride };
}

const HUBBLE_METRICS = ['dns', 'drop', 'tcp', 'flow', 'port-distribution', 'icmp', 'httpV2'];

function override(registry: string | undefined, image: string): ImageOverride | undefined {
  return registry ? { repository: `${registry}/${image}`, useDigest: false } : undefined;
}

export function buildCiliumValues(spec: ClusterSpec): CiliumValues {
  const { addons } = spec;
  const registry =
    spec.imageRepository === CLUSTER_DEFAULTS.imageRepository ? undefined : registryHost(spec.imageRepository);
  const observability = addons.observability;
  const masterCount = spec.nodes.filter((n) => n.role === 'master').length;

  const values: CiliumValues = {
    kubeProxyReplacement: true,
    k8sServiceHost: controlPlaneHost(spec),
    k8sServicePort: KUBERNETES.API_PORT,
    ipam: {
      mode: 'cluster-pool',
      operator: { clusterPoolIPv4PodCIDRList: [spec.networking.podSubnet] },
    },
    // MetalLB answers ARP in l2 mode; Cilium itself stays on SNAT
    loadBalancer: { mode: addons.loadBalancer.mode === 'l2' ? 'snat' : addons.loadBalancer.mode },
    // BGP sessions belong to MetalLB
    bgpControlPlane: { enabled: false },
    gatewayAPI: { enabled: addons.gateway.enabled },
    envoy: { enabled: addons.envoy.enabled },
    hubble: {
      enabled: observability.enabled,
      metrics: { enabled: observability.enabled && observability.metrics ? HUBBLE_METRICS : null },
      relay: { enabled: observability.enabled },
      ui: {
        enabled: observability.enabled && observability.ui,
        service: { type: 'NodePort', nodePort: observability.uiNodePort },
      },
    },
    operator: { replicas: Math.min(2, Math.max(1, masterCount)) },
  };

  const agent = override(registry, 'cilium/cilium');
  if (agent) {
    values.image = agent;
    values.operator.image = override(registry, 'cilium/operator');
    values.envoy.image = override(registry, 'cilium/cilium-envoy');
    values.hubble.relay.image = override(registry, 'cilium/hubble-relay');
    const frontend = override(registry, 'cilium/hubble-ui');
    const backend = override(registry, 'cilium/hubble-ui-backend');
    if (frontend && backend) {
      values.hubble.ui.frontend = { image: frontend };
      values.hubble.ui.backend = { image: backend };
    }
  }
  return values;
}

export function renderCiliumValues(spec: ClusterSpec): string {
  return yaml.dump(buildCiliumValues(spec), { lineWidth: -1, noRefs: true });
}

export const CILIUM_INSTALL = upgradeInstallCommand({
  release: ADDONS.CILIUM_RELEASE,
  chart: ADDONS.CILIUM_CHART_PATH,
  namespace: ADDONS.CILIUM_NAMESPACE,
  valuesFile: ADDONS.CILIUM_VALUES_PATH,
});

const READY_PATH = '.status.numberReady}/{.status.desiredNumberScheduled';

export function isDaemonSetReady(observed: string): boolean {
  const match = /^(\d+)\/(\d+)$/.exec(observed.trim());
  if (!match) return false;
  const [, ready, desired] = match;
  return Number(desired) > 0 && ready === desired;
}

/**
 * Uploads helm, the chart and the values, then installs or upgrades the
 * release. Does not wait.
 */
export async function applyCiliumRelease(
  ctx: CommandContext,
  spec: ClusterSpec,
  channel: CommandChannel,
): Promise<void> {
  await ensureHelm(channel, () => ctx.packages.read('helm', spec.version));
  await channel.upload(await ctx.packages.read('cilium-chart', spec.version), ADDONS.CILIUM_CHART_PATH);
  await channel.upload(renderCiliumValues(spec), ADDONS.CILIUM_VALUES_PATH, 0o600);
  await channel.execute(CILIUM_INSTALL);
}

export async function waitForCilium(ctx: CommandContext, kubectl: Kubectl, logger: Logger): Promise<void> {
  await pollUntil(
    'cilium DaemonSet readiness',
    POLL_BUDGETS.ciliumReady,
    ctx.poll,
    async () => {
      const observed = await kubectl.jsonpath('ds', 'cilium', READY_PATH, ADDONS.CILIUM_NAMESPACE);
      return { ready: isDaemonSetReady(observed), observed };
    },
    logger,
  );
}

export async function assertKubeProxyAbsent(channel: CommandChannel): Promise<void> {
  if (await probe(channel, `kubectl get ds kube-proxy -n ${KUBERNETES.SYSTEM_NAMESPACE}`)) {
    throw new Error('kube-proxy DaemonSet is present although Cilium replaces it');
  }
}

/**
 * Waits for the GatewayClass, applies the default Gateway and waits for its
 * address. Returns warnings instead of failing.
 */
export async function setupDefaultGateway(
  ctx: CommandContext,
  kubectl: Kubectl,
  logger: Logger,
): Promise<string[]> {
  try {
    await pollUntil(
      'GatewayClass acceptance',
      POLL_BUDGETS.gatewayClass,
      ctx.poll,
      async () => {
        const observed = await kubectl.jsonpath(
          'gatewayclass',
          ADDONS.GATEWAY_CLASS,
          '.status.conditions[?(@.type=="Accepted")].status',
        );
        return { ready: observed === 'True', observed };
      },
      logger,
    );
    await kubectl.apply([defaultGateway()]);
    const address = await pollUntil(
      'default Gateway address',
      POLL_BUDGETS.gatewayAddress,
      ctx.poll,
      async () => {
        const observed = await kubectl.jsonpath(
          'gateway',
          ADDONS.DEFAULT_GATEWAY,
          '.status.addresses[0].value',
          'default',
        );
        return { ready: observed.length > 0, observed };
      },
      logger,
    );
    logger.info({ address }, 'Default gateway has an address');
    return [];
  } catch (error) {
    const message =
      error instanceof PollTimeoutError ? error.message : `Gateway setup failed: ${extractErrorMessage(error)}`;
    logger.warn({ error: message }, 'Gateway not ready; the cluster remains usable');
    return [message];
  }
}

/**
 * Install, wait for readiness, confirm kube-proxy is gone, then the optional
 * gateway. Returns warnings.
 */
export async function installCilium(
  ctx: CommandContext,
  spec: ClusterSpec,
  channel: CommandChannel,
): Promise<string[]> {
  const logger = ctx.logger.child({ phase: 'cilium' });
  const kubectl = new Kubectl(channel);

  await applyCiliumRelease(ctx, spec, channel);
  logger.info('Cilium release applied, waiting for agents');
  await waitForCilium(ctx, kubectl, logger);
  await assertKubeProxyAbsent(channel);
  logger.info('Cilium ready');

  if (!spec.addons.gateway.enabled) return [];
  return setupDefaultGateway(ctx, kubectl, logger);
}

/**
 * Provisioning pipeline steps
 *
 * Each step either detects its end state and skips, or (re)installs over
 * whatever a previous partial run left behind.
 */

import { CLUSTER_DEFAULTS, REMOTE_PATHS } from '@/config/constants';
import type { ClusterSpec, NodeDescriptor } from '@/config/schema';
import { probe, type CommandChannel } from '@/infra/channel';
import { registryHost } from '@/infra/kubernetes/helm';
import { PACKAGE_VERSIONS, type PackageName } from '@/infra/packages/catalog';
import {
  BASELINE,
  INSTALL_CONTAINERD,
  INSTALL_GPU_STACK,
  INSTALL_KUBELET_UNITS,
  STAGED,
  START_CONTAINERD,
  registryMirrorCommand,
} from './scripts';

export interface StepContext {
  channel: CommandChannel;
  spec: ClusterSpec;
  node: NodeDescriptor;
  readPackage: (name: PackageName) => Promise<Buffer>;
}

export interface ProvisionStep {
  name: string;
  appliesTo(node: NodeDescriptor): boolean;
  /** Resolves true when the node already has this step's end state */
  isSatisfied(ctx: StepContext): Promise<boolean>;
  apply(ctx: StepContext): Promise<void>;
}

export const baselineStep: ProvisionStep = {
  name: 'system-baseline',
  appliesTo: () => true,
  // every command in the baseline converges, so it always runs
  isSatisfied: async () => false,
  async apply({ channel }) {
    await channel.execute(BASELINE);
  },
};

export const containerRuntimeStep: ProvisionStep = {
  name: 'container-runtime',
  appliesTo: () => true,
  async isSatisfied({ channel }) {
    if (!(await probe(channel, 'systemctl is-active --quiet containerd'))) return false;
    const version = await channel.execute('containerd --version');
    return version.includes(PACKAGE_VERSIONS.containerd);
  },
  async apply({ channel, spec, readPackage }) {
    await channel.upload(await readPackage('containerd'), STAGED.containerd);
    await channel.upload(await readPackage('cni-plugins'), STAGED.cniPlugins);
    await channel.upload(await readPackage('runc'), `${REMOTE_PATHS.SBIN_DIR}/runc`, 0o755);
    await channel.execute(INSTALL_CONTAINERD);
    if (spec.imageRepository !== CLUSTER_DEFAULTS.imageRepository) {
      const host = registryHost(spec.imageRepository).split('/')[0] ?? spec.imageRepository;
      await channel.execute(registryMirrorCommand(host));
    }
    await channel.execute(START_CONTAINERD);
  },
};

export const kubernetesBinariesStep: ProvisionStep = {
  name: 'kubernetes-binaries',
  appliesTo: () => true,
  async isSatisfied({ channel, spec }) {
    if (!(await probe(channel, 'command -v kubeadm && command -v kubelet && command -v kubectl'))) {
      return false;
    }
    const version = (await channel.execute('kubeadm version -o short')).trim();
    return version === spec.version;
  },
  async apply({ channel, readPackage }) {
    for (const binary of ['kubeadm', 'kubelet', 'kubectl'] as const) {
      await channel.upload(await readPackage(binary), `${REMOTE_PATHS.BIN_DIR}/${binary}`, 0o755);
    }
    await channel.execute(INSTALL_KUBELET_UNITS);
  },
};

export const gpuStackStep: ProvisionStep = {
  name: 'gpu-stack',
  appliesTo: (node) => node.gpu,
  isSatisfied: ({ channel }) => probe(channel, 'nvidia-smi'),
  async apply({ channel }) {
    await channel.execute(INSTALL_GPU_STACK);
  },
};

export const PROVISION_PIPELINE: readonly ProvisionStep[] = [
  baselineStep,
  containerRuntimeStep,
  kubernetesBinariesStep,
  gpuStackStep,
];

/**
 * Offline package catalog
 *
 * Binaries and charts are fetched ahead of time into the package directory;
 * provisioning only reads them from here.
 */

import { access, readFile } from 'node:fs/promises';
import { join } from 'node:path';

export const PACKAGE_VERSIONS = {
  containerd: '2.2.0',
  cniPlugins: 'v1.8.0',
  cilium: '1.18.4',
  metallb: '0.15.2',
} as const;

export type PackageName =
  | 'containerd'
  | 'runc'
  | 'cni-plugins'
  | 'kubeadm'
  | 'kubelet'
  | 'kubectl'
  | 'helm'
  | 'cilium-chart'
  | 'metallb-chart';

export const RUNTIME_PACKAGES: readonly PackageName[] = ['containerd', 'runc', 'cni-plugins'];
export const KUBERNETES_PACKAGES: readonly PackageName[] = ['kubeadm', 'kubelet', 'kubectl'];
export const ADDON_PACKAGES: readonly PackageName[] = ['helm', 'cilium-chart', 'metallb-chart'];

function relativePath(name: PackageName, kubernetesVersion: string): string {
  switch (name) {
    case 'containerd':
      return `containerd/containerd-${PACKAGE_VERSIONS.containerd}-linux-amd64.tar.gz`;
    case 'runc':
      return 'containerd/runc.amd64';
    case 'cni-plugins':
      return `containerd/cni-plugins-linux-amd64-${PACKAGE_VERSIONS.cniPlugins}.tgz`;
    case 'kubeadm':
    case 'kubelet':
    case 'kubectl':
      return `kubernetes/${kubernetesVersion}/${name}`;
    case 'helm':
      return 'helm/linux-amd64/helm';
    case 'cilium-chart':
      return `cilium/cilium-${PACKAGE_VERSIONS.cilium}.tgz`;
    case 'metallb-chart':
      return `metallb/metallb-${PACKAGE_VERSIONS.metallb}.tgz`;
  }
}

export interface PackageSource {
  read(name: PackageName, kubernetesVersion: string): Promise<Buffer>;
  missing(names: readonly PackageName[], kubernetesVersion: string): Promise<PackageName[]>;
}

export class PackageCatalog implements PackageSource {
  constructor(readonly root: string) {}

  path(name: PackageName, kubernetesVersion: string): string {
    return join(this.root, relativePath(name, kubernetesVersion));
  }

  async read(name: PackageName, kubernetesVersion: string): Promise<Buffer> {
    return readFile(this.path(name, kubernetesVersion));
  }

  /**
   * Names of the packages that are not present on disk.
   */
  async missing(names: readonly PackageName[], kubernetesVersion: string): Promise<PackageName[]> {
    const checks = await Promise.all(
      names.map(async (name) => {
        try {
          await access(this.path(name, kubernetesVersion));
          return undefined;
        } catch {
          return name;
        }
      }),
    );
    return checks.filter((name): name is PackageName => name !== undefined);
  }
}

/**
 * helm command builders and binary bootstrap.
 */

import { REMOTE_PATHS } from '@/config/constants';
import { probe, type CommandChannel } from '@/infra/channel';
import { shellQuote } from '@/lib/shell';

export interface HelmRelease {
  release: string;
  chart: string;
  namespace: string;
  valuesFile?: string;
  set?: Record<string, string>;
  createNamespace?: boolean;
  wait?: boolean;
}

/**
 * `helm upgrade --install` so a re-run converges instead of failing on an
 * existing release.
 */
export function upgradeInstallCommand(release: HelmRelease): string {
  const parts = [
    'helm upgrade --install',
    shellQuote(release.release),
    shellQuote(release.chart),
    `--namespace ${shellQuote(release.namespace)}`,
  ];
  if (release.createNamespace) parts.push('--create-namespace');
  if (release.valuesFile) parts.push(`--values ${shellQuote(release.valuesFile)}`);
  for (const [key, value] of Object.entries(release.set ?? {})) {
    parts.push(`--set ${shellQuote(`${key}=${value}`)}`);
  }
  if (release.wait) parts.push('--wait');
  return parts.join(' ');
}

/**
 * Installs the helm binary unless one is already on PATH.
 */
export async function ensureHelm(channel: CommandChannel, binary: () => Promise<Buffer>): Promise<boolean> {
  if (await probe(channel, 'command -v helm')) return false;
  await channel.upload(await binary(), `${REMOTE_PATHS.BIN_DIR}/helm`, 0o755);
  return true;
}

/**
 * Registry host without scheme, used as an image repository prefix.
 */
export function registryHost(imageRepository: string): string {
  return imageRepository.replace(/^https?:\/\//, '').replace(/\/+$/, '');
}

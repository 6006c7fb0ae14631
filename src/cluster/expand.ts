/**
 * Adding nodes to a managed cluster
 *
 * The cluster file lists every node, old and new; `addresses` picks the new
 * ones. Existing nodes are not touched beyond their /etc/hosts block.
 */

import { confirmStep, type CommandContext } from '@/core/context';
import { KUBERNETES } from '@/config/constants';
import { controlPlaneEndpoint, type ClusterSpec, type NodeDescriptor } from '@/config/schema';
import type { CommandChannel } from '@/infra/channel';
import { issueJoinCredential } from '@/infra/kubernetes/kubeadm';
import { UserCancelledError, ValidationError, extractErrorMessage, wrapPhase } from '@/lib/errors';
import { setupVipFailover } from './bootstrap/ha';
import { labelGpuNodes } from './bootstrap/finalize';
import { joinMasters, joinWorkers } from './bootstrap/joins';
import { distributeHosts } from './provision/hosts';
import { distributeManagedKey } from './provision/keys';
import { checkConnectivity, provisionNodes, type NodeProvisionReport } from './provision/provisioner';
import { assertImmutableFields } from './reconcile/immutable';
import { labelManagedNodes, loadState, updateState, verifyOwnership } from './state/store';

export interface AddNodesOptions {
  skipProvision?: boolean;
}

export interface AddNodesReport {
  cluster: string;
  added: string[];
  provisioning: NodeProvisionReport[];
  warnings: string[];
}

/**
 * The nodes named by `addresses`; each must be in the cluster file and
 * absent from the stored state.
 */
export function selectNewNodes(
  spec: ClusterSpec,
  stored: ClusterSpec,
  addresses: readonly string[],
): NodeDescriptor[] {
  const issues: string[] = [];
  if (addresses.length === 0) issues.push('no node addresses given');

  const known = new Set(stored.nodes.map((n) => n.address));
  const selected: NodeDescriptor[] = [];
  for (const address of addresses) {
    const node = spec.nodes.find((n) => n.address === address);
    if (!node) issues.push(`${address} is not listed in the cluster file`);
    else if (known.has(address)) issues.push(`${address} is already part of the cluster`);
    else selected.push(node);
  }

  const missing = stored.nodes.filter((old) => !spec.nodes.some((n) => n.address === old.address));
  for (const node of missing) {
    issues.push(`${node.address} (${node.hostname}) is in the cluster but missing from the cluster file`);
  }

  if (issues.length > 0) throw new ValidationError(issues);
  return selected;
}

export async function addNodes(
  ctx: CommandContext,
  channel: CommandChannel,
  spec: ClusterSpec,
  addresses: readonly string[],
  options: AddNodesOptions = {},
): Promise<AddNodesReport> {
  await verifyOwnership(channel);
  const stored = await loadState(channel, spec.name, ctx.logger);
  assertImmutableFields(stored.spec, spec);
  const added = selectNewNodes(spec, stored.spec, addresses);
  const listing = added.map((n) => `${n.hostname} (${n.address}, ${n.role})`).join(', ');
  if (!(await confirmStep(ctx, `Add ${added.length} node(s) to ${spec.name}: ${listing}?`))) {
    throw new UserCancelledError('Adding nodes was cancelled');
  }

  const report: AddNodesReport = {
    cluster: spec.name,
    added: added.map((n) => n.hostname),
    provisioning: [],
    warnings: [],
  };
  const newMasters = added.filter((n) => n.role === 'master');
  const newWorkers = added.filter((n) => n.role === 'worker');
  const endpoint = controlPlaneEndpoint(spec, KUBERNETES.API_PORT);

  let phase = 'connectivity';
  try {
    await checkConnectivity(ctx, added);

    phase = 'preparation';
    const keyless = await distributeManagedKey(ctx, added);
    if (keyless.length > 0) report.warnings.push(`Managed key not installed on: ${keyless.join(', ')}`);
    const hostless = await distributeHosts(ctx, spec);
    if (hostless.length > 0) report.warnings.push(`/etc/hosts not updated on: ${hostless.join(', ')}`);

    if (!options.skipProvision) {
      phase = 'provisioning';
      report.provisioning = await provisionNodes(ctx, spec, added);
    }

    phase = 'join-credentials';
    const credential = await issueJoinCredential(channel, newMasters.length > 0);

    phase = 'master-join';
    await joinMasters(ctx, newMasters, endpoint, credential);
    await setupVipFailover(ctx, spec, newMasters);

    phase = 'worker-join';
    await joinWorkers(ctx, newWorkers, endpoint, credential);
  } catch (error) {
    throw wrapPhase(phase, undefined, error);
  }

  report.warnings.push(...(await labelGpuNodes(ctx, channel, added)));
  try {
    await labelManagedNodes(channel, report.added);
    await updateState(channel, spec, ctx.clock());
  } catch (error) {
    const message = `Cluster state not updated: ${extractErrorMessage(error)}`;
    ctx.logger.warn(message);
    report.warnings.push(message);
  }

  ctx.logger.info({ cluster: spec.name, added: report.added }, 'Nodes added');
  return report;
}

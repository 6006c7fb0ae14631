/**
 * Concurrent Node Provisioner
 *
 * One task per node, each with its own channel. A failing node never stops
 * its siblings; all failures are reported together once every task is done.
 */

import type { CommandContext } from '@/core/context';
import type { ClusterSpec, NodeDescriptor } from '@/config/schema';
import { withChannel } from '@/infra/channel';
import {
  KUBERNETES_PACKAGES,
  RUNTIME_PACKAGES,
  type PackageName,
  type PackageSource,
} from '@/infra/packages/catalog';
import { ERROR_MESSAGES, PhaseError, ValidationError } from '@/lib/errors';
import { ProgressLog, fanOutOrThrow } from '@/lib/fanout';
import { PROVISION_PIPELINE, type ProvisionStep } from './steps';

export type StepStatus = 'applied' | 'skipped';

export interface NodeProvisionReport {
  node: string;
  steps: Array<{ step: string; status: StepStatus }>;
}

export interface ProvisionOptions {
  pipeline?: readonly ProvisionStep[];
  progress?: ProgressLog;
}

/**
 * Reads each package at most once per batch, shared by every node task.
 */
export function memoizePackages(
  source: PackageSource,
  kubernetesVersion: string,
): (name: PackageName) => Promise<Buffer> {
  const cache = new Map<PackageName, Promise<Buffer>>();
  return (name) => {
    let pending = cache.get(name);
    if (!pending) {
      pending = source.read(name, kubernetesVersion);
      cache.set(name, pending);
    }
    return pending;
  };
}

export async function assertPackagesPresent(
  source: PackageSource,
  spec: ClusterSpec,
  names: readonly PackageName[],
): Promise<void> {
  const missing = await source.missing(names, spec.version);
  if (missing.length > 0) {
    throw new ValidationError([ERROR_MESSAGES.PACKAGES_MISSING(missing)]);
  }
}

export async function runPipeline(
  ctx: CommandContext,
  spec: ClusterSpec,
  node: NodeDescriptor,
  readPackage: (name: PackageName) => Promise<Buffer>,
  options: Required<ProvisionOptions>,
): Promise<NodeProvisionReport> {
  const report: NodeProvisionReport = { node: node.hostname, steps: [] };

  await withChannel(ctx.openChannel, node, async (channel) => {
    const stepContext = { channel, spec, node, readPackage };
    for (const step of options.pipeline) {
      if (!step.appliesTo(node)) continue;
      options.progress.record(node.hostname, step.name, 'started');
      try {
        if (await step.isSatisfied(stepContext)) {
          options.progress.record(node.hostname, step.name, 'skipped');
          report.steps.push({ step: step.name, status: 'skipped' });
          continue;
        }
        await step.apply(stepContext);
      } catch (error) {
        options.progress.record(node.hostname, step.name, 'failed');
        throw new PhaseError(step.name, node.hostname, error);
      }
      options.progress.record(node.hostname, step.name, 'done');
      report.steps.push({ step: step.name, status: 'applied' });
    }
  });

  return report;
}

/**
 * Provisions every node in parallel. Throws `NodeBatchError` naming each
 * failed node after all tasks have finished.
 */
export async function provisionNodes(
  ctx: CommandContext,
  spec: ClusterSpec,
  nodes: readonly NodeDescriptor[],
  options: ProvisionOptions = {},
): Promise<NodeProvisionReport[]> {
  const resolved: Required<ProvisionOptions> = {
    pipeline: options.pipeline ?? PROVISION_PIPELINE,
    progress: options.progress ?? new ProgressLog(ctx.logger, ctx.clock),
  };
  await assertPackagesPresent(ctx.packages, spec, [...RUNTIME_PACKAGES, ...KUBERNETES_PACKAGES]);

  const readPackage = memoizePackages(ctx.packages, spec.version);
  ctx.logger.info({ nodes: nodes.length }, 'Provisioning nodes');

  return fanOutOrThrow('Provisioning', nodes, {
    key: (node) => node.hostname,
    run: (node) => runPipeline(ctx, spec, node, readPackage, resolved),
    phase: (_node, error) => (error instanceof PhaseError ? error.phase : 'connect'),
  });
}

/**
 * Runs `hostname` on every node to surface unreachable hosts and bad
 * credentials before anything is changed.
 */
export async function checkConnectivity(
  ctx: CommandContext,
  nodes: readonly NodeDescriptor[],
): Promise<void> {
  await fanOutOrThrow('Connectivity check', nodes, {
    key: (node) => node.hostname,
    run: (node) => withChannel(ctx.openChannel, node, (channel) => channel.execute('hostname')),
    phase: () => 'connectivity',
  });
  ctx.logger.info({ nodes: nodes.length }, 'All nodes reachable');
}

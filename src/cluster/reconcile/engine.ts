/**
 * Reconciliation Engine
 *
 * ownership -> stored state -> immutable fields -> diff -> confirmation ->
 * apply -> persist. Nothing changes on the cluster before the confirmation.
 */

import type { CommandContext } from '@/core/context';
import { ADDONS } from '@/config/constants';
import type { ClusterSpec } from '@/config/schema';
import type { CommandChannel } from '@/infra/channel';
import { shellQuote } from '@/lib/shell';
import { StateNotFoundError, UserCancelledError, ValidationError, extractErrorMessage } from '@/lib/errors';
import { applyCiliumRelease, waitForCilium } from '@/cluster/addons/cilium';
import { applyLoadBalancerResources, installMetalLb } from '@/cluster/addons/metallb';
import { Kubectl } from '@/infra/kubernetes/kubectl';
import { bgpAdvertisement } from '@/infra/kubernetes/manifests';
import { loadState, updateState, verifyOwnership } from '@/cluster/state/store';
import { describeChange, diffBgp, diffSpecs, type ChangeKind, type ConfigChange } from './diff';
import { assertImmutableFields } from './immutable';

export type UpdateMode = 'bgpOnly' | 'full';

export interface UpdateReport {
  cluster: string;
  mode: UpdateMode;
  changes: ConfigChange[];
  /** Kinds whose apply routine ran */
  applied: ChangeKind[];
  /** Changes with no apply routine; nothing was done for them */
  unapplied: ConfigChange[];
  persisted: boolean;
  warnings: string[];
}

export type ApplyRoutine = (ctx: CommandContext, spec: ClusterSpec, channel: CommandChannel) => Promise<void>;

/**
 * Installs or refreshes MetalLB and its resources, or removes the BGP
 * resources when BGP was turned off.
 */
export const applyBgp: ApplyRoutine = async (ctx, spec, channel) => {
  if (spec.addons.bgp.enabled) {
    await installMetalLb(ctx, spec, channel);
    return;
  }
  const ns = shellQuote(ADDONS.METALLB_NAMESPACE);
  const kubectl = new Kubectl(channel);
  await kubectl.run(`delete bgppeers.metallb.io --all -n ${ns} --ignore-not-found`);
  await kubectl.run(
    `delete bgpadvertisements.metallb.io ${shellQuote(bgpAdvertisement(spec.name).metadata.name)} -n ${ns} --ignore-not-found`,
  );
  if (spec.addons.loadBalancer.mode === 'l2') await applyLoadBalancerResources(channel, spec);
  ctx.logger.info('BGP resources removed');
};

/**
 * `helm upgrade` of Cilium with re-rendered values, then a readiness wait.
 */
export const upgradeCilium: ApplyRoutine = async (ctx, spec, channel) => {
  const logger = ctx.logger.child({ phase: 'cilium-upgrade' });
  await applyCiliumRelease(ctx, spec, channel);
  await waitForCilium(ctx, new Kubectl(channel), logger);
  logger.info('Cilium upgraded');
};

export const APPLY_ROUTINES: Readonly<Partial<Record<ChangeKind, ApplyRoutine>>> = {
  BGP: applyBgp,
  LoadBalancer: upgradeCilium,
  Gateway: upgradeCilium,
  Observability: upgradeCilium,
};

export interface UpdateOptions {
  mode?: UpdateMode;
  routines?: Readonly<Partial<Record<ChangeKind, ApplyRoutine>>>;
}

async function loadPrevious(
  ctx: CommandContext,
  channel: CommandChannel,
  cluster: string,
): Promise<ClusterSpec | undefined> {
  try {
    return (await loadState(channel, cluster, ctx.logger)).spec;
  } catch (error) {
    if (!(error instanceof StateNotFoundError)) throw error;
    ctx.logger.warn({ cluster }, 'No stored state; immutable fields cannot be checked');
    return undefined;
  }
}

async function confirmChanges(ctx: CommandContext, changes: readonly ConfigChange[]): Promise<void> {
  for (const change of changes) {
    ctx.logger.info({ kind: change.kind, component: change.component }, describeChange(change));
  }
  if (ctx.autoConfirm) return;

  const listing = changes.map((change) => `  - ${describeChange(change)}`).join('\n');
  const confirmed = await ctx.prompter.confirm(`The following changes will be applied:\n${listing}\nApply them?`);
  if (!confirmed) throw new UserCancelledError('Update cancelled; no changes were applied');
}

/**
 * Each routine runs at most once, even when several kinds share it.
 */
async function applyChanges(
  ctx: CommandContext,
  spec: ClusterSpec,
  channel: CommandChannel,
  changes: readonly ConfigChange[],
  routines: Readonly<Partial<Record<ChangeKind, ApplyRoutine>>>,
): Promise<{ applied: ChangeKind[]; unapplied: ConfigChange[] }> {
  const ran = new Set<ApplyRoutine>();
  const applied: ChangeKind[] = [];
  const unapplied: ConfigChange[] = [];

  for (const change of changes) {
    const routine = routines[change.kind];
    if (!routine) {
      unapplied.push(change);
      continue;
    }
    if (!applied.includes(change.kind)) applied.push(change.kind);
    if (ran.has(routine)) continue;
    ran.add(routine);
    await routine(ctx, spec, channel);
  }

  for (const change of unapplied) {
    ctx.logger.warn({ kind: change.kind, component: change.component }, `Not applied automatically: ${change.description}`);
  }
  return { applied, unapplied };
}

export async function reconcileCluster(
  ctx: CommandContext,
  channel: CommandChannel,
  next: ClusterSpec,
  options: UpdateOptions = {},
): Promise<UpdateReport> {
  const mode = options.mode ?? 'full';
  const routines = options.routines ?? APPLY_ROUTINES;
  const report: UpdateReport = {
    cluster: next.name,
    mode,
    changes: [],
    applied: [],
    unapplied: [],
    persisted: false,
    warnings: [],
  };

  await verifyOwnership(channel);
  const previous = await loadPrevious(ctx, channel, next.name);
  if (previous) assertImmutableFields(previous, next);
  if (mode === 'bgpOnly' && !next.addons.bgp.enabled) {
    throw new ValidationError(['addons.bgp.enabled must be true to update BGP settings']);
  }

  report.changes = mode === 'bgpOnly' ? diffBgp(previous, next) : diffSpecs(previous, next);
  if (report.changes.length === 0) {
    ctx.logger.info({ cluster: next.name }, 'No configuration changes detected');
    return report;
  }

  await confirmChanges(ctx, report.changes);

  if (mode === 'bgpOnly') {
    await (routines.BGP ?? applyBgp)(ctx, next, channel);
    report.applied = ['BGP'];
  } else {
    const outcome = await applyChanges(ctx, next, channel, report.changes, routines);
    report.applied = outcome.applied;
    report.unapplied = outcome.unapplied;
  }

  try {
    await updateState(channel, next, ctx.clock());
    report.persisted = true;
  } catch (error) {
    const message = `Cluster state not updated: ${extractErrorMessage(error)}`;
    ctx.logger.warn(message);
    report.warnings.push(message);
  }
  return report;
}

/**
 * Bootstrap Sequencer
 *
 * Drives a cluster from bare hosts to `Done` through a fixed series of
 * states. There is no rollback: a failure leaves the machine in `Failed` with
 * the phase recorded, and a re-run converges because every step is
 * idempotent.
 *
 * Everything before `FirstMasterInitializing` is preflight and preparation;
 * the existing-control-plane decision is made there, before any mutation.
 */

import { confirmStep, type CommandContext } from '@/core/context';
import { KUBERNETES } from '@/config/constants';
import { controlPlaneEndpoint, masters, workers, type ClusterSpec } from '@/config/schema';
import type { CommandChannel } from '@/infra/channel';
import { issueJoinCredential, type CertificateKeyExtractor } from '@/infra/kubernetes/kubeadm';
import { ERROR_MESSAGES, PhaseError, UserCancelledError, ValidationError, extractErrorMessage, wrapPhase } from '@/lib/errors';
import { ProgressLog } from '@/lib/fanout';
import { installCilium } from '@/cluster/addons/cilium';
import { installMetalLb, needsLoadBalancerAddon } from '@/cluster/addons/metallb';
import { checkConnectivity, provisionNodes, type NodeProvisionReport } from '@/cluster/provision/provisioner';
import { distributeHosts } from '@/cluster/provision/hosts';
import { distributeManagedKey } from '@/cluster/provision/keys';
import { labelManagedNodes, saveState } from '@/cluster/state/store';
import { decideExistingControlPlane, initFirstMaster } from './first-master';
import { setupVipFailover } from './ha';
import { joinMasters, joinWorkers } from './joins';
import { labelGpuNodes, validateCluster } from './finalize';

export const BOOTSTRAP_STATES = [
  'Unconfigured',
  'FirstMasterInitializing',
  'FirstMasterReady',
  'OtherMastersJoining',
  'AddonsInstalling',
  'WorkersJoining',
  'GPUTagging',
  'Validating',
  'Done',
] as const;

export type BootstrapState = (typeof BOOTSTRAP_STATES)[number] | 'Failed';

export interface StateTransition {
  from: BootstrapState;
  to: BootstrapState;
  at: Date;
}

export interface BootstrapReport {
  cluster: string;
  state: BootstrapState;
  transitions: StateTransition[];
  endpoint: string;
  warnings: string[];
  provisioning: NodeProvisionReport[];
  failedPhase?: string;
  failedNode?: string;
}

export interface BootstrapOptions {
  /** Nodes are already provisioned; skip the provisioning batch */
  skipProvision?: boolean;
  extractor?: CertificateKeyExtractor;
  progress?: ProgressLog;
}

export class BootstrapSequencer {
  private readonly current: BootstrapReport;
  private readonly progress: ProgressLog;

  constructor(
    private readonly ctx: CommandContext,
    private readonly spec: ClusterSpec,
    private readonly options: BootstrapOptions = {},
  ) {
    this.progress = options.progress ?? new ProgressLog(ctx.logger, ctx.clock);
    this.current = {
      cluster: spec.name,
      state: 'Unconfigured',
      transitions: [],
      endpoint: controlPlaneEndpoint(spec, KUBERNETES.API_PORT),
      warnings: [],
      provisioning: [],
    };
  }

  get report(): BootstrapReport {
    return { ...this.current, transitions: [...this.current.transitions], warnings: [...this.current.warnings] };
  }

  /**
   * Runs to `Done`. On failure the report is left in `Failed` and the error
   * is rethrown wrapped with its phase.
   */
  async run(): Promise<BootstrapReport> {
    const [firstMaster, ...otherMasters] = masters(this.spec);
    if (!firstMaster) throw new ValidationError([ERROR_MESSAGES.NO_MASTER]);

    const question = `Create cluster ${this.spec.name} (${this.spec.version}) on ${this.spec.nodes.length} node(s)?`;
    if (!(await confirmStep(this.ctx, question))) {
      throw new UserCancelledError('Cluster creation cancelled');
    }

    let phase = 'connectivity';
    let node: string | undefined;
    const channel = this.ctx.openChannel(firstMaster);
    try {
      await checkConnectivity(this.ctx, this.spec.nodes);
      phase = 'existing-control-plane';
      node = firstMaster.hostname;
      const decision = await decideExistingControlPlane(this.ctx, channel, firstMaster);
      node = undefined;

      phase = 'preparation';
      await this.prepare();
      if (!this.options.skipProvision) {
        phase = 'provisioning';
        this.current.provisioning = await provisionNodes(this.ctx, this.spec, this.spec.nodes, {
          progress: this.progress,
        });
      }

      phase = 'first-master-init';
      node = firstMaster.hostname;
      this.advance('FirstMasterInitializing');
      await initFirstMaster(this.ctx, this.spec, firstMaster, channel, decision);

      phase = 'join-credentials';
      this.advance('FirstMasterReady');
      const credential = await issueJoinCredential(channel, otherMasters.length > 0, this.options.extractor);
      node = undefined;

      phase = 'master-join';
      this.advance('OtherMastersJoining');
      await joinMasters(this.ctx, otherMasters, this.current.endpoint, credential);

      phase = 'addons';
      node = firstMaster.hostname;
      this.advance('AddonsInstalling');
      await this.installAddons(channel);

      phase = 'worker-join';
      node = undefined;
      this.advance('WorkersJoining');
      await joinWorkers(this.ctx, workers(this.spec), this.current.endpoint, credential);

      phase = 'gpu-tagging';
      this.advance('GPUTagging');
      this.warn(...(await labelGpuNodes(this.ctx, channel, this.spec.nodes)));

      phase = 'validation';
      node = firstMaster.hostname;
      this.advance('Validating');
      const validation = await validateCluster(this.ctx, channel);
      this.warn(...validation.warnings);
      await this.finalize(channel);

      this.advance('Done');
      this.ctx.logger.info({ cluster: this.spec.name, endpoint: this.current.endpoint }, 'Cluster ready');
      return this.report;
    } catch (error) {
      this.fail(phase, node, error);
      throw wrapPhase(phase, node, error);
    } finally {
      await channel.close();
    }
  }

  private advance(to: BootstrapState): void {
    const from = this.current.state;
    const expected = BOOTSTRAP_STATES[BOOTSTRAP_STATES.findIndex((s) => s === from) + 1];
    if (to !== expected) {
      throw new Error(`Illegal bootstrap transition ${from} -> ${to}`);
    }
    this.record(from, to);
  }

  private fail(phase: string, node: string | undefined, error: unknown): void {
    const failed = error instanceof PhaseError ? error : undefined;
    this.current.failedPhase = failed?.phase ?? phase;
    const failedNode = failed?.node ?? node;
    if (failedNode !== undefined) this.current.failedNode = failedNode;
    this.record(this.current.state, 'Failed');
  }

  private record(from: BootstrapState, to: BootstrapState): void {
    this.current.transitions.push({ from, to, at: this.ctx.clock() });
    this.current.state = to;
    this.ctx.logger.info({ from, to }, 'Bootstrap state changed');
    this.ctx.progress?.(`${from} -> ${to}`);
  }

  private warn(...messages: string[]): void {
    this.current.warnings.push(...messages);
  }

  /**
   * Managed key, /etc/hosts and VIP failover. The first two are best-effort.
   */
  private async prepare(): Promise<void> {
    const keyless = await distributeManagedKey(this.ctx, this.spec.nodes);
    if (keyless.length > 0) this.warn(`Managed key not installed on: ${keyless.join(', ')}`);

    const hostless = await distributeHosts(this.ctx, this.spec);
    if (hostless.length > 0) this.warn(`/etc/hosts not updated on: ${hostless.join(', ')}`);

    await setupVipFailover(this.ctx, this.spec);
  }

  private async installAddons(channel: CommandChannel): Promise<void> {
    this.warn(...(await installCilium(this.ctx, this.spec, channel)));
    if (needsLoadBalancerAddon(this.spec)) {
      await installMetalLb(this.ctx, this.spec, channel);
    }
  }

  /**
   * Marks every node as managed and persists the spec. Failures only warn.
   */
  private async finalize(channel: CommandChannel): Promise<void> {
    try {
      await labelManagedNodes(channel, this.spec.nodes.map((n) => n.hostname));
      await saveState(channel, this.spec, this.ctx.clock());
      this.ctx.logger.info('Cluster state persisted');
    } catch (error) {
      const message = `Cluster state not persisted: ${extractErrorMessage(error)}`;
      this.ctx.logger.warn(message);
      this.warn(message);
    }
  }
}

export async function bootstrapCluster(
  ctx: CommandContext,
  spec: ClusterSpec,
  options?: BootstrapOptions,
): Promise<BootstrapReport> {
  return new BootstrapSequencer(ctx, spec, options).run();
}

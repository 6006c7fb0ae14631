/**
 * Application entry points
 *
 * Each operation loads the cluster file, builds a command context and
 * converts anything thrown below it into a `Failure` result.
 */

import type { Logger } from 'pino';
import type { AppConfig } from '@/config/index';
import { loadClusterFile } from '@/config/loader';
import { masters, workers, type ClusterSpec } from '@/config/schema';
import { createCommandContext, type CommandContext, type ProgressReporter } from '@/core/context';
import { KUBERNETES_PACKAGES, RUNTIME_PACKAGES, ADDON_PACKAGES } from '@/infra/packages/catalog';
import { createLogger } from '@/lib/logger';
import type { Prompter } from '@/lib/prompt';
import { Success, type Result } from '@/types/core';
import { toFailure } from '@/lib/errors';
import { BootstrapSequencer, type BootstrapReport } from '@/cluster/bootstrap/sequencer';
import { addNodes as expandCluster, type AddNodesReport } from '@/cluster/expand';
import { fetchKubeconfig as copyKubeconfig, showClusterInfo as describeCluster, type ClusterInfo } from '@/cluster/inspect';
import { withManagementChannel, type ManagementRoute } from '@/cluster/management';
import { reconcileCluster, type UpdateReport } from '@/cluster/reconcile/engine';

export interface AppRuntimeConfig {
  logger?: Logger;
  prompter?: Prompter;
  config?: AppConfig;
  progress?: ProgressReporter;
  /** Replaces context construction, e.g. to inject fake channels */
  contextFactory?: (flags: ContextFlags) => CommandContext;
}

export interface ContextFlags {
  autoConfirm: boolean;
  forceReset: boolean;
}

export interface CreateOptions {
  yes?: boolean;
  forceReset?: boolean;
  skipProvision?: boolean;
}

export interface UpdateOptions {
  yes?: boolean;
  bgpOnly?: boolean;
  via?: ManagementRoute;
}

export interface AddNodesOptions {
  yes?: boolean;
  skipProvision?: boolean;
}

export interface ValidationSummary {
  name: string;
  version: string;
  masters: string[];
  workers: string[];
  missingPackages: string[];
}

export interface ClusterApp {
  createCluster(file: string, options?: CreateOptions): Promise<Result<BootstrapReport>>;
  updateCluster(file: string, options?: UpdateOptions): Promise<Result<UpdateReport>>;
  addNodes(file: string, addresses: readonly string[], options?: AddNodesOptions): Promise<Result<AddNodesReport>>;
  showClusterInfo(file: string, via?: ManagementRoute): Promise<Result<ClusterInfo>>;
  validateClusterFile(file: string): Promise<Result<ValidationSummary>>;
  fetchKubeconfig(file: string, outputPath?: string): Promise<Result<string>>;
}

export function createApp(runtime: AppRuntimeConfig = {}): ClusterApp {
  const logger = runtime.logger ?? createLogger({ name: 'clusterwright' });

  const contextFor = (flags: ContextFlags): CommandContext =>
    runtime.contextFactory
      ? runtime.contextFactory(flags)
      : createCommandContext({
          logger,
          ...flags,
          ...(runtime.prompter && { prompter: runtime.prompter }),
          ...(runtime.config && { config: runtime.config }),
          ...(runtime.progress && { progress: runtime.progress }),
        });

  async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<Result<T>> {
    try {
      return Success(await fn());
    } catch (error) {
      const failure = toFailure(error);
      if (!failure.ok) logger.error({ operation, code: failure.code }, failure.error);
      return failure;
    }
  }

  async function withSpec<T>(file: string, fn: (spec: ClusterSpec) => Promise<T>): Promise<T> {
    const spec = await loadClusterFile(file);
    return fn(spec);
  }

  return {
    createCluster(file, options = {}) {
      return guarded('create', () =>
        withSpec(file, async (spec) => {
          const ctx = contextFor({ autoConfirm: options.yes ?? false, forceReset: options.forceReset ?? false });
          const sequencer = new BootstrapSequencer(ctx, spec, {
            ...(options.skipProvision !== undefined && { skipProvision: options.skipProvision }),
          });
          try {
            return await sequencer.run();
          } finally {
            const { state, failedPhase, failedNode } = sequencer.report;
            if (state === 'Failed') logger.error({ failedPhase, failedNode }, 'Bootstrap stopped');
          }
        }),
      );
    },

    updateCluster(file, options = {}) {
      return guarded('update', () =>
        withSpec(file, (spec) => {
          const ctx = contextFor({ autoConfirm: options.yes ?? false, forceReset: false });
          return withManagementChannel(ctx, spec, options.via ?? 'first-master', (channel) =>
            reconcileCluster(ctx, channel, spec, { mode: options.bgpOnly ? 'bgpOnly' : 'full' }),
          );
        }),
      );
    },

    addNodes(file, addresses, options = {}) {
      return guarded('add-nodes', () =>
        withSpec(file, (spec) => {
          const ctx = contextFor({ autoConfirm: options.yes ?? false, forceReset: false });
          return withManagementChannel(ctx, spec, 'first-master', (channel) =>
            expandCluster(ctx, channel, spec, addresses, {
              ...(options.skipProvision !== undefined && { skipProvision: options.skipProvision }),
            }),
          );
        }),
      );
    },

    showClusterInfo(file, via = 'first-master') {
      return guarded('info', () =>
        withSpec(file, (spec) => {
          const ctx = contextFor({ autoConfirm: false, forceReset: false });
          return withManagementChannel(ctx, spec, via, (channel) => describeCluster(ctx, channel, spec.name));
        }),
      );
    },

    validateClusterFile(file) {
      return guarded('validate', () =>
        withSpec(file, async (spec) => {
          const ctx = contextFor({ autoConfirm: false, forceReset: false });
          const missingPackages = await ctx.packages.missing(
            [...RUNTIME_PACKAGES, ...KUBERNETES_PACKAGES, ...ADDON_PACKAGES],
            spec.version,
          );
          return {
            name: spec.name,
            version: spec.version,
            masters: masters(spec).map((n) => n.hostname),
            workers: workers(spec).map((n) => n.hostname),
            missingPackages,
          };
        }),
      );
    },

    fetchKubeconfig(file, outputPath) {
      return guarded('kubeconfig', () =>
        withSpec(file, (spec) => {
          const ctx = contextFor({ autoConfirm: false, forceReset: false });
          return withManagementChannel(ctx, spec, 'first-master', (channel) =>
            copyKubeconfig(ctx, channel, outputPath ?? `${spec.name}.kubeconfig`),
          );
        }),
      );
    },
  };
}

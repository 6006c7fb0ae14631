/**
 * Public API
 */

/**
 * Creates the application: one method per command, each resolving to a
 * `Result` instead of throwing.
 *
 * @example
 * ```typescript
 * import { createApp } from 'clusterwright';
 *
 * const app = createApp();
 * const result = await app.createCluster('./cluster.yaml', { yes: true });
 * if (result.ok) {
 *   console.log('Endpoint:', result.value.endpoint);
 * } else {
 *   console.error(result.error, result.guidance?.resolution);
 * }
 * ```
 */
export { createApp } from './app';
export type {
  ClusterApp,
  AppRuntimeConfig,
  ContextFlags,
  CreateOptions,
  UpdateOptions,
  AddNodesOptions,
  ValidationSummary,
} from './app';

export type { Result, ErrorGuidance } from './types/core';
export { Success, Failure, isSuccess } from './types/core';
export * from './lib/errors';

export { createCommandContext, confirmStep } from './core';
export type { CommandContext, ProgressReporter, ContextOptions } from './core';

export { loadClusterFile, parseClusterYaml, parseClusterSpec } from './config/loader';
export { validateClusterSpec, collectIssues } from './config/validator';
export type { ClusterSpec, ClusterSpecInput, NodeDescriptor, NodeRole, BgpSettings, AddonSettings } from './config/schema';

export type { CommandChannel, ChannelFactory } from './infra/channel';
export { LocalChannel, SshChannel } from './infra/channel';

export { BootstrapSequencer, bootstrapCluster, BOOTSTRAP_STATES } from './cluster/bootstrap/sequencer';
export type { BootstrapReport, BootstrapState, StateTransition } from './cluster/bootstrap/sequencer';
export { reconcileCluster, APPLY_ROUTINES } from './cluster/reconcile/engine';
export type { UpdateReport, UpdateMode, ApplyRoutine } from './cluster/reconcile/engine';
export { diffSpecs, diffBgp } from './cluster/reconcile/diff';
export type { ConfigChange, ChangeKind } from './cluster/reconcile/diff';
export { provisionNodes } from './cluster/provision/provisioner';
export { addNodes } from './cluster/expand';
export { showClusterInfo, fetchKubeconfig } from './cluster/inspect';

/**
 * Command definitions
 *
 * Kept apart from the executable so tests can drive the parser with a fake
 * application and captured output.
 */

import { Command, Option } from 'commander';
import type { ClusterApp, ValidationSummary } from '@/app';
import type { LogLevel } from '@/config/index';
import { TOOL_NAME, TOOL_VERSION } from '@/config/constants';
import type { Result } from '@/types/core';
import type { BootstrapReport } from '@/cluster/bootstrap/sequencer';
import type { AddNodesReport } from '@/cluster/expand';
import type { ClusterInfo } from '@/cluster/inspect';
import type { UpdateReport } from '@/cluster/reconcile/engine';
import { describeChange } from '@/cluster/reconcile/diff';
import { exitCodeFor, provideContextualGuidance } from './guidance';

export interface CliIo {
  /** Command results */
  out: (line: string) => void;
  /** Guidance and errors */
  err: (line: string) => void;
  setExitCode: (code: number) => void;
}

export type AppFactory = (logLevel: LogLevel) => ClusterApp;

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function renderBootstrap(report: BootstrapReport): string[] {
  return [
    `Cluster ${report.cluster} is ${report.state}`,
    `API endpoint: https://${report.endpoint}`,
    ...report.warnings.map((w) => `warning: ${w}`),
  ];
}

export function renderUpdate(report: UpdateReport): string[] {
  if (report.changes.length === 0) return [`No changes for ${report.cluster}`];
  return [
    `Applied ${report.changes.length - report.unapplied.length} of ${report.changes.length} change(s) to ${report.cluster}`,
    ...report.changes.map((c) => `  ${describeChange(c)}`),
    ...report.unapplied.map((c) => `not applied: ${c.description} (apply it on ${c.component} by hand)`),
    ...report.warnings.map((w) => `warning: ${w}`),
  ];
}

export function renderAddNodes(report: AddNodesReport): string[] {
  return [
    `Added to ${report.cluster}: ${report.added.join(', ')}`,
    ...report.warnings.map((w) => `warning: ${w}`),
  ];
}

export function renderInfo(info: ClusterInfo): string[] {
  const lines = [
    `Name:      ${info.name}`,
    `Version:   ${info.version}`,
    `Endpoint:  https://${info.endpoint}`,
    `LB mode:   ${info.addons.loadBalancerMode}${info.addons.bgp ? ' (BGP)' : ''}`,
    `Gateway:   ${info.addons.gateway ? 'enabled' : 'disabled'}`,
    `Hubble:    ${info.addons.observability ? 'enabled' : 'disabled'}`,
  ];
  if (info.deployedAt) lines.push(`Deployed:  ${info.deployedAt}`);
  if (info.updatedAt) lines.push(`Updated:   ${info.updatedAt}`);
  lines.push('Nodes:');
  for (const node of info.nodes) {
    lines.push(`  ${node.hostname.padEnd(28)} ${node.address.padEnd(16)} ${node.role}${node.gpu ? ' gpu' : ''}`);
  }
  lines.push('', info.liveNodes.trimEnd());
  return lines;
}

export function renderValidation(summary: ValidationSummary): string[] {
  const lines = [
    `${summary.name} (${summary.version}) is valid`,
    `  masters: ${summary.masters.join(', ')}`,
    `  workers: ${summary.workers.length > 0 ? summary.workers.join(', ') : '(none)'}`,
  ];
  if (summary.missingPackages.length > 0) {
    lines.push(`  missing packages: ${summary.missingPackages.join(', ')}`);
  }
  return lines;
}

function report<T>(io: CliIo, result: Result<T>, render: (value: T) => string[]): void {
  if (result.ok) {
    render(result.value).forEach((line) => io.out(line));
    io.setExitCode(0);
    return;
  }
  provideContextualGuidance(result, io.err);
  io.setExitCode(exitCodeFor(result.code));
}

export function parseAddressList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function buildProgram(createApp: AppFactory, io: CliIo): Command {
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description('Bootstrap and reconcile multi-master Kubernetes clusters over SSH')
    .version(TOOL_VERSION)
    .addOption(new Option('--log-level <level>', 'pino log level').choices(LOG_LEVELS).default('info'))
    .showHelpAfterError()
    .exitOverride();

  const appFor = (command: Command): ClusterApp => {
    const level = LOG_LEVELS.find((l) => l === command.optsWithGlobals().logLevel) ?? 'info';
    return createApp(level);
  };

  program
    .command('create')
    .description('Create a cluster from a cluster file')
    .requiredOption('-f, --file <path>', 'cluster file')
    .option('-y, --yes', 'answer yes to ordinary confirmations', false)
    .option('--force-reset', 'reset an existing control plane without asking', false)
    .option('--skip-provision', 'nodes already carry the runtime and Kubernetes binaries', false)
    .action(async (opts: { file: string; yes: boolean; forceReset: boolean; skipProvision: boolean }, command: Command) => {
      const result = await appFor(command).createCluster(opts.file, {
        yes: opts.yes,
        forceReset: opts.forceReset,
        skipProvision: opts.skipProvision,
      });
      report(io, result, renderBootstrap);
    });

  program
    .command('update')
    .description('Apply cluster file changes to a running cluster')
    .requiredOption('-f, --file <path>', 'cluster file')
    .option('--bgp-only', 'only reconcile BGP settings', false)
    .option('--local-kubectl', 'use the kubectl of this machine instead of the first master', false)
    .option('-y, --yes', 'apply without asking', false)
    .action(async (opts: { file: string; bgpOnly: boolean; localKubectl: boolean; yes: boolean }, command: Command) => {
      const result = await appFor(command).updateCluster(opts.file, {
        yes: opts.yes,
        bgpOnly: opts.bgpOnly,
        via: opts.localKubectl ? 'local' : 'first-master',
      });
      report(io, result, renderUpdate);
    });

  program
    .command('add-nodes')
    .description('Join new nodes listed in the cluster file')
    .requiredOption('-f, --file <path>', 'cluster file')
    .requiredOption('--nodes <addresses>', 'comma-separated addresses of the new nodes')
    .option('--skip-provision', 'new nodes already carry the binaries', false)
    .option('-y, --yes', 'add without asking', false)
    .action(async (opts: { file: string; nodes: string; skipProvision: boolean; yes: boolean }, command: Command) => {
      const result = await appFor(command).addNodes(opts.file, parseAddressList(opts.nodes), {
        yes: opts.yes,
        skipProvision: opts.skipProvision,
      });
      report(io, result, renderAddNodes);
    });

  program
    .command('info')
    .description('Show the stored configuration and live nodes')
    .requiredOption('-f, --file <path>', 'cluster file')
    .option('--local-kubectl', 'use the kubectl of this machine instead of the first master', false)
    .action(async (opts: { file: string; localKubectl: boolean }, command: Command) => {
      const result = await appFor(command).showClusterInfo(opts.file, opts.localKubectl ? 'local' : 'first-master');
      report(io, result, renderInfo);
    });

  program
    .command('validate')
    .description('Check a cluster file and the package directory')
    .requiredOption('-f, --file <path>', 'cluster file')
    .action(async (opts: { file: string }, command: Command) => {
      const result = await appFor(command).validateClusterFile(opts.file);
      report(io, result, renderValidation);
    });

  program
    .command('kubeconfig')
    .description('Copy the admin kubeconfig from the first master')
    .requiredOption('-f, --file <path>', 'cluster file')
    .option('-o, --output <path>', 'where to write it (default: ./<name>.kubeconfig)')
    .action(async (opts: { file: string; output?: string }, command: Command) => {
      const result = await appFor(command).fetchKubeconfig(opts.file, opts.output);
      report(io, result, (path) => [`Kubeconfig written to ${path}`]);
    });

  return program;
}

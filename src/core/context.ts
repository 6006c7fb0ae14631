/**
 * Command Context
 *
 * Everything a command needs, passed explicitly instead of living in
 * process-wide flag state.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { config as appConfig, type AppConfig } from '@/config/index';
import { DEFAULT_TIMEOUTS } from '@/config/constants';
import type { NodeDescriptor } from '@/config/schema';
import {
  LocalChannel,
  createSshChannelFactory,
  type ChannelFactory,
  type CommandChannel,
  type ManagedIdentity,
} from '@/infra/channel';
import { PackageCatalog, type PackageSource } from '@/infra/packages/catalog';
import type { PollSettings } from '@/lib/poll';
import { createTerminalPrompter, type Prompter } from '@/lib/prompt';

/**
 * Progress reporting callback for long-running commands.
 */
export type ProgressReporter = (message: string, progress?: number, total?: number) => void;

export interface CommandContext {
  logger: Logger;
  prompter: Prompter;
  /** Answer ordinary confirmations with yes */
  autoConfirm: boolean;
  /** Allow resetting an existing control plane without the typed confirmation */
  forceReset: boolean;
  openChannel: ChannelFactory<NodeDescriptor>;
  /** Channel to the operator machine */
  local: CommandChannel;
  /** Private key of the managed identity; `<file>.pub` is distributed to nodes */
  managedKeyFile: string;
  packages: PackageSource;
  poll: PollSettings;
  clock: () => Date;
  progress?: ProgressReporter;
}

export interface ContextOptions {
  logger: Logger;
  autoConfirm?: boolean;
  forceReset?: boolean;
  prompter?: Prompter;
  config?: AppConfig;
  progress?: ProgressReporter;
}

export function createCommandContext(options: ContextOptions): CommandContext {
  const cfg = options.config ?? appConfig;
  const managed: ManagedIdentity = { user: 'root', keyFile: cfg.managedKeyFile };
  return {
    logger: options.logger,
    prompter: options.prompter ?? createTerminalPrompter(),
    autoConfirm: options.autoConfirm ?? false,
    forceReset: options.forceReset ?? false,
    openChannel: createSshChannelFactory({
      logger: options.logger,
      connectTimeoutMs: cfg.sshConnectTimeoutMs,
      managed,
    }),
    local: new LocalChannel(options.logger.child({ node: 'local' })),
    managedKeyFile: cfg.managedKeyFile,
    packages: new PackageCatalog(cfg.packageDir),
    poll: { intervalMs: DEFAULT_TIMEOUTS.pollInterval, sleep: (ms) => delay(ms) },
    clock: () => new Date(),
    ...(options.progress && { progress: options.progress }),
  };
}

/**
 * Asks an ordinary confirmation unless the context is auto-confirmed.
 */
export async function confirmStep(ctx: CommandContext, question: string): Promise<boolean> {
  if (ctx.autoConfirm) return true;
  return ctx.prompter.confirm(question);
}

/**
 * Command contexts wired to fakes
 */

import { jest } from '@jest/globals';
import type { CommandContext } from '@/core/context';
import type { PackageName, PackageSource } from '@/infra/packages/catalog';
import { createSilentLogger } from '@/lib/logger';
import type { Prompter } from '@/lib/prompt';
import { FakeChannel, FakeFleet } from './channel';

export const TEST_NOW = new Date('2026-03-01T12:00:00.000Z');

export function createFakePrompter(answers: { confirm?: boolean; dangerous?: boolean } = {}) {
  return {
    confirm: jest.fn<Prompter['confirm']>().mockResolvedValue(answers.confirm ?? false),
    confirmDangerous: jest.fn<Prompter['confirmDangerous']>().mockResolvedValue(answers.dangerous ?? false),
  };
}

export function createFakePackages(missing: PackageName[] = []) {
  return {
    read: jest.fn<PackageSource['read']>(async (name) => Buffer.from(`package:${name}`)),
    missing: jest.fn<PackageSource['missing']>(async (names) => names.filter((n) => missing.includes(n))),
  };
}

export interface TestContextOptions {
  fleet?: FakeFleet;
  local?: FakeChannel;
  prompter?: Prompter;
  packages?: PackageSource;
  autoConfirm?: boolean;
  forceReset?: boolean;
}

export function createTestContext(options: TestContextOptions = {}): CommandContext {
  const fleet = options.fleet ?? new FakeFleet();
  return {
    logger: createSilentLogger(),
    prompter: options.prompter ?? createFakePrompter(),
    autoConfirm: options.autoConfirm ?? true,
    forceReset: options.forceReset ?? false,
    openChannel: fleet.openChannel,
    local: options.local ?? new FakeChannel('local').on(/^cat /, 'ssh-rsa AAAAB3Nza test-operator\n'),
    managedKeyFile: '/home/operator/.ssh/id_rsa',
    packages: options.packages ?? createFakePackages(),
    poll: { intervalMs: 0, sleep: async () => {} },
    clock: () => TEST_NOW,
  };
}

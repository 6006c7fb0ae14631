/**
 * Contextual guidance for failed commands
 */

import type { ErrorCode } from '@/lib/errors';
import type { ErrorGuidance } from '@/types/core';

export interface FailureView {
  error: string;
  code?: ErrorCode;
  guidance?: ErrorGuidance;
}

/**
 * Extra steps per error code, shown after the failure's own guidance.
 */
const GUIDANCE_STEPS: Partial<Record<ErrorCode, readonly string[]>> = {
  CONNECTION: [
    'Check that every node address is reachable: ping <address>',
    'Confirm sshd listens on the configured port',
    'Raise CLUSTERWRIGHT_SSH_TIMEOUT_MS for slow networks',
  ],
  AUTHENTICATION: [
    'Try the credential by hand: ssh -i <keyFile> <user>@<address>',
    'Non-root users need passwordless sudo or a password in the cluster file',
  ],
  NODE_BATCH: ['Re-run the same command; steps already completed on a node are skipped'],
  VALIDATION: ['Check the cluster file: clusterwright validate -f <file>'],
  OWNERSHIP: ['Label nodes only if this tool really created them: clusterwright.io/managed=true'],
  STATE_NOT_FOUND: ['Make sure kubectl on the first master can read kube-system ConfigMaps'],
};

export function formatFailure(failure: FailureView): string[] {
  const lines = [`Error${failure.code ? ` [${failure.code}]` : ''}: ${failure.error}`];
  const { guidance } = failure;
  if (guidance?.hint) lines.push(`  Cause: ${guidance.hint}`);
  if (guidance?.resolution) lines.push(`  Fix: ${guidance.resolution}`);

  const steps = failure.code ? GUIDANCE_STEPS[failure.code] : undefined;
  if (steps) {
    lines.push('  Troubleshooting:');
    steps.forEach((step, index) => lines.push(`    ${index + 1}. ${step}`));
  }
  return lines;
}

export function provideContextualGuidance(failure: FailureView, write: (line: string) => void): void {
  formatFailure(failure).forEach((line) => write(line));
}

/**
 * Process exit code for a failure: 2 for a cancellation, 1 otherwise.
 */
export function exitCodeFor(code: ErrorCode | undefined): number {
  return code === 'USER_CANCELLED' ? 2 : 1;
}

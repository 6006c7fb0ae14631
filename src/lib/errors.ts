/**
 * Error taxonomy
 *
 * Internal layers throw these classes; entry points convert them into
 * `Failure` results with `toFailure`, keeping the code and guidance intact.
 */

import { Failure, type ErrorGuidance, type Result } from '@/types/core';

export type ErrorCode =
  | 'CONNECTION'
  | 'AUTHENTICATION'
  | 'REMOTE_COMMAND'
  | 'UPLOAD'
  | 'VALIDATION'
  | 'IMMUTABLE_FIELD'
  | 'OWNERSHIP'
  | 'CREDENTIAL_EXTRACTION'
  | 'POLL_TIMEOUT'
  | 'USER_CANCELLED'
  | 'NODE_BATCH'
  | 'PHASE'
  | 'STATE_NOT_FOUND'
  | 'UNKNOWN';

export const ERROR_MESSAGES = {
  CLUSTER_FILE_UNREADABLE: (path: string, reason: string) =>
    `Cannot read cluster file ${path}: ${reason}`,
  PACKAGES_MISSING: (names: string[]) => `Missing offline packages: ${names.join(', ')}`,
  STATE_NOT_FOUND: (cluster: string) => `No persisted state found for cluster "${cluster}"`,
  NO_MASTER: 'Cluster has no master node',
} as const;

export function createErrorGuidance(
  message: string,
  hint?: string,
  resolution?: string,
  details?: Record<string, unknown>,
): ErrorGuidance {
  return {
    message,
    ...(hint !== undefined && { hint }),
    ...(resolution !== undefined && { resolution }),
    ...(details !== undefined && { details }),
  };
}

export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export abstract class DeployerError extends Error {
  abstract readonly code: ErrorCode;

  constructor(
    message: string,
    readonly hint?: string,
    readonly resolution?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  get guidance(): ErrorGuidance {
    return createErrorGuidance(this.message, this.hint, this.resolution, this.details());
  }

  protected details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

export class ConnectionError extends DeployerError {
  readonly code = 'CONNECTION';

  constructor(
    readonly target: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(
      `${target}: ${message}`,
      'The host is unreachable or dropped the session',
      'Check network reachability and that sshd is running on the host',
      options,
    );
  }
}

export class AuthenticationError extends DeployerError {
  readonly code = 'AUTHENTICATION';

  constructor(
    readonly target: string,
    readonly attempts: string[],
  ) {
    super(
      `${target}: authentication failed (${attempts.join('; ')})`,
      'None of the configured credentials were accepted',
      'Verify the SSH user, key file or password for this node',
    );
  }

  protected override details(): Record<string, unknown> {
    return { target: this.target, attempts: this.attempts };
  }
}

export class RemoteCommandError extends DeployerError {
  readonly code = 'REMOTE_COMMAND';

  constructor(
    readonly target: string,
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    super(
      `${target}: command exited with ${exitCode ?? 'signal'}: ${summarize(command)}${
        stderr.trim() ? ` (${stderr.trim()})` : ''
      }`,
    );
  }

  protected override details(): Record<string, unknown> {
    return { target: this.target, exitCode: this.exitCode, stderr: this.stderr };
  }
}

export class UploadError extends DeployerError {
  readonly code = 'UPLOAD';

  constructor(
    readonly target: string,
    readonly remotePath: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`${target}: upload to ${remotePath} failed: ${reason}`, undefined, undefined, options);
  }
}

export class ValidationError extends DeployerError {
  readonly code = 'VALIDATION';

  constructor(readonly issues: string[]) {
    super(
      `Cluster specification is invalid:\n  - ${issues.join('\n  - ')}`,
      'The cluster file does not satisfy the schema or its invariants',
      'Fix every listed issue and re-run',
    );
  }

  protected override details(): Record<string, unknown> {
    return { issues: this.issues };
  }
}

export interface ImmutableViolation {
  field: string;
  oldValue: string;
  newValue: string;
}

export class ImmutableFieldViolationError extends DeployerError {
  readonly code = 'IMMUTABLE_FIELD';

  constructor(readonly violations: ImmutableViolation[]) {
    super(
      `Immutable fields cannot change after creation: ${violations
        .map((v) => `${v.field} (${v.oldValue} -> ${v.newValue})`)
        .join(', ')}`,
      'These fields are fixed once the cluster exists',
      'Restore the original values, or rebuild the cluster',
    );
  }

  protected override details(): Record<string, unknown> {
    return { violations: this.violations };
  }
}

export class OwnershipError extends DeployerError {
  readonly code = 'OWNERSHIP';

  constructor(message: string) {
    super(
      message,
      'Nodes without the management label were not created by this tool',
      'Only clusters created with `clusterwright create` can be updated',
    );
  }
}

export class CredentialExtractionError extends DeployerError {
  readonly code = 'CREDENTIAL_EXTRACTION';

  constructor(
    message: string,
    readonly output: string,
  ) {
    super(
      message,
      'The bootstrap tool output did not contain the expected value',
      'Run the command on the first master by hand and check its output format',
    );
  }
}

export class PollTimeoutError extends DeployerError {
  readonly code = 'POLL_TIMEOUT';

  constructor(
    readonly what: string,
    readonly attempts: number,
    readonly lastObserved?: string,
  ) {
    super(
      `Timed out waiting for ${what} after ${attempts} attempts${
        lastObserved ? ` (last observed: ${lastObserved})` : ''
      }`,
    );
  }
}

export class UserCancelledError extends DeployerError {
  readonly code = 'USER_CANCELLED';

  constructor(message = 'Operation cancelled by user') {
    super(message);
  }
}

export class StateNotFoundError extends DeployerError {
  readonly code = 'STATE_NOT_FOUND';

  constructor(readonly cluster: string, options?: { cause?: unknown }) {
    super(
      ERROR_MESSAGES.STATE_NOT_FOUND(cluster),
      'The cluster configuration record is missing from kube-system',
      'Check that the cluster was created by this tool and that kubectl works on the first master',
      options,
    );
  }
}

export interface NodeFailure {
  node: string;
  phase: string;
  error: Error;
}

export class NodeBatchError extends DeployerError {
  readonly code = 'NODE_BATCH';

  constructor(
    readonly operation: string,
    readonly failures: NodeFailure[],
  ) {
    super(
      `${operation} failed on ${failures.length} node(s): ${failures
        .map((f) => `${f.node} [${f.phase}]: ${f.error.message}`)
        .join('; ')}`,
      undefined,
      'Fix the failing nodes and re-run; completed steps are skipped on re-run',
    );
  }

  get nodes(): string[] {
    return this.failures.map((f) => f.node);
  }

  protected override details(): Record<string, unknown> {
    return { failedNodes: this.nodes };
  }
}

/**
 * Localizes a failure to a node and phase. User cancellation is never wrapped.
 */
export class PhaseError extends DeployerError {
  readonly code = 'PHASE';

  constructor(
    readonly phase: string,
    readonly node: string | undefined,
    cause: unknown,
  ) {
    super(
      `${phase}${node ? ` on ${node}` : ''}: ${extractErrorMessage(cause)}`,
      cause instanceof DeployerError ? cause.hint : undefined,
      cause instanceof DeployerError ? cause.resolution : undefined,
      { cause },
    );
  }

  protected override details(): Record<string, unknown> {
    return {
      phase: this.phase,
      ...(this.node !== undefined && { node: this.node }),
      ...(this.cause instanceof DeployerError && { causeCode: this.cause.code }),
    };
  }
}

export function wrapPhase(phase: string, node: string | undefined, error: unknown): Error {
  if (error instanceof UserCancelledError || error instanceof PhaseError) return error;
  return new PhaseError(phase, node, error);
}

/**
 * Converts anything thrown below an entry point into a Failure result.
 */
export function toFailure(error: unknown): Result<never> {
  if (error instanceof DeployerError) {
    return Failure(error.message, error.guidance, error.code);
  }
  return Failure(extractErrorMessage(error), undefined, 'UNKNOWN');
}

const SECRET_FLAGS = /(--(?:token|certificate-key|discovery-token-ca-cert-hash)[ =])('[^']*'|\S+)/g;

/**
 * Masks join credentials passed as kubeadm flags.
 */
export function redactSecrets(command: string): string {
  return command.replace(SECRET_FLAGS, '$1<redacted>');
}

function summarize(command: string): string {
  const firstLine = redactSecrets(command.trim().split('\n')[0] ?? '');
  return firstLine.length > 120 ? `${firstLine.slice(0, 117)}...` : firstLine;
}

/**
 * Per-node fan-out
 *
 * Starts one task per node, never cancels siblings, waits for all of them and
 * then reports every failure together.
 */

import type { Logger } from 'pino';
import { NodeBatchError, type NodeFailure } from './errors';

export type ProgressStatus = 'started' | 'done' | 'skipped' | 'failed';

export interface ProgressEntry {
  step: string;
  status: ProgressStatus;
  at: Date;
  detail?: string;
}

/**
 * Progress per node identity. Written between awaits only, so the
 * single-threaded event loop serializes every update.
 */
export class ProgressLog {
  private readonly entries = new Map<string, ProgressEntry[]>();

  constructor(
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  record(node: string, step: string, status: ProgressStatus, detail?: string): void {
    const list = this.entries.get(node) ?? [];
    list.push({ step, status, at: this.clock(), ...(detail !== undefined && { detail }) });
    this.entries.set(node, list);

    const fields = { node, step, status, ...(detail !== undefined && { detail }) };
    if (status === 'failed') this.logger.error(fields, 'Node step failed');
    else this.logger.info(fields, `Node step ${status}`);
  }

  forNode(node: string): readonly ProgressEntry[] {
    return this.entries.get(node) ?? [];
  }

  nodes(): string[] {
    return [...this.entries.keys()];
  }
}

export interface NodeOutcome<T> {
  node: string;
  value?: T;
  failure?: NodeFailure;
}

export interface FanOutTask<TItem, TResult> {
  /** Identity used in the progress log and in failure reports */
  key: (item: TItem) => string;
  run: (item: TItem) => Promise<TResult>;
  /** Phase name reported when a task fails */
  phase: (item: TItem, error: unknown) => string;
}

/**
 * Runs every task to completion. Results keep the order of `items`.
 */
export async function fanOut<TItem, TResult>(
  items: readonly TItem[],
  task: FanOutTask<TItem, TResult>,
): Promise<NodeOutcome<TResult>[]> {
  const outcomes: NodeOutcome<TResult>[] = new Array(items.length);

  await Promise.all(
    items.map(async (item, index) => {
      const node = task.key(item);
      try {
        outcomes[index] = { node, value: await task.run(item) };
      } catch (error) {
        outcomes[index] = {
          node,
          failure: {
            node,
            phase: task.phase(item, error),
            error: error instanceof Error ? error : new Error(String(error)),
          },
        };
      }
    }),
  );

  return outcomes;
}

/**
 * `fanOut`, then raise one `NodeBatchError` naming every failed node.
 */
export async function fanOutOrThrow<TItem, TResult>(
  operation: string,
  items: readonly TItem[],
  task: FanOutTask<TItem, TResult>,
): Promise<TResult[]> {
  const outcomes = await fanOut(items, task);
  const failures = outcomes.flatMap((o) => (o.failure ? [o.failure] : []));
  if (failures.length > 0) throw new NodeBatchError(operation, failures);
  return outcomes.flatMap((o) => (o.value !== undefined ? [o.value] : []));
}

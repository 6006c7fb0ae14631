/**
 * Command channel abstraction
 *
 * One channel per host. `execute` resolves with captured stdout and rejects
 * with a typed error from `@/lib/errors`.
 */

export interface CommandChannel {
  /** Human-readable target, e.g. `ops@10.0.0.11:22` or `local` */
  readonly target: string;

  execute(command: string): Promise<string>;

  /**
   * Writes `content` to `remotePath` with `mode`, creating parent directories.
   */
  upload(content: string | Buffer, remotePath: string, mode?: number): Promise<void>;

  close(): Promise<void>;
}

export interface ExecOutcome {
  stdout: string;
  stderr: string;
  /** null when the remote process was killed by a signal */
  exitCode: number | null;
}

export type ChannelFactory<TNode> = (node: TNode) => CommandChannel;

/**
 * Shell Command Helpers
 *
 * Everything interpolated into a remote command goes through `shellQuote`
 * or is written via `writeFileCommand`.
 */

/**
 * POSIX single-quote escaping: wraps in '' and escapes internal quotes as '\''
 *
 * @example
 * shellQuote("it's") => "'it'\\''s'"
 * shellQuote("a;rm -rf /") => "'a;rm -rf /'"
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

const HEREDOC_MARKER = 'CLUSTERWRIGHT_EOF';

/**
 * Quoted heredoc that writes `content` to `path` verbatim (no expansion).
 */
export function writeFileCommand(path: string, content: string): string {
  if (content.split('\n').some((line) => line === HEREDOC_MARKER)) {
    throw new Error(`Content for ${path} contains the heredoc marker line`);
  }
  const body = content.endsWith('\n') ? content : `${content}\n`;
  return `cat > ${shellQuote(path)} <<'${HEREDOC_MARKER}'\n${body}${HEREDOC_MARKER}`;
}

/**
 * Feeds `content` to the stdin of `command` through a quoted heredoc.
 */
export function pipeCommand(command: string, content: string): string {
  if (content.split('\n').some((line) => line === HEREDOC_MARKER)) {
    throw new Error('Piped content contains the heredoc marker line');
  }
  const body = content.endsWith('\n') ? content : `${content}\n`;
  return `${command} <<'${HEREDOC_MARKER}'\n${body}${HEREDOC_MARKER}`;
}

/**
 * Joins script lines under `set -e`.
 */
export function script(...lines: string[]): string {
  return ['set -e', ...lines].join('\n');
}

import { RemoteCommandError } from '@/lib/errors';
import type { CommandChannel } from './types';

/**
 * Runs a check command. A nonzero exit means "no"; transport failures propagate.
 */
export async function probe(channel: CommandChannel, command: string): Promise<boolean> {
  try {
    await channel.execute(command);
    return true;
  } catch (error) {
    if (error instanceof RemoteCommandError) return false;
    throw error;
  }
}

export function fileExists(channel: CommandChannel, path: string): Promise<boolean> {
  return probe(channel, `test -f ${path}`);
}

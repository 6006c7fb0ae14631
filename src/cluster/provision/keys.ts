/**
 * Managed-key distribution
 *
 * Appends the operator's public key to root's authorized_keys on each node so
 * later sessions can authenticate with the managed identity.
 */

import { dirname } from 'node:path';
import type { CommandContext } from '@/core/context';
import type { NodeDescriptor } from '@/config/schema';
import { withChannel, type CommandChannel } from '@/infra/channel';
import { fanOut } from '@/lib/fanout';
import { script, shellQuote } from '@/lib/shell';

/**
 * Creates the managed key pair on the operator machine if it is missing and
 * returns the public key.
 */
export async function ensureManagedKeyPair(local: CommandChannel, keyFile: string): Promise<string> {
  await local.execute(
    `test -f ${shellQuote(keyFile)} || (mkdir -p ${shellQuote(dirname(keyFile))} && ` +
      `ssh-keygen -t rsa -b 4096 -N '' -q -f ${shellQuote(keyFile)})`,
  );
  return (await local.execute(`cat ${shellQuote(`${keyFile}.pub`)}`)).trim();
}

export function authorizeKeyCommand(publicKey: string): string {
  const key = shellQuote(publicKey);
  return script(
    'mkdir -p /root/.ssh',
    'chmod 700 /root/.ssh',
    'touch /root/.ssh/authorized_keys',
    'chmod 600 /root/.ssh/authorized_keys',
    `grep -qxF ${key} /root/.ssh/authorized_keys || echo ${key} >> /root/.ssh/authorized_keys`,
  );
}

/**
 * Best-effort; returns the nodes that could not be updated.
 */
export async function distributeManagedKey(
  ctx: CommandContext,
  nodes: readonly NodeDescriptor[],
): Promise<string[]> {
  let publicKey: string;
  try {
    publicKey = await ensureManagedKeyPair(ctx.local, ctx.managedKeyFile);
  } catch (error) {
    ctx.logger.warn({ error }, 'No managed key available, keeping supplied credentials');
    return nodes.map((n) => n.hostname);
  }

  const outcomes = await fanOut(nodes, {
    key: (node) => node.hostname,
    run: (node) => withChannel(ctx.openChannel, node, (channel) => channel.execute(authorizeKeyCommand(publicKey))),
    phase: () => 'managed-key',
  });
  const failed = outcomes.flatMap((o) => (o.failure ? [o.failure] : []));
  for (const failure of failed) {
    ctx.logger.warn({ node: failure.node, error: failure.error.message }, 'Could not install managed key');
  }
  return failed.map((f) => f.node);
}

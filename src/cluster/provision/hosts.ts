/**
 * /etc/hosts distribution
 *
 * Every node gets one managed block mapping all node addresses to hostnames,
 * replaced in place on re-run, and its own hostname set.
 */

import type { CommandContext } from '@/core/context';
import { HOSTS_MARKERS, REMOTE_PATHS } from '@/config/constants';
import type { ClusterSpec, NodeDescriptor } from '@/config/schema';
import { withChannel } from '@/infra/channel';
import { fanOut } from '@/lib/fanout';
import { pipeCommand, script, shellQuote } from '@/lib/shell';

export function hostsBlock(nodes: readonly NodeDescriptor[]): string {
  return [HOSTS_MARKERS.BEGIN, ...nodes.map((n) => `${n.address} ${n.hostname}`), HOSTS_MARKERS.END].join(
    '\n',
  );
}

export function hostsCommand(node: NodeDescriptor, nodes: readonly NodeDescriptor[]): string {
  return script(
    `hostnamectl set-hostname ${shellQuote(node.hostname)}`,
    `sed -i ${shellQuote(`/^${HOSTS_MARKERS.BEGIN}$/,/^${HOSTS_MARKERS.END}$/d`)} ${REMOTE_PATHS.HOSTS_FILE}`,
    pipeCommand(`cat >> ${REMOTE_PATHS.HOSTS_FILE}`, hostsBlock(nodes)),
  );
}

/**
 * Best-effort: a node that cannot be updated is logged and skipped.
 */
export async function distributeHosts(
  ctx: CommandContext,
  spec: ClusterSpec,
  targets: readonly NodeDescriptor[] = spec.nodes,
): Promise<string[]> {
  const outcomes = await fanOut(targets, {
    key: (node) => node.hostname,
    run: (node) => withChannel(ctx.openChannel, node, (channel) => channel.execute(hostsCommand(node, spec.nodes))),
    phase: () => 'hosts',
  });
  const failed = outcomes.flatMap((o) => (o.failure ? [o.failure] : []));
  for (const failure of failed) {
    ctx.logger.warn({ node: failure.node, error: failure.error.message }, 'Could not update /etc/hosts');
  }
  return failed.map((f) => f.node);
}

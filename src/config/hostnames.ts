/**
 * Hostname derivation
 *
 * Nodes without an explicit hostname get `{cluster}-{tag}-{NN}` where the tag is
 * `master`, `node` or `gpu-node`. Each tag has its own counter starting at 1;
 * numbers already taken by an explicit hostname are skipped.
 */

import type { ClusterSpec, ClusterSpecInput, NodeDescriptor, NodeInput } from './schema';

export type HostnameTag = 'master' | 'node' | 'gpu-node';

export function hostnameTag(node: Pick<NodeInput, 'role' | 'gpu'>): HostnameTag {
  if (node.role === 'master') return 'master';
  return node.gpu ? 'gpu-node' : 'node';
}

export function formatHostname(cluster: string, tag: HostnameTag, index: number): string {
  return `${cluster}-${tag}-${String(index).padStart(2, '0')}`;
}

export function resolveHostnames(input: ClusterSpecInput): ClusterSpec {
  const taken = new Set(
    input.nodes.flatMap((n) => (n.hostname !== undefined ? [n.hostname] : [])),
  );
  const counters: Record<HostnameTag, number> = { master: 0, node: 0, 'gpu-node': 0 };

  const nodes: NodeDescriptor[] = input.nodes.map((node) => {
    if (node.hostname !== undefined) return { ...node, hostname: node.hostname };

    const tag = hostnameTag(node);
    let hostname: string;
    do {
      counters[tag] += 1;
      hostname = formatHostname(input.name, tag, counters[tag]);
    } while (taken.has(hostname));
    taken.add(hostname);
    return { ...node, hostname };
  });

  return { ...input, nodes };
}

/**
 * Configuration diff
 *
 * Compares the persisted spec with a new one over a fixed set of mutable
 * fields. BGP list changes are detected by length only: editing one peer
 * address in place is not reported.
 */

import type { BgpSettings, ClusterSpec } from '@/config/schema';

export type ChangeKind = 'BGP' | 'LoadBalancer' | 'Registry' | 'Gateway' | 'Observability';

export interface ConfigChange {
  kind: ChangeKind;
  description: string;
  oldValue?: string;
  newValue?: string;
  /** What the change touches; shown in the confirmation gate */
  component: string;
  requiresRestart: boolean;
}

function enableBgpChanges(bgp: BgpSettings, previous: string): ConfigChange[] {
  return [
    {
      kind: 'BGP',
      description: 'Enable BGP control plane',
      oldValue: previous,
      newValue: 'enabled',
      component: 'Cilium',
      requiresRestart: true,
    },
    {
      kind: 'BGP',
      description: `Set local ASN ${bgp.localAsn}`,
      newValue: String(bgp.localAsn),
      component: 'Cilium',
      requiresRestart: false,
    },
    ...bgp.peers.map(
      (peer, index): ConfigChange => ({
        kind: 'BGP',
        description: `Add BGP peer ${index + 1}: ${peer.address} (AS ${peer.asn})`,
        newValue: `${peer.address}/${peer.asn}`,
        component: 'BGP Peering',
        requiresRestart: false,
      }),
    ),
    ...bgp.loadBalancerIps.map(
      (entry, index): ConfigChange => ({
        kind: 'BGP',
        description: `Add load-balancer IP pool entry ${index + 1}: ${entry}`,
        newValue: entry,
        component: 'IP Pool',
        requiresRestart: false,
      }),
    ),
  ];
}

/**
 * BGP changes between two specs; `previous` is undefined when no state was
 * persisted.
 */
export function diffBgp(previous: ClusterSpec | undefined, next: ClusterSpec): ConfigChange[] {
  const after = next.addons.bgp;
  if (!previous) return after.enabled ? enableBgpChanges(after, 'not configured') : [];

  const before = previous.addons.bgp;
  if (!before.enabled && after.enabled) return enableBgpChanges(after, 'disabled');
  if (before.enabled && !after.enabled) {
    return [
      {
        kind: 'BGP',
        description: 'Disable BGP control plane',
        oldValue: 'enabled',
        newValue: 'disabled',
        component: 'Cilium',
        requiresRestart: true,
      },
    ];
  }
  if (!after.enabled) return [];

  const changes: ConfigChange[] = [];
  if (before.localAsn !== after.localAsn) {
    changes.push({
      kind: 'BGP',
      description: 'Change local ASN',
      oldValue: String(before.localAsn),
      newValue: String(after.localAsn),
      component: 'BGP Peering',
      requiresRestart: false,
    });
  }
  if (before.peers.length !== after.peers.length) {
    changes.push({
      kind: 'BGP',
      description: 'Update BGP peers',
      oldValue: `${before.peers.length} peers`,
      newValue: `${after.peers.length} peers`,
      component: 'BGP Peering',
      requiresRestart: false,
    });
  }
  if (before.loadBalancerIps.length !== after.loadBalancerIps.length) {
    changes.push({
      kind: 'BGP',
      description: 'Update load-balancer IP pool',
      oldValue: `${before.loadBalancerIps.length} IPs`,
      newValue: `${after.loadBalancerIps.length} IPs`,
      component: 'IP Pool',
      requiresRestart: false,
    });
  }
  return changes;
}

function toggle(enabled: boolean): string {
  return enabled ? 'enabled' : 'disabled';
}

/**
 * Every detected change. Without a previous spec nothing but BGP can be
 * compared, so the result is empty.
 */
export function diffSpecs(previous: ClusterSpec | undefined, next: ClusterSpec): ConfigChange[] {
  if (!previous) return [];
  const changes = diffBgp(previous, next);
  const before = previous.addons;
  const after = next.addons;

  if (before.loadBalancer.mode !== after.loadBalancer.mode) {
    changes.push({
      kind: 'LoadBalancer',
      description: 'Change load-balancer mode',
      oldValue: before.loadBalancer.mode,
      newValue: after.loadBalancer.mode,
      component: 'Cilium',
      requiresRestart: true,
    });
  }

  if (
    previous.registry.username !== next.registry.username ||
    previous.registry.password !== next.registry.password
  ) {
    changes.push({
      kind: 'Registry',
      description: 'Update registry credentials',
      component: 'Containerd',
      requiresRestart: true,
    });
  }

  if (before.gateway.enabled !== after.gateway.enabled) {
    changes.push({
      kind: 'Gateway',
      description: `${after.gateway.enabled ? 'Enable' : 'Disable'} Gateway API`,
      oldValue: toggle(before.gateway.enabled),
      newValue: toggle(after.gateway.enabled),
      component: 'Cilium',
      requiresRestart: true,
    });
  }

  const hubbleBefore = before.observability;
  const hubbleAfter = after.observability;
  const fields = ['enabled', 'ui', 'metrics', 'uiNodePort'] as const;
  const changedFields = fields.filter((field) => hubbleBefore[field] !== hubbleAfter[field]);
  if (changedFields.length > 0) {
    changes.push({
      kind: 'Observability',
      description: `Update Hubble settings (${changedFields.join(', ')})`,
      oldValue: changedFields.map((f) => `${f}=${hubbleBefore[f]}`).join(' '),
      newValue: changedFields.map((f) => `${f}=${hubbleAfter[f]}`).join(' '),
      component: 'Cilium',
      requiresRestart: true,
    });
  }

  return changes;
}

/**
 * One line per change for the confirmation gate.
 */
export function describeChange(change: ConfigChange): string {
  const values =
    change.oldValue !== undefined || change.newValue !== undefined
      ? ` (${change.oldValue ?? '-'} -> ${change.newValue ?? '-'})`
      : '';
  const restart = change.requiresRestart ? ` [requires restart of ${change.component}]` : '';
  return `[${change.kind}] ${change.description}${values}${restart}`;
}

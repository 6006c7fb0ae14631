/**
 * Cluster specs for tests, built through the real schema so defaults apply.
 */

import { parseClusterSpec } from '@/config/loader';
import type { ClusterSpec } from '@/config/schema';

const ssh = { user: 'ops', password: 'test-secret' };

export const master = (address: string, extra: Record<string, unknown> = {}) => ({
  role: 'master',
  address,
  ssh,
  ...extra,
});

export const worker = (address: string, extra: Record<string, unknown> = {}) => ({
  role: 'worker',
  address,
  ssh,
  ...extra,
});

/**
 * `lab`: one master (10.0.0.11) and two workers (10.0.0.21, 10.0.0.22).
 */
export function labSpec(overrides: Record<string, unknown> = {}): ClusterSpec {
  return parseClusterSpec({
    name: 'lab',
    nodes: [master('10.0.0.11'), worker('10.0.0.21'), worker('10.0.0.22')],
    ...overrides,
  });
}

export const BGP_ENABLED = {
  enabled: true,
  localAsn: 64512,
  peers: [{ address: '10.0.0.1', asn: 64513 }],
  loadBalancerIps: ['10.0.100.0/28'],
};

export function bgpSpec(bgp: Record<string, unknown> = {}, overrides: Record<string, unknown> = {}): ClusterSpec {
  return labSpec({ addons: { bgp: { ...BGP_ENABLED, ...bgp } }, ...overrides });
}

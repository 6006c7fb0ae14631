/**
 * Typed manifest builders for the load-balancer and gateway resources.
 */

import { ADDONS } from '@/config/constants';
import type { BgpPeer } from '@/config/schema';
import type { KubeObject } from './kubectl';

const METALLB_V1BETA1 = 'metallb.io/v1beta1';
const METALLB_V1BETA2 = 'metallb.io/v1beta2';

export interface IpAddressPool extends KubeObject {
  kind: 'IPAddressPool';
  spec: { addresses: string[] };
}

export interface BgpPeerResource extends KubeObject {
  kind: 'BGPPeer';
  spec: { myASN: number; peerASN: number; peerAddress: string };
}

export interface BgpAdvertisement extends KubeObject {
  kind: 'BGPAdvertisement';
  spec: { ipAddressPools: string[] };
}

export interface L2Advertisement extends KubeObject {
  kind: 'L2Advertisement';
  spec: { ipAddressPools: string[] };
}

export interface Gateway extends KubeObject {
  kind: 'Gateway';
  spec: {
    gatewayClassName: string;
    listeners: Array<{
      name: string;
      protocol: 'HTTP' | 'HTTPS';
      port: number;
      allowedRoutes: { namespaces: { from: 'All' | 'Same' } };
    }>;
  };
}

export const poolName = (cluster: string): string => `${cluster}-ip-pool`;

/**
 * MetalLB takes CIDRs and ranges; a bare address becomes a /32.
 */
export function toPoolAddress(entry: string): string {
  const trimmed = entry.trim();
  return trimmed.includes('/') || trimmed.includes('-') ? trimmed : `${trimmed}/32`;
}

export function ipAddressPool(cluster: string, entries: readonly string[]): IpAddressPool {
  if (entries.length === 0) {
    throw new Error('An address pool needs at least one load-balancer IP entry');
  }
  return {
    apiVersion: METALLB_V1BETA1,
    kind: 'IPAddressPool',
    metadata: { name: poolName(cluster), namespace: ADDONS.METALLB_NAMESPACE },
    spec: { addresses: entries.map(toPoolAddress) },
  };
}

export function bgpPeers(cluster: string, localAsn: number, peers: readonly BgpPeer[]): BgpPeerResource[] {
  return peers.map((peer, index) => ({
    apiVersion: METALLB_V1BETA2,
    kind: 'BGPPeer',
    metadata: { name: `${cluster}-peer-${index}`, namespace: ADDONS.METALLB_NAMESPACE },
    spec: { myASN: localAsn, peerASN: peer.asn, peerAddress: peer.address },
  }));
}

export function bgpAdvertisement(cluster: string): BgpAdvertisement {
  return {
    apiVersion: METALLB_V1BETA1,
    kind: 'BGPAdvertisement',
    metadata: { name: `${cluster}-bgp-adv`, namespace: ADDONS.METALLB_NAMESPACE },
    spec: { ipAddressPools: [poolName(cluster)] },
  };
}

export function l2Advertisement(cluster: string): L2Advertisement {
  return {
    apiVersion: METALLB_V1BETA1,
    kind: 'L2Advertisement',
    metadata: { name: `${cluster}-l2-adv`, namespace: ADDONS.METALLB_NAMESPACE },
    spec: { ipAddressPools: [poolName(cluster)] },
  };
}

export function defaultGateway(): Gateway {
  return {
    apiVersion: 'gateway.networking.k8s.io/v1',
    kind: 'Gateway',
    metadata: { name: ADDONS.DEFAULT_GATEWAY, namespace: 'default' },
    spec: {
      gatewayClassName: ADDONS.GATEWAY_CLASS,
      listeners: [
        { name: 'http', protocol: 'HTTP', port: 80, allowedRoutes: { namespaces: { from: 'All' } } },
      ],
    },
  };
}

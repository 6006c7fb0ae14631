/**
 * Cluster specification validator
 *
 * Collects every issue instead of stopping at the first one.
 */

import { ValidationError } from '@/lib/errors';
import { ipv4ToNumber, isIPv4, parseAddressPoolEntry, parseCidr, rangesOverlap } from '@/lib/net';
import type { ClusterSpec } from './schema';

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const VERSION = /^v\d+\.\d+\.\d+$/;
const MAX_ASN = 4_294_967_295;

export function collectIssues(spec: ClusterSpec): string[] {
  return [
    ...checkIdentity(spec),
    ...checkNetworking(spec),
    ...checkHighAvailability(spec),
    ...checkNodes(spec),
    ...checkBgp(spec),
  ];
}

export function validateClusterSpec(spec: ClusterSpec): void {
  const issues = collectIssues(spec);
  if (issues.length > 0) throw new ValidationError(issues);
}

function checkIdentity(spec: ClusterSpec): string[] {
  const issues: string[] = [];
  if (!DNS_LABEL.test(spec.name)) {
    issues.push(`name "${spec.name}" must be lowercase alphanumerics and '-'`);
  }
  if (!VERSION.test(spec.version)) {
    issues.push(`version "${spec.version}" must look like v1.34.2`);
  }
  return issues;
}

function checkNetworking(spec: ClusterSpec): string[] {
  const issues: string[] = [];
  const pod = parseCidr(spec.networking.podSubnet);
  const service = parseCidr(spec.networking.serviceSubnet);
  if (!pod) issues.push(`networking.podSubnet "${spec.networking.podSubnet}" is not a valid CIDR`);
  if (!service) {
    issues.push(`networking.serviceSubnet "${spec.networking.serviceSubnet}" is not a valid CIDR`);
  }
  if (pod && service && rangesOverlap(pod, service)) {
    issues.push(
      `networking.podSubnet ${spec.networking.podSubnet} overlaps serviceSubnet ${spec.networking.serviceSubnet}`,
    );
  }
  return issues;
}

function checkHighAvailability(spec: ClusterSpec): string[] {
  if (!spec.ha.enabled) return [];
  const issues: string[] = [];
  const masterCount = spec.nodes.filter((n) => n.role === 'master').length;
  if (masterCount < 3) {
    issues.push(`ha.enabled requires at least 3 masters, found ${masterCount}`);
  }
  if (!spec.ha.vip) {
    issues.push('ha.vip is required when ha.enabled is true');
  } else if (!isIPv4(spec.ha.vip)) {
    issues.push(`ha.vip "${spec.ha.vip}" is not a valid IPv4 address`);
  } else if (spec.nodes.some((n) => n.address === spec.ha.vip)) {
    issues.push(`ha.vip ${spec.ha.vip} is already used as a node address`);
  }
  return issues;
}

function checkNodes(spec: ClusterSpec): string[] {
  const issues: string[] = [];
  const addresses = new Set<string>();
  const hostnames = new Set<string>();

  if (!spec.nodes.some((n) => n.role === 'master')) {
    issues.push('at least one master node is required');
  }

  spec.nodes.forEach((node, index) => {
    const where = `nodes[${index}]`;
    if (ipv4ToNumber(node.address) === undefined) {
      issues.push(`${where}.address "${node.address}" is not a valid IPv4 address`);
    } else if (addresses.has(node.address)) {
      issues.push(`${where}.address ${node.address} is duplicated`);
    }
    addresses.add(node.address);

    if (!DNS_LABEL.test(node.hostname)) {
      issues.push(`${where}.hostname "${node.hostname}" must be lowercase alphanumerics and '-'`);
    } else if (hostnames.has(node.hostname)) {
      issues.push(`${where}.hostname ${node.hostname} is duplicated`);
    }
    hostnames.add(node.hostname);

    if (!node.ssh.keyFile && !node.ssh.password) {
      issues.push(`${where}.ssh needs a keyFile or a password`);
    }
    if (node.role === 'master' && node.gpu) {
      issues.push(`${where} is a master and cannot carry gpu: true`);
    }
  });

  return issues;
}

function checkBgp(spec: ClusterSpec): string[] {
  const bgp = spec.addons.bgp;
  if (!bgp.enabled) {
    return spec.addons.loadBalancer.mode === 'l2' && bgp.loadBalancerIps.length === 0
      ? ['addons.loadBalancer.mode l2 needs addons.bgp.loadBalancerIps for the address pool']
      : [];
  }
  const issues: string[] = [];

  if (!validAsn(bgp.localAsn)) {
    issues.push(`addons.bgp.localAsn ${bgp.localAsn} must be between 1 and ${MAX_ASN}`);
  }
  if (bgp.peers.length === 0) {
    issues.push('addons.bgp.peers needs at least one peer');
  }
  bgp.peers.forEach((peer, index) => {
    if (!isIPv4(peer.address)) {
      issues.push(`addons.bgp.peers[${index}].address "${peer.address}" is not a valid IPv4 address`);
    }
    if (!validAsn(peer.asn)) {
      issues.push(`addons.bgp.peers[${index}].asn ${peer.asn} must be between 1 and ${MAX_ASN}`);
    }
  });
  if (bgp.loadBalancerIps.length === 0) {
    issues.push('addons.bgp.loadBalancerIps needs at least one entry');
  }
  bgp.loadBalancerIps.forEach((entry, index) => {
    if (!parseAddressPoolEntry(entry)) {
      issues.push(
        `addons.bgp.loadBalancerIps[${index}] "${entry}" is not an address, CIDR or start-end range`,
      );
    }
  });
  return issues;
}

function validAsn(asn: number): boolean {
  return Number.isInteger(asn) && asn >= 1 && asn <= MAX_ASN;
}

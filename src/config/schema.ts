/**
 * Cluster file schema
 *
 * Structural validation and defaults. Cross-field invariants (uniqueness,
 * HA quorum, CIDR overlap, BGP completeness) live in `validator.ts`.
 */

import { z } from 'zod';
import { CLUSTER_DEFAULTS } from './constants';
import { ERROR_MESSAGES, ValidationError } from '@/lib/errors';

export const nodeRoleSchema = z.enum(['master', 'worker']).describe('Node role');

export const sshCredentialSchema = z
  .object({
    user: z.string().min(1, 'ssh.user is required'),
    port: z.number().int().min(1).max(65535).default(CLUSTER_DEFAULTS.sshPort),
    keyFile: z.string().min(1).optional().describe('Path to a private key on the operator machine'),
    password: z.string().min(1).optional(),
  })
  .describe('Per-node SSH credential');

export const nodeSchema = z.object({
  role: nodeRoleSchema,
  address: z.string().min(1).describe('IPv4 address the node is reached at'),
  hostname: z.string().min(1).optional().describe('Derived from the cluster name when omitted'),
  gpu: z.boolean().default(false),
  ssh: sshCredentialSchema,
});

export const bgpPeerSchema = z.object({
  address: z.string().min(1),
  asn: z.number().int(),
});

export const bgpSchema = z
  .object({
    enabled: z.boolean().default(false),
    localAsn: z.number().int().default(0),
    peers: z.array(bgpPeerSchema).default([]),
    loadBalancerIps: z
      .array(z.string().min(1))
      .default([])
      .describe('Addresses, CIDRs or start-end ranges handed out to LoadBalancer services'),
  })
  .default({});

export const loadBalancerModeSchema = z.enum(['dsr', 'snat', 'hybrid', 'l2']);

export const addonSchema = z
  .object({
    loadBalancer: z
      .object({ mode: loadBalancerModeSchema.default(CLUSTER_DEFAULTS.loadBalancerMode) })
      .default({}),
    gateway: z.object({ enabled: z.boolean().default(false) }).default({}),
    observability: z
      .object({
        enabled: z.boolean().default(true),
        ui: z.boolean().default(true),
        uiNodePort: z.number().int().default(CLUSTER_DEFAULTS.hubbleUiNodePort),
        metrics: z.boolean().default(true),
      })
      .default({}),
    envoy: z.object({ enabled: z.boolean().default(true) }).default({}),
    bgp: bgpSchema,
  })
  .default({});

export const clusterSpecSchema = z.object({
  name: z.string().min(1, 'name is required'),
  version: z.string().default(CLUSTER_DEFAULTS.version),
  imageRepository: z.string().min(1).default(CLUSTER_DEFAULTS.imageRepository),
  registry: z
    .object({
      username: z.string().optional(),
      password: z.string().optional(),
    })
    .default({}),
  networking: z
    .object({
      podSubnet: z.string().default(CLUSTER_DEFAULTS.podSubnet),
      serviceSubnet: z.string().default(CLUSTER_DEFAULTS.serviceSubnet),
    })
    .default({}),
  ha: z
    .object({
      enabled: z.boolean().default(false),
      vip: z.string().optional(),
    })
    .default({}),
  addons: addonSchema,
  nodes: z.array(nodeSchema).min(1, 'at least one node is required'),
});

export type NodeRole = z.infer<typeof nodeRoleSchema>;
export type SshCredential = z.infer<typeof sshCredentialSchema>;
export type NodeInput = z.infer<typeof nodeSchema>;
export type BgpSettings = z.infer<typeof bgpSchema>;
export type BgpPeer = z.infer<typeof bgpPeerSchema>;
export type AddonSettings = z.infer<typeof addonSchema>;
export type LoadBalancerMode = z.infer<typeof loadBalancerModeSchema>;
export type ClusterSpecInput = z.infer<typeof clusterSpecSchema>;

/**
 * A node whose hostname has been resolved.
 */
export interface NodeDescriptor extends NodeInput {
  hostname: string;
}

/**
 * Desired cluster state after defaults and hostname resolution.
 */
export interface ClusterSpec extends Omit<ClusterSpecInput, 'nodes'> {
  nodes: NodeDescriptor[];
}

export function masters(spec: ClusterSpec): NodeDescriptor[] {
  return spec.nodes.filter((n) => n.role === 'master');
}

export function workers(spec: ClusterSpec): NodeDescriptor[] {
  return spec.nodes.filter((n) => n.role === 'worker');
}

export function controlPlaneEndpoint(spec: ClusterSpec, port: number): string {
  return `${controlPlaneHost(spec)}:${port}`;
}

/**
 * VIP when HA is enabled, otherwise the first master's address.
 */
export function controlPlaneHost(spec: ClusterSpec): string {
  if (spec.ha.enabled && spec.ha.vip) return spec.ha.vip;
  const first = masters(spec)[0];
  if (!first) throw new ValidationError([ERROR_MESSAGES.NO_MASTER]);
  return first.address;
}

export function nodeLabel(node: Pick<NodeDescriptor, 'hostname' | 'address'>): string {
  return `${node.hostname} (${node.address})`;
}

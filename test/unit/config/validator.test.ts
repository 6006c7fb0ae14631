import { describe, it, expect } from '@jest/globals';
import { parseClusterSpec, parseClusterYaml, loadClusterFile } from '@/config/loader';
import { controlPlaneEndpoint } from '@/config/schema';
import { ValidationError } from '@/lib/errors';
import { labSpec, master, worker } from '../../__support__/fixtures';

function issuesOf(document: unknown): string[] {
  try {
    parseClusterSpec(document);
  } catch (error) {
    if (error instanceof ValidationError) return error.issues;
    throw error;
  }
  return [];
}

describe('cluster specification validation', () => {
  it('applies schema defaults', () => {
    const spec = labSpec();

    expect(spec.version).toBe('v1.34.2');
    expect(spec.networking).toEqual({ podSubnet: '10.244.0.0/16', serviceSubnet: '10.96.0.0/12' });
    expect(spec.addons.loadBalancer.mode).toBe('dsr');
    expect(spec.addons.bgp.enabled).toBe(false);
    expect(spec.nodes[0]?.ssh.port).toBe(22);
  });

  it('requires three masters for HA', () => {
    const issues = issuesOf({
      name: 'lab',
      ha: { enabled: true, vip: '10.0.0.100' },
      nodes: [master('10.0.0.11'), master('10.0.0.12'), worker('10.0.0.21')],
    });

    expect(issues).toEqual(['ha.enabled requires at least 3 masters, found 2']);
  });

  it('rejects a VIP that is a node address', () => {
    const issues = issuesOf({
      name: 'lab',
      ha: { enabled: true, vip: '10.0.0.12' },
      nodes: [master('10.0.0.11'), master('10.0.0.12'), master('10.0.0.13')],
    });

    expect(issues).toEqual(['ha.vip 10.0.0.12 is already used as a node address']);
  });

  it('collects every node issue at once', () => {
    const issues = issuesOf({
      name: 'lab',
      nodes: [
        master('10.0.0.11', { gpu: true }),
        worker('10.0.0.11'),
        { role: 'worker', address: '10.0.0.300', ssh: { user: 'ops' } },
      ],
    });

    expect(issues).toEqual([
      'nodes[0] is a master and cannot carry gpu: true',
      'nodes[1].address 10.0.0.11 is duplicated',
      'nodes[2].address "10.0.0.300" is not a valid IPv4 address',
      'nodes[2].ssh needs a keyFile or a password',
    ]);
  });

  it('rejects overlapping pod and service subnets', () => {
    const issues = issuesOf({
      name: 'lab',
      networking: { podSubnet: '10.96.0.0/16', serviceSubnet: '10.96.0.0/12' },
      nodes: [master('10.0.0.11')],
    });

    expect(issues).toEqual(['networking.podSubnet 10.96.0.0/16 overlaps serviceSubnet 10.96.0.0/12']);
  });

  it('requires peers and addresses when BGP is enabled', () => {
    const issues = issuesOf({
      name: 'lab',
      addons: { bgp: { enabled: true, localAsn: 64512 } },
      nodes: [master('10.0.0.11')],
    });

    expect(issues).toEqual([
      'addons.bgp.peers needs at least one peer',
      'addons.bgp.loadBalancerIps needs at least one entry',
    ]);
  });

  it('reports schema failures with their path', () => {
    expect(issuesOf({ name: 'lab', nodes: [] })).toEqual(['nodes: at least one node is required']);
  });
});

describe('control plane endpoint', () => {
  it('is the first master without HA', () => {
    expect(controlPlaneEndpoint(labSpec(), 6443)).toBe('10.0.0.11:6443');
  });

  it('is the VIP with HA', () => {
    const spec = parseClusterSpec({
      name: 'lab',
      ha: { enabled: true, vip: '10.0.0.100' },
      nodes: [master('10.0.0.11'), master('10.0.0.12'), master('10.0.0.13')],
    });

    expect(controlPlaneEndpoint(spec, 6443)).toBe('10.0.0.100:6443');
  });
});

describe('cluster file loading', () => {
  it('rejects text that is not YAML', () => {
    expect(() => parseClusterYaml('name: [unclosed')).toThrow(ValidationError);
  });

  it('reports an unreadable file as a validation issue', async () => {
    const error = await loadClusterFile('/nonexistent/cluster.yaml').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.issues[0]).toMatch(
      /^Cannot read cluster file \/nonexistent\/cluster\.yaml: /,
    );
  });

  it('parses a YAML document', () => {
    const spec = parseClusterYaml(
      [
        'name: edge',
        'nodes:',
        '  - role: master',
        '    address: 10.1.0.11',
        '    ssh: { user: root, keyFile: /keys/id_ed25519 }',
      ].join('\n'),
    );

    expect(spec.nodes[0]?.hostname).toBe('edge-master-01');
    expect(spec.nodes[0]?.ssh.keyFile).toBe('/keys/id_ed25519');
  });
});

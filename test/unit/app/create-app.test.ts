import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createApp, type ContextFlags } from '@/app';
import { createSilentLogger } from '@/lib/logger';
import { FakeFleet } from '../../__support__/fakes/channel';
import { managedCluster } from '../../__support__/fakes/cluster';
import { createFakePackages, createTestContext } from '../../__support__/fakes/context';
import { labSpec } from '../../__support__/fixtures';

const CLUSTER_YAML = `name: lab
nodes:
  - role: master
    address: 10.0.0.11
    ssh: { user: ops, password: test-secret }
  - role: worker
    address: 10.0.0.21
    ssh: { user: ops, password: test-secret }
  - role: worker
    address: 10.0.0.22
    ssh: { user: ops, password: test-secret }
`;

describe('createApp', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'clusterwright-app-'));
    file = join(dir, 'cluster.yaml');
    await writeFile(file, CLUSTER_YAML);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('summarizes a valid cluster file and reports missing packages', async () => {
    const packages = createFakePackages(['helm']);
    const app = createApp({
      logger: createSilentLogger(),
      contextFactory: (flags) => createTestContext({ ...flags, packages }),
    });

    const result = await app.validateClusterFile(file);

    expect(result).toEqual({
      ok: true,
      value: {
        name: 'lab',
        version: 'v1.34.2',
        masters: ['lab-master-01'],
        workers: ['lab-node-01', 'lab-node-02'],
        missingPackages: ['helm'],
      },
    });
    expect(packages.missing).toHaveBeenCalledWith(
      ['containerd', 'runc', 'cni-plugins', 'kubeadm', 'kubelet', 'kubectl', 'helm', 'cilium-chart', 'metallb-chart'],
      'v1.34.2',
    );
  });

  it('turns schema issues into a VALIDATION failure', async () => {
    await writeFile(file, 'name: lab\nnodes: []\n');
    const app = createApp({ logger: createSilentLogger(), contextFactory: (flags) => createTestContext(flags) });

    const result = await app.validateClusterFile(file);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.code).toBe('VALIDATION');
    expect(result.guidance?.details).toEqual({ issues: ['nodes: at least one node is required'] });
  });

  it('reports an unreadable cluster file', async () => {
    const app = createApp({ logger: createSilentLogger(), contextFactory: (flags) => createTestContext(flags) });

    const result = await app.validateClusterFile(join(dir, 'missing.yaml'));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.code).toBe('VALIDATION');
    expect(result.error).toMatch(/Cannot read cluster file .*missing\.yaml: /);
  });

  it('updates through the local kubectl without opening SSH channels', async () => {
    const fleet = new FakeFleet();
    const local = managedCluster(labSpec());
    const seen: ContextFlags[] = [];
    const app = createApp({
      logger: createSilentLogger(),
      contextFactory: (flags) => {
        seen.push(flags);
        return createTestContext({ ...flags, fleet, local });
      },
    });

    const result = await app.updateCluster(file, { via: 'local', yes: true });

    expect(result.ok && result.value.changes).toEqual([]);
    expect(seen).toEqual([{ autoConfirm: true, forceReset: false }]);
    expect(fleet.opened).toEqual([]);
    expect(local.count(/^kubectl get configmap /)).toBe(1);
  });
});

import { describe, it, expect } from '@jest/globals';
import { addNodes, selectNewNodes } from '@/cluster/expand';
import { UserCancelledError, ValidationError } from '@/lib/errors';
import { FakeFleet, freshNode } from '../../__support__/fakes/channel';
import { managedCluster } from '../../__support__/fakes/cluster';
import { createFakePrompter, createTestContext } from '../../__support__/fakes/context';
import { labSpec, master, worker } from '../../__support__/fixtures';

const grown = () =>
  labSpec({ nodes: [master('10.0.0.11'), worker('10.0.0.21'), worker('10.0.0.22'), worker('10.0.0.23')] });

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.issues;
    throw error;
  }
  return [];
}

describe('selectNewNodes', () => {
  it('picks the listed nodes that are not in the cluster yet', () => {
    expect(selectNewNodes(grown(), labSpec(), ['10.0.0.23']).map((n) => n.hostname)).toEqual(['lab-node-03']);
  });

  it('rejects addresses that are already members or unknown', () => {
    expect(issuesOf(() => selectNewNodes(grown(), labSpec(), ['10.0.0.21', '10.0.0.99']))).toEqual([
      '10.0.0.21 is already part of the cluster',
      '10.0.0.99 is not listed in the cluster file',
    ]);
  });

  it('rejects a cluster file that dropped an existing node', () => {
    const file = labSpec({ nodes: [master('10.0.0.11'), worker('10.0.0.21'), worker('10.0.0.23')] });

    expect(issuesOf(() => selectNewNodes(file, labSpec(), ['10.0.0.23']))).toEqual([
      '10.0.0.22 (lab-node-02) is in the cluster but missing from the cluster file',
    ]);
  });

  it('needs at least one address', () => {
    expect(issuesOf(() => selectNewNodes(grown(), labSpec(), []))).toEqual(['no node addresses given']);
  });
});

describe('addNodes', () => {
  it('provisions and joins only the new worker', async () => {
    const channel = managedCluster(labSpec());
    freshNode(channel);
    const fleet = new FakeFleet(freshNode);

    const report = await addNodes(createTestContext({ fleet }), channel, grown(), ['10.0.0.23']);

    expect(report.added).toEqual(['lab-node-03']);
    expect(report.provisioning.map((p) => p.node)).toEqual(['lab-node-03']);
    expect(report.warnings).toEqual([]);
    expect(fleet.count(/^kubeadm join /)).toBe(1);
    expect(fleet.commandsOn('lab-node-03').filter((c) => c.startsWith('kubeadm join 10.0.0.11:6443 '))).toHaveLength(1);
    expect(fleet.count(/hostnamectl set-hostname/)).toBe(4);
    expect(channel.count(/^kubectl label node 'lab-node-03' 'clusterwright\.io\/managed=true'/)).toBe(1);
    expect(channel.count(/^kubectl patch configmap 'clusterwright-config'/)).toBe(1);
  });

  it('touches no node when the addition is declined', async () => {
    const fleet = new FakeFleet(freshNode);
    const ctx = createTestContext({ fleet, autoConfirm: false, prompter: createFakePrompter({ confirm: false }) });

    await expect(addNodes(ctx, managedCluster(labSpec()), grown(), ['10.0.0.23'])).rejects.toBeInstanceOf(
      UserCancelledError,
    );
    expect(fleet.opened).toHaveLength(0);
  });
});

import { describe, it, expect } from '@jest/globals';
import type { NodeDescriptor } from '@/config/schema';
import { NodeBatchError, PhaseError, ValidationError } from '@/lib/errors';
import {
  checkConnectivity,
  memoizePackages,
  provisionNodes,
} from '@/cluster/provision/provisioner';
import { containerRuntimeStep, type ProvisionStep } from '@/cluster/provision/steps';
import { FakeFleet, freshNode } from '../../../__support__/fakes/channel';
import { createFakePackages, createTestContext } from '../../../__support__/fakes/context';
import { labSpec, master, worker } from '../../../__support__/fixtures';

function step(name: string, failOn?: string): ProvisionStep {
  return {
    name,
    appliesTo: () => true,
    isSatisfied: async () => false,
    async apply({ channel, node }) {
      if (node.hostname === failOn) throw new Error('disk full');
      await channel.execute(`run ${name}`);
    },
  };
}

const pipeline = [step('step-1'), step('step-2'), step('step-3', 'lab-node-02'), step('step-4')];

const spec = labSpec({
  nodes: [worker('10.0.0.21'), worker('10.0.0.22'), worker('10.0.0.23'), master('10.0.0.11')],
});
const targets = spec.nodes.filter((n) => n.role === 'worker');

describe('provisionNodes', () => {
  it('reports exactly the failing node while the others complete', async () => {
    const fleet = new FakeFleet();
    const ctx = createTestContext({ fleet });

    const error = await provisionNodes(ctx, spec, targets, { pipeline }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NodeBatchError);
    if (!(error instanceof NodeBatchError)) return;
    expect(error.nodes).toEqual(['lab-node-02']);
    expect(error.failures[0]?.phase).toBe('step-3');
    expect(error.failures[0]?.error).toBeInstanceOf(PhaseError);
    expect(fleet.commandsOn('lab-node-01')).toEqual(['run step-1', 'run step-2', 'run step-3', 'run step-4']);
    expect(fleet.commandsOn('lab-node-03')).toEqual(['run step-1', 'run step-2', 'run step-3', 'run step-4']);
    expect(fleet.commandsOn('lab-node-02')).toEqual(['run step-1', 'run step-2']);
    expect(fleet.opened.every((o) => o.channel.closed)).toBe(true);
  });

  it('returns a per-node report when every node succeeds', async () => {
    const ctx = createTestContext({ fleet: new FakeFleet() });

    const reports = await provisionNodes(ctx, spec, targets, { pipeline: [step('a'), step('b')] });

    expect(reports).toEqual(
      ['lab-node-01', 'lab-node-02', 'lab-node-03'].map((node) => ({
        node,
        steps: [
          { step: 'a', status: 'applied' },
          { step: 'b', status: 'applied' },
        ],
      })),
    );
  });

  it('stops before touching nodes when packages are missing', async () => {
    const fleet = new FakeFleet();
    const ctx = createTestContext({ fleet, packages: createFakePackages(['kubeadm']) });

    const error = await provisionNodes(ctx, spec, targets, { pipeline }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.issues).toEqual(['Missing offline packages: kubeadm']);
    expect(fleet.opened).toHaveLength(0);
  });

  it('skips a runtime that is already installed at the pinned version', async () => {
    const fleet = new FakeFleet((channel) => {
      freshNode(channel);
      channel.on(/^systemctl is-active --quiet containerd/, '').on(/^containerd --version/, 'containerd v2.2.0 abc\n');
    });
    const ctx = createTestContext({ fleet });

    const [report] = await provisionNodes(ctx, spec, targets.slice(0, 1), { pipeline: [containerRuntimeStep] });

    expect(report?.steps).toEqual([{ step: 'container-runtime', status: 'skipped' }]);
    expect(fleet.allUploads()).toEqual([]);
  });

  it('installs the runtime from the package directory', async () => {
    const fleet = new FakeFleet(freshNode);
    const ctx = createTestContext({ fleet });

    await provisionNodes(ctx, spec, targets.slice(0, 1), { pipeline: [containerRuntimeStep] });

    expect(fleet.allUploads().map((u) => [u.path, u.content])).toEqual([
      ['/tmp/containerd.tar.gz', 'package:containerd'],
      ['/tmp/cni-plugins.tgz', 'package:cni-plugins'],
      ['/usr/local/sbin/runc', 'package:runc'],
    ]);
  });
});

describe('memoizePackages', () => {
  it('reads each package once', async () => {
    const packages = createFakePackages();
    const read = memoizePackages(packages, 'v1.34.2');

    await Promise.all([read('kubeadm'), read('kubeadm'), read('kubelet')]);

    expect(packages.read).toHaveBeenCalledTimes(2);
  });
});

describe('checkConnectivity', () => {
  it('names every unreachable node', async () => {
    const fleet = new FakeFleet((channel, node: NodeDescriptor) => {
      if (node.address !== '10.0.0.21') channel.drops(/^hostname$/);
    });
    const ctx = createTestContext({ fleet });

    const error = await checkConnectivity(ctx, targets).catch((e: unknown) => e);

    expect(error instanceof NodeBatchError && error.nodes).toEqual(['lab-node-02', 'lab-node-03']);
  });
});

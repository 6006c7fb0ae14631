import { describe, it, expect } from '@jest/globals';
import { joinMasters, joinWorkers } from '@/cluster/bootstrap/joins';
import type { JoinCredential } from '@/infra/kubernetes/kubeadm';
import { toFailure } from '@/lib/errors';
import { parseClusterSpec } from '@/config/loader';
import {
  FakeFleet,
  TEST_CA_HASH,
  TEST_CERTIFICATE_KEY,
  TEST_TOKEN,
  freshNode,
} from '../../../__support__/fakes/channel';
import { createTestContext } from '../../../__support__/fakes/context';
import { labSpec, master } from '../../../__support__/fixtures';

const credential: JoinCredential = {
  token: TEST_TOKEN,
  caCertHash: `sha256:${TEST_CA_HASH}`,
  certificateKey: TEST_CERTIFICATE_KEY,
};

const failingJoins = () =>
  new FakeFleet((channel) => {
    freshNode(channel);
    channel.fails(/^kubeadm join /, 'preflight checks failed');
  });

function failureMessage(error: unknown): string {
  const failure = toFailure(error);
  return failure.ok ? '' : failure.error;
}

describe('join failures', () => {
  it('keep worker join credentials out of the reported error', async () => {
    const spec = labSpec();
    const ctx = createTestContext({ fleet: failingJoins() });

    const error = await joinWorkers(ctx, spec.nodes.slice(1), '10.0.0.11:6443', credential).catch((e: unknown) => e);
    const message = failureMessage(error);

    expect(message).toMatch(/^Worker join failed on 2 node\(s\): lab-node-01 \[worker-join\]: /);
    expect(message).toContain('--token <redacted> --discovery-token-ca-cert-hash <redacted>');
    expect(message).not.toContain(TEST_TOKEN);
    expect(message).not.toContain(TEST_CA_HASH);
  });

  it('keep the certificate key out of a master join error', async () => {
    const spec = parseClusterSpec({
      name: 'lab',
      ha: { enabled: true, vip: '10.0.0.100' },
      nodes: [master('10.0.0.11'), master('10.0.0.12'), master('10.0.0.13')],
    });
    const ctx = createTestContext({ fleet: failingJoins() });

    const error = await joinMasters(ctx, spec.nodes.slice(1), '10.0.0.100:6443', credential).catch((e: unknown) => e);
    const message = failureMessage(error);

    expect(message).toMatch(/^master-join on lab-master-02: lab-master-02: command exited with 1: kubeadm join /);
    expect(message).not.toContain(TEST_TOKEN);
    expect(message).not.toContain(TEST_CERTIFICATE_KEY);
  });
});

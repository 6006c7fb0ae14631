import { describe, it, expect } from '@jest/globals';
import yaml from 'js-yaml';
import {
  certificateSans,
  issueJoinCredential,
  masterJoinCommand,
  renderInitConfig,
  workerJoinCommand,
} from '@/infra/kubernetes/kubeadm';
import { CredentialExtractionError } from '@/lib/errors';
import { parseClusterSpec } from '@/config/loader';
import { FakeChannel, TEST_CA_HASH, TEST_CERTIFICATE_KEY, TEST_TOKEN, freshNode } from '../../../__support__/fakes/channel';
import { labSpec, master } from '../../../__support__/fixtures';

describe('join credentials', () => {
  it('issues token and CA hash without a certificate key for single-master clusters', async () => {
    const channel = new FakeChannel('lab-master-01');
    freshNode(channel);

    const credential = await issueJoinCredential(channel, false);

    expect(credential).toEqual({ token: TEST_TOKEN, caCertHash: `sha256:${TEST_CA_HASH}` });
    expect(channel.count(/upload-certs/)).toBe(0);
  });

  it('extracts the certificate key when masters will join', async () => {
    const channel = new FakeChannel('lab-master-01');
    freshNode(channel);

    const credential = await issueJoinCredential(channel, true);

    expect(credential.certificateKey).toBe(TEST_CERTIFICATE_KEY);
  });

  it('fails when the upload-certs output carries no certificate key', async () => {
    const channel = new FakeChannel('lab-master-01');
    freshNode(channel);
    channel.on(/^kubeadm init phase upload-certs/, '[upload-certs] Storing the certificates in Secret\n');

    await expect(issueJoinCredential(channel, true)).rejects.toBeInstanceOf(CredentialExtractionError);
  });

  it('rejects a malformed token', async () => {
    const channel = new FakeChannel('lab-master-01');
    freshNode(channel);
    channel.on(/^kubeadm token create/, 'failed to create token\n');

    await expect(issueJoinCredential(channel, false)).rejects.toThrow('kubeadm returned a malformed bootstrap token');
  });
});

describe('join commands', () => {
  const credential = { token: TEST_TOKEN, caCertHash: 'sha256:abc' };

  it('builds the worker join', () => {
    expect(workerJoinCommand('10.0.0.11:6443', credential)).toBe(
      `kubeadm join 10.0.0.11:6443 --token '${TEST_TOKEN}' --discovery-token-ca-cert-hash 'sha256:abc' ` +
        '--cri-socket unix:///var/run/containerd/containerd.sock',
    );
  });

  it('refuses a master join without a certificate key', () => {
    expect(() => masterJoinCommand('10.0.0.11:6443', credential)).toThrow(CredentialExtractionError);
  });

  it('adds the control-plane flags for masters', () => {
    const command = masterJoinCommand('10.0.0.100:6443', { ...credential, certificateKey: 'c0ffee' });

    expect(command).toContain("--control-plane --certificate-key 'c0ffee'");
  });
});

describe('init configuration', () => {
  it('renders the init, cluster and kubelet documents', () => {
    const spec = labSpec();
    const first = spec.nodes[0];
    if (!first) throw new Error('fixture has a master');

    const documents = yaml.loadAll(renderInitConfig(spec, first));

    expect(documents).toHaveLength(3);
    expect(documents[1]).toMatchObject({
      kind: 'ClusterConfiguration',
      clusterName: 'lab',
      kubernetesVersion: 'v1.34.2',
      controlPlaneEndpoint: '10.0.0.11:6443',
      networking: { podSubnet: '10.244.0.0/16', serviceSubnet: '10.96.0.0/12' },
    });
    expect(documents[2]).toEqual({
      apiVersion: 'kubelet.config.k8s.io/v1beta1',
      kind: 'KubeletConfiguration',
      cgroupDriver: 'systemd',
    });
  });

  it('adds every master and the VIP to the certificate SANs', () => {
    const spec = parseClusterSpec({
      name: 'lab',
      ha: { enabled: true, vip: '10.0.0.100' },
      nodes: [master('10.0.0.11'), master('10.0.0.12'), master('10.0.0.13')],
    });

    expect(certificateSans(spec)).toEqual([
      '127.0.0.1',
      'localhost',
      '10.0.0.11',
      'lab-master-01',
      '10.0.0.12',
      'lab-master-02',
      '10.0.0.13',
      'lab-master-03',
      '10.0.0.100',
    ]);
  });
});

import { describe, it, expect } from '@jest/globals';
import {
  loadState,
  sanitizeSpec,
  stateConfigMap,
  stateSecret,
  updateState,
  verifyOwnership,
} from '@/cluster/state/store';
import { OwnershipError, StateNotFoundError } from '@/lib/errors';
import { createSilentLogger } from '@/lib/logger';
import { managedCluster } from '../../../__support__/fakes/cluster';
import { TEST_NOW } from '../../../__support__/fakes/context';
import { labSpec } from '../../../__support__/fixtures';

const withRegistry = () => labSpec({ registry: { username: 'robot', password: 'test-secret' } });

describe('state serialization', () => {
  it('drops registry credentials and SSH passwords', () => {
    const sanitized = sanitizeSpec(withRegistry());

    expect(sanitized.registry).toEqual({});
    expect(sanitized.nodes.every((n) => n.ssh.password === undefined)).toBe(true);
    expect(sanitized.nodes[0]?.ssh.user).toBe('ops');
  });

  it('annotates the ConfigMap with timestamps and tool version', () => {
    const configMap = stateConfigMap(labSpec(), TEST_NOW);

    expect(configMap.metadata).toEqual({
      name: 'clusterwright-config',
      namespace: 'kube-system',
      labels: { app: 'clusterwright', cluster: 'lab' },
      annotations: {
        'clusterwright.io/deployed-at': '2026-03-01T12:00:00.000Z',
        'clusterwright.io/updated-at': '2026-03-01T12:00:00.000Z',
        'clusterwright.io/tool-version': 'v0.3.0',
      },
    });
    expect(configMap.data['cluster.yaml']).not.toContain('test-secret');
  });

  it('stores registry credentials base64-encoded in a Secret', () => {
    expect(stateSecret(labSpec())).toBeUndefined();
    expect(stateSecret(withRegistry())?.data).toEqual({
      'registry-username': 'cm9ib3Q=',
      'registry-password': 'dGVzdC1zZWNyZXQ=',
    });
  });
});

describe('loadState', () => {
  it('reads the persisted spec and its annotations', async () => {
    const channel = managedCluster(labSpec());

    const stored = await loadState(channel, 'lab', createSilentLogger());

    expect(stored.spec.nodes.map((n) => n.hostname)).toEqual(['lab-master-01', 'lab-node-01', 'lab-node-02']);
    expect(stored.spec.registry).toEqual({});
    expect(stored.deployedAt).toBe('2026-03-01T12:00:00.000Z');
    expect(stored.toolVersion).toBe('v0.3.0');
  });

  it('overlays registry credentials from the Secret', async () => {
    const channel = managedCluster(labSpec()).on(
      /^kubectl get secret /,
      JSON.stringify({ data: { 'registry-username': 'cm9ib3Q=', 'registry-password': 'dGVzdC1zZWNyZXQ=' } }),
    );

    const stored = await loadState(channel, 'lab', createSilentLogger());

    expect(stored.spec.registry).toEqual({ username: 'robot', password: 'test-secret' });
  });

  it('raises StateNotFoundError when the ConfigMap is missing', async () => {
    await expect(loadState(managedCluster(undefined), 'lab', createSilentLogger())).rejects.toBeInstanceOf(
      StateNotFoundError,
    );
  });
});

describe('ownership', () => {
  it('returns node names when every node is managed', async () => {
    await expect(verifyOwnership(managedCluster(labSpec()))).resolves.toEqual([
      'lab-master-01',
      'lab-node-01',
      'lab-node-02',
    ]);
  });

  it('names nodes without the management label', async () => {
    const channel = managedCluster(labSpec()).on(/^kubectl get nodes -l /, 'lab-master-01\nlab-node-02\n');

    await expect(verifyOwnership(channel)).rejects.toThrow(
      new OwnershipError('Nodes not managed by clusterwright: lab-node-01'),
    );
  });
});

describe('updateState', () => {
  it('merge-patches the ConfigMap and re-applies the Secret', async () => {
    const channel = managedCluster(labSpec());

    await updateState(channel, withRegistry(), TEST_NOW);

    expect(channel.commands).toHaveLength(2);
    expect(channel.commands[0]).toMatch(/^kubectl patch configmap 'clusterwright-config' -n 'kube-system' --type merge -p /);
    expect(channel.commands[0]).toContain('"clusterwright.io/updated-at":"2026-03-01T12:00:00.000Z"');
    expect(channel.commands[1]).toMatch(/^kubectl apply -f - <</);
    expect(channel.commands[1]).toContain('kind: Secret');
  });
});

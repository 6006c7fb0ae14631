import { describe, it, expect } from '@jest/globals';
import { parseClusterSpec } from '@/config/loader';
import { Kubectl } from '@/infra/kubernetes/kubectl';
import { createSilentLogger } from '@/lib/logger';
import { buildCiliumValues, installCilium, isDaemonSetReady, setupDefaultGateway } from '@/cluster/addons/cilium';
import { FakeChannel, freshNode } from '../../../__support__/fakes/channel';
import { createTestContext } from '../../../__support__/fakes/context';
import { labSpec, master, worker } from '../../../__support__/fixtures';

describe('buildCiliumValues', () => {
  it('replaces kube-proxy and points the agents at the API server', () => {
    const values = buildCiliumValues(labSpec());

    expect(values.kubeProxyReplacement).toBe(true);
    expect(values.k8sServiceHost).toBe('10.0.0.11');
    expect(values.k8sServicePort).toBe(6443);
    expect(values.ipam.operator.clusterPoolIPv4PodCIDRList).toEqual(['10.244.0.0/16']);
    expect(values.loadBalancer.mode).toBe('dsr');
    expect(values.bgpControlPlane.enabled).toBe(false);
    expect(values.operator).toEqual({ replicas: 1 });
    expect(values.image).toBeUndefined();
  });

  it('uses the VIP, two operator replicas and SNAT for l2 clusters', () => {
    const spec = parseClusterSpec({
      name: 'lab',
      ha: { enabled: true, vip: '10.0.0.100' },
      addons: { loadBalancer: { mode: 'l2' }, bgp: { loadBalancerIps: ['10.0.100.0/28'] } },
      nodes: [master('10.0.0.11'), master('10.0.0.12'), master('10.0.0.13'), worker('10.0.0.21')],
    });

    const values = buildCiliumValues(spec);

    expect(values.k8sServiceHost).toBe('10.0.0.100');
    expect(values.operator.replicas).toBe(2);
    expect(values.loadBalancer.mode).toBe('snat');
  });

  it('turns Hubble metrics off without disabling Hubble', () => {
    const values = buildCiliumValues(labSpec({ addons: { observability: { metrics: false } } }));

    expect(values.hubble.enabled).toBe(true);
    expect(values.hubble.metrics.enabled).toBeNull();
    expect(values.hubble.ui.service).toEqual({ type: 'NodePort', nodePort: 31235 });
  });

  it('pulls every image from a private registry', () => {
    const values = buildCiliumValues(labSpec({ imageRepository: 'https://registry.local:5000/' }));

    expect(values.image).toEqual({ repository: 'registry.local:5000/cilium/cilium', useDigest: false });
    expect(values.operator.image?.repository).toBe('registry.local:5000/cilium/operator');
    expect(values.hubble.ui.backend?.image.repository).toBe('registry.local:5000/cilium/hubble-ui-backend');
  });
});

describe('isDaemonSetReady', () => {
  it('needs every scheduled pod ready', () => {
    expect(isDaemonSetReady('3/3')).toBe(true);
    expect(isDaemonSetReady('2/3')).toBe(false);
    expect(isDaemonSetReady('0/0')).toBe(false);
    expect(isDaemonSetReady('/')).toBe(false);
  });
});

describe('installCilium', () => {
  it('uploads helm, the chart and private values, then waits for the agents', async () => {
    const channel = new FakeChannel('lab-master-01');
    freshNode(channel);
    channel.on(/^kubectl get ds 'cilium'/, (() => {
      const answers = ['1/3', '3/3'];
      return () => answers.shift() ?? '3/3';
    })());

    const warnings = await installCilium(createTestContext(), labSpec(), channel);

    expect(warnings).toEqual([]);
    expect(channel.uploads.map((u) => [u.path, u.mode.toString(8)])).toEqual([
      ['/usr/local/bin/helm', '755'],
      ['/tmp/cilium-chart.tgz', '644'],
      ['/tmp/cilium-values.yaml', '600'],
    ]);
    expect(channel.count(/^kubectl get ds 'cilium'/)).toBe(2);
  });

  it('fails when kube-proxy is still deployed', async () => {
    const channel = new FakeChannel('lab-master-01');
    freshNode(channel);
    channel.on(/^kubectl get ds kube-proxy/, 'kube-proxy 3 3');

    await expect(installCilium(createTestContext(), labSpec(), channel)).rejects.toThrow(
      'kube-proxy DaemonSet is present although Cilium replaces it',
    );
  });
});

describe('setupDefaultGateway', () => {
  it('warns instead of failing when the GatewayClass is never accepted', async () => {
    const channel = new FakeChannel().on(/^kubectl get gatewayclass/, 'Unknown');

    const warnings = await setupDefaultGateway(createTestContext(), new Kubectl(channel), createSilentLogger());

    expect(warnings).toEqual(['Timed out waiting for GatewayClass acceptance after 12 attempts (last observed: Unknown)']);
    expect(channel.count(/^kubectl apply/)).toBe(0);
  });

  it('applies the default gateway once the class is accepted', async () => {
    const channel = new FakeChannel()
      .on(/^kubectl get gatewayclass/, 'True')
      .on(/^kubectl get gateway 'default-gateway'/, '10.0.100.1');

    const warnings = await setupDefaultGateway(createTestContext(), new Kubectl(channel), createSilentLogger());

    expect(warnings).toEqual([]);
    expect(channel.count(/^kubectl apply -f - <</)).toBe(1);
  });
});

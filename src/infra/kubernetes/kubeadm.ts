/**
 * kubeadm documents and commands
 *
 * Typed InitConfiguration/ClusterConfiguration rendering, join command
 * builders, and join-credential issuance on the first master.
 */

import yaml from 'js-yaml';
import { KUBERNETES } from '@/config/constants';
import { controlPlaneEndpoint, masters, type ClusterSpec, type NodeDescriptor } from '@/config/schema';
import type { CommandChannel } from '@/infra/channel';
import { CredentialExtractionError } from '@/lib/errors';
import { script, shellQuote } from '@/lib/shell';

interface InitConfiguration {
  apiVersion: string;
  kind: 'InitConfiguration';
  localAPIEndpoint: { advertiseAddress: string; bindPort: number };
  nodeRegistration: { name: string; criSocket: string };
}

interface ClusterConfiguration {
  apiVersion: string;
  kind: 'ClusterConfiguration';
  clusterName: string;
  kubernetesVersion: string;
  imageRepository: string;
  controlPlaneEndpoint: string;
  networking: { podSubnet: string; serviceSubnet: string };
  apiServer: { certSANs: string[] };
}

interface KubeletConfiguration {
  apiVersion: 'kubelet.config.k8s.io/v1beta1';
  kind: 'KubeletConfiguration';
  cgroupDriver: 'systemd';
}

export function certificateSans(spec: ClusterSpec): string[] {
  const sans = new Set<string>(['127.0.0.1', 'localhost']);
  for (const master of masters(spec)) {
    sans.add(master.address);
    sans.add(master.hostname);
  }
  if (spec.ha.enabled && spec.ha.vip) sans.add(spec.ha.vip);
  return [...sans];
}

export function buildInitDocuments(
  spec: ClusterSpec,
  firstMaster: NodeDescriptor,
): [InitConfiguration, ClusterConfiguration, KubeletConfiguration] {
  return [
    {
      apiVersion: KUBERNETES.KUBEADM_API_VERSION,
      kind: 'InitConfiguration',
      localAPIEndpoint: { advertiseAddress: firstMaster.address, bindPort: KUBERNETES.API_PORT },
      nodeRegistration: { name: firstMaster.hostname, criSocket: KUBERNETES.CRI_SOCKET },
    },
    {
      apiVersion: KUBERNETES.KUBEADM_API_VERSION,
      kind: 'ClusterConfiguration',
      clusterName: spec.name,
      kubernetesVersion: spec.version,
      imageRepository: spec.imageRepository,
      controlPlaneEndpoint: controlPlaneEndpoint(spec, KUBERNETES.API_PORT),
      networking: {
        podSubnet: spec.networking.podSubnet,
        serviceSubnet: spec.networking.serviceSubnet,
      },
      apiServer: { certSANs: certificateSans(spec) },
    },
    {
      apiVersion: 'kubelet.config.k8s.io/v1beta1',
      kind: 'KubeletConfiguration',
      cgroupDriver: 'systemd',
    },
  ];
}

export function renderInitConfig(spec: ClusterSpec, firstMaster: NodeDescriptor): string {
  return buildInitDocuments(spec, firstMaster)
    .map((doc) => yaml.dump(doc, { lineWidth: -1, noRefs: true }))
    .join('---\n');
}

export function initCommand(configPath: string = KUBERNETES.INIT_CONFIG_PATH): string {
  return `kubeadm init --config ${shellQuote(configPath)} --skip-phases=addon/kube-proxy`;
}

/**
 * Copies admin.conf into the connected user's kubeconfig.
 */
export const INSTALL_KUBECONFIG = script(
  'mkdir -p "$HOME/.kube"',
  `cp -f ${KUBERNETES.ADMIN_CONF} "$HOME/.kube/config"`,
  'chown "$(id -u):$(id -g)" "$HOME/.kube/config"',
);

/**
 * Wipes a previous control plane or node membership so kubeadm can run again.
 */
export const RESET_NODE = script(
  'systemctl stop kubelet || true',
  `kubeadm reset -f --cri-socket ${KUBERNETES.RESET_CRI_SOCKET} || true`,
  'pkill -9 kube-apiserver || true',
  'pkill -9 kube-controller || true',
  'pkill -9 kube-scheduler || true',
  'pkill -9 etcd || true',
  'rm -rf /etc/kubernetes/* /var/lib/etcd/* /var/lib/kubelet/*',
  'ip link delete cni0 2>/dev/null || true',
  'ip link delete flannel.1 2>/dev/null || true',
  'for link in $(ip -o link show | awk -F": " \'{print $2}\' | cut -d@ -f1 | grep "^cilium_"); do ip link delete "$link" || true; done',
  'systemctl restart containerd',
  'sleep 3',
);

/**
 * Short-lived credentials a new node presents to join the control plane.
 * Never persisted, never logged.
 */
export interface JoinCredential {
  token: string;
  caCertHash: string;
  /** Only issued when other masters will join */
  certificateKey?: string;
}

export function masterJoinCommand(endpoint: string, credential: JoinCredential): string {
  if (!credential.certificateKey) {
    throw new CredentialExtractionError('A certificate key is required to join a master', '');
  }
  return [
    `kubeadm join ${endpoint}`,
    `--token ${shellQuote(credential.token)}`,
    `--discovery-token-ca-cert-hash ${shellQuote(credential.caCertHash)}`,
    '--control-plane',
    `--certificate-key ${shellQuote(credential.certificateKey)}`,
    `--cri-socket ${KUBERNETES.CRI_SOCKET}`,
  ].join(' ');
}

export function workerJoinCommand(endpoint: string, credential: JoinCredential): string {
  return [
    `kubeadm join ${endpoint}`,
    `--token ${shellQuote(credential.token)}`,
    `--discovery-token-ca-cert-hash ${shellQuote(credential.caCertHash)}`,
    `--cri-socket ${KUBERNETES.CRI_SOCKET}`,
  ].join(' ');
}

/**
 * Pulls the certificate key out of `kubeadm init phase upload-certs` output.
 *
 * The output is free-form text whose format kubeadm does not promise to keep;
 * swap the implementation if a structured output mode becomes available.
 */
export interface CertificateKeyExtractor {
  extract(output: string): string | undefined;
}

export const regexCertificateKeyExtractor: CertificateKeyExtractor = {
  extract(output) {
    const match = /certificate key:\s+([a-f0-9]+)/i.exec(output);
    return match?.[1];
  },
};

const TOKEN_PATTERN = /^[a-z0-9]{6}\.[a-z0-9]{16}$/;
const HASH_PATTERN = /^[a-f0-9]{64}$/;

export const CA_HASH_COMMAND =
  `openssl x509 -pubkey -in ${KUBERNETES.CA_CERT} | openssl rsa -pubin -outform der 2>/dev/null | ` +
  "openssl dgst -sha256 -hex | sed 's/^.* //'";

export const TOKEN_CREATE_COMMAND = `kubeadm token create --ttl ${KUBERNETES.TOKEN_TTL}`;

export const UPLOAD_CERTS_COMMAND = 'kubeadm init phase upload-certs --upload-certs';

/**
 * Issues a bootstrap token and CA fingerprint, plus a certificate key when
 * `withCertificateKey` is set.
 */
export async function issueJoinCredential(
  channel: CommandChannel,
  withCertificateKey: boolean,
  extractor: CertificateKeyExtractor = regexCertificateKeyExtractor,
): Promise<JoinCredential> {
  const token = (await channel.execute(TOKEN_CREATE_COMMAND)).trim();
  if (!TOKEN_PATTERN.test(token)) {
    throw new CredentialExtractionError('kubeadm returned a malformed bootstrap token', token);
  }

  const hash = (await channel.execute(CA_HASH_COMMAND)).trim();
  if (!HASH_PATTERN.test(hash)) {
    throw new CredentialExtractionError('Could not compute the CA public key fingerprint', hash);
  }

  const credential: JoinCredential = { token, caCertHash: `sha256:${hash}` };
  if (!withCertificateKey) return credential;

  const output = await channel.execute(UPLOAD_CERTS_COMMAND);
  const certificateKey = extractor.extract(output);
  if (!certificateKey) {
    throw new CredentialExtractionError('Certificate key not found in upload-certs output', output);
  }
  return { ...credential, certificateKey };
}

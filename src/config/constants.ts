/**
 * Application Constants and Defaults
 *
 * Remote paths, resource names, retry budgets and cluster defaults in one place.
 */

export const TOOL_NAME = 'clusterwright';
export const TOOL_VERSION = 'v0.3.0';

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  /** SSH connection establishment: 30 seconds. */
  sshConnect: 30_000,
  /** Readiness poll interval: 5 seconds. */
  pollInterval: 5_000,
  /** Pause after restarting containerd during a reset: 3 seconds. */
  runtimeRestartSettle: 3_000,
} as const;

/**
 * Retry budget for connection-level failures
 */
export const RETRY = {
  /** Attempts per command, including the first */
  MAX_ATTEMPTS: 3,
  /** Fixed backoff between attempts (ms) */
  BACKOFF_MS: 2_000,
} as const;

/**
 * Poll budgets (attempts at DEFAULT_TIMEOUTS.pollInterval)
 */
export const POLL_BUDGETS = {
  /** Cilium agent readiness: 5 minutes */
  ciliumReady: 60,
  /** GatewayClass acceptance: 1 minute */
  gatewayClass: 12,
  /** Gateway address assignment: 1 minute */
  gatewayAddress: 12,
} as const;

export const CLUSTER_DEFAULTS = {
  version: 'v1.34.2',
  imageRepository: 'registry.k8s.io',
  podSubnet: '10.244.0.0/16',
  serviceSubnet: '10.96.0.0/12',
  sshPort: 22,
  loadBalancerMode: 'dsr',
  hubbleUiNodePort: 31235,
} as const;

/**
 * Kubernetes paths and endpoints on the nodes
 */
export const KUBERNETES = {
  API_PORT: 6443,
  ADMIN_CONF: '/etc/kubernetes/admin.conf',
  KUBELET_CONF: '/etc/kubernetes/kubelet.conf',
  CA_CERT: '/etc/kubernetes/pki/ca.crt',
  INIT_CONFIG_PATH: '/tmp/kubeadm-init.yaml',
  CRI_SOCKET: 'unix:///var/run/containerd/containerd.sock',
  RESET_CRI_SOCKET: 'unix:///run/containerd/containerd.sock',
  TOKEN_TTL: '24h',
  SYSTEM_NAMESPACE: 'kube-system',
  KUBEADM_API_VERSION: 'kubeadm.k8s.io/v1beta4',
} as const;

/**
 * Labels and names of the cluster-resident state
 */
export const STATE = {
  CONFIGMAP: `${TOOL_NAME}-config`,
  SECRET: `${TOOL_NAME}-secret`,
  CONFIG_KEY: 'cluster.yaml',
  SECRET_USERNAME_KEY: 'registry-username',
  SECRET_PASSWORD_KEY: 'registry-password',
  MANAGED_LABEL: `${TOOL_NAME}.io/managed`,
  VERSION_LABEL: `${TOOL_NAME}.io/version`,
  DEPLOYED_AT: `${TOOL_NAME}.io/deployed-at`,
  UPDATED_AT: `${TOOL_NAME}.io/updated-at`,
  TOOL_VERSION_ANNOTATION: `${TOOL_NAME}.io/tool-version`,
} as const;

export const ADDONS = {
  CILIUM_RELEASE: 'cilium',
  CILIUM_NAMESPACE: 'kube-system',
  CILIUM_VALUES_PATH: '/tmp/cilium-values.yaml',
  CILIUM_CHART_PATH: '/tmp/cilium-chart.tgz',
  METALLB_RELEASE: 'metallb',
  METALLB_NAMESPACE: 'metallb-system',
  METALLB_VALUES_PATH: '/tmp/metallb-values.yaml',
  METALLB_CHART_PATH: '/tmp/metallb-chart.tgz',
  METALLB_ROLLOUT_TIMEOUT: '180s',
  GATEWAY_CLASS: 'cilium',
  DEFAULT_GATEWAY: 'default-gateway',
  GPU_LABEL: { gpu: 'on' },
} as const;

/**
 * Remote install locations
 */
export const REMOTE_PATHS = {
  BIN_DIR: '/usr/local/bin',
  SBIN_DIR: '/usr/local/sbin',
  CNI_BIN_DIR: '/opt/cni/bin',
  STAGING_DIR: '/tmp',
  HOSTS_FILE: '/etc/hosts',
} as const;

export const HOSTS_MARKERS = {
  BEGIN: `# BEGIN ${TOOL_NAME} managed hosts`,
  END: `# END ${TOOL_NAME} managed hosts`,
} as const;

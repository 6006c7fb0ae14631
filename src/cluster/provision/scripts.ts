/**
 * Node-side scripts and unit files used by the provisioning steps.
 */

import { REMOTE_PATHS } from '@/config/constants';
import { script, shellQuote, writeFileCommand } from '@/lib/shell';

const SYSCTL = `net.bridge.bridge-nf-call-iptables = 1
net.bridge.bridge-nf-call-ip6tables = 1
net.ipv4.ip_forward = 1
vm.swappiness = 0
fs.inotify.max_user_watches = 524288
fs.inotify.max_user_instances = 8192
`;

const MODULES = `overlay
br_netfilter
`;

export const BASELINE = script(
  'swapoff -a',
  "sed -i '/\\sswap\\s/s/^\\([^#]\\)/#\\1/' /etc/fstab",
  writeFileCommand('/etc/modules-load.d/k8s.conf', MODULES),
  'modprobe overlay',
  'modprobe br_netfilter',
  writeFileCommand('/etc/sysctl.d/99-kubernetes.conf', SYSCTL),
  'sysctl --system >/dev/null',
  'systemctl disable --now ufw 2>/dev/null || true',
  'systemctl disable --now firewalld 2>/dev/null || true',
  'if command -v setenforce >/dev/null 2>&1; then setenforce 0 || true; ' +
    "sed -i 's/^SELINUX=enforcing/SELINUX=permissive/' /etc/selinux/config; fi",
);

const CONTAINERD_UNIT = `[Unit]
Description=containerd container runtime
Documentation=https://containerd.io
After=network.target local-fs.target

[Service]
ExecStartPre=-/sbin/modprobe overlay
ExecStart=/usr/local/bin/containerd
Type=notify
Delegate=yes
KillMode=process
Restart=always
RestartSec=5
LimitNPROC=infinity
LimitCORE=infinity
LimitNOFILE=infinity
TasksMax=infinity
OOMScoreAdjust=-999

[Install]
WantedBy=multi-user.target
`;

const KUBELET_UNIT = `[Unit]
Description=kubelet: The Kubernetes Node Agent
Documentation=https://kubernetes.io/docs/
Wants=network-online.target
After=network-online.target

[Service]
ExecStart=/usr/local/bin/kubelet
Restart=always
StartLimitInterval=0
RestartSec=10

[Install]
WantedBy=multi-user.target
`;

const KUBELET_DROPIN = `[Service]
Environment="KUBELET_KUBECONFIG_ARGS=--bootstrap-kubeconfig=/etc/kubernetes/bootstrap-kubelet.conf --kubeconfig=/etc/kubernetes/kubelet.conf"
Environment="KUBELET_CONFIG_ARGS=--config=/var/lib/kubelet/config.yaml"
Environment="KUBELET_EXTRA_ARGS=--container-runtime-endpoint=unix:///run/containerd/containerd.sock"
EnvironmentFile=-/var/lib/kubelet/kubeadm-flags.env
EnvironmentFile=-/etc/default/kubelet
ExecStart=
ExecStart=/usr/local/bin/kubelet $KUBELET_KUBECONFIG_ARGS $KUBELET_CONFIG_ARGS $KUBELET_KUBEADM_ARGS $KUBELET_EXTRA_ARGS
`;

export const STAGED = {
  containerd: `${REMOTE_PATHS.STAGING_DIR}/containerd.tar.gz`,
  cniPlugins: `${REMOTE_PATHS.STAGING_DIR}/cni-plugins.tgz`,
} as const;

export const INSTALL_CONTAINERD = script(
  'systemctl stop containerd 2>/dev/null || true',
  `tar -xzf ${STAGED.containerd} -C /usr/local`,
  `rm -f ${STAGED.containerd}`,
  `mkdir -p ${REMOTE_PATHS.CNI_BIN_DIR}`,
  `tar -xzf ${STAGED.cniPlugins} -C ${REMOTE_PATHS.CNI_BIN_DIR}`,
  `rm -f ${STAGED.cniPlugins}`,
  writeFileCommand('/etc/systemd/system/containerd.service', CONTAINERD_UNIT),
  'mkdir -p /etc/containerd',
  'containerd config default > /etc/containerd/config.toml',
  "sed -i 's/SystemdCgroup = false/SystemdCgroup = true/' /etc/containerd/config.toml",
);

/**
 * hosts.toml for a private registry reachable over plain HTTP.
 */
export function registryMirrorCommand(host: string): string {
  const dir = `/etc/containerd/certs.d/${host}`;
  const hostsToml = `server = "http://${host}"

[host."http://${host}"]
  capabilities = ["pull", "resolve", "push"]
  skip_verify = true
`;
  return script(`mkdir -p ${shellQuote(dir)}`, writeFileCommand(`${dir}/hosts.toml`, hostsToml));
}

export const START_CONTAINERD = script(
  'mkdir -p /var/run/containerd',
  'ln -sf /run/containerd/containerd.sock /var/run/containerd/containerd.sock',
  'systemctl daemon-reload',
  'systemctl enable containerd',
  'systemctl restart containerd',
);

export const INSTALL_KUBELET_UNITS = script(
  'mkdir -p /etc/systemd/system/kubelet.service.d',
  writeFileCommand('/etc/systemd/system/kubelet.service', KUBELET_UNIT),
  writeFileCommand('/etc/systemd/system/kubelet.service.d/10-kubeadm.conf', KUBELET_DROPIN),
  'systemctl daemon-reload',
  'systemctl enable kubelet',
);

export const NVIDIA_DRIVER = 'nvidia-driver-580-server-open';

export const INSTALL_GPU_STACK = script(
  'export DEBIAN_FRONTEND=noninteractive',
  'apt-get update',
  `apt-get install -y ${NVIDIA_DRIVER} nvidia-container-toolkit`,
  `apt-mark hold ${NVIDIA_DRIVER}`,
  'nvidia-ctk runtime configure --runtime=containerd --set-as-default',
  'systemctl restart containerd',
);

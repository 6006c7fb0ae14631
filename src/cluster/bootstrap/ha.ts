/**
 * VIP failover for HA control planes
 *
 * keepalived holds the VIP on the highest-priority master whose API server
 * answers locally; the API servers themselves listen on every address, so
 * `VIP:6443` reaches whichever master currently owns the VIP.
 */

import type { CommandContext } from '@/core/context';
import { KUBERNETES } from '@/config/constants';
import { masters, type ClusterSpec, type NodeDescriptor } from '@/config/schema';
import { withChannel } from '@/infra/channel';
import { PhaseError } from '@/lib/errors';
import { script, shellQuote, writeFileCommand } from '@/lib/shell';

const KEEPALIVED_CONF = '/etc/keepalived/keepalived.conf';
const INTERFACE_PLACEHOLDER = '__VIP_INTERFACE__';

export interface KeepalivedParams {
  vip: string;
  priority: number;
  primary: boolean;
  authPass: string;
}

export function keepalivedConfig(params: KeepalivedParams): string {
  return `vrrp_script chk_apiserver {
    script "/usr/bin/curl -sfk -o /dev/null https://127.0.0.1:${KUBERNETES.API_PORT}/livez"
    interval 3
    fall 3
    rise 2
    weight -20
}

vrrp_instance VI_K8S_API {
    state ${params.primary ? 'MASTER' : 'BACKUP'}
    interface ${INTERFACE_PLACEHOLDER}
    virtual_router_id 51
    priority ${params.priority}
    advert_int 1
    authentication {
        auth_type PASS
        auth_pass ${params.authPass}
    }
    virtual_ipaddress {
        ${params.vip}
    }
    track_script {
        chk_apiserver
    }
}
`;
}

export function keepalivedCommand(address: string, params: KeepalivedParams): string {
  return script(
    'export DEBIAN_FRONTEND=noninteractive',
    'command -v keepalived >/dev/null 2>&1 || (apt-get update -qq && apt-get install -y keepalived curl)',
    'mkdir -p /etc/keepalived',
    writeFileCommand(KEEPALIVED_CONF, keepalivedConfig(params)),
    `iface=$(ip -o -4 addr show | awk -v addr=${shellQuote(address)} '{ split($4, a, "/"); if (a[1] == addr) print $2 }' | head -n1)`,
    'test -n "$iface"',
    `sed -i "s/${INTERFACE_PLACEHOLDER}/$iface/" ${KEEPALIVED_CONF}`,
    'systemctl enable keepalived',
    'systemctl restart keepalived',
  );
}

/**
 * Applied to masters in order; the first one starts as VRRP MASTER. `only`
 * limits the run to some masters while keeping every master's priority.
 */
export async function setupVipFailover(
  ctx: CommandContext,
  spec: ClusterSpec,
  only?: readonly NodeDescriptor[],
): Promise<void> {
  const vip = spec.ha.vip;
  if (!spec.ha.enabled || !vip) return;
  const authPass = spec.name.replace(/-/g, '').slice(0, 8).padEnd(8, '0');
  const selected = only ? new Set(only.map((n) => n.address)) : undefined;

  for (const [index, master] of masters(spec).entries()) {
    if (selected && !selected.has(master.address)) continue;
    const params: KeepalivedParams = { vip, priority: 100 - index * 10, primary: index === 0, authPass };
    try {
      await withChannel(ctx.openChannel, master, (channel) =>
        channel.execute(keepalivedCommand(master.address, params)),
      );
    } catch (error) {
      throw new PhaseError('vip-failover', master.hostname, error);
    }
    ctx.logger.info({ node: master.hostname, priority: params.priority }, 'VIP failover configured');
  }
}

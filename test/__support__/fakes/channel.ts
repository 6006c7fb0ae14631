/**
 * In-process command channels
 *
 * Responders are matched against each command, the most recently registered
 * first; an unmatched command succeeds with empty output.
 */

import type { CommandChannel } from '@/infra/channel';
import type { NodeDescriptor } from '@/config/schema';
import { ConnectionError, RemoteCommandError } from '@/lib/errors';

type Respond = (command: string) => Promise<string>;

export interface RecordedUpload {
  path: string;
  content: string;
  mode: number;
}

export class FakeChannel implements CommandChannel {
  readonly commands: string[] = [];
  readonly uploads: RecordedUpload[] = [];
  closed = false;
  private readonly responders: Array<{ pattern: RegExp; respond: Respond }> = [];

  constructor(readonly target: string = 'fake') {}

  on(pattern: RegExp, output: string | ((command: string) => string)): this {
    this.responders.push({
      pattern,
      respond: async (command) => (typeof output === 'string' ? output : output(command)),
    });
    return this;
  }

  /** Matching commands exit nonzero */
  fails(pattern: RegExp, stderr = 'command failed', exitCode = 1): this {
    this.responders.push({
      pattern,
      respond: async (command) => {
        throw new RemoteCommandError(this.target, command, exitCode, stderr);
      },
    });
    return this;
  }

  /** Matching commands lose the connection */
  drops(pattern: RegExp): this {
    this.responders.push({
      pattern,
      respond: async () => {
        throw new ConnectionError(this.target, 'connection reset');
      },
    });
    return this;
  }

  async execute(command: string): Promise<string> {
    this.commands.push(command);
    for (let i = this.responders.length - 1; i >= 0; i--) {
      const responder = this.responders[i];
      if (responder?.pattern.test(command)) return responder.respond(command);
    }
    return '';
  }

  async upload(content: string | Buffer, remotePath: string, mode = 0o644): Promise<void> {
    this.uploads.push({ path: remotePath, content: content.toString(), mode });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  count(pattern: RegExp): number {
    return this.commands.filter((c) => pattern.test(c)).length;
  }
}

/**
 * Channel factory handing out one fresh `FakeChannel` per open, each set up
 * by `configure` for the node it targets.
 */
export class FakeFleet {
  readonly opened: Array<{ node: string; channel: FakeChannel }> = [];

  constructor(private readonly configure: (channel: FakeChannel, node: NodeDescriptor) => void = () => {}) {}

  readonly openChannel = (node: NodeDescriptor): FakeChannel => {
    const channel = new FakeChannel(node.hostname);
    this.configure(channel, node);
    this.opened.push({ node: node.hostname, channel });
    return channel;
  };

  commandsOn(hostname: string): string[] {
    return this.opened.filter((o) => o.node === hostname).flatMap((o) => o.channel.commands);
  }

  allCommands(): string[] {
    return this.opened.flatMap((o) => o.channel.commands);
  }

  allUploads(): RecordedUpload[] {
    return this.opened.flatMap((o) => o.channel.uploads);
  }

  count(pattern: RegExp): number {
    return this.allCommands().filter((c) => pattern.test(c)).length;
  }
}

export const TEST_TOKEN = 'abcdef.0123456789abcdef';
export const TEST_CA_HASH = 'a'.repeat(64);
export const TEST_CERTIFICATE_KEY = 'b'.repeat(64);

/**
 * A freshly installed machine: nothing provisioned, no previous cluster, and
 * a control plane that comes up on the first try.
 */
export function freshNode(channel: FakeChannel): void {
  channel
    .fails(/^test -f /)
    .fails(/^systemctl is-active --quiet containerd/)
    .fails(/^command -v /)
    .fails(/^nvidia-smi/)
    .fails(/^kubectl get ds kube-proxy/, 'Error from server (NotFound)')
    .on(/^kubeadm token create/, `${TEST_TOKEN}\n`)
    .on(/^openssl x509/, `${TEST_CA_HASH}\n`)
    .on(/^kubeadm init phase upload-certs/, `[upload-certs] Using certificate key:\n${TEST_CERTIFICATE_KEY}\n`)
    .on(/^kubectl get ds 'cilium'/, '3/3')
    .on(/^kubectl get nodes -o wide/, 'NAME            STATUS   ROLES\nlab-master-01   Ready    control-plane\n');
}

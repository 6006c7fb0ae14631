/**
 * kubectl over a command channel
 *
 * Runs on a master that carries an admin kubeconfig. Manifests are piped in
 * through a quoted heredoc; every other argument is shell-quoted.
 */

import yaml from 'js-yaml';
import type { CommandChannel } from '@/infra/channel';
import { ValidationError, extractErrorMessage } from '@/lib/errors';
import { pipeCommand, shellQuote } from '@/lib/shell';

export interface KubeObject {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    namespace?: string;
    labels?: Record<string, string>;
    annotations?: Record<string, string>;
  };
}

export class Kubectl {
  constructor(private readonly channel: CommandChannel) {}

  apply(objects: readonly KubeObject[]): Promise<string> {
    const body = objects.map((o) => yaml.dump(o, { lineWidth: -1, noRefs: true })).join('---\n');
    return this.channel.execute(pipeCommand('kubectl apply -f -', body));
  }

  /**
   * `kubectl get` with a jsonpath output; resolves with trimmed output.
   */
  async jsonpath(resource: string, name: string, path: string, namespace?: string): Promise<string> {
    const ns = namespace ? ` -n ${shellQuote(namespace)}` : '';
    const out = await this.channel.execute(
      `kubectl get ${resource} ${shellQuote(name)}${ns} -o jsonpath=${shellQuote(`{${path}}`)}`,
    );
    return out.trim();
  }

  /**
   * `kubectl get -o json`, parsed.
   */
  async getJson(resource: string, name: string, namespace: string): Promise<unknown> {
    const out = await this.channel.execute(
      `kubectl get ${resource} ${shellQuote(name)} -n ${shellQuote(namespace)} -o json`,
    );
    try {
      return JSON.parse(out);
    } catch (error) {
      throw new ValidationError([`${resource}/${name}: kubectl returned invalid JSON: ${extractErrorMessage(error)}`]);
    }
  }

  /**
   * Node names, optionally filtered by a label selector.
   */
  async nodeNames(selector?: string): Promise<string[]> {
    const filter = selector ? ` -l ${shellQuote(selector)}` : '';
    const out = await this.channel.execute(
      `kubectl get nodes${filter} --no-headers -o custom-columns=NAME:.metadata.name`,
    );
    return out
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  label(kind: string, name: string, labels: Record<string, string>): Promise<string> {
    const pairs = Object.entries(labels).map(([k, v]) => shellQuote(`${k}=${v}`));
    return this.channel.execute(`kubectl label ${kind} ${shellQuote(name)} ${pairs.join(' ')} --overwrite`);
  }

  mergePatch(kind: string, name: string, namespace: string, patch: unknown): Promise<string> {
    return this.channel.execute(
      `kubectl patch ${kind} ${shellQuote(name)} -n ${shellQuote(namespace)} --type merge -p ${shellQuote(
        JSON.stringify(patch),
      )}`,
    );
  }

  run(args: string): Promise<string> {
    return this.channel.execute(`kubectl ${args}`);
  }
}

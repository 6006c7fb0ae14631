/**
 * Cluster-resident state
 *
 * The sanitized spec lives in a ConfigMap in kube-system; registry
 * credentials live in a separate Secret. Nothing is stored on the operator
 * machine.
 */

import yaml from 'js-yaml';
import type { Logger } from 'pino';
import { z } from 'zod';
import { KUBERNETES, STATE, TOOL_NAME, TOOL_VERSION } from '@/config/constants';
import { parseStoredSpec } from '@/config/loader';
import type { ClusterSpec } from '@/config/schema';
import type { CommandChannel } from '@/infra/channel';
import { Kubectl, type KubeObject } from '@/infra/kubernetes/kubectl';
import {
  OwnershipError,
  RemoteCommandError,
  StateNotFoundError,
  ValidationError,
  extractErrorMessage,
} from '@/lib/errors';

export interface ConfigMapObject extends KubeObject {
  kind: 'ConfigMap';
  data: Record<string, string>;
}

export interface SecretObject extends KubeObject {
  kind: 'Secret';
  type: 'Opaque';
  data: Record<string, string>;
}

export interface StoredState {
  spec: ClusterSpec;
  deployedAt?: string;
  updatedAt?: string;
  toolVersion?: string;
}

const configMapSchema = z.object({
  metadata: z.object({
    annotations: z.record(z.string()).optional(),
  }),
  data: z.record(z.string()).optional(),
});

const secretSchema = z.object({
  data: z.record(z.string()).optional(),
});

/**
 * Copy of the spec without registry credentials or SSH passwords.
 */
export function sanitizeSpec(spec: ClusterSpec): ClusterSpec {
  return {
    ...spec,
    registry: {},
    nodes: spec.nodes.map((node) => {
      const ssh = { ...node.ssh };
      delete ssh.password;
      return { ...node, ssh };
    }),
  };
}

export function hasRegistryCredentials(spec: ClusterSpec): boolean {
  return Boolean(spec.registry.username || spec.registry.password);
}

function serializeSpec(spec: ClusterSpec): string {
  return yaml.dump(sanitizeSpec(spec), { lineWidth: -1, noRefs: true });
}

export function stateConfigMap(spec: ClusterSpec, now: Date): ConfigMapObject {
  const timestamp = now.toISOString();
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: {
      name: STATE.CONFIGMAP,
      namespace: KUBERNETES.SYSTEM_NAMESPACE,
      labels: { app: TOOL_NAME, cluster: spec.name },
      annotations: {
        [STATE.DEPLOYED_AT]: timestamp,
        [STATE.UPDATED_AT]: timestamp,
        [STATE.TOOL_VERSION_ANNOTATION]: TOOL_VERSION,
      },
    },
    data: { [STATE.CONFIG_KEY]: serializeSpec(spec) },
  };
}

export function stateSecret(spec: ClusterSpec): SecretObject | undefined {
  if (!hasRegistryCredentials(spec)) return undefined;
  const encode = (value: string | undefined): string => Buffer.from(value ?? '', 'utf-8').toString('base64');
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    type: 'Opaque',
    metadata: {
      name: STATE.SECRET,
      namespace: KUBERNETES.SYSTEM_NAMESPACE,
      labels: { app: TOOL_NAME, cluster: spec.name },
    },
    data: {
      [STATE.SECRET_USERNAME_KEY]: encode(spec.registry.username),
      [STATE.SECRET_PASSWORD_KEY]: encode(spec.registry.password),
    },
  };
}

/**
 * Writes the ConfigMap and, when credentials are set, the Secret.
 */
export async function saveState(channel: CommandChannel, spec: ClusterSpec, now: Date): Promise<void> {
  const objects: KubeObject[] = [stateConfigMap(spec, now)];
  const secret = stateSecret(spec);
  if (secret) objects.push(secret);
  await new Kubectl(channel).apply(objects);
}

/**
 * Every node must carry the management label. Returns the node names.
 */
export async function verifyOwnership(channel: CommandChannel): Promise<string[]> {
  const kubectl = new Kubectl(channel);
  const all = await kubectl.nodeNames();
  if (all.length === 0) {
    throw new OwnershipError('The cluster reports no nodes');
  }
  const managed = new Set(await kubectl.nodeNames(`${STATE.MANAGED_LABEL}=true`));
  const unmanaged = all.filter((name) => !managed.has(name));
  if (unmanaged.length > 0) {
    throw new OwnershipError(`Nodes not managed by ${TOOL_NAME}: ${unmanaged.join(', ')}`);
  }
  return all;
}

export async function labelManagedNodes(channel: CommandChannel, names: readonly string[]): Promise<void> {
  const kubectl = new Kubectl(channel);
  for (const name of names) {
    await kubectl.label('node', name, { [STATE.MANAGED_LABEL]: 'true', [STATE.VERSION_LABEL]: TOOL_VERSION });
  }
}

async function readConfigMap(kubectl: Kubectl, cluster: string): Promise<z.infer<typeof configMapSchema>> {
  let raw: unknown;
  try {
    raw = await kubectl.getJson('configmap', STATE.CONFIGMAP, KUBERNETES.SYSTEM_NAMESPACE);
  } catch (error) {
    if (error instanceof RemoteCommandError) throw new StateNotFoundError(cluster, { cause: error });
    throw error;
  }
  const parsed = configMapSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError([`stored state: ${STATE.CONFIGMAP} is not a ConfigMap`]);
  }
  return parsed.data;
}

/**
 * Registry credentials from the Secret, or nothing. Never fails the load.
 */
async function readRegistryCredentials(
  kubectl: Kubectl,
  logger: Logger,
): Promise<ClusterSpec['registry'] | undefined> {
  try {
    const parsed = secretSchema.parse(
      await kubectl.getJson('secret', STATE.SECRET, KUBERNETES.SYSTEM_NAMESPACE),
    );
    const decode = (key: string): string | undefined => {
      const value = parsed.data?.[key];
      return value === undefined ? undefined : Buffer.from(value, 'base64').toString('utf-8');
    };
    const username = decode(STATE.SECRET_USERNAME_KEY);
    const password = decode(STATE.SECRET_PASSWORD_KEY);
    return {
      ...(username ? { username } : {}),
      ...(password ? { password } : {}),
    };
  } catch (error) {
    logger.debug({ error: extractErrorMessage(error) }, 'No registry credentials in cluster state');
    return undefined;
  }
}

/**
 * Reads the persisted spec and overlays registry credentials.
 */
export async function loadState(channel: CommandChannel, cluster: string, logger: Logger): Promise<StoredState> {
  const kubectl = new Kubectl(channel);
  const configMap = await readConfigMap(kubectl, cluster);
  const document = configMap.data?.[STATE.CONFIG_KEY];
  if (document === undefined) throw new StateNotFoundError(cluster);

  let parsedYaml: unknown;
  try {
    parsedYaml = yaml.load(document);
  } catch (error) {
    throw new ValidationError([`stored state is not valid YAML: ${extractErrorMessage(error)}`]);
  }
  const spec = parseStoredSpec(parsedYaml);

  const registry = await readRegistryCredentials(kubectl, logger);
  const annotations = configMap.metadata.annotations ?? {};
  const deployedAt = annotations[STATE.DEPLOYED_AT];
  const updatedAt = annotations[STATE.UPDATED_AT];
  const toolVersion = annotations[STATE.TOOL_VERSION_ANNOTATION];

  return {
    spec: registry ? { ...spec, registry } : spec,
    ...(deployedAt !== undefined && { deployedAt }),
    ...(updatedAt !== undefined && { updatedAt }),
    ...(toolVersion !== undefined && { toolVersion }),
  };
}

/**
 * Merge-patches the stored spec and refreshes `updated-at`; the Secret is
 * re-applied when credentials are set.
 */
export async function updateState(channel: CommandChannel, spec: ClusterSpec, now: Date): Promise<void> {
  const kubectl = new Kubectl(channel);
  await kubectl.mergePatch('configmap', STATE.CONFIGMAP, KUBERNETES.SYSTEM_NAMESPACE, {
    metadata: {
      annotations: {
        [STATE.UPDATED_AT]: now.toISOString(),
        [STATE.TOOL_VERSION_ANNOTATION]: TOOL_VERSION,
      },
    },
    data: { [STATE.CONFIG_KEY]: serializeSpec(spec) },
  });
  const secret = stateSecret(spec);
  if (secret) await kubectl.apply([secret]);
}

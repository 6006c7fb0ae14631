/**
 * Cluster file loader
 *
 * YAML -> zod defaults -> hostname resolution -> invariant checks.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import { ERROR_MESSAGES, ValidationError, extractErrorMessage } from '@/lib/errors';
import { expandHome } from './index';
import { resolveHostnames } from './hostnames';
import { clusterSpecSchema, type ClusterSpec } from './schema';
import { validateClusterSpec } from './validator';

export function parseClusterSpec(document: unknown): ClusterSpec {
  const parsed = clusterSpecSchema.safeParse(document);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map(formatIssue));
  }
  const spec = resolveHostnames(parsed.data);
  validateClusterSpec(spec);
  return {
    ...spec,
    nodes: spec.nodes.map((node) =>
      node.ssh.keyFile ? { ...node, ssh: { ...node.ssh, keyFile: expandHome(node.ssh.keyFile) } } : node,
    ),
  };
}

/**
 * Schema defaults and hostnames only. Persisted specs carry no SSH secrets,
 * so the credential invariants are not checked.
 */
export function parseStoredSpec(document: unknown): ClusterSpec {
  const parsed = clusterSpecSchema.safeParse(document);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => `stored state: ${formatIssue(issue)}`));
  }
  return resolveHostnames(parsed.data);
}

export function parseClusterYaml(text: string): ClusterSpec {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    throw new ValidationError([`cluster file is not valid YAML: ${extractErrorMessage(error)}`]);
  }
  return parseClusterSpec(document);
}

export async function loadClusterFile(path: string): Promise<ClusterSpec> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ValidationError([ERROR_MESSAGES.CLUSTER_FILE_UNREADABLE(path, extractErrorMessage(error))]);
  }
  return parseClusterYaml(text);
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

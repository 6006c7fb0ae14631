/**
 * Fields frozen once a cluster exists.
 */

import type { ClusterSpec } from '@/config/schema';
import { ImmutableFieldViolationError, type ImmutableViolation } from '@/lib/errors';

const IMMUTABLE_FIELDS: ReadonlyArray<{ field: string; read: (spec: ClusterSpec) => string }> = [
  { field: 'name', read: (spec) => spec.name },
  { field: 'networking.podSubnet', read: (spec) => spec.networking.podSubnet },
  { field: 'networking.serviceSubnet', read: (spec) => spec.networking.serviceSubnet },
  { field: 'version', read: (spec) => spec.version },
];

export function findImmutableViolations(previous: ClusterSpec, next: ClusterSpec): ImmutableViolation[] {
  return IMMUTABLE_FIELDS.flatMap(({ field, read }) => {
    const oldValue = read(previous);
    const newValue = read(next);
    return oldValue === newValue ? [] : [{ field, oldValue, newValue }];
  });
}

/**
 * Throws one error listing every violated field.
 */
export function assertImmutableFields(previous: ClusterSpec, next: ClusterSpec): void {
  const violations = findImmutableViolations(previous, next);
  if (violations.length > 0) throw new ImmutableFieldViolationError(violations);
}

// Resource synchronizer - the only write path to spoke objects
//
// Reads the object by identity, creates it when absent, otherwise copies the
// managed fields onto the stored copy and writes it back only if something
// actually changed. Never deletes.

import { isDeepStrictEqual } from 'node:util';
import type {
  ClusterRole,
  GrantBinding,
  SpokeObject,
} from '@hubspoke/protocol';
import { cloneLabels } from '@hubspoke/protocol';
import type { SpokeObjectRepository } from '@hubspoke/repositories';
import { RoleRefChangedError } from '../errors.js';

/**
 * Copies the managed fields of `desired` onto `existing` and returns the object to write.
 *
 * `existing` is a private copy of the stored object, so mutators may edit it in place.
 * Fields they leave alone (resourceVersion and anything server-managed) are written back as read.
 */
export type Mutator<T extends SpokeObject> = (existing: T, desired: T) => T;

export type SyncOperation = 'created' | 'updated' | 'unchanged';

export type SyncResult<T extends SpokeObject> = {
  operation: SyncOperation;
  object: T;
};

/**
 * Make the stored object match `desired`.
 *
 * Store errors are rethrown as they are.
 */
export async function createOrUpdate<T extends SpokeObject>(
  repo: SpokeObjectRepository<T>,
  desired: T,
  mutate: Mutator<T>
): Promise<SyncResult<T>> {
  const existing = await repo.get(desired.metadata);
  if (!existing) {
    return { operation: 'created', object: await repo.create(desired) };
  }

  const next = mutate(structuredClone(existing), desired);
  if (isDeepStrictEqual(next, existing)) {
    return { operation: 'unchanged', object: existing };
  }
  return { operation: 'updated', object: await repo.update(next) };
}

// --- Mutators ---

export const mutateClusterRole: Mutator<ClusterRole> = (existing, desired) => {
  existing.metadata.labels = cloneLabels(desired.metadata.labels);
  existing.rules = structuredClone(desired.rules);
  return existing;
};

/**
 * Shared by ClusterRoleBindings and RoleBindings.
 *
 * The API server rejects any change to a binding's roleRef, so a binding
 * that points at a different role than desired cannot be updated in place.
 *
 * @throws RoleRefChangedError when the stored roleRef differs from the desired one
 */
export function mutateBinding<T extends GrantBinding>(existing: T, desired: T): T {
  if (!isDeepStrictEqual(existing.roleRef, desired.roleRef)) {
    throw new RoleRefChangedError(existing, desired.roleRef);
  }
  existing.metadata.labels = cloneLabels(desired.metadata.labels);
  existing.subjects = structuredClone(desired.subjects);
  return existing;
}

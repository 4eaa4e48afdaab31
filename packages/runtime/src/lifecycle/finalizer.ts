// Grant lifecycle - the finalizer that holds a Grant on the hub until its
// spoke objects are gone
//
//   pending     → no finalizer, not being deleted: add the finalizer
//   active      → finalizer present, not being deleted: materialize
//   terminating → being deleted, finalizer present: sweep, then release
//   released    → being deleted, finalizer gone: nothing left to do

import type { Grant } from '@hubspoke/protocol';
import type { GrantRepository } from '@hubspoke/repositories';
import { RuntimeError } from '../errors.js';

export type GrantPhase = 'pending' | 'active' | 'terminating' | 'released';

export function hasFinalizer(grant: Grant, finalizer: string): boolean {
  return grant.finalizers.includes(finalizer);
}

export function grantPhase(grant: Grant, finalizer: string): GrantPhase {
  const held = hasFinalizer(grant, finalizer);
  if (grant.deletionTimestamp) {
    return held ? 'terminating' : 'released';
  }
  return held ? 'active' : 'pending';
}

/**
 * Add the finalizer to a Grant that lacks it. Only the finalizer list is written back.
 *
 * @returns the Grant as stored afterwards
 */
export async function ensureFinalizer(
  repo: GrantRepository,
  grant: Grant,
  finalizer: string
): Promise<Grant> {
  if (hasFinalizer(grant, finalizer)) {
    return grant;
  }
  const updated = await repo.setFinalizers(grant, [...grant.finalizers, finalizer]);
  if (!updated) {
    throw new RuntimeError(
      'GRANT_RELEASED',
      `Grant ${grant.ref.name} was released while adding finalizer "${finalizer}"`
    );
  }
  return updated;
}

/**
 * Remove the finalizer. Call only once cleanup has fully succeeded.
 *
 * @returns the Grant as stored afterwards, or null once the hub has released it
 */
export async function releaseFinalizer(
  repo: GrantRepository,
  grant: Grant,
  finalizer: string
): Promise<Grant | null> {
  if (!hasFinalizer(grant, finalizer)) {
    return grant;
  }
  return repo.setFinalizers(
    grant,
    grant.finalizers.filter((f) => f !== finalizer)
  );
}

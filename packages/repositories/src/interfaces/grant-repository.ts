import type { Grant, GrantRef } from '@hubspoke/protocol';

/**
 * Repository interface for Grants on the hub.
 *
 * From the reconciler's point of view the hub is read-only except for the
 * finalizer list, which is the only field it ever writes back.
 */
export interface GrantRepository {
  /**
   * Get a Grant by identity
   * @returns Grant or null if not found
   */
  get(ref: GrantRef): Promise<Grant | null>;

  /**
   * Replace the Grant's finalizer list.
   *
   * The write is conditional on `grant.resourceVersion` when it is set.
   * A Grant that is marked for deletion and left with no finalizers is
   * released by the store, in which case this returns null.
   *
   * @throws ObjectNotFoundError if the Grant no longer exists
   * @throws ObjectConflictError if the Grant changed since it was read
   */
  setFinalizers(grant: Grant, finalizers: string[]): Promise<Grant | null>;
}

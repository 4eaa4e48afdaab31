import type {
  Labels,
  ObjectIdentity,
  SpokeObject,
  ClusterRole,
  ClusterRoleBinding,
  RoleBinding,
  ServiceAccount,
} from '@hubspoke/protocol';

/**
 * Repository interface for one kind of spoke object.
 */
export interface SpokeObjectRepository<T extends SpokeObject> {
  readonly kind: T['kind'];

  /**
   * Get an object by identity
   * @returns the object or null if not found
   */
  get(id: ObjectIdentity): Promise<T | null>;

  /**
   * List objects whose labels contain every pair of `selector`.
   * Namespaced kinds are listed across all namespaces.
   */
  list(selector: Labels): Promise<T[]>;

  /**
   * @throws ObjectAlreadyExistsError if the identity is taken
   */
  create(object: T): Promise<T>;

  /**
   * Replace an existing object. Conditional on `metadata.resourceVersion` when set.
   *
   * @throws ObjectNotFoundError if the object does not exist
   * @throws ObjectConflictError if the object changed since it was read
   */
  update(object: T): Promise<T>;

  /**
   * Delete an object by identity
   * @returns false if the object was already gone
   */
  delete(id: ObjectIdentity): Promise<boolean>;
}

/**
 * All spoke object repositories the reconciler works with
 */
export interface SpokeRepositoryContext {
  readonly clusterRoles: SpokeObjectRepository<ClusterRole>;
  readonly clusterRoleBindings: SpokeObjectRepository<ClusterRoleBinding>;
  readonly roleBindings: SpokeObjectRepository<RoleBinding>;
  readonly serviceAccounts: SpokeObjectRepository<ServiceAccount>;
}

// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory hub and spoke, useful for:
// - Fast unit testing of the reconciler
// - Local development without clusters
//
// It follows the API server's rules the reconciler depends on: resourceVersion
// bumps on every write, conditional updates, equality-based label selectors,
// and finalizer-gated deletion of Grants. Data does not persist between restarts.

import {
  GRANT_KIND,
  grantKey,
  matchesSelector,
  type Grant,
  type GrantRef,
  type ObjectIdentity,
  type SpokeObject,
  type ClusterRole,
  type ClusterRoleBinding,
  type RoleBinding,
  type ServiceAccount,
} from '@hubspoke/protocol';
import type {
  RepositoryContext,
  GrantRepository,
  GrantEvent,
  GrantEventSource,
  SpokeObjectRepository,
} from '../interfaces/index.js';
import {
  ObjectAlreadyExistsError,
  ObjectConflictError,
  ObjectNotFoundError,
} from '../errors.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  grants: Map<string, Grant>;
  clusterRoles: Map<string, ClusterRole>;
  clusterRoleBindings: Map<string, ClusterRoleBinding>;
  roleBindings: Map<string, RoleBinding>;
  serviceAccounts: Map<string, ServiceAccount>;
}

/**
 * Extended repository context with access to underlying data and admin operations.
 */
export interface InMemoryRepositoryContext extends RepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;

  /** Change notifications for every Grant write, delivered synchronously */
  grantEvents: GrantEventSource;

  /** Store a Grant the way an administrator would, assigning a new resourceVersion */
  putGrant(grant: Grant): Grant;

  /**
   * Request deletion of a Grant. Like the API server, this only marks it while
   * finalizers remain and erases it otherwise.
   */
  deleteGrant(ref: GrantRef): void;

  /** Clear all data */
  clear(): void;
}

function objectKey(id: ObjectIdentity): string {
  return id.namespace ? `${id.namespace}/${id.name}` : id.name;
}

function identityOf(id: ObjectIdentity): ObjectIdentity {
  return id.namespace ? { namespace: id.namespace, name: id.name } : { name: id.name };
}

function createObjectRepository<T extends SpokeObject>(
  kind: T['kind'],
  objects: Map<string, T>,
  nextVersion: () => string
): SpokeObjectRepository<T> {
  return {
    kind,
    async get(id) {
      const object = objects.get(objectKey(id));
      return object ? structuredClone(object) : null;
    },
    async list(selector) {
      return Array.from(objects.values())
        .filter((o) => matchesSelector(o.metadata.labels, selector))
        .map((o) => structuredClone(o));
    },
    async create(object) {
      const key = objectKey(object.metadata);
      if (objects.has(key)) {
        throw new ObjectAlreadyExistsError(kind, identityOf(object.metadata));
      }
      const stored = structuredClone(object);
      stored.metadata.resourceVersion = nextVersion();
      objects.set(key, stored);
      return structuredClone(stored);
    },
    async update(object) {
      const key = objectKey(object.metadata);
      const current = objects.get(key);
      if (!current) {
        throw new ObjectNotFoundError(kind, identityOf(object.metadata));
      }
      const expected = object.metadata.resourceVersion;
      if (expected !== undefined && expected !== current.metadata.resourceVersion) {
        throw new ObjectConflictError(kind, identityOf(object.metadata));
      }
      const stored = structuredClone(object);
      stored.metadata.resourceVersion = nextVersion();
      objects.set(key, stored);
      return structuredClone(stored);
    },
    async delete(id) {
      return objects.delete(objectKey(id));
    },
  };
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * repos.putGrant(grant);
 *
 * await new GrantReconciler({ repos, config }).reconcile(grant.ref);
 *
 * console.log(repos._data.clusterRoles.size);
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const grants = new Map<string, Grant>();
  const clusterRoles = new Map<string, ClusterRole>();
  const clusterRoleBindings = new Map<string, ClusterRoleBinding>();
  const roleBindings = new Map<string, RoleBinding>();
  const serviceAccounts = new Map<string, ServiceAccount>();

  let version = 0;
  const nextVersion = () => String(++version);

  const listeners = new Set<(event: GrantEvent) => void>();
  const emit = (event: GrantEvent) => {
    for (const listener of [...listeners]) listener(event);
  };

  const grantEvents: GrantEventSource = {
    async subscribe(listener) {
      listeners.add(listener);
      return {
        close() {
          listeners.delete(listener);
        },
      };
    },
  };

  const grantRepo: GrantRepository = {
    async get(ref) {
      const grant = grants.get(grantKey(ref));
      return grant ? structuredClone(grant) : null;
    },
    async setFinalizers(grant, finalizers) {
      const key = grantKey(grant.ref);
      const current = grants.get(key);
      if (!current) {
        throw new ObjectNotFoundError(GRANT_KIND, grant.ref);
      }
      if (grant.resourceVersion !== undefined && grant.resourceVersion !== current.resourceVersion) {
        throw new ObjectConflictError(GRANT_KIND, grant.ref);
      }
      if (current.deletionTimestamp && finalizers.length === 0) {
        grants.delete(key);
        emit({ type: 'DELETED', ref: current.ref });
        return null;
      }
      const next: Grant = {
        ...structuredClone(current),
        finalizers: [...finalizers],
        resourceVersion: nextVersion(),
      };
      grants.set(key, next);
      emit({ type: 'MODIFIED', ref: next.ref });
      return structuredClone(next);
    },
  };

  return {
    grants: grantRepo,
    spoke: {
      clusterRoles: createObjectRepository('ClusterRole', clusterRoles, nextVersion),
      clusterRoleBindings: createObjectRepository(
        'ClusterRoleBinding',
        clusterRoleBindings,
        nextVersion
      ),
      roleBindings: createObjectRepository('RoleBinding', roleBindings, nextVersion),
      serviceAccounts: createObjectRepository('ServiceAccount', serviceAccounts, nextVersion),
    },
    _data: { grants, clusterRoles, clusterRoleBindings, roleBindings, serviceAccounts },
    grantEvents,
    putGrant(grant) {
      const key = grantKey(grant.ref);
      const type = grants.has(key) ? 'MODIFIED' : 'ADDED';
      const stored: Grant = { ...structuredClone(grant), resourceVersion: nextVersion() };
      grants.set(key, stored);
      emit({ type, ref: stored.ref });
      return structuredClone(stored);
    },
    deleteGrant(ref) {
      const key = grantKey(ref);
      const current = grants.get(key);
      if (!current) return;
      if (current.finalizers.length === 0) {
        grants.delete(key);
        emit({ type: 'DELETED', ref: current.ref });
        return;
      }
      grants.set(key, {
        ...current,
        deletionTimestamp: current.deletionTimestamp ?? new Date().toISOString(),
        resourceVersion: nextVersion(),
      });
      emit({ type: 'MODIFIED', ref: current.ref });
    },
    clear() {
      grants.clear();
      clusterRoles.clear();
      clusterRoleBindings.clear();
      roleBindings.clear();
      serviceAccounts.clear();
      version = 0;
    },
  };
}

// Grant types - the hub-authored declaration of who gets which role on the spoke

import type { Labels, ObjectIdentity, Timestamp } from './common.js';

export const GRANT_API_GROUP = 'authorization.hubspoke.io';
export const GRANT_API_VERSION = 'v1alpha1';
export const GRANT_KIND = 'ManagedClusterRoleBinding';
export const GRANT_PLURAL = 'managedclusterrolebindings';

/**
 * Identity of a Grant on the hub
 */
export type GrantRef = ObjectIdentity;

/**
 * A principal named by a Grant. Only the first subject of a Grant is honored.
 */
export type GrantSubject = {
  kind: string;
  name: string;
  apiGroup?: string;
  namespace?: string;
};

/**
 * The role a Grant hands out.
 *
 * When `namespaces` is absent the role is a ClusterRole bound cluster-wide;
 * otherwise it is a Role bound in each listed namespace.
 */
export type GrantRoleRef = {
  apiGroup?: string;
  kind?: string;
  name: string;
  namespaces?: string[];
};

/**
 * Where the granted role applies on the spoke
 */
export type RoleScope =
  | { type: 'cluster' }
  | { type: 'namespaces'; namespaces: string[] };

/**
 * A Grant as read from the hub.
 *
 * The reconciler only ever writes `finalizers` back.
 */
export type Grant = {
  ref: GrantRef;

  /**
   * Association key: every derived spoke object carries exactly this label set
   */
  labels: Labels;

  finalizers: string[];

  /**
   * Set by the hub when deletion was requested
   */
  deletionTimestamp?: Timestamp;

  resourceVersion?: string;

  subjects: GrantSubject[];

  roleRef: GrantRoleRef;
};

/**
 * Resolve the scope a Grant's role applies to.
 */
export function roleScopeOf(grant: Grant): RoleScope {
  const namespaces = grant.roleRef.namespaces;
  if (namespaces === undefined) {
    return { type: 'cluster' };
  }
  return { type: 'namespaces', namespaces: [...new Set(namespaces)] };
}

/**
 * Format a GrantRef as a `namespace/name` key (or just `name` when cluster-scoped).
 */
export function grantKey(ref: GrantRef): string {
  return ref.namespace ? `${ref.namespace}/${ref.name}` : ref.name;
}

/**
 * Inverse of {@link grantKey}.
 */
export function parseGrantKey(key: string): GrantRef {
  const slash = key.indexOf('/');
  if (slash === -1) {
    return { name: key };
  }
  return { namespace: key.slice(0, slash), name: key.slice(slash + 1) };
}

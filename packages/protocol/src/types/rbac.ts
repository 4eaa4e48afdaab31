// Spoke-side authorization objects

import type { ObjectMeta } from './common.js';

export const RBAC_API_GROUP = 'rbac.authorization.k8s.io';

export type PolicyRule = {
  apiGroups: string[];
  resources: string[];
  verbs: string[];
  resourceNames?: string[];
};

export type RoleRef = {
  apiGroup: string;
  kind: 'ClusterRole' | 'Role';
  name: string;
};

export type RbacSubject = {
  kind: 'User' | 'Group' | 'ServiceAccount';
  name: string;
  apiGroup: string;
  namespace?: string;
};

export type ClusterRole = {
  kind: 'ClusterRole';
  metadata: ObjectMeta;
  rules: PolicyRule[];
};

export type ClusterRoleBinding = {
  kind: 'ClusterRoleBinding';
  metadata: ObjectMeta;
  subjects: RbacSubject[];
  roleRef: RoleRef;
};

export type RoleBinding = {
  kind: 'RoleBinding';
  metadata: ObjectMeta & { namespace: string };
  subjects: RbacSubject[];
  roleRef: RoleRef;
};

export type ServiceAccount = {
  kind: 'ServiceAccount';
  metadata: ObjectMeta & { namespace: string };
};

/**
 * Every object kind the reconciler manages on the spoke
 */
export type SpokeObject = ClusterRole | ClusterRoleBinding | RoleBinding | ServiceAccount;

export type SpokeObjectKind = SpokeObject['kind'];

export type SpokeObjectOf<K extends SpokeObjectKind> = Extract<SpokeObject, { kind: K }>;

/**
 * Binding kinds a Grant materializes for its subject
 */
export type GrantBinding = ClusterRoleBinding | RoleBinding;

// Permission plan - the spoke objects a Grant needs, computed without I/O
//
// One impersonation role and binding per (subject, hub owner) pair, plus the
// Grant's own binding: cluster-wide, or one RoleBinding per target namespace.

import {
  RBAC_API_GROUP,
  cloneLabels,
  impersonationBindingName,
  impersonationRoleName,
  roleScopeOf,
  validateGrant,
  type ClusterRole,
  type ClusterRoleBinding,
  type Grant,
  type GrantBinding,
  type GrantValidationIssue,
  type GrantValidationWarningCode,
  type RoleBinding,
  type RoleScope,
} from '@hubspoke/protocol';
import type { ImpersonatorIdentity } from '../config.js';
import { GrantValidationError } from '../errors.js';

/**
 * The validated inputs a plan is built from
 */
export type PermissionTarget = {
  /** Name of the first subject; the only one honored */
  subject: string;
  hubOwnerId: string;
  scope: RoleScope;
};

export type PermissionPlan = {
  impersonationRole: ClusterRole;
  impersonationBinding: ClusterRoleBinding;
  /** A single ClusterRoleBinding, or one RoleBinding per namespace */
  grantBindings: GrantBinding[];
};

export type ResolvedTarget = {
  target: PermissionTarget;
  warnings: GrantValidationIssue<GrantValidationWarningCode>[];
};

/**
 * Validate a Grant and extract what the plan needs from it.
 *
 * @throws GrantValidationError when the Grant cannot be materialized
 */
export function resolvePermissionTarget(grant: Grant, hubOwnerLabel: string): ResolvedTarget {
  const result = validateGrant(grant, { hubOwnerLabel });
  const subject = grant.subjects[0];
  const hubOwnerId = grant.labels[hubOwnerLabel];
  if (!result.valid || !subject || !hubOwnerId) {
    throw new GrantValidationError(grant.ref, result.errors);
  }
  return {
    target: { subject: subject.name, hubOwnerId, scope: roleScopeOf(grant) },
    warnings: result.warnings,
  };
}

/**
 * Compute every spoke object a Grant needs. Each object carries exactly the Grant's labels.
 */
export function buildPermissionPlan(
  grant: Grant,
  target: PermissionTarget,
  impersonator: ImpersonatorIdentity
): PermissionPlan {
  const roleName = impersonationRoleName(target.subject, target.hubOwnerId);
  const userSubject = { kind: 'User', name: target.subject, apiGroup: RBAC_API_GROUP } as const;

  const impersonationRole: ClusterRole = {
    kind: 'ClusterRole',
    metadata: { name: roleName, labels: cloneLabels(grant.labels) },
    rules: [
      {
        apiGroups: [''],
        resources: ['users'],
        verbs: ['impersonate'],
        resourceNames: [target.subject],
      },
    ],
  };

  const impersonationBinding: ClusterRoleBinding = {
    kind: 'ClusterRoleBinding',
    metadata: {
      name: impersonationBindingName(target.subject, target.hubOwnerId),
      labels: cloneLabels(grant.labels),
    },
    subjects: [
      {
        kind: 'ServiceAccount',
        name: impersonator.name,
        namespace: impersonator.namespace,
        apiGroup: '',
      },
    ],
    roleRef: { apiGroup: RBAC_API_GROUP, kind: 'ClusterRole', name: roleName },
  };

  const grantBindings: GrantBinding[] =
    target.scope.type === 'cluster'
      ? [
          {
            kind: 'ClusterRoleBinding',
            metadata: { name: grant.ref.name, labels: cloneLabels(grant.labels) },
            subjects: [{ ...userSubject }],
            roleRef: { apiGroup: RBAC_API_GROUP, kind: 'ClusterRole', name: grant.roleRef.name },
          },
        ]
      : target.scope.namespaces.map(
          (namespace): RoleBinding => ({
            kind: 'RoleBinding',
            metadata: { name: grant.ref.name, namespace, labels: cloneLabels(grant.labels) },
            subjects: [{ ...userSubject }],
            roleRef: { apiGroup: RBAC_API_GROUP, kind: 'Role', name: grant.roleRef.name },
          })
        );

  return { impersonationRole, impersonationBinding, grantBindings };
}

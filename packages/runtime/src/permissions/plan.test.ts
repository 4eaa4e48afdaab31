import { describe, it, expect } from 'vitest';
import { labelsEqual, type Grant } from '@hubspoke/protocol';
import { DEFAULT_RECONCILER_CONFIG } from '../config.js';
import { GrantValidationError } from '../errors.js';
import { buildPermissionPlan, resolvePermissionTarget } from './plan.js';

const OWNER_LABEL = DEFAULT_RECONCILER_CONFIG.hubOwnerLabel;
const IMPERSONATOR = DEFAULT_RECONCILER_CONFIG.impersonator;

// --- Test Fixtures ---

function createMockGrant(overrides: Partial<Grant> = {}): Grant {
  return {
    ref: { namespace: 'hub1', name: 'g1' },
    labels: { app: 'g1', [OWNER_LABEL]: 'hub1' },
    finalizers: [],
    subjects: [{ kind: 'User', name: 'alice' }],
    roleRef: { name: 'viewer' },
    ...overrides,
  };
}

function planFor(grant: Grant) {
  const { target } = resolvePermissionTarget(grant, OWNER_LABEL);
  return buildPermissionPlan(grant, target, IMPERSONATOR);
}

describe('resolvePermissionTarget', () => {
  it('should take the first subject and the owner label', () => {
    const { target, warnings } = resolvePermissionTarget(createMockGrant(), OWNER_LABEL);

    expect(target).toEqual({ subject: 'alice', hubOwnerId: 'hub1', scope: { type: 'cluster' } });
    expect(warnings).toEqual([]);
  });

  it('should reject a Grant without subjects', () => {
    expect(() => resolvePermissionTarget(createMockGrant({ subjects: [] }), OWNER_LABEL)).toThrow(
      GrantValidationError
    );
  });

  it('should report every validation error', () => {
    try {
      resolvePermissionTarget(createMockGrant({ subjects: [], labels: {} }), OWNER_LABEL);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GrantValidationError);
      if (error instanceof GrantValidationError) {
        expect(error.issues.map((i) => i.code)).toEqual(['MISSING_SUBJECT', 'MISSING_HUB_OWNER']);
      }
    }
  });

  it('should pass warnings through and deduplicate namespaces', () => {
    const grant = createMockGrant({ roleRef: { name: 'viewer', namespaces: ['a', 'a', 'b'] } });

    const { target, warnings } = resolvePermissionTarget(grant, OWNER_LABEL);

    expect(target.scope).toEqual({ type: 'namespaces', namespaces: ['a', 'b'] });
    expect(warnings.map((w) => w.code)).toEqual(['DUPLICATE_NAMESPACE']);
  });
});

describe('buildPermissionPlan', () => {
  it('should build the impersonation role for the subject', () => {
    const plan = planFor(createMockGrant());

    expect(plan.impersonationRole).toEqual({
      kind: 'ClusterRole',
      metadata: { name: 'impersonate-alice-hub1', labels: { app: 'g1', [OWNER_LABEL]: 'hub1' } },
      rules: [
        { apiGroups: [''], resources: ['users'], verbs: ['impersonate'], resourceNames: ['alice'] },
      ],
    });
  });

  it('should bind the impersonator to the impersonation role', () => {
    const plan = planFor(createMockGrant());

    expect(plan.impersonationBinding.metadata.name).toBe('impersonate-alice-hub1-rolebinding');
    expect(plan.impersonationBinding.subjects).toEqual([
      {
        kind: 'ServiceAccount',
        name: 'cluster-gateway',
        namespace: 'open-cluster-management-managed-serviceaccount',
        apiGroup: '',
      },
    ]);
    expect(plan.impersonationBinding.roleRef).toEqual({
      apiGroup: 'rbac.authorization.k8s.io',
      kind: 'ClusterRole',
      name: 'impersonate-alice-hub1',
    });
  });

  it('should build one cluster binding for a cluster-wide Grant', () => {
    const plan = planFor(createMockGrant());

    expect(plan.grantBindings).toEqual([
      {
        kind: 'ClusterRoleBinding',
        metadata: { name: 'g1', labels: { app: 'g1', [OWNER_LABEL]: 'hub1' } },
        subjects: [{ kind: 'User', name: 'alice', apiGroup: 'rbac.authorization.k8s.io' }],
        roleRef: { apiGroup: 'rbac.authorization.k8s.io', kind: 'ClusterRole', name: 'viewer' },
      },
    ]);
  });

  it('should build one role binding per namespace', () => {
    const plan = planFor(
      createMockGrant({ roleRef: { name: 'editor', namespaces: ['a', 'b', 'c'] } })
    );

    expect(plan.grantBindings.map((b) => [b.kind, b.metadata.namespace, b.metadata.name])).toEqual([
      ['RoleBinding', 'a', 'g1'],
      ['RoleBinding', 'b', 'g1'],
      ['RoleBinding', 'c', 'g1'],
    ]);
    expect(plan.grantBindings[0]?.roleRef).toEqual({
      apiGroup: 'rbac.authorization.k8s.io',
      kind: 'Role',
      name: 'editor',
    });
  });

  it('should label every derived object with exactly the Grant labels', () => {
    const grant = createMockGrant({
      labels: { app: 'g1', team: 'blue', [OWNER_LABEL]: 'hub1' },
      roleRef: { name: 'editor', namespaces: ['a', 'b'] },
    });
    const plan = planFor(grant);

    const objects = [plan.impersonationRole, plan.impersonationBinding, ...plan.grantBindings];
    for (const object of objects) {
      expect(labelsEqual(object.metadata.labels, grant.labels)).toBe(true);
    }
  });

  it('should not share label objects with the Grant', () => {
    const grant = createMockGrant();
    const plan = planFor(grant);

    plan.impersonationRole.metadata.labels.app = 'changed';

    expect(grant.labels.app).toBe('g1');
  });
});

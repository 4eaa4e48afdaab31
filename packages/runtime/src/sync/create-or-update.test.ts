import { describe, it, expect, vi } from 'vitest';
import type { ClusterRole, ClusterRoleBinding } from '@hubspoke/protocol';
import { createInMemoryRepositoryContext } from '@hubspoke/repositories';
import { RoleRefChangedError } from '../errors.js';
import { createOrUpdate, mutateBinding, mutateClusterRole } from './create-or-update.js';

// --- Test Fixtures ---

function createRole(overrides: Partial<ClusterRole> = {}): ClusterRole {
  return {
    kind: 'ClusterRole',
    metadata: { name: 'impersonate-alice-hub1', labels: { app: 'g1' } },
    rules: [{ apiGroups: [''], resources: ['users'], verbs: ['impersonate'], resourceNames: ['alice'] }],
    ...overrides,
  };
}

function createBinding(): ClusterRoleBinding {
  return {
    kind: 'ClusterRoleBinding',
    metadata: { name: 'g1', labels: { app: 'g1' } },
    subjects: [{ kind: 'User', name: 'alice', apiGroup: 'rbac.authorization.k8s.io' }],
    roleRef: { apiGroup: 'rbac.authorization.k8s.io', kind: 'ClusterRole', name: 'viewer' },
  };
}

describe('createOrUpdate', () => {
  it('should create an absent object', async () => {
    const repos = createInMemoryRepositoryContext();

    const result = await createOrUpdate(repos.spoke.clusterRoles, createRole(), mutateClusterRole);

    expect(result.operation).toBe('created');
    expect(result.object.metadata.resourceVersion).toBe('1');
    expect(repos._data.clusterRoles.get('impersonate-alice-hub1')?.rules).toEqual(createRole().rules);
  });

  it('should not write when nothing changed', async () => {
    const repos = createInMemoryRepositoryContext();
    await createOrUpdate(repos.spoke.clusterRoles, createRole(), mutateClusterRole);
    const update = vi.spyOn(repos.spoke.clusterRoles, 'update');

    const result = await createOrUpdate(repos.spoke.clusterRoles, createRole(), mutateClusterRole);

    expect(result.operation).toBe('unchanged');
    expect(update).not.toHaveBeenCalled();
    expect(repos._data.clusterRoles.get('impersonate-alice-hub1')?.metadata.resourceVersion).toBe('1');
  });

  it('should update drifted fields and keep the stored resourceVersion', async () => {
    const repos = createInMemoryRepositoryContext();
    await repos.spoke.clusterRoles.create(createRole({ rules: [] }));

    const result = await createOrUpdate(repos.spoke.clusterRoles, createRole(), mutateClusterRole);

    expect(result.operation).toBe('updated');
    expect(result.object.rules).toEqual(createRole().rules);
    expect(result.object.metadata.resourceVersion).toBe('2');
  });

  it('should restore labels removed by someone else', async () => {
    const repos = createInMemoryRepositoryContext();
    await repos.spoke.clusterRoles.create(
      createRole({ metadata: { name: 'impersonate-alice-hub1', labels: {} } })
    );

    const result = await createOrUpdate(repos.spoke.clusterRoles, createRole(), mutateClusterRole);

    expect(result.operation).toBe('updated');
    expect(result.object.metadata.labels).toEqual({ app: 'g1' });
  });

  it('should copy subjects onto an existing binding', async () => {
    const repos = createInMemoryRepositoryContext();
    const stale = createBinding();
    stale.subjects = [{ kind: 'User', name: 'bob', apiGroup: 'rbac.authorization.k8s.io' }];
    await repos.spoke.clusterRoleBindings.create(stale);

    const result = await createOrUpdate(
      repos.spoke.clusterRoleBindings,
      createBinding(),
      mutateBinding
    );

    expect(result.operation).toBe('updated');
    expect(result.object.subjects).toEqual(createBinding().subjects);
  });

  it('should refuse to rebind an existing binding to another role', async () => {
    const repos = createInMemoryRepositoryContext();
    await repos.spoke.clusterRoleBindings.create(createBinding());
    const update = vi.spyOn(repos.spoke.clusterRoleBindings, 'update');
    const desired = createBinding();
    desired.roleRef = { ...desired.roleRef, name: 'editor' };

    const result = createOrUpdate(repos.spoke.clusterRoleBindings, desired, mutateBinding);

    await expect(result).rejects.toBeInstanceOf(RoleRefChangedError);
    await expect(result).rejects.toThrow(
      'ClusterRoleBinding g1 is bound to ClusterRole viewer; roleRef is immutable and cannot become ClusterRole editor'
    );
    expect(update).not.toHaveBeenCalled();
    expect(repos._data.clusterRoleBindings.get('g1')?.roleRef.name).toBe('viewer');
  });

  it('should never delete', async () => {
    const repos = createInMemoryRepositoryContext();
    const remove = vi.spyOn(repos.spoke.clusterRoles, 'delete');

    await createOrUpdate(repos.spoke.clusterRoles, createRole(), mutateClusterRole);
    await createOrUpdate(repos.spoke.clusterRoles, createRole({ rules: [] }), mutateClusterRole);

    expect(remove).not.toHaveBeenCalled();
  });

  it('should surface store errors unmodified', async () => {
    const repos = createInMemoryRepositoryContext();
    const failure = new Error('spoke unreachable');
    vi.spyOn(repos.spoke.clusterRoles, 'get').mockRejectedValueOnce(failure);

    await expect(
      createOrUpdate(repos.spoke.clusterRoles, createRole(), mutateClusterRole)
    ).rejects.toBe(failure);
  });
});

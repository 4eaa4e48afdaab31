// Tests for the hub Grant repository, against a fake custom objects client

import { describe, it, expect, vi } from 'vitest';
import { ApiException } from '@kubernetes/client-node';
import { KubeGrantRepository } from './grant-repository.js';
import { MalformedObjectError, ObjectConflictError } from '../errors.js';

const FINALIZER = 'authorization.hubspoke.io/spoke-cleanup';

function createMockClient() {
  return {
    getNamespacedCustomObject: vi.fn(),
    getClusterCustomObject: vi.fn(),
    replaceNamespacedCustomObject: vi.fn(),
    replaceClusterCustomObject: vi.fn(),
  };
}

function createRawGrant(metadata: Record<string, unknown> = {}) {
  return {
    apiVersion: 'authorization.hubspoke.io/v1alpha1',
    kind: 'ManagedClusterRoleBinding',
    metadata: {
      name: 'g1',
      namespace: 'spoke-a',
      uid: 'uid-1',
      labels: { app: 'g1' },
      resourceVersion: '10',
      ...metadata,
    },
    subjects: [{ kind: 'User', name: 'alice' }],
    roleRef: { name: 'viewer' },
    status: { phase: 'Ready' },
  };
}

describe('KubeGrantRepository.get', () => {
  it('should read a namespaced grant from the custom object API', async () => {
    const client = createMockClient();
    client.getNamespacedCustomObject.mockResolvedValue(createRawGrant());
    const grant = await new KubeGrantRepository(client).get({ namespace: 'spoke-a', name: 'g1' });

    expect(client.getNamespacedCustomObject).toHaveBeenCalledWith({
      group: 'authorization.hubspoke.io',
      version: 'v1alpha1',
      plural: 'managedclusterrolebindings',
      namespace: 'spoke-a',
      name: 'g1',
    });
    expect(grant?.subjects).toEqual([{ kind: 'User', name: 'alice' }]);
    expect(grant?.resourceVersion).toBe('10');
  });

  it('should use the cluster-scoped call for refs without a namespace', async () => {
    const client = createMockClient();
    client.getClusterCustomObject.mockResolvedValue(createRawGrant({ namespace: undefined }));
    const grant = await new KubeGrantRepository(client).get({ name: 'g1' });

    expect(client.getNamespacedCustomObject).not.toHaveBeenCalled();
    expect(grant?.ref).toEqual({ name: 'g1' });
  });

  it('should return null for a missing grant', async () => {
    const client = createMockClient();
    client.getNamespacedCustomObject.mockRejectedValue(new ApiException(404, 'not found', {}, {}));
    expect(await new KubeGrantRepository(client).get({ namespace: 'spoke-a', name: 'g1' })).toBeNull();
  });

  it('should report an undecodable grant as malformed', async () => {
    const client = createMockClient();
    client.getNamespacedCustomObject.mockResolvedValue({ metadata: { name: 'g1' } });
    await expect(
      new KubeGrantRepository(client).get({ namespace: 'spoke-a', name: 'g1' })
    ).rejects.toBeInstanceOf(MalformedObjectError);
  });
});

describe('KubeGrantRepository.setFinalizers', () => {
  it('should write the finalizers back onto the full stored object', async () => {
    const client = createMockClient();
    client.getNamespacedCustomObject.mockResolvedValue(createRawGrant({ resourceVersion: '11' }));
    client.replaceNamespacedCustomObject.mockImplementation(async (request: { body: unknown }) => request.body);
    const repo = new KubeGrantRepository(client);

    const grant = await repo.get({ namespace: 'spoke-a', name: 'g1' });
    if (!grant) throw new Error('expected a grant');
    const updated = await repo.setFinalizers({ ...grant, resourceVersion: '10' }, [FINALIZER]);

    const request = client.replaceNamespacedCustomObject.mock.calls[0][0];
    expect(request.name).toBe('g1');
    expect(request.body.status).toEqual({ phase: 'Ready' });
    expect(request.body.metadata.uid).toBe('uid-1');
    expect(request.body.metadata.finalizers).toEqual([FINALIZER]);
    expect(request.body.metadata.resourceVersion).toBe('10');
    expect(updated?.finalizers).toEqual([FINALIZER]);
  });

  it('should return null once a terminating grant loses its last finalizer', async () => {
    const client = createMockClient();
    const terminating = createRawGrant({
      finalizers: [FINALIZER],
      deletionTimestamp: '2024-05-01T10:00:00Z',
    });
    client.getNamespacedCustomObject.mockResolvedValue(terminating);
    client.replaceNamespacedCustomObject.mockImplementation(async (request: { body: unknown }) => request.body);
    const repo = new KubeGrantRepository(client);

    const grant = await repo.get({ namespace: 'spoke-a', name: 'g1' });
    if (!grant) throw new Error('expected a grant');

    expect(await repo.setFinalizers(grant, [])).toBeNull();
  });

  it('should report a stale write as a conflict', async () => {
    const client = createMockClient();
    client.getNamespacedCustomObject.mockResolvedValue(createRawGrant());
    client.replaceNamespacedCustomObject.mockRejectedValue(new ApiException(409, 'conflict', {}, {}));
    const repo = new KubeGrantRepository(client);
    const grant = await repo.get({ namespace: 'spoke-a', name: 'g1' });
    if (!grant) throw new Error('expected a grant');

    await expect(repo.setFinalizers(grant, [FINALIZER])).rejects.toBeInstanceOf(ObjectConflictError);
  });
});

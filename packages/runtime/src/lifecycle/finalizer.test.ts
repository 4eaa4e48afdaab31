import { describe, it, expect, vi } from 'vitest';
import type { Grant } from '@hubspoke/protocol';
import { createInMemoryRepositoryContext } from '@hubspoke/repositories';
import { RuntimeError } from '../errors.js';
import { grantPhase, hasFinalizer, ensureFinalizer, releaseFinalizer } from './finalizer.js';

const FINALIZER = 'authorization.hubspoke.io/spoke-cleanup';

function createMockGrant(overrides: Partial<Grant> = {}): Grant {
  return {
    ref: { namespace: 'hub1', name: 'g1' },
    labels: { app: 'g1' },
    finalizers: [],
    subjects: [{ kind: 'User', name: 'alice' }],
    roleRef: { name: 'viewer' },
    ...overrides,
  };
}

describe('grantPhase', () => {
  it('should be pending without finalizer or deletion marker', () => {
    expect(grantPhase(createMockGrant(), FINALIZER)).toBe('pending');
  });

  it('should be active with the finalizer', () => {
    expect(grantPhase(createMockGrant({ finalizers: [FINALIZER] }), FINALIZER)).toBe('active');
  });

  it('should be terminating when deleted while holding the finalizer', () => {
    const grant = createMockGrant({
      finalizers: [FINALIZER],
      deletionTimestamp: '2024-01-01T00:00:00Z',
    });
    expect(grantPhase(grant, FINALIZER)).toBe('terminating');
  });

  it('should be released when deleted without the finalizer', () => {
    const grant = createMockGrant({
      finalizers: ['example.com/other'],
      deletionTimestamp: '2024-01-01T00:00:00Z',
    });
    expect(grantPhase(grant, FINALIZER)).toBe('released');
  });
});

describe('hasFinalizer', () => {
  it('should match exact names only', () => {
    const grant = createMockGrant({ finalizers: [`${FINALIZER}-old`] });
    expect(hasFinalizer(grant, FINALIZER)).toBe(false);
  });
});

describe('ensureFinalizer', () => {
  it('should append the finalizer and keep others', async () => {
    const repos = createInMemoryRepositoryContext();
    const stored = repos.putGrant(createMockGrant({ finalizers: ['example.com/other'] }));

    const updated = await ensureFinalizer(repos.grants, stored, FINALIZER);

    expect(updated.finalizers).toEqual(['example.com/other', FINALIZER]);
    expect((await repos.grants.get(stored.ref))?.finalizers).toEqual([
      'example.com/other',
      FINALIZER,
    ]);
  });

  it('should not write when the finalizer is present', async () => {
    const repos = createInMemoryRepositoryContext();
    const stored = repos.putGrant(createMockGrant({ finalizers: [FINALIZER] }));
    const setFinalizers = vi.spyOn(repos.grants, 'setFinalizers');

    const result = await ensureFinalizer(repos.grants, stored, FINALIZER);

    expect(result).toBe(stored);
    expect(setFinalizers).not.toHaveBeenCalled();
  });

  it('should fail if the store releases the Grant instead', async () => {
    const repos = createInMemoryRepositoryContext();
    const stored = repos.putGrant(createMockGrant());
    vi.spyOn(repos.grants, 'setFinalizers').mockResolvedValueOnce(null);

    const result = ensureFinalizer(repos.grants, stored, FINALIZER);

    await expect(result).rejects.toBeInstanceOf(RuntimeError);
    await expect(result).rejects.toMatchObject({
      code: 'GRANT_RELEASED',
      message: `Grant g1 was released while adding finalizer "${FINALIZER}"`,
    });
  });

  it('should surface store failures', async () => {
    const repos = createInMemoryRepositoryContext();
    const stored = repos.putGrant(createMockGrant());
    const failure = new Error('conflict');
    vi.spyOn(repos.grants, 'setFinalizers').mockRejectedValueOnce(failure);

    await expect(ensureFinalizer(repos.grants, stored, FINALIZER)).rejects.toBe(failure);
  });
});

describe('releaseFinalizer', () => {
  it('should release a terminating Grant', async () => {
    const repos = createInMemoryRepositoryContext();
    repos.putGrant(createMockGrant({ finalizers: [FINALIZER] }));
    repos.deleteGrant({ namespace: 'hub1', name: 'g1' });
    const terminating = await repos.grants.get({ namespace: 'hub1', name: 'g1' });
    if (!terminating) throw new Error('grant vanished');

    const result = await releaseFinalizer(repos.grants, terminating, FINALIZER);

    expect(result).toBeNull();
    expect(await repos.grants.get(terminating.ref)).toBeNull();
  });

  it('should leave a Grant without the finalizer alone', async () => {
    const repos = createInMemoryRepositoryContext();
    const stored = repos.putGrant(createMockGrant());
    const setFinalizers = vi.spyOn(repos.grants, 'setFinalizers');

    expect(await releaseFinalizer(repos.grants, stored, FINALIZER)).toBe(stored);
    expect(setFinalizers).not.toHaveBeenCalled();
  });
});

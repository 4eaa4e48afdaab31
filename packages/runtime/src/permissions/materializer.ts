// Permission materializer - writes a plan to the spoke
//
// Order is role → impersonation binding → grant bindings, so no binding ever
// points at a role that does not exist yet. The first failure aborts the rest;
// a later pass picks up where this one stopped.

import type { GrantBinding, SpokeObject, SpokeObjectKind } from '@hubspoke/protocol';
import type { SpokeRepositoryContext } from '@hubspoke/repositories';
import type { ReconcileLogger } from '../logging/logger.js';
import {
  createOrUpdate,
  mutateBinding,
  mutateClusterRole,
  type SyncOperation,
  type SyncResult,
} from '../sync/index.js';
import type { PermissionPlan } from './plan.js';

export type MaterializedObject = {
  kind: SpokeObjectKind;
  namespace?: string;
  name: string;
  operation: SyncOperation;
};

export type MaterializeResult = {
  objects: MaterializedObject[];
};

export async function materializePermissions(
  spoke: SpokeRepositoryContext,
  plan: PermissionPlan,
  logger: ReconcileLogger
): Promise<MaterializeResult> {
  const objects: MaterializedObject[] = [];

  const record = <T extends SpokeObject>(result: SyncResult<T>) => {
    const { kind, metadata } = result.object;
    const entry: MaterializedObject = { kind, name: metadata.name, operation: result.operation };
    if (metadata.namespace) entry.namespace = metadata.namespace;
    objects.push(entry);
    if (result.operation !== 'unchanged') {
      logger.info(`${kind} ${result.operation}`, { ...entry });
    }
  };

  record(await createOrUpdate(spoke.clusterRoles, plan.impersonationRole, mutateClusterRole));
  record(
    await createOrUpdate(spoke.clusterRoleBindings, plan.impersonationBinding, mutateBinding)
  );
  for (const binding of plan.grantBindings) {
    record(await syncGrantBinding(spoke, binding));
  }

  return { objects };
}

function syncGrantBinding(
  spoke: SpokeRepositoryContext,
  binding: GrantBinding
): Promise<SyncResult<GrantBinding>> {
  if (binding.kind === 'ClusterRoleBinding') {
    return createOrUpdate(spoke.clusterRoleBindings, binding, mutateBinding);
  }
  return createOrUpdate(spoke.roleBindings, binding, mutateBinding);
}

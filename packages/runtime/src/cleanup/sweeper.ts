// Cleanup sweeper - removes every spoke object materialized for a Grant
//
// Objects are found by label set alone; there is no stored manifest. Kinds
// are swept in reverse creation order so bindings go before the roles they
// reference.

import {
  formatLabelSelector,
  labelsEqual,
  type Grant,
  type SpokeObject,
  type SpokeObjectKind,
} from '@hubspoke/protocol';
import type { SpokeObjectRepository, SpokeRepositoryContext } from '@hubspoke/repositories';
import { errorMessage, type ReconcileLogger } from '../logging/logger.js';

export type SweptObject = {
  kind: SpokeObjectKind;
  namespace?: string;
  name: string;
  /** false when the object was already gone by the time it was deleted */
  existed: boolean;
};

export type SweepResult = {
  deleted: SweptObject[];
};

/**
 * Delete every spoke object whose label set equals the Grant's.
 *
 * A listing failure is logged and treated as "nothing found". A deletion
 * failure aborts the sweep and is rethrown.
 */
export async function sweepGrantObjects(
  spoke: SpokeRepositoryContext,
  grant: Grant,
  logger: ReconcileLogger
): Promise<SweepResult> {
  const deleted: SweptObject[] = [];

  if (Object.keys(grant.labels).length === 0) {
    // An empty selector matches every object on the spoke
    logger.warn('Grant has no labels; nothing to sweep', { grant: grant.ref });
    return { deleted };
  }

  const repos: SpokeObjectRepository<SpokeObject>[] = [
    spoke.roleBindings,
    spoke.clusterRoleBindings,
    spoke.clusterRoles,
    spoke.serviceAccounts,
  ];

  for (const repo of repos) {
    for (const object of await listOwned(repo, grant, logger)) {
      const { name, namespace } = object.metadata;
      const id = namespace ? { namespace, name } : { name };
      const existed = await repo.delete(id);

      const entry: SweptObject = { kind: repo.kind, name, existed };
      if (namespace) entry.namespace = namespace;
      deleted.push(entry);
      logger.info(`${repo.kind} deleted`, { ...entry });
    }
  }

  return { deleted };
}

async function listOwned(
  repo: SpokeObjectRepository<SpokeObject>,
  grant: Grant,
  logger: ReconcileLogger
): Promise<SpokeObject[]> {
  let candidates: SpokeObject[];
  try {
    candidates = await repo.list(grant.labels);
  } catch (error) {
    logger.warn(`Listing ${repo.kind} failed; treating as none found`, {
      selector: formatLabelSelector(grant.labels),
      error: errorMessage(error),
    });
    return [];
  }
  // The selector matches supersets too; only an exact label set is ours
  return candidates.filter((object) => labelsEqual(object.metadata.labels, grant.labels));
}

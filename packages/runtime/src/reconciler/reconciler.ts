// Grant reconciler - one pass per observed change to a Grant
//
// Load the Grant, then either tear its spoke objects down and release the
// finalizer, or hold the finalizer and bring the spoke objects up to date.
// Every step is idempotent, so a failed pass is simply retried from the top.

import { grantKey, type GrantRef } from '@hubspoke/protocol';
import type { RepositoryContext } from '@hubspoke/repositories';
import { DEFAULT_RECONCILER_CONFIG, type ReconcilerConfig } from '../config.js';
import { sweepGrantObjects, type SweptObject } from '../cleanup/index.js';
import { ensureFinalizer, grantPhase, releaseFinalizer } from '../lifecycle/index.js';
import { consoleLogger, type ReconcileLogger } from '../logging/logger.js';
import {
  buildPermissionPlan,
  materializePermissions,
  resolvePermissionTarget,
  type MaterializedObject,
} from '../permissions/index.js';

/**
 * What a reconciliation pass did
 */
export type ReconcileOutcome =
  | { type: 'skipped'; reason: 'not_found' }
  | { type: 'released' }
  | { type: 'cleaned'; deleted: SweptObject[] }
  | { type: 'synced'; objects: MaterializedObject[] };

export type GrantReconcilerOptions = {
  repos: RepositoryContext;

  /** Defaults to DEFAULT_RECONCILER_CONFIG */
  config?: ReconcilerConfig;

  /** Defaults to console */
  logger?: ReconcileLogger;
};

export class GrantReconciler {
  private readonly repos: RepositoryContext;
  private readonly config: ReconcilerConfig;
  private readonly logger: ReconcileLogger;

  constructor(options: GrantReconcilerOptions) {
    this.repos = options.repos;
    this.config = options.config ?? DEFAULT_RECONCILER_CONFIG;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Reconcile one Grant.
   *
   * @throws GrantValidationError if an active Grant cannot be materialized (nothing is written)
   * @throws StoreError or the underlying client error when any read or write fails
   */
  async reconcile(ref: GrantRef): Promise<ReconcileOutcome> {
    const key = grantKey(ref);
    this.logger.debug('Reconciling grant', { grant: key });

    const grant = await this.repos.grants.get(ref);
    if (!grant) {
      this.logger.debug('Grant not found; nothing to do', { grant: key });
      return { type: 'skipped', reason: 'not_found' };
    }

    const { finalizer } = this.config;

    switch (grantPhase(grant, finalizer)) {
      case 'released':
        this.logger.debug('Grant is being deleted and already cleaned up', { grant: key });
        return { type: 'released' };

      case 'terminating': {
        const { deleted } = await sweepGrantObjects(this.repos.spoke, grant, this.logger);
        await releaseFinalizer(this.repos.grants, grant, finalizer);
        this.logger.info('Grant cleaned up', { grant: key, deleted: deleted.length });
        return { type: 'cleaned', deleted };
      }

      case 'pending':
      case 'active': {
        const { target, warnings } = resolvePermissionTarget(grant, this.config.hubOwnerLabel);
        for (const warning of warnings) {
          this.logger.warn(warning.message, { grant: key, path: warning.path, code: warning.code });
        }

        const held = await ensureFinalizer(this.repos.grants, grant, finalizer);
        const plan = buildPermissionPlan(held, target, this.config.impersonator);
        const { objects } = await materializePermissions(this.repos.spoke, plan, this.logger);

        this.logger.info('Grant synced', {
          grant: key,
          changed: objects.filter((o) => o.operation !== 'unchanged').length,
        });
        return { type: 'synced', objects };
      }
    }
  }
}

import type { GrantRepository } from './grant-repository.js';
import type { SpokeRepositoryContext } from './spoke-repository.js';

/**
 * RepositoryContext bundles the hub and spoke stores together.
 *
 * This is the dependency injection point for the runtime: the reconciler
 * never reaches for process-wide clients, so tests hand it an in-memory
 * context and production hands it one backed by the Kubernetes API.
 *
 * Example usage:
 * ```typescript
 * const repos = createKubernetesRepositoryContext({ hub: hubConfig, spoke: spokeConfig });
 * const reconciler = new GrantReconciler({ repos, config });
 * ```
 */
export interface RepositoryContext {
  readonly grants: GrantRepository;
  readonly spoke: SpokeRepositoryContext;
}

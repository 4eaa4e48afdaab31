// Kubernetes-backed repositories

import type { RepositoryContext } from '../interfaces/index.js';
import { loadKubeConfig, type KubeClusterConfig } from './client.js';
import { createKubernetesGrantRepository } from './grant-repository.js';
import { createKubernetesSpokeContext } from './spoke-repositories.js';

export { loadKubeConfig, type KubeClusterConfig } from './client.js';
export { toStoreError, isApiStatus, type KubeOperation } from './errors.js';
export {
  KubeGrantRepository,
  createKubernetesGrantRepository,
  type CustomObjectsClient,
} from './grant-repository.js';
export { KubeGrantEventSource, toGrantEvent } from './grant-events.js';
export {
  KubeObjectRepository,
  createKubernetesSpokeContext,
  type KubeObjectApi,
  type KubeObjectCodec,
} from './spoke-repositories.js';
export * from './mapping.js';

export type KubernetesRepositoryConfig = {
  hub: KubeClusterConfig;
  spoke: KubeClusterConfig;
};

/**
 * Create a RepositoryContext that reads Grants from the hub and writes RBAC objects to the spoke.
 */
export function createKubernetesRepositoryContext(
  config: KubernetesRepositoryConfig
): RepositoryContext {
  return {
    grants: createKubernetesGrantRepository(loadKubeConfig(config.hub)),
    spoke: createKubernetesSpokeContext(loadKubeConfig(config.spoke)),
  };
}

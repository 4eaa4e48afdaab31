import { KubeConfig } from '@kubernetes/client-node';

/**
 * How to reach one cluster
 */
export type KubeClusterConfig = {
  /** Path to a kubeconfig file. Defaults to KUBECONFIG, ~/.kube/config, then in-cluster config. */
  kubeconfigPath?: string;

  /** Context to select from the kubeconfig */
  context?: string;
};

/**
 * Load a KubeConfig for one cluster.
 */
export function loadKubeConfig(config: KubeClusterConfig = {}): KubeConfig {
  const kc = new KubeConfig();
  if (config.kubeconfigPath) {
    kc.loadFromFile(config.kubeconfigPath);
  } else {
    kc.loadFromDefault();
  }
  if (config.context) {
    kc.setCurrentContext(config.context);
  }
  return kc;
}

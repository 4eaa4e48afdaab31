// Controller configuration, read from the environment

import { z } from 'zod';
import { GRANT_API_GROUP } from '@hubspoke/protocol';
import type { kubernetes } from '@hubspoke/repositories';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logging/logger.js';

/**
 * The fixed principal on the spoke that is allowed to impersonate Grant subjects
 */
export type ImpersonatorIdentity = {
  name: string;
  namespace: string;
};

/**
 * What the reconciler itself needs
 */
export type ReconcilerConfig = {
  impersonator: ImpersonatorIdentity;

  /** Finalizer that holds a Grant on the hub until its spoke objects are gone */
  finalizer: string;

  /** Label on the Grant whose value identifies the hub owner */
  hubOwnerLabel: string;
};

export type BackoffConfig = {
  baseMs: number;
  maxMs: number;
};

/**
 * Everything needed to run the controller process
 */
export type ControllerConfig = ReconcilerConfig & {
  hub: kubernetes.KubeClusterConfig;
  spoke: kubernetes.KubeClusterConfig;
  workers: number;
  backoff: BackoffConfig;
  watchRestartMs: number;
  logLevel: LogLevel;
};

export const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = {
  impersonator: {
    name: 'cluster-gateway',
    namespace: 'open-cluster-management-managed-serviceaccount',
  },
  finalizer: `${GRANT_API_GROUP}/spoke-cleanup`,
  hubOwnerLabel: `${GRANT_API_GROUP}/hub-owner-id`,
};

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonEmpty = (fallback: string) => z.string().trim().min(1).default(fallback);

const envSchema = z.object({
  HUBSPOKE_IMPERSONATOR_NAME: nonEmpty(DEFAULT_RECONCILER_CONFIG.impersonator.name),
  HUBSPOKE_IMPERSONATOR_NAMESPACE: nonEmpty(DEFAULT_RECONCILER_CONFIG.impersonator.namespace),
  HUBSPOKE_FINALIZER: nonEmpty(DEFAULT_RECONCILER_CONFIG.finalizer),
  HUBSPOKE_HUB_OWNER_LABEL: nonEmpty(DEFAULT_RECONCILER_CONFIG.hubOwnerLabel),
  HUBSPOKE_HUB_KUBECONFIG: z.string().min(1).optional(),
  HUBSPOKE_HUB_CONTEXT: z.string().min(1).optional(),
  HUBSPOKE_SPOKE_KUBECONFIG: z.string().min(1).optional(),
  HUBSPOKE_SPOKE_CONTEXT: z.string().min(1).optional(),
  HUBSPOKE_WORKERS: positiveInt(2),
  HUBSPOKE_BACKOFF_BASE_MS: positiveInt(5),
  HUBSPOKE_BACKOFF_MAX_MS: positiveInt(1_000_000),
  HUBSPOKE_WATCH_RESTART_MS: positiveInt(5_000),
  HUBSPOKE_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .default('info'),
});

function clusterConfig(kubeconfigPath?: string, context?: string): kubernetes.KubeClusterConfig {
  const config: kubernetes.KubeClusterConfig = {};
  if (kubeconfigPath) config.kubeconfigPath = kubeconfigPath;
  if (context) config.context = context;
  return config;
}

/**
 * Build the controller configuration from environment variables.
 * Unset or empty variables take their defaults.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadControllerConfig(
  env: Record<string, string | undefined> = process.env
): ControllerConfig {
  // An empty variable means "unset"
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('HUBSPOKE_') && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;

  if (vars.HUBSPOKE_BACKOFF_MAX_MS < vars.HUBSPOKE_BACKOFF_BASE_MS) {
    throw new ConfigError([
      'HUBSPOKE_BACKOFF_MAX_MS: must not be smaller than HUBSPOKE_BACKOFF_BASE_MS',
    ]);
  }

  return {
    impersonator: {
      name: vars.HUBSPOKE_IMPERSONATOR_NAME,
      namespace: vars.HUBSPOKE_IMPERSONATOR_NAMESPACE,
    },
    finalizer: vars.HUBSPOKE_FINALIZER,
    hubOwnerLabel: vars.HUBSPOKE_HUB_OWNER_LABEL,
    hub: clusterConfig(vars.HUBSPOKE_HUB_KUBECONFIG, vars.HUBSPOKE_HUB_CONTEXT),
    spoke: clusterConfig(vars.HUBSPOKE_SPOKE_KUBECONFIG, vars.HUBSPOKE_SPOKE_CONTEXT),
    workers: vars.HUBSPOKE_WORKERS,
    backoff: { baseMs: vars.HUBSPOKE_BACKOFF_BASE_MS, maxMs: vars.HUBSPOKE_BACKOFF_MAX_MS },
    watchRestartMs: vars.HUBSPOKE_WATCH_RESTART_MS,
    logLevel: vars.HUBSPOKE_LOG_LEVEL,
  };
}

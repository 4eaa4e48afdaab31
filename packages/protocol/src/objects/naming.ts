// Deterministic names for derived spoke objects.
//
// These must stay stable across restarts and releases: the reconciler finds
// previously materialized objects by name on every pass.

const IMPERSONATION_PREFIX = 'impersonate';
const BINDING_SUFFIX = 'rolebinding';

/**
 * Name of the ClusterRole that allows impersonating `subject` on behalf of `hubOwnerId`.
 */
export function impersonationRoleName(subject: string, hubOwnerId: string): string {
  return `${IMPERSONATION_PREFIX}-${subject}-${hubOwnerId}`;
}

/**
 * Name of the ClusterRoleBinding that hands the impersonation role to the proxy identity.
 */
export function impersonationBindingName(subject: string, hubOwnerId: string): string {
  return `${impersonationRoleName(subject, hubOwnerId)}-${BINDING_SUFFIX}`;
}

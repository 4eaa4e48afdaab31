// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Kubernetes label set. Keys and values are plain strings.
 */
export type Labels = Record<string, string>;

/**
 * Identity of a stored object: its name, plus its namespace when namespaced.
 */
export type ObjectIdentity = {
  name: string;
  namespace?: string;
};

/**
 * The subset of object metadata the reconciler reads and writes
 */
export type ObjectMeta = ObjectIdentity & {
  labels: Labels;

  /**
   * Server-managed concurrency token. Absent on objects that were never stored.
   */
  resourceVersion?: string;
};

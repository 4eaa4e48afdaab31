// Store error types
//
// Every repository implementation reports failures with these classes so the
// runtime can tell a missing object from a conflict without knowing the backend.

import type { ObjectIdentity } from '@hubspoke/protocol';

function describeIdentity(id: ObjectIdentity): string {
  return id.namespace ? `${id.namespace}/${id.name}` : id.name;
}

/**
 * Base class for all store errors.
 */
export class StoreError extends Error {
  readonly code: string;

  constructor(code: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'StoreError';
    this.code = code;
  }
}

/**
 * Error when an object addressed by identity does not exist
 */
export class ObjectNotFoundError extends StoreError {
  readonly kind: string;
  readonly identity: ObjectIdentity;

  constructor(kind: string, identity: ObjectIdentity, cause?: unknown) {
    super('NOT_FOUND', `${kind} not found: ${describeIdentity(identity)}`, cause);
    this.name = 'ObjectNotFoundError';
    this.kind = kind;
    this.identity = identity;
  }
}

/**
 * Error when creating an object whose identity is already taken
 */
export class ObjectAlreadyExistsError extends StoreError {
  readonly kind: string;
  readonly identity: ObjectIdentity;

  constructor(kind: string, identity: ObjectIdentity, cause?: unknown) {
    super('ALREADY_EXISTS', `${kind} already exists: ${describeIdentity(identity)}`, cause);
    this.name = 'ObjectAlreadyExistsError';
    this.kind = kind;
    this.identity = identity;
  }
}

/**
 * Error when an update was based on a stale resourceVersion
 */
export class ObjectConflictError extends StoreError {
  readonly kind: string;
  readonly identity: ObjectIdentity;

  constructor(kind: string, identity: ObjectIdentity, cause?: unknown) {
    super(
      'CONFLICT',
      `${kind} ${describeIdentity(identity)} was modified concurrently; re-read and retry`,
      cause
    );
    this.name = 'ObjectConflictError';
    this.kind = kind;
    this.identity = identity;
  }
}

/**
 * Error when a stored object cannot be decoded
 */
export class MalformedObjectError extends StoreError {
  readonly kind: string;

  constructor(kind: string, reason: string, cause?: unknown) {
    super('MALFORMED_OBJECT', `Malformed ${kind}: ${reason}`, cause);
    this.name = 'MalformedObjectError';
    this.kind = kind;
  }
}

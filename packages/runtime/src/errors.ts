// Runtime error types

import type {
  GrantBinding,
  GrantRef,
  RoleRef,
  GrantValidationErrorCode,
  GrantValidationIssue,
} from '@hubspoke/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a Grant cannot be materialized as written.
 * Raised before anything is written to the hub or the spoke.
 */
export class GrantValidationError extends ValidationError {
  readonly ref: GrantRef;
  readonly issues: GrantValidationIssue<GrantValidationErrorCode>[];

  constructor(ref: GrantRef, issues: GrantValidationIssue<GrantValidationErrorCode>[]) {
    const where = ref.namespace ? `${ref.namespace}/${ref.name}` : ref.name;
    super(`Grant ${where} is invalid: ${issues.map((i) => i.message).join('; ')}`, {
      field: issues[0]?.path,
      details: { codes: issues.map((i) => i.code) },
    });
    this.name = 'GrantValidationError';
    this.ref = ref;
    this.issues = issues;
  }
}

/**
 * Error when controller configuration is invalid.
 */
export class ConfigError extends RuntimeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Error when a spoke binding already points at a different role.
 * roleRef is immutable on the API server; the binding has to be removed
 * (deleting and recreating the Grant does that) before it can be rebound.
 */
export class RoleRefChangedError extends RuntimeError {
  readonly binding: { kind: GrantBinding['kind']; namespace?: string; name: string };
  readonly current: RoleRef;
  readonly desired: RoleRef;

  constructor(existing: GrantBinding, desired: RoleRef) {
    const { name, namespace } = existing.metadata;
    const where = namespace ? `${namespace}/${name}` : name;
    super(
      'ROLE_REF_CHANGED',
      `${existing.kind} ${where} is bound to ${existing.roleRef.kind} ${existing.roleRef.name}; ` +
        `roleRef is immutable and cannot become ${desired.kind} ${desired.name}`
    );
    this.name = 'RoleRefChangedError';
    this.binding = namespace
      ? { kind: existing.kind, namespace, name }
      : { kind: existing.kind, name };
    this.current = { ...existing.roleRef };
    this.desired = { ...desired };
  }
}

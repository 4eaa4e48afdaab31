// Grant decoding and validation
//
// Decoding turns the raw hub object into a Grant and rejects structurally
// broken input. Validation then checks the rules the reconciler relies on
// before it writes anything to the spoke.

import { z } from 'zod';
import type { Grant, GrantRoleRef, GrantSubject } from '../types/grants.js';

const subjectSchema = z.object({
  kind: z.string(),
  name: z.string(),
  apiGroup: z.string().optional(),
  namespace: z.string().optional(),
});

const roleRefSchema = z.object({
  apiGroup: z.string().optional(),
  kind: z.string().optional(),
  name: z.string().min(1),
  namespaces: z.array(z.string()).nullish(),
});

/**
 * Wire shape of a ManagedClusterRoleBinding as served by the hub API.
 * Unknown fields are ignored.
 */
export const grantObjectSchema = z.object({
  metadata: z.object({
    name: z.string().min(1),
    namespace: z.string().optional(),
    labels: z.record(z.string()).nullish(),
    finalizers: z.array(z.string()).nullish(),
    deletionTimestamp: z.string().nullish(),
    resourceVersion: z.string().optional(),
  }),
  subjects: z.array(subjectSchema).nullish(),
  roleRef: roleRefSchema,
});

export type GrantObject = z.infer<typeof grantObjectSchema>;

/**
 * Error when a raw hub object is not a decodable Grant
 */
export class GrantDecodeError extends Error {
  readonly code = 'GRANT_DECODE_ERROR';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid grant object: ${issues.join('; ')}`);
    this.name = 'GrantDecodeError';
    this.issues = issues;
  }
}

/**
 * Decode a raw hub object into a Grant.
 *
 * @throws GrantDecodeError when the object does not match the wire shape
 */
export function parseGrantObject(raw: unknown): Grant {
  const result = grantObjectSchema.safeParse(raw);
  if (!result.success) {
    throw new GrantDecodeError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const { metadata, subjects, roleRef } = result.data;

  const grant: Grant = {
    ref: metadata.namespace
      ? { namespace: metadata.namespace, name: metadata.name }
      : { name: metadata.name },
    labels: metadata.labels ?? {},
    finalizers: metadata.finalizers ?? [],
    subjects: (subjects ?? []).map(toSubject),
    roleRef: toRoleRef(roleRef),
  };
  if (metadata.deletionTimestamp) grant.deletionTimestamp = metadata.deletionTimestamp;
  if (metadata.resourceVersion) grant.resourceVersion = metadata.resourceVersion;
  return grant;
}

function toSubject(subject: z.infer<typeof subjectSchema>): GrantSubject {
  const out: GrantSubject = { kind: subject.kind, name: subject.name };
  if (subject.apiGroup !== undefined) out.apiGroup = subject.apiGroup;
  if (subject.namespace !== undefined) out.namespace = subject.namespace;
  return out;
}

function toRoleRef(roleRef: z.infer<typeof roleRefSchema>): GrantRoleRef {
  const out: GrantRoleRef = { name: roleRef.name };
  if (roleRef.apiGroup !== undefined) out.apiGroup = roleRef.apiGroup;
  if (roleRef.kind !== undefined) out.kind = roleRef.kind;
  if (roleRef.namespaces != null) out.namespaces = [...roleRef.namespaces];
  return out;
}

// --- Validation ---

/**
 * Validation error codes (the Grant cannot be materialized)
 */
export type GrantValidationErrorCode =
  | 'MISSING_SUBJECT'
  | 'EMPTY_SUBJECT_NAME'
  | 'MISSING_HUB_OWNER'
  | 'EMPTY_NAMESPACES'
  | 'EMPTY_NAMESPACE_NAME';

/**
 * Validation warning codes (the Grant is materialized anyway)
 */
export type GrantValidationWarningCode = 'EXTRA_SUBJECTS' | 'DUPLICATE_NAMESPACE';

export type GrantValidationIssue<TCode extends string> = {
  path: string;
  message: string;
  code: TCode;
};

export type GrantValidationResult = {
  valid: boolean;
  errors: GrantValidationIssue<GrantValidationErrorCode>[];
  warnings: GrantValidationIssue<GrantValidationWarningCode>[];
};

export type ValidateGrantOptions = {
  /** Label key whose value identifies the hub owner */
  hubOwnerLabel: string;
};

/**
 * Check that a Grant can be materialized on the spoke.
 */
export function validateGrant(grant: Grant, options: ValidateGrantOptions): GrantValidationResult {
  const errors: GrantValidationIssue<GrantValidationErrorCode>[] = [];
  const warnings: GrantValidationIssue<GrantValidationWarningCode>[] = [];

  const [first, ...rest] = grant.subjects;
  if (!first) {
    errors.push({
      path: 'subjects',
      message: 'Grant must name exactly one subject',
      code: 'MISSING_SUBJECT',
    });
  } else if (first.name.trim() === '') {
    errors.push({
      path: 'subjects[0].name',
      message: 'Subject name must not be empty',
      code: 'EMPTY_SUBJECT_NAME',
    });
  }
  if (rest.length > 0) {
    warnings.push({
      path: 'subjects',
      message: `Only the first subject is honored; ${rest.length} more ignored`,
      code: 'EXTRA_SUBJECTS',
    });
  }

  const owner = grant.labels[options.hubOwnerLabel];
  if (owner === undefined || owner === '') {
    errors.push({
      path: `metadata.labels.${options.hubOwnerLabel}`,
      message: `Grant must carry a non-empty "${options.hubOwnerLabel}" label`,
      code: 'MISSING_HUB_OWNER',
    });
  }

  const namespaces = grant.roleRef.namespaces;
  if (namespaces !== undefined) {
    if (namespaces.length === 0) {
      errors.push({
        path: 'roleRef.namespaces',
        message: 'Namespace list must not be empty; omit it for a cluster-wide grant',
        code: 'EMPTY_NAMESPACES',
      });
    }
    const seen = new Set<string>();
    namespaces.forEach((namespace, index) => {
      if (namespace === '') {
        errors.push({
          path: `roleRef.namespaces[${index}]`,
          message: 'Namespace name must not be empty',
          code: 'EMPTY_NAMESPACE_NAME',
        });
      } else if (seen.has(namespace)) {
        warnings.push({
          path: `roleRef.namespaces[${index}]`,
          message: `Namespace "${namespace}" is listed more than once`,
          code: 'DUPLICATE_NAMESPACE',
        });
      }
      seen.add(namespace);
    });
  }

  return { valid: errors.length === 0, errors, warnings };
}

// Conversion between client-node models and protocol objects.
//
// Encoding overlays the fields the reconciler manages onto the object last
// read from the server, so annotations, owner references and other fields
// written by someone else survive an update.

import type {
  V1ClusterRole,
  V1ClusterRoleBinding,
  V1ObjectMeta,
  V1PolicyRule,
  V1RoleBinding,
  V1RoleRef,
  V1ServiceAccount,
} from '@kubernetes/client-node';
import {
  RBAC_API_GROUP,
  type ClusterRole,
  type ClusterRoleBinding,
  type ObjectMeta,
  type PolicyRule,
  type RbacSubject,
  type RoleBinding,
  type RoleRef,
  type ServiceAccount,
} from '@hubspoke/protocol';
import { MalformedObjectError } from '../errors.js';

type V1Subject = NonNullable<V1ClusterRoleBinding['subjects']>[number];

const RBAC_API_VERSION = `${RBAC_API_GROUP}/v1`;

// --- Metadata ---

function decodeMeta(kind: string, meta: V1ObjectMeta | undefined): ObjectMeta {
  if (!meta?.name) {
    throw new MalformedObjectError(kind, 'metadata.name is missing');
  }
  const out: ObjectMeta = { name: meta.name, labels: { ...meta.labels } };
  if (meta.namespace) out.namespace = meta.namespace;
  if (meta.resourceVersion) out.resourceVersion = meta.resourceVersion;
  return out;
}

function decodeNamespacedMeta(
  kind: string,
  meta: V1ObjectMeta | undefined
): ObjectMeta & { namespace: string } {
  const decoded = decodeMeta(kind, meta);
  if (!decoded.namespace) {
    throw new MalformedObjectError(kind, `${decoded.name} has no namespace`);
  }
  return { ...decoded, namespace: decoded.namespace };
}

function encodeMeta(meta: ObjectMeta, base: V1ObjectMeta | undefined): V1ObjectMeta {
  const out: V1ObjectMeta = { ...base, name: meta.name, labels: { ...meta.labels } };
  if (meta.namespace) out.namespace = meta.namespace;
  if (meta.resourceVersion) out.resourceVersion = meta.resourceVersion;
  return out;
}

// --- Rules, subjects, role references ---

function decodeRule(rule: V1PolicyRule): PolicyRule {
  const out: PolicyRule = {
    apiGroups: [...(rule.apiGroups ?? [])],
    resources: [...(rule.resources ?? [])],
    verbs: [...rule.verbs],
  };
  if (rule.resourceNames) out.resourceNames = [...rule.resourceNames];
  return out;
}

function encodeRule(rule: PolicyRule): V1PolicyRule {
  const out: V1PolicyRule = {
    apiGroups: [...rule.apiGroups],
    resources: [...rule.resources],
    verbs: [...rule.verbs],
  };
  if (rule.resourceNames) out.resourceNames = [...rule.resourceNames];
  return out;
}

function decodeSubject(kind: string, subject: V1Subject): RbacSubject {
  if (subject.kind !== 'User' && subject.kind !== 'Group' && subject.kind !== 'ServiceAccount') {
    throw new MalformedObjectError(kind, `unsupported subject kind "${subject.kind}"`);
  }
  const out: RbacSubject = { kind: subject.kind, name: subject.name, apiGroup: subject.apiGroup ?? '' };
  if (subject.namespace) out.namespace = subject.namespace;
  return out;
}

function encodeSubject(subject: RbacSubject): V1Subject {
  const out: V1Subject = { kind: subject.kind, name: subject.name, apiGroup: subject.apiGroup };
  if (subject.namespace) out.namespace = subject.namespace;
  return out;
}

function decodeRoleRef(kind: string, roleRef: V1RoleRef): RoleRef {
  if (roleRef.kind !== 'ClusterRole' && roleRef.kind !== 'Role') {
    throw new MalformedObjectError(kind, `unsupported roleRef kind "${roleRef.kind}"`);
  }
  return { apiGroup: roleRef.apiGroup, kind: roleRef.kind, name: roleRef.name };
}

// --- Kinds ---

export function decodeClusterRole(v1: V1ClusterRole): ClusterRole {
  return {
    kind: 'ClusterRole',
    metadata: decodeMeta('ClusterRole', v1.metadata),
    rules: (v1.rules ?? []).map(decodeRule),
  };
}

export function encodeClusterRole(role: ClusterRole, base: V1ClusterRole = {}): V1ClusterRole {
  return {
    ...base,
    apiVersion: RBAC_API_VERSION,
    kind: 'ClusterRole',
    metadata: encodeMeta(role.metadata, base.metadata),
    rules: role.rules.map(encodeRule),
  };
}

export function decodeClusterRoleBinding(v1: V1ClusterRoleBinding): ClusterRoleBinding {
  return {
    kind: 'ClusterRoleBinding',
    metadata: decodeMeta('ClusterRoleBinding', v1.metadata),
    subjects: (v1.subjects ?? []).map((s) => decodeSubject('ClusterRoleBinding', s)),
    roleRef: decodeRoleRef('ClusterRoleBinding', v1.roleRef),
  };
}

export function encodeClusterRoleBinding(
  binding: ClusterRoleBinding,
  base?: V1ClusterRoleBinding
): V1ClusterRoleBinding {
  return {
    ...base,
    apiVersion: RBAC_API_VERSION,
    kind: 'ClusterRoleBinding',
    metadata: encodeMeta(binding.metadata, base?.metadata),
    subjects: binding.subjects.map(encodeSubject),
    roleRef: { ...binding.roleRef },
  };
}

export function decodeRoleBinding(v1: V1RoleBinding): RoleBinding {
  return {
    kind: 'RoleBinding',
    metadata: decodeNamespacedMeta('RoleBinding', v1.metadata),
    subjects: (v1.subjects ?? []).map((s) => decodeSubject('RoleBinding', s)),
    roleRef: decodeRoleRef('RoleBinding', v1.roleRef),
  };
}

export function encodeRoleBinding(binding: RoleBinding, base?: V1RoleBinding): V1RoleBinding {
  return {
    ...base,
    apiVersion: RBAC_API_VERSION,
    kind: 'RoleBinding',
    metadata: encodeMeta(binding.metadata, base?.metadata),
    subjects: binding.subjects.map(encodeSubject),
    roleRef: { ...binding.roleRef },
  };
}

export function decodeServiceAccount(v1: V1ServiceAccount): ServiceAccount {
  return {
    kind: 'ServiceAccount',
    metadata: decodeNamespacedMeta('ServiceAccount', v1.metadata),
  };
}

export function encodeServiceAccount(
  account: ServiceAccount,
  base: V1ServiceAccount = {}
): V1ServiceAccount {
  return {
    ...base,
    apiVersion: 'v1',
    kind: 'ServiceAccount',
    metadata: encodeMeta(account.metadata, base.metadata),
  };
}

import {
  CoreV1Api,
  RbacAuthorizationV1Api,
  type KubeConfig,
  type V1ClusterRole,
  type V1ClusterRoleBinding,
  type V1RoleBinding,
  type V1ServiceAccount,
} from '@kubernetes/client-node';
import {
  formatLabelSelector,
  type Labels,
  type ObjectIdentity,
  type SpokeObject,
} from '@hubspoke/protocol';
import type { SpokeObjectRepository, SpokeRepositoryContext } from '../interfaces/index.js';
import { StoreError } from '../errors.js';
import { isApiStatus, toStoreError } from './errors.js';
import {
  decodeClusterRole,
  decodeClusterRoleBinding,
  decodeRoleBinding,
  decodeServiceAccount,
  encodeClusterRole,
  encodeClusterRoleBinding,
  encodeRoleBinding,
  encodeServiceAccount,
} from './mapping.js';

/**
 * The calls one kind needs from the generated API clients
 */
export type KubeObjectApi<V> = {
  read(id: ObjectIdentity): Promise<V>;
  list(labelSelector: string): Promise<V[]>;
  create(id: ObjectIdentity, body: V): Promise<V>;
  replace(id: ObjectIdentity, body: V): Promise<V>;
  remove(id: ObjectIdentity): Promise<void>;
};

export type KubeObjectCodec<T extends SpokeObject, V> = {
  decode(v1: V): T;
  encode(object: T, base?: V): V;
};

function identityOf(object: SpokeObject): ObjectIdentity {
  const { name, namespace } = object.metadata;
  return namespace ? { namespace, name } : { name };
}

function requireNamespace(kind: string, id: ObjectIdentity): string {
  if (!id.namespace) {
    throw new StoreError('NAMESPACE_REQUIRED', `${kind} ${id.name} needs a namespace`);
  }
  return id.namespace;
}

/**
 * SpokeObjectRepository over one Kubernetes kind.
 */
export class KubeObjectRepository<T extends SpokeObject, V> implements SpokeObjectRepository<T> {
  constructor(
    readonly kind: T['kind'],
    private api: KubeObjectApi<V>,
    private codec: KubeObjectCodec<T, V>
  ) {}

  async get(id: ObjectIdentity): Promise<T | null> {
    let v1: V;
    try {
      v1 = await this.api.read(id);
    } catch (error) {
      if (isApiStatus(error, 404)) return null;
      throw toStoreError(error, this.kind, 'get', id);
    }
    return this.codec.decode(v1);
  }

  async list(selector: Labels): Promise<T[]> {
    let items: V[];
    try {
      items = await this.api.list(formatLabelSelector(selector));
    } catch (error) {
      throw toStoreError(error, this.kind, 'list');
    }
    return items.map((v1) => this.codec.decode(v1));
  }

  async create(object: T): Promise<T> {
    const id = identityOf(object);
    try {
      return this.codec.decode(await this.api.create(id, this.codec.encode(object)));
    } catch (error) {
      throw toStoreError(error, this.kind, 'create', id);
    }
  }

  async update(object: T): Promise<T> {
    const id = identityOf(object);
    try {
      const current = await this.api.read(id);
      return this.codec.decode(await this.api.replace(id, this.codec.encode(object, current)));
    } catch (error) {
      throw toStoreError(error, this.kind, 'update', id);
    }
  }

  async delete(id: ObjectIdentity): Promise<boolean> {
    try {
      await this.api.remove(id);
      return true;
    } catch (error) {
      if (isApiStatus(error, 404)) return false;
      throw toStoreError(error, this.kind, 'delete', id);
    }
  }
}

/**
 * Create the spoke repositories on top of a KubeConfig.
 */
export function createKubernetesSpokeContext(kc: KubeConfig): SpokeRepositoryContext {
  const rbac = kc.makeApiClient(RbacAuthorizationV1Api);
  const core = kc.makeApiClient(CoreV1Api);

  const clusterRoleApi: KubeObjectApi<V1ClusterRole> = {
    read: (id) => rbac.readClusterRole({ name: id.name }),
    list: async (labelSelector) => (await rbac.listClusterRole({ labelSelector })).items,
    create: (_id, body) => rbac.createClusterRole({ body }),
    replace: (id, body) => rbac.replaceClusterRole({ name: id.name, body }),
    remove: async (id) => {
      await rbac.deleteClusterRole({ name: id.name });
    },
  };

  const clusterRoleBindingApi: KubeObjectApi<V1ClusterRoleBinding> = {
    read: (id) => rbac.readClusterRoleBinding({ name: id.name }),
    list: async (labelSelector) => (await rbac.listClusterRoleBinding({ labelSelector })).items,
    create: (_id, body) => rbac.createClusterRoleBinding({ body }),
    replace: (id, body) => rbac.replaceClusterRoleBinding({ name: id.name, body }),
    remove: async (id) => {
      await rbac.deleteClusterRoleBinding({ name: id.name });
    },
  };

  const roleBindingApi: KubeObjectApi<V1RoleBinding> = {
    read: (id) =>
      rbac.readNamespacedRoleBinding({ name: id.name, namespace: requireNamespace('RoleBinding', id) }),
    list: async (labelSelector) =>
      (await rbac.listRoleBindingForAllNamespaces({ labelSelector })).items,
    create: (id, body) =>
      rbac.createNamespacedRoleBinding({ namespace: requireNamespace('RoleBinding', id), body }),
    replace: (id, body) =>
      rbac.replaceNamespacedRoleBinding({
        name: id.name,
        namespace: requireNamespace('RoleBinding', id),
        body,
      }),
    remove: async (id) => {
      await rbac.deleteNamespacedRoleBinding({
        name: id.name,
        namespace: requireNamespace('RoleBinding', id),
      });
    },
  };

  const serviceAccountApi: KubeObjectApi<V1ServiceAccount> = {
    read: (id) =>
      core.readNamespacedServiceAccount({
        name: id.name,
        namespace: requireNamespace('ServiceAccount', id),
      }),
    list: async (labelSelector) =>
      (await core.listServiceAccountForAllNamespaces({ labelSelector })).items,
    create: (id, body) =>
      core.createNamespacedServiceAccount({ namespace: requireNamespace('ServiceAccount', id), body }),
    replace: (id, body) =>
      core.replaceNamespacedServiceAccount({
        name: id.name,
        namespace: requireNamespace('ServiceAccount', id),
        body,
      }),
    remove: async (id) => {
      await core.deleteNamespacedServiceAccount({
        name: id.name,
        namespace: requireNamespace('ServiceAccount', id),
      });
    },
  };

  return {
    clusterRoles: new KubeObjectRepository('ClusterRole', clusterRoleApi, {
      decode: decodeClusterRole,
      encode: encodeClusterRole,
    }),
    clusterRoleBindings: new KubeObjectRepository('ClusterRoleBinding', clusterRoleBindingApi, {
      decode: decodeClusterRoleBinding,
      encode: encodeClusterRoleBinding,
    }),
    roleBindings: new KubeObjectRepository('RoleBinding', roleBindingApi, {
      decode: decodeRoleBinding,
      encode: encodeRoleBinding,
    }),
    serviceAccounts: new KubeObjectRepository('ServiceAccount', serviceAccountApi, {
      decode: decodeServiceAccount,
      encode: encodeServiceAccount,
    }),
  };
}

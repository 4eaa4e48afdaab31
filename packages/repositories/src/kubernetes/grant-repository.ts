import { CustomObjectsApi, type KubeConfig } from '@kubernetes/client-node';
import { z } from 'zod';
import {
  GRANT_API_GROUP,
  GRANT_API_VERSION,
  GRANT_KIND,
  GRANT_PLURAL,
  GrantDecodeError,
  parseGrantObject,
  type Grant,
  type GrantRef,
} from '@hubspoke/protocol';
import type { GrantRepository } from '../interfaces/index.js';
import { MalformedObjectError } from '../errors.js';
import { isApiStatus, toStoreError } from './errors.js';

// Keeps every field of the stored object so a replace does not drop any of them
const storedObjectSchema = z
  .object({
    metadata: z.object({ resourceVersion: z.string().optional() }).passthrough(),
  })
  .passthrough();

function decodeGrant(raw: unknown): Grant {
  try {
    return parseGrantObject(raw);
  } catch (error) {
    if (error instanceof GrantDecodeError) {
      throw new MalformedObjectError(GRANT_KIND, error.issues.join('; '), error);
    }
    throw error;
  }
}

/**
 * The custom object calls the Grant repository makes
 */
export type CustomObjectsClient = Pick<
  CustomObjectsApi,
  | 'getNamespacedCustomObject'
  | 'getClusterCustomObject'
  | 'replaceNamespacedCustomObject'
  | 'replaceClusterCustomObject'
>;

/**
 * GrantRepository over the hub's custom object API.
 */
export class KubeGrantRepository implements GrantRepository {
  constructor(private api: CustomObjectsClient) {}

  async get(ref: GrantRef): Promise<Grant | null> {
    let raw: unknown;
    try {
      raw = await this.read(ref);
    } catch (error) {
      if (isApiStatus(error, 404)) return null;
      throw toStoreError(error, GRANT_KIND, 'get', ref);
    }
    return decodeGrant(raw);
  }

  async setFinalizers(grant: Grant, finalizers: string[]): Promise<Grant | null> {
    let written: unknown;
    try {
      const stored = storedObjectSchema.safeParse(await this.read(grant.ref));
      if (!stored.success) {
        throw new MalformedObjectError(GRANT_KIND, 'stored object has no metadata');
      }
      const body = {
        ...stored.data,
        metadata: {
          ...stored.data.metadata,
          finalizers,
          resourceVersion: grant.resourceVersion ?? stored.data.metadata.resourceVersion,
        },
      };
      written = await this.replace(grant.ref, body);
    } catch (error) {
      throw toStoreError(error, GRANT_KIND, 'update', grant.ref);
    }

    const updated = decodeGrant(written);
    // The API server erases a terminating object once its last finalizer is gone
    if (updated.deletionTimestamp && updated.finalizers.length === 0) {
      return null;
    }
    return updated;
  }

  private read(ref: GrantRef): Promise<unknown> {
    const base = { group: GRANT_API_GROUP, version: GRANT_API_VERSION, plural: GRANT_PLURAL };
    return ref.namespace
      ? this.api.getNamespacedCustomObject({ ...base, namespace: ref.namespace, name: ref.name })
      : this.api.getClusterCustomObject({ ...base, name: ref.name });
  }

  private replace(ref: GrantRef, body: object): Promise<unknown> {
    const base = { group: GRANT_API_GROUP, version: GRANT_API_VERSION, plural: GRANT_PLURAL };
    return ref.namespace
      ? this.api.replaceNamespacedCustomObject({
          ...base,
          namespace: ref.namespace,
          name: ref.name,
          body,
        })
      : this.api.replaceClusterCustomObject({ ...base, name: ref.name, body });
  }
}

export function createKubernetesGrantRepository(kc: KubeConfig): GrantRepository {
  return new KubeGrantRepository(kc.makeApiClient(CustomObjectsApi));
}

import { ApiException } from '@kubernetes/client-node';
import { z } from 'zod';
import type { ObjectIdentity } from '@hubspoke/protocol';
import {
  StoreError,
  ObjectAlreadyExistsError,
  ObjectConflictError,
  ObjectNotFoundError,
} from '../errors.js';

// The message field of a v1 Status response body
const statusBodySchema = z.object({ message: z.string().min(1) });

export type KubeOperation = 'get' | 'list' | 'create' | 'update' | 'delete';

export function isApiStatus(error: unknown, code: number): boolean {
  return error instanceof ApiException && error.code === code;
}

/**
 * Translate a Kubernetes client failure into the store error taxonomy.
 * Errors that are already StoreErrors pass through unchanged.
 */
export function toStoreError(
  error: unknown,
  kind: string,
  operation: KubeOperation,
  id?: ObjectIdentity
): StoreError {
  if (error instanceof StoreError) return error;

  if (error instanceof ApiException && id) {
    if (error.code === 404) return new ObjectNotFoundError(kind, id, error);
    if (error.code === 409) {
      return operation === 'create'
        ? new ObjectAlreadyExistsError(kind, id, error)
        : new ObjectConflictError(kind, id, error);
    }
  }

  if (error instanceof ApiException) {
    const reason = statusMessage(error.body) ?? `HTTP ${error.code}`;
    return new StoreError(
      'API_ERROR',
      `${operation} ${kind} failed (HTTP ${error.code}): ${reason}`,
      error
    );
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new StoreError('API_ERROR', `${operation} ${kind} failed: ${reason}`, error);
}

/**
 * The server's own explanation from an error body, which arrives either
 * decoded or as raw JSON text
 */
function statusMessage(body: unknown): string | undefined {
  const parsed = statusBodySchema.safeParse(typeof body === 'string' ? decodeJson(body) : body);
  return parsed.success ? parsed.data.message : undefined;
}

function decodeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

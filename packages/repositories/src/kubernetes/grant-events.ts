import { Watch, type KubeConfig } from '@kubernetes/client-node';
import { z } from 'zod';
import { GRANT_API_GROUP, GRANT_API_VERSION, GRANT_PLURAL, type GrantRef } from '@hubspoke/protocol';
import type {
  GrantEvent,
  GrantEventSource,
  GrantEventType,
  GrantSubscription,
} from '../interfaces/index.js';

const GRANTS_PATH = `/apis/${GRANT_API_GROUP}/${GRANT_API_VERSION}/${GRANT_PLURAL}`;

const watchedObjectSchema = z.object({
  metadata: z.object({
    name: z.string().min(1),
    namespace: z.string().optional(),
  }),
});

const EVENT_TYPES: readonly GrantEventType[] = ['ADDED', 'MODIFIED', 'DELETED'];

function isGrantEventType(phase: string): phase is GrantEventType {
  return EVENT_TYPES.some((type) => type === phase);
}

/**
 * Turn one watch notification into a GrantEvent, or null for bookmarks,
 * errors and objects without a usable identity.
 */
export function toGrantEvent(phase: string, object: unknown): GrantEvent | null {
  if (!isGrantEventType(phase)) return null;
  const parsed = watchedObjectSchema.safeParse(object);
  if (!parsed.success) return null;
  const { name, namespace } = parsed.data.metadata;
  const ref: GrantRef = namespace ? { namespace, name } : { name };
  return { type: phase, ref };
}

/**
 * Watches every Grant on the hub, across namespaces.
 *
 * A watch opened without a resourceVersion first replays every existing
 * object as ADDED, so a fresh subscription also covers the initial sync.
 */
export class KubeGrantEventSource implements GrantEventSource {
  constructor(private kc: KubeConfig) {}

  async subscribe(
    listener: (event: GrantEvent) => void,
    onClosed: (error?: unknown) => void
  ): Promise<GrantSubscription> {
    let closed = false;
    const watch = new Watch(this.kc);
    const request = await watch.watch(
      GRANTS_PATH,
      { allowWatchBookmarks: true },
      (phase: string, object: unknown) => {
        const event = toGrantEvent(phase, object);
        if (event) listener(event);
      },
      (error: unknown) => {
        if (closed) return;
        closed = true;
        onClosed(error ?? undefined);
      }
    );

    return {
      close() {
        if (closed) return;
        closed = true;
        request.abort();
      },
    };
  }
}

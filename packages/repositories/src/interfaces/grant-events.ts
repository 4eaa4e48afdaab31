import type { GrantRef } from '@hubspoke/protocol';

export type GrantEventType = 'ADDED' | 'MODIFIED' | 'DELETED';

/**
 * "This Grant may have changed." Delivery is at-least-once and unordered;
 * consumers must re-read the Grant rather than trust anything in the event.
 */
export type GrantEvent = {
  type: GrantEventType;
  ref: GrantRef;
};

export type GrantSubscription = {
  close(): void;
};

/**
 * Source of Grant change notifications from the hub
 */
export interface GrantEventSource {
  /**
   * Start delivering events to `listener`.
   *
   * `onClosed` is called once if the stream ends on its own (with the error
   * when there was one); it is not called after `close()`.
   */
  subscribe(
    listener: (event: GrantEvent) => void,
    onClosed: (error?: unknown) => void
  ): Promise<GrantSubscription>;
}

// Repository interfaces
// These define the contracts for hub and spoke access, so the runtime never depends on a client.

export type { GrantRepository } from './grant-repository.js';

export type {
  GrantEventSource,
  GrantEvent,
  GrantEventType,
  GrantSubscription,
} from './grant-events.js';

export type { SpokeObjectRepository, SpokeRepositoryContext } from './spoke-repository.js';

export type { RepositoryContext } from './repository-context.js';

export {
  createOrUpdate,
  mutateClusterRole,
  mutateBinding,
  type Mutator,
  type SyncOperation,
  type SyncResult,
} from './create-or-update.js';

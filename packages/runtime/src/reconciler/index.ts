export {
  GrantReconciler,
  type GrantReconcilerOptions,
  type ReconcileOutcome,
} from './reconciler.js';

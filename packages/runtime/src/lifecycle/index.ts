export {
  grantPhase,
  hasFinalizer,
  ensureFinalizer,
  releaseFinalizer,
  type GrantPhase,
} from './finalizer.js';

// @hubspoke/runtime
// Reconciles hub Grants into spoke RBAC objects

// Reconciliation (one pass per observed Grant change)
export {
  GrantReconciler,
  type GrantReconcilerOptions,
  type ReconcileOutcome,
} from './reconciler/index.js';

// Controller (work queue + hub watch)
export {
  GrantController,
  WorkQueue,
  startGrantController,
  type GrantControllerOptions,
} from './controller/index.js';

// Resource synchronizer
export {
  createOrUpdate,
  mutateClusterRole,
  mutateBinding,
  type Mutator,
  type SyncOperation,
  type SyncResult,
} from './sync/index.js';

// Grant lifecycle
export {
  grantPhase,
  hasFinalizer,
  ensureFinalizer,
  releaseFinalizer,
  type GrantPhase,
} from './lifecycle/index.js';

// Permission materializer
export {
  buildPermissionPlan,
  resolvePermissionTarget,
  materializePermissions,
  type PermissionPlan,
  type PermissionTarget,
  type ResolvedTarget,
  type MaterializedObject,
  type MaterializeResult,
} from './permissions/index.js';

// Cleanup sweeper
export { sweepGrantObjects, type SweepResult, type SweptObject } from './cleanup/index.js';

// Configuration
export {
  loadControllerConfig,
  DEFAULT_RECONCILER_CONFIG,
  type ReconcilerConfig,
  type ControllerConfig,
  type ImpersonatorIdentity,
  type BackoffConfig,
} from './config.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  GrantValidationError,
  RoleRefChangedError,
  ConfigError,
} from './errors.js';

// Logging
export {
  createConsoleLogger,
  createCapturingLogger,
  consoleLogger,
  silentLogger,
  errorMessage,
  LOG_LEVELS,
  type ReconcileLogger,
  type LogLevel,
  type LogEntry,
} from './logging/logger.js';

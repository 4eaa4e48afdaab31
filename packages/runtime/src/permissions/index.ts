export {
  buildPermissionPlan,
  resolvePermissionTarget,
  type PermissionPlan,
  type PermissionTarget,
  type ResolvedTarget,
} from './plan.js';
export {
  materializePermissions,
  type MaterializedObject,
  type MaterializeResult,
} from './materializer.js';

// @hubspoke/protocol
// Grant and RBAC object types, naming, label helpers and grant validation

export * from './types/index.js';

export { impersonationRoleName, impersonationBindingName } from './objects/naming.js';
export {
  matchesSelector,
  labelsEqual,
  formatLabelSelector,
  cloneLabels,
} from './objects/labels.js';

export {
  grantObjectSchema,
  parseGrantObject,
  validateGrant,
  GrantDecodeError,
  type GrantObject,
  type GrantValidationErrorCode,
  type GrantValidationWarningCode,
  type GrantValidationIssue,
  type GrantValidationResult,
  type ValidateGrantOptions,
} from './validation/grants.js';

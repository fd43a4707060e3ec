export {
  SecurityPolicy,
  policyDefinitionSchema,
  formatZodIssues,
  DEFAULT_PATTERN_LABEL,
  type PolicyDefinition,
  type BlockedPattern,
} from './security-policy.js';

export { PolicyLoadError } from './policy-error.js';

export { PolicyStore, type PolicyChangeListener } from './policy-store.js';

export {
  loadPolicyFile,
  writeDefaultPolicy,
  DEFAULT_POLICY_FILE,
  type WriteDefaultPolicyOptions,
} from './policy-loader.js';

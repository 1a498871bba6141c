export { PolicyService, type ReloadResult } from './service/policy-service.js';
export { PolicyStore, type PolicyListener } from './service/policy-store.js';
export { FileSystemPolicyRepository, type ConfigRepository } from './repository/policy-repository.js';
export { matchAppKey } from './matcher.js';
export { createPolicyRoutes } from './api/routes.js';
export {
  DEFAULT_CONFIG,
  EMPTY_POLICY,
  toLockPolicy,
  normalizeConfig,
  type LockPolicy,
  type LockerConfig,
  type PolicyResponse,
  type PolicySettingsUpdate,
} from './model/policy.js';

// Hooks and field metadata
export type {
  DispatchReport,
  FieldMutability,
  FieldName,
  FieldReader,
  HookAction,
  HookCondition,
  HookDefinition,
  HookEventType,
  HookKind,
  HookScope,
} from './hooks/types.js';
export { HOOK_EVENT_TYPES } from './hooks/types.js';
export { createGenericHook, createUpdateHook } from './hooks/hook.js';
export type { GenericHookOptions, UpdateHookOptions } from './hooks/hook.js';
export { FieldRegistry } from './hooks/registry.js';
export type { FieldOptions, RegistryOptions } from './hooks/registry.js';
export {
  ConstructionFailure,
  HookRegistrationError,
  ImmutableFieldViolation,
  InvariantViolation,
  MissingFieldError,
  UnknownFieldError,
  isFieldWriteError,
} from './hooks/errors.js';
export type { FieldWriteError } from './hooks/errors.js';

// Enforcement and lifecycle
export { MutabilityEnforcer, isPresent } from './mutability/enforcer.js';
export { LifecycleDispatcher } from './lifecycle/dispatcher.js';
export type { LifecycleTransition } from './lifecycle/dispatcher.js';
export type { LifecycleState } from './lifecycle/states.js';
export { AsyncHookError, IllegalLifecycleTransitionError, LifecycleStateError } from './lifecycle/errors.js';

// Entities
export { GovernedEntity } from './entity/governed-entity.js';
export type { SetResult } from './entity/governed-entity.js';
export {
  CONTAINER_COUNT_HOOK_ID,
  InfraConfig,
  createInfraConfig,
  infraConfigRegistry,
} from './entity/infra-config.js';
export type {
  InfraConfigFields,
  InfraConfigInit,
  PceConfig,
  PrivateComputationGameType,
  PrivateComputationRole,
  StageInstanceRecord,
} from './entity/infra-config.js';
export { INSTANCE_STATUSES, currentEpochSeconds } from './entity/status.js';
export type { InstanceStatus, StatusUpdate } from './entity/status.js';
export {
  InfraConfigParseError,
  deserializeInfraConfig,
  restoreInfraConfig,
  serializeInfraConfig,
} from './entity/serialization.js';

// Collaborators
export {
  PID_PROTOCOLS,
  PID_PROTOCOL_DEFAULTS,
  getMaxIdColumnCnt,
  getPidProtocolFromNumShards,
  pidShouldUseRowNumbers,
} from './pid/protocol.js';
export type { PIDProtocol } from './pid/protocol.js';
export {
  ProductConfigParseError,
  parseProductConfig,
  resolvePidSettings,
} from './product/product-config.js';
export type {
  AttributionConfig,
  CommonProductConfig,
  LiftConfig,
  PidSettings,
  ProductConfig,
  ProductConfigInput,
} from './product/product-config.js';
export { TerraformDeploymentUtils } from './terraform/deployment-utils.js';
export type { TerraformDeploymentOptions } from './terraform/deployment-utils.js';
export type { TerraformOptionValue, TerraformOptions } from './terraform/options.js';

// Persistence, configuration, logging
export {
  HybridInfraConfigStore,
  InMemoryInfraConfigStore,
  RedisInfraConfigStore,
  createInfraConfigStore,
} from './persistence/config-store.js';
export {
  ConfigStoreConnection,
  configStoreClient,
  connectConfigStore,
  disconnectConfigStore,
} from './persistence/redis-client.js';
export { StoreError } from './persistence/types.js';
export type { InfraConfigStore, RedisKeyValueClient, StoreStats } from './persistence/types.js';
export { getSettings, resetSettings } from './config/settings.js';
export type { LogLevel, Settings } from './config/settings.js';
export { logger } from './observability/logger.js';

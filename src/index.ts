// index.ts

export {
  Field,
  ALL_FIELDS,
  isField,
  PowerState,
  HvacMode,
  FanRate,
  FanDirection,
  SnapshotOrigin,
  DetectionSource,
  OverrideCategory,
  CATEGORY_PRIORITY,
} from './enums.js';
export { UnknownDeviceError, DuplicateDeviceError } from './errors.js';
export type { EngineLogger } from './logger.js';
export {
  PACKAGE_NAME,
  DEVICE_PROFILES,
  DEFAULT_PROFILE,
  resolveEngineSettings,
} from './settings.js';
export type {
  DeviceProfileName,
  DeviceProfile,
  ReconcilerConfig,
  DeviceConfig,
  DeviceOverrides,
  EngineSettings,
} from './settings.js';
export { normalizeSettings, toDeviceSettings } from './normalize.js';
export type { RawDeviceSettings, NormalizedSettings, NormalizeOptions, RejectedValue } from './normalize.js';
export type { DeviceClient } from './DeviceClient.js';
export { DeviceCoordinator } from './DeviceCoordinator.js';

export { createSnapshot, pickSettings } from './state/Snapshot.js';
export type { SettingsSnapshot, SettingsMap, SettingValue, SnapshotInput } from './state/Snapshot.js';
export { ConfirmedStateStore } from './state/ConfirmedStateStore.js';
export { CommandLedger } from './state/CommandLedger.js';
export type { CommandIntent } from './state/CommandLedger.js';
export {
  MismatchDetector,
  DEFAULT_COMPARISON_RULES,
  exactMatch,
  temperatureMatch,
} from './state/MismatchDetector.js';
export type { ComparisonRule, ComparisonOptions, Divergence } from './state/MismatchDetector.js';
export { ProtectionPolicy } from './state/ProtectionPolicy.js';
export type { PolicyReason, PolicyVerdict, ValueMatcher } from './state/ProtectionPolicy.js';
export { OverrideClassifier } from './state/OverrideClassifier.js';
export { Debouncer } from './state/Debouncer.js';
export { ReconciliationEngine } from './state/ReconciliationEngine.js';
export type { OverrideEvent, ReconciliationEngineOptions } from './state/ReconciliationEngine.js';
export { CommandQueue } from './state/CommandQueue.js';
export type {
  CommandExecutedEvent,
  CommandRetryEvent,
  CommandMaxRetriesReachedEvent,
  CommandQueueOptions,
} from './state/CommandQueue.js';

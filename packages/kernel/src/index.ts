/**
 * @resforge/kernel
 *
 * Resforge project core — module configuration, compatibility filtering,
 * resource registry, format versions, error taxonomy and event logging.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API. Descriptor
 * files, resource files and module loading live in @resforge/runtime-host
 * and @resforge/module-loader.
 */

// Types
export type {
  ActiveModule,
  DefaultModuleCatalog,
  EditingModuleType,
  ModuleConfigurationRecord,
  ModuleDescriptor,
  ModuleResolver,
  ModuleResourceMap,
  ProjectEvent,
  ProjectEventDetail,
  ResourceMap,
  TargetType,
} from './types/index.js';
export {
  DEFAULT_RESOURCE_EXTENSION,
  ProjectEventKind,
  UNKNOWN_TARGET_TYPE,
  exportNameOf,
  isConcreteTargetType,
  isEditingModuleType,
  isModuleIdentifier,
} from './types/index.js';

// Errors
export type { ResforgeErrorKind } from './errors.js';
export {
  DescriptorFormatError,
  MalformedModuleError,
  ModuleNotFoundError,
  ModuleResolutionError,
  PreconditionError,
  ResforgeError,
  UnknownResourceError,
  UnsupportedUpgradeError,
  UpgradePreconditionError,
  isResforgeError,
} from './errors.js';

// Format versions
export {
  DEFAULT_DESCRIPTOR_VERSION,
  FORMAT_VERSION,
  MODULE_CONFIGURATION_EPOCH,
  UNKNOWN_VERSION_NAME,
  VERSION_NAMES,
  getVersionName,
  isNewerThanSupported,
  needsUpgrade,
} from './format/version.js';

// Implementations
export { compatibleNames, filterCompatible, isCompatible } from './compatibility/filter.js';
export { ModuleConfiguration } from './configuration/module-configuration.js';
export type { ResourceEntry } from './resources/resource-registry.js';
export { ResourceRegistry, defaultResourceFilename } from './resources/resource-registry.js';

// Log sink interface (implementation lives in runtime-host)
export type { LogSink } from './logging/log-sink.js';
export { ProjectEventLogger } from './logging/project-log.js';

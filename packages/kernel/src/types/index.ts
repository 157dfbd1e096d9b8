/**
 * Resforge Kernel — Type Exports
 *
 * Re-exports all kernel types from a single entry point.
 * No logic lives in this file.
 */

export type {
  ActiveModule,
  DefaultModuleCatalog,
  EditingModuleType,
  ModuleConfigurationRecord,
  ModuleDescriptor,
  ModuleResolver,
  TargetType,
} from './module.js';
export {
  UNKNOWN_TARGET_TYPE,
  exportNameOf,
  isConcreteTargetType,
  isEditingModuleType,
  isModuleIdentifier,
} from './module.js';

export type { ModuleResourceMap, ResourceMap } from './resource.js';
export { DEFAULT_RESOURCE_EXTENSION } from './resource.js';

export type { ProjectEvent, ProjectEventDetail } from './event.js';
export { ProjectEventKind } from './event.js';

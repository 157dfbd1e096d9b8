/**
 * @resforge/runtime-host
 *
 * Resforge runtime host — the side-effectful half of the project core:
 * descriptor files, resource files, host configuration and the event log.
 * Depends on @resforge/kernel for types and rules and on
 * @resforge/module-loader for module discovery.
 */

// Project
export type { GetResourceOptions, OpenProjectOptions } from './project/project.js';
export { Project } from './project/project.js';

// Descriptor codec
export type { DescriptorDocument } from './project/descriptor-codec.js';
export {
  DESCRIPTOR_FILENAME,
  decodeDescriptor,
  encodeDescriptor,
} from './project/descriptor-codec.js';

// Resource files
export type { NewlineMode, ResourceFileMode, ResourceFileOptions } from './project/resource-file.js';
export { DEFAULT_RESOURCE_FILE_MODE, ResourceFile } from './project/resource-file.js';

// Host configuration
export type { HostConfig } from './config/host-config.js';
export {
  HOST_CONFIG_FILE,
  createModuleRegistry,
  getSharedModuleRegistry,
  loadHostConfig,
} from './config/host-config.js';

// RESFORGE_HOME resolution
export type { ResolveHomeOptions } from './home.js';
export { getOsConfigPath, readHomeFromConfig, resolveResforgeHome, writeHomeToConfig } from './home.js';

// StateIO
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Logging
export { FileLogSink, PROJECT_EVENTS_LOG } from './logging/file-log-sink.js';
export type { LogEvent, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { readLog } from './logging/log-reader.js';

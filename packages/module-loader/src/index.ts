/**
 * @resforge/module-loader
 *
 * Resforge module loader — built-in module manifest, the process-wide
 * module registry, and file-based resolution of project-specific modules.
 */

export {
  BUNDLED_MANIFEST_PATH,
  BUNDLED_MODULES_DIR,
  parseModuleManifest,
} from './manifest.js';

export { ModuleSearchPath } from './search-path.js';

export type { FileModuleResolverOptions, ModuleImporter } from './resolver.js';
export { CUSTOM_MODULES_DIR, FileModuleResolver } from './resolver.js';

export type { FileModuleSourceOptions, ModuleSource } from './registry.js';
export { ModuleRegistry, createFileModuleSource } from './registry.js';

export { isNodeError } from './node-error.js';

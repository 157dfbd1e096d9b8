/**
 * Resforge Runtime Host — Host Configuration
 *
 * Host-wide settings stored at `<RESFORGE_HOME>/state/host-config.json`:
 *
 *   {
 *     "manifestPath": "/opt/resforge/modulelist.txt",
 *     "builtinModulesDir": "/opt/resforge/modules",
 *     "moduleSearchRoots": ["/opt/resforge/shared-modules"],
 *     "eventLog": true
 *   }
 *
 * Every field is optional. RESFORGE_MODULE_MANIFEST and
 * RESFORGE_BUILTIN_MODULES override the corresponding file values.
 *
 * The shared module registry is built from this configuration once per
 * process (see getSharedModuleRegistry()).
 */

import { z } from 'zod';
import { PreconditionError } from '@resforge/kernel';
import { ModuleRegistry, createFileModuleSource } from '@resforge/module-loader';
import type { StateIO } from '../state/state-io.js';
import { FileStateIO } from '../state/state-io.js';
import { resolveResforgeHome } from '../home.js';

/** Filename of the host configuration within the home's state/ directory. */
export const HOST_CONFIG_FILE = 'host-config.json';

const HostConfigSchema = z.object({
  manifestPath: z.string().min(1).optional(),
  builtinModulesDir: z.string().min(1).optional(),
  moduleSearchRoots: z.array(z.string().min(1)).default([]),
  eventLog: z.boolean().default(true),
});

export type HostConfig = z.infer<typeof HostConfigSchema>;

/**
 * Read and validate the host configuration, then apply environment overrides.
 *
 * A missing file yields the defaults.
 *
 * @throws {PreconditionError} If the file exists but does not match the schema
 */
export function loadHostConfig(
  stateIO: StateIO,
  env: NodeJS.ProcessEnv = process.env,
): HostConfig {
  const parsed = HostConfigSchema.safeParse(stateIO.readJson(HOST_CONFIG_FILE, {}));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue === undefined || issue.path.length === 0 ? '' : ` at '${issue.path.join('.')}'`;
    throw new PreconditionError(
      `Invalid ${HOST_CONFIG_FILE}${where}: ${issue?.message ?? parsed.error.message}`,
    );
  }

  const config = { ...parsed.data };
  const manifestOverride = env['RESFORGE_MODULE_MANIFEST'];
  if (manifestOverride !== undefined && manifestOverride !== '') {
    config.manifestPath = manifestOverride;
  }
  const builtinOverride = env['RESFORGE_BUILTIN_MODULES'];
  if (builtinOverride !== undefined && builtinOverride !== '') {
    config.builtinModulesDir = builtinOverride;
  }
  return config;
}

// ---------------------------------------------------------------------------
// Shared Module Registry
// ---------------------------------------------------------------------------

/** A module registry over the manifest and built-in directory `config` names. */
export function createModuleRegistry(config: HostConfig): ModuleRegistry {
  return new ModuleRegistry(
    createFileModuleSource({
      manifestPath: config.manifestPath,
      builtinDir: config.builtinModulesDir,
    }),
  );
}

let sharedRegistry: ModuleRegistry | undefined;

/**
 * The process-wide module registry, built on first call from the resolved
 * home's host configuration. Discovery itself stays lazy.
 *
 * The first call resolves RESFORGE_HOME and creates the directory if it is
 * missing. Later calls return the same registry, even if the environment has
 * changed since.
 */
export function getSharedModuleRegistry(): ModuleRegistry {
  if (sharedRegistry === undefined) {
    sharedRegistry = createModuleRegistry(loadHostConfig(new FileStateIO(resolveResforgeHome())));
  }
  return sharedRegistry;
}

/**
 * Resforge Module Loader — Module Registry
 *
 * The process-wide, lazily built, ordered list of built-in editing modules.
 *
 * Discovery reads the manifest and resolves every listed name to its
 * implementing type, in manifest order. It runs at most once per registry:
 * the first caller starts discovery and every concurrent or later caller
 * awaits the same promise. The first successful result is final.
 *
 * A failed discovery is also final. Any manifest entry that cannot be
 * resolved rejects with ModuleResolutionError, and that rejection is cached.
 * The registry is foundational; a process with a broken manifest stays broken.
 */

import { readFile } from 'node:fs/promises';
import { ModuleResolutionError } from '@resforge/kernel';
import type {
  DefaultModuleCatalog,
  EditingModuleType,
  ModuleDescriptor,
} from '@resforge/kernel';
import { BUNDLED_MANIFEST_PATH, BUNDLED_MODULES_DIR, parseModuleManifest } from './manifest.js';
import { FileModuleResolver } from './resolver.js';
import type { ModuleImporter } from './resolver.js';

// ---------------------------------------------------------------------------
// Module Source
// ---------------------------------------------------------------------------

/**
 * Where the registry gets its manifest and built-in implementations.
 * Tests supply in-memory sources.
 */
export interface ModuleSource {
  /** Ordered built-in module names. */
  readManifest(): Promise<ReadonlyArray<string>>;
  /** Implementing type for one manifest name. */
  resolveBuiltin(name: string): Promise<EditingModuleType>;
}

export interface FileModuleSourceOptions {
  readonly manifestPath?: string | undefined;
  readonly builtinDir?: string | undefined;
  readonly importModule?: ModuleImporter | undefined;
}

/**
 * A ModuleSource backed by a manifest file and a directory of built-in
 * module code. Defaults to the manifest and directory bundled with this
 * package.
 */
export function createFileModuleSource(options: FileModuleSourceOptions = {}): ModuleSource {
  const manifestPath = options.manifestPath ?? BUNDLED_MANIFEST_PATH;
  const resolver = new FileModuleResolver({
    searchRoots: [options.builtinDir ?? BUNDLED_MODULES_DIR],
    importModule: options.importModule,
  });

  return {
    async readManifest() {
      return parseModuleManifest(await readFile(manifestPath, 'utf-8'));
    },
    resolveBuiltin(name) {
      return resolver.resolveOnSearchPath(name);
    },
  };
}

// ---------------------------------------------------------------------------
// Module Registry
// ---------------------------------------------------------------------------

export class ModuleRegistry implements DefaultModuleCatalog {
  private discovery: Promise<ReadonlyArray<ModuleDescriptor>> | undefined;
  private discoveryRuns = 0;

  constructor(private readonly source: ModuleSource = createFileModuleSource()) {}

  /**
   * Ordered built-in modules. The first call triggers discovery.
   *
   * @throws {ModuleResolutionError} If the manifest cannot be read or any
   *   entry fails to resolve
   */
  getDefaultModules(): Promise<ReadonlyArray<ModuleDescriptor>> {
    if (this.discovery === undefined) {
      this.discovery = this.discover();
    }
    return this.discovery;
  }

  /** True once discovery has been started. */
  isLoaded(): boolean {
    return this.discovery !== undefined;
  }

  /** Number of times discovery has run. At most 1. */
  get discoveryCount(): number {
    return this.discoveryRuns;
  }

  private async discover(): Promise<ReadonlyArray<ModuleDescriptor>> {
    this.discoveryRuns += 1;

    let names: ReadonlyArray<string>;
    try {
      names = await this.source.readManifest();
    } catch (err: unknown) {
      throw wrap('<manifest>', 'Cannot read module manifest', err);
    }

    const modules: ModuleDescriptor[] = [];
    for (const name of names) {
      try {
        modules.push({ name, moduleType: await this.source.resolveBuiltin(name) });
      } catch (err: unknown) {
        throw wrap(name, `Cannot resolve built-in module '${name}'`, err);
      }
    }
    return Object.freeze(modules);
  }
}

function wrap(moduleName: string, prefix: string, err: unknown): ModuleResolutionError {
  if (err instanceof ModuleResolutionError) {
    return err;
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new ModuleResolutionError(moduleName, `${prefix}: ${reason}`, { cause: err });
}

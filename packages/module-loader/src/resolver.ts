/**
 * Resforge Module Loader — File Module Resolver
 *
 * Locates module code on disk by dotted identifier and loads it with
 * dynamic import(). Used for both built-in manifest names (searching the
 * built-in modules directory) and project-specific modules (searching the
 * project's CustomModules directory first, then any configured roots).
 *
 * Identifier 'acme.patches.TitleScreen' is looked up under each root as:
 *
 *   acme/patches/TitleScreen.js
 *   acme/patches/TitleScreen.mjs
 *   acme/patches/TitleScreen.cjs
 *   acme/patches/TitleScreen/index.js
 *
 * The first existing file wins. It must export an editing module under the
 * identifier's final component ('TitleScreen').
 *
 * Loaded code stays in Node's module cache for the process lifetime, so a
 * second resolution of the same file returns the same module type.
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  MalformedModuleError,
  ModuleNotFoundError,
  exportNameOf,
  isEditingModuleType,
  isModuleIdentifier,
} from '@resforge/kernel';
import type { EditingModuleType, ModuleResolver } from '@resforge/kernel';
import { ModuleSearchPath } from './search-path.js';
import { isNodeError } from './node-error.js';

/** Conventional project subdirectory holding project-specific module code. */
export const CUSTOM_MODULES_DIR = 'CustomModules';

const CANDIDATE_SUFFIXES: ReadonlyArray<string> = ['.js', '.mjs', '.cjs'];

/** Loads a module namespace from a file URL. */
export type ModuleImporter = (url: string) => Promise<Readonly<Record<string, unknown>>>;

const importModule: ModuleImporter = (url) => import(url);

export interface FileModuleResolverOptions {
  /** Roots searched after the project's CustomModules directory. */
  readonly searchRoots?: Iterable<string> | undefined;
  /** Name of the project subdirectory holding custom modules. */
  readonly customModulesDir?: string | undefined;
  /** Override for tests; defaults to dynamic import(). */
  readonly importModule?: ModuleImporter | undefined;
}

export class FileModuleResolver implements ModuleResolver {
  readonly searchPath: ModuleSearchPath;
  private readonly customModulesDir: string;
  private readonly importModule: ModuleImporter;

  constructor(options: FileModuleResolverOptions = {}) {
    this.searchPath = new ModuleSearchPath(options.searchRoots ?? []);
    this.customModulesDir = options.customModulesDir ?? CUSTOM_MODULES_DIR;
    this.importModule = options.importModule ?? importModule;
  }

  /**
   * Resolve a project-specific module. The project's custom module directory
   * is searched first, in a search path scoped to this call.
   *
   * @throws {ModuleNotFoundError} No candidate file exists on the scoped path
   * @throws {MalformedModuleError} The file lacks the expected export
   */
  resolve(projectRoot: string, identifier: string): Promise<EditingModuleType> {
    const scoped = this.searchPath.prepend(join(projectRoot, this.customModulesDir));
    return this.resolveOn(scoped, identifier);
  }

  /** Resolve against this resolver's own search path only. */
  resolveOnSearchPath(identifier: string): Promise<EditingModuleType> {
    return this.resolveOn(this.searchPath, identifier);
  }

  /**
   * Locate the file that would be loaded for `identifier`, or undefined.
   */
  async locate(searchPath: ModuleSearchPath, identifier: string): Promise<string | undefined> {
    const segments = identifier.split('.');
    for (const root of searchPath.entries) {
      const base = join(root, ...segments);
      const candidates = [
        ...CANDIDATE_SUFFIXES.map((suffix) => base + suffix),
        join(base, 'index.js'),
      ];
      for (const candidate of candidates) {
        if (await isFile(candidate)) {
          return candidate;
        }
      }
    }
    return undefined;
  }

  private async resolveOn(
    searchPath: ModuleSearchPath,
    identifier: string,
  ): Promise<EditingModuleType> {
    if (!isModuleIdentifier(identifier)) {
      throw new ModuleNotFoundError(identifier, `Invalid module identifier: '${identifier}'`);
    }

    const file = await this.locate(searchPath, identifier);
    if (file === undefined) {
      throw new ModuleNotFoundError(
        identifier,
        `Cannot locate module '${identifier}' (searched: ${searchPath.entries.join(', ')})`,
      );
    }

    const namespace = await this.importModule(pathToFileURL(file).href);
    const exportName = exportNameOf(identifier);
    const exported = namespace[exportName];
    if (!isEditingModuleType(exported)) {
      throw new MalformedModuleError(identifier, exportName);
    }
    return exported;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT') || isNodeError(err, 'ENOTDIR')) {
      return false;
    }
    throw err;
  }
}
